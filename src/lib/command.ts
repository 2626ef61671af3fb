import type { Command } from 'commander'

import { toAppError } from './errors.js'
import { emitFailure, emitSuccess, resolveOutputMode, type HumanRenderer, type OutputMode, type Payload } from './output.js'

export type GlobalOptions = {
  json?: boolean
  human?: boolean
}

/**
 * Runs a command body, then prints its payload or its error in the selected
 * output mode. Failures set `process.exitCode` instead of throwing.
 */
export async function runCommandAction(
  command: Command,
  fallbackMode: OutputMode,
  action: (mode: OutputMode) => Promise<Payload>,
  humanRenderer?: HumanRenderer,
) {
  let mode = fallbackMode

  try {
    mode = resolveOutputMode(command.optsWithGlobals<GlobalOptions>(), fallbackMode)
    const payload = await action(mode)
    emitSuccess(mode, payload, humanRenderer)
  } catch (error) {
    const appError = toAppError(error)
    emitFailure(mode, appError)
    process.exitCode = appError.exitCode
  }
}
