import { Command } from 'commander'

import { connectAgent } from './agent/connection.js'
import { registerConfigureCommand } from './commands/configure.js'
import type { CommandContext } from './commands/context.js'
import { registerKeysCommand } from './commands/keys.js'
import { registerSignCommands } from './commands/sign.js'
import { registerStatusCommand } from './commands/status.js'
import { loadConfig } from './lib/config.js'
import { AppError, toAppError } from './lib/errors.js'
import { emitFailure, inferOutputModeFromArgv, type OutputMode } from './lib/output.js'

export function defaultContext(env: NodeJS.ProcessEnv = process.env): CommandContext {
  return {
    env,
    config: loadConfig(env),
    openAgent: () => connectAgent({ env }),
    now: () => new Date(),
  }
}

export function createProgram(context: CommandContext) {
  const program = new Command()
  program
    .name('agent-http-signer')
    .description('Sign HTTP API requests with a key held by the running SSH agent')
    .showHelpAfterError(true)
    .option('--json', 'Machine-readable JSON output')
    .option('--human', 'Human-readable output')

  program.configureOutput({
    writeErr: (str) => {
      throw new AppError('CLI_ARGUMENT_ERROR', str.trim())
    },
  })

  registerKeysCommand(program, context)
  registerConfigureCommand(program, context)
  registerStatusCommand(program, context)
  registerSignCommands(program, context)

  return program
}

export async function runAgentHttpSigner(argv: string[] = process.argv, context?: CommandContext) {
  let parseMode: OutputMode = 'human'
  try {
    parseMode = inferOutputModeFromArgv(argv, 'human')
    const program = createProgram(context ?? defaultContext())
    await program.parseAsync(argv)
  } catch (error) {
    const appError = toAppError(error)
    emitFailure(parseMode, appError)
    process.exitCode = appError.exitCode
  }
}
