import { AppError } from './errors.js'

export type OutputMode = 'json' | 'human'

export type Payload = Record<string, unknown>

export type HumanRenderer = (options: { payload: Payload }) => string

function stableStringify(payload: unknown) {
  return JSON.stringify(
    payload,
    (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value),
    2,
  )
}

function conflictingFlags() {
  return new AppError('CONFLICTING_OUTPUT_FLAGS', 'Use only one output mode: --json or --human.')
}

export function resolveOutputMode(options: { json?: boolean; human?: boolean }, fallback: OutputMode): OutputMode {
  if (options.json && options.human) throw conflictingFlags()
  if (options.json) return 'json'
  if (options.human) return 'human'
  return fallback
}

export function inferOutputModeFromArgv(argv: readonly string[], fallback: OutputMode): OutputMode {
  return resolveOutputMode({ json: argv.includes('--json'), human: argv.includes('--human') }, fallback)
}

// Messages of the wrapped errors, outermost first, skipping the error itself.
function causeChain(error: Error) {
  const causes: string[] = []
  let current: unknown = error.cause
  while (current instanceof Error) {
    causes.push(current instanceof AppError ? `${current.code}: ${current.message}` : current.message)
    current = current.cause
  }
  return causes
}

export function emitSuccess(mode: OutputMode, payload: Payload, humanRenderer?: HumanRenderer) {
  if (mode === 'json') {
    process.stdout.write(stableStringify({ ok: true, ...payload }) + '\n')
    return
  }

  const rendered = humanRenderer ? humanRenderer({ payload }) : stableStringify(payload)
  process.stdout.write(rendered + '\n')
}

export function emitFailure(mode: OutputMode, error: AppError) {
  const hasDetails = error.details !== undefined && Object.keys(error.details).length > 0
  const causes = causeChain(error)

  if (mode === 'json') {
    const body = {
      ok: false,
      error: {
        code: error.code,
        message: error.message,
        ...(hasDetails ? { details: error.details } : {}),
        ...(causes.length > 0 ? { causes } : {}),
      },
    }

    process.stdout.write(stableStringify(body) + '\n')
    return
  }

  const lines = [`${error.code}: ${error.message}`]
  if (hasDetails) lines.push(stableStringify(error.details))
  for (const cause of causes) lines.push(`  caused by ${cause}`)

  process.stderr.write(lines.join('\n') + '\n')
}
