export const DEBUG_ENV = 'AGENT_HTTP_SIGNER_DEBUG'

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env) {
  return env[DEBUG_ENV] === '1'
}

/** Falls back to the process environment when no `env` is given. */
export function debug(scope: string, message: string, details?: Record<string, unknown>, env?: NodeJS.ProcessEnv) {
  if (!isDebugEnabled(env)) return

  const suffix = details && Object.keys(details).length > 0 ? ` ${JSON.stringify(details)}` : ''
  process.stderr.write(`[agent-http-signer][${scope}] ${message}${suffix}\n`)
}
