import * as p from '@clack/prompts'

import type { AgentKey } from '../agent/types.js'
import { formatFingerprint } from '../signer/fingerprint.js'
import type { SignerIdentity } from './config.js'
import { AppError } from './errors.js'

export function isInteractive() {
  return Boolean(process.stdin.isTTY && process.stdout.isTTY)
}

export function requireInteractive(command: string, hint: string) {
  if (isInteractive()) return

  throw new AppError('NON_INTERACTIVE_REQUIRES_FLAGS', 'Command requires an interactive TTY. Re-run with explicit flags.', {
    command,
    hint,
  })
}

export async function promptIdentity(opts: {
  keys: readonly AgentKey[]
  prefill: Partial<SignerIdentity>
}): Promise<SignerIdentity> {
  p.intro('Configure request signing')

  const account =
    opts.prefill.account ??
    (await p.text({
      message: 'Account name:',
      placeholder: 'my-account',
      validate: (value) => (value && value.trim() ? undefined : 'Account is required'),
    }))
  if (p.isCancel(account)) { p.cancel('Cancelled'); process.exit(0) }

  let fingerprint = opts.prefill.fingerprint
  if (!fingerprint) {
    if (opts.keys.length === 0) {
      p.cancel('The SSH agent holds no keys. Add one with ssh-add first.')
      throw new AppError('AGENT_HAS_NO_KEYS', 'The SSH agent holds no keys.')
    }

    const selected = await p.select({
      message: 'Key used to sign requests:',
      options: opts.keys.map((key) => {
        const value = formatFingerprint(key.blob)
        return { value, label: `${key.type} ${value}`, hint: key.comment || undefined }
      }),
    })
    if (p.isCancel(selected)) { p.cancel('Cancelled'); process.exit(0) }
    fingerprint = selected
  }

  p.outro('Signing identity configured')

  return { account: account.trim(), fingerprint }
}
