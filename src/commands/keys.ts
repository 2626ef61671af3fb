import type { Command } from 'commander'

import { runCommandAction } from '../lib/command.js'
import type { Payload } from '../lib/output.js'
import { formatFingerprint, formatMd5Fingerprint } from '../signer/fingerprint.js'
import { withAgent, type CommandContext } from './context.js'

type KeyEntry = {
  type: string
  comment: string
  sha256: string
  md5: string
}

function renderHuman({ payload }: { payload: Payload }) {
  const keys = Array.isArray(payload.keys) ? (payload.keys as KeyEntry[]) : []
  if (keys.length === 0) return 'The SSH agent holds no keys.'

  return keys
    .map((key) => [`${key.type} ${key.comment}`.trimEnd(), `  ${key.sha256}`, `  ${key.md5}`].join('\n'))
    .join('\n')
}

export function registerKeysCommand(program: Command, context: CommandContext) {
  const cmd = program.command('keys').description('List the keys held by the SSH agent with their fingerprints')

  cmd.action(() =>
    runCommandAction(cmd, 'human', async () => {
      const keys = await withAgent(context, (agent) => agent.list())
      const entries: KeyEntry[] = keys.map((key) => ({
        type: key.type,
        comment: key.comment,
        sha256: formatFingerprint(key.blob),
        md5: formatMd5Fingerprint(key.blob),
      }))
      return { command: 'keys', keys: entries }
    }, renderHuman),
  )
}
