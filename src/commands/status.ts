import type { Command } from 'commander'

import { runCommandAction } from '../lib/command.js'
import type { Payload } from '../lib/output.js'
import { withSigner, type CommandContext, type IdentityOptions } from './context.js'

function renderHuman({ payload }: { payload: Payload }) {
  return [
    'Signer ready',
    `Account: ${String(payload.account)}`,
    `Key ID: ${String(payload.keyId)}`,
    `Key type: ${String(payload.keyType)}`,
    `Fingerprint: ${String(payload.fingerprint)}`,
    `Matched by: ${String(payload.requestedFingerprint)}`,
    `Algorithm: ${String(payload.algorithm)}`,
  ].join('\n')
}

export function registerStatusCommand(program: Command, context: CommandContext) {
  const cmd = program
    .command('status')
    .description('Locate the configured key in the SSH agent and check that it can sign')
    .option('--account <name>', 'Account override')
    .option('--fingerprint <fingerprint>', 'Key fingerprint override (MD5 or SHA256)')

  cmd.action((options: IdentityOptions) =>
    runCommandAction(cmd, 'human', async () =>
      withSigner(context, options, async (signer) => ({
        command: 'status',
        account: signer.account,
        keyId: signer.keyId,
        keyType: signer.keyType,
        fingerprint: signer.keyFingerprint(),
        requestedFingerprint: signer.requestedFingerprint,
        algorithm: signer.defaultAlgorithm(),
      })),
    renderHuman),
  )
}
