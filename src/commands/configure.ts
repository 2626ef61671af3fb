import type { Command } from 'commander'

import { saveConfig } from '../lib/config.js'
import { runCommandAction } from '../lib/command.js'
import { promptIdentity, requireInteractive } from '../lib/key-prompts.js'
import type { Payload } from '../lib/output.js'
import { selectKey } from '../signer/match.js'
import { formatFingerprint } from '../signer/fingerprint.js'
import { withAgent, type CommandContext, type IdentityOptions } from './context.js'

function renderHuman({ payload }: { payload: Payload }) {
  return [
    'Configuration saved',
    `Account: ${String(payload.account)}`,
    `Fingerprint: ${String(payload.fingerprint)}`,
    `Path: ${String(payload.path)}`,
  ].join('\n')
}

export function registerConfigureCommand(program: Command, context: CommandContext) {
  const cmd = program
    .command('configure')
    .description('Save the account and key fingerprint used to sign requests')
    .option('--account <name>', 'Account name')
    .option('--fingerprint <fingerprint>', 'Key fingerprint (MD5 or SHA256)')

  cmd.action((options: IdentityOptions) =>
    runCommandAction(cmd, 'human', async () => {
      const { config } = context

      // Storing the canonical fingerprint means the key must be in the agent now.
      const identity = await withAgent(context, async (agent) => {
        const keys = await agent.list()
        const prefill = {
          account: options.account ?? config.account,
          fingerprint: options.fingerprint ?? config.fingerprint,
        }

        if (!prefill.account || !prefill.fingerprint) {
          requireInteractive('configure', 'Pass --account and --fingerprint.')
        }

        const chosen =
          prefill.account && prefill.fingerprint
            ? { account: prefill.account, fingerprint: prefill.fingerprint }
            : await promptIdentity({ keys, prefill })

        return {
          account: chosen.account,
          fingerprint: formatFingerprint(selectKey(keys, chosen.fingerprint).blob),
        }
      })

      config.account = identity.account
      config.fingerprint = identity.fingerprint
      const path = saveConfig(config, context.env)

      return { command: 'configure', ...identity, path }
    }, renderHuman),
  )
}
