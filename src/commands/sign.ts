import type { Command } from 'commander'

import { formatHttpDate } from '../lib/encoding.js'
import { AppError } from '../lib/errors.js'
import { runCommandAction } from '../lib/command.js'
import type { Payload } from '../lib/output.js'
import { signedRequestHeaders } from '../signer/service.js'
import { withSigner, type CommandContext, type IdentityOptions } from './context.js'

type SignOptions = IdentityOptions & {
  date?: string
}

type SignRawOptions = IdentityOptions & {
  data: string
}

function parseDate(value: string | undefined, now: () => Date) {
  if (value === undefined) return formatHttpDate(now())
  if (value.trim().length === 0) {
    throw new AppError('INVALID_DATE', 'Date header value must not be empty.')
  }
  return value
}

function renderSignHuman({ payload }: { payload: Payload }) {
  return [`Date: ${String(payload.date)}`, `Authorization: ${String(payload.authorization)}`].join('\n')
}

function renderSignRawHuman({ payload }: { payload: Payload }) {
  return [`Algorithm: ${String(payload.algorithm)}`, `Signature: ${String(payload.signature)}`].join('\n')
}

function addIdentityOptions(cmd: Command) {
  return cmd
    .option('--account <name>', 'Account override')
    .option('--fingerprint <fingerprint>', 'Key fingerprint override (MD5 or SHA256)')
}

export function registerSignCommands(program: Command, context: CommandContext) {
  const signCmd = addIdentityOptions(
    program
      .command('sign')
      .description('Sign a Date header value and print the Authorization header')
      .option('--date <http-date>', 'Date header value (defaults to now)'),
  )

  signCmd.action((options: SignOptions) =>
    runCommandAction(signCmd, 'human', async () => {
      const date = parseDate(options.date, context.now)
      return withSigner(context, options, async (signer) => ({
        command: 'sign',
        keyId: signer.keyId,
        ...(await signedRequestHeaders(signer, date)),
      }))
    }, renderSignHuman),
  )

  const rawCmd = addIdentityOptions(
    program
      .command('sign-raw')
      .description('Sign an arbitrary string and print the bare signature')
      .requiredOption('--data <string>', 'String to sign'),
  )

  rawCmd.action((options: SignRawOptions) =>
    runCommandAction(rawCmd, 'json', async () =>
      withSigner(context, options, async (signer) => ({
        command: 'sign-raw',
        keyId: signer.keyId,
        ...(await signer.signRaw(options.data)),
      })),
    renderSignRawHuman),
  )
}
