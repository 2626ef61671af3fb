import type { KeyAgent } from '../agent/types.js'
import { resolveIdentity, type SignerConfig, type SignerIdentity } from '../lib/config.js'
import { AgentSigner } from '../signer/service.js'

export type AgentHandle = KeyAgent & {
  close(): void
}

export type CommandContext = {
  env: NodeJS.ProcessEnv
  config: SignerConfig
  openAgent: () => Promise<AgentHandle>
  now: () => Date
}

export type IdentityOptions = Partial<SignerIdentity>

export async function withAgent<T>(context: CommandContext, run: (agent: AgentHandle) => Promise<T>) {
  const agent = await context.openAgent()
  try {
    return await run(agent)
  } finally {
    agent.close()
  }
}

/** Resolves the identity before dialing, so a missing setting fails without touching the agent. */
export async function withSigner<T>(
  context: CommandContext,
  options: IdentityOptions,
  run: (signer: AgentSigner) => Promise<T>,
) {
  const identity = resolveIdentity(context.config, options, context.env)
  return withAgent(context, async (agent) => run(await AgentSigner.create({ ...identity, agent })))
}
