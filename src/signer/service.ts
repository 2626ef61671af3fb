import { SignFlags } from '../agent/client.js'
import { connectAgent } from '../agent/connection.js'
import type { AgentKey, KeyAgent } from '../agent/types.js'
import { debug } from '../lib/debug.js'
import { formatHttpDate, utf8Bytes } from '../lib/encoding.js'
import { SigningError } from '../lib/errors.js'
import { formatFingerprint } from './fingerprint.js'
import { AUTHORIZATION_SCHEME, formatAuthorizationHeader, SIGNED_HEADER, signingString } from './header.js'
import { matchKey } from './match.js'
import { normalizeSignature, type NormalizedSignature } from './signature.js'

export const PROBE_PAYLOAD = 'HelloWorld'

export type AgentSignerOptions = {
  /** Key fingerprint: MD5 hex or `SHA256:` base64, with or without colons. */
  fingerprint: string
  account: string
  /** Use this agent instead of dialing SSH_AUTH_SOCK. */
  agent?: KeyAgent
  env?: NodeJS.ProcessEnv
}

type SignerState = {
  agent: KeyAgent
  key: AgentKey
  account: string
  fingerprint: string
  formattedFingerprint: string
  keyId: string
  algorithm: string
}

async function signWithAgent(agent: KeyAgent, key: AgentKey, payload: string, context: string) {
  const flags = key.type === 'ssh-rsa' ? SignFlags.RSA_SHA2_256 : 0

  let normalized: NormalizedSignature
  try {
    const signature = await agent.sign(key, utf8Bytes(payload), flags)
    normalized = normalizeSignature(signature.format, signature.blob)
  } catch (error) {
    throw new SigningError(context, error)
  }

  return normalized
}

/**
 * Signs HTTP requests with a key held by an SSH agent.
 *
 * Instances only come from {@link AgentSigner.create}, which resolves the key
 * and proves it can sign before returning, so every signer it hands out is
 * ready to use.
 */
export class AgentSigner {
  readonly #agent: KeyAgent
  readonly #key: AgentKey
  readonly #fingerprint: string
  readonly #formattedFingerprint: string
  readonly #algorithm: string
  readonly account: string
  readonly keyId: string

  private constructor(state: SignerState) {
    this.#agent = state.agent
    this.#key = state.key
    this.#fingerprint = state.fingerprint
    this.#formattedFingerprint = state.formattedFingerprint
    this.#algorithm = state.algorithm
    this.account = state.account
    this.keyId = state.keyId
  }

  static async create(options: AgentSignerOptions): Promise<AgentSigner> {
    if (options.agent) return AgentSigner.#build(options.agent, options)

    const client = await connectAgent({ env: options.env })
    try {
      return await AgentSigner.#build(client, options)
    } catch (error) {
      client.close()
      throw error
    }
  }

  static async #build(agent: KeyAgent, options: AgentSignerOptions): Promise<AgentSigner> {
    const key = await matchKey(agent, options.fingerprint)

    const formattedFingerprint = formatFingerprint(key.blob)
    const keyId = `/${options.account}/keys/${formattedFingerprint}`

    const probe = await signWithAgent(agent, key, PROBE_PAYLOAD, 'Cannot sign using SSH agent')
    debug('signer', 'probe signature ok', { keyId, algorithm: probe.algorithm }, options.env)

    return new AgentSigner({
      agent,
      key,
      account: options.account,
      fingerprint: options.fingerprint,
      formattedFingerprint,
      keyId,
      algorithm: probe.algorithm,
    })
  }

  /** Fingerprint as given to {@link AgentSigner.create}. */
  get requestedFingerprint() {
    return this.#fingerprint
  }

  get keyType() {
    return this.#key.type
  }

  keyFingerprint() {
    return this.#formattedFingerprint
  }

  defaultAlgorithm() {
    return this.#algorithm
  }

  /** Returns the `Authorization` parameters for a request carrying `Date: <dateHeader>`. */
  async sign(dateHeader: string) {
    const { signature, algorithm } = await signWithAgent(
      this.#agent,
      this.#key,
      signingString(SIGNED_HEADER, dateHeader),
      'Error signing date header',
    )

    return formatAuthorizationHeader({
      keyId: this.keyId,
      algorithm,
      headers: SIGNED_HEADER,
      signature,
    })
  }

  async signRaw(payload: string) {
    return signWithAgent(this.#agent, this.#key, payload, 'Error signing string')
  }
}

export type RequestHeaders = {
  date: string
  authorization: string
}

/** Signs an already formatted `Date` value and pairs it with its `Authorization` header. */
export async function signedRequestHeaders(signer: AgentSigner, date: string): Promise<RequestHeaders> {
  const parameters = await signer.sign(date)
  return {
    date,
    authorization: `${AUTHORIZATION_SCHEME} ${parameters}`,
  }
}

export async function authorizationHeaders(signer: AgentSigner, now: Date = new Date()): Promise<RequestHeaders> {
  return signedRequestHeaders(signer, formatHttpDate(now))
}
