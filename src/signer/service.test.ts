import { beforeAll, describe, expect, it } from 'vitest'

import { FakeKeyAgent, generateTestKey, md5Of, sha256Of, verifySignatureText, type TestKey } from '../../test/helpers/keys.js'
import { SignFlags } from '../agent/client.js'
import { groupPairs } from '../lib/encoding.js'
import {
  AgentRequestError,
  ConfigError,
  KeyNotFoundError,
  SigningError,
  UnsupportedAlgorithmError,
} from '../lib/errors.js'
import { AgentSigner, authorizationHeaders, PROBE_PAYLOAD, signedRequestHeaders } from './service.js'

const DATE = 'Tue, 01 Jan 2019 00:00:00 GMT'

function signatureOf(header: string) {
  const match = /signature="([^"]+)"$/.exec(header)
  if (!match?.[1]) throw new Error(`No signature in ${header}`)
  return match[1]
}

describe('AgentSigner', () => {
  let rsa: TestKey
  let ecdsa: TestKey
  let ed25519: TestKey

  beforeAll(() => {
    rsa = generateTestKey('rsa')
    ecdsa = generateTestKey('p384')
    ed25519 = generateTestKey('ed25519')
  })

  it('signs the date header with an RSA key found by its SHA256 fingerprint', async () => {
    const agent = new FakeKeyAgent([rsa])
    const fingerprint = `SHA256:${groupPairs(sha256Of(rsa.agentKey.blob))}`

    const signer = await AgentSigner.create({ fingerprint, account: 'acme', agent })
    const header = await signer.sign(DATE)

    expect(signer.keyFingerprint()).toBe(fingerprint)
    expect(signer.keyId).toBe(`/acme/keys/${fingerprint}`)
    expect(signer.defaultAlgorithm()).toBe('rsa-sha256')
    expect(header.startsWith(`keyId="/acme/keys/${fingerprint}",algorithm="rsa-sha256",headers="date",signature="`)).toBe(true)
    expect(verifySignatureText(rsa, 'sha256', `date: ${DATE}`, signatureOf(header))).toBe(true)
  })

  it('probes the agent once during construction and requests SHA-256 RSA signatures', async () => {
    const agent = new FakeKeyAgent([rsa])

    const signer = await AgentSigner.create({ fingerprint: md5Of(rsa.agentKey.blob), account: 'acme', agent })
    expect(agent.requests).toEqual([{ data: PROBE_PAYLOAD, flags: SignFlags.RSA_SHA2_256 }])

    await signer.sign(DATE)
    expect(agent.requests[1]).toEqual({ data: `date: ${DATE}`, flags: SignFlags.RSA_SHA2_256 })
  })

  it('returns the canonical SHA256 fingerprint even when matched by MD5', async () => {
    const agent = new FakeKeyAgent([rsa, ecdsa])

    const signer = await AgentSigner.create({ fingerprint: `MD5:${groupPairs(md5Of(ecdsa.agentKey.blob))}`, account: 'acme', agent })

    expect(signer.keyFingerprint()).toBe(`SHA256:${groupPairs(sha256Of(ecdsa.agentKey.blob))}`)
    expect(signer.defaultAlgorithm()).toBe('ecdsa-sha384')
    expect(signer.keyType).toBe('ecdsa-sha2-nistp384')
    expect(agent.requests[0]?.flags).toBe(0)
  })

  it('returns the bare signature from signRaw', async () => {
    const agent = new FakeKeyAgent([ecdsa])
    const signer = await AgentSigner.create({ fingerprint: md5Of(ecdsa.agentKey.blob), account: 'acme', agent })

    const { signature, algorithm } = await signer.signRaw('payload')

    expect(algorithm).toBe('ecdsa-sha384')
    expect(verifySignatureText(ecdsa, 'sha384', 'payload', signature)).toBe(true)
  })

  it('fails with ConfigError before dialing when SSH_AUTH_SOCK is unset', async () => {
    await expect(AgentSigner.create({ fingerprint: 'MD5:00', account: 'acme', env: {} })).rejects.toBeInstanceOf(ConfigError)
  })

  it('fails with KeyNotFoundError when the agent lacks the key', async () => {
    const agent = new FakeKeyAgent([rsa])

    await expect(
      AgentSigner.create({ fingerprint: `SHA256:${sha256Of(ecdsa.agentKey.blob)}`, account: 'acme', agent }),
    ).rejects.toBeInstanceOf(KeyNotFoundError)
    expect(agent.requests).toEqual([])
  })

  it('fails construction when the probe signature cannot be normalized', async () => {
    const agent = new FakeKeyAgent([ed25519])

    const error = await AgentSigner.create({ fingerprint: md5Of(ed25519.agentKey.blob), account: 'acme', agent }).catch(
      (caught: unknown) => caught,
    )

    expect(error).toBeInstanceOf(SigningError)
    expect(error).toMatchObject({
      message: 'Cannot sign using SSH agent: Unsupported algorithm from SSH agent: ssh-ed25519',
    })
    expect(error instanceof Error && error.cause).toBeInstanceOf(UnsupportedAlgorithmError)
  })

  it('wraps agent failures during sign in SigningError', async () => {
    const agent = new FakeKeyAgent([rsa])
    const signer = await AgentSigner.create({ fingerprint: md5Of(rsa.agentKey.blob), account: 'acme', agent })
    agent.signHook = async () => {
      throw new AgentRequestError('sign')
    }

    const error = await signer.sign(DATE).catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(SigningError)
    expect(error).toMatchObject({
      code: 'SIGNING_FAILED',
      message: 'Error signing date header: SSH agent refused sign request',
    })
  })

  it('keeps concurrent signatures apart', async () => {
    const agent = new FakeKeyAgent([rsa])
    const signer = await AgentSigner.create({ fingerprint: md5Of(rsa.agentKey.blob), account: 'acme', agent })
    const dates = ['Tue, 01 Jan 2019 00:00:00 GMT', 'Wed, 02 Jan 2019 00:00:00 GMT']

    const headers = await Promise.all(dates.map((date) => signer.sign(date)))

    headers.forEach((header, index) => {
      const signature = signatureOf(header)
      expect(verifySignatureText(rsa, 'sha256', `date: ${dates[index]}`, signature)).toBe(true)
      expect(verifySignatureText(rsa, 'sha256', `date: ${dates[1 - index]}`, signature)).toBe(false)
    })
  })

  it('builds Date and Authorization headers for a request', async () => {
    const agent = new FakeKeyAgent([rsa])
    const signer = await AgentSigner.create({ fingerprint: md5Of(rsa.agentKey.blob), account: 'acme', agent })

    const headers = await authorizationHeaders(signer, new Date(Date.UTC(2019, 0, 1)))

    expect(headers.date).toBe(DATE)
    expect(headers.authorization.startsWith(`Signature keyId="${signer.keyId}",algorithm="rsa-sha256",headers="date",signature="`)).toBe(true)
  })

  it('prefixes the signature scheme when signing a given Date value', async () => {
    const agent = new FakeKeyAgent([rsa])
    const signer = await AgentSigner.create({ fingerprint: md5Of(rsa.agentKey.blob), account: 'acme', agent })

    const headers = await signedRequestHeaders(signer, 'Wed, 02 Jan 2019 10:00:00 GMT')

    expect(headers.date).toBe('Wed, 02 Jan 2019 10:00:00 GMT')
    expect(headers.authorization.startsWith(`Signature keyId="${signer.keyId}",algorithm="rsa-sha256",headers="date",signature="`)).toBe(true)
    expect(agent.requests.at(-1)?.data).toBe('date: Wed, 02 Jan 2019 10:00:00 GMT')
  })
})
