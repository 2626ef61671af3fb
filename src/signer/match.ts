import type { AgentKey, KeyAgent } from '../agent/types.js'
import { debug } from '../lib/debug.js'
import { AgentListError, KeyNotFoundError } from '../lib/errors.js'
import { md5Fingerprint, sha256Fingerprint, stripFingerprint } from './fingerprint.js'

/**
 * Picks the key whose MD5 or SHA-256 fingerprint equals `fingerprint`.
 *
 * Every candidate is compared and the last match in list order is returned.
 * Distinct keys never share a fingerprint, so this only matters for agents
 * that list the same key twice.
 */
export function selectKey(keys: readonly AgentKey[], fingerprint: string): AgentKey {
  const target = stripFingerprint(fingerprint)

  let matchingKey: AgentKey | undefined
  for (const key of keys) {
    if (target === md5Fingerprint(key.blob) || target === sha256Fingerprint(key.blob)) {
      matchingKey = key
    }
  }

  if (!matchingKey) {
    throw new KeyNotFoundError(fingerprint)
  }

  return matchingKey
}

export async function matchKey(agent: KeyAgent, fingerprint: string) {
  let keys: AgentKey[]
  try {
    keys = await agent.list()
  } catch (error) {
    throw new AgentListError('Error listing keys in SSH agent', error)
  }

  debug('match', 'listed keys', { count: keys.length })
  const key = selectKey(keys, fingerprint)
  debug('match', 'matched key', { type: key.type, comment: key.comment })
  return key
}
