import crypto from 'node:crypto'

import { groupPairs, toRawBase64 } from '../lib/encoding.js'

const FINGERPRINT_PREFIXES = ['MD5:', 'SHA256:'] as const

/**
 * Reduces a fingerprint in any accepted form (bare or `MD5:` hex, `SHA256:`
 * base64, with or without colons) to the bare digest text.
 */
export function stripFingerprint(fingerprint: string) {
  let stripped = fingerprint
  for (const prefix of FINGERPRINT_PREFIXES) {
    if (stripped.startsWith(prefix)) stripped = stripped.slice(prefix.length)
  }
  return stripped.replaceAll(':', '')
}

export function md5Fingerprint(blob: Uint8Array) {
  return crypto.createHash('md5').update(blob).digest('hex')
}

export function sha256Fingerprint(blob: Uint8Array) {
  return toRawBase64(crypto.createHash('sha256').update(blob).digest())
}

export function formatFingerprint(blob: Uint8Array) {
  return `SHA256:${groupPairs(sha256Fingerprint(blob))}`
}

export function formatMd5Fingerprint(blob: Uint8Array) {
  return `MD5:${groupPairs(md5Fingerprint(blob))}`
}
