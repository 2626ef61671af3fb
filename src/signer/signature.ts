import { DER } from '@noble/curves/abstract/weierstrass'

import { WireReader } from '../agent/wire.js'
import { hexToBase64, toBase64 } from '../lib/encoding.js'
import { SignatureDecodeError, UnsupportedAlgorithmError } from '../lib/errors.js'

export type SignatureFamily = 'rsa' | 'ecdsa'
export type HashAlgorithm = 'sha1' | 'sha256' | 'sha384' | 'sha512'

export type HttpAuthSignature =
  | { family: 'rsa'; hashAlgorithm: HashAlgorithm; bytes: Uint8Array }
  | { family: 'ecdsa'; hashAlgorithm: HashAlgorithm; r: bigint; s: bigint }

export type NormalizedSignature = {
  signature: string
  algorithm: string
}

const RSA_FORMATS = new Map<string, HashAlgorithm>([
  ['ssh-rsa', 'sha1'],
  ['rsa-sha2-256', 'sha256'],
  ['rsa-sha2-512', 'sha512'],
])

// Curve size in bits per ECDSA signature format.
const ECDSA_FORMATS = new Map<string, number>([
  ['ecdsa-sha2-nistp256', 256],
  ['ecdsa-sha2-nistp384', 384],
  ['ecdsa-sha2-nistp521', 521],
])

export type SignatureFormat =
  | { family: 'rsa'; hashAlgorithm: HashAlgorithm }
  | { family: 'ecdsa'; curveBits: number }

export function lookupSignatureFormat(format: string): SignatureFormat {
  const hashAlgorithm = RSA_FORMATS.get(format)
  if (hashAlgorithm) return { family: 'rsa', hashAlgorithm }
  const curveBits = ECDSA_FORMATS.get(format)
  if (curveBits) return { family: 'ecdsa', curveBits }
  throw new UnsupportedAlgorithmError(format)
}

export function signatureFamily(format: string): SignatureFamily {
  return lookupSignatureFormat(format).family
}

function ecdsaHashForCurve(bits: number): HashAlgorithm {
  if (bits <= 256) return 'sha256'
  if (bits <= 384) return 'sha384'
  return 'sha512'
}

function bitLength(value: bigint) {
  return value.toString(2).length
}

function decodeRsa(format: string, hashAlgorithm: HashAlgorithm, blob: Uint8Array): HttpAuthSignature {
  if (blob.length === 0) {
    throw new SignatureDecodeError('Empty RSA signature blob', { format })
  }
  return { family: 'rsa', hashAlgorithm, bytes: blob }
}

function decodeEcdsa(format: string, curveBits: number, blob: Uint8Array): HttpAuthSignature {
  let r: bigint
  let s: bigint
  try {
    const reader = new WireReader(blob)
    r = reader.readMpint()
    s = reader.readMpint()
    reader.assertEnd()
  } catch (error) {
    throw new SignatureDecodeError('Error reading ECDSA signature', { format }, error)
  }

  if (r <= 0n || s <= 0n) {
    throw new SignatureDecodeError('ECDSA signature components must be positive', { format })
  }

  const width = Math.max(bitLength(r), bitLength(s))
  if (width > curveBits) {
    throw new SignatureDecodeError(`Unsupported ECDSA signature size: ${width}`, { format, curveBits })
  }

  return { family: 'ecdsa', hashAlgorithm: ecdsaHashForCurve(curveBits), r, s }
}

export function decodeSignature(format: string, blob: Uint8Array): HttpAuthSignature {
  const known = lookupSignatureFormat(format)
  switch (known.family) {
    case 'rsa':
      return decodeRsa(format, known.hashAlgorithm, blob)
    case 'ecdsa':
      return decodeEcdsa(format, known.curveBits, blob)
  }
}

export function signatureType(signature: HttpAuthSignature) {
  return `${signature.family}-${signature.hashAlgorithm}`
}

/** RSA signatures render as base64 of the raw bytes, ECDSA as base64 of the DER `(r, s)` sequence. */
export function encodeSignature(signature: HttpAuthSignature) {
  switch (signature.family) {
    case 'rsa':
      return toBase64(signature.bytes)
    case 'ecdsa':
      return hexToBase64(DER.hexFromSig({ r: signature.r, s: signature.s }))
  }
}

export function normalizeSignature(format: string, blob: Uint8Array): NormalizedSignature {
  const decoded = decodeSignature(format, blob)
  return {
    signature: encodeSignature(decoded),
    algorithm: signatureType(decoded),
  }
}
