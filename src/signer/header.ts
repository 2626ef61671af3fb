export const SIGNED_HEADER = 'date'
export const AUTHORIZATION_SCHEME = 'Signature'

export type AuthorizationParams = {
  keyId: string
  algorithm: string
  headers: string
  signature: string
}

/** Field order and quoting are fixed; the API verifies the value byte for byte. */
export function formatAuthorizationHeader({ keyId, algorithm, headers, signature }: AuthorizationParams) {
  return `keyId="${keyId}",algorithm="${algorithm}",headers="${headers}",signature="${signature}"`
}

export function signingString(headerName: string, value: string) {
  return `${headerName}: ${value}`
}
