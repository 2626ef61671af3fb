export function utf8Bytes(value: string) {
  return new Uint8Array(Buffer.from(value, 'utf8'))
}

export function toBase64(bytes: Uint8Array) {
  return Buffer.from(bytes).toString('base64')
}

export function toRawBase64(bytes: Uint8Array) {
  return toBase64(bytes).replace(/=+$/g, '')
}

export function hexToBase64(hex: string) {
  return Buffer.from(hex, 'hex').toString('base64')
}

/** Splits `value` into two-character groups joined by `separator`; an odd tail stays a single character. */
export function groupPairs(value: string, separator = ':') {
  const groups: string[] = []
  for (let index = 0; index < value.length; index += 2) {
    groups.push(value.slice(index, index + 2))
  }
  return groups.join(separator)
}

export function formatHttpDate(date: Date) {
  return date.toUTCString()
}
