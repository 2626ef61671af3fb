import { bytesToNumberBE } from '@noble/curves/abstract/utils'

import { utf8Bytes } from '../lib/encoding.js'
import { WireFormatError } from '../lib/errors.js'

/** Largest agent message OpenSSH accepts. */
export const MAX_FRAME_LENGTH = 256 * 1024

export type Frame = {
  type: number
  payload: Uint8Array
}

export class WireReader {
  #offset = 0

  constructor(private readonly bytes: Uint8Array) {}

  get remaining() {
    return this.bytes.length - this.#offset
  }

  #take(length: number) {
    if (length > this.remaining) {
      throw new WireFormatError('Unexpected end of SSH wire data.', {
        needed: length,
        remaining: this.remaining,
      })
    }

    const slice = this.bytes.subarray(this.#offset, this.#offset + length)
    this.#offset += length
    return slice
  }

  readByte() {
    const [value = 0] = this.#take(1)
    return value
  }

  readUint32() {
    const slice = this.#take(4)
    return new DataView(slice.buffer, slice.byteOffset, 4).getUint32(0)
  }

  readString() {
    return this.#take(this.readUint32())
  }

  readText() {
    return Buffer.from(this.readString()).toString('utf8')
  }

  readMpint() {
    const bytes = this.readString()
    if (bytes.length === 0) return 0n

    const magnitude = bytesToNumberBE(bytes)
    const [first = 0] = bytes
    if ((first & 0x80) === 0) return magnitude

    return magnitude - (1n << BigInt(bytes.length * 8))
  }

  assertEnd() {
    if (this.remaining === 0) return

    throw new WireFormatError('Unexpected trailing SSH wire data.', {
      remaining: this.remaining,
    })
  }
}

export class WireWriter {
  readonly #chunks: Uint8Array[] = []

  writeByte(value: number) {
    this.#chunks.push(Uint8Array.of(value & 0xff))
    return this
  }

  writeUint32(value: number) {
    const chunk = new Uint8Array(4)
    new DataView(chunk.buffer).setUint32(0, value)
    this.#chunks.push(chunk)
    return this
  }

  writeBytes(bytes: Uint8Array) {
    this.#chunks.push(bytes)
    return this
  }

  writeString(value: Uint8Array | string) {
    const bytes = typeof value === 'string' ? utf8Bytes(value) : value
    return this.writeUint32(bytes.length).writeBytes(bytes)
  }

  writeMpint(value: bigint) {
    if (value < 0n) {
      throw new WireFormatError('Negative mpint values are not supported.')
    }

    if (value === 0n) return this.writeString(new Uint8Array(0))

    let hex = value.toString(16)
    if (hex.length % 2 !== 0) hex = `0${hex}`
    if (Number.parseInt(hex.slice(0, 2), 16) & 0x80) hex = `00${hex}`

    return this.writeString(new Uint8Array(Buffer.from(hex, 'hex')))
  }

  toBytes() {
    return new Uint8Array(Buffer.concat(this.#chunks))
  }
}

export function encodeFrame(type: number, payload: Uint8Array) {
  return new WireWriter().writeUint32(payload.length + 1).writeByte(type).writeBytes(payload).toBytes()
}

/**
 * Splits complete frames off the front of `buffer`. Returns the frames and the
 * unconsumed tail, which holds at most one partial frame.
 */
export function decodeFrames(buffer: Uint8Array): { frames: Frame[]; rest: Uint8Array } {
  const frames: Frame[] = []
  let offset = 0

  while (buffer.length - offset >= 4) {
    const length = new DataView(buffer.buffer, buffer.byteOffset + offset, 4).getUint32(0)
    if (length === 0 || length > MAX_FRAME_LENGTH) {
      throw new WireFormatError('SSH agent frame length out of range.', { length })
    }

    if (buffer.length - offset - 4 < length) break

    const body = buffer.subarray(offset + 4, offset + 4 + length)
    const [type = 0] = body
    frames.push({ type, payload: body.subarray(1) })
    offset += 4 + length
  }

  return { frames, rest: buffer.subarray(offset) }
}
