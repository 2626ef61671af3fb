import type { Socket } from 'node:net'

import { debug } from '../lib/debug.js'
import { AgentProtocolError, AgentRequestError, describeError } from '../lib/errors.js'
import type { AgentKey, AgentSignature, KeyAgent } from './types.js'
import { decodeFrames, encodeFrame, WireReader, WireWriter, type Frame } from './wire.js'

export const AgentMessage = {
  FAILURE: 5,
  SUCCESS: 6,
  REQUEST_IDENTITIES: 11,
  IDENTITIES_ANSWER: 12,
  SIGN_REQUEST: 13,
  SIGN_RESPONSE: 14,
} as const

export const SignFlags = {
  RSA_SHA2_256: 2,
  RSA_SHA2_512: 4,
} as const

type PendingRequest = {
  name: string
  resolve: (frame: Frame) => void
  reject: (error: Error) => void
}

export function readKeyType(blob: Uint8Array) {
  return new WireReader(blob).readText()
}

/**
 * SSH agent protocol client over one socket. The agent answers requests on a
 * connection in the order it received them, so replies are matched to pending
 * requests first-in first-out.
 */
export class AgentClient implements KeyAgent {
  readonly #socket: Socket
  readonly #pending: PendingRequest[] = []
  #buffer: Uint8Array = new Uint8Array(0)
  #closedError: Error | undefined

  constructor(socket: Socket) {
    this.#socket = socket
    socket.on('data', (chunk: Buffer) => this.#onData(chunk))
    socket.on('error', (error) => {
      this.#fail(new AgentProtocolError(`SSH agent connection failed: ${error.message}`))
    })
    socket.on('close', () => {
      this.#fail(new AgentProtocolError('SSH agent connection closed.'))
    })
    socket.unref()
  }

  async list(): Promise<AgentKey[]> {
    const frame = await this.#request('list', AgentMessage.REQUEST_IDENTITIES, new Uint8Array(0))
    if (frame.type !== AgentMessage.IDENTITIES_ANSWER) {
      throw unexpectedReply('list', frame.type)
    }

    const reader = new WireReader(frame.payload)
    const count = reader.readUint32()
    const keys: AgentKey[] = []
    for (let index = 0; index < count; index += 1) {
      const blob = reader.readString()
      const comment = reader.readText()
      keys.push({ type: readKeyType(blob), blob, comment })
    }
    reader.assertEnd()

    return keys
  }

  async sign(key: AgentKey, data: Uint8Array, flags = 0): Promise<AgentSignature> {
    const request = new WireWriter().writeString(key.blob).writeString(data).writeUint32(flags).toBytes()
    const frame = await this.#request('sign', AgentMessage.SIGN_REQUEST, request)
    if (frame.type !== AgentMessage.SIGN_RESPONSE) {
      throw unexpectedReply('sign', frame.type)
    }

    const outer = new WireReader(frame.payload)
    const signature = new WireReader(outer.readString())
    outer.assertEnd()

    const format = signature.readText()
    const blob = signature.readString()
    signature.assertEnd()

    return { format, blob }
  }

  close() {
    this.#socket.end()
  }

  #request(name: string, type: number, payload: Uint8Array) {
    return new Promise<Frame>((resolve, reject) => {
      if (this.#closedError) {
        reject(this.#closedError)
        return
      }

      this.#pending.push({ name, resolve, reject })
      this.#socket.ref()
      this.#socket.write(encodeFrame(type, payload))
    })
  }

  #onData(chunk: Buffer) {
    this.#buffer = this.#buffer.length === 0 ? chunk : Buffer.concat([this.#buffer, chunk])

    let frames: Frame[]
    try {
      const decoded = decodeFrames(this.#buffer)
      frames = decoded.frames
      this.#buffer = decoded.rest
    } catch (error) {
      this.#fail(new AgentProtocolError(`Invalid SSH agent reply: ${describeError(error)}`))
      this.#socket.destroy()
      return
    }

    for (const frame of frames) {
      const pending = this.#pending.shift()
      if (!pending) {
        this.#fail(new AgentProtocolError('SSH agent sent an unsolicited reply.', { type: frame.type }))
        this.#socket.destroy()
        return
      }

      if (frame.type === AgentMessage.FAILURE) {
        pending.reject(new AgentRequestError(pending.name))
      } else {
        pending.resolve(frame)
      }
    }

    if (this.#pending.length === 0) this.#socket.unref()
  }

  #fail(error: Error) {
    this.#closedError ??= error
    const pending = this.#pending.splice(0)
    if (pending.length > 0) {
      debug('agent', 'failing pending requests', { count: pending.length, reason: error.message })
    }
    for (const request of pending) request.reject(error)
    this.#socket.unref()
  }
}

function unexpectedReply(request: string, type: number) {
  return new AgentProtocolError(`Unexpected SSH agent reply to ${request} request.`, { type })
}
