import net from 'node:net'

import { debug } from '../lib/debug.js'
import { ConfigError, ConnectionError } from '../lib/errors.js'
import { AgentClient } from './client.js'

export const AGENT_SOCKET_ENV = 'SSH_AUTH_SOCK'

export function resolveAgentSocket(env: NodeJS.ProcessEnv = process.env) {
  const socketPath = env[AGENT_SOCKET_ENV]
  if (!socketPath) {
    throw new ConfigError(`${AGENT_SOCKET_ENV} is not set`, { env: AGENT_SOCKET_ENV })
  }
  return socketPath
}

export type ConnectAgentOptions = {
  env?: NodeJS.ProcessEnv
  /** Dial this socket instead of the one named by SSH_AUTH_SOCK. */
  socketPath?: string
}

export async function connectAgent(options: ConnectAgentOptions = {}) {
  const socketPath = options.socketPath ?? resolveAgentSocket(options.env)
  debug('agent', 'dialing', { socketPath }, options.env)

  const socket = await new Promise<net.Socket>((resolve, reject) => {
    const connection = net.createConnection({ path: socketPath })
    const onError = (error: Error) => {
      connection.destroy()
      reject(new ConnectionError('Error dialing SSH agent', error, { socketPath }))
    }
    connection.once('error', onError)
    connection.once('connect', () => {
      connection.off('error', onError)
      resolve(connection)
    })
  })

  debug('agent', 'connected', { socketPath }, options.env)
  return new AgentClient(socket)
}
