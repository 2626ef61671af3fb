import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'

import { AppError, ConfigError, describeError } from './errors.js'

export type SignerConfig = {
  version: 1
  account?: string
  fingerprint?: string
}

export type SignerIdentity = {
  account: string
  fingerprint: string
}

export const CONFIG_HOME_ENV = 'AGENT_HTTP_SIGNER_CONFIG_HOME'
export const ACCOUNT_ENV = 'AGENT_HTTP_SIGNER_ACCOUNT'
export const KEY_ID_ENV = 'AGENT_HTTP_SIGNER_KEY_ID'

const DEFAULT_CONFIG: SignerConfig = {
  version: 1,
}

function getConfigRoot(env: NodeJS.ProcessEnv) {
  const override = env[CONFIG_HOME_ENV]
  if (override) return override

  if (process.platform === 'darwin') {
    return path.join(os.homedir(), 'Library', 'Application Support')
  }

  if (process.platform === 'win32') {
    return env.APPDATA ?? path.join(os.homedir(), 'AppData', 'Roaming')
  }

  return env.XDG_CONFIG_HOME ?? path.join(os.homedir(), '.config')
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env) {
  return path.join(getConfigRoot(env), 'agent-http-signer', 'config.json')
}

function readOptionalString(value: unknown) {
  return typeof value === 'string' && value.length > 0 ? value : undefined
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SignerConfig {
  const configPath = getConfigPath(env)

  if (!fs.existsSync(configPath)) {
    return { ...DEFAULT_CONFIG }
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf8'))
  } catch (error) {
    throw new AppError('INVALID_CONFIG', 'Config file is not valid JSON.', {
      path: configPath,
      reason: describeError(error),
    })
  }

  if (typeof parsed !== 'object' || parsed === null) {
    throw new AppError('INVALID_CONFIG', 'Config file must contain a JSON object.', { path: configPath })
  }

  const account = readOptionalString(Reflect.get(parsed, 'account'))
  const fingerprint = readOptionalString(Reflect.get(parsed, 'fingerprint'))

  return {
    ...DEFAULT_CONFIG,
    ...(account ? { account } : {}),
    ...(fingerprint ? { fingerprint } : {}),
  }
}

export function saveConfig(config: SignerConfig, env: NodeJS.ProcessEnv = process.env) {
  const configPath = getConfigPath(env)
  fs.mkdirSync(path.dirname(configPath), { recursive: true })
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2) + '\n')
  return configPath
}

/** Flags win over the environment, which wins over the config file. */
export function resolveIdentity(
  config: SignerConfig,
  overrides: Partial<SignerIdentity>,
  env: NodeJS.ProcessEnv = process.env,
): SignerIdentity {
  const account = overrides.account || env[ACCOUNT_ENV] || config.account
  if (!account) {
    throw new ConfigError(`Account is not configured. Pass --account or set ${ACCOUNT_ENV}.`, {
      env: ACCOUNT_ENV,
    })
  }

  const fingerprint = overrides.fingerprint || env[KEY_ID_ENV] || config.fingerprint
  if (!fingerprint) {
    throw new ConfigError(`Key fingerprint is not configured. Pass --fingerprint or set ${KEY_ID_ENV}.`, {
      env: KEY_ID_ENV,
    })
  }

  return { account, fingerprint }
}
