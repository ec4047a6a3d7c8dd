import { log } from '../plumbing/logger.ts'
import { parseBoolean, parseNumber } from '../plumbing/parse-env.ts'
import type { OAuthConfig, StorageBackend } from './types/oauth-config.ts'

export const DEFAULT_CODE_TTL_SECONDS = 10 * 60
export const DEFAULT_ACCESS_TOKEN_TTL_SECONDS = 60 * 60
export const DEFAULT_REFRESH_TOKEN_TTL_SECONDS = 30 * 24 * 60 * 60
export const DEFAULT_REQUEST_TIMEOUT_MS = 5_000

const STORAGE_BACKENDS: StorageBackend[] = ['memory', 'scylla']

let cachedConfig: OAuthConfig | null = null

const isStorageBackend = (value: string): value is StorageBackend =>
  STORAGE_BACKENDS.some((backend) => backend === value)

const validateConfig = (
  config: Omit<OAuthConfig, 'storage'> & { storage: string },
): string[] => {
  const errors: string[] = []

  if (!isStorageBackend(config.storage)) {
    errors.push(
      `OAUTH_STORAGE must be one of: ${STORAGE_BACKENDS.join(', ')} (got "${config.storage}")`,
    )
  }

  if (!config.clientsFile) {
    errors.push('OAUTH_CLIENTS_FILE must not be empty')
  }

  if (!config.usersFile) {
    errors.push('OAUTH_USERS_FILE must not be empty')
  }

  const positive: [string, number][] = [
    ['OAUTH_CODE_TTL_SECONDS', config.authorizationCodeTtlSeconds],
    ['OAUTH_ACCESS_TOKEN_TTL_SECONDS', config.accessTokenTtlSeconds],
    ['OAUTH_REFRESH_TOKEN_TTL_SECONDS', config.refreshTokenTtlSeconds],
    ['OAUTH_REQUEST_TIMEOUT_MS', config.requestTimeoutMs],
  ]
  for (const [name, value] of positive) {
    if (!Number.isInteger(value) || value <= 0) {
      errors.push(`${name} must be a positive integer`)
    }
  }

  return errors
}

export const getOAuthConfig = (): OAuthConfig => {
  if (cachedConfig) {
    return cachedConfig
  }

  const raw = {
    port: parseNumber(process.env.PORT, 3000),
    storage: process.env.OAUTH_STORAGE?.trim() || 'memory',
    clientsFile:
      process.env.OAUTH_CLIENTS_FILE?.trim() ?? 'config/clients.json',
    usersFile: process.env.OAUTH_USERS_FILE?.trim() ?? 'config/users.json',
    authorizationCodeTtlSeconds: parseNumber(
      process.env.OAUTH_CODE_TTL_SECONDS,
      DEFAULT_CODE_TTL_SECONDS,
    ),
    accessTokenTtlSeconds: parseNumber(
      process.env.OAUTH_ACCESS_TOKEN_TTL_SECONDS,
      DEFAULT_ACCESS_TOKEN_TTL_SECONDS,
    ),
    refreshTokenTtlSeconds: parseNumber(
      process.env.OAUTH_REFRESH_TOKEN_TTL_SECONDS,
      DEFAULT_REFRESH_TOKEN_TTL_SECONDS,
    ),
    issueRefreshTokens: parseBoolean(
      process.env.OAUTH_ISSUE_REFRESH_TOKENS,
      true,
    ),
    requestTimeoutMs: parseNumber(
      process.env.OAUTH_REQUEST_TIMEOUT_MS,
      DEFAULT_REQUEST_TIMEOUT_MS,
    ),
  }

  const errors = validateConfig(raw)
  if (errors.length > 0 || !isStorageBackend(raw.storage)) {
    throw new Error(
      `OAuth configuration validation failed:\n${errors.join('\n')}`,
    )
  }

  cachedConfig = { ...raw, storage: raw.storage }

  log({
    message: 'OAuth configuration validated and loaded',
    storage: cachedConfig.storage,
    authorizationCodeTtlSeconds: cachedConfig.authorizationCodeTtlSeconds,
  })

  return cachedConfig
}

export const clearConfigCache = (): void => {
  cachedConfig = null
}
