export type StorageBackend = 'memory' | 'scylla'

export interface OAuthConfig {
  port: number
  storage: StorageBackend
  clientsFile: string
  usersFile: string
  authorizationCodeTtlSeconds: number
  accessTokenTtlSeconds: number
  refreshTokenTtlSeconds: number
  issueRefreshTokens: boolean
  requestTimeoutMs: number
}
