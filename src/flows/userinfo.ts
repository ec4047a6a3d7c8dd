import type { Context } from 'hono'
import type { TokenStore } from '../tokens/token-storage.ts'
import type { CredentialStore } from '../users/credential-store.ts'

export interface UserInfoClaims {
  sub: string
  username: string
  email: string
  scope: string
}

export interface UserInfoService {
  /** Null when the token is unknown or expired, or its user is gone */
  resolve: (accessToken: string) => Promise<UserInfoClaims | null>
}

export const createUserInfoService = (deps: {
  tokens: TokenStore
  credentials: CredentialStore
}): UserInfoService => ({
  resolve: async (accessToken) => {
    const record = await deps.tokens.findAccessToken(accessToken)
    if (!record) {
      return null
    }

    const user = await deps.credentials.findById(record.user_id)
    if (!user) {
      return null
    }

    return {
      sub: user.id,
      username: user.username,
      email: user.email,
      scope: record.scopes.join(' '),
    }
  },
})

/**
 * GET /oauth2/userinfo. Runs after requireAccessToken.
 */
export const handleUserInfo = (c: Context): Response =>
  c.json(c.get('userInfo'))
