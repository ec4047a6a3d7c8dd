import { randomBytes } from 'node:crypto'
import {
  DEFAULT_ACCESS_TOKEN_TTL_SECONDS,
  DEFAULT_REFRESH_TOKEN_TTL_SECONDS,
} from '../oauth/config.ts'
import type { TokenStore } from './token-storage.ts'

export interface TokenResponse {
  access_token: string
  token_type: 'bearer'
  expires_in: number
  scope: string
  refresh_token?: string
}

export interface TokenGrant {
  clientId: string
  userId: string
  scopes: string[]
}

export interface TokenIssuer {
  issue: (grant: TokenGrant) => Promise<TokenResponse>
}

export const generateOpaqueToken = (): string =>
  randomBytes(32).toString('base64url')

/**
 * Mint an opaque bearer token (and optionally a refresh token) and record
 * them in the token store so /userinfo and the refresh grant can find them.
 */
export const createTokenIssuer = (options: {
  tokenStore: TokenStore
  accessTokenTtlSeconds?: number
  refreshTokenTtlSeconds?: number
  issueRefreshTokens?: boolean
}): TokenIssuer => {
  const { tokenStore } = options
  const accessTokenTtlSeconds =
    options.accessTokenTtlSeconds ?? DEFAULT_ACCESS_TOKEN_TTL_SECONDS
  const refreshTokenTtlSeconds =
    options.refreshTokenTtlSeconds ?? DEFAULT_REFRESH_TOKEN_TTL_SECONDS
  const issueRefreshTokens = options.issueRefreshTokens ?? true

  return {
    issue: async ({ clientId, userId, scopes }) => {
      const now = new Date()
      const accessToken = generateOpaqueToken()

      await tokenStore.saveAccessToken({
        token: accessToken,
        client_id: clientId,
        user_id: userId,
        scopes: [...scopes],
        expires_at: new Date(now.getTime() + accessTokenTtlSeconds * 1000),
        created_at: now,
      })

      const response: TokenResponse = {
        access_token: accessToken,
        token_type: 'bearer',
        expires_in: accessTokenTtlSeconds,
        scope: scopes.join(' '),
      }

      if (issueRefreshTokens) {
        const refreshToken = generateOpaqueToken()
        await tokenStore.saveRefreshToken({
          token: refreshToken,
          client_id: clientId,
          user_id: userId,
          scopes: [...scopes],
          expires_at: new Date(now.getTime() + refreshTokenTtlSeconds * 1000),
          created_at: now,
        })
        response.refresh_token = refreshToken
      }

      return response
    },
  }
}
