import type {
  AccessTokenRecord,
  RefreshTokenRecord,
} from '../database/types/token.ts'
import { isExpired } from '../flows/authorization-code-storage.ts'

/**
 * Opaque token persistence. Access tokens are looked up many times until
 * they expire; refresh tokens are consumed once and rotated.
 */
export interface TokenStore {
  saveAccessToken: (record: AccessTokenRecord) => Promise<void>
  /** Unknown and expired tokens both read as null */
  findAccessToken: (token: string) => Promise<AccessTokenRecord | null>
  saveRefreshToken: (record: RefreshTokenRecord) => Promise<void>
  /** Atomic check-and-delete; a second call for the same token gets null */
  consumeRefreshToken: (token: string) => Promise<RefreshTokenRecord | null>
}

export interface InMemoryTokenStore extends TokenStore {
  /** Access plus refresh tokens held, including expired ones not yet pruned */
  size: () => number
}

const PRUNE_INTERVAL_MS = 60_000

export const createInMemoryTokenStore = (): InMemoryTokenStore => {
  const accessTokens = new Map<string, AccessTokenRecord>()
  const refreshTokens = new Map<string, RefreshTokenRecord>()
  let lastPrune = Date.now()

  const pruneExpired = (): void => {
    const now = Date.now()
    if (now - lastPrune < PRUNE_INTERVAL_MS) return
    lastPrune = now
    for (const tokens of [accessTokens, refreshTokens]) {
      for (const [token, record] of tokens.entries()) {
        if (isExpired(record, now)) {
          tokens.delete(token)
        }
      }
    }
  }

  return {
    saveAccessToken: async (record) => {
      pruneExpired()
      accessTokens.set(record.token, record)
    },

    findAccessToken: async (token) => {
      const record = accessTokens.get(token)
      if (!record) {
        return null
      }
      if (isExpired(record)) {
        accessTokens.delete(token)
        return null
      }
      return record
    },

    saveRefreshToken: async (record) => {
      pruneExpired()
      refreshTokens.set(record.token, record)
    },

    consumeRefreshToken: async (token) => {
      const record = refreshTokens.get(token)
      if (!record) {
        return null
      }
      refreshTokens.delete(token)

      return isExpired(record) ? null : record
    },

    size: () => accessTokens.size + refreshTokens.size,
  }
}
