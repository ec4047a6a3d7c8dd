import { randomBytes } from 'node:crypto'
import { DEFAULT_CODE_TTL_SECONDS } from '../oauth/config.ts'
import type {
  AuthorizationCode,
  AuthorizationCodeInput,
} from '../database/types/authorization-code.ts'

/**
 * Expiring, single-use store for issued authorization codes.
 *
 * `consumeIfValid` is an atomic check-and-delete: among any number of
 * concurrent calls for the same code exactly one receives the record, and the
 * code is gone afterwards whether or not the caller's later checks pass.
 * Unknown, expired and already-consumed codes all yield `null`.
 */
export interface AuthorizationCodeStore {
  issue: (input: AuthorizationCodeInput) => Promise<string>
  consumeIfValid: (code: string) => Promise<AuthorizationCode | null>
}

export interface InMemoryAuthorizationCodeStore extends AuthorizationCodeStore {
  /** Number of codes held, including expired ones not yet pruned */
  size: () => number
}

const PRUNE_INTERVAL_MS = 60_000

/**
 * 32 random bytes, base64url encoded (43 characters, 256 bits of entropy).
 */
export const generateAuthorizationCode = (): string =>
  randomBytes(32).toString('base64url')

export const buildAuthorizationCode = (
  code: string,
  input: AuthorizationCodeInput,
  ttlSeconds: number,
  now = new Date(),
): AuthorizationCode => ({
  code,
  client_id: input.client_id,
  user_id: input.user_id,
  redirect_uri: input.redirect_uri,
  scopes: [...input.scopes],
  code_challenge: input.code_challenge ?? null,
  code_challenge_method: input.code_challenge
    ? (input.code_challenge_method ?? 'S256')
    : null,
  expires_at: new Date(now.getTime() + ttlSeconds * 1000),
  created_at: now,
})

export const isExpired = (record: { expires_at: Date }, now = Date.now()) =>
  record.expires_at.getTime() <= now

export const createInMemoryAuthorizationCodeStore = (
  options: { ttlSeconds?: number } = {},
): InMemoryAuthorizationCodeStore => {
  const ttlSeconds = options.ttlSeconds ?? DEFAULT_CODE_TTL_SECONDS
  const codes = new Map<string, AuthorizationCode>()
  let lastPrune = Date.now()

  const pruneExpired = (now: number): void => {
    if (now - lastPrune < PRUNE_INTERVAL_MS) return
    lastPrune = now
    for (const [code, record] of codes.entries()) {
      if (isExpired(record, now)) {
        codes.delete(code)
      }
    }
  }

  return {
    issue: async (input) => {
      const now = new Date()
      pruneExpired(now.getTime())

      const code = generateAuthorizationCode()
      codes.set(code, buildAuthorizationCode(code, input, ttlSeconds, now))
      return code
    },

    consumeIfValid: async (code) => {
      // get + delete with no await in between: the first caller wins
      const record = codes.get(code)
      if (!record) {
        return null
      }
      codes.delete(code)

      return isExpired(record) ? null : record
    },

    size: () => codes.size,
  }
}
