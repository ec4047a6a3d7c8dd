import { afterEach, describe, expect, it, vi } from 'vitest'
import type { AuthorizationCodeInput } from '../../database/types/authorization-code.ts'
import {
  buildAuthorizationCode,
  createInMemoryAuthorizationCodeStore,
  generateAuthorizationCode,
  isExpired,
} from '../authorization-code-storage.ts'

const input: AuthorizationCodeInput = {
  client_id: 'demo-client',
  user_id: 'user-1',
  redirect_uri: 'http://localhost:3000/callback',
  scopes: ['read'],
}

describe('Authorization Code Storage', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  describe('generateAuthorizationCode', () => {
    it('should generate 43 base64url characters', () => {
      const code = generateAuthorizationCode()
      expect(code).toMatch(/^[A-Za-z0-9_-]{43}$/)
      expect(code).not.toBe(generateAuthorizationCode())
    })
  })

  describe('buildAuthorizationCode', () => {
    it('should set expiry from the TTL and no PKCE fields by default', () => {
      const now = new Date('2024-01-01T00:00:00.000Z')
      const record = buildAuthorizationCode('code-1', input, 600, now)

      expect(record).toEqual({
        code: 'code-1',
        client_id: 'demo-client',
        user_id: 'user-1',
        redirect_uri: 'http://localhost:3000/callback',
        scopes: ['read'],
        code_challenge: null,
        code_challenge_method: null,
        expires_at: new Date('2024-01-01T00:10:00.000Z'),
        created_at: now,
      })
    })

    it('should default the challenge method to S256', () => {
      const record = buildAuthorizationCode(
        'code-1',
        { ...input, code_challenge: 'challenge' },
        600,
      )
      expect(record.code_challenge).toBe('challenge')
      expect(record.code_challenge_method).toBe('S256')
    })
  })

  describe('isExpired', () => {
    it('should treat the expiry instant itself as expired', () => {
      const expiresAt = new Date('2024-01-01T00:10:00.000Z')
      expect(isExpired({ expires_at: expiresAt }, expiresAt.getTime())).toBe(
        true,
      )
      expect(
        isExpired({ expires_at: expiresAt }, expiresAt.getTime() - 1),
      ).toBe(false)
    })
  })

  describe('createInMemoryAuthorizationCodeStore', () => {
    it('should return the stored record on first consume', async () => {
      const store = createInMemoryAuthorizationCodeStore()
      const code = await store.issue({
        ...input,
        code_challenge: 'challenge',
        code_challenge_method: 'S256',
      })

      const record = await store.consumeIfValid(code)

      expect(record).toMatchObject({
        code,
        client_id: 'demo-client',
        user_id: 'user-1',
        redirect_uri: 'http://localhost:3000/callback',
        scopes: ['read'],
        code_challenge: 'challenge',
        code_challenge_method: 'S256',
      })
    })

    it('should return null on the second consume', async () => {
      const store = createInMemoryAuthorizationCodeStore()
      const code = await store.issue(input)

      expect(await store.consumeIfValid(code)).not.toBeNull()
      expect(await store.consumeIfValid(code)).toBeNull()
      expect(store.size()).toBe(0)
    })

    it('should return null for an unknown code', async () => {
      const store = createInMemoryAuthorizationCodeStore()
      expect(await store.consumeIfValid('unknown-code')).toBeNull()
    })

    it('should let exactly one of many concurrent consumers win', async () => {
      const store = createInMemoryAuthorizationCodeStore()
      const code = await store.issue(input)

      const results = await Promise.all(
        Array.from({ length: 50 }, () => store.consumeIfValid(code)),
      )

      expect(results.filter((r) => r !== null)).toHaveLength(1)
      expect(results.filter((r) => r === null)).toHaveLength(49)
    })

    it('should reject a code once its TTL has passed', async () => {
      vi.useFakeTimers({ toFake: ['Date'] })
      vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'))
      const store = createInMemoryAuthorizationCodeStore({ ttlSeconds: 600 })
      const code = await store.issue(input)

      vi.setSystemTime(new Date('2024-01-01T00:10:00.000Z'))

      expect(await store.consumeIfValid(code)).toBeNull()
    })

    it('should accept a code just before its TTL passes', async () => {
      vi.useFakeTimers({ toFake: ['Date'] })
      vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'))
      const store = createInMemoryAuthorizationCodeStore({ ttlSeconds: 600 })
      const code = await store.issue(input)

      vi.setSystemTime(new Date('2024-01-01T00:09:59.000Z'))

      expect(await store.consumeIfValid(code)).not.toBeNull()
    })

    it('should prune expired codes when issuing', async () => {
      vi.useFakeTimers({ toFake: ['Date'] })
      vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'))
      const store = createInMemoryAuthorizationCodeStore({ ttlSeconds: 60 })
      await store.issue(input)
      await store.issue(input)
      expect(store.size()).toBe(2)

      vi.setSystemTime(new Date('2024-01-01T00:05:00.000Z'))
      await store.issue(input)

      expect(store.size()).toBe(1)
    })
  })
})
