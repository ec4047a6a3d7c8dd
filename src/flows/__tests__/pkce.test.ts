import { describe, expect, it } from 'vitest'
import {
  generateCodeChallenge,
  generateCodeVerifier,
  isValidCodeChallenge,
  isValidCodeVerifier,
  verifyCodeVerifier,
} from '../pkce.ts'

// RFC 7636 Appendix B
const RFC_VERIFIER = 'dBjftJeZ4CVP-mB92K27uhbUJU1p1r_wW1gFWFOEjXk'
const RFC_CHALLENGE = 'E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM'

describe('PKCE', () => {
  describe('generateCodeVerifier', () => {
    it('should generate a 43 character base64url string', () => {
      const verifier = generateCodeVerifier()
      expect(verifier).toHaveLength(43)
      expect(verifier).toMatch(/^[A-Za-z0-9_-]+$/)
      expect(isValidCodeVerifier(verifier)).toBe(true)
    })

    it('should generate unique values', () => {
      expect(generateCodeVerifier()).not.toBe(generateCodeVerifier())
    })
  })

  describe('generateCodeChallenge', () => {
    it('should compute the S256 challenge', () => {
      expect(generateCodeChallenge(RFC_VERIFIER)).toBe(RFC_CHALLENGE)
    })
  })

  describe('isValidCodeVerifier', () => {
    it('should accept unreserved characters at 43 and 128 characters', () => {
      expect(isValidCodeVerifier('a'.repeat(43))).toBe(true)
      expect(isValidCodeVerifier('-._~'.repeat(32))).toBe(true)
    })

    it('should reject verifiers that are too short or too long', () => {
      expect(isValidCodeVerifier('a'.repeat(42))).toBe(false)
      expect(isValidCodeVerifier('a'.repeat(129))).toBe(false)
    })

    it('should reject characters outside the unreserved set', () => {
      expect(isValidCodeVerifier(`${'a'.repeat(42)}+`)).toBe(false)
      expect(isValidCodeVerifier(`${'a'.repeat(42)} `)).toBe(false)
    })
  })

  describe('isValidCodeChallenge', () => {
    it('should accept a base64url SHA-256 digest', () => {
      expect(isValidCodeChallenge(RFC_CHALLENGE)).toBe(true)
    })

    it('should reject padded or short challenges', () => {
      expect(isValidCodeChallenge(`${RFC_CHALLENGE}=`)).toBe(false)
      expect(isValidCodeChallenge('abc')).toBe(false)
    })
  })

  describe('verifyCodeVerifier', () => {
    it('should verify a matching verifier', () => {
      expect(verifyCodeVerifier(RFC_CHALLENGE, RFC_VERIFIER)).toBe(true)
    })

    it('should round-trip a generated verifier', () => {
      const verifier = generateCodeVerifier()
      expect(
        verifyCodeVerifier(generateCodeChallenge(verifier), verifier),
      ).toBe(true)
    })

    it('should reject a different verifier', () => {
      expect(verifyCodeVerifier(RFC_CHALLENGE, generateCodeVerifier())).toBe(
        false,
      )
    })

    it('should reject a malformed verifier even if its hash matches', () => {
      const shortVerifier = 'test-verifier-123'
      expect(
        verifyCodeVerifier(generateCodeChallenge(shortVerifier), shortVerifier),
      ).toBe(false)
    })

    it('should reject a challenge of a different length', () => {
      expect(verifyCodeVerifier('short', RFC_VERIFIER)).toBe(false)
    })
  })
})
