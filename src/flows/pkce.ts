import { createHash, randomBytes, timingSafeEqual } from 'node:crypto'

// RFC 7636 Section 4.1: unreserved characters, 43-128 long
const CODE_VERIFIER_PATTERN = /^[A-Za-z0-9\-._~]{43,128}$/
const CODE_CHALLENGE_PATTERN = /^[A-Za-z0-9_-]{43,128}$/

export const isValidCodeVerifier = (verifier: string): boolean =>
  CODE_VERIFIER_PATTERN.test(verifier)

export const isValidCodeChallenge = (challenge: string): boolean =>
  CODE_CHALLENGE_PATTERN.test(challenge)

/**
 * Generate a code_verifier: 32 random bytes, base64url (43 characters).
 */
export const generateCodeVerifier = (): string =>
  randomBytes(32).toString('base64url')

/**
 * S256 code_challenge: base64url(SHA-256(verifier)) without padding.
 */
export const generateCodeChallenge = (codeVerifier: string): string =>
  createHash('sha256').update(codeVerifier, 'ascii').digest('base64url')

/**
 * Verify a presented code_verifier against the stored S256 code_challenge.
 * The comparison is constant-time; malformed verifiers never match.
 */
export const verifyCodeVerifier = (
  codeChallenge: string,
  codeVerifier: string,
): boolean => {
  if (!isValidCodeVerifier(codeVerifier)) {
    return false
  }

  const computed = Buffer.from(generateCodeChallenge(codeVerifier), 'ascii')
  const expected = Buffer.from(codeChallenge, 'ascii')
  if (computed.length !== expected.length) {
    return false
  }

  return timingSafeEqual(computed, expected)
}
