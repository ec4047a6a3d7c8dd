import { createHash, timingSafeEqual } from 'node:crypto'
import type { ClientCredentials } from './types/client.ts'

const SHA256_HEX_PATTERN = /^[a-f0-9]{64}$/

/**
 * Hash a client secret for storage (SHA-256, hex).
 */
export const hashClientSecret = (secret: string): string =>
  createHash('sha256').update(secret, 'utf8').digest('hex')

export const isClientSecretHash = (value: string): boolean =>
  SHA256_HEX_PATTERN.test(value)

/**
 * Verify a presented client secret against a stored hash in constant time.
 */
export const verifyClientSecret = (
  secret: string,
  storedHash: string,
): boolean => {
  if (!isClientSecretHash(storedHash)) {
    return false
  }
  const computed = createHash('sha256').update(secret, 'utf8').digest()
  const expected = Buffer.from(storedHash, 'hex')
  return timingSafeEqual(computed, expected)
}

/**
 * client_secret_basic: `Authorization: Basic base64(urlencode(id):urlencode(secret))`
 * (RFC 6749 Section 2.3.1).
 */
export const extractClientCredentialsFromBasicAuthHeader = (
  authHeader: string | undefined,
): ClientCredentials | null => {
  if (!authHeader?.startsWith('Basic ')) {
    return null
  }

  const decoded = Buffer.from(authHeader.slice(6).trim(), 'base64').toString(
    'utf8',
  )
  const colonIndex = decoded.indexOf(':')
  if (colonIndex <= 0) {
    return null
  }

  try {
    const clientId = decodeURIComponent(decoded.slice(0, colonIndex))
    const clientSecret = decodeURIComponent(decoded.slice(colonIndex + 1))
    return clientSecret ? { clientId, clientSecret } : null
  } catch {
    // Malformed percent-encoding
    return null
  }
}
