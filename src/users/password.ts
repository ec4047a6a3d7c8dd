import { scrypt, timingSafeEqual } from 'node:crypto'
import { nanoid } from 'nanoid'

const KEY_LENGTH = 64

export interface PasswordHash {
  hash: string
  salt: string
}

const deriveKey = (password: string, salt: string): Promise<Buffer> =>
  new Promise((resolve, reject) => {
    scrypt(password, salt, KEY_LENGTH, (err, derivedKey) => {
      if (err) {
        reject(err)
        return
      }
      resolve(derivedKey)
    })
  })

/**
 * Hash a password with scrypt and a nanoid salt.
 */
export const hashPassword = async (password: string): Promise<PasswordHash> => {
  const salt = nanoid()
  const derived = await deriveKey(password, salt)
  return { hash: derived.toString('hex'), salt }
}

/**
 * Verify a password against a stored scrypt hash and salt (timing-safe).
 */
export const verifyPassword = async (
  password: string,
  hash: string,
  salt: string,
): Promise<boolean> => {
  const expected = Buffer.from(hash, 'hex')
  const derived = await deriveKey(password, salt)

  if (expected.length !== derived.length) {
    return false
  }

  return timingSafeEqual(expected, derived)
}
