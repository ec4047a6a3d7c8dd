import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import { nanoid } from 'nanoid'
import { log } from '../plumbing/logger.ts'
import { hashPassword, verifyPassword } from './password.ts'
import type { User, UserSeed, UserWithPassword } from './types/user.ts'

/**
 * End-user credential verification used by the consent step.
 * Unknown usernames and wrong passwords are indistinguishable to callers.
 */
export interface CredentialStore {
  authenticate: (username: string, password: string) => Promise<User | null>
  findById: (userId: string) => Promise<User | null>
}

const toUser = ({ id, username, email }: UserWithPassword): User => ({
  id,
  username,
  email,
})

export const createInMemoryCredentialStore = async (
  seeds: UserSeed[],
): Promise<CredentialStore> => {
  const byUsername = new Map<string, UserWithPassword>()
  const byId = new Map<string, UserWithPassword>()

  for (const seed of seeds) {
    const { hash, salt } = await hashPassword(seed.password)
    const user: UserWithPassword = {
      id: seed.id,
      username: seed.username,
      email: seed.email,
      passwordDigest: hash,
      passwordSalt: salt,
    }
    byUsername.set(user.username, user)
    byId.set(user.id, user)
  }

  // Unknown usernames are still checked against a throwaway hash
  const decoy = await hashPassword(nanoid())

  return {
    authenticate: async (username, password) => {
      const user = byUsername.get(username)
      if (!user) {
        await verifyPassword(password, decoy.hash, decoy.salt)
        return null
      }

      const isValid = await verifyPassword(
        password,
        user.passwordDigest,
        user.passwordSalt,
      )
      return isValid ? toUser(user) : null
    },
    findById: async (userId) => {
      const user = byId.get(userId)
      return user ? toUser(user) : null
    },
  }
}

const isUserSeed = (value: unknown): value is UserSeed => {
  if (typeof value !== 'object' || value === null) {
    return false
  }
  const fields: Record<string, unknown> = { ...value }
  return ['id', 'username', 'email', 'password'].every(
    (key) => typeof fields[key] === 'string' && fields[key] !== '',
  )
}

/**
 * Load seed users from a JSON file: `{ "users": [{ id, username, email, password }] }`.
 */
export const loadCredentialStore = async (
  filePath: string,
): Promise<CredentialStore> => {
  const absolutePath = resolve(process.cwd(), filePath)
  const parsed: unknown = JSON.parse(await readFile(absolutePath, 'utf8'))
  const entries =
    typeof parsed === 'object' && parsed !== null && 'users' in parsed
      ? parsed.users
      : parsed

  if (!Array.isArray(entries) || !entries.every(isUserSeed)) {
    throw new Error(
      `Invalid users file ${absolutePath}: expected a list of { id, username, email, password }`,
    )
  }

  const store = await createInMemoryCredentialStore(entries)
  log({
    message: 'Credential store loaded',
    path: absolutePath,
    userCount: entries.length,
  })
  return store
}
