import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest'
import {
  type CredentialStore,
  createInMemoryCredentialStore,
  loadCredentialStore,
} from '../credential-store.ts'

describe('Credential Store', () => {
  let store: CredentialStore

  beforeAll(async () => {
    store = await createInMemoryCredentialStore([
      {
        id: 'user-1',
        username: 'demo',
        email: 'demo@example.com',
        password: 'test-password',
      },
    ])
  })

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should authenticate a user with the right password', async () => {
    expect(await store.authenticate('demo', 'test-password')).toEqual({
      id: 'user-1',
      username: 'demo',
      email: 'demo@example.com',
    })
  })

  it('should return null for a wrong password', async () => {
    expect(await store.authenticate('demo', 'wrong-password')).toBeNull()
  })

  it('should return null for an unknown user', async () => {
    expect(await store.authenticate('nobody', 'test-password')).toBeNull()
  })

  it('should find users by id without exposing password fields', async () => {
    const user = await store.findById('user-1')
    expect(user).toEqual({
      id: 'user-1',
      username: 'demo',
      email: 'demo@example.com',
    })
    expect(await store.findById('user-2')).toBeNull()
  })

  describe('loadCredentialStore', () => {
    let directory: string

    beforeEach(async () => {
      directory = await mkdtemp(join(tmpdir(), 'credential-store-'))
    })

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true })
    })

    it('should load users from a JSON file', async () => {
      const filePath = join(directory, 'users.json')
      await writeFile(
        filePath,
        JSON.stringify({
          users: [
            {
              id: 'user-9',
              username: 'alice',
              email: 'alice@example.com',
              password: 'test-password',
            },
          ],
        }),
      )

      const loaded = await loadCredentialStore(filePath)
      expect((await loaded.authenticate('alice', 'test-password'))?.id).toBe(
        'user-9',
      )
    })

    it('should reject entries with missing fields', async () => {
      const filePath = join(directory, 'users.json')
      await writeFile(filePath, JSON.stringify([{ id: 'user-1' }]))

      await expect(loadCredentialStore(filePath)).rejects.toThrow(
        'expected a list of { id, username, email, password }',
      )
    })
  })
})
