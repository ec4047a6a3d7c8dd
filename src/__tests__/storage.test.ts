import { afterEach, describe, expect, it, vi } from 'vitest'
import * as clientModule from '../database/client.ts'
import * as schemaModule from '../database/schema.ts'
import type { OAuthConfig } from '../oauth/types/oauth-config.ts'
import { createStores } from '../storage.ts'

vi.mock('../database/client.ts', () => ({
  initializeDatabase: vi.fn(),
  shutdownDatabase: vi.fn(),
}))

vi.mock('../database/schema.ts', () => ({
  ensureSchema: vi.fn(),
}))

const baseConfig: OAuthConfig = {
  port: 3000,
  storage: 'memory',
  clientsFile: 'config/clients.json',
  usersFile: 'config/users.json',
  authorizationCodeTtlSeconds: 600,
  accessTokenTtlSeconds: 3600,
  refreshTokenTtlSeconds: 2592000,
  issueRefreshTokens: true,
  requestTimeoutMs: 5000,
}

describe('createStores', () => {
  afterEach(() => {
    vi.clearAllMocks()
  })

  it('should build in-memory stores without touching the database', async () => {
    const stores = await createStores(baseConfig)

    const code = await stores.codes.issue({
      client_id: 'demo-client',
      user_id: 'user-1',
      redirect_uri: 'http://a.com/cb',
      scopes: ['read'],
    })
    expect(await stores.codes.consumeIfValid(code)).not.toBeNull()
    expect(await stores.checkHealth()).toEqual({
      isHealthy: true,
      message: 'In-memory storage',
    })
    expect(clientModule.initializeDatabase).not.toHaveBeenCalled()
  })

  it('should connect and apply the schema for scylla storage', async () => {
    const execute = vi.fn().mockResolvedValue({ rows: [] })
    vi.mocked(clientModule.initializeDatabase).mockResolvedValue({
      execute,
    } as never)

    const stores = await createStores({ ...baseConfig, storage: 'scylla' })
    await stores.codes.consumeIfValid('missing-code')
    await stores.close()

    expect(schemaModule.ensureSchema).toHaveBeenCalledTimes(1)
    expect(execute.mock.calls[0][0]).toContain(
      'SELECT * FROM authcode.authorization_codes',
    )
    expect(clientModule.shutdownDatabase).toHaveBeenCalledTimes(1)
  })
})
