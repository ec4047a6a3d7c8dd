import { initializeDatabase, shutdownDatabase } from './database/client.ts'
import { getDatabaseConfig } from './database/config.ts'
import { checkDatabaseHealth, type HealthStatus } from './database/health.ts'
import { ensureSchema } from './database/schema.ts'
import {
  type AuthorizationCodeStore,
  createInMemoryAuthorizationCodeStore,
} from './flows/authorization-code-storage.ts'
import { createScyllaAuthorizationCodeStore } from './flows/scylla-authorization-code-storage.ts'
import type { OAuthConfig } from './oauth/types/oauth-config.ts'
import { createScyllaTokenStore } from './tokens/scylla-token-storage.ts'
import {
  createInMemoryTokenStore,
  type TokenStore,
} from './tokens/token-storage.ts'

export interface Stores {
  codes: AuthorizationCodeStore
  tokens: TokenStore
  checkHealth: () => Promise<HealthStatus>
  close: () => Promise<void>
}

export const createStores = async (config: OAuthConfig): Promise<Stores> => {
  if (config.storage === 'memory') {
    return {
      codes: createInMemoryAuthorizationCodeStore({
        ttlSeconds: config.authorizationCodeTtlSeconds,
      }),
      tokens: createInMemoryTokenStore(),
      checkHealth: async () => ({
        isHealthy: true,
        message: 'In-memory storage',
      }),
      close: async () => undefined,
    }
  }

  const databaseConfig = getDatabaseConfig()
  const client = await initializeDatabase(databaseConfig)
  await ensureSchema(client, databaseConfig)
  const { keyspace } = databaseConfig

  return {
    codes: createScyllaAuthorizationCodeStore({
      client,
      keyspace,
      ttlSeconds: config.authorizationCodeTtlSeconds,
    }),
    tokens: createScyllaTokenStore({ client, keyspace }),
    checkHealth: () => checkDatabaseHealth(client, keyspace),
    close: shutdownDatabase,
  }
}
