import 'dotenv/config'
import { serve } from '@hono/node-server'
import { createApp } from './app.ts'
import { loadClientRegistry } from './clients/registry.ts'
import { getOAuthConfig } from './oauth/config.ts'
import { log } from './plumbing/logger.ts'
import { createStores } from './storage.ts'
import { createTokenIssuer } from './tokens/token-issuer.ts'
import { loadCredentialStore } from './users/credential-store.ts'

const main = async (): Promise<void> => {
  const config = getOAuthConfig()
  const clients = await loadClientRegistry(config.clientsFile)
  const credentials = await loadCredentialStore(config.usersFile)
  const stores = await createStores(config)

  const app = createApp({
    clients,
    credentials,
    codes: stores.codes,
    tokens: stores.tokens,
    issuer: createTokenIssuer({
      tokenStore: stores.tokens,
      accessTokenTtlSeconds: config.accessTokenTtlSeconds,
      refreshTokenTtlSeconds: config.refreshTokenTtlSeconds,
      issueRefreshTokens: config.issueRefreshTokens,
    }),
    requestTimeoutMs: config.requestTimeoutMs,
    checkHealth: stores.checkHealth,
  })

  const server = serve({ fetch: app.fetch, port: config.port }, (address) => {
    log({
      message: 'Authorization server listening',
      url: `http://localhost:${address.port}`,
      storage: config.storage,
    })
  })

  const shutdown = (signal: string): void => {
    log({ message: 'Shutting down', signal })
    server.close()
    stores.close().then(
      () => process.exit(0),
      (error: unknown) => {
        log({
          message: 'Error closing storage',
          error: error instanceof Error ? error.message : String(error),
        })
        process.exit(1)
      },
    )
  }

  process.on('SIGINT', () => shutdown('SIGINT'))
  process.on('SIGTERM', () => shutdown('SIGTERM'))
}

main().catch((error: unknown) => {
  log({
    message: 'Failed to start authorization server',
    error: error instanceof Error ? error.message : String(error),
  })
  process.exit(1)
})
