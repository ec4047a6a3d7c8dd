import { Hono } from 'hono'
import { timeout } from 'hono/timeout'
import type { ClientRegistry } from '../clients/registry.ts'
import { requireAccessToken } from '../middleware/require-access-token.ts'
import type { TokenIssuer } from '../tokens/token-issuer.ts'
import type { TokenStore } from '../tokens/token-storage.ts'
import type { CredentialStore } from '../users/credential-store.ts'
import type { AuthorizationCodeStore } from './authorization-code-storage.ts'
import { createAuthorizationHandler } from './authorization.ts'
import { createApproveHandler, createConsentService } from './consent.ts'
import {
  createTokenExchangeHandler,
  createTokenRequestHandler,
} from './token.ts'
import { createUserInfoService, handleUserInfo } from './userinfo.ts'

export interface OAuthDependencies {
  clients: ClientRegistry
  credentials: CredentialStore
  codes: AuthorizationCodeStore
  tokens: TokenStore
  issuer: TokenIssuer
  requestTimeoutMs: number
}

/**
 * Store lookups get a share of the request deadline, so a hung store is
 * reported as a missing code before the request itself times out.
 */
export const storeDeadlineMs = (requestTimeoutMs: number): number =>
  Math.floor(requestTimeoutMs * 0.8)

/**
 * The /oauth2 endpoints, wired against injected stores. Every request runs
 * under a deadline; a request that overruns it gets a 504.
 */
export const createOAuthRoutes = (deps: OAuthDependencies): Hono => {
  const consent = createConsentService(deps)
  const exchanger = createTokenExchangeHandler({
    ...deps,
    storeTimeoutMs: storeDeadlineMs(deps.requestTimeoutMs),
  })
  const userInfo = createUserInfoService(deps)

  const flows = new Hono()

  flows.use('*', timeout(deps.requestTimeoutMs))

  flows.get('/authorize', createAuthorizationHandler(deps.clients))
  flows.post('/approve', createApproveHandler(consent))
  flows.post('/token', createTokenRequestHandler(exchanger))
  flows.get('/userinfo', requireAccessToken(userInfo), handleUserInfo)

  return flows
}
