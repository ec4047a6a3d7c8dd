import { Hono } from 'hono'
import { HTTPException } from 'hono/http-exception'
import info from '../package.json' with { type: 'json' }
import type { HealthStatus } from './database/health.ts'
import { createOAuthRoutes, type OAuthDependencies } from './flows/routes.ts'
import { httpsEnforcement } from './middleware/https-enforcement.ts'
import { securityHeaders } from './middleware/security-headers.ts'
import { oauthJsonError } from './oauth/error-response.ts'
import { StoreUnavailableError } from './plumbing/errors.ts'
import { log } from './plumbing/logger.ts'

const { name, version } = info

export interface AppDependencies extends OAuthDependencies {
  checkHealth?: () => Promise<HealthStatus>
}

export const createApp = (deps: AppDependencies): Hono => {
  const app = new Hono()

  app.use('*', securityHeaders)
  app.use('*', httpsEnforcement)

  app.get('/about', (c) => c.json({ name, version }))

  app.get('/health', async (c) => {
    const status = deps.checkHealth
      ? await deps.checkHealth()
      : { isHealthy: true, message: 'ok' }
    return c.json(status, status.isHealthy ? 200 : 503)
  })

  app.route('/oauth2', createOAuthRoutes(deps))

  app.notFound((c) => c.json({ error: 'not_found' }, 404))

  app.onError((error, c) => {
    if (error instanceof HTTPException) {
      return error.getResponse()
    }

    if (error instanceof StoreUnavailableError) {
      log({
        message: 'Storage unavailable',
        path: c.req.path,
        error: error.message,
      })
      return oauthJsonError(
        'server_error',
        'The authorization server is temporarily unavailable',
        503,
      )
    }

    log({
      message: 'Unhandled error',
      path: c.req.path,
      error: error.message,
    })
    return oauthJsonError('server_error', undefined, 500)
  })

  return app
}
