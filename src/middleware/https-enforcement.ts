import type { Context, Next } from 'hono'
import { oauthJsonError } from '../oauth/error-response.ts'
import { isHttps, isLocalhost } from './is-https.ts'

/**
 * Reject plain-HTTP requests in production, except to localhost. Codes,
 * secrets and bearer tokens must not cross the wire unencrypted.
 */
export const httpsEnforcement = async (
  c: Context,
  next: Next,
): Promise<Response | undefined> => {
  if (process.env.NODE_ENV !== 'production' || isHttps(c) || isLocalhost(c)) {
    await next()
    return undefined
  }

  return oauthJsonError('invalid_request', 'HTTPS is required')
}
