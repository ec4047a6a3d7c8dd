import type { Context, Next } from 'hono'
import type { UserInfoService } from '../flows/userinfo.ts'
import { oauthJsonError } from '../oauth/error-response.ts'

export const extractBearerToken = (
  authHeader: string | undefined,
): string | null => {
  if (!authHeader?.startsWith('Bearer ')) {
    return null
  }
  const token = authHeader.slice(7).trim()
  return token.length > 0 ? token : null
}

const unauthorized = (description: string): Response =>
  oauthJsonError('invalid_token', description, 401, {
    'WWW-Authenticate': `Bearer error="invalid_token", error_description="${description}"`,
  })

/**
 * Hono middleware that resolves a Bearer access token and attaches its claims
 * to the context. Missing, unknown and expired tokens get 401 invalid_token.
 *
 * Use c.get('userInfo') in downstream handlers.
 */
export const requireAccessToken =
  (userInfo: UserInfoService) =>
  async (c: Context, next: Next): Promise<Response | undefined> => {
    const token = extractBearerToken(c.req.header('Authorization'))
    if (!token) {
      return unauthorized('Missing or invalid Authorization header')
    }

    const claims = await userInfo.resolve(token)
    if (!claims) {
      return unauthorized('Access token is invalid or expired')
    }

    c.set('userInfo', claims)
    await next()
    return undefined
  }
