import type { Context, Next } from 'hono'
import { isHttps } from './is-https.ts'

const SECURITY_HEADERS: Record<string, string> = {
  'X-Content-Type-Options': 'nosniff',
  // The consent form must not be framed (clickjacking)
  'X-Frame-Options': 'DENY',
  'Content-Security-Policy':
    "default-src 'none'; style-src 'unsafe-inline'; frame-ancestors 'none'",
  'Referrer-Policy': 'no-referrer',
}

const HSTS_HEADER = 'max-age=31536000; includeSubDomains'

/**
 * Sets security headers on every response. Handlers here often return raw
 * Response objects (token and error responses), which ignore c.header(), so
 * the headers are merged into c.res after next().
 */
export const securityHeaders = async (
  c: Context,
  next: Next,
): Promise<void> => {
  await next()

  const headers = new Headers(c.res.headers)
  for (const [name, value] of Object.entries(SECURITY_HEADERS)) {
    headers.set(name, value)
  }
  if (isHttps(c)) {
    headers.set('Strict-Transport-Security', HSTS_HEADER)
  }

  c.res = new Response(c.res.body, {
    status: c.res.status,
    statusText: c.res.statusText,
    headers,
  })
}
