import type { Context } from 'hono'

const LOCAL_HOSTNAMES = new Set(['localhost', '127.0.0.1', '[::1]'])

/**
 * True when the request arrived over TLS, directly or via a proxy that sets
 * X-Forwarded-Proto.
 */
export const isHttps = (c: Context): boolean =>
  new URL(c.req.url).protocol === 'https:' ||
  c.req.header('x-forwarded-proto') === 'https'

export const isLocalhost = (c: Context): boolean =>
  LOCAL_HOSTNAMES.has(new URL(c.req.url).hostname.toLowerCase())
