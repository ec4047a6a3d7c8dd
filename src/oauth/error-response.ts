/**
 * OAuth 2.0 error responses (RFC 6749 Section 5.2): `error` is required,
 * `error_description` optional. Responses are never cached.
 */

export type OAuthErrorCode =
  | 'invalid_client'
  | 'invalid_redirect_uri'
  | 'unsupported_response_type'
  | 'invalid_request'
  | 'invalid_scope'
  | 'invalid_grant'
  | 'unsupported_grant_type'
  | 'invalid_token'
  | 'server_error'

export const NO_STORE_HEADERS = {
  'Cache-Control': 'no-store',
  Pragma: 'no-cache',
} as const

export const oauthJsonError = (
  error: OAuthErrorCode,
  errorDescription?: string,
  status = 400,
  extraHeaders: Record<string, string> = {},
): Response =>
  new Response(
    JSON.stringify({
      error,
      ...(errorDescription && { error_description: errorDescription }),
    }),
    {
      status,
      headers: {
        'Content-Type': 'application/json',
        ...NO_STORE_HEADERS,
        ...extraHeaders,
      },
    },
  )

export const oauthJsonResponse = (body: object, status = 200): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: {
      'Content-Type': 'application/json',
      ...NO_STORE_HEADERS,
    },
  })
