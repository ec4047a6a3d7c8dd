import type { Context } from 'hono'
import {
  extractClientCredentialsFromBasicAuthHeader,
  verifyClientSecret,
} from '../clients/credentials.ts'
import { type ClientRegistry, isPublicClient } from '../clients/registry.ts'
import type { Client } from '../clients/types/client.ts'
import {
  type OAuthErrorCode,
  oauthJsonError,
  oauthJsonResponse,
} from '../oauth/error-response.ts'
import { withDeadline } from '../plumbing/deadline.ts'
import { logSecurityEvent } from '../plumbing/security-log.ts'
import type { TokenIssuer, TokenResponse } from '../tokens/token-issuer.ts'
import type { TokenStore } from '../tokens/token-storage.ts'
import type { AuthorizationCodeStore } from './authorization-code-storage.ts'
import { isFormUrlEncoded, readFormField } from './input-validation.ts'
import { verifyCodeVerifier } from './pkce.ts'

/**
 * Exchange progress. Each failure is terminal and reports the state it was
 * in when it failed.
 */
export type ExchangeState =
  | 'received'
  | 'code_lookup'
  | 'refresh_lookup'
  | 'client_auth'
  | 'redirect_match'
  | 'pkce'
  | 'issued'

export interface TokenRequestParams {
  grantType?: string
  code?: string
  redirectUri?: string
  clientId?: string
  clientSecret?: string
  codeVerifier?: string
  refreshToken?: string
}

export type TokenExchangeResult =
  | { ok: true; token: TokenResponse }
  | {
      ok: false
      error: OAuthErrorCode
      errorDescription: string
      status: 400 | 401
      failedAt: ExchangeState
    }

export interface TokenExchangeHandler {
  exchange: (params: TokenRequestParams) => Promise<TokenExchangeResult>
}

// Not found, expired and already used are reported identically
const INVALID_CODE = 'Invalid authorization code'
const INVALID_REFRESH_TOKEN = 'Invalid refresh token'

const fail = (
  failedAt: ExchangeState,
  error: OAuthErrorCode,
  errorDescription: string,
  clientId: string | undefined,
): TokenExchangeResult => {
  logSecurityEvent({
    event: 'token_exchange_failed',
    error,
    stage: failedAt,
    ...(clientId && { client_id: clientId }),
  })
  return {
    ok: false,
    error,
    errorDescription,
    status: error === 'invalid_client' ? 401 : 400,
    failedAt,
  }
}

const authenticatesWithSecret = (
  client: Client,
  clientSecret: string | undefined,
): boolean =>
  client.secretHash !== null &&
  clientSecret !== undefined &&
  verifyClientSecret(clientSecret, client.secretHash)

export const createTokenExchangeHandler = (deps: {
  clients: ClientRegistry
  codes: AuthorizationCodeStore
  tokens: TokenStore
  issuer: TokenIssuer
  storeTimeoutMs: number
}): TokenExchangeHandler => {
  const { clients, codes, tokens, issuer, storeTimeoutMs } = deps

  const exchangeAuthorizationCode = async (
    params: TokenRequestParams,
  ): Promise<TokenExchangeResult> => {
    const { clientId } = params

    // code_lookup: the code is burned here, before the client is checked
    const stored = params.code
      ? await withDeadline(
          codes.consumeIfValid(params.code),
          storeTimeoutMs,
          null,
        )
      : null
    if (!stored) {
      return fail('code_lookup', 'invalid_grant', INVALID_CODE, clientId)
    }

    const client = clientId ? clients.lookup(clientId) : null
    if (!client) {
      return fail('client_auth', 'invalid_client', 'Unknown client', clientId)
    }
    if (isPublicClient(client)) {
      if (!stored.code_challenge) {
        return fail('client_auth', 'invalid_grant', INVALID_CODE, clientId)
      }
    } else if (!authenticatesWithSecret(client, params.clientSecret)) {
      return fail(
        'client_auth',
        'invalid_client',
        'Client authentication failed',
        clientId,
      )
    }
    if (stored.client_id !== client.id) {
      return fail('client_auth', 'invalid_grant', INVALID_CODE, clientId)
    }

    if (params.redirectUri !== stored.redirect_uri) {
      return fail(
        'redirect_match',
        'invalid_grant',
        'redirect_uri does not match the authorization request',
        clientId,
      )
    }

    if (stored.code_challenge) {
      const verified =
        params.codeVerifier !== undefined &&
        verifyCodeVerifier(stored.code_challenge, params.codeVerifier)
      if (!verified) {
        return fail(
          'pkce',
          'invalid_grant',
          'code_verifier does not match code_challenge',
          clientId,
        )
      }
    }

    const token = await issuer.issue({
      clientId: client.id,
      userId: stored.user_id,
      scopes: stored.scopes,
    })
    logSecurityEvent({
      event: 'token_issued',
      user_id: stored.user_id,
      client_id: client.id,
      grant_type: 'authorization_code',
    })
    return { ok: true, token }
  }

  const exchangeRefreshToken = async (
    params: TokenRequestParams,
  ): Promise<TokenExchangeResult> => {
    const { clientId } = params

    const client = clientId ? clients.lookup(clientId) : null
    if (!client) {
      return fail('client_auth', 'invalid_client', 'Unknown client', clientId)
    }
    if (!authenticatesWithSecret(client, params.clientSecret)) {
      return fail(
        'client_auth',
        'invalid_client',
        'Client authentication failed',
        clientId,
      )
    }

    const stored = params.refreshToken
      ? await withDeadline(
          tokens.consumeRefreshToken(params.refreshToken),
          storeTimeoutMs,
          null,
        )
      : null
    if (!stored || stored.client_id !== client.id) {
      return fail(
        'refresh_lookup',
        'invalid_grant',
        INVALID_REFRESH_TOKEN,
        clientId,
      )
    }

    const token = await issuer.issue({
      clientId: client.id,
      userId: stored.user_id,
      scopes: stored.scopes,
    })
    logSecurityEvent({
      event: 'token_issued',
      user_id: stored.user_id,
      client_id: client.id,
      grant_type: 'refresh_token',
    })
    return { ok: true, token }
  }

  return {
    exchange: async (params) => {
      switch (params.grantType) {
        case 'authorization_code':
          return exchangeAuthorizationCode(params)
        case 'refresh_token':
          return exchangeRefreshToken(params)
        default:
          return fail(
            'received',
            'unsupported_grant_type',
            'grant_type must be authorization_code or refresh_token',
            params.clientId,
          )
      }
    },
  }
}

/**
 * POST /oauth2/token. Client credentials may arrive in the form body
 * (client_secret_post) or an Authorization: Basic header
 * (client_secret_basic), but not both.
 */
export const createTokenRequestHandler =
  (exchanger: TokenExchangeHandler) =>
  async (c: Context): Promise<Response> => {
    if (!isFormUrlEncoded(c.req.header('Content-Type'))) {
      return oauthJsonError(
        'invalid_request',
        'Content-Type must be application/x-www-form-urlencoded',
      )
    }

    const body = await c.req.parseBody()
    let clientId = readFormField(body, 'client_id')
    let clientSecret = readFormField(body, 'client_secret')

    const basic = extractClientCredentialsFromBasicAuthHeader(
      c.req.header('Authorization'),
    )
    if (basic) {
      if (clientSecret !== undefined) {
        return oauthJsonError(
          'invalid_request',
          'Use only one client authentication method',
        )
      }
      if (clientId !== undefined && clientId !== basic.clientId) {
        return oauthJsonError(
          'invalid_request',
          'client_id does not match Authorization header',
        )
      }
      clientId = basic.clientId
      clientSecret = basic.clientSecret
    }

    const result = await exchanger.exchange({
      grantType: readFormField(body, 'grant_type'),
      code: readFormField(body, 'code'),
      redirectUri: readFormField(body, 'redirect_uri'),
      clientId,
      clientSecret,
      codeVerifier: readFormField(body, 'code_verifier'),
      refreshToken: readFormField(body, 'refresh_token'),
    })

    if (!result.ok) {
      return oauthJsonError(
        result.error,
        result.errorDescription,
        result.status,
        result.status === 401 ? { 'WWW-Authenticate': 'Basic' } : {},
      )
    }
    return oauthJsonResponse(result.token)
  }
