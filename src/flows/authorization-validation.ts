import { isPublicClient, type ClientRegistry } from '../clients/registry.ts'
import type { CodeChallengeMethod } from '../database/types/authorization-code.ts'
import type { OAuthErrorCode } from '../oauth/error-response.ts'
import {
  DEFAULT_SCOPE,
  isScopeWithinLimit,
  isStateWithinLimit,
  parseScope,
} from './input-validation.ts'
import { isValidCodeChallenge } from './pkce.ts'

export interface AuthorizationRequestParams {
  clientId?: string
  redirectUri?: string
  responseType?: string
  scope?: string
  state?: string
  codeChallenge?: string
  codeChallengeMethod?: string
}

export interface ValidatedAuthorizationRequest {
  clientId: string
  clientName: string
  redirectUri: string
  scopes: string[]
  /** Echoed verbatim in the redirect, never stored */
  state: string | null
  codeChallenge: string | null
  codeChallengeMethod: CodeChallengeMethod | null
}

export type AuthorizationErrorCode = Extract<
  OAuthErrorCode,
  | 'invalid_client'
  | 'invalid_redirect_uri'
  | 'unsupported_response_type'
  | 'invalid_request'
  | 'invalid_scope'
>

export type AuthorizationValidationResult =
  | { isValid: true; data: ValidatedAuthorizationRequest }
  | {
      isValid: false
      error: AuthorizationErrorCode
      errorDescription: string
    }

const invalid = (
  error: AuthorizationErrorCode,
  errorDescription: string,
): AuthorizationValidationResult => ({
  isValid: false,
  error,
  errorDescription,
})

/**
 * Validate an authorization request against the client registry.
 * Checks run in a fixed order and the first failure wins: client,
 * redirect_uri (exact match only), response_type, PKCE parameters, scope.
 * Nothing is persisted.
 */
export const validateAuthorizationRequest = (
  clients: ClientRegistry,
  params: AuthorizationRequestParams,
): AuthorizationValidationResult => {
  const client = params.clientId ? clients.lookup(params.clientId) : null
  if (!client) {
    return invalid('invalid_client', 'Unknown client')
  }

  const redirectUri = params.redirectUri ?? ''
  if (!client.redirectUris.includes(redirectUri)) {
    return invalid(
      'invalid_redirect_uri',
      'redirect_uri is not registered for this client',
    )
  }

  if (params.responseType !== 'code') {
    return invalid('unsupported_response_type', 'response_type must be "code"')
  }

  const codeChallenge = params.codeChallenge || null
  const method = params.codeChallengeMethod || null

  if (codeChallenge) {
    if (method !== 'S256') {
      return invalid('invalid_request', 'code_challenge_method must be S256')
    }
    if (!isValidCodeChallenge(codeChallenge)) {
      return invalid(
        'invalid_request',
        'code_challenge must be 43-128 base64url characters',
      )
    }
  } else if (method) {
    return invalid(
      'invalid_request',
      'code_challenge is required when code_challenge_method is provided',
    )
  } else if (isPublicClient(client)) {
    return invalid('invalid_request', 'PKCE is required for public clients')
  }

  if (!isStateWithinLimit(params.state)) {
    return invalid('invalid_request', 'state exceeds maximum length')
  }

  if (!isScopeWithinLimit(params.scope)) {
    return invalid('invalid_request', 'scope exceeds maximum length')
  }

  const requested = parseScope(params.scope)
  const scopes = requested.length > 0 ? requested : [DEFAULT_SCOPE]
  const unknownScopes = scopes.filter((s) => !client.scopes.includes(s))
  if (unknownScopes.length > 0) {
    return invalid(
      'invalid_scope',
      `Client is not allowed scope(s): ${unknownScopes.join(', ')}`,
    )
  }

  return {
    isValid: true,
    data: {
      clientId: client.id,
      clientName: client.name,
      redirectUri,
      scopes,
      state: params.state || null,
      codeChallenge,
      codeChallengeMethod: codeChallenge ? 'S256' : null,
    },
  }
}
