import type { Context } from 'hono'
import type { ClientRegistry } from '../clients/registry.ts'
import { oauthJsonError } from '../oauth/error-response.ts'
import { logSecurityEvent } from '../plumbing/security-log.ts'
import type { CredentialStore } from '../users/credential-store.ts'
import type { AuthorizationCodeStore } from './authorization-code-storage.ts'
import {
  type AuthorizationErrorCode,
  type AuthorizationRequestParams,
  type ValidatedAuthorizationRequest,
  validateAuthorizationRequest,
} from './authorization-validation.ts'
import { renderConsentPage } from './consent-page.ts'
import { readFormField } from './input-validation.ts'

export const INVALID_CREDENTIALS_MESSAGE = 'Invalid username or password'

export type ApprovalParams = Omit<AuthorizationRequestParams, 'responseType'> & {
  username?: string
  password?: string
}

export type ApprovalOutcome =
  | { outcome: 'approved'; redirectTo: string }
  | { outcome: 'invalid_credentials'; request: ValidatedAuthorizationRequest }
  | {
      outcome: 'invalid_request'
      error: AuthorizationErrorCode
      errorDescription: string
    }

export interface ConsentService {
  approve: (params: ApprovalParams) => Promise<ApprovalOutcome>
}

/**
 * Append `code` and `state` to the registered redirect URI, keeping any query
 * it already carries.
 */
export const buildAuthorizationRedirect = (
  redirectUri: string,
  code: string,
  state: string | null,
): string => {
  const url = new URL(redirectUri)
  url.searchParams.set('code', code)
  if (state !== null) {
    url.searchParams.set('state', state)
  }
  return url.toString()
}

export const createConsentService = (deps: {
  clients: ClientRegistry
  credentials: CredentialStore
  codes: AuthorizationCodeStore
}): ConsentService => ({
  approve: async (params) => {
    // The form fields are client-controlled; validate them again
    const validation = validateAuthorizationRequest(deps.clients, {
      ...params,
      responseType: 'code',
    })
    if (!validation.isValid) {
      return {
        outcome: 'invalid_request',
        error: validation.error,
        errorDescription: validation.errorDescription,
      }
    }

    const request = validation.data
    const user = await deps.credentials.authenticate(
      params.username ?? '',
      params.password ?? '',
    )
    if (!user) {
      logSecurityEvent({
        event: 'auth_failure',
        reason: 'invalid_credentials',
        client_id: request.clientId,
      })
      return { outcome: 'invalid_credentials', request }
    }

    logSecurityEvent({
      event: 'auth_success',
      user_id: user.id,
      client_id: request.clientId,
    })

    const code = await deps.codes.issue({
      client_id: request.clientId,
      user_id: user.id,
      redirect_uri: request.redirectUri,
      scopes: request.scopes,
      code_challenge: request.codeChallenge,
      code_challenge_method: request.codeChallengeMethod,
    })

    logSecurityEvent({
      event: 'code_issued',
      user_id: user.id,
      client_id: request.clientId,
      pkce: request.codeChallenge !== null,
    })

    return {
      outcome: 'approved',
      redirectTo: buildAuthorizationRedirect(
        request.redirectUri,
        code,
        request.state,
      ),
    }
  },
})

/**
 * POST /oauth2/approve: the consent form submission.
 */
export const createApproveHandler =
  (consent: ConsentService) =>
  async (c: Context): Promise<Response> => {
    const body = await c.req.parseBody()
    const result = await consent.approve({
      clientId: readFormField(body, 'client_id'),
      redirectUri: readFormField(body, 'redirect_uri'),
      scope: readFormField(body, 'scope'),
      state: readFormField(body, 'state'),
      codeChallenge: readFormField(body, 'code_challenge'),
      codeChallengeMethod: readFormField(body, 'code_challenge_method'),
      username: readFormField(body, 'username'),
      password: readFormField(body, 'password'),
    })

    switch (result.outcome) {
      case 'approved':
        return c.redirect(result.redirectTo, 302)
      case 'invalid_credentials':
        return c.html(
          renderConsentPage(result.request, {
            error: INVALID_CREDENTIALS_MESSAGE,
          }),
        )
      case 'invalid_request':
        return oauthJsonError(result.error, result.errorDescription)
    }
  }
