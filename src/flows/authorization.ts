import type { Context } from 'hono'
import type { ClientRegistry } from '../clients/registry.ts'
import { oauthJsonError } from '../oauth/error-response.ts'
import { log } from '../plumbing/logger.ts'
import { validateAuthorizationRequest } from './authorization-validation.ts'
import { renderConsentPage } from './consent-page.ts'

/**
 * GET /oauth2/authorize: validate the request and render the consent form.
 * Invalid requests are answered with a 400 JSON error and never redirected,
 * since the redirect_uri may be the thing that failed validation.
 */
export const createAuthorizationHandler =
  (clients: ClientRegistry) =>
  (c: Context): Response => {
    const params = c.req.query()
    const validation = validateAuthorizationRequest(clients, {
      clientId: params.client_id,
      redirectUri: params.redirect_uri,
      responseType: params.response_type,
      scope: params.scope,
      state: params.state,
      codeChallenge: params.code_challenge,
      codeChallengeMethod: params.code_challenge_method,
    })

    if (!validation.isValid) {
      log({
        message: 'Authorization request rejected',
        error: validation.error,
        clientId: params.client_id ?? '',
      })
      return oauthJsonError(validation.error, validation.errorDescription)
    }

    return c.html(renderConsentPage(validation.data))
  }
