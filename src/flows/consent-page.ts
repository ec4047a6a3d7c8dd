import type { ValidatedAuthorizationRequest } from './authorization-validation.ts'
import { escapeHtml } from './escape-html.ts'

const hiddenField = (name: string, value: string | null): string =>
  `<input type="hidden" name="${name}" value="${escapeHtml(value ?? '')}" />`

/**
 * Minimal consent form. Every authorize parameter is carried through as a
 * hidden field and re-validated when the form is posted to /oauth2/approve.
 */
export const renderConsentPage = (
  request: ValidatedAuthorizationRequest,
  options: { action?: string; error?: string } = {},
): string => {
  const action = options.action ?? '/oauth2/approve'
  const scopeItems = request.scopes
    .map((scope) => `<li>${escapeHtml(scope)}</li>`)
    .join('')

  return `<!DOCTYPE html>
<html>
<head><title>Authorize ${escapeHtml(request.clientName)}</title></head>
<body>
  <h1>Authorize ${escapeHtml(request.clientName)}</h1>
  <p>This application is requesting access to:</p>
  <ul>${scopeItems}</ul>
  ${options.error ? `<p style="color: #c00;">${escapeHtml(options.error)}</p>` : ''}
  <form method="POST" action="${escapeHtml(action)}">
    ${hiddenField('client_id', request.clientId)}
    ${hiddenField('redirect_uri', request.redirectUri)}
    ${hiddenField('scope', request.scopes.join(' '))}
    ${hiddenField('state', request.state)}
    ${hiddenField('code_challenge', request.codeChallenge)}
    ${hiddenField('code_challenge_method', request.codeChallengeMethod)}
    <p>
      <label>Username: <input type="text" name="username" required /></label>
    </p>
    <p>
      <label>Password: <input type="password" name="password" required /></label>
    </p>
    <p><button type="submit">Approve</button></p>
  </form>
</body>
</html>`
}
