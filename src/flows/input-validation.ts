/**
 * OAuth 2.0 input limits and form helpers shared by the authorize, approve
 * and token endpoints.
 */

export const MAX_STATE_LENGTH = 512
export const MAX_SCOPE_LENGTH = 2048

/** Granted when the request names no scope */
export const DEFAULT_SCOPE = 'read'

export const isStateWithinLimit = (state: string | undefined): boolean =>
  !state || state.length <= MAX_STATE_LENGTH

export const isScopeWithinLimit = (scope: string | undefined): boolean =>
  !scope || scope.length <= MAX_SCOPE_LENGTH

/**
 * Split a space-delimited scope string, dropping empties and duplicates.
 */
export const parseScope = (scope: string | undefined): string[] => [
  ...new Set((scope ?? '').split(/\s+/).filter((s) => s.length > 0)),
]

/**
 * Read a single string field from a parsed form body. File uploads and
 * missing fields read as undefined.
 */
export const readFormField = (
  body: Record<string, unknown>,
  name: string,
): string | undefined => {
  const value = body[name]
  return typeof value === 'string' ? value : undefined
}

export const isFormUrlEncoded = (contentType: string | undefined): boolean =>
  (contentType ?? '')
    .toLowerCase()
    .includes('application/x-www-form-urlencoded')
