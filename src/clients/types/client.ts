/**
 * A registered relying party. Loaded once at startup and never mutated.
 */
export interface Client {
  id: string
  name: string
  /** SHA-256 hex digest of the client secret; null for public (PKCE-only) clients */
  secretHash: string | null
  redirectUris: readonly string[]
  scopes: readonly string[]
}

/**
 * Shape of one entry in the clients configuration file.
 * `client_secret` is accepted for local development and hashed on load.
 */
export interface ClientRecord {
  client_id: string
  client_name?: string
  client_secret_hash?: string | null
  client_secret?: string
  redirect_uris: string[]
  scopes: string[]
}

export interface ClientCredentials {
  clientId: string
  clientSecret: string
}
