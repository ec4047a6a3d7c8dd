interface StoredToken {
  token: string
  client_id: string
  user_id: string
  scopes: string[]
  expires_at: Date
  created_at: Date
}

export type AccessTokenRecord = StoredToken

export type RefreshTokenRecord = StoredToken
