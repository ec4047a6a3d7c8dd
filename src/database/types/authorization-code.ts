export type CodeChallengeMethod = 'S256'

export interface AuthorizationCode {
  code: string
  client_id: string
  user_id: string
  /** Compared byte-for-byte with the redirect_uri presented at exchange */
  redirect_uri: string
  scopes: string[]
  code_challenge: string | null
  code_challenge_method: CodeChallengeMethod | null
  expires_at: Date
  created_at: Date
}

export interface AuthorizationCodeInput {
  client_id: string
  user_id: string
  redirect_uri: string
  scopes: string[]
  code_challenge?: string | null
  code_challenge_method?: CodeChallengeMethod | null
}
