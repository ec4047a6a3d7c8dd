/**
 * Security and audit logging for the authorization code pipeline.
 * Never logs passwords, client secrets, authorization codes or tokens.
 */

import { log } from './logger.ts'

export interface AuthSuccessEvent {
  event: 'auth_success'
  user_id: string
  client_id: string
}

export interface AuthFailureEvent {
  event: 'auth_failure'
  reason: 'invalid_credentials'
  client_id: string
}

export interface CodeIssuedEvent {
  event: 'code_issued'
  user_id: string
  client_id: string
  pkce: boolean
}

export interface TokenIssuedEvent {
  event: 'token_issued'
  user_id: string
  client_id: string
  grant_type: 'authorization_code' | 'refresh_token'
}

export interface TokenExchangeFailedEvent {
  event: 'token_exchange_failed'
  error: string
  /** Last state the exchange reached before failing */
  stage: string
  client_id?: string
}

export type SecurityEvent =
  | AuthSuccessEvent
  | AuthFailureEvent
  | CodeIssuedEvent
  | TokenIssuedEvent
  | TokenExchangeFailedEvent

export const logSecurityEvent = (event: SecurityEvent): void => {
  log({
    message: 'Security event',
    security_event: event,
  })
}
