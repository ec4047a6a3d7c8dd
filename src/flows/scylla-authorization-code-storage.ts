import type { Client } from 'cassandra-driver'
import {
  executeQuery,
  readDate,
  readNullableString,
  readString,
  readStringList,
} from '../database/query.ts'
import type { AuthorizationCode } from '../database/types/authorization-code.ts'
import { DEFAULT_CODE_TTL_SECONDS } from '../oauth/config.ts'
import { log } from '../plumbing/logger.ts'
import {
  type AuthorizationCodeStore,
  buildAuthorizationCode,
  generateAuthorizationCode,
  isExpired,
} from './authorization-code-storage.ts'

/**
 * ScyllaDB-backed code store. Rows are written with a TTL so expired codes
 * vanish on their own; consumption uses a lightweight transaction
 * (`DELETE ... IF EXISTS`) so only one exchanger sees `wasApplied()`.
 */
export const createScyllaAuthorizationCodeStore = (options: {
  client: Client
  keyspace: string
  ttlSeconds?: number
}): AuthorizationCodeStore => {
  const { client, keyspace } = options
  const ttlSeconds = options.ttlSeconds ?? DEFAULT_CODE_TTL_SECONDS

  return {
    issue: async (input) => {
      const code = generateAuthorizationCode()
      const record = buildAuthorizationCode(code, input, ttlSeconds)

      await executeQuery(
        client,
        `INSERT INTO ${keyspace}.authorization_codes
         (code, client_id, user_id, redirect_uri, scopes, code_challenge, code_challenge_method, expires_at, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
         USING TTL ${ttlSeconds}`,
        [
          record.code,
          record.client_id,
          record.user_id,
          record.redirect_uri,
          record.scopes,
          record.code_challenge,
          record.code_challenge_method,
          record.expires_at,
          record.created_at,
        ],
      )

      return code
    },

    consumeIfValid: async (code) => {
      const selectResult = await executeQuery(
        client,
        `SELECT * FROM ${keyspace}.authorization_codes WHERE code = ?`,
        [code],
      )

      const row = selectResult.rows[0]
      if (!row) {
        return null
      }

      const deleteResult = await executeQuery(
        client,
        `DELETE FROM ${keyspace}.authorization_codes WHERE code = ? IF EXISTS`,
        [code],
      )

      if (!deleteResult.wasApplied()) {
        log({
          message: 'Authorization code already consumed (replay attempt)',
          clientId: readString(row, 'client_id'),
        })
        return null
      }

      const stored: AuthorizationCode = {
        code: readString(row, 'code'),
        client_id: readString(row, 'client_id'),
        user_id: readString(row, 'user_id'),
        redirect_uri: readString(row, 'redirect_uri'),
        scopes: readStringList(row, 'scopes'),
        code_challenge: readNullableString(row, 'code_challenge'),
        code_challenge_method:
          readNullableString(row, 'code_challenge_method') === 'S256'
            ? 'S256'
            : null,
        expires_at: readDate(row, 'expires_at'),
        created_at: readDate(row, 'created_at'),
      }

      return isExpired(stored) ? null : stored
    },
  }
}
