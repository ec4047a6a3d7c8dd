import type { Client } from 'cassandra-driver'
import {
  executeQuery,
  readDate,
  readString,
  readStringList,
  ttlSecondsUntil,
} from '../database/query.ts'
import type { AccessTokenRecord } from '../database/types/token.ts'
import { isExpired } from '../flows/authorization-code-storage.ts'
import { log } from '../plumbing/logger.ts'
import type { TokenStore } from './token-storage.ts'

type Row = Readonly<Record<string, unknown>>

const toRecord = (row: Row): AccessTokenRecord => ({
  token: readString(row, 'token_value'),
  client_id: readString(row, 'client_id'),
  user_id: readString(row, 'user_id'),
  scopes: readStringList(row, 'scopes'),
  expires_at: readDate(row, 'expires_at'),
  created_at: readDate(row, 'created_at'),
})

export const createScyllaTokenStore = (options: {
  client: Client
  keyspace: string
}): TokenStore => {
  const { client, keyspace } = options

  const insert = async (table: string, record: AccessTokenRecord) => {
    await executeQuery(
      client,
      `INSERT INTO ${keyspace}.${table}
       (token_value, client_id, user_id, scopes, expires_at, created_at)
       VALUES (?, ?, ?, ?, ?, ?)
       USING TTL ${ttlSecondsUntil(record.expires_at)}`,
      [
        record.token,
        record.client_id,
        record.user_id,
        record.scopes,
        record.expires_at,
        record.created_at,
      ],
    )
  }

  return {
    saveAccessToken: (record) => insert('access_tokens', record),

    findAccessToken: async (token) => {
      const result = await executeQuery(
        client,
        `SELECT * FROM ${keyspace}.access_tokens WHERE token_value = ?`,
        [token],
      )
      const row = result.rows[0]
      if (!row) {
        return null
      }
      const record = toRecord(row)
      return isExpired(record) ? null : record
    },

    saveRefreshToken: (record) => insert('refresh_tokens', record),

    consumeRefreshToken: async (token) => {
      const selectResult = await executeQuery(
        client,
        `SELECT * FROM ${keyspace}.refresh_tokens WHERE token_value = ?`,
        [token],
      )
      const row = selectResult.rows[0]
      if (!row) {
        return null
      }

      const deleteResult = await executeQuery(
        client,
        `DELETE FROM ${keyspace}.refresh_tokens WHERE token_value = ? IF EXISTS`,
        [token],
      )
      if (!deleteResult.wasApplied()) {
        log({
          message: 'Refresh token already used (replay attempt)',
          clientId: readString(row, 'client_id'),
        })
        return null
      }

      const record = toRecord(row)
      return isExpired(record) ? null : record
    },
  }
}
