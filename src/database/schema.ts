import type { Client } from 'cassandra-driver'
import { log } from '../plumbing/logger.ts'
import type { DatabaseConfig } from './types/database-config.ts'

/**
 * Idempotent DDL for the code and token tables. Rows carry a TTL on insert,
 * so expired entries disappear without a sweep.
 */
export const buildSchemaStatements = (
  config: Pick<DatabaseConfig, 'keyspace' | 'replicationFactor'>,
): string[] => {
  const { keyspace, replicationFactor } = config
  return [
    `CREATE KEYSPACE IF NOT EXISTS ${keyspace}
     WITH replication = {'class': 'SimpleStrategy', 'replication_factor': ${replicationFactor}}`,
    `CREATE TABLE IF NOT EXISTS ${keyspace}.authorization_codes (
       code TEXT,
       client_id TEXT,
       user_id TEXT,
       redirect_uri TEXT,
       scopes LIST<TEXT>,
       code_challenge TEXT,
       code_challenge_method TEXT,
       expires_at TIMESTAMP,
       created_at TIMESTAMP,
       PRIMARY KEY (code)
     )`,
    `CREATE TABLE IF NOT EXISTS ${keyspace}.access_tokens (
       token_value TEXT,
       client_id TEXT,
       user_id TEXT,
       scopes LIST<TEXT>,
       expires_at TIMESTAMP,
       created_at TIMESTAMP,
       PRIMARY KEY (token_value)
     )`,
    `CREATE TABLE IF NOT EXISTS ${keyspace}.refresh_tokens (
       token_value TEXT,
       client_id TEXT,
       user_id TEXT,
       scopes LIST<TEXT>,
       expires_at TIMESTAMP,
       created_at TIMESTAMP,
       PRIMARY KEY (token_value)
     )`,
  ]
}

export const ensureSchema = async (
  client: Client,
  config: Pick<DatabaseConfig, 'keyspace' | 'replicationFactor'>,
): Promise<void> => {
  for (const statement of buildSchemaStatements(config)) {
    await client.execute(statement)
  }
  log({ message: 'Database schema ensured', keyspace: config.keyspace })
}
