import { parseNumber } from '../plumbing/parse-env.ts'
import type { DatabaseConfig } from './types/database-config.ts'

const KEYSPACE_PATTERN = /^[A-Za-z][A-Za-z0-9_]{0,47}$/

export const getDatabaseConfig = (): DatabaseConfig => {
  const rawHosts = process.env.SCYLLA_HOSTS || 'localhost'
  const hosts = rawHosts
    .split(',')
    .map((host) => host.trim())
    .filter((host) => host.length > 0)

  const keyspace = process.env.SCYLLA_KEYSPACE?.trim() || 'authcode'
  // Interpolated into CQL, so it must be a plain identifier
  if (!KEYSPACE_PATTERN.test(keyspace)) {
    throw new Error(`Invalid SCYLLA_KEYSPACE: ${keyspace}`)
  }

  return {
    hosts,
    port: parseNumber(process.env.SCYLLA_PORT, 9042),
    keyspace,
    localDataCenter: process.env.SCYLLA_LOCAL_DATACENTER || 'datacenter1',
    username: process.env.SCYLLA_USERNAME,
    password: process.env.SCYLLA_PASSWORD,
    isSslEnabled: process.env.SCYLLA_SSL === 'true',
    connectTimeoutMs: parseNumber(process.env.SCYLLA_CONNECT_TIMEOUT_MS, 10_000),
    replicationFactor: parseNumber(process.env.SCYLLA_REPLICATION_FACTOR, 1),
    connectRetries: parseNumber(process.env.SCYLLA_CONNECT_RETRIES, 3),
    connectRetryDelayMs: parseNumber(
      process.env.SCYLLA_CONNECT_RETRY_DELAY_MS,
      1_000,
    ),
  }
}
