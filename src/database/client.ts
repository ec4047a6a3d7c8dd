import { Client, type ClientOptions } from 'cassandra-driver'
import { log } from '../plumbing/logger.ts'
import type { DatabaseConfig } from './types/database-config.ts'

let databaseClient: Client | null = null

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)

// No keyspace on the connection: queries are keyspace-qualified and the
// keyspace itself may not exist yet when the schema is first applied.
const createCassandraClient = (config: DatabaseConfig): Client => {
  const clientOptions: ClientOptions = {
    contactPoints: config.hosts.map((host) => `${host}:${config.port}`),
    localDataCenter: config.localDataCenter,
    credentials:
      config.username && config.password
        ? {
            username: config.username,
            password: config.password,
          }
        : undefined,
    sslOptions: config.isSslEnabled ? { rejectUnauthorized: true } : undefined,
    socketOptions: {
      connectTimeout: config.connectTimeoutMs,
    },
  }

  return new Client(clientOptions)
}

export const initializeDatabase = async (
  config: DatabaseConfig,
): Promise<Client> => {
  if (databaseClient) {
    log('Database client already initialized')
    return databaseClient
  }

  let attempt = 0

  while (true) {
    attempt += 1
    const client = createCassandraClient(config)

    try {
      await client.connect()
      databaseClient = client

      log({
        message: 'Database connection established',
        hosts: config.hosts,
        keyspace: config.keyspace,
        localDataCenter: config.localDataCenter,
        attempt,
      })

      return client
    } catch (error) {
      log({
        message: 'Failed to connect to database',
        error: describeError(error),
        attempt,
      })

      try {
        await client.shutdown()
      } catch (shutdownError) {
        log({
          message: 'Error shutting down failed client',
          error: describeError(shutdownError),
        })
      }

      if (attempt >= config.connectRetries) {
        throw error instanceof Error
          ? error
          : new Error(String(error ?? 'Unknown database connection error'))
      }

      await new Promise((resolve) => {
        setTimeout(resolve, config.connectRetryDelayMs)
      })
    }
  }
}

export const shutdownDatabase = async (): Promise<void> => {
  const client = databaseClient
  databaseClient = null

  if (!client) {
    return
  }

  try {
    await client.shutdown()
    log('Database connection closed')
  } catch (error) {
    log({
      message: 'Error while closing database connection',
      error: describeError(error),
    })
  }
}
