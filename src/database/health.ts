import type { Client } from 'cassandra-driver'

export interface HealthStatus {
  isHealthy: boolean
  message: string
  details?: {
    keyspaceExists?: boolean
    hostCount?: number
  }
}

export const checkDatabaseHealth = async (
  client: Client,
  keyspace: string,
): Promise<HealthStatus> => {
  try {
    await client.execute('SELECT now() FROM system.local')

    const result = await client.execute(
      'SELECT keyspace_name FROM system_schema.keyspaces WHERE keyspace_name = ?',
      [keyspace],
      { prepare: true },
    )

    return {
      isHealthy: true,
      message: 'Database connection is healthy',
      details: {
        keyspaceExists: result.rows.length > 0,
        hostCount: client.hosts.length,
      },
    }
  } catch (error) {
    return {
      isHealthy: false,
      message:
        error instanceof Error ? error.message : 'Database health check failed',
    }
  }
}
