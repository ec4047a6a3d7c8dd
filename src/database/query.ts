import type { Client, types } from 'cassandra-driver'
import { StoreUnavailableError } from '../plumbing/errors.ts'

type Row = Readonly<Record<string, unknown>>

/**
 * Execute a prepared CQL statement. Driver failures become
 * StoreUnavailableError so they surface as 5xx rather than as client errors.
 */
export const executeQuery = async (
  client: Client,
  query: string,
  params: unknown[],
): Promise<types.ResultSet> => {
  try {
    return await client.execute(query, params, { prepare: true })
  } catch (error) {
    throw new StoreUnavailableError('ScyllaDB query failed', { cause: error })
  }
}

export const readString = (row: Row, column: string): string => {
  const value = row[column]
  if (typeof value === 'string') {
    return value
  }
  // uuid/timeuuid columns come back as driver objects
  if (value !== null && value !== undefined) {
    return String(value)
  }
  throw new StoreUnavailableError(`Column ${column} is missing`)
}

export const readNullableString = (row: Row, column: string): string | null => {
  const value = row[column]
  return typeof value === 'string' && value.length > 0 ? value : null
}

export const readStringList = (row: Row, column: string): string[] => {
  const value = row[column]
  return Array.isArray(value)
    ? value.filter((item): item is string => typeof item === 'string')
    : []
}

export const readDate = (row: Row, column: string): Date => {
  const value = row[column]
  if (value instanceof Date) {
    return value
  }
  throw new StoreUnavailableError(`Column ${column} is not a timestamp`)
}

/**
 * Remaining lifetime in whole seconds, at least 1, for `USING TTL`.
 */
export const ttlSecondsUntil = (expiresAt: Date, now = Date.now()): number =>
  Math.max(1, Math.ceil((expiresAt.getTime() - now) / 1000))
