import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import { log } from '../plumbing/logger.ts'
import { hashClientSecret, isClientSecretHash } from './credentials.ts'
import type { Client, ClientRecord } from './types/client.ts'

/**
 * Read-only lookup of registered clients. A miss is reported by callers as
 * `invalid_client`, without saying which field was wrong.
 */
export interface ClientRegistry {
  lookup: (clientId: string) => Client | null
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const isOptionalString = (value: unknown): value is string | undefined =>
  value === undefined || typeof value === 'string'

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === 'string')

/**
 * Redirect URIs must be absolute http(s) URLs without a fragment.
 */
const isValidRedirectUri = (uri: string): boolean => {
  try {
    const parsed = new URL(uri)
    return (
      (parsed.protocol === 'http:' || parsed.protocol === 'https:') &&
      parsed.hash === ''
    )
  } catch {
    return false
  }
}

const toClient = (record: ClientRecord): Client => {
  const secretHash = record.client_secret_hash
    ? record.client_secret_hash.toLowerCase()
    : record.client_secret
      ? hashClientSecret(record.client_secret)
      : null

  return Object.freeze({
    id: record.client_id,
    name: record.client_name?.trim() || record.client_id,
    secretHash,
    redirectUris: Object.freeze([...record.redirect_uris]),
    scopes: Object.freeze([...new Set(record.scopes)]),
  })
}

/**
 * Validate untrusted configuration (parsed JSON) into client records.
 * Throws with every problem found.
 */
export const parseClientRecords = (raw: unknown): ClientRecord[] => {
  const entries = isRecord(raw) && Array.isArray(raw.clients) ? raw.clients : raw
  if (!Array.isArray(entries)) {
    throw new Error(
      'Client configuration must be an array or an object with a "clients" array',
    )
  }

  const errors: string[] = []
  const records: ClientRecord[] = []
  const seen = new Set<string>()

  entries.forEach((entry: unknown, index) => {
    const label = `clients[${index}]`
    if (!isRecord(entry)) {
      errors.push(`${label} must be an object`)
      return
    }

    const clientId = entry.client_id
    if (typeof clientId !== 'string' || !clientId.trim()) {
      errors.push(`${label}.client_id is required`)
      return
    }
    if (seen.has(clientId)) {
      errors.push(`${label}.client_id "${clientId}" is duplicated`)
      return
    }
    seen.add(clientId)

    const redirectUris = entry.redirect_uris
    if (!isStringArray(redirectUris) || redirectUris.length === 0) {
      errors.push(`${label}.redirect_uris must list at least one URI`)
      return
    }
    const invalidUris = redirectUris.filter((uri) => !isValidRedirectUri(uri))
    if (invalidUris.length > 0) {
      errors.push(
        `${label}.redirect_uris contains invalid URI(s): ${invalidUris.join(', ')}`,
      )
      return
    }

    const scopes = entry.scopes ?? []
    if (!isStringArray(scopes) || scopes.some((scope) => /\s/.test(scope))) {
      errors.push(`${label}.scopes must be a list of scope tokens`)
      return
    }

    const { client_name, client_secret, client_secret_hash } = entry
    if (!isOptionalString(client_name)) {
      errors.push(`${label}.client_name must be a string`)
      return
    }
    if (!isOptionalString(client_secret)) {
      errors.push(`${label}.client_secret must be a string`)
      return
    }
    if (
      client_secret_hash !== null &&
      (!isOptionalString(client_secret_hash) ||
        (client_secret_hash !== undefined &&
          !isClientSecretHash(client_secret_hash.toLowerCase())))
    ) {
      errors.push(`${label}.client_secret_hash must be a SHA-256 hex digest`)
      return
    }

    records.push({
      client_id: clientId,
      client_name,
      client_secret,
      client_secret_hash,
      redirect_uris: redirectUris,
      scopes,
    })
  })

  if (errors.length > 0) {
    throw new Error(`Invalid client configuration:\n${errors.join('\n')}`)
  }

  return records
}

export const createClientRegistry = (records: ClientRecord[]): ClientRegistry => {
  const clients = new Map<string, Client>(
    records.map((record) => [record.client_id, toClient(record)]),
  )

  return {
    lookup: (clientId) => clients.get(clientId) ?? null,
  }
}

/**
 * Load the client registry from a JSON file (relative paths resolve against cwd).
 */
export const loadClientRegistry = async (
  filePath: string,
): Promise<ClientRegistry> => {
  const absolutePath = resolve(process.cwd(), filePath)
  const contents = await readFile(absolutePath, 'utf8')
  const records = parseClientRecords(JSON.parse(contents))

  log({
    message: 'Client registry loaded',
    path: absolutePath,
    clientCount: records.length,
  })

  return createClientRegistry(records)
}

export const isPublicClient = (client: Client): boolean =>
  client.secretHash === null
