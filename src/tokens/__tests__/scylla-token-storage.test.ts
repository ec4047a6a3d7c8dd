import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createScyllaTokenStore } from '../scylla-token-storage.ts'

const mockExecute = vi.fn()

const row = (overrides: Record<string, unknown> = {}) => ({
  token_value: 'token-1',
  client_id: 'demo-client',
  user_id: 'user-1',
  scopes: ['read'],
  expires_at: new Date(Date.now() + 60_000),
  created_at: new Date(),
  ...overrides,
})

describe('Scylla Token Storage', () => {
  const createStore = () =>
    createScyllaTokenStore({
      client: { execute: mockExecute } as never,
      keyspace: 'authcode',
    })

  beforeEach(() => {
    vi.clearAllMocks()
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
  })

  afterEach(() => {
    vi.useRealTimers()
    vi.restoreAllMocks()
  })

  it('should insert an access token with a TTL matching its expiry', async () => {
    vi.useFakeTimers({ toFake: ['Date'] })
    vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'))
    mockExecute.mockResolvedValueOnce({ rows: [] })

    await createStore().saveAccessToken({
      token: 'token-1',
      client_id: 'demo-client',
      user_id: 'user-1',
      scopes: ['read'],
      expires_at: new Date('2024-01-01T01:00:00.000Z'),
      created_at: new Date('2024-01-01T00:00:00.000Z'),
    })

    const [query, params] = mockExecute.mock.calls[0]
    expect(query).toContain('INSERT INTO authcode.access_tokens')
    expect(query).toContain('USING TTL 3600')
    expect(params.slice(0, 4)).toEqual([
      'token-1',
      'demo-client',
      'user-1',
      ['read'],
    ])
  })

  it('should write refresh tokens to their own table', async () => {
    mockExecute.mockResolvedValueOnce({ rows: [] })

    await createStore().saveRefreshToken({
      token: 'refresh-1',
      client_id: 'demo-client',
      user_id: 'user-1',
      scopes: ['read'],
      expires_at: new Date(Date.now() + 60_000),
      created_at: new Date(),
    })

    expect(mockExecute.mock.calls[0][0]).toContain(
      'INSERT INTO authcode.refresh_tokens',
    )
  })

  it('should find a live access token', async () => {
    mockExecute.mockResolvedValueOnce({ rows: [row()] })

    expect(await createStore().findAccessToken('token-1')).toMatchObject({
      token: 'token-1',
      client_id: 'demo-client',
      user_id: 'user-1',
      scopes: ['read'],
    })
  })

  it('should not return an expired access token', async () => {
    mockExecute.mockResolvedValueOnce({
      rows: [row({ expires_at: new Date(Date.now() - 1_000) })],
    })

    expect(await createStore().findAccessToken('token-1')).toBeNull()
  })

  it('should consume a refresh token with a conditional delete', async () => {
    mockExecute
      .mockResolvedValueOnce({ rows: [row()] })
      .mockResolvedValueOnce({ wasApplied: () => true })

    expect(await createStore().consumeRefreshToken('token-1')).toMatchObject({
      token: 'token-1',
    })
    expect(mockExecute.mock.calls[1][0]).toContain(
      'DELETE FROM authcode.refresh_tokens WHERE token_value = ? IF EXISTS',
    )
  })

  it('should return null when the refresh token was already consumed', async () => {
    mockExecute
      .mockResolvedValueOnce({ rows: [row()] })
      .mockResolvedValueOnce({ wasApplied: () => false })

    expect(await createStore().consumeRefreshToken('token-1')).toBeNull()
  })

  it('should return null for an unknown refresh token', async () => {
    mockExecute.mockResolvedValueOnce({ rows: [] })

    expect(await createStore().consumeRefreshToken('missing')).toBeNull()
    expect(mockExecute).toHaveBeenCalledTimes(1)
  })
})
