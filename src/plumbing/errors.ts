/**
 * Raised when a backing store (ScyllaDB) cannot serve a request.
 * Surfaces as 503 server_error, never as a client error.
 */
export class StoreUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'StoreUnavailableError'
  }
}
