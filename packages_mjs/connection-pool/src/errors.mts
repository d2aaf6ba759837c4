/**
 * Errors for connection-pool
 */

export type ConnectionAcquireErrorCode =
  | 'POOL_CLOSED'
  | 'POOL_FULL'
  | 'QUEUE_FULL'
  | 'QUEUE_TIMEOUT'
  | 'ABORTED';

/**
 * A slot could not be acquired
 */
export class ConnectionAcquireError extends Error {
  readonly code: ConnectionAcquireErrorCode;

  constructor(code: ConnectionAcquireErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionAcquireError';
    this.code = code;
  }
}
