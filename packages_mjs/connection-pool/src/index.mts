/**
 * Connection pool package exports
 */

// Types
export type {
  ConnectionState,
  PoolState,
  PooledConnection,
  ConnectionPoolConfig,
  ConnectionPoolStats,
  ConnectionPoolEventType,
  ConnectionPoolEvent,
  ConnectionPoolEventListener,
  AcquireOptions,
  AcquiredConnection,
} from './types.mjs';

// Config utilities
export {
  DEFAULT_CONNECTION_POOL_CONFIG,
  mergeConfig,
  validateConfig,
  generateConnectionId,
} from './config.mjs';

// Errors
export { ConnectionAcquireError, type ConnectionAcquireErrorCode } from './errors.mjs';

// Main pool
export { ConnectionPool } from './pool.mjs';
