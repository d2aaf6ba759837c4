/**
 * Type definitions for connection-pool
 */

/**
 * Connection slot state
 */
export type ConnectionState = 'active' | 'released' | 'failed';

/**
 * Pool lifecycle state
 */
export type PoolState = 'open' | 'draining' | 'closed';

/**
 * A slot held by one in-flight request
 */
export interface PooledConnection {
  /** Unique connection ID */
  id: string;
  /** Current state */
  state: ConnectionState;
  /** When the slot was acquired (Unix timestamp) */
  acquiredAt: number;
  /** Time spent waiting in the queue in ms */
  waitedMs: number;
  /** Custom metadata */
  metadata?: Record<string, unknown>;
}

/**
 * Connection pool configuration
 */
export interface ConnectionPoolConfig {
  /** Unique identifier for this pool */
  id: string;
  /** Maximum concurrent connections. Default: 100 */
  maxConnections?: number;
  /** Queue pending requests when at capacity. Default: true */
  queueRequests?: boolean;
  /** Max pending requests in queue. Default: 1000 */
  maxQueueSize?: number;
  /** Request timeout while waiting in queue in ms, 0 for none. Default: 30000 */
  queueTimeoutMs?: number;
}

/**
 * Connection pool statistics
 */
export interface ConnectionPoolStats {
  /** Pool state */
  state: PoolState;
  /** Configured limit */
  maxConnections: number;
  /** Currently held slots */
  activeConnections: number;
  /** Slots that can be acquired without waiting */
  availableConnections: number;
  /** Pending requests in queue */
  pendingRequests: number;
  /** Total slots handed out */
  totalAcquired: number;
  /** Total slots released normally */
  totalReleased: number;
  /** Total slots released as failed */
  totalFailed: number;
  /** Queued requests that timed out */
  timedOutRequests: number;
  /** Queued requests aborted by their signal */
  abortedRequests: number;
  /** Average time a slot was held in ms */
  avgHoldDurationMs: number;
}

/**
 * Pool event types
 */
export type ConnectionPoolEventType =
  | 'connection:acquired'
  | 'connection:released'
  | 'connection:failed'
  | 'pool:full'
  | 'pool:drained'
  | 'pool:closed'
  | 'queue:added'
  | 'queue:timeout'
  | 'queue:aborted'
  | 'queue:overflow';

/**
 * Pool event
 */
export interface ConnectionPoolEvent {
  type: ConnectionPoolEventType;
  poolId: string;
  connectionId?: string;
  data?: Record<string, unknown>;
  timestamp: number;
}

/**
 * Event listener type
 */
export type ConnectionPoolEventListener = (event: ConnectionPoolEvent) => void;

/**
 * Connection acquisition options
 */
export interface AcquireOptions {
  /** Priority (higher = more urgent). Default: 0 */
  priority?: number;
  /** Timeout for waiting in the queue in ms. Default: config.queueTimeoutMs */
  timeoutMs?: number;
  /** Abort signal; removes the request from the queue */
  signal?: AbortSignal;
  /** Custom metadata to attach to connection */
  metadata?: Record<string, unknown>;
}

/**
 * Acquired connection handle
 */
export interface AcquiredConnection {
  /** The connection */
  connection: PooledConnection;
  /** Release the connection back to the pool. Safe to call more than once. */
  release: () => void;
  /** Release the connection and count it as failed. Safe to call more than once. */
  fail: (error?: Error) => void;
}
