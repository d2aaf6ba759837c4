/**
 * Connection pool implementation
 */

import { createLogger } from '@llm-dispatch/logger';
import type {
  PooledConnection,
  PoolState,
  ConnectionPoolConfig,
  ConnectionPoolStats,
  ConnectionPoolEventType,
  ConnectionPoolEvent,
  ConnectionPoolEventListener,
  AcquireOptions,
  AcquiredConnection,
} from './types.mjs';
import { mergeConfig, validateConfig, generateConnectionId } from './config.mjs';
import { ConnectionAcquireError } from './errors.mjs';

const log = createLogger('connection-pool.pool');

/**
 * Pending request in the queue
 */
interface PendingRequest {
  options: AcquireOptions;
  resolve: (value: AcquiredConnection) => void;
  reject: (error: Error) => void;
  addedAt: number;
  cleanup: () => void;
}

/**
 * Bounded connection pool with a priority wait queue.
 *
 * All slot accounting happens synchronously, so concurrent callers never
 * observe more than maxConnections active slots.
 */
export class ConnectionPool {
  private readonly config: Required<ConnectionPoolConfig>;
  private readonly listeners: Map<ConnectionPoolEventType, Set<ConnectionPoolEventListener>> = new Map();
  private readonly pendingQueue: PendingRequest[] = [];
  private readonly active: Map<string, PooledConnection> = new Map();
  private readonly drainWaiters: Array<() => void> = [];
  private state: PoolState = 'open';
  private closePromise?: Promise<void>;

  // Statistics
  private stats = {
    totalAcquired: 0,
    totalReleased: 0,
    totalFailed: 0,
    timedOutRequests: 0,
    abortedRequests: 0,
    totalHoldDurationMs: 0,
  };

  constructor(config: ConnectionPoolConfig) {
    const errors = validateConfig(config);
    if (errors.length > 0) {
      throw new Error(`Invalid connection pool config: ${errors.join('; ')}`);
    }
    this.config = mergeConfig(config);
  }

  /**
   * Get the pool ID
   */
  get id(): string {
    return this.config.id;
  }

  /**
   * Number of slots currently held
   */
  get size(): number {
    return this.active.size;
  }

  /**
   * Whether the pool stopped accepting requests
   */
  get isClosed(): boolean {
    return this.state !== 'open';
  }

  /**
   * Acquire a slot, waiting in the queue when the pool is at capacity
   */
  async acquire(options: AcquireOptions = {}): Promise<AcquiredConnection> {
    if (this.state !== 'open') {
      throw new ConnectionAcquireError('POOL_CLOSED', `Connection pool ${this.id} is closed`);
    }

    if (options.signal?.aborted) {
      this.stats.abortedRequests++;
      throw new ConnectionAcquireError('ABORTED', 'Request aborted', { cause: options.signal.reason });
    }

    if (this.active.size < this.config.maxConnections) {
      return this.grant(options, 0);
    }

    // Pool is at capacity - queue the request if enabled
    if (!this.config.queueRequests) {
      this.emit('pool:full');
      throw new ConnectionAcquireError('POOL_FULL', `Connection pool ${this.id} is full`);
    }

    if (this.pendingQueue.length >= this.config.maxQueueSize) {
      this.emit('queue:overflow');
      throw new ConnectionAcquireError('QUEUE_FULL', `Request queue of pool ${this.id} is full`);
    }

    return this.enqueueRequest(options);
  }

  /**
   * Run fn while holding a slot. The slot is released on success and
   * failed on error; either way it returns to the pool.
   */
  async withConnection<T>(
    fn: (connection: PooledConnection) => Promise<T>,
    options: AcquireOptions = {}
  ): Promise<T> {
    const acquired = await this.acquire(options);
    try {
      const result = await fn(acquired.connection);
      acquired.release();
      return result;
    } catch (error) {
      acquired.fail(error instanceof Error ? error : new Error(String(error)));
      throw error;
    }
  }

  /**
   * Get pool statistics
   */
  getStats(): ConnectionPoolStats {
    const finished = this.stats.totalReleased + this.stats.totalFailed;
    return {
      state: this.state,
      maxConnections: this.config.maxConnections,
      activeConnections: this.active.size,
      availableConnections:
        this.state === 'open' ? this.config.maxConnections - this.active.size : 0,
      pendingRequests: this.pendingQueue.length,
      totalAcquired: this.stats.totalAcquired,
      totalReleased: this.stats.totalReleased,
      totalFailed: this.stats.totalFailed,
      timedOutRequests: this.stats.timedOutRequests,
      abortedRequests: this.stats.abortedRequests,
      avgHoldDurationMs: finished > 0 ? this.stats.totalHoldDurationMs / finished : 0,
    };
  }

  /**
   * Drain the pool: stop accepting requests, reject queued ones and
   * resolve once every held slot has been released
   */
  drain(): Promise<void> {
    if (this.state === 'open') {
      this.state = 'draining';
      const pending = this.pendingQueue.splice(0, this.pendingQueue.length);
      for (const request of pending) {
        request.cleanup();
        request.reject(new ConnectionAcquireError('POOL_CLOSED', `Connection pool ${this.id} is draining`));
      }
    }

    if (this.active.size === 0) {
      this.emit('pool:drained');
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.drainWaiters.push(resolve);
    });
  }

  /**
   * Close the pool after in-flight slots are released. Idempotent.
   */
  close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = this.drain().then(() => {
        this.state = 'closed';
        log.debug({ poolId: this.id }, 'Connection pool closed');
        this.emit('pool:closed');
      });
    }
    return this.closePromise;
  }

  /**
   * Add an event listener
   */
  on(type: ConnectionPoolEventType, listener: ConnectionPoolEventListener): void {
    let listeners = this.listeners.get(type);
    if (!listeners) {
      listeners = new Set();
      this.listeners.set(type, listeners);
    }
    listeners.add(listener);
  }

  /**
   * Remove an event listener
   */
  off(type: ConnectionPoolEventType, listener: ConnectionPoolEventListener): void {
    const listeners = this.listeners.get(type);
    if (listeners) {
      listeners.delete(listener);
    }
  }

  /**
   * Hand out a new slot
   */
  private grant(options: AcquireOptions, waitedMs: number): AcquiredConnection {
    const connection: PooledConnection = {
      id: generateConnectionId(),
      state: 'active',
      acquiredAt: Date.now(),
      waitedMs,
      metadata: options.metadata,
    };

    this.active.set(connection.id, connection);
    this.stats.totalAcquired++;
    this.emit('connection:acquired', connection.id, { waitedMs });

    let settled = false;
    return {
      connection,
      release: () => {
        if (settled) return;
        settled = true;
        this.finish(connection, 'released');
      },
      fail: (error?: Error) => {
        if (settled) return;
        settled = true;
        this.finish(connection, 'failed', error);
      },
    };
  }

  /**
   * Return a slot to the pool
   */
  private finish(connection: PooledConnection, state: 'released' | 'failed', error?: Error): void {
    this.active.delete(connection.id);
    connection.state = state;
    this.stats.totalHoldDurationMs += Date.now() - connection.acquiredAt;

    if (state === 'released') {
      this.stats.totalReleased++;
      this.emit('connection:released', connection.id);
    } else {
      this.stats.totalFailed++;
      this.emit('connection:failed', connection.id, { error: error?.message });
    }

    if (this.state === 'open') {
      this.processPendingQueue();
    } else if (this.active.size === 0) {
      this.emit('pool:drained');
      const waiters = this.drainWaiters.splice(0, this.drainWaiters.length);
      for (const resolve of waiters) {
        resolve();
      }
    }
  }

  /**
   * Enqueue a request when pool is at capacity
   */
  private enqueueRequest(options: AcquireOptions): Promise<AcquiredConnection> {
    return new Promise((resolve, reject) => {
      let timeoutId: ReturnType<typeof setTimeout> | undefined;

      const onAbort = (): void => {
        if (this.removePending(pending)) {
          this.stats.abortedRequests++;
          this.emit('queue:aborted');
          reject(new ConnectionAcquireError('ABORTED', 'Request aborted', { cause: options.signal?.reason }));
        }
      };

      const pending: PendingRequest = {
        options,
        resolve,
        reject,
        addedAt: Date.now(),
        cleanup: () => {
          if (timeoutId) {
            clearTimeout(timeoutId);
          }
          options.signal?.removeEventListener('abort', onAbort);
        },
      };

      const timeoutMs = options.timeoutMs ?? this.config.queueTimeoutMs;
      if (timeoutMs > 0) {
        timeoutId = setTimeout(() => {
          if (this.removePending(pending)) {
            this.stats.timedOutRequests++;
            this.emit('queue:timeout', undefined, { timeoutMs });
            reject(
              new ConnectionAcquireError(
                'QUEUE_TIMEOUT',
                `Connection acquisition timed out after ${timeoutMs}ms`
              )
            );
          }
        }, timeoutMs);
      }

      options.signal?.addEventListener('abort', onAbort, { once: true });

      // Add to queue (sorted by priority)
      this.insertByPriority(pending);
      this.emit('queue:added', undefined, { pending: this.pendingQueue.length });
    });
  }

  /**
   * Remove a pending request and clear its timers. False if it already left the queue.
   */
  private removePending(pending: PendingRequest): boolean {
    const index = this.pendingQueue.indexOf(pending);
    if (index === -1) {
      return false;
    }
    this.pendingQueue.splice(index, 1);
    pending.cleanup();
    return true;
  }

  /**
   * Insert a pending request by priority (higher priority first, FIFO within a priority)
   */
  private insertByPriority(pending: PendingRequest): void {
    const priority = pending.options.priority ?? 0;
    let insertIndex = this.pendingQueue.length;

    for (let i = 0; i < this.pendingQueue.length; i++) {
      const existingPriority = this.pendingQueue[i].options.priority ?? 0;
      if (priority > existingPriority) {
        insertIndex = i;
        break;
      }
    }

    this.pendingQueue.splice(insertIndex, 0, pending);
  }

  /**
   * Hand freed slots to waiting requests
   */
  private processPendingQueue(): void {
    while (this.pendingQueue.length > 0 && this.active.size < this.config.maxConnections) {
      const pending = this.pendingQueue.shift();
      if (!pending) {
        break;
      }
      pending.cleanup();
      pending.resolve(this.grant(pending.options, Date.now() - pending.addedAt));
    }
  }

  /**
   * Emit an event
   */
  private emit(
    type: ConnectionPoolEventType,
    connectionId?: string,
    data?: Record<string, unknown>
  ): void {
    const listeners = this.listeners.get(type);
    if (!listeners) {
      return;
    }

    const event: ConnectionPoolEvent = {
      type,
      poolId: this.config.id,
      connectionId,
      data,
      timestamp: Date.now(),
    };

    for (const listener of listeners) {
      try {
        listener(event);
      } catch (error) {
        log.warn({ err: error, type }, 'Connection pool listener threw');
      }
    }
  }
}
