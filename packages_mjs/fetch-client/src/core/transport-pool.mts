/**
 * Connection slots plus the undici dispatcher they gate, owned by one client
 */
import type { Dispatcher } from 'undici';
import {
  ConnectionPool,
  type AcquireOptions,
  type AcquiredConnection,
  type ConnectionPoolStats,
} from '@llm-dispatch/connection-pool';
import type { ResolvedProxy } from '@llm-dispatch/fetch-proxy-config';
import { createProxyDispatcher, resolveTransportOptions } from '@llm-dispatch/fetch-proxy-dispatcher';
import { createLogger, maskProxyUrl } from '@llm-dispatch/logger';
import type { ClientPoolOptions } from '../types.mjs';

const log = createLogger('fetch-client.transport-pool');

/**
 * TransportPool options
 */
export interface TransportPoolOptions extends ClientPoolOptions {
  id: string;
}

/**
 * Bounded transport for one client.
 *
 * Every request holds a slot for its whole lifetime, so the number of
 * concurrent requests (and sockets) never exceeds maxConnections.
 */
export class TransportPool {
  readonly dispatcher: Dispatcher;
  private readonly slots: ConnectionPool;
  private closePromise?: Promise<void>;

  constructor(proxy: ResolvedProxy, options: TransportPoolOptions) {
    const transport = resolveTransportOptions(options);
    this.slots = new ConnectionPool({
      id: options.id,
      maxConnections: transport.maxConnections,
      maxQueueSize: options.maxQueueSize,
      queueTimeoutMs: options.queueTimeoutMs,
    });
    this.dispatcher = createProxyDispatcher(proxy, transport);

    log.debug(
      {
        poolId: options.id,
        maxConnections: transport.maxConnections,
        proxy: maskProxyUrl(proxy.url),
        source: proxy.source,
      },
      'Transport pool created'
    );
  }

  get id(): string {
    return this.slots.id;
  }

  get isClosed(): boolean {
    return this.slots.isClosed;
  }

  /**
   * Acquire a request slot
   */
  acquire(options?: AcquireOptions): Promise<AcquiredConnection> {
    return this.slots.acquire(options);
  }

  getStats(): ConnectionPoolStats {
    return this.slots.getStats();
  }

  /**
   * Wait for in-flight requests, then close the sockets. Idempotent.
   */
  close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = this.slots.close().then(async () => {
        await this.dispatcher.close();
        log.debug({ poolId: this.id }, 'Transport pool closed');
      });
    }
    return this.closePromise;
  }
}
