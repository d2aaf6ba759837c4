/**
 * Tests for transport-pool.mts
 * State Transition Testing: open → closed, dispatcher selection
 */
import { describe, it, expect, vi } from 'vitest';
import { Agent, ProxyAgent } from 'undici';
import { ConnectionAcquireError } from '@llm-dispatch/connection-pool';
import type { ResolvedProxy } from '@llm-dispatch/fetch-proxy-config';
import { TransportPool } from '../src/core/transport-pool.mjs';

const direct: ResolvedProxy = { url: null, source: 'none', trustEnv: true };
const explicit: ResolvedProxy = { url: 'http://proxy.internal:3128', source: 'explicit', trustEnv: false };

describe('TransportPool', () => {
  it('should use a direct agent without a proxy', async () => {
    const pool = new TransportPool(direct, { id: 'direct-pool' });

    expect(pool.dispatcher).toBeInstanceOf(Agent);
    expect(pool.dispatcher).not.toBeInstanceOf(ProxyAgent);
    expect(pool.getStats().maxConnections).toBe(100);

    await pool.close();
  });

  it('should use a proxy agent for a resolved proxy', async () => {
    const pool = new TransportPool(explicit, { id: 'proxy-pool', maxConnections: 8 });

    expect(pool.dispatcher).toBeInstanceOf(ProxyAgent);
    expect(pool.getStats().maxConnections).toBe(8);

    await pool.close();
  });

  it('should close slots before the dispatcher', async () => {
    const pool = new TransportPool(direct, { id: 'close-pool', maxConnections: 1 });
    const closeSpy = vi.spyOn(pool.dispatcher, 'close');

    const held = await pool.acquire();
    const closing = pool.close();
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(closeSpy).not.toHaveBeenCalled();

    held.release();
    await closing;

    expect(closeSpy).toHaveBeenCalledTimes(1);
    expect(pool.isClosed).toBe(true);
  });

  it('should be idempotent', async () => {
    const pool = new TransportPool(direct, { id: 'idempotent-pool' });
    const closeSpy = vi.spyOn(pool.dispatcher, 'close');

    expect(pool.close()).toBe(pool.close());
    await pool.close();

    expect(closeSpy).toHaveBeenCalledTimes(1);
  });

  it('should refuse slots after close', async () => {
    const pool = new TransportPool(direct, { id: 'closed-pool' });
    await pool.close();

    await expect(pool.acquire()).rejects.toBeInstanceOf(ConnectionAcquireError);
  });
});
