/**
 * Configuration utilities for connection-pool
 */

import { v4 as uuidv4 } from 'uuid';
import type { ConnectionPoolConfig } from './types.mjs';

/**
 * Default connection pool configuration
 */
export const DEFAULT_CONNECTION_POOL_CONFIG: Required<ConnectionPoolConfig> = {
  id: 'default-pool',
  maxConnections: 100,
  queueRequests: true,
  maxQueueSize: 1000,
  queueTimeoutMs: 30000,
};

/**
 * Merge user config with defaults
 */
export function mergeConfig(
  userConfig: ConnectionPoolConfig
): Required<ConnectionPoolConfig> {
  return {
    id: userConfig.id,
    maxConnections: userConfig.maxConnections ?? DEFAULT_CONNECTION_POOL_CONFIG.maxConnections,
    queueRequests: userConfig.queueRequests ?? DEFAULT_CONNECTION_POOL_CONFIG.queueRequests,
    maxQueueSize: userConfig.maxQueueSize ?? DEFAULT_CONNECTION_POOL_CONFIG.maxQueueSize,
    queueTimeoutMs: userConfig.queueTimeoutMs ?? DEFAULT_CONNECTION_POOL_CONFIG.queueTimeoutMs,
  };
}

/**
 * Validate configuration values
 */
export function validateConfig(config: ConnectionPoolConfig): string[] {
  const errors: string[] = [];

  if (!config.id) {
    errors.push('id is required');
  }

  if (
    config.maxConnections !== undefined &&
    (!Number.isInteger(config.maxConnections) || config.maxConnections < 1)
  ) {
    errors.push('maxConnections must be an integer of at least 1');
  }

  if (config.maxQueueSize !== undefined && config.maxQueueSize < 0) {
    errors.push('maxQueueSize must be non-negative');
  }

  if (config.queueTimeoutMs !== undefined && config.queueTimeoutMs < 0) {
    errors.push('queueTimeoutMs must be non-negative');
  }

  return errors;
}

/**
 * Generate a unique connection ID
 */
export function generateConnectionId(): string {
  return `conn-${uuidv4()}`;
}
