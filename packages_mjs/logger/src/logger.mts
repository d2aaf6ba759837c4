/**
 * Shared pino logger for the dispatch packages
 */
import process from 'node:process';
import pino from 'pino';
import type { Logger } from 'pino';

/**
 * Pretty output is on by default for interactive use.
 * Disable with LOG_PRETTY=false; it is always off under test runners.
 */
function usePrettyTransport(): boolean {
  const pretty = process.env['LOG_PRETTY']?.toLowerCase();
  if (pretty === 'false' || pretty === '0') {
    return false;
  }
  return process.env['NODE_ENV'] !== 'test' && process.env['VITEST'] === undefined;
}

let rootLogger: Logger | undefined;

/**
 * Get the root logger, creating it on first use
 */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({
      name: 'llm-dispatch',
      level: process.env['LOG_LEVEL'] ?? 'info',
      ...(usePrettyTransport() && {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
          },
        },
      }),
    });
  }
  return rootLogger;
}

/**
 * Create a module-scoped child logger
 *
 * @example
 * const log = createLogger('fetch-proxy-config.resolver');
 * log.debug({ source: 'explicit' }, 'Resolved proxy');
 */
export function createLogger(module: string): Logger {
  return getRootLogger().child({ module });
}

export type { Logger };
