/**
 * Diagnostics and observability for @llm-dispatch/fetch-client
 *
 * Uses Node.js diagnostics_channel for emitting per-call events.
 */
import diagnostics_channel from 'node:diagnostics_channel';
import type { ProviderCallEvent } from './types.mjs';

/**
 * Channel names
 */
export const CHANNELS = {
  PROVIDER_CALL: 'llm-dispatch:provider:call',
} as const;

function isProviderCallEvent(message: unknown): message is ProviderCallEvent {
  return (
    typeof message === 'object' &&
    message !== null &&
    'providerId' in message &&
    'statusKind' in message &&
    'latencyMs' in message
  );
}

/**
 * Emit a provider call event
 */
export function emitProviderCall(event: ProviderCallEvent): void {
  const channel = diagnostics_channel.channel(CHANNELS.PROVIDER_CALL);
  if (channel.hasSubscribers) {
    channel.publish(event);
  }
}

/**
 * Subscribe to provider call events
 *
 * @returns Unsubscribe function
 */
export function onProviderCall(handler: (event: ProviderCallEvent) => void): () => void {
  const channel = diagnostics_channel.channel(CHANNELS.PROVIDER_CALL);
  const listener = (message: unknown): void => {
    if (isProviderCallEvent(message)) {
      handler(message);
    }
  };
  channel.subscribe(listener);
  return () => {
    channel.unsubscribe(listener);
  };
}
