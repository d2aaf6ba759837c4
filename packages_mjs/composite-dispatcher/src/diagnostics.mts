/**
 * Diagnostics for @llm-dispatch/composite-dispatcher
 *
 * Uses Node.js diagnostics_channel, like the per-provider events of
 * @llm-dispatch/fetch-client.
 */
import diagnostics_channel from 'node:diagnostics_channel';
import type { CompositeEndEvent } from './types.mjs';

export const CHANNELS = {
  COMPOSITE_END: 'llm-dispatch:composite:end',
} as const;

function isCompositeEndEvent(message: unknown): message is CompositeEndEvent {
  return (
    typeof message === 'object' &&
    message !== null &&
    'callId' in message &&
    'policy' in message &&
    'outcome' in message
  );
}

export function emitCompositeEnd(event: CompositeEndEvent): void {
  const channel = diagnostics_channel.channel(CHANNELS.COMPOSITE_END);
  if (channel.hasSubscribers) {
    channel.publish(event);
  }
}

/**
 * Subscribe to composite call events
 *
 * @returns Unsubscribe function
 */
export function onCompositeEnd(handler: (event: CompositeEndEvent) => void): () => void {
  const channel = diagnostics_channel.channel(CHANNELS.COMPOSITE_END);
  const listener = (message: unknown): void => {
    if (isCompositeEndEvent(message)) {
      handler(message);
    }
  };
  channel.subscribe(listener);
  return () => {
    channel.unsubscribe(listener);
  };
}
