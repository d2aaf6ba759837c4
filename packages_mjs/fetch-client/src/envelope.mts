/**
 * Request envelope construction
 */
import type { ChatMessage, JsonObject, JsonValue, RequestEnvelope } from './types.mjs';

function deepFreeze(value: JsonValue): void {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
}

/**
 * Create an immutable envelope. The payload is deep-copied so later changes
 * to the caller's object do not leak into in-flight calls.
 */
export function createEnvelope(
  payload: JsonObject,
  options: { streaming?: boolean } = {}
): RequestEnvelope {
  const copy = structuredClone(payload);
  deepFreeze(copy);

  return Object.freeze<RequestEnvelope>({
    payload: copy,
    streaming: options.streaming ?? false,
  });
}

/**
 * Create an OpenAI-style chat completion envelope
 *
 * @example
 * const envelope = createChatEnvelope([{ role: 'user', content: 'Hello' }], 'gpt-4o-mini');
 */
export function createChatEnvelope(
  messages: ChatMessage[],
  model: string,
  options: { streaming?: boolean; extra?: JsonObject } = {}
): RequestEnvelope {
  const payloadMessages: JsonObject[] = messages.map((message) => ({
    role: message.role,
    content: message.content,
    ...(message.name !== undefined && { name: message.name }),
  }));

  return createEnvelope(
    { ...options.extra, model, messages: payloadMessages },
    { streaming: options.streaming }
  );
}
