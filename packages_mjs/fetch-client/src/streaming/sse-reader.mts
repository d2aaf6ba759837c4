/**
 * Server-Sent Events (SSE) stream parser
 */
import type { SSEEvent, JsonValue } from '../types.mjs';
import { tryParseJson } from '../json.mjs';

/**
 * Parse SSE stream from a readable body
 *
 * @param body - undici response body or any byte iterable
 * @yields SSEEvent objects
 */
export async function* parseSSEStream(
  body: AsyncIterable<Uint8Array | string>
): AsyncGenerator<SSEEvent, void, unknown> {
  const decoder = new TextDecoder();
  let buffer = '';

  for await (const chunk of body) {
    buffer += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });

    // A trailing CR may be the first half of a CRLF split across chunks
    const pendingCR = buffer.endsWith('\r');
    const text = (pendingCR ? buffer.slice(0, -1) : buffer).replace(/\r\n?/g, '\n');

    // Split on blank lines (SSE event delimiter)
    const parts = text.split('\n\n');

    // Keep the last part in buffer (may be incomplete)
    buffer = (parts.pop() ?? '') + (pendingCR ? '\r' : '');

    for (const part of parts) {
      const event = parseSSEEvent(part);
      if (event) {
        yield event;
      }
    }
  }

  buffer += decoder.decode();
  if (buffer.trim()) {
    const event = parseSSEEvent(buffer.replace(/\r\n?/g, '\n'));
    if (event) {
      yield event;
    }
  }
}

/**
 * Parse a single SSE event from text
 *
 * @returns Parsed SSEEvent or null if it carries neither data nor an event name
 */
export function parseSSEEvent(text: string): SSEEvent | null {
  const lines = text.split('\n');
  const event: SSEEvent = { data: '' };
  const dataLines: string[] = [];

  for (const line of lines) {
    if (line.startsWith(':')) {
      // Comment line, ignore
      continue;
    }

    const colonIndex = line.indexOf(':');
    if (colonIndex === -1) {
      continue;
    }

    const field = line.slice(0, colonIndex);
    // Value starts after colon, strip leading space if present
    let value = line.slice(colonIndex + 1);
    if (value.startsWith(' ')) {
      value = value.slice(1);
    }

    switch (field) {
      case 'event':
        event.event = value;
        break;
      case 'id':
        event.id = value;
        break;
      case 'retry': {
        const retry = parseInt(value, 10);
        if (!Number.isNaN(retry)) {
          event.retry = retry;
        }
        break;
      }
      case 'data':
        dataLines.push(value);
        break;
    }
  }

  event.data = dataLines.join('\n');

  if (!event.data && !event.event) {
    return null;
  }

  return event;
}

/**
 * Parse SSE data field as JSON
 *
 * @returns Parsed JSON, or null for the `[DONE]` marker and unparseable data
 */
export function parseSSEData(event: SSEEvent): JsonValue | null {
  if (!event.data) {
    return null;
  }

  // OpenAI-style end-of-stream marker
  if (event.data.trim() === '[DONE]') {
    return null;
  }

  return tryParseJson(event.data) ?? null;
}
