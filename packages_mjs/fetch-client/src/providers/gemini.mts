/**
 * Gemini adapter (OpenAI-compatible endpoint)
 *
 * Error bodies use the Google API shape `{ "error": { "code", "message", "status" } }`,
 * sometimes wrapped in an array.
 */
import type { ErrorKind, JsonObject, JsonValue } from '../types.mjs';
import { isJsonObject, stringField } from '../json.mjs';
import type { Provider } from './types.mjs';
import { errorDetail, kindFromStatus } from './classify.mjs';
import { buildChatBody, extractChoiceDelta } from './openai.mjs';

const KIND_BY_STATUS = new Map<string, ErrorKind>([
  ['UNAUTHENTICATED', 'authentication'],
  ['PERMISSION_DENIED', 'authentication'],
  ['RESOURCE_EXHAUSTED', 'rate-limit'],
  ['INVALID_ARGUMENT', 'malformed-request'],
  ['FAILED_PRECONDITION', 'malformed-request'],
  ['NOT_FOUND', 'malformed-request'],
  ['INTERNAL', 'server-error'],
  ['UNAVAILABLE', 'server-error'],
  ['DEADLINE_EXCEEDED', 'server-error'],
]);

function findError(body: JsonValue | undefined): JsonObject | undefined {
  const container = Array.isArray(body) ? body[0] : body;
  const error = isJsonObject(container) ? container['error'] : undefined;
  return isJsonObject(error) ? error : undefined;
}

/**
 * Text of a native generateContent chunk
 */
function extractCandidateText(chunk: JsonValue): string | null {
  if (!isJsonObject(chunk)) return null;
  const candidates = chunk['candidates'];
  const first = Array.isArray(candidates) ? candidates[0] : undefined;
  if (!isJsonObject(first)) return null;
  const content = first['content'];
  const parts = isJsonObject(content) ? content['parts'] : undefined;
  if (!Array.isArray(parts)) return null;
  const text = parts.map((part) => stringField(part, 'text') ?? '').join('');
  return text || null;
}

export const geminiProvider: Provider = {
  kind: 'gemini',

  buildBody(envelope) {
    return buildChatBody(envelope.payload, envelope.streaming);
  },

  classifyError(status, body, text) {
    const error = findError(body);
    const googleStatus = stringField(error, 'status');
    const kind =
      kindFromStatus(status) ?? (googleStatus ? KIND_BY_STATUS.get(googleStatus) : undefined) ?? 'unknown';
    return errorDetail(kind, status, body, text, {
      message: stringField(error, 'message'),
      code: googleStatus,
    });
  },

  extractDelta(chunk) {
    return extractChoiceDelta(chunk) ?? extractCandidateText(chunk);
  },
};
