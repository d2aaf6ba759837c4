/**
 * OpenAI-compatible adapter
 *
 * Error bodies look like `{ "error": { "message", "type", "code" } }`.
 */
import type { ErrorKind, JsonObject, JsonValue } from '../types.mjs';
import { isJsonObject, stringField } from '../json.mjs';
import type { Provider } from './types.mjs';
import { errorDetail, kindFromStatus } from './classify.mjs';

const AUTH_CODES = new Set(['invalid_api_key', 'invalid_authentication', 'account_deactivated']);
const RATE_LIMIT_CODES = new Set(['rate_limit_exceeded', 'insufficient_quota']);

const KIND_BY_TYPE = new Map<string, ErrorKind>([
  ['authentication_error', 'authentication'],
  ['permission_error', 'authentication'],
  ['rate_limit_error', 'rate-limit'],
  ['insufficient_quota', 'rate-limit'],
  ['invalid_request_error', 'malformed-request'],
  ['not_found_error', 'malformed-request'],
  ['server_error', 'server-error'],
  ['api_error', 'server-error'],
  ['overloaded_error', 'server-error'],
]);

function codeOf(error: JsonObject): string | undefined {
  const code = error['code'];
  if (typeof code === 'string') return code;
  if (typeof code === 'number') return String(code);
  return undefined;
}

function kindFromBody(error: JsonObject | undefined): ErrorKind {
  if (!error) return 'unknown';
  const code = codeOf(error);
  if (code && AUTH_CODES.has(code)) return 'authentication';
  if (code && RATE_LIMIT_CODES.has(code)) return 'rate-limit';
  const type = stringField(error, 'type');
  return (type ? KIND_BY_TYPE.get(type) : undefined) ?? 'unknown';
}

/**
 * Assistant text of the first choice of a streamed chunk
 */
export function extractChoiceDelta(chunk: JsonValue): string | null {
  if (!isJsonObject(chunk)) return null;
  const choices = chunk['choices'];
  if (!Array.isArray(choices) || choices.length === 0) return null;
  const first = choices[0];
  const delta = isJsonObject(first) ? first['delta'] : undefined;
  const content = stringField(delta, 'content');
  return content ?? null;
}

/**
 * Body for an OpenAI-style completion POST
 */
export function buildChatBody(payload: Readonly<JsonObject>, streaming: boolean): JsonObject {
  return { ...payload, stream: streaming };
}

export const openAiProvider: Provider = {
  kind: 'openai',

  buildBody(envelope) {
    return buildChatBody(envelope.payload, envelope.streaming);
  },

  classifyError(status, body, text) {
    const field = isJsonObject(body) ? body['error'] : undefined;
    const error = isJsonObject(field) ? field : undefined;
    const kind = kindFromStatus(status) ?? kindFromBody(error);
    return errorDetail(kind, status, body, text, {
      message: stringField(error, 'message'),
      code: error ? codeOf(error) : undefined,
    });
  },

  extractDelta: extractChoiceDelta,
};
