/**
 * Status-based failure classification shared by the adapters
 */
import type { ErrorDetail, ErrorKind, JsonValue } from '../types.mjs';

const MAX_RAW_TEXT = 500;

/**
 * Classify by HTTP status alone. Undefined when the status is inconclusive.
 */
export function kindFromStatus(status: number): ErrorKind | undefined {
  if (status === 401 || status === 403) return 'authentication';
  if (status === 429) return 'rate-limit';
  if (status === 400 || status === 404 || status === 413 || status === 422) return 'malformed-request';
  if (status >= 500) return 'server-error';
  return undefined;
}

/**
 * Build an ErrorDetail, falling back to the response text for the message
 */
export function errorDetail(
  kind: ErrorKind,
  status: number,
  body: JsonValue | undefined,
  text: string,
  fields: { message?: string; code?: string } = {}
): ErrorDetail {
  const trimmed = text.trim();
  return {
    kind,
    message: fields.message || trimmed.slice(0, MAX_RAW_TEXT) || `HTTP ${status}`,
    httpStatus: status,
    ...(fields.code !== undefined && { code: fields.code }),
    raw: body ?? (trimmed ? trimmed.slice(0, MAX_RAW_TEXT) : undefined),
  };
}
