/**
 * JSON helpers
 */
import type { JsonObject, JsonValue } from './types.mjs';

/**
 * Parse JSON text, returning undefined when it is not valid JSON
 */
export function tryParseJson(text: string): JsonValue | undefined {
  try {
    const value: JsonValue = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a string field from an object, if present
 */
export function stringField(value: JsonValue | undefined, key: string): string | undefined {
  if (!isJsonObject(value)) {
    return undefined;
  }
  const field = value[key];
  return typeof field === 'string' ? field : undefined;
}
