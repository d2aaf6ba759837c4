/**
 * Default body merging for composite calls
 */
import { isJsonObject, stringField } from '@llm-dispatch/fetch-client';
import type { JsonObject, JsonValue } from '@llm-dispatch/fetch-client';
import type { BodyMerger } from './types.mjs';

function isChatCompletion(body: JsonValue): body is JsonObject {
  return isJsonObject(body) && Array.isArray(body['choices']);
}

function sumUsage(bodies: readonly JsonObject[]): JsonObject | undefined {
  let total: JsonObject | undefined;
  for (const body of bodies) {
    const usage = body['usage'];
    if (!isJsonObject(usage)) continue;
    total ??= {};
    for (const [key, value] of Object.entries(usage)) {
      if (typeof value !== 'number') continue;
      const current = total[key];
      total[key] = (typeof current === 'number' ? current : 0) + value;
    }
  }
  return total;
}

/**
 * Concatenate the choices of several chat completions, re-indexed and
 * tagged with the provider they came from
 */
export function mergeChatCompletions(
  successes: readonly { providerId: string; body: JsonObject }[],
  callId: string
): JsonObject {
  const choices: JsonValue[] = [];
  for (const { providerId, body } of successes) {
    const bodyChoices = body['choices'];
    if (!Array.isArray(bodyChoices)) continue;
    for (const choice of bodyChoices) {
      if (!isJsonObject(choice)) continue;
      choices.push({ ...choice, index: choices.length, provider_id: providerId });
    }
  }

  const merged: JsonObject = {
    id: callId,
    object: 'chat.completion',
    created: Math.floor(Date.now() / 1000),
    choices,
  };

  const models = new Set(successes.map(({ body }) => stringField(body, 'model')));
  const [model] = models;
  if (models.size === 1 && model !== undefined) {
    merged['model'] = model;
  }

  const usage = sumUsage(successes.map(({ body }) => body));
  if (usage) {
    merged['usage'] = usage;
  }

  return merged;
}

/**
 * Default merger
 *
 * One success returns its body verbatim. Several chat completions are
 * combined with mergeChatCompletions; anything else is keyed by provider id.
 */
export const defaultMerger: BodyMerger = (successes, callId) => {
  if (successes.length === 0) {
    return null;
  }
  if (successes.length === 1) {
    return successes[0].body;
  }

  const completions: { providerId: string; body: JsonObject }[] = [];
  for (const { providerId, body } of successes) {
    if (isChatCompletion(body)) {
      completions.push({ providerId, body });
    }
  }
  if (completions.length === successes.length) {
    return mergeChatCompletions(completions, callId);
  }

  const results: JsonObject = {};
  for (const success of successes) {
    results[success.providerId] = success.body;
  }
  return { results };
};
