/**
 * Fold streamed chat completion chunks into one `chat.completion` document
 */
import type { JsonObject, JsonValue } from '../types.mjs';
import { isJsonObject, stringField } from '../json.mjs';

interface ChoiceState {
  index: number;
  role: string;
  content: string;
  finishReason: JsonValue;
}

/**
 * Assemble chunks in arrival order.
 *
 * `extractDelta` is used for chunks that carry no OpenAI-style `choices`,
 * so provider-native chunks still contribute their text to choice 0.
 */
export function assembleChatCompletion(
  chunks: JsonValue[],
  extractDelta: (chunk: JsonValue) => string | null
): JsonObject {
  const choices = new Map<number, ChoiceState>();
  let id: string | undefined;
  let model: string | undefined;
  let created: number | undefined;
  let usage: JsonValue | undefined;

  const choiceAt = (index: number): ChoiceState => {
    let state = choices.get(index);
    if (!state) {
      state = { index, role: 'assistant', content: '', finishReason: null };
      choices.set(index, state);
    }
    return state;
  };

  for (const chunk of chunks) {
    if (!isJsonObject(chunk)) continue;

    id ??= stringField(chunk, 'id');
    model ??= stringField(chunk, 'model');
    const chunkCreated = chunk['created'];
    if (created === undefined && typeof chunkCreated === 'number') {
      created = chunkCreated;
    }
    const chunkUsage = chunk['usage'];
    if (isJsonObject(chunkUsage)) {
      usage = chunkUsage;
    }

    const chunkChoices = chunk['choices'];
    if (!Array.isArray(chunkChoices)) {
      const text = extractDelta(chunk);
      if (text) {
        choiceAt(0).content += text;
      }
      continue;
    }

    for (const choice of chunkChoices) {
      if (!isJsonObject(choice)) continue;
      const choiceIndex = choice['index'];
      const index = typeof choiceIndex === 'number' ? choiceIndex : 0;
      const state = choiceAt(index);
      const delta = choice['delta'];
      const role = stringField(delta, 'role');
      if (role) {
        state.role = role;
      }
      const content = stringField(delta, 'content');
      if (content) {
        state.content += content;
      }
      const finishReason = choice['finish_reason'];
      if (finishReason !== undefined && finishReason !== null) {
        state.finishReason = finishReason;
      }
    }
  }

  const assembled: JsonObject = {
    id: id ?? '',
    object: 'chat.completion',
    created: created ?? Math.floor(Date.now() / 1000),
    model: model ?? '',
    choices: [...choices.values()]
      .sort((a, b) => a.index - b.index)
      .map((state) => ({
        index: state.index,
        message: { role: state.role, content: state.content },
        finish_reason: state.finishReason,
      })),
  };

  if (usage !== undefined) {
    assembled['usage'] = usage;
  }

  return assembled;
}
