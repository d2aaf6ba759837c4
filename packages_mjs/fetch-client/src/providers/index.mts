/**
 * Provider adapters
 */
import type { ProviderKind } from '../types.mjs';
import type { Provider } from './types.mjs';
import { openAiProvider } from './openai.mjs';
import { geminiProvider } from './gemini.mjs';

const PROVIDERS: Record<ProviderKind, Provider> = {
  openai: openAiProvider,
  gemini: geminiProvider,
};

/**
 * Get the adapter for a provider kind
 */
export function getProvider(kind: ProviderKind): Provider {
  return PROVIDERS[kind];
}

export type { Provider } from './types.mjs';
export { openAiProvider, geminiProvider };
export { kindFromStatus } from './classify.mjs';
