/**
 * @llm-dispatch/dispatch-config
 *
 * Validated construction values for providers and the composite
 * dispatcher, read from the environment and optional .env files.
 */
export {
  ProviderSettingsSchema,
  DispatchConfigSchema,
  type ProviderSettings,
  type DispatchConfig,
} from './schema.mjs';
export { ConfigValidationError } from './errors.mjs';
export {
  ENV,
  providerVariable,
  parseProviderIds,
  parseDispatchConfig,
  readEnvFile,
  loadDispatchConfig,
  type EnvValues,
  type LoadDispatchConfigOptions,
} from './env.mjs';
export { createDispatcherFromConfig, toClientConfig, type CreateDispatcherOptions } from './factory.mjs';
