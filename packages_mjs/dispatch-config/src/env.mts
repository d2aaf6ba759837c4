/**
 * Read dispatch configuration from environment variables and .env files
 */
import { promises as fs } from 'node:fs';
import * as dotenv from 'dotenv';
import type { ZodIssue } from 'zod';
import { createLogger } from '@llm-dispatch/logger';
import { DispatchConfigSchema, type DispatchConfig } from './schema.mjs';
import { ConfigValidationError } from './errors.mjs';

const log = createLogger('dispatch-config');

export type EnvValues = Record<string, string | undefined>;

export const ENV = {
  PROVIDERS: 'LLM_DISPATCH_PROVIDERS',
  POLICY: 'LLM_DISPATCH_POLICY',
  DEADLINE_MS: 'LLM_DISPATCH_DEADLINE_MS',
  MAX_CONNECTIONS: 'LLM_DISPATCH_MAX_CONNECTIONS',
} as const;

const PROVIDER_FIELDS = new Map<string, string>([
  ['apiKey', 'API_KEY'],
  ['baseUrl', 'BASE_URL'],
  ['provider', 'KIND'],
  ['timeoutMs', 'TIMEOUT_MS'],
  ['proxyUrl', 'PROXY_URL'],
  ['completionPath', 'COMPLETION_PATH'],
]);

const TOP_LEVEL_FIELDS = new Map<string, string>([
  ['providers', ENV.PROVIDERS],
  ['policy', ENV.POLICY],
  ['deadlineMs', ENV.DEADLINE_MS],
  ['maxConnections', ENV.MAX_CONNECTIONS],
]);

/**
 * Variable name for one provider setting, e.g.
 * providerVariable('eu-west', 'BASE_URL') === 'LLM_PROVIDER_EU_WEST_BASE_URL'
 */
export function providerVariable(providerId: string, suffix: string): string {
  return `LLM_PROVIDER_${providerId.toUpperCase().replace(/-/g, '_')}_${suffix}`;
}

/**
 * Split LLM_DISPATCH_PROVIDERS into ids
 */
export function parseProviderIds(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
}

function read(values: EnvValues, name: string): string | undefined {
  const value = values[name]?.trim();
  return value ? value : undefined;
}

function issueVariable(issue: ZodIssue, providerIds: string[]): string {
  const [head, index, field] = issue.path;
  if (head === 'providers' && typeof index === 'number' && typeof field === 'string') {
    const suffix = PROVIDER_FIELDS.get(field);
    const providerId = providerIds[index];
    if (suffix && providerId !== undefined) {
      return providerVariable(providerId, suffix);
    }
  }
  return (typeof head === 'string' && TOP_LEVEL_FIELDS.get(head)) || issue.path.join('.');
}

/**
 * Validate raw variables into a DispatchConfig
 *
 * @throws ConfigValidationError listing every invalid variable
 */
export function parseDispatchConfig(values: EnvValues): DispatchConfig {
  const providerIds = parseProviderIds(values[ENV.PROVIDERS]);

  const raw = {
    providers: providerIds.map((providerId) => ({
      providerId,
      apiKey: read(values, providerVariable(providerId, 'API_KEY')),
      baseUrl: read(values, providerVariable(providerId, 'BASE_URL')),
      provider: read(values, providerVariable(providerId, 'KIND')),
      timeoutMs: read(values, providerVariable(providerId, 'TIMEOUT_MS')),
      proxyUrl: read(values, providerVariable(providerId, 'PROXY_URL')),
      completionPath: values[providerVariable(providerId, 'COMPLETION_PATH')]?.trim(),
    })),
    policy: read(values, ENV.POLICY),
    deadlineMs: read(values, ENV.DEADLINE_MS),
    maxConnections: read(values, ENV.MAX_CONNECTIONS),
  };

  const parsed = DispatchConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigValidationError(
      parsed.error.issues.map((issue) => `${issueVariable(issue, providerIds)}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * Parse a .env file with dotenv
 */
export async function readEnvFile(path: string): Promise<EnvValues> {
  let content: string;
  try {
    content = await fs.readFile(path, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError([`Cannot read env file ${path}: ${message}`], { cause: error });
  }
  return dotenv.parse(content);
}

export interface LoadDispatchConfigOptions {
  /** Variables to read. Default: process.env */
  env?: EnvValues;
  /** .env file whose values apply where `env` leaves a variable unset */
  envFile?: string;
}

/**
 * Load and validate dispatch configuration
 *
 * @example
 * const config = await loadDispatchConfig({ envFile: '.env' });
 * const dispatcher = createDispatcherFromConfig(config);
 */
export async function loadDispatchConfig(options: LoadDispatchConfigOptions = {}): Promise<DispatchConfig> {
  const env = options.env ?? process.env;
  const fileValues = options.envFile ? await readEnvFile(options.envFile) : {};

  const merged: EnvValues = { ...fileValues };
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  const config = parseDispatchConfig(merged);
  log.info(
    {
      providers: config.providers.map((provider) => provider.providerId),
      policy: config.policy,
      deadlineMs: config.deadlineMs,
      envFile: options.envFile,
    },
    'Dispatch config loaded'
  );
  return config;
}
