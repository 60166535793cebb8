/**
 * Process configuration, read once from the environment.
 * Invalid or missing required values throw InitError.
 */

import { InitError } from './errors.js';
import type { LogLevel } from './providers/ILogProvider.js';
import { LOG_LEVELS } from './providers/ILogProvider.js';
import { DEFAULT_GEMINI_API_BASE_URL } from './providers/GeminiModelProvider.js';
import {
  ATTRIBUTE_NAMES,
  type AttributeName,
  type CountryCodeFormat,
} from './types/models.js';

export const SERVICE_NAME = 'product-attribute-detector';
export const SERVICE_VERSION = '1.0.0';

export type ModelProviderName = 'openai' | 'gemini';

export interface AppConfig {
  provider: ModelProviderName;
  /** Credential for the configured provider. */
  providerApiKey: string;
  geminiBaseUrl: string;
  /** Undefined means the provider's own default. */
  defaultModel?: string;
  attributes: AttributeName[];
  countryFormat: CountryCodeFormat;
  cacheMaxEntries: number;
  modelTimeoutMs: number;
  maxInputChars: number;
  batchConcurrency: number;
  batchMaxItems: number;
  /** Empty disables service authentication. */
  serviceApiKeys: string[];
  logLevel: LogLevel;
}

export const DEFAULT_ATTRIBUTES: readonly AttributeName[] = [
  'country',
  'size',
  'material',
  'brand',
  'target_user',
  'hscode',
];

type Env = Record<string, string | undefined>;

function value(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

function list(env: Env, name: string): string[] {
  return (value(env, name) ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = value(env, name);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InitError(`${name} must be a positive integer, got '${raw}'`);
  }
  return parsed;
}

function oneOf<T extends string>(env: Env, name: string, allowed: readonly T[], fallback: T): T {
  const raw = value(env, name)?.toLowerCase();
  if (raw === undefined) return fallback;
  const match = allowed.find((a) => a === raw);
  if (!match) {
    throw new InitError(`${name} must be one of ${allowed.join(', ')}, got '${raw}'`);
  }
  return match;
}

function attributes(env: Env): AttributeName[] {
  const names = list(env, 'DETECT_ATTRIBUTES');
  if (names.length === 0) return [...DEFAULT_ATTRIBUTES];

  const result: AttributeName[] = [];
  for (const name of names) {
    const match = ATTRIBUTE_NAMES.find((a) => a === name.toLowerCase());
    if (!match) {
      throw new InitError(
        `DETECT_ATTRIBUTES has unknown attribute '${name}'; expected ${ATTRIBUTE_NAMES.join(', ')}`
      );
    }
    if (!result.includes(match)) result.push(match);
  }
  return result;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const provider = oneOf<ModelProviderName>(env, 'MODEL_PROVIDER', ['openai', 'gemini'], 'openai');
  const keyVar = provider === 'openai' ? 'OPENAI_API_KEY' : 'GEMINI_API_KEY';
  const providerApiKey = value(env, keyVar);
  if (!providerApiKey) {
    throw new InitError(`Missing required environment variable: ${keyVar}`);
  }

  return {
    provider,
    providerApiKey,
    geminiBaseUrl: value(env, 'GEMINI_API_BASE_URL') ?? DEFAULT_GEMINI_API_BASE_URL,
    defaultModel: value(env, 'DEFAULT_MODEL'),
    attributes: attributes(env),
    countryFormat: oneOf<CountryCodeFormat>(env, 'COUNTRY_CODE_FORMAT', ['alpha2', 'alpha3'], 'alpha2'),
    cacheMaxEntries: positiveInt(env, 'CACHE_MAX_ENTRIES', 1000),
    modelTimeoutMs: positiveInt(env, 'MODEL_TIMEOUT_MS', 15000),
    maxInputChars: positiveInt(env, 'MAX_INPUT_CHARS', 1000),
    batchConcurrency: positiveInt(env, 'BATCH_CONCURRENCY', 8),
    batchMaxItems: positiveInt(env, 'BATCH_MAX_ITEMS', 100),
    serviceApiKeys: list(env, 'SERVICE_API_KEYS'),
    logLevel: oneOf<LogLevel>(env, 'LOG_LEVEL', LOG_LEVELS, 'info'),
  };
}
