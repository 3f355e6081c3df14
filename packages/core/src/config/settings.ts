/**
 * Resolves the runtime configuration from environment variables.
 *
 * The result is an explicit value handed to the gateway factory; nothing in
 * the core reads `process.env` after this point.
 */

import { z } from 'zod';

import {
  DEFAULT_API_PROVIDER,
  DEFAULT_LOCAL_MODEL,
  DEFAULT_OLLAMA_HOST,
} from '../constants.js';
import { SettingsError } from '../errors.js';
import {
  PROVIDER_CATALOG,
  apiKeyVariable,
  findProvider,
  type ProviderCatalog,
} from '../gateway/providerCatalog.js';

export type RuntimeMode = 'local' | 'api';

export interface LocalBackend {
  readonly mode: 'local';
  readonly model: string;
  readonly host: string;
}

export interface ApiBackend {
  readonly mode: 'api';
  readonly provider: string;
  readonly model: string;
  readonly apiKey: string | null;
}

export type BackendSettings = LocalBackend | ApiBackend;

export interface RuntimeSettings {
  readonly backend: BackendSettings;
  readonly timeoutMs: number | undefined;
  readonly maxRetries: number | undefined;
  readonly debug: boolean;
}

export type EnvSource = Readonly<Record<string, string | undefined>>;

const TRUTHY_FLAGS = new Set(['1', 'true', 'yes', 'on']);

const emptyToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(emptyToUndefined, z.string().trim().optional());

const optionalInteger = (min: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().min(min).optional());

const EnvSchema = z.object({
  MODE: z.preprocess(
    (value) => {
      const normalized = emptyToUndefined(value);
      return typeof normalized === 'string' ? normalized.trim().toLowerCase() : normalized;
    },
    z.enum(['local', 'api']).default('local'),
  ),
  LOCAL_MODEL: optionalString,
  OLLAMA_HOST: z.preprocess(emptyToUndefined, z.string().trim().url().optional()),
  ACTIVE_API_PROVIDER: optionalString,
  API_MODEL: optionalString,
  TERMFIX_TIMEOUT_MS: optionalInteger(1),
  TERMFIX_MAX_RETRIES: optionalInteger(0),
  TERMFIX_DEBUG: optionalString,
});

type ParsedEnv = z.infer<typeof EnvSchema>;

function parseEnv(env: EnvSource): ParsedEnv {
  const result = EnvSchema.safeParse(env);
  if (result.success) {
    return result.data;
  }
  const [issue] = result.error.issues;
  const variable = issue ? String(issue.path[0] ?? 'environment') : 'environment';
  const detail = issue ? issue.message : 'invalid value';
  throw new SettingsError(variable, `${variable} is invalid: ${detail}`);
}

export function isTruthyFlag(value: string | undefined): boolean {
  return typeof value === 'string' && TRUTHY_FLAGS.has(value.trim().toLowerCase());
}

function resolveBackend(
  parsed: ParsedEnv,
  env: EnvSource,
  catalog: ProviderCatalog,
): BackendSettings {
  if (parsed.MODE === 'local') {
    return {
      mode: 'local',
      model: parsed.LOCAL_MODEL ?? DEFAULT_LOCAL_MODEL,
      host: (parsed.OLLAMA_HOST ?? DEFAULT_OLLAMA_HOST).replace(/\/+$/, ''),
    };
  }

  const provider = (parsed.ACTIVE_API_PROVIDER ?? DEFAULT_API_PROVIDER).toLowerCase();
  const entry = findProvider(provider, catalog);
  if (!entry) {
    throw new SettingsError(
      'ACTIVE_API_PROVIDER',
      `ACTIVE_API_PROVIDER "${provider}" is not supported. Choose one of: ${Object.keys(catalog).join(', ')}.`,
    );
  }

  const rawKey = env[apiKeyVariable(provider)];
  const apiKey = typeof rawKey === 'string' && rawKey.trim() ? rawKey.trim() : null;

  return {
    mode: 'api',
    provider,
    model: parsed.API_MODEL ?? entry.models[0] ?? '',
    apiKey,
  };
}

export function resolveRuntimeSettings(
  env: EnvSource = process.env,
  catalog: ProviderCatalog = PROVIDER_CATALOG,
): RuntimeSettings {
  const parsed = parseEnv(env);
  return {
    backend: resolveBackend(parsed, env, catalog),
    timeoutMs: parsed.TERMFIX_TIMEOUT_MS,
    maxRetries: parsed.TERMFIX_MAX_RETRIES,
    debug: isTruthyFlag(parsed.TERMFIX_DEBUG),
  };
}

export function describeBackend(backend: BackendSettings): string {
  return backend.mode === 'local'
    ? `local:${backend.model}`
    : `${backend.provider}:${backend.model}`;
}

export default {
  resolveRuntimeSettings,
  describeBackend,
  isTruthyFlag,
};
