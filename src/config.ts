/**
 * Application configuration.
 * Read once from the environment into a frozen object; every malformed value
 * raises a ConfigError naming the variable.
 */

import { ConfigError } from './errors.js';
import { isLogLevel, type LogLevel } from './providers/ILogProvider.js';
import { OPENROUTER_BASE_URL } from './providers/OpenRouterGateway.js';

export interface AppConfig {
  supabase: { url: string; serviceRoleKey: string } | null;
  openRouter: {
    apiKey: string | null;
    baseUrl: string;
    appName: string;
    appUrl: string | null;
  };
  run: {
    concurrency: number;
    questionTimeoutMs: number;
    maxAttempts: number;
    retryBaseDelayMs: number;
    retryMaxDelayMs: number;
    cancelPollIntervalMs: number;
  };
  /** API key → operator name. */
  apiKeys: ReadonlyMap<string, string>;
  logLevel: LogLevel;
  axiom: { apiKey: string; dataset: string } | null;
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  const supabaseUrl = str(env, 'SUPABASE_URL');
  const serviceRoleKey = str(env, 'SUPABASE_SERVICE_ROLE_KEY');
  if (Boolean(supabaseUrl) !== Boolean(serviceRoleKey)) {
    throw new ConfigError(
      supabaseUrl ? 'SUPABASE_SERVICE_ROLE_KEY' : 'SUPABASE_URL',
      'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set together'
    );
  }

  const axiomKey = str(env, 'AXIOM_API_KEY');
  const axiomDataset = str(env, 'AXIOM_DATASET');

  const logLevel = str(env, 'LOG_LEVEL') ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigError('LOG_LEVEL', `must be one of debug, info, warn, error (got "${logLevel}")`);
  }

  const retryBaseDelayMs = int(env, 'REASONBENCH_RETRY_BASE_DELAY_MS', 1000, 0);
  const retryMaxDelayMs = int(env, 'REASONBENCH_RETRY_MAX_DELAY_MS', 30_000, 0);
  if (retryMaxDelayMs < retryBaseDelayMs) {
    throw new ConfigError(
      'REASONBENCH_RETRY_MAX_DELAY_MS',
      'must not be smaller than REASONBENCH_RETRY_BASE_DELAY_MS'
    );
  }

  const config: AppConfig = {
    supabase:
      supabaseUrl && serviceRoleKey ? { url: url(supabaseUrl, 'SUPABASE_URL'), serviceRoleKey } : null,
    openRouter: {
      apiKey: str(env, 'OPENROUTER_API_KEY') ?? null,
      baseUrl: url(str(env, 'OPENROUTER_BASE_URL') ?? OPENROUTER_BASE_URL, 'OPENROUTER_BASE_URL'),
      appName: str(env, 'REASONBENCH_APP_NAME') ?? 'reasonbench',
      appUrl: str(env, 'REASONBENCH_APP_URL') ?? null,
    },
    run: {
      concurrency: int(env, 'REASONBENCH_CONCURRENCY', 4, 1),
      questionTimeoutMs: int(env, 'REASONBENCH_QUESTION_TIMEOUT_MS', 60_000, 1),
      maxAttempts: int(env, 'REASONBENCH_MAX_ATTEMPTS', 3, 1),
      retryBaseDelayMs,
      retryMaxDelayMs,
      cancelPollIntervalMs: int(env, 'REASONBENCH_CANCEL_POLL_MS', 5_000, 0),
    },
    apiKeys: parseApiKeys(str(env, 'REASONBENCH_API_KEYS')),
    logLevel,
    axiom: axiomKey && axiomDataset ? { apiKey: axiomKey, dataset: axiomDataset } : null,
  };

  return Object.freeze(config);
}

/** `name:key,name:key` → Map(key → name). */
export function parseApiKeys(raw: string | undefined): ReadonlyMap<string, string> {
  const keys = new Map<string, string>();
  if (!raw) return keys;

  for (const entry of raw.split(',')) {
    const trimmed = entry.trim();
    if (!trimmed) continue;
    const sep = trimmed.indexOf(':');
    const name = sep > 0 ? trimmed.slice(0, sep).trim() : '';
    const key = sep > 0 ? trimmed.slice(sep + 1).trim() : '';
    if (!name || !key) {
      throw new ConfigError('REASONBENCH_API_KEYS', `entry "${trimmed}" must have the form name:key`);
    }
    if (keys.has(key)) {
      throw new ConfigError('REASONBENCH_API_KEYS', `duplicate key for "${name}"`);
    }
    keys.set(key, name);
  }
  return keys;
}

function str(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function int(env: Env, name: string, fallback: number, min: number): number {
  const raw = str(env, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(name, `must be an integer >= ${min} (got "${raw}")`);
  }
  return value;
}

function url(value: string, name: string): string {
  try {
    new URL(value);
  } catch {
    throw new ConfigError(name, `must be a URL (got "${value}")`);
  }
  return value;
}
