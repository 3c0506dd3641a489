/**
 * Configuration helpers for the ORM.
 *
 * - defineConfig(): Helper to define DataSource options with type safety
 * - env(): Type-safe environment variable access with validation
 * - retryConfigFromEnv(): Retry settings from ORM_RETRY_* variables
 *
 * Philosophy: Explicit over implicit. The ORM doesn't load .env automatically.
 * Users should:
 *   import 'dotenv/config' // at top of config file
 *   or use: node --env-file=.env src/main.ts
 */

import { ConfigurationError } from './errors';
import { resolveRetryConfig, type RetryConfig } from './retry-policy';
import type { DataSourceOptions } from './types';

/**
 * Helper to define data source configuration with type safety.
 *
 * Returns the options object unchanged once it has been validated, including
 * the merged retry settings.
 *
 * @example
 * ```typescript
 * import { defineConfig, env, retryConfigFromEnv } from 'versioned-sqlite-orm'
 *
 * export default defineConfig({
 *   dbPath: env('DATABASE_URL'),
 *   entities: [Item, Tag],
 *   synchronize: true,
 *   logging: process.env.NODE_ENV === 'development',
 *   retry: retryConfigFromEnv(),
 * })
 * ```
 *
 * @throws ConfigurationError describing the first invalid option
 */
export function defineConfig(options: DataSourceOptions): DataSourceOptions {
  validateConfig(options);
  return options;
}

/**
 * Type-safe environment variable accessor.
 *
 * Throws if the variable is not set, ensuring you catch
 * configuration errors early at startup.
 *
 * @example
 * ```typescript
 * const dbPath = env('DATABASE_URL') // throws if not set
 * const logLevel = env('LOG_LEVEL', 'info') // defaults to 'info'
 * ```
 *
 * @throws ConfigurationError if variable is not set and no default provided
 */
export function env(name: string, defaultValue?: string): string {
  const value = process.env[name];

  if (!value) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigurationError(
      `Missing required environment variable: ${name}\n` +
        `Please set ${name} or provide a default in your config.`,
    );
  }

  return value;
}

const RETRY_ENV = {
  enabled: 'ORM_RETRY_ENABLED',
  maxAttempts: 'ORM_RETRY_MAX_ATTEMPTS',
  initialDelayMs: 'ORM_RETRY_INITIAL_DELAY_MS',
  maxDelayMs: 'ORM_RETRY_MAX_DELAY_MS',
  backoffMultiplier: 'ORM_RETRY_BACKOFF_MULTIPLIER',
} as const;

function parseBoolean(name: string, raw: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new ConfigurationError(`${name} must be true or false, got "${raw}".`);
  }
}

function parseNumber(name: string, raw: string): number {
  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a number, got "${raw}".`);
  }
  return value;
}

/**
 * Reads the retry settings present in the environment. Unset variables are left
 * out, so the result merges field by field over the defaults.
 *
 * @example
 * ```typescript
 * // ORM_RETRY_MAX_ATTEMPTS=5 ORM_RETRY_INITIAL_DELAY_MS=500
 * retryConfigFromEnv() // { maxAttempts: 5, initialDelayMs: 500 }
 * ```
 */
export function retryConfigFromEnv(source: NodeJS.ProcessEnv = process.env): Partial<RetryConfig> {
  const config: Partial<RetryConfig> = {};
  const read = (name: string): string | undefined => {
    const raw = source[name];
    return raw === undefined || raw === '' ? undefined : raw;
  };

  const enabled = read(RETRY_ENV.enabled);
  if (enabled !== undefined) config.enabled = parseBoolean(RETRY_ENV.enabled, enabled);

  const maxAttempts = read(RETRY_ENV.maxAttempts);
  if (maxAttempts !== undefined) config.maxAttempts = parseNumber(RETRY_ENV.maxAttempts, maxAttempts);

  const initialDelay = read(RETRY_ENV.initialDelayMs);
  if (initialDelay !== undefined) config.initialDelayMs = parseNumber(RETRY_ENV.initialDelayMs, initialDelay);

  const maxDelay = read(RETRY_ENV.maxDelayMs);
  if (maxDelay !== undefined) config.maxDelayMs = parseNumber(RETRY_ENV.maxDelayMs, maxDelay);

  const multiplier = read(RETRY_ENV.backoffMultiplier);
  if (multiplier !== undefined) {
    config.backoffMultiplier = parseNumber(RETRY_ENV.backoffMultiplier, multiplier);
  }

  return config;
}

/**
 * Validate DataSourceOptions to catch common configuration errors early.
 *
 * @internal
 */
function validateConfig(options: DataSourceOptions): void {
  if (!options.dbPath) {
    throw new ConfigurationError(
      'DataSourceOptions.dbPath is required. \n' +
        'Example: { dbPath: "app.db", entities: [Item] }',
    );
  }

  if (!options.entities || options.entities.length === 0) {
    throw new ConfigurationError(
      'DataSourceOptions.entities is required and must not be empty. \n' +
        'Example: { dbPath: "app.db", entities: [Item, Tag] }',
    );
  }

  if (
    options.commandTimeoutMs !== undefined &&
    (!Number.isSafeInteger(options.commandTimeoutMs) || options.commandTimeoutMs < 0)
  ) {
    throw new ConfigurationError(
      'DataSourceOptions.commandTimeoutMs must be a non-negative integer. \n' +
        'Example: { commandTimeoutMs: 30000 }',
    );
  }

  resolveRetryConfig(options.retry);
}
