// src/config/env.ts

import type { ExportConfigInput } from './ConfigValidator';
import { ConfigError } from '../utils/errors';

export const API_KEY_ENV = 'DIIGO_API_KEY';

export type Env = Record<string, string | undefined>;

function optionalNumber(value: string | undefined): number | undefined {
  // NaN is passed through so validation reports the variable
  return value === undefined || value === '' ? undefined : Number(value);
}

function optionalString(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

function oneOf<T extends string>(value: string | undefined, allowed: readonly T[]): T | undefined {
  return allowed.find((candidate) => candidate === value);
}

/**
 * @throws {ConfigError} If DIIGO_API_KEY is unset or empty
 */
export function readApiKey(env: Env): string {
  const apiKey = optionalString(env[API_KEY_ENV]);
  if (!apiKey) {
    throw new ConfigError(
      `API key environment variable not set: ${API_KEY_ENV}. Get one from https://www.diigo.com/api_keys`,
      { variable: API_KEY_ENV }
    );
  }
  return apiKey;
}

/**
 * Credentials supplied in the environment, if both are present
 */
export function credentialsFromEnv(env: Env): { username: string; password: string } | null {
  const username = optionalString(env.DIIGO_USERNAME);
  const password = optionalString(env.DIIGO_PASSWORD);
  return username && password ? { username, password } : null;
}

/**
 * Build exporter configuration from environment variables
 *
 * Reads DIIGO_API_KEY (required), DIIGO_BASE_URL, DIIGO_PAGE_SIZE, DIIGO_QPS,
 * DIIGO_TIMEOUT_MS, DIIGO_EXPORT_FILE, LOG_LEVEL, LOG_FORMAT and METRICS_ENABLED.
 *
 * @throws {ConfigError} If the API key is not set
 */
export function loadConfigFromEnv(
  env: Env,
  login: { username: string; password: string }
): ExportConfigInput {
  const apiKey = readApiKey(env);

  return {
    credentials: { username: login.username, password: login.password, apiKey },
    api: {
      baseUrl: optionalString(env.DIIGO_BASE_URL),
      pageSize: optionalNumber(env.DIIGO_PAGE_SIZE),
      qps: optionalNumber(env.DIIGO_QPS),
      timeout: optionalNumber(env.DIIGO_TIMEOUT_MS),
    },
    output: {
      path: optionalString(env.DIIGO_EXPORT_FILE),
    },
    logging: {
      level: oneOf(env.LOG_LEVEL, ['debug', 'info', 'warn', 'error'] as const),
      format: oneOf(env.LOG_FORMAT, ['json', 'pretty'] as const),
    },
    metrics: {
      enabled: env.METRICS_ENABLED === undefined ? undefined : env.METRICS_ENABLED !== '0',
    },
  };
}
