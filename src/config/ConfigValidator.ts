// src/config/ConfigValidator.ts

import { z } from 'zod';
import { ConfigError } from '../utils/errors';

export const DEFAULT_BASE_URL = 'https://www.diigo.com/api/v2/';
export const DEFAULT_OUTPUT_PATH = 'diigo_export.csv';

// Documented ceiling of the list endpoint's `count` parameter
export const MAX_PAGE_SIZE = 100;

const CredentialsSchema = z.object({
  username: z.string().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required'),
  apiKey: z.string().min(1, 'API key is required (get one from https://www.diigo.com/api_keys)'),
});

const ApiConfigSchema = z
  .object({
    baseUrl: z
      .string()
      .url()
      .default(DEFAULT_BASE_URL)
      // Relative resolution of "bookmarks" needs the trailing slash
      .transform((url) => (url.endsWith('/') ? url : `${url}/`)),
    pageSize: z
      .number()
      .int('Page size must be an integer')
      .min(1, 'Page size must be at least 1')
      .max(MAX_PAGE_SIZE, `Page size cannot exceed the API maximum of ${MAX_PAGE_SIZE}`)
      .default(MAX_PAGE_SIZE),
    timeout: z.number().positive().default(30_000),
    qps: z.number().positive().optional(),
    userAgent: z.string().min(1).optional(),
  })
  .default({});

const OutputConfigSchema = z
  .object({
    path: z.string().min(1).default(DEFAULT_OUTPUT_PATH),
  })
  .default({});

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
  })
  .optional();

// Metrics Configuration Schema
const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
  })
  .optional();

export const ExportConfigSchema = z.object({
  credentials: CredentialsSchema,
  api: ApiConfigSchema,
  output: OutputConfigSchema,
  logging: LoggerConfigSchema,
  metrics: MetricsConfigSchema,
});

/** Configuration as callers write it (defaults may be omitted) */
export type ExportConfigInput = z.input<typeof ExportConfigSchema>;

/** Configuration after validation, every default filled in */
export type ExportConfig = z.output<typeof ExportConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
}

/**
 * Validate exporter configuration
 *
 * @param config - Configuration object to validate
 * @returns Validated configuration with defaults applied
 * @throws {ConfigError} If configuration is invalid; `details.errors` lists every problem
 */
export function validateConfig(config: unknown): ExportConfig {
  const result = ExportConfigSchema.safeParse(config);

  if (!result.success) {
    const errors = formatIssues(result.error);
    throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`, { errors });
  }

  return result.data;
}

/**
 * Validate configuration and return user-friendly errors
 *
 * @param config - Configuration object to validate
 * @returns Object with { success: boolean, data?: Config, errors?: string[] }
 */
export function validateConfigSafe(config: unknown):
  | { success: true; data: ExportConfig }
  | { success: false; errors: string[] } {
  const result = ExportConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: formatIssues(result.error),
  };
}
