// src/observability/Logger.ts

import winston from 'winston';

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warn' | 'error';
  format?: 'json' | 'pretty';
}

const SENSITIVE_KEYS = ['password', 'apiKey', 'key', 'authorization'];
const NESTED_KEYS = ['credentials', 'auth'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}, base?: winston.Logger) {
    if (base) {
      this.logger = base;
      return;
    }

    const format =
      config.format === 'pretty'
        ? winston.format.combine(winston.format.colorize(), winston.format.simple())
        : winston.format.json();

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      transports: [new winston.transports.Console()],
    });
  }

  /**
   * Logger sharing this one's transports with extra metadata on every entry
   */
  child(meta: Record<string, unknown>): Logger {
    return new Logger({}, this.logger.child(meta));
  }

  private redactSensitive(obj: unknown): unknown {
    if (!isRecord(obj)) return obj;

    const redacted: Record<string, unknown> = { ...obj };

    for (const key of SENSITIVE_KEYS) {
      if (key in redacted) redacted[key] = '[REDACTED]';
    }

    // Redact nested credential holders
    for (const key of NESTED_KEYS) {
      const nested = redacted[key];
      if (isRecord(nested)) {
        const copy: Record<string, unknown> = { ...nested };
        for (const sensitive of SENSITIVE_KEYS) {
          if (sensitive in copy) copy[sensitive] = '[REDACTED]';
        }
        redacted[key] = copy;
      }
    }

    return redacted;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.debug(message, sanitized);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.info(message, sanitized);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.warn(message, sanitized);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.error(message, sanitized);
  }
}
