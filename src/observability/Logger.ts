// src/observability/Logger.ts

import winston from 'winston';

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warn' | 'error';
  format?: 'json' | 'pretty';
}

// What the protocol components need from a logger
export interface LogWriter {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

const REDACTED = '[REDACTED]';

const SENSITIVE_KEYS = new Set([
  'accessToken',
  'access_token',
  'refreshToken',
  'refresh_token',
  'clientSecret',
  'client_secret',
  'password',
  'authorization',
  'Authorization',
]);

export class Logger implements LogWriter {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}) {
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

  private redactSensitive(obj: unknown): unknown {
    if (!obj || typeof obj !== 'object' || Array.isArray(obj)) return obj;

    const redacted: Record<string, unknown> = { ...obj };

    for (const key of Object.keys(redacted)) {
      if (SENSITIVE_KEYS.has(key)) {
        redacted[key] = REDACTED;
      }
    }

    // Token records and request headers are logged nested
    for (const nested of ['token', 'headers']) {
      const value = redacted[nested];
      if (value && typeof value === 'object' && !Array.isArray(value)) {
        redacted[nested] = this.redactSensitive(value);
      }
    }

    return redacted;
  }

  private sanitize(meta?: Record<string, unknown>): unknown {
    return meta ? this.redactSensitive(meta) : {};
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, this.sanitize(meta));
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, this.sanitize(meta));
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, this.sanitize(meta));
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, this.sanitize(meta));
  }
}
