/**
 * Structured logging utility for the feature audit core
 *
 * Core steps log through the narrow `Logger` interface so the CLI can hand
 * in its own logger and tests can record entries. The default instance is
 * console-based and honours LOG_LEVEL.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

/**
 * Minimal logging surface the core pipeline depends on
 */
export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;
}

interface LoggerConfig {
  readonly level: LogLevel;
  readonly service: string;
  readonly pretty: boolean;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

class ConsoleLogger implements Logger {
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.config.level];
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    metadata?: LogMetadata
  ): string {
    const timestamp = new Date().toISOString();

    if (this.config.pretty) {
      const metaStr =
        metadata && Object.keys(metadata).length > 0
          ? ` ${JSON.stringify(metadata)}`
          : '';
      return `[${timestamp}] ${level.toUpperCase()}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.config.service,
      message,
      ...(metadata && Object.keys(metadata).length > 0 ? metadata : {}),
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    console.debug(this.formatMessage('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    console.info(this.formatMessage('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('warn')) return;
    console.warn(this.formatMessage('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('error')) return;
    console.error(this.formatMessage('error', message, metadata));
  }
}

/**
 * Parse a LOG_LEVEL style value, falling back to info
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const level = value?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return 'info';
}

// Default logger instance
export const logger: Logger = new ConsoleLogger({
  level: parseLogLevel(process.env.LOG_LEVEL),
  service: 'feature-audit',
  pretty: process.env.NODE_ENV !== 'production',
});

/**
 * Format an unknown thrown value for log metadata
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
