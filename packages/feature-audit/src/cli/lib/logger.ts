/**
 * Feature Audit CLI Structured Logging
 *
 * Provides structured logging with JSON output for machine consumption
 * and human-readable output for interactive use. Includes timestamp,
 * command context, and duration tracking.
 *
 * @module cli/lib/logger
 */

import type { Logger, LogLevel, LogMetadata } from '../../core/utils/logger.js';

export type { LogLevel, LogMetadata };

// ============================================================================
// Types
// ============================================================================

/**
 * Structured log entry for JSON output
 */
export interface StructuredLogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly message: string;
  readonly command?: string;
  readonly duration_ms?: number;
  readonly [key: string]: unknown;
}

/**
 * Logger configuration
 */
export interface CLILoggerConfig {
  /** Minimum log level to output */
  readonly level: LogLevel;
  /** Output as JSON */
  readonly json: boolean;
  /** Service name */
  readonly service?: string;
  /** Emit ANSI colours in human-readable mode */
  readonly color?: boolean;
}

// ============================================================================
// Constants
// ============================================================================

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * ANSI color codes for terminal output
 */
const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

// ============================================================================
// CLI Logger Class
// ============================================================================

/**
 * CLI Logger with structured JSON and human-readable output
 */
export class CLILogger implements Logger {
  private readonly config: Required<CLILoggerConfig>;
  private startTime: number;
  private commandContext: string | null = null;

  constructor(config: CLILoggerConfig) {
    this.config = {
      service: 'feature-audit',
      color: true,
      ...config,
    };
    this.startTime = Date.now();
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private getElapsedMs(): number {
    return Date.now() - this.startTime;
  }

  private paint(color: string, text: string): string {
    return this.config.color ? `${color}${text}${COLORS.reset}` : text;
  }

  private formatJson(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: this.config.service,
      ...(this.commandContext && { command: this.commandContext }),
      ...(metadata && Object.keys(metadata).length > 0 ? metadata : {}),
    };
    return JSON.stringify(entry);
  }

  private formatHuman(level: LogLevel, message: string, metadata?: LogMetadata): string {
    let line = `${this.paint(COLORS.dim, new Date().toISOString())} `;
    line += `${this.paint(LEVEL_COLORS[level], LEVEL_LABELS[level])} `;
    line += message;

    if (metadata && Object.keys(metadata).length > 0) {
      const metaStr = Object.entries(metadata)
        .map(([key, value]) => {
          const valueStr =
            typeof value === 'object' ? JSON.stringify(value) : String(value);
          return `${this.paint(COLORS.cyan, key)}=${valueStr}`;
        })
        .join(' ');
      line += ` ${this.paint(COLORS.dim, `(${metaStr})`)}`;
    }

    return line;
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(level)) return;

    const formatted = this.config.json
      ? this.formatJson(level, message, metadata)
      : this.formatHuman(level, message, metadata);

    switch (level) {
      case 'debug':
        console.debug(formatted);
        break;
      case 'info':
        console.info(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      case 'error':
        console.error(formatted);
        break;
    }
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }

  /**
   * Log command start and reset the duration clock
   */
  commandStart(command: string, options?: LogMetadata): void {
    this.commandContext = command;
    this.startTime = Date.now();
    this.info(`Starting ${command}`, options);
  }

  /**
   * Log command completion with duration
   */
  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const baseMetadata = { duration: formatDuration(this.getElapsedMs()), ...metadata };

    if (success) {
      this.info('Analysis completed successfully', baseMetadata);
    } else {
      this.warn('Analysis completed with errors', baseMetadata);
    }
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a CLI logger with the given configuration
 */
export function createCLILogger(config: Partial<CLILoggerConfig> = {}): CLILogger {
  return new CLILogger({
    level: config.level ?? 'info',
    json: config.json ?? false,
    service: config.service ?? 'feature-audit',
    color: config.color ?? Boolean(process.stderr.isTTY),
  });
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds for display
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(1);
    return `${minutes}m ${seconds}s`;
  }
}
