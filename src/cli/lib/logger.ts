/**
 * Health ETL CLI Structured Logging
 *
 * Provides structured logging with JSON output for machine consumption
 * and human-readable output for interactive use. Includes timestamp,
 * command context, and duration tracking.
 *
 * Metadata values under secret-looking keys are redacted before output.
 * In JSON mode every entry is written to stderr.
 *
 * @module cli/lib/logger
 */

import type { LogLevel, LogMetadata, PipelineLogger } from '../../core/logging.js';

export type { LogLevel, LogMetadata, PipelineLogger } from '../../core/logging.js';
export { formatBytes } from '../../core/logging.js';

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
  /** Bindings added to every entry */
  readonly context?: LogMetadata;
}

// ============================================================================
// Constants
// ============================================================================

/**
 * Log level numeric values for comparison
 */
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

/**
 * Keys whose values never reach the output
 */
const SECRET_KEY_PATTERN = /secret|token|password|credential|access_?key/i;

export const REDACTED = '[REDACTED]';

// ============================================================================
// Redaction
// ============================================================================

/**
 * Replace secret-looking values, recursing into plain objects
 */
export function redact(metadata: LogMetadata): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (SECRET_KEY_PATTERN.test(key)) {
      result[key] = REDACTED;
    } else if (isPlainObject(value)) {
      result[key] = redact(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function isPlainObject(value: unknown): value is LogMetadata {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

// ============================================================================
// CLI Logger Class
// ============================================================================

/**
 * CLI Logger with structured JSON and human-readable output
 */
export class CLILogger implements PipelineLogger {
  private readonly config: CLILoggerConfig;
  private startTime: number;
  private commandContext: string | null = null;

  constructor(config: CLILoggerConfig) {
    this.config = {
      service: 'health-etl',
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

  /**
   * Merge bound context and per-call metadata, then redact
   */
  private collect(metadata?: LogMetadata): Record<string, unknown> {
    return redact({ ...this.config.context, ...metadata });
  }

  private formatJson(level: LogLevel, message: string, metadata: Record<string, unknown>): string {
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.config.service ? { service: this.config.service } : {}),
      ...(this.commandContext ? { command: this.commandContext } : {}),
      ...metadata,
    };
    return JSON.stringify(entry);
  }

  private formatHuman(level: LogLevel, message: string, metadata: Record<string, unknown>): string {
    const color = LEVEL_COLORS[level];
    const label = LEVEL_LABELS[level];

    let line = `${COLORS.dim}${new Date().toISOString()}${COLORS.reset} `;
    line += `${color}${label}${COLORS.reset} `;
    line += message;

    const entries = Object.entries(metadata);
    if (entries.length > 0) {
      const metaStr = entries
        .map(([key, value]) => {
          const valueStr = typeof value === 'object' ? JSON.stringify(value) : String(value);
          return `${COLORS.cyan}${key}${COLORS.reset}=${valueStr}`;
        })
        .join(' ');
      line += ` ${COLORS.dim}(${metaStr})${COLORS.reset}`;
    }

    return line;
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(level)) return;

    const collected = this.collect(metadata);
    const formatted = this.config.json
      ? this.formatJson(level, message, collected)
      : this.formatHuman(level, message, collected);

    // JSON entries go to stderr; stdout carries only command output
    if (this.config.json) {
      console.error(formatted);
      return;
    }

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
   * Log command start and reset the duration timer
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
    const baseMetadata = { duration_ms: this.getElapsedMs(), ...metadata };

    if (success) {
      this.info('Command completed', baseMetadata);
    } else {
      this.error('Command failed', baseMetadata);
    }
  }

  /**
   * Create a child logger whose entries carry additional context
   */
  child(context: LogMetadata): CLILogger {
    const childLogger = new CLILogger({
      ...this.config,
      context: { ...this.config.context, ...context },
    });
    childLogger.commandContext = this.commandContext;
    childLogger.startTime = this.startTime;
    return childLogger;
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
    service: config.service ?? 'health-etl',
    context: config.context,
  });
}
