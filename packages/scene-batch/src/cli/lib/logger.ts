/**
 * Scene Batch Structured Logging
 *
 * Structured logging with JSON output for machine consumption and
 * human-readable output for interactive use. Every run also appends to a
 * durable log file, so an unattended batch (nohup, cron, a detached
 * terminal) can be followed and audited afterwards.
 *
 * @module cli/lib/logger
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import type { ConsoleRedirect } from '../../services/progress-tracker.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log entry metadata
 */
export interface LogMetadata {
  readonly [key: string]: unknown;
}

/**
 * Structured log entry for JSON output
 */
export interface StructuredLogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly message: string;
  readonly command?: string;
  readonly [key: string]: unknown;
}

/**
 * What services need from a logger
 */
export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;
}

/**
 * Logger configuration
 */
export interface CLILoggerConfig {
  /** Minimum log level to output */
  readonly level: LogLevel;
  /** Output as JSON */
  readonly json: boolean;
  /** Write entries to the console */
  readonly console: boolean;
  /** Append plain-text entries to this file */
  readonly filePath?: string;
  /** Command name for context */
  readonly command?: string;
  /** Service name */
  readonly service?: string;
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
 * CLI Logger with structured JSON, human-readable and log-file output
 */
export class CLILogger implements Logger, ConsoleRedirect {
  private readonly config: CLILoggerConfig;
  private startTime: number;
  private commandContext: string | null;
  private consoleWriter: ((line: string) => void) | null = null;

  constructor(config: CLILoggerConfig) {
    this.config = {
      service: 'scene-batch',
      ...config,
    };
    this.startTime = Date.now();
    this.commandContext = config.command ?? null;

    if (this.config.filePath) {
      mkdirSync(dirname(this.config.filePath), { recursive: true });
    }
  }

  /**
   * Path of the durable log, if any
   */
  get filePath(): string | undefined {
    return this.config.filePath;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private getElapsedMs(): number {
    return Date.now() - this.startTime;
  }

  private formatJson(
    timestamp: string,
    level: LogLevel,
    message: string,
    metadata: LogMetadata
  ): string {
    const entry: StructuredLogEntry = {
      timestamp,
      level,
      message,
      ...(this.config.service ? { service: this.config.service } : {}),
      ...(this.commandContext ? { command: this.commandContext } : {}),
      ...metadata,
    };
    return JSON.stringify(entry);
  }

  private formatHuman(
    timestamp: string,
    level: LogLevel,
    message: string,
    metadata: LogMetadata,
    colored: boolean
  ): string {
    const paint = (color: string, text: string): string =>
      colored ? `${color}${text}${COLORS.reset}` : text;

    let line = `${paint(COLORS.dim, timestamp)} ${paint(LEVEL_COLORS[level], LEVEL_LABELS[level])} ${message}`;

    const keys = Object.keys(metadata);
    if (keys.length > 0) {
      const metaStr = Object.entries(metadata)
        .map(([key, value]) => {
          const valueStr =
            typeof value === 'object' ? JSON.stringify(value) : String(value);
          return `${paint(COLORS.cyan, key)}=${valueStr}`;
        })
        .join(' ');
      line += ` ${paint(COLORS.dim, `(${metaStr})`)}`;
    }

    return line;
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(level)) return;

    const timestamp = new Date().toISOString();
    const meta = metadata ?? {};

    if (this.config.filePath) {
      const line = this.config.json
        ? this.formatJson(timestamp, level, message, meta)
        : this.formatHuman(timestamp, level, message, meta, false);
      appendFileSync(this.config.filePath, `${line}\n`);
    }

    if (!this.config.console) return;

    const formatted = this.config.json
      ? this.formatJson(timestamp, level, message, meta)
      : this.formatHuman(timestamp, level, message, meta, true);

    if (this.consoleWriter) {
      this.consoleWriter(formatted);
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

  /**
   * Send console lines to `write` instead of the console; null restores it
   */
  redirectConsole(write: ((line: string) => void) | null): void {
    this.consoleWriter = write;
  }

  /**
   * Set command context for subsequent log entries
   */
  setCommand(command: string): void {
    this.commandContext = command;
    this.startTime = Date.now();
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
   * Log command start
   */
  commandStart(command: string, options?: LogMetadata): void {
    this.setCommand(command);
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
    console: config.console ?? true,
    filePath: config.filePath,
    command: config.command,
    service: config.service ?? 'scene-batch',
  });
}

/**
 * Logger that drops everything
 */
export function createSilentLogger(): CLILogger {
  return createCLILogger({ level: 'error', console: false });
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

/**
 * Timestamp used in log file names: `YYYYMMDD_HHMMSS` in local time
 */
export function logFileTimestamp(date: Date = new Date()): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
