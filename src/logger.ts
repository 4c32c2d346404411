/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import chalk, { type ChalkInstance } from "chalk";

/**
 * Log levels following Log4j standard
 */
export const LogLevel = {
  TRACE: 0,
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  FATAL: 5,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/** Level names accepted by `--log-level` and the `logLevel` config key */
export const LOG_LEVEL_NAMES = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
] as const;

export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

export const LOG_FORMATS = ["human", "json"] as const;

export type LogFormat = (typeof LOG_FORMATS)[number];

const LEVELS: Record<LogLevel, { label: string; color: ChalkInstance }> = {
  [LogLevel.TRACE]: { label: "TRACE", color: chalk.gray },
  [LogLevel.DEBUG]: { label: "DEBUG", color: chalk.cyan },
  [LogLevel.INFO]: { label: "INFO", color: chalk.blue },
  [LogLevel.WARN]: { label: "WARN", color: chalk.yellow },
  [LogLevel.ERROR]: { label: "ERROR", color: chalk.red },
  [LogLevel.FATAL]: { label: "FATAL", color: chalk.magenta },
};

export interface LoggerOptions {
  level?: LogLevel;
  /** Show per-rule steps; lowers the level to DEBUG */
  verbose?: boolean;
  /** Also show file reads and writes; lowers the level to TRACE */
  veryVerbose?: boolean;
  /** Warnings and errors only; wins over both verbose switches */
  quiet?: boolean;
  format?: LogFormat;
  colorize?: boolean;
  timestamp?: boolean;
  component?: string;
}

/**
 * Structured fields attached to a log line or an error
 */
export interface LogContext {
  component?: string;
  operation?: string;
  filePath?: string;
  processingTime?: number;
  fileSize?: number;
  [key: string]: unknown;
}

/**
 * One line of JSON output
 */
export interface LogEntry {
  level: string;
  message: string;
  timestamp: string;
  component?: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string;
  };
}

function errorCodeOf(error: Error): string | undefined {
  return "code" in error && typeof error.code === "string"
    ? error.code
    : undefined;
}

function effectiveLevel(options: LoggerOptions): LogLevel {
  const level = options.level ?? LogLevel.INFO;
  if (options.quiet) {
    return level < LogLevel.WARN ? LogLevel.WARN : level;
  }
  if (options.veryVerbose) {
    return LogLevel.TRACE;
  }
  if (options.verbose) {
    return level > LogLevel.DEBUG ? LogLevel.DEBUG : level;
  }
  return level;
}

/**
 * Logger shared by the rule loader, the config loader, the engine and the CLI
 */
export class Logger {
  readonly level: LogLevel;
  readonly verbose: boolean;
  readonly veryVerbose: boolean;
  readonly format: LogFormat;
  private readonly options: LoggerOptions;

  constructor(options: LoggerOptions = {}) {
    this.options = options;
    this.level = effectiveLevel(options);
    this.veryVerbose = !options.quiet && (options.veryVerbose ?? false);
    this.verbose =
      !options.quiet && (this.veryVerbose || (options.verbose ?? false));
    this.format = options.format ?? "human";
  }

  /**
   * Log a file read or write. Very verbose mode only.
   */
  fileOperation(operation: string, filePath: string, size?: number): void {
    if (!this.veryVerbose) return;

    const context: LogContext = { operation, filePath };
    let message = `📁 ${operation}: ${filePath}`;
    if (size !== undefined) {
      message += ` (${size} bytes)`;
      context.fileSize = size;
    }

    this.trace(message, context);
  }

  /**
   * Log one step of a run. Verbose mode only.
   */
  processStep(step: string, details?: string, context?: LogContext): void {
    if (!this.verbose) return;
    this.debug(details ? `🔄 ${step}: ${details}` : `🔄 ${step}`, context);
  }

  timing(operation: string, duration: number, context?: LogContext): void {
    this.debug(`Operation "${operation}" completed in ${duration}ms`, {
      ...context,
      operation,
      processingTime: duration,
    });
  }

  /**
   * Same settings, different component tag
   */
  child(component: string, overrides: Partial<LoggerOptions> = {}): Logger {
    return new Logger({ ...this.options, component, ...overrides });
  }

  trace(message: string, context?: LogContext): void {
    this.write(LogLevel.TRACE, message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.write(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write(LogLevel.WARN, message, context);
  }

  error(messageOrError: string | Error, context?: LogContext): void {
    this.writeWithError(LogLevel.ERROR, messageOrError, context);
  }

  fatal(messageOrError: string | Error, context?: LogContext): void {
    this.writeWithError(LogLevel.FATAL, messageOrError, context);
  }

  private writeWithError(
    level: LogLevel,
    messageOrError: string | Error,
    context?: LogContext,
  ): void {
    if (messageOrError instanceof Error) {
      this.write(level, messageOrError.message, context, messageOrError);
    } else {
      this.write(level, messageOrError, context);
    }
  }

  private toEntry(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: Error,
  ): LogEntry {
    const entry: LogEntry = {
      level: LEVELS[level].label,
      message,
      timestamp: new Date().toISOString(),
    };
    if (this.options.component) entry.component = this.options.component;
    if (context && Object.keys(context).length > 0) entry.context = context;
    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
        code: errorCodeOf(error),
      };
    }
    return entry;
  }

  private paint(color: ChalkInstance, text: string): string {
    const colorize = this.options.colorize ?? process.stdout.isTTY === true;
    return colorize ? color(text) : text;
  }

  private formatHuman(level: LogLevel, entry: LogEntry): string {
    const parts: string[] = [];

    if (this.options.timestamp ?? true) {
      parts.push(this.paint(chalk.gray, `[${entry.timestamp}] `));
    }
    parts.push(this.paint(LEVELS[level].color, `${entry.level.padEnd(5)} `));
    if (entry.component) {
      parts.push(this.paint(chalk.gray, `[${entry.component}] `));
    }
    parts.push(entry.message);
    if (entry.context) {
      parts.push(this.paint(chalk.gray, ` ${JSON.stringify(entry.context)}`));
    }
    if (entry.error) {
      parts.push(
        `\n${entry.error.stack ?? `${entry.error.name}: ${entry.error.message}`}`,
      );
    }

    return parts.join("");
  }

  private write(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: Error,
  ): void {
    if (level < this.level) return;

    const entry = this.toEntry(level, message, context, error);
    const line =
      this.format === "json"
        ? JSON.stringify(entry)
        : this.formatHuman(level, entry);

    // ERROR and FATAL to stderr
    if (level >= LogLevel.ERROR) {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

const LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
  trace: LogLevel.TRACE,
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  fatal: LogLevel.FATAL,
};

function isLogLevelName(name: string): name is LogLevelName {
  return LOG_LEVEL_NAMES.some((known) => known === name);
}

/**
 * Parse a level name case-insensitively, falling back to INFO
 */
export function parseLogLevel(level?: string): LogLevel {
  const name = level?.toLowerCase() ?? "";
  return isLogLevelName(name) ? LEVEL_BY_NAME[name] : LogLevel.INFO;
}

/**
 * Default logger instance
 */
export const logger = new Logger();

export function createLogger(
  component: string,
  options?: Partial<LoggerOptions>,
): Logger {
  return logger.child(component, options);
}
