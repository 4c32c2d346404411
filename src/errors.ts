/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { logger, type LogContext } from "./logger.js";

/**
 * Base error class for every failure the rewriter reports
 */
export abstract class FieldRewriteError extends Error {
  public readonly timestamp: Date;
  public readonly errorId: string;
  public readonly code: string;
  public readonly context?: LogContext;

  constructor(
    message: string,
    code: string,
    context?: LogContext,
    cause?: Error,
  ) {
    super(message, { cause });
    this.name = new.target.name;
    this.code = code;
    this.context = context;
    this.timestamp = new Date();
    this.errorId = `${code}-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }

    logger.debug(`${this.name}: ${message}`, {
      ...this.context,
      errorId: this.errorId,
      errorCode: this.code,
    });
  }

  toJSON(): Record<string, unknown> {
    const cause = this.cause instanceof Error ? this.cause : undefined;
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      errorId: this.errorId,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
      cause: cause
        ? {
            name: cause.name,
            message: cause.message,
            stack: cause.stack,
          }
        : undefined,
    };
  }
}

/**
 * Configuration-related errors
 */
export class ConfigError extends FieldRewriteError {
  public readonly filepath?: string;

  constructor(
    message: string,
    filepath?: string,
    cause?: Error,
    context?: LogContext,
  ) {
    super(
      message,
      "CONFIG_ERROR",
      {
        ...context,
        component: "Config",
        filePath: filepath,
      },
      cause,
    );
    this.filepath = filepath;
  }
}

/**
 * The target (or a rule table) could not be read as text
 */
export class FileReadError extends FieldRewriteError {
  public readonly filePath?: string;

  constructor(
    message: string,
    filePath?: string,
    cause?: Error,
    context?: LogContext,
  ) {
    super(
      message,
      "FILE_READ_ERROR",
      {
        ...context,
        component: "FileSystem",
        filePath,
      },
      cause,
    );
    this.filePath = filePath;
  }
}

/**
 * The rewritten buffer could not be stored. The original file is untouched.
 */
export class FileWriteError extends FieldRewriteError {
  public readonly filePath?: string;

  constructor(
    message: string,
    filePath?: string,
    cause?: Error,
    context?: LogContext,
  ) {
    super(
      message,
      "FILE_WRITE_ERROR",
      {
        ...context,
        component: "FileSystem",
        filePath,
      },
      cause,
    );
    this.filePath = filePath;
  }
}

/**
 * Validation errors for user-supplied data such as rule tables
 */
export class ValidationError extends FieldRewriteError {
  public readonly field?: string;
  public readonly value?: unknown;

  constructor(
    message: string,
    field?: string,
    value?: unknown,
    cause?: Error,
    context?: LogContext,
  ) {
    super(
      message,
      "VALIDATION_ERROR",
      {
        ...context,
        component: "Validation",
        field,
        value:
          typeof value === "object" ? JSON.stringify(value) : String(value),
      },
      cause,
    );
    this.field = field;
    this.value = value;
  }
}

/**
 * CLI argument errors
 */
export class CliError extends FieldRewriteError {
  public readonly command?: string;
  public readonly suggestions?: string[];

  constructor(
    message: string,
    command?: string,
    suggestions?: string[],
    cause?: Error,
    context?: LogContext,
  ) {
    super(
      message,
      "CLI_ERROR",
      {
        ...context,
        component: "CLI",
        operation: command,
        suggestions: suggestions?.join("; "),
      },
      cause,
    );
    this.command = command;
    this.suggestions = suggestions;
  }
}

class UnknownError extends FieldRewriteError {}

export const ErrorUtils = {
  isErrorType<T extends FieldRewriteError>(
    error: unknown,
    errorClass: abstract new (...args: never[]) => T,
  ): error is T {
    return error instanceof errorClass;
  },

  getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
      return error.message;
    }
    return String(error);
  },

  getErrorCode(error: unknown): string | undefined {
    if (error instanceof FieldRewriteError) {
      return error.code;
    }
    return undefined;
  },

  /**
   * Wrap unknown errors in FieldRewriteError
   */
  wrapUnknownError(
    error: unknown,
    operation: string,
    context?: LogContext,
  ): FieldRewriteError {
    if (error instanceof FieldRewriteError) {
      return error;
    }

    if (error instanceof Error) {
      return new UnknownError(
        `Unknown error in ${operation}: ${error.message}`,
        "UNKNOWN_ERROR",
        { ...context, operation },
        error,
      );
    }

    return new UnknownError(
      `Unknown error in ${operation}: ${String(error)}`,
      "UNKNOWN_ERROR",
      { ...context, operation },
    );
  },
};

/**
 * Error exit codes for CLI
 */
export const ErrorExitCodes = {
  SUCCESS: 0,
  GENERIC_ERROR: 1,
  CONFIG_ERROR: 2,
  FILE_ERROR: 3,
  VALIDATION_ERROR: 4,
  CLI_ERROR: 7,
} as const;

export type ErrorExitCode = (typeof ErrorExitCodes)[keyof typeof ErrorExitCodes];

export function getExitCode(errorCode: string | undefined): ErrorExitCode {
  switch (errorCode) {
    case "CONFIG_ERROR":
      return ErrorExitCodes.CONFIG_ERROR;
    case "FILE_READ_ERROR":
    case "FILE_WRITE_ERROR":
      return ErrorExitCodes.FILE_ERROR;
    case "VALIDATION_ERROR":
      return ErrorExitCodes.VALIDATION_ERROR;
    case "CLI_ERROR":
      return ErrorExitCodes.CLI_ERROR;
    default:
      return ErrorExitCodes.GENERIC_ERROR;
  }
}
