// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT
//
// Structured error classes for packaging runs.

/**
 * Error codes for programmatic handling by the CLI driver.
 */
export const ErrorCode = {
  ERR_COMMAND_FAILED: 'ERR_COMMAND_FAILED',
  ERR_USAGE: 'ERR_USAGE',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base error class for all packager errors.
 */
export class PackagerError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCodeType;

  /** Additional context for debugging */
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCodeType,
    options?: {
      context?: Record<string, unknown>;
      cause?: Error;
    },
  ) {
    super(message, options?.cause ? {cause: options.cause} : undefined);
    this.name = 'PackagerError';
    this.code = code;
    this.context = options?.context;

    // Maintains proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Returns a JSON-serializable representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * An external tool (gn, ninja, ar, libtool, lib.exe, cmake) exited non-zero.
 */
export class CommandFailedError extends PackagerError {
  readonly command: string;
  readonly args: readonly string[];
  readonly exitCode: number;

  constructor(command: string, args: readonly string[], exitCode: number) {
    super(`Command failed: ${command} ${args.join(' ')} (exit ${exitCode})`, ErrorCode.ERR_COMMAND_FAILED, {
      context: {command, args, exitCode},
    });
    this.name = 'CommandFailedError';
    this.command = command;
    this.args = args;
    this.exitCode = exitCode;
  }
}

/**
 * Missing or invalid command line options.
 */
export class UsageError extends PackagerError {
  constructor(message: string) {
    super(message, ErrorCode.ERR_USAGE);
    this.name = 'UsageError';
  }
}

export function isPackagerError(error: unknown): error is PackagerError {
  return error instanceof PackagerError;
}
