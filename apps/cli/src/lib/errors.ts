/**
 * CLI errors with actionable suggestions and exit codes
 */

import { isLeakgateError, PolicyConfigError } from '@leakgate/core';

/** Process exit codes */
export const EXIT_CODES = {
  PASSED: 0,
  GATE_FAILED: 1,
  USAGE_ERROR: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/** All possible error codes for categorization */
export type CliErrorCode =
  | 'ENV_INVALID'
  | 'POLICY_NOT_FOUND'
  | 'POLICY_INVALID'
  | 'FINDINGS_NOT_FOUND'
  | 'FINDINGS_INVALID'
  | 'INVALID_INPUT'
  | 'UNKNOWN_ERROR';

const DEFAULT_SUGGESTIONS: Record<CliErrorCode, string[]> = {
  ENV_INVALID: ['Check the LEAKGATE_* environment variables'],
  POLICY_NOT_FOUND: ['Check the --policy path or remove the flag to use .leakgate.yml'],
  POLICY_INVALID: ['Fix the named section of the policy file'],
  FINDINGS_NOT_FOUND: ['Pass the detector output with --findings <file>'],
  FINDINGS_INVALID: ['Findings must be a JSON array, or an object with a "findings" array'],
  INVALID_INPUT: ['Run `leakgate gate --help` for usage'],
  UNKNOWN_ERROR: [],
};

/**
 * Error surfaced to the operator as a single line, never as a stack trace
 */
export class CliError extends Error {
  public readonly code: CliErrorCode;
  public readonly suggestions: string[];
  public override readonly cause?: Error;

  constructor(
    message: string,
    code: CliErrorCode,
    options: { suggestions?: string[]; cause?: Error } = {}
  ) {
    super(message);
    this.name = 'CliError';
    this.code = code;
    this.suggestions = options.suggestions ?? DEFAULT_SUGGESTIONS[code];
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CliError);
    }
  }

  get exitCode(): ExitCode {
    return EXIT_CODES.USAGE_ERROR;
  }

  /**
   * Format error for display
   */
  format(options: { verbose?: boolean } = {}): string {
    const lines = [`[${this.code}] ${this.message}`];
    if (options.verbose) {
      for (const suggestion of this.suggestions) {
        lines.push(`  -> ${suggestion}`);
      }
      if (this.cause) {
        lines.push(`  Caused by: ${this.cause.message}`);
      }
    }
    return lines.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestions: this.suggestions,
      cause: this.cause?.message,
    };
  }
}

export function isCliError(error: unknown): error is CliError {
  return error instanceof CliError;
}

/**
 * Map anything thrown during a command onto a CliError
 */
export function wrapError(error: unknown): CliError {
  if (isCliError(error)) {
    return error;
  }

  if (error instanceof PolicyConfigError) {
    return new CliError(error.message, error.code === 'CONFIG_NOT_FOUND' ? 'POLICY_NOT_FOUND' : 'POLICY_INVALID', {
      cause: error,
      suggestions: error.recoveryHint ? [error.recoveryHint] : undefined,
    });
  }

  if (isLeakgateError(error)) {
    return new CliError(error.message, 'UNKNOWN_ERROR', {
      cause: error,
      suggestions: error.recoveryHint ? [error.recoveryHint] : undefined,
    });
  }

  if (error instanceof Error) {
    return new CliError(error.message, 'UNKNOWN_ERROR', { cause: error });
  }

  return new CliError(String(error), 'UNKNOWN_ERROR');
}
