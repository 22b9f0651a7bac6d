/**
 * Custom Error Classes
 *
 * Provides structured error handling with error codes, context, and recovery hints.
 */

export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'CONFIG_NOT_FOUND'
  | 'REGISTRY_CONFLICT'
  | 'VALIDATOR_FAILED'
  | 'CLASSIFICATION_FAILED'
  | 'TIMEOUT'
  | 'OPERATION_CANCELLED'
  | 'INTERNAL_ERROR';

export interface ErrorContext {
  code: ErrorCode;
  component: string;
  operation: string;
  details?: Record<string, unknown>;
  recoveryHint?: string;
  retryable?: boolean;
}

/**
 * Base error class for all leakgate errors
 */
export class LeakgateError extends Error {
  public readonly code: ErrorCode;
  public readonly component: string;
  public readonly operation: string;
  public readonly details: Record<string, unknown>;
  public readonly recoveryHint?: string;
  public readonly retryable: boolean;
  public readonly timestamp: Date;
  public override readonly cause?: Error;

  constructor(message: string, context: ErrorContext, cause?: Error) {
    super(message);
    this.name = 'LeakgateError';
    this.code = context.code;
    this.component = context.component;
    this.operation = context.operation;
    this.details = context.details ?? {};
    this.recoveryHint = context.recoveryHint;
    this.retryable = context.retryable ?? false;
    this.timestamp = new Date();
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LeakgateError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      component: this.component,
      operation: this.operation,
      details: this.details,
      recoveryHint: this.recoveryHint,
      retryable: this.retryable,
      timestamp: this.timestamp.toISOString(),
      cause: this.cause?.message,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.component}.${this.operation}: ${this.message}`;
  }
}

/**
 * Malformed or missing policy file. Fatal for the invocation; rendered to
 * the operator as one line, never as a stack trace.
 */
export class PolicyConfigError extends LeakgateError {
  /** Absolute path of the offending file, when there is one */
  public readonly configPath?: string;
  /** Top-level section that failed (`version`, `budgets`, `waivers[0]`, ...) */
  public readonly section?: string;

  constructor(
    message: string,
    options: {
      configPath?: string;
      section?: string;
      notFound?: boolean;
      cause?: Error;
    } = {}
  ) {
    super(formatPolicyConfigMessage(message, options.configPath, options.section), {
      code: options.notFound ? 'CONFIG_NOT_FOUND' : 'CONFIG_INVALID',
      component: 'Policy',
      operation: 'load',
      details: { configPath: options.configPath, section: options.section },
      recoveryHint: options.notFound
        ? 'Check the --policy path or remove the flag to use the defaults'
        : 'Fix the named section of the policy file',
      retryable: false,
    }, options.cause);
    this.name = 'PolicyConfigError';
    this.configPath = options.configPath;
    this.section = options.section;
  }
}

function formatPolicyConfigMessage(message: string, configPath?: string, section?: string): string {
  let formatted = message;
  if (configPath) {
    formatted += ` (config: ${configPath})`;
  }
  if (section) {
    formatted += ` (section: ${section})`;
  }
  return formatted;
}

/**
 * Validator registration conflict
 */
export class RegistryError extends LeakgateError {
  public readonly validatorName?: string;

  constructor(
    message: string,
    options: {
      operation: string;
      validatorName?: string;
    }
  ) {
    super(message, {
      code: 'REGISTRY_CONFLICT',
      component: 'ValidatorRegistry',
      operation: options.operation,
      details: { validatorName: options.validatorName },
      recoveryHint: 'Give every validator a unique name',
      retryable: false,
    });
    this.name = 'RegistryError';
    this.validatorName = options.validatorName;
  }
}

/**
 * Failure inside a single validator. Downgraded to an indeterminate result,
 * never thrown to the pipeline caller.
 */
export class ValidatorError extends LeakgateError {
  public readonly validatorName: string;

  constructor(message: string, options: { validatorName: string; code?: ErrorCode; cause?: Error }) {
    super(message, {
      code: options.code ?? 'VALIDATOR_FAILED',
      component: 'Validator',
      operation: 'validate',
      details: { validatorName: options.validatorName },
      retryable: options.code === 'TIMEOUT',
    }, options.cause);
    this.name = 'ValidatorError';
    this.validatorName = options.validatorName;
  }
}

/**
 * Failure while classifying one finding
 */
export class ClassificationError extends LeakgateError {
  constructor(message: string, options: { rule: string; path: string; cause?: Error }) {
    super(message, {
      code: 'CLASSIFICATION_FAILED',
      component: 'Classifier',
      operation: 'classify',
      details: { rule: options.rule, path: options.path },
      retryable: false,
    }, options.cause);
    this.name = 'ClassificationError';
  }
}

/**
 * Timeout error
 */
export class TimeoutError extends LeakgateError {
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, {
      code: 'TIMEOUT',
      component: 'Timeout',
      operation,
      details: { timeoutMs },
      recoveryHint: 'Consider increasing LEAKGATE_VALIDATOR_TIMEOUT_MS',
      retryable: true,
    });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Operation abandoned because its caller aborted
 */
export class CancelledError extends LeakgateError {
  constructor(operation: string) {
    super(`${operation} was cancelled`, {
      code: 'OPERATION_CANCELLED',
      component: 'Cancellation',
      operation,
      retryable: false,
    });
    this.name = 'CancelledError';
  }
}

/**
 * Check if an error is a LeakgateError
 */
export function isLeakgateError(error: unknown): error is LeakgateError {
  return error instanceof LeakgateError;
}
