export type LogWindowErrorKind =
  | 'MissingDependency'
  | 'InvalidWindow'
  | 'InvalidConfiguration'
  | 'QueryFailure';

export interface LogWindowErrorOptions {
  message: string;
  cause?: Error;
  metadata?: Record<string, unknown>;
}

/**
 * Base class for every classified failure of a run.
 *
 * None of these are retried: the entry point reports the message and exits
 * with `exitCode`.
 */
export class LogWindowError extends Error {
  public readonly kind: LogWindowErrorKind;
  public readonly metadata?: Record<string, unknown>;
  public readonly exitCode: number = 1;

  constructor(kind: LogWindowErrorKind, options: LogWindowErrorOptions) {
    super(options.message, options.cause ? { cause: options.cause } : undefined);
    this.kind = kind;
    this.metadata = options.metadata;
    this.name = `${kind}Error`;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }

    if (options.cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${options.cause.stack}`;
    }
  }
}

export class MissingDependencyError extends LogWindowError {
  constructor(options: LogWindowErrorOptions) {
    super('MissingDependency', options);
  }
}

export class InvalidWindowError extends LogWindowError {
  constructor(options: LogWindowErrorOptions) {
    super('InvalidWindow', options);
  }
}

export class InvalidConfigurationError extends LogWindowError {
  constructor(options: LogWindowErrorOptions) {
    super('InvalidConfiguration', options);
  }
}

export class QueryFailureError extends LogWindowError {
  constructor(options: LogWindowErrorOptions) {
    super('QueryFailure', options);
  }
}

export function isLogWindowError(error: unknown): error is LogWindowError {
  return error instanceof LogWindowError;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
