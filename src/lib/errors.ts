/**
 * Structured Error Classes for the Action Controller
 *
 * Every failure an invocation can hit maps onto one of five kinds. The
 * dispatcher recovers all of them and turns them into a response envelope.
 */

import type { ErrorKind } from '../domain/types';

export const ErrorKinds = {
  VALIDATION: 'ValidationError',
  CONFIGURATION: 'ConfigurationError',
  AUTH_RESOLUTION: 'AuthResolutionError',
  EXECUTION_TIMEOUT: 'ExecutionTimeout',
  EXECUTION: 'ExecutionError',
} as const satisfies Record<string, ErrorKind>;

/**
 * Base error class for all controller errors
 */
export class ActionError extends Error {
  public readonly kind: ErrorKind;
  public readonly details: Record<string, unknown>;
  public override readonly cause: Error | undefined;
  public readonly timestamp: Date;

  constructor(
    message: string,
    kind: ErrorKind = ErrorKinds.EXECUTION,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message);
    this.name = 'ActionError';
    this.kind = kind;
    this.details = details || {};
    this.cause = cause;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Whether re-sending the same request can succeed without operator action
   */
  get retryable(): boolean {
    return (
      this.kind === ErrorKinds.AUTH_RESOLUTION ||
      this.kind === ErrorKinds.EXECUTION_TIMEOUT
    );
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp,
      cause: this.cause ? { message: this.cause.message } : undefined,
    };
  }

  getUserMessage(): string {
    return `${this.message} (${this.kind})`;
  }
}

/**
 * Malformed or incomplete request. Never retried by this layer.
 */
export class ValidationError extends ActionError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorKinds.VALIDATION, details, cause);
    this.name = 'ValidationError';
  }
}

/**
 * Bad static setup; needs an operator.
 */
export class ConfigurationError extends ActionError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorKinds.CONFIGURATION, details, cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * Identity or token exchange failed. Fatal for the invocation.
 */
export class AuthResolutionError extends ActionError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorKinds.AUTH_RESOLUTION, details, cause);
    this.name = 'AuthResolutionError';
  }
}

/**
 * The cluster call ran past its bound. A mutating call may still land.
 */
export class ExecutionTimeoutError extends ActionError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorKinds.EXECUTION_TIMEOUT, details, cause);
    this.name = 'ExecutionTimeoutError';
  }
}

/**
 * The cluster could not be reached or failed the command.
 */
export class ExecutionError extends ActionError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorKinds.EXECUTION, details, cause);
    this.name = 'ExecutionError';
  }
}

export function isActionError(error: unknown): error is ActionError {
  return error instanceof ActionError;
}

/**
 * Wrap anything thrown into an ActionError of the given kind
 */
export function toActionError(
  error: unknown,
  fallback: new (message: string, details?: Record<string, unknown>, cause?: Error) => ActionError = ExecutionError,
): ActionError {
  if (isActionError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new fallback(error.message, {}, error);
  }
  return new fallback(String(error));
}
