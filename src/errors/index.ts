import { ErrorCode, ErrorSeverity, type ErrorContext, type ErrorDetails } from './types.js';

/**
 * Base error for everything raised while processing interface state
 */
export class NetStateError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly context?: ErrorContext;
  public readonly timestamp: number;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    context?: ErrorContext,
    originalError?: Error
  ) {
    super(message);
    this.name = 'NetStateError';
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.timestamp = Date.now();
    this.originalError = originalError;

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): ErrorDetails {
    return {
      code: this.code,
      message: this.message,
      severity: this.severity,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

/**
 * A single field of an interface failed a check.
 *
 * `field` is the model name of the offending value (e.g. `macAddress`),
 * `reason` says what was wrong with it. The document path, when known,
 * travels in `context.path`.
 */
export class ValidationError extends NetStateError {
  public readonly field: string;
  public readonly reason: string;

  constructor(field: string, reason: string, context?: ErrorContext) {
    super(`Invalid ${field}: ${reason}`, ErrorCode.VALIDATION_ERROR, ErrorSeverity.LOW, {
      field,
      ...context,
    });
    this.name = 'ValidationError';
    this.field = field;
    this.reason = reason;
  }

  /**
   * Same error, annotated with where in the document the value lives
   */
  at(path: string): ValidationError {
    return new ValidationError(this.field, this.reason, { ...this.context, path });
  }

  get path(): string | undefined {
    const path = this.context?.['path'];
    return typeof path === 'string' ? path : undefined;
  }
}

/**
 * Configuration-related errors
 */
export class ConfigurationError extends NetStateError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.CONFIGURATION_ERROR, ErrorSeverity.HIGH, context, originalError);
    this.name = 'ConfigurationError';
  }
}

/**
 * Tool execution errors
 */
export class ToolError extends NetStateError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext, originalError?: Error) {
    super(message, code, ErrorSeverity.MEDIUM, context, originalError);
    this.name = 'ToolError';
  }
}

export { ErrorCode, ErrorSeverity, type ErrorContext, type ErrorDetails } from './types.js';
