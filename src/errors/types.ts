/**
 * Error codes and severities for interface-state processing
 */

export enum ErrorCode {
  // General errors (1000-1999)
  UNKNOWN_ERROR = 1000,
  VALIDATION_ERROR = 1001,
  CONFIGURATION_ERROR = 1002,

  // Tool errors (3000-3999)
  TOOL_EXECUTION_ERROR = 3000,
  TOOL_INVALID_INPUT = 3001,
  TOOL_NOT_FOUND = 3002,
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export interface ErrorContext {
  [key: string]: unknown;
}

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  severity: ErrorSeverity;
  context?: ErrorContext;
  timestamp: number;
  stack?: string;
}
