import type { JsonValue } from '../types/value';

/**
 * Canonical error categories used across condspec.
 */
export type ErrorCategory =
  | 'validation'
  | 'expression'
  | 'spec'
  | 'io'
  | 'config'
  | 'internal'
  | 'unknown';

/**
 * Standardised error codes.
 * Codes follow the convention `<CATEGORY>_<IDENTIFIER>`.
 */
export type ErrorCode =
  | 'VALIDATION_INVALID_INPUT'
  | 'EXPRESSION_SYNTAX'
  | 'EXPRESSION_EVALUATION'
  | 'SPEC_INVALID'
  | 'SPEC_PATTERN_INVALID'
  | 'IO_NOT_FOUND'
  | 'IO_PERMISSION_DENIED'
  | 'IO_SIZE_LIMIT'
  | 'CONFIG_INVALID'
  | 'INTERNAL_UNEXPECTED'
  | 'UNKNOWN';

/**
 * Additional diagnostic context included with every error.
 */
export interface ErrorContext {
  operation?: string;
  module?: string;
  correlationId?: string;
  data?: Record<string, JsonValue>;
  cause?: unknown;
  [key: string]: unknown;
}

export interface CondSpecErrorOptions {
  message: string;
  code: ErrorCode;
  category: ErrorCategory;
  context?: ErrorContext;
  cause?: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  code: ErrorCode;
  category: ErrorCategory;
  context?: ErrorContext;
  stack?: string;
  cause?: SerializedError | string;
}
