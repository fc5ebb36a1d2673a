/**
 * Form Processor Error Types
 *
 * Structured error types for configuration and data-access failures.
 * Field validation problems are never thrown; they are collected on fields.
 */

import { ErrorCode, ErrorSeverity } from './error-codes.js';

/**
 * Base error class
 *
 * Extends Error with additional metadata for structured error responses
 */
export class FormProcessorError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    public readonly severity: ErrorSeverity = ErrorSeverity.ERROR,
    public readonly details?: Record<string, unknown>,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'FormProcessorError';

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FormProcessorError);
    }
  }

  /**
   * Convert to structured error object for tool responses
   */
  toStructured(): {
    error: string;
    code: ErrorCode;
    severity: ErrorSeverity;
    details?: Record<string, unknown>;
    stack?: string;
  } {
    return {
      error: this.message,
      code: this.code,
      severity: this.severity,
      details: this.details,
      stack: this.stack,
    };
  }

  /**
   * Create from standard Error
   */
  static fromError(
    error: Error,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    severity: ErrorSeverity = ErrorSeverity.ERROR,
  ): FormProcessorError {
    return new FormProcessorError(error.message, code, severity, undefined, error);
  }
}

/**
 * Domain-specific error classes
 */

/**
 * A form or profile was declared incorrectly. Always a programming error.
 */
export class FormConfigError extends FormProcessorError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INVALID_PROFILE,
    details?: Record<string, unknown>,
  ) {
    super(message, code, ErrorSeverity.CRITICAL, details);
    this.name = 'FormConfigError';
  }
}

export class FieldTypeError extends FormProcessorError {
  constructor(type: string, details?: Record<string, unknown>) {
    super(`Failed to load field type '${type}'`, ErrorCode.UNKNOWN_FIELD_TYPE, ErrorSeverity.CRITICAL, {
      type,
      ...details,
    });
    this.name = 'FieldTypeError';
  }
}

export class RelationshipConfigError extends FormProcessorError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message, ErrorCode.RELATIONSHIP_UNRESOLVED, ErrorSeverity.CRITICAL, details);
    this.name = 'RelationshipConfigError';
  }
}

export class DataAccessError extends FormProcessorError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.TABLE_NOT_FOUND,
    details?: Record<string, unknown>,
  ) {
    super(message, code, ErrorSeverity.ERROR, details);
    this.name = 'DataAccessError';
  }
}

export class RecordNotFoundError extends DataAccessError {
  constructor(table: string, id: string | number) {
    super(`No '${table}' record with id '${id}'`, ErrorCode.RECORD_NOT_FOUND, { table, id });
    this.name = 'RecordNotFoundError';
  }
}

export class HostError extends FormProcessorError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.FORM_NOT_REGISTERED,
    details?: Record<string, unknown>,
  ) {
    super(message, code, ErrorSeverity.WARNING, details);
    this.name = 'HostError';
  }
}
