/**
 * Error Codes
 *
 * Stable identifiers and severities for structured errors.
 */

/**
 * Error codes raised by the form layer
 */
export enum ErrorCode {
  // Declaration / configuration
  INVALID_PROFILE = 'INVALID_PROFILE',
  FIELD_NOT_FOUND = 'FIELD_NOT_FOUND',
  UNKNOWN_FIELD_TYPE = 'UNKNOWN_FIELD_TYPE',
  DUPLICATE_FIELD = 'DUPLICATE_FIELD',
  RELATIONSHIP_UNRESOLVED = 'RELATIONSHIP_UNRESOLVED',
  UNSUPPORTED_VALUE = 'UNSUPPORTED_VALUE',
  NOT_VALIDATED = 'NOT_VALIDATED',

  // Data access
  TABLE_NOT_FOUND = 'TABLE_NOT_FOUND',
  RECORD_NOT_FOUND = 'RECORD_NOT_FOUND',
  UNKNOWN_COLUMN = 'UNKNOWN_COLUMN',
  INVALID_DATA_FILE = 'INVALID_DATA_FILE',

  // Host
  FORM_NOT_REGISTERED = 'FORM_NOT_REGISTERED',
  INVALID_FORM_DEFINITION = 'INVALID_FORM_DEFINITION',
  NOT_INITIALIZED = 'NOT_INITIALIZED',

  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  DEBUG = 'debug',
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical',
}
