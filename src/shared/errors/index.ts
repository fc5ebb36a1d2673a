/**
 * Error Handling
 *
 * Exports error types, codes, and utilities for structured error responses
 */

export * from './error-codes.js';
export * from './form-error.js';
export * from './error-response.js';
