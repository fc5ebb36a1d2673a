/**
 * Error Response Utilities
 *
 * Utilities for creating structured error responses for MCP tools
 */

import { FormProcessorError } from './form-error.js';
import { ErrorCode } from './error-codes.js';

/**
 * MCP Tool Response type
 */
export interface ToolResponse {
  [x: string]: unknown;
  content: { type: 'text'; text: string }[];
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
}

/**
 * Create a structured error response for MCP tools
 *
 * @param error - Error to convert to structured response
 * @param includeStack - Whether to include stack trace (default: process.env.NODE_ENV !== 'production')
 * @returns Structured MCP tool response with isError flag
 */
export function createErrorResponse(
  error: unknown,
  includeStack: boolean = process.env.NODE_ENV !== 'production',
): ToolResponse {
  let formError: FormProcessorError;
  if (error instanceof FormProcessorError) {
    formError = error;
  } else if (error instanceof Error) {
    formError = FormProcessorError.fromError(error);
  } else {
    formError = new FormProcessorError(String(error), ErrorCode.UNKNOWN_ERROR);
  }

  const structured = formError.toStructured();

  if (!includeStack) {
    delete structured.stack;
  }

  const textParts: string[] = [
    `Error: ${structured.error}`,
    `Code: ${structured.code}`,
    `Severity: ${structured.severity}`,
  ];

  if (structured.details && Object.keys(structured.details).length > 0) {
    textParts.push(`Details: ${JSON.stringify(structured.details, null, 2)}`);
  }

  if (includeStack && structured.stack) {
    textParts.push(`\nStack trace:\n${structured.stack}`);
  }

  return {
    content: [
      {
        type: 'text',
        text: textParts.join('\n'),
      },
    ],
    structuredContent: structured,
    isError: true,
  };
}

/**
 * Create a success response with structured output
 *
 * @param output - Output data to return
 * @returns Structured MCP tool response
 */
export function createSuccessResponse(output: Record<string, unknown>): ToolResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify(output, null, 2) }],
    structuredContent: output,
    isError: false,
  };
}
