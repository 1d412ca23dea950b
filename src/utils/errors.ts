/**
 * Error types and codes for setting-extractor.
 * All errors raised by the tool extend ExtractorError.
 */

/**
 * Base error class for all setting-extractor errors.
 */
export class ExtractorError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ExtractorError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends ExtractorError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * The parsing collaborator could not produce a tree for a file.
 * Error codes: P001-P003
 */
export class TreeAcquisitionError extends ExtractorError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'TreeAcquisitionError';
  }
}

/**
 * Malformed path expression.
 */
export class QuerySyntaxError extends ExtractorError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'QuerySyntaxError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 * Error codes: S001-S003
 */
export class SystemError extends ExtractorError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Configuration
  CONFIG_LOAD_ERROR: 'C001',
  CONFIG_INVALID: 'C002',

  // Tree acquisition (P001-P003)
  PARSE_FAILED: 'P001',
  SERVICE_UNAVAILABLE: 'P002',
  PARSE_REJECTED: 'P003',

  // Query language
  QUERY_SYNTAX: 'Q001',

  // System errors (S001-S003)
  PARSE_ERROR: 'S001',
  INVALID_TREE: 'S002',
  OUTPUT_WRITE_FAILED: 'S003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Extract a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
