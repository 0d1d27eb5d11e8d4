/**
 * Error types and codes for tfmigrate.
 * Every error thrown by the tool extends TfMigrateError.
 */

/**
 * Base error class for all tfmigrate errors.
 */
export class TfMigrateError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TfMigrateError';
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
export class ConfigError extends TfMigrateError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * HCL syntax errors. Details carry the file name and 1-based line.
 */
export class ParseError extends TfMigrateError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ParseError';
  }
}

/**
 * State document errors (invalid JSON, unexpected shape).
 */
export class StateError extends TfMigrateError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'StateError';
  }
}

/**
 * System errors (file not found, unreadable input, etc.).
 */
export class SystemError extends TfMigrateError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Input errors (S001-S005)
  PARSE_ERROR: 'S001',
  INVALID_STATE: 'S002',
  FILE_NOT_FOUND: 'S003',
  WRITE_FAILED: 'S004',
  INVALID_CONFIG: 'S005',

  // Migration errors (M001-M003)
  UNSUPPORTED_VERSION: 'M001',
  TRANSFORM_FAILED: 'M002',
  INVALID_REFERENCE: 'M003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
