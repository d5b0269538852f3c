/**
 * Error types and codes for tracemark.
 * All errors thrown by the engine extend TracemarkError.
 */

/**
 * Base error class for all tracemark errors.
 */
export class TracemarkError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TracemarkError';
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
 * Configuration errors (loading, parsing, schema validation).
 */
export class ConfigError extends TracemarkError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (file reads, parse failures).
 */
export class SystemError extends TracemarkError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * A query asked about an id or path that is absent from the current snapshot.
 */
export class NotFoundError extends TracemarkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.NOT_FOUND, message, details);
    this.name = 'NotFoundError';
  }
}

/**
 * A rebuild was abandoned. The previous snapshot is still live.
 */
export class RebuildError extends TracemarkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.REBUILD_FAILED, message, details);
    this.name = 'RebuildError';
  }
}

export const ErrorCodes = {
  // Configuration
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  EMPTY_INCLUDE: 'EMPTY_INCLUDE',
  NO_FILES: 'NO_FILES',
  NO_SPEC_DOCUMENTS: 'NO_SPEC_DOCUMENTS',

  // System
  PARSE_ERROR: 'PARSE_ERROR',
  READ_ERROR: 'READ_ERROR',

  // Queries and lifecycle
  NOT_FOUND: 'NOT_FOUND',
  NOT_READY: 'NOT_READY',
  REBUILD_FAILED: 'REBUILD_FAILED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Extract a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
