/**
 * Error types raised by the engine and the payload they become at the
 * CareerAdvisor / HTTP boundary.
 */

export type ErrorCode =
  | 'CONFIGURATION_MISSING'
  | 'REFERENCE_DATA_INVALID'
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'UNEXPECTED_ERROR';

export class PathfinderError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PathfinderError';
  }
}

/** A reference file is absent; callers fall back to the built-in table. */
export class ConfigurationMissingError extends PathfinderError {
  constructor(public file: string) {
    super(`Reference file not found: ${file}`, 'CONFIGURATION_MISSING', { file });
    this.name = 'ConfigurationMissingError';
  }
}

/** A reference file exists but does not have the expected shape. */
export class ReferenceDataError extends PathfinderError {
  constructor(message: string, public file: string) {
    super(`${file}: ${message}`, 'REFERENCE_DATA_INVALID', { file });
    this.name = 'ReferenceDataError';
  }
}

export class ValidationError extends PathfinderError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', context);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends PathfinderError {
  constructor(message: string, public available: string[] = []) {
    super(message, 'NOT_FOUND', { available });
    this.name = 'NotFoundError';
  }
}

export interface ErrorPayload {
  error: string;
  code: ErrorCode;
  available?: string[];
}

export function isErrorPayload(value: unknown): value is ErrorPayload {
  return typeof value === 'object' && value !== null && 'error' in value && 'code' in value;
}

/**
 * Anything that is not one of our own errors is reported generically; the
 * original message only goes to the log.
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof NotFoundError) {
    return { error: error.message, code: error.code, available: error.available };
  }
  if (error instanceof ValidationError) {
    return { error: error.message, code: error.code };
  }
  return { error: 'Internal error', code: 'UNEXPECTED_ERROR' };
}

export function httpStatusFor(payload: ErrorPayload): number {
  switch (payload.code) {
    case 'VALIDATION_ERROR':
      return 400;
    case 'NOT_FOUND':
      return 404;
    default:
      return 500;
  }
}
