/**
 * Application errors.
 * Each carries the API error code and HTTP status it maps to in the error handler.
 * Per-question failures are not errors: they are recorded as result data.
 */

import type { ErrorCode } from './types/api.js';

export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_REQUEST', message, 400, details);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Invalid or missing API key') {
    super('UNAUTHORIZED', message, 401);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFLICT', message, 409, details);
  }
}

/** The evaluation's lifecycle state does not allow the requested operation. */
export class InvalidStateError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_STATE', message, 409, details);
  }
}

/** The result or evaluation store could not be reached. Aborts a run. */
export class RepositoryUnavailableError extends AppError {
  constructor(operation: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : cause ? String(cause) : 'unknown cause';
    super(
      'REPOSITORY_UNAVAILABLE',
      `Repository unavailable during ${operation}: ${detail}`,
      503,
      { operation },
      { cause }
    );
  }
}

/** A run was aborted by a run-level fault; the evaluation is now `errored`. */
export class EvaluationErroredError extends AppError {
  constructor(evaluationId: string, reason: string, message: string, cause?: unknown) {
    super(
      'EVALUATION_ERRORED',
      `Evaluation ${evaluationId} errored (${reason}): ${message}`,
      500,
      { evaluationId, reason },
      { cause }
    );
  }
}

/** Raised by loadConfig for a missing or malformed environment variable. */
export class ConfigError extends Error {
  constructor(readonly variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = 'ConfigError';
  }
}
