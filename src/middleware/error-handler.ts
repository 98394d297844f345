/**
 * Error handler middleware.
 * Catches errors thrown by handlers and maps them to structured JSON responses.
 * AppError subclasses get their status code and details; unknown errors become 500
 * and are reported to the log provider, since the response hides them.
 */

import { AppError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { Handler, Middleware } from './pipeline.js';
import type { ApiErrorResponse } from '../types/api.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };
const RETRY_AFTER_SECONDS = 5;

export function createErrorHandler(logProvider: ILogProvider): Middleware {
  return (next: Handler): Handler => async (req, ctx) => {
    try {
      return await next(req, ctx);
    } catch (err) {
      if (err instanceof AppError) {
        const body: ApiErrorResponse = {
          error: {
            code: err.code,
            message: err.message,
            ...(err.details && { details: err.details }),
          },
        };

        const headers: Record<string, string> = { ...JSON_HEADERS };

        // Storage outages are usually brief
        if (err.statusCode === 503) {
          headers['Retry-After'] = String(RETRY_AFTER_SECONDS);
        }

        return new Response(JSON.stringify(body), {
          status: err.statusCode,
          headers,
        });
      }

      // Unknown error: don't leak internals
      logProvider.error('Unhandled error', {
        path: new URL(req.url).pathname,
        error: err instanceof Error ? err.message : String(err),
        stack: err instanceof Error ? err.stack : undefined,
      });

      const body: ApiErrorResponse = {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
        },
      };

      return new Response(JSON.stringify(body), {
        status: 500,
        headers: JSON_HEADERS,
      });
    }
  };
}
