/**
 * Request logging middleware.
 * Captures method, path, status, duration, the calling operator and, for
 * /evaluations/:id routes, the evaluation id. Logs go to the configured
 * ILogProvider (Axiom, console, etc).
 *
 * Level mapping:
 *   2xx → info
 *   4xx → warn
 *   5xx → error
 *   handler exception → error (re-thrown)
 */

import type { ILogProvider, LogLevel, RequestLogEvent } from '../providers/ILogProvider.js';
import type { Handler, Middleware } from './pipeline.js';

const EVALUATION_PATH = /^\/api\/v1\/evaluations\/([^/]+)/;

function evaluationIdOf(path: string): string | undefined {
  const match = EVALUATION_PATH.exec(path);
  return match?.[1];
}

function levelForStatus(status: number): LogLevel {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}

export function createLoggingMiddleware(logProvider: ILogProvider): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const url = new URL(req.url);
      const method = req.method;
      const path = url.pathname;
      const evaluationId = evaluationIdOf(path);
      const start = performance.now();

      try {
        const response = await next(req, ctx);
        const durationMs = Math.round(performance.now() - start);
        const status = response.status;

        const event: RequestLogEvent = {
          level: levelForStatus(status),
          message: `${method} ${path} → ${status} (${durationMs}ms)`,
          method,
          path,
          status,
          durationMs,
          ...(ctx.operator && { operator: ctx.operator }),
          ...(evaluationId && { evaluationId }),
        };

        logProvider.log(event);
        return response;
      } catch (err) {
        const durationMs = Math.round(performance.now() - start);

        const event: RequestLogEvent = {
          level: 'error',
          message: `${method} ${path} → 500 (${durationMs}ms)`,
          method,
          path,
          status: 500,
          durationMs,
          fields: {
            error: err instanceof Error ? err.message : String(err),
          },
          ...(ctx.operator && { operator: ctx.operator }),
          ...(evaluationId && { evaluationId }),
        };

        logProvider.log(event);
        throw err;
      }
    };
  };
}
