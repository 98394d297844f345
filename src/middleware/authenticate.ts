/**
 * Authentication middleware.
 * Extracts the Bearer token from the Authorization header, looks it up in the
 * configured API keys, and attaches the operator name to context.
 * Keys are compared as SHA-256 digests with timingSafeEqual.
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import type { Handler, Middleware } from './pipeline.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

function unauthorized(message: string): Response {
  return new Response(
    JSON.stringify({ error: { code: 'UNAUTHORIZED', message } }),
    { status: 401, headers: JSON_HEADERS }
  );
}

/** @param apiKeys API key → operator name, as parsed from REASONBENCH_API_KEYS. */
export function createAuthMiddleware(apiKeys: ReadonlyMap<string, string>): Middleware {
  const known = [...apiKeys].map(([key, operator]) => ({ hash: digest(key), operator }));

  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const authHeader = req.headers.get('Authorization');

      if (!authHeader || !authHeader.startsWith('Bearer ')) {
        return unauthorized('Missing or invalid Authorization header. Use: Bearer <api_key>');
      }

      const apiKey = authHeader.slice(7).trim();
      if (!apiKey) {
        return unauthorized('API key is empty');
      }

      const hash = digest(apiKey);
      const match = known.find((k) => timingSafeEqual(k.hash, hash));
      if (!match) {
        return unauthorized('Invalid API key');
      }

      ctx.operator = match.operator;
      return next(req, ctx);
    };
  };
}
