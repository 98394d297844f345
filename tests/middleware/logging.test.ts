import { describe, it, expect, beforeEach } from 'vitest';
import { createLoggingMiddleware } from '../../src/middleware/logging.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { Handler, HandlerContext } from '../../src/middleware/pipeline.js';

function makeRequest(method: string, path: string): Request {
  return new Request(`https://example.com${path}`, { method });
}

const defaultCtx: HandlerContext = { operator: null };
const operatorCtx: HandlerContext = { operator: 'alice' };

describe('logging middleware', () => {
  let logProvider: ConsoleLogProvider;
  let middleware: ReturnType<typeof createLoggingMiddleware>;

  beforeEach(() => {
    logProvider = new ConsoleLogProvider();
    middleware = createLoggingMiddleware(logProvider);
  });

  // --- basic request logging ---

  it('should log a successful request', async () => {
    const handler: Handler = async () =>
      new Response(JSON.stringify({ ok: true }), { status: 200 });

    const response = await middleware(handler)(makeRequest('GET', '/api/v1/benchmarks'), defaultCtx);

    expect(response.status).toBe(200);
    expect(logProvider.events).toHaveLength(1);
    expect(logProvider.events[0]).toMatchObject({
      level: 'info',
      method: 'GET',
      path: '/api/v1/benchmarks',
      status: 200,
    });
    expect(logProvider.events[0]?.message).toMatch(/^GET \/api\/v1\/benchmarks → 200 \(\d+ms\)$/);
  });

  it('should pass through the response unmodified', async () => {
    const body = JSON.stringify({ id: 'ev-1', state: 'pending' });
    const handler: Handler = async () =>
      new Response(body, {
        status: 201,
        headers: { 'Content-Type': 'application/json', 'X-Custom': 'yes' },
      });

    const response = await middleware(handler)(makeRequest('POST', '/api/v1/evaluations'), defaultCtx);

    expect(response.status).toBe(201);
    expect(response.headers.get('X-Custom')).toBe('yes');
    expect(await response.text()).toBe(body);
  });

  // --- operator context ---

  it('should include the operator when the request is authenticated', async () => {
    const handler: Handler = async () => new Response(null, { status: 200 });
    await middleware(handler)(makeRequest('GET', '/api/v1/evaluations'), operatorCtx);

    expect(logProvider.events[0]).toMatchObject({ operator: 'alice' });
  });

  it('should omit the operator when none is in context', async () => {
    const handler: Handler = async () => new Response(null, { status: 200 });
    await middleware(handler)(makeRequest('GET', '/api/v1/evaluations'), defaultCtx);

    expect(logProvider.events[0]).not.toHaveProperty('operator');
  });

  // --- level mapping ---

  it('should tag requests on an evaluation with its id', async () => {
    const handler: Handler = async () => new Response(null, { status: 200 });

    await middleware(handler)(makeRequest('GET', '/api/v1/evaluations/ev-7/results?format=csv'), operatorCtx);

    expect(logProvider.events[0]).toMatchObject({
      path: '/api/v1/evaluations/ev-7/results',
      operator: 'alice',
      evaluationId: 'ev-7',
    });
  });

  it('should tag a failing request on an evaluation with its id', async () => {
    const handler: Handler = async () => {
      throw new Error('store down');
    };

    await expect(
      middleware(handler)(makeRequest('POST', '/api/v1/evaluations/ev-3/cancel'), defaultCtx)
    ).rejects.toThrow('store down');

    expect(logProvider.events[0]).toMatchObject({ level: 'error', status: 500, evaluationId: 'ev-3' });
  });

  it('should not tag collection routes with an evaluation id', async () => {
    const handler: Handler = async () => new Response(null, { status: 200 });

    await middleware(handler)(makeRequest('GET', '/api/v1/evaluations'), defaultCtx);

    expect(logProvider.events[0]).not.toHaveProperty('evaluationId');
  });

  it('should log 4xx responses at warn level', async () => {
    const handler: Handler = async () => new Response(null, { status: 404 });
    await middleware(handler)(makeRequest('GET', '/api/v1/evaluations/missing'), defaultCtx);

    expect(logProvider.events[0]).toMatchObject({ level: 'warn', status: 404 });
  });

  it('should log 5xx responses at error level', async () => {
    const handler: Handler = async () => new Response('Internal Error', { status: 503 });
    await middleware(handler)(makeRequest('POST', '/api/v1/evaluations'), defaultCtx);

    expect(logProvider.events[0]).toMatchObject({ level: 'error', status: 503 });
  });

  it('should log 2xx responses at info level', async () => {
    const handler: Handler = async () => new Response(null, { status: 202 });
    await middleware(handler)(makeRequest('POST', '/api/v1/evaluations/ev-1/cancel'), defaultCtx);

    expect(logProvider.events[0]?.level).toBe('info');
  });

  // --- duration tracking ---

  it('should measure request duration', async () => {
    const handler: Handler = async () => {
      await new Promise((r) => setTimeout(r, 20));
      return new Response(null, { status: 200 });
    };

    await middleware(handler)(makeRequest('GET', '/api/v1/benchmarks'), defaultCtx);

    const event = logProvider.events[0];
    const durationMs = event && 'durationMs' in event ? event.durationMs : undefined;
    expect(durationMs).toBeGreaterThanOrEqual(15); // allow small timing variance
  });

  // --- handler exceptions ---

  it('should log and re-throw if the handler throws', async () => {
    const handler: Handler = async () => {
      throw new Error('boom');
    };

    await expect(
      middleware(handler)(makeRequest('POST', '/api/v1/evaluations'), operatorCtx)
    ).rejects.toThrow('boom');

    expect(logProvider.events).toHaveLength(1);
    expect(logProvider.events[0]).toMatchObject({
      level: 'error',
      status: 500,
      operator: 'alice',
      fields: { error: 'boom' },
    });
  });

  it('should log path without query parameters', async () => {
    const handler: Handler = async () => new Response(null, { status: 200 });
    await middleware(handler)(makeRequest('GET', '/api/v1/evaluations?state=running&limit=5'), defaultCtx);

    expect(logProvider.events[0]).toMatchObject({ path: '/api/v1/evaluations' });
  });
});
