import { describe, it, expect } from 'vitest';
import { validateBody } from '../../src/middleware/validate-body.js';
import type { Handler, HandlerContext } from '../../src/middleware/pipeline.js';
import type { BodySchema } from '../../src/types/common.js';

describe('validateBody', () => {
  const ctx: HandlerContext = { operator: null };

  const echoHandler: Handler = async (req) => {
    const body: unknown = await req.json();
    return new Response(JSON.stringify(body), { status: 200 });
  };

  function makeReq(body: unknown): Request {
    return new Request('http://test', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  const schema: BodySchema = {
    name: { type: 'string', required: true, maxLength: 50 },
    age: { type: 'number', required: false, min: 0, max: 150 },
    active: { type: 'boolean', required: false },
    tags: { type: 'array', required: false },
  };

  it('should pass valid body through to handler', async () => {
    const res = await validateBody(schema)(echoHandler)(
      makeReq({ name: 'Test', age: 25, active: true, tags: ['a'] }),
      ctx
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ name: 'Test', age: 25, active: true, tags: ['a'] });
  });

  it('should pass with only required fields', async () => {
    const res = await validateBody(schema)(echoHandler)(makeReq({ name: 'Test' }), ctx);

    expect(res.status).toBe(200);
  });

  it('should reject missing required field', async () => {
    const res = await validateBody(schema)(echoHandler)(makeReq({ age: 25 }), ctx);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: 'INVALID_REQUEST',
        message: 'name is required',
        details: { fields: ['name is required'] },
      },
    });
  });

  it('should reject wrong type', async () => {
    const res = await validateBody(schema)(echoHandler)(makeReq({ name: 123 }), ctx);

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { message: 'name must be a string' } });
  });

  it('should reject string exceeding maxLength', async () => {
    const res = await validateBody(schema)(echoHandler)(makeReq({ name: 'a'.repeat(51) }), ctx);

    expect(res.status).toBe(400);
  });

  it('should reject number below min and above max', async () => {
    const low = await validateBody(schema)(echoHandler)(makeReq({ name: 'Test', age: -1 }), ctx);
    const high = await validateBody(schema)(echoHandler)(makeReq({ name: 'Test', age: 200 }), ctx);

    expect(await low.json()).toMatchObject({ error: { message: 'age must be at least 0' } });
    expect(await high.json()).toMatchObject({ error: { message: 'age must be at most 150' } });
  });

  it('should reject non-JSON body', async () => {
    const req = new Request('http://test', { method: 'POST', body: 'not json' });
    const res = await validateBody(schema)(echoHandler)(req, ctx);

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { message: 'Request body must be valid JSON' } });
  });

  it('should reject a JSON array body', async () => {
    const res = await validateBody(schema)(echoHandler)(makeReq([{ name: 'Test' }]), ctx);

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { message: 'Request body must be a JSON object' } });
  });

  it('should validate enum values', async () => {
    const enumSchema: BodySchema = {
      format: { type: 'string', required: true, enum: ['json', 'csv'] },
    };
    const wrapped = validateBody(enumSchema)(echoHandler);

    const good = await wrapped(makeReq({ format: 'csv' }), ctx);
    expect(good.status).toBe(200);

    const bad = await wrapped(makeReq({ format: 'xml' }), ctx);
    expect(bad.status).toBe(400);
    expect(await bad.json()).toMatchObject({ error: { message: 'format must be one of: json, csv' } });
  });

  it('should validate nested object fields with a dotted prefix', async () => {
    const nested: BodySchema = {
      agentConfig: {
        type: 'object',
        required: true,
        properties: {
          strategy: { type: 'string', required: true },
          model: { type: 'string', required: true },
        },
      },
    };
    const wrapped = validateBody(nested)(echoHandler);

    const res = await wrapped(makeReq({ agentConfig: { strategy: 7 } }), ctx);

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: {
        message: 'agentConfig.strategy must be a string; agentConfig.model is required',
        details: {
          fields: ['agentConfig.strategy must be a string', 'agentConfig.model is required'],
        },
      },
    });
  });

  it('should reject non-finite numbers', async () => {
    const res = await validateBody(schema)(echoHandler)(makeReq({ name: 'Test', age: '25' }), ctx);

    expect(await res.json()).toMatchObject({ error: { message: 'age must be a number' } });
  });
});
