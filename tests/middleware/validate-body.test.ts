import { describe, it, expect } from 'vitest';
import { validateBody } from '../../src/middleware/validate-body.js';
import type { Handler, HandlerContext } from '../../src/middleware/pipeline.js';
import type { ApiErrorResponse } from '../../src/types/api.js';
import type { BodySchema } from '../../src/types/common.js';

describe('validateBody', () => {
  const ctx: HandlerContext = { client: null };

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
    title: { type: 'string', required: false, maxLength: 50 },
    description: { type: 'string', required: true },
    limit: { type: 'number', required: false, min: 1, max: 50 },
    strict: { type: 'boolean', required: false },
    descriptions: { type: 'array', required: false, maxItems: 2, items: 'string' },
    items: { type: 'array', required: false, items: 'object' },
  };

  async function errorsOf(res: Response): Promise<ApiErrorResponse> {
    return (await res.json()) as ApiErrorResponse;
  }

  it('should pass a valid body through to the handler', async () => {
    const wrapped = validateBody(schema)(echoHandler);
    const res = await wrapped(
      makeReq({ title: 'Tee', description: 'Made in Japan', limit: 5, strict: true, descriptions: ['a'] }),
      ctx
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      title: 'Tee',
      description: 'Made in Japan',
      limit: 5,
      strict: true,
      descriptions: ['a'],
    });
  });

  it('should reject a missing required field', async () => {
    const res = await validateBody(schema)(echoHandler)(makeReq({ title: 'Tee' }), ctx);
    const body = await errorsOf(res);

    expect(res.status).toBe(400);
    expect(body.result).toBe('Failed');
    expect(body.errors[0]).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'description is required',
      details: { fields: ['description is required'] },
    });
  });

  it('should join several field errors', async () => {
    const res = await validateBody(schema)(echoHandler)(
      makeReq({ title: 7, description: 'x', limit: 0 }),
      ctx
    );

    expect((await errorsOf(res)).errors[0].message).toBe(
      'title must be a string; limit must be at least 1'
    );
  });

  it('should enforce string length and number bounds', async () => {
    const wrapped = validateBody(schema)(echoHandler);

    const long = await wrapped(makeReq({ description: 'x', title: 'a'.repeat(51) }), ctx);
    expect((await errorsOf(long)).errors[0].message).toBe('title must be 50 characters or less');

    const high = await wrapped(makeReq({ description: 'x', limit: 51 }), ctx);
    expect((await errorsOf(high)).errors[0].message).toBe('limit must be at most 50');
  });

  it('should enforce array size and element types', async () => {
    const wrapped = validateBody(schema)(echoHandler);

    const many = await wrapped(makeReq({ description: 'x', descriptions: ['a', 'b', 'c'] }), ctx);
    expect((await errorsOf(many)).errors[0].message).toBe('descriptions must have at most 2 items');

    const mixed = await wrapped(makeReq({ description: 'x', descriptions: ['a', 3] }), ctx);
    expect((await errorsOf(mixed)).errors[0].message).toBe('descriptions[1] must be a string');

    const objects = await wrapped(makeReq({ description: 'x', items: [{}, 'a'] }), ctx);
    expect((await errorsOf(objects)).errors[0].message).toBe('items[1] must be an object');
  });

  it('should treat null as missing', async () => {
    const res = await validateBody(schema)(echoHandler)(makeReq({ description: 'x', title: null }), ctx);
    expect(res.status).toBe(200);
  });

  it('should reject a non-JSON body', async () => {
    const req = new Request('http://test', { method: 'POST', body: 'not json' });
    const res = await validateBody(schema)(echoHandler)(req, ctx);

    expect(res.status).toBe(400);
    expect((await errorsOf(res)).errors[0].message).toBe('Request body must be valid JSON');
  });

  it('should reject a JSON array body', async () => {
    const res = await validateBody(schema)(echoHandler)(makeReq(['Made in Japan']), ctx);

    expect(res.status).toBe(400);
    expect((await errorsOf(res)).errors[0].message).toBe('Request body must be a JSON object');
  });

  it('should validate enum values', async () => {
    const enumSchema: BodySchema = {
      country_format: { type: 'string', required: true, enum: ['alpha2', 'alpha3'] },
    };
    const wrapped = validateBody(enumSchema)(echoHandler);

    expect((await wrapped(makeReq({ country_format: 'alpha3' }), ctx)).status).toBe(200);

    const bad = await wrapped(makeReq({ country_format: 'numeric' }), ctx);
    expect((await errorsOf(bad)).errors[0].message).toBe('country_format must be one of: alpha2, alpha3');
  });
});
