import { describe, it, expect } from 'vitest';
import { errorHandler, errorResponse } from '../../src/middleware/error-handler.js';
import {
  NotFoundError,
  UnauthorizedError,
  ValidationError,
  QuotaError,
  ModelNotFoundError,
  AppError,
} from '../../src/errors.js';
import type { Handler, HandlerContext } from '../../src/middleware/pipeline.js';
import type { ApiErrorResponse } from '../../src/types/api.js';

describe('errorHandler', () => {
  const ctx: HandlerContext = { client: null };
  const req = new Request('http://test');

  async function failWith(err: unknown): Promise<{ res: Response; body: ApiErrorResponse }> {
    const handler: Handler = async () => {
      throw err;
    };
    const res = await errorHandler(handler)(req, ctx);
    return { res, body: (await res.json()) as ApiErrorResponse };
  }

  it('should pass through successful responses', async () => {
    const handler: Handler = async () =>
      new Response(JSON.stringify({ ok: true }), { status: 200 });

    const res = await errorHandler(handler)(req, ctx);

    expect(res.status).toBe(200);
  });

  it('should map NotFoundError to 404 in the failure envelope', async () => {
    const { res, body } = await failWith(new NotFoundError('Thing not found'));

    expect(res.status).toBe(404);
    expect(res.headers.get('Content-Type')).toBe('application/json');
    expect(body).toEqual({
      result: 'Failed',
      errors: [{ code: 'NOT_FOUND', message: 'Thing not found' }],
    });
  });

  it('should map UnauthorizedError to 401', async () => {
    const { res, body } = await failWith(new UnauthorizedError());

    expect(res.status).toBe(401);
    expect(body.errors[0].code).toBe('UNAUTHORIZED');
  });

  it('should map ValidationError to 400 with details', async () => {
    const { res, body } = await failWith(new ValidationError('Bad input', { fields: ['title'] }));

    expect(res.status).toBe(400);
    expect(body.errors[0]).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'Bad input',
      details: { fields: ['title'] },
    });
  });

  it('should map QuotaError to 429 with Retry-After', async () => {
    const { res, body } = await failWith(new QuotaError('slow down', 30));

    expect(res.status).toBe(429);
    expect(body.errors[0].code).toBe('QUOTA_ERROR');
    expect(body.errors[0].details?.retryAfter).toBe(30);
    expect(res.headers.get('Retry-After')).toBe('30');
  });

  it('should name the model in MODEL_NOT_FOUND', async () => {
    const { res, body } = await failWith(new ModelNotFoundError('custom-model'));

    expect(res.status).toBe(404);
    expect(body.errors[0].message).toBe("Model 'custom-model' not found or not accessible.");
    expect(body.errors[0].details).toEqual({ model: 'custom-model' });
  });

  it('should map unknown errors to 500 without exposing internals', async () => {
    const { res, body } = await failWith(new Error('secret upstream error with credentials'));

    expect(res.status).toBe(500);
    expect(body.errors[0].code).toBe('INTERNAL_ERROR');
    expect(body.errors[0].message).toBe('An unexpected error occurred');
  });

  it('should handle custom AppError subclasses', async () => {
    const { res, body } = await failWith(new AppError('INIT_ERROR', 'Not configured', 500));

    expect(res.status).toBe(500);
    expect(body.errors[0].code).toBe('INIT_ERROR');
  });
});

describe('errorResponse', () => {
  it('should merge extra headers', async () => {
    const res = errorResponse(new NotFoundError('nope'), { 'Access-Control-Allow-Origin': '*' });

    expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*');
    expect(res.headers.get('Content-Type')).toBe('application/json');
  });
});
