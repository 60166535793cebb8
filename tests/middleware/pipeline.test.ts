import { describe, it, expect } from 'vitest';
import { createAuthMiddleware, clientIdFor } from '../../src/middleware/authenticate.js';
import { createRequestLogging } from '../../src/middleware/logging.js';
import { pipeline, requestContext } from '../../src/middleware/pipeline.js';
import type { Handler } from '../../src/middleware/pipeline.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { InMemoryCounterStore } from '../../src/stores/InMemoryCounterStore.js';

describe('pipeline', () => {
  const makeContext = requestContext;

  it('should start each request with an empty context', () => {
    const ctx = requestContext();
    expect(ctx).toEqual({ client: null });
    expect(requestContext()).not.toBe(ctx);
  });

  it('should call the handler directly when no middleware', async () => {
    const handler: Handler = async () =>
      new Response('ok', { status: 200 });

    const wrapped = pipeline()(handler);
    const res = await wrapped(new Request('http://test'), makeContext());

    expect(res.status).toBe(200);
    expect(await res.text()).toBe('ok');
  });

  it('should apply middleware in order (left to right)', async () => {
    const order: string[] = [];

    const mw1 = (next: Handler): Handler => async (req, ctx) => {
      order.push('mw1-before');
      const res = await next(req, ctx);
      order.push('mw1-after');
      return res;
    };

    const mw2 = (next: Handler): Handler => async (req, ctx) => {
      order.push('mw2-before');
      const res = await next(req, ctx);
      order.push('mw2-after');
      return res;
    };

    const handler: Handler = async () => {
      order.push('handler');
      return new Response('ok');
    };

    await pipeline(mw1, mw2)(handler)(new Request('http://test'), makeContext());

    expect(order).toEqual([
      'mw1-before',
      'mw2-before',
      'handler',
      'mw2-after',
      'mw1-after',
    ]);
  });

  it('should allow middleware to short-circuit', async () => {
    const blocker = (_next: Handler): Handler => async () => {
      return new Response('blocked', { status: 403 });
    };

    const handler: Handler = async () => {
      throw new Error('Should not reach handler');
    };

    const res = await pipeline(blocker)(handler)(
      new Request('http://test'),
      makeContext()
    );

    expect(res.status).toBe(403);
    expect(await res.text()).toBe('blocked');
  });

  it('should allow middleware to modify context', async () => {
    const addClient = (next: Handler): Handler => async (req, ctx) => {
      ctx.client = { id: 'test-client' };
      return next(req, ctx);
    };

    const handler: Handler = async (_req, ctx) => {
      return new Response(ctx.client?.id ?? 'none');
    };

    const res = await pipeline(addClient)(handler)(
      new Request('http://test'),
      makeContext()
    );

    expect(await res.text()).toBe('test-client');
  });

  it('should let outer logging see what inner layers put on the context', async () => {
    const logProvider = new ConsoleLogProvider();
    const counters = new InMemoryCounterStore();
    const logging = createRequestLogging(logProvider, counters);

    const handler: Handler = async (_req, ctx) => {
      ctx.detection = { kind: 'single', model: 'mock-model', isCustom: false, source: 'model' };
      return new Response('ok');
    };

    const wrapped = pipeline(logging('detect'), createAuthMiddleware(['test-secret']))(handler);
    const res = await wrapped(
      new Request('http://test/api/v1/detect', {
        method: 'POST',
        headers: { 'X-API-Key': 'test-secret' },
      }),
      makeContext()
    );

    expect(res.status).toBe(200);
    expect(logProvider.events).toHaveLength(1);
    expect(logProvider.events[0]).toMatchObject({
      endpoint: 'detect',
      clientId: clientIdFor('test-secret'),
      detection: { source: 'model', model: 'mock-model' },
    });
    expect(counters.get('http_requests_total', { endpoint: 'detect', status: '200' })).toBe(1);
  });

  it('should count requests rejected by inner middleware', async () => {
    const logProvider = new ConsoleLogProvider();
    const counters = new InMemoryCounterStore();
    const logging = createRequestLogging(logProvider, counters);
    const handler: Handler = async () => new Response('ok');

    const wrapped = pipeline(logging('stats'), createAuthMiddleware(['test-secret']))(handler);
    const res = await wrapped(new Request('http://test/api/v1/stats'), makeContext());

    expect(res.status).toBe(401);
    expect(counters.get('http_requests_total', { endpoint: 'stats', status: '401' })).toBe(1);
    expect(logProvider.events[0].level).toBe('warn');
  });
});
