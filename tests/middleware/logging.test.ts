import { describe, it, expect, beforeEach } from 'vitest';
import { createLoggingMiddleware } from '../../src/middleware/logging.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { Handler, HandlerContext } from '../../src/middleware/pipeline.js';

function makeRequest(method: string, path: string): Request {
  return new Request(`https://example.com${path}`, { method });
}

const defaultCtx: HandlerContext = { requestId: 'req-abc' };

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

    const response = await middleware(handler)(makeRequest('GET', '/api/v1/stats'), defaultCtx);

    expect(response.status).toBe(200);
    expect(logProvider.events).toHaveLength(1);
    expect(logProvider.events[0]).toMatchObject({
      level: 'info',
      method: 'GET',
      path: '/api/v1/stats',
      status: 200,
      requestId: 'req-abc',
    });
    expect(logProvider.events[0].message).toMatch(/^GET \/api\/v1\/stats → 200 \(\d+ms\)$/);
  });

  it('should pass through the response unmodified', async () => {
    const body = JSON.stringify({ data: 'test' });
    const handler: Handler = async () =>
      new Response(body, {
        status: 201,
        headers: { 'Content-Type': 'application/json', 'X-Custom': 'yes' },
      });

    const response = await middleware(handler)(makeRequest('POST', '/api/v1/evaluation'), defaultCtx);

    expect(response.status).toBe(201);
    expect(response.headers.get('X-Custom')).toBe('yes');
    expect(await response.text()).toBe(body);
  });

  // --- status → level ---

  it('should log 4xx responses at warn level', async () => {
    const handler: Handler = async () =>
      new Response(JSON.stringify({ error: 'invalid' }), { status: 422 });

    await middleware(handler)(makeRequest('POST', '/api/v1/evaluation'), defaultCtx);

    expect(logProvider.events[0]).toMatchObject({ level: 'warn', status: 422 });
  });

  it('should log 5xx responses at error level', async () => {
    const handler: Handler = async () => new Response('Internal Error', { status: 500 });

    await middleware(handler)(makeRequest('GET', '/api/v1/stats'), defaultCtx);

    expect(logProvider.events[0]).toMatchObject({ level: 'error', status: 500 });
  });

  it('should log 503 health responses at error level', async () => {
    const handler: Handler = async () => new Response(null, { status: 503 });

    await middleware(handler)(makeRequest('GET', '/health'), defaultCtx);

    expect(logProvider.events[0]).toMatchObject({ level: 'error', status: 503, path: '/health' });
  });

  it('should log 2xx responses at info level', async () => {
    const handler: Handler = async () => new Response(null, { status: 204 });

    await middleware(handler)(makeRequest('OPTIONS', '/api/v1/evaluation'), defaultCtx);

    expect(logProvider.events[0].level).toBe('info');
  });

  // --- duration tracking ---

  it('should measure request duration', async () => {
    const handler: Handler = async () => {
      await new Promise((r) => setTimeout(r, 20));
      return new Response(null, { status: 200 });
    };

    await middleware(handler)(makeRequest('GET', '/api/v1/stats'), defaultCtx);

    const event = logProvider.events[0];
    expect('durationMs' in event && event.durationMs).toBeGreaterThanOrEqual(15); // allow small timing variance
  });

  // --- handler exceptions ---

  it('should log and re-throw if the handler throws', async () => {
    const handler: Handler = async () => {
      throw new Error('boom');
    };

    await expect(
      middleware(handler)(makeRequest('POST', '/api/v1/evaluation'), defaultCtx)
    ).rejects.toThrow('boom');

    expect(logProvider.events).toHaveLength(1);
    expect(logProvider.events[0]).toMatchObject({
      level: 'error',
      status: 500,
      requestId: 'req-abc',
      fields: { error: 'boom' },
    });
    expect(logProvider.events[0].message).toContain('POST /api/v1/evaluation');
  });

  // --- request id ---

  it('should keep a client-supplied request id and echo it', async () => {
    const handler: Handler = async (_req, ctx) => new Response(ctx.requestId, { status: 200 });
    const req = new Request('https://example.com/api/v1/stats', {
      headers: { 'X-Request-Id': 'client-42' },
    });

    const response = await middleware(handler)(req, {});

    expect(await response.text()).toBe('client-42');
    expect(response.headers.get('X-Request-Id')).toBe('client-42');
    expect(logProvider.events[0]).toMatchObject({ requestId: 'client-42' });
  });

  it('should generate a request id when none is supplied', async () => {
    const handler: Handler = async () => new Response(null, { status: 200 });
    const ctx: HandlerContext = {};

    const response = await middleware(handler)(makeRequest('GET', '/health'), ctx);

    expect(ctx.requestId).toMatch(/^[0-9a-f-]{36}$/);
    expect(response.headers.get('X-Request-Id')).toBe(ctx.requestId);
    expect(logProvider.events[0]).toMatchObject({ requestId: ctx.requestId });
  });

  it('should replace a malformed request id', async () => {
    const handler: Handler = async () => new Response(null, { status: 200 });
    const req = new Request('https://example.com/health', {
      headers: { 'X-Request-Id': 'has spaces; and=junk' },
    });

    const response = await middleware(handler)(req, {});

    expect(response.headers.get('X-Request-Id')).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should fall back to an id already on the context', async () => {
    const handler: Handler = async () => new Response(null, { status: 200 });

    const response = await middleware(handler)(makeRequest('GET', '/health'), defaultCtx);

    expect(response.headers.get('X-Request-Id')).toBe('req-abc');
  });

  // --- strips query strings from logged path ---

  it('should log path without query parameters', async () => {
    const handler: Handler = async () => new Response(null, { status: 200 });

    await middleware(handler)(makeRequest('GET', '/api/v1/stats?foo=bar&baz=1'), defaultCtx);

    expect(logProvider.events[0]).toMatchObject({ path: '/api/v1/stats' });
  });
});
