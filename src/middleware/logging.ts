/**
 * Request logging middleware.
 *
 * Owns the request id: a well-formed `X-Request-Id` from the client is kept,
 * otherwise one is generated. The id is stored on the context for inner
 * middleware and echoed back on the response.
 *
 * One event per request, levelled by status (5xx error, 4xx warn, else info).
 * A thrown error is logged as a 500 and re-thrown.
 */

import { randomUUID } from 'node:crypto';
import type { ILogProvider, LogLevel, RequestLogEvent } from '../providers/ILogProvider.js';
import type { Middleware } from './pipeline.js';

const REQUEST_ID_HEADER = 'X-Request-Id';

const REQUEST_ID_PATTERN = /^[\w.:-]{1,128}$/;

function levelForStatus(status: number): LogLevel {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}

function resolveRequestId(req: Request, fallback?: string): string {
  const supplied = req.headers.get(REQUEST_ID_HEADER)?.trim();
  if (supplied && REQUEST_ID_PATTERN.test(supplied)) return supplied;
  return fallback ?? randomUUID();
}

function withRequestId(response: Response, requestId: string): Response {
  const headers = new Headers(response.headers);
  headers.set(REQUEST_ID_HEADER, requestId);
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}

export function createLoggingMiddleware(logProvider: ILogProvider): Middleware {
  return (next) => async (req, ctx) => {
    const requestId = resolveRequestId(req, ctx.requestId);
    ctx.requestId = requestId;

    const method = req.method;
    const path = new URL(req.url).pathname;
    const start = performance.now();

    const record = (status: number, fields?: Record<string, unknown>): void => {
      const durationMs = Math.round(performance.now() - start);
      const event: RequestLogEvent = {
        level: fields ? 'error' : levelForStatus(status),
        message: `${method} ${path} → ${status} (${durationMs}ms)`,
        method,
        path,
        status,
        durationMs,
        requestId,
        ...(fields && { fields }),
      };
      logProvider.log(event);
    };

    let response: Response;
    try {
      response = await next(req, ctx);
    } catch (err) {
      record(500, { error: err instanceof Error ? err.message : String(err) });
      throw err;
    }

    record(response.status);
    return withRequestId(response, requestId);
  };
}
