/**
 * Rejects requests whose declared Content-Length exceeds the limit.
 * Bodies without a Content-Length are measured after reading.
 */

import { PayloadTooLargeError } from '../errors.js';
import type { Middleware } from './pipeline.js';

export function bodyLimit(maxBytes: number): Middleware {
  return (next) => async (req, ctx) => {
    const declared = req.headers.get('Content-Length');

    if (declared !== null) {
      const length = Number(declared);
      if (Number.isFinite(length) && length > maxBytes) {
        throw new PayloadTooLargeError(maxBytes);
      }
      return next(req, ctx);
    }

    if (!req.body) return next(req, ctx);

    const raw = await req.text();
    if (Buffer.byteLength(raw, 'utf8') > maxBytes) {
      throw new PayloadTooLargeError(maxBytes);
    }

    return next(
      new Request(req.url, { method: req.method, headers: req.headers, body: raw }),
      ctx
    );
  };
}
