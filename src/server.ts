/**
 * Node.js HTTP adapter.
 * Converts node:http requests to Fetch API Requests, runs the router, and
 * writes the Response back.
 *
 * The body limit is enforced while reading: an oversized Content-Length is
 * refused before any byte is read, and an undeclared (chunked) body stops
 * being read as soon as it passes the limit. Either way the client gets a
 * 413 and the connection is closed. Anything else escaping the router
 * becomes a 500.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { Handler } from './middleware/pipeline.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import { AppError, PayloadTooLargeError } from './errors.js';
import { errorResponse } from './responses.js';

export interface HttpServerOptions {
  /** Largest request body accepted, in bytes. */
  maxBodyBytes: number;
}

export function createHttpServer(
  handle: Handler,
  logProvider: ILogProvider,
  options: HttpServerOptions
): Server {
  return createServer((req, res) => {
    void serve(req, res, handle, logProvider, options);
  });
}

async function serve(
  req: IncomingMessage,
  res: ServerResponse,
  handle: Handler,
  logProvider: ILogProvider,
  options: HttpServerOptions
): Promise<void> {
  try {
    const request = await toFetchRequest(req, options.maxBodyBytes);
    const response = await handle(request, {});
    await writeResponse(res, response);
  } catch (err) {
    if (res.headersSent) {
      logProvider.error('Response failed after headers were sent', {
        method: req.method,
        path: req.url,
        error: err instanceof Error ? err.message : String(err),
      });
      res.destroy();
      return;
    }

    if (err instanceof PayloadTooLargeError) {
      logProvider.warn('Request body over the limit', {
        method: req.method,
        path: req.url,
        limitBytes: options.maxBodyBytes,
      });
      // The rest of the upload is never read; close instead of draining it.
      await writeResponse(res, errorFor(err), { Connection: 'close' });
      return;
    }

    logProvider.error('Request failed outside the router', {
      method: req.method,
      path: req.url,
      error: err instanceof Error ? err.message : String(err),
    });
    await writeResponse(res, errorFor(err));
  }
}

function errorFor(err: unknown): Response {
  if (err instanceof AppError) {
    return errorResponse(err.statusCode, {
      code: err.code,
      message: err.message,
      ...(err.details && { details: err.details }),
    });
  }
  return errorResponse(500, { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' });
}

async function toFetchRequest(req: IncomingMessage, maxBodyBytes: number): Promise<Request> {
  const host = headerValue(req.headers.host) ?? 'localhost';
  const url = new URL(req.url ?? '/', `http://${host}`);
  const method = req.method ?? 'GET';

  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) headers.append(name, item);
    } else {
      headers.set(name, value);
    }
  }

  const hasBody = method !== 'GET' && method !== 'HEAD';
  const body = hasBody ? await readBody(req, maxBodyBytes) : undefined;

  return new Request(url, { method, headers, body });
}

/**
 * Buffer the request body, refusing anything over `maxBytes`.
 * On overflow the stream is paused and left unread.
 */
function readBody(req: IncomingMessage, maxBytes: number): Promise<string> {
  const declared = Number(headerValue(req.headers['content-length']));
  if (Number.isFinite(declared) && declared > maxBytes) {
    return Promise.reject(new PayloadTooLargeError(maxBytes));
  }

  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;

    const detach = (): void => {
      req.off('data', onData);
      req.off('end', onEnd);
      req.off('error', onError);
    };

    const onData = (chunk: Buffer | string): void => {
      const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      received += buffer.length;
      if (received > maxBytes) {
        detach();
        req.pause();
        reject(new PayloadTooLargeError(maxBytes));
        return;
      }
      chunks.push(buffer);
    };

    const onEnd = (): void => {
      detach();
      resolve(Buffer.concat(chunks).toString('utf8'));
    };

    const onError = (err: Error): void => {
      detach();
      reject(err);
    };

    req.on('data', onData);
    req.on('end', onEnd);
    req.on('error', onError);
  });
}

async function writeResponse(
  res: ServerResponse,
  response: Response,
  extraHeaders: Record<string, string> = {}
): Promise<void> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, name) => {
    headers[name] = value;
  });

  const body = Buffer.from(await response.arrayBuffer());
  res.writeHead(response.status, { ...headers, ...extraHeaders });
  res.end(body);
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function listen(server: Server, port: number, host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      const address = server.address();
      resolve(typeof address === 'object' && address !== null ? address.port : port);
    });
  });
}

export function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
