/**
 * Error handler middleware.
 * Catches errors thrown by handlers and maps them to structured JSON responses.
 * AppError subclasses get their status code and details; unknown errors are
 * logged and become a generic 500.
 */

import { AppError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { errorResponse } from '../responses.js';
import type { Middleware } from './pipeline.js';

export function createErrorHandler(logProvider: ILogProvider): Middleware {
  return (next) => async (req, ctx) => {
    try {
      return await next(req, ctx);
    } catch (err) {
      if (err instanceof AppError) {
        return errorResponse(err.statusCode, {
          code: err.code,
          message: err.message,
          ...(err.details && { details: err.details }),
        });
      }

      logProvider.error('Unhandled error while serving request', {
        requestId: ctx.requestId,
        error: err instanceof Error ? err.message : String(err),
        ...(err instanceof Error && err.stack && { stack: err.stack }),
      });

      // Unknown error — don't leak internals
      return errorResponse(500, {
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
      });
    }
  };
}
