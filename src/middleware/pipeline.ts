/**
 * Composable middleware pipeline for Fetch-style handlers.
 * Middleware wraps handlers in order (left to right), forming an onion model.
 */

export interface HandlerContext {
  /**
   * Correlates log lines for one request.
   * Unset until the logging middleware assigns it.
   */
  requestId?: string;
}

export type Handler = (req: Request, ctx: HandlerContext) => Promise<Response>;
export type Middleware = (next: Handler) => Handler;

/**
 * Compose middleware into a function that wraps a handler.
 * Middleware is applied left-to-right:
 *   pipeline(logging, errorHandler)(handler)
 *   → logging wraps (errorHandler wraps handler)
 */
export function pipeline(...middlewares: Middleware[]) {
  return (handler: Handler): Handler => {
    return middlewares.reduceRight<Handler>(
      (next, mw) => mw(next),
      handler
    );
  };
}
