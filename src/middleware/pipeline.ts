/**
 * Composable middleware pipeline for request handlers.
 * Middleware wraps handlers in order (left to right), forming an onion model.
 */

export interface HandlerContext {
  /** Correlates every log line of one request. */
  requestId: string;
}

export type Handler = (req: Request, ctx: HandlerContext) => Promise<Response>;
export type Middleware = (next: Handler) => Handler;

/**
 * Compose middleware into a function that wraps a handler.
 *   pipeline(logging, errorHandler)(handler)
 *   → logging wraps (errorHandler wraps handler)
 */
export function pipeline(...middlewares: Middleware[]) {
  return (handler: Handler): Handler =>
    middlewares.reduceRight<Handler>((next, mw) => mw(next), handler);
}
