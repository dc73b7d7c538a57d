/**
 * HTTP Type Definitions
 */

import type { HttpRequest } from './request.ts';
import type { HttpResponse } from './response.ts';

/**
 * HTTP request handler function. It populates the response in place; a
 * thrown error or rejected promise becomes a 500.
 */
export type Handler = (req: HttpRequest, res: HttpResponse) => Promise<void> | void;

/**
 * HTTP methods routes can be registered for
 */
export type HttpMethod = 'GET' | 'POST';

/**
 * A handler together with the route it was matched by: the registered path,
 * the static mount prefix, or `unmatched` for the 404 fallback.
 */
export interface ResolvedRoute {
  handler: Handler;
  route: string;
}

export const UNMATCHED_ROUTE = 'unmatched';

/**
 * Anything that can resolve a request to a handler. `Router` is the
 * production implementation.
 */
export interface RequestResolver {
  match(req: HttpRequest): Promise<Handler>;
  resolve(req: HttpRequest): Promise<ResolvedRoute>;
}
