/**
 * Route Group
 *
 * Builder that registers routes under a shared prefix. It holds the prefix
 * itself, so the router never carries transient group state; once the
 * configuring callback returns, the builder can be dropped.
 */

import type { Handler, HttpMethod } from '../http/types.ts';
import type { Router } from './router.ts';
import { joinPaths } from './path.ts';

/**
 * Route group for organizing related routes
 */
export class RouteGroup {
  readonly prefix: string;
  private readonly router: Router;

  constructor(prefix: string, router: Router) {
    this.prefix = prefix;
    this.router = router;
  }

  /**
   * Register a GET route
   */
  get(path: string, handler: Handler): this {
    return this.addRoute('GET', path, handler);
  }

  /**
   * Register a POST route
   */
  post(path: string, handler: Handler): this {
    return this.addRoute('POST', path, handler);
  }

  addRoute(method: HttpMethod, path: string, handler: Handler): this {
    this.router.addRoute(method, joinPaths(this.prefix, path), handler);
    return this;
  }

  /**
   * Create a nested group
   */
  group(prefix: string, callback: (group: RouteGroup) => void): this {
    callback(new RouteGroup(joinPaths(this.prefix, prefix), this.router));
    return this;
  }
}
