/**
 * Application Routes
 *
 * Wires the demo pages, the user API and the static assets into a server.
 */

import type { Config, Logger, Server } from '../../framework/mod.ts';
import { registerHomeRoutes } from './home.ts';
import { createUserRouter } from './users.ts';

/**
 * Register all application routes
 */
export function registerRoutes(server: Server, config: Config, logger?: Logger): void {
  registerHomeRoutes(server.router);
  server.mount('/api/users', createUserRouter(logger));
  server.serveStatic('/static', config.get('publicDir'));
}

export { registerHomeRoutes, createInfoHandler, generateProducts, EXAMPLE_PRODUCT } from './home.ts';
export type { Product } from './home.ts';
export { createUserRouter, USERS } from './users.ts';
export type { User } from './users.ts';
