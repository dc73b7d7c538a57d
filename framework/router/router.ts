/**
 * URL Router
 *
 * Resolves a (method, path) pair to a handler. Static mounts are tried first
 * in registration order, then exact-match routes, then a 404 fallback.
 */

import {
  UNMATCHED_ROUTE,
  type Handler,
  type HttpMethod,
  type RequestResolver,
  type ResolvedRoute,
} from '../http/types.ts';
import type { HttpRequest } from '../http/request.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';
import { RouteGroup } from './group.ts';
import { joinPaths, normalizePath } from './path.ts';
import {
  createFileHandler,
  invalidPathHandler,
  nodeFileSystem,
  resolveStatic,
  type StaticFileSystem,
  type StaticMount,
} from './static.ts';

export interface RouteDefinition {
  method: HttpMethod;
  path: string;
  handler: Handler;
}

export interface RouterOptions {
  logger?: Logger;
  fileSystem?: StaticFileSystem;
}

/**
 * Fallback for requests nothing else claims
 */
export const notFoundHandler: Handler = (req, res) => {
  res.status(404).text(`Not found: ${req.path}`);
};

/**
 * URL Router
 */
export class Router implements RequestResolver {
  private routes = new Map<string, RouteDefinition>();
  private staticMounts: StaticMount[] = [];
  private readonly logger: Logger;
  private readonly fs: StaticFileSystem;

  constructor(options: RouterOptions = {}) {
    this.logger = options.logger ?? getLogger();
    this.fs = options.fileSystem ?? nodeFileSystem;
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

  /**
   * Add a route with explicit method. Registering the same method and path
   * again replaces the earlier handler.
   */
  addRoute(method: HttpMethod, path: string, handler: Handler): this {
    const fullPath = normalizePath(path);
    this.routes.set(routeKey(method, fullPath), { method, path: fullPath, handler });
    this.logger.info(`Registered route: ${method} ${fullPath}`);
    return this;
  }

  /**
   * Serve files below `root` under the URL `prefix`. Earlier mounts take
   * priority over later ones.
   */
  serveStatic(prefix: string, root: string): this {
    const mount = { prefix: normalizePath(prefix), root };
    this.staticMounts.push(mount);
    this.logger.info(`Serving static files from '${root}' at URL prefix '${mount.prefix}'`);
    return this;
  }

  /**
   * Register routes under a shared prefix through a group builder
   */
  group(prefix: string, callback: (group: RouteGroup) => void): this {
    const group = new RouteGroup(normalizePath(prefix), this);
    this.logger.info(`Entering route group with prefix: ${group.prefix}`);
    callback(group);
    this.logger.info(`Exiting route group: ${group.prefix}`);
    return this;
  }

  /**
   * Copy another router's routes and static mounts under `prefix`. The copy
   * is a one-time merge; later changes to `router` are not seen here.
   */
  mount(prefix: string, router: Router): this {
    const mountPrefix = normalizePath(prefix);
    this.logger.info(`Mounting router at prefix: ${mountPrefix}`);

    // Snapshot first: `router` may be this router
    const routes = [...router.routes.values()];
    const staticMounts = [...router.staticMounts];

    for (const route of routes) {
      const fullPath = joinPaths(mountPrefix, route.path);
      this.routes.set(routeKey(route.method, fullPath), { ...route, path: fullPath });
      this.logger.info(`   Mounted route: ${route.method} ${fullPath}`);
    }

    for (const mount of staticMounts) {
      const fullPrefix = joinPaths(mountPrefix, mount.prefix);
      this.staticMounts.push({ prefix: fullPrefix, root: mount.root });
      this.logger.info(
        `   Mounted static path: '${mount.root}' from '${mount.prefix}' at URL prefix '${fullPrefix}'`
      );
    }

    return this;
  }

  /**
   * Resolve a request to the handler that should serve it
   */
  async match(req: Pick<HttpRequest, 'method' | 'path'>): Promise<Handler> {
    return (await this.resolve(req)).handler;
  }

  /**
   * Like `match`, also naming the route that matched. The name is the
   * registered path or static prefix, never the raw request path.
   */
  async resolve(req: Pick<HttpRequest, 'method' | 'path'>): Promise<ResolvedRoute> {
    this.logger.debug(`Attempting to match request: ${req.method} ${req.path}`);

    for (const mount of this.staticMounts) {
      const resolution = await resolveStatic(mount, req.path, this.fs, this.logger);
      if (resolution.kind === 'forbidden') {
        return { handler: invalidPathHandler, route: mount.prefix };
      }
      if (resolution.kind === 'file') {
        return {
          handler: createFileHandler(resolution.filePath, this.fs, this.logger),
          route: mount.prefix,
        };
      }
    }

    const route = this.routes.get(routeKey(req.method, normalizePath(req.path)));
    if (route) {
      this.logger.info(`Matched explicit route: ${req.method} ${req.path}`);
      return { handler: route.handler, route: route.path };
    }

    this.logger.info(`Route not found: ${req.method} ${req.path}`);
    return { handler: notFoundHandler, route: UNMATCHED_ROUTE };
  }

  /**
   * Get all registered routes (for debugging/admin)
   */
  getRoutes(): RouteDefinition[] {
    return [...this.routes.values()];
  }

  getStaticMounts(): StaticMount[] {
    return this.staticMounts.map((mount) => ({ ...mount }));
  }
}

function routeKey(method: string, path: string): string {
  return `${method} ${path}`;
}
