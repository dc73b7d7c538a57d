/**
 * Routing Layer
 *
 * Maps incoming request paths to handlers: exact-match routes, prefix groups,
 * router composition and static file mounts.
 */

export { Router, notFoundHandler, type RouteDefinition, type RouterOptions } from './router.ts';
export { RouteGroup } from './group.ts';
export { normalizePath, joinPaths, matchesPrefix, pathAfterPrefix } from './path.ts';
export {
  nodeFileSystem,
  resolveStatic,
  isWithin,
  createFileHandler,
  invalidPathHandler,
  INDEX_FILE,
  type StaticMount,
  type StaticFileSystem,
  type StaticResolution,
} from './static.ts';
