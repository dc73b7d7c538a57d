/**
 * Ferry
 *
 * A small HTTP/1.x server: one request per connection, exact-match routing,
 * route groups, router composition and static file mounts.
 *
 * @module ferry
 */

// Runtime
export { Lifecycle, type LifecycleHook, type LifecycleOptions } from './runtime/mod.ts';

// HTTP/Server
export {
  Server,
  Connection,
  HttpRequest,
  HttpResponse,
  RequestParseError,
  parseRequestHead,
  serializeResponse,
  reasonPhrase,
  guessMimeType,
  isBenignSocketError,
  UNMATCHED_ROUTE,
  type ServerOptions,
  type ConnectionState,
  type TransportSocket,
  type Handler,
  type HttpMethod,
  type RequestResolver,
  type ResolvedRoute,
} from './http/mod.ts';

// Router
export {
  Router,
  RouteGroup,
  notFoundHandler,
  normalizePath,
  joinPaths,
  nodeFileSystem,
  type RouteDefinition,
  type RouterOptions,
  type StaticMount,
  type StaticFileSystem,
} from './router/mod.ts';

// Configuration
export {
  Config,
  ConfigError,
  loadConfig,
  createLogger,
  DEFAULT_CONFIG,
  type ServerConfig,
} from './config/mod.ts';

// Telemetry
export {
  Logger,
  getLogger,
  setLogger,
  toError,
  withSpan,
  recordHttpRequest,
  isOTELEnabled,
  type LogLevel,
  type LogFormat,
  type LoggerOptions,
} from './telemetry/mod.ts';
