/**
 * HTTP/Server Layer
 *
 * Raw TCP accept loop, the per-socket connection state machine, and the
 * request/response model handlers work with.
 *
 * Responsibilities:
 * - Parse the request head off the socket
 * - Hand the request to the router and run the handler
 * - Serialize the response and close the connection
 */

export { Server, type ServerOptions } from './server.ts';
export {
  Connection,
  isBenignSocketError,
  type ConnectionState,
  type ConnectionOptions,
  type TransportSocket,
} from './connection.ts';
export {
  HttpRequest,
  RequestParseError,
  parseRequestHead,
  HEADER_TERMINATOR,
  type HttpRequestInit,
  type ParseOptions,
} from './request.ts';
export {
  HttpResponse,
  serializeResponse,
  reasonPhrase,
  STATUS_TEXT,
  DEFAULT_CONTENT_TYPE,
} from './response.ts';
export { guessMimeType, DEFAULT_MIME_TYPE } from './mime.ts';
export { UNMATCHED_ROUTE } from './types.ts';
export type { Handler, HttpMethod, RequestResolver, ResolvedRoute } from './types.ts';
