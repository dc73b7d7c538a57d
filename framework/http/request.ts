/**
 * Request Model
 *
 * The one request a connection serves: method, path and headers parsed from
 * the request head. Immutable once built. Bodies are never read.
 */

import type { Logger } from '../telemetry/logger.ts';

export interface HttpRequestInit {
  method: string;
  path: string;
  /** Raw query string without the leading `?` */
  search?: string;
  headers?: Iterable<readonly [string, string]>;
  remoteAddress?: string;
}

/**
 * Parsed HTTP request
 */
export class HttpRequest {
  readonly method: string;
  readonly path: string;
  readonly search: string;
  readonly remoteAddress?: string;
  private readonly _headers: Map<string, string>;

  constructor(init: HttpRequestInit) {
    this.method = init.method;
    this.path = init.path;
    this.search = init.search ?? '';
    this.remoteAddress = init.remoteAddress;
    this._headers = new Map<string, string>(init.headers ?? []);
  }

  /**
   * Headers with names as received
   */
  get headers(): ReadonlyMap<string, string> {
    return this._headers;
  }

  /**
   * Query parameters as a fresh URLSearchParams
   */
  get query(): URLSearchParams {
    return new URLSearchParams(this.search);
  }

  /**
   * Get a header value. An exact-case match wins, otherwise the lookup is
   * case-insensitive.
   */
  header(name: string): string | undefined {
    const exact = this._headers.get(name);
    if (exact !== undefined) return exact;

    const lower = name.toLowerCase();
    for (const [key, value] of this._headers) {
      if (key.toLowerCase() === lower) return value;
    }
    return undefined;
  }
}

/**
 * Raised for a request line the server cannot route. The connection answers
 * it with 400 Bad Request.
 */
export class RequestParseError extends Error {
  constructor(message: string, readonly line: string) {
    super(message);
    this.name = 'RequestParseError';
  }
}

export const HEADER_TERMINATOR = Buffer.from('\r\n\r\n', 'latin1');

export interface ParseOptions {
  logger?: Logger;
  remoteAddress?: string;
}

/**
 * Parse a request head (everything before the blank line) into a request.
 *
 * The first line is `METHOD TARGET VERSION`; the version is read and
 * discarded. Header lines without a colon are logged and skipped. Duplicate
 * header names keep the last value.
 */
export function parseRequestHead(head: Buffer | string, options: ParseOptions = {}): HttpRequest {
  const text = typeof head === 'string' ? head : head.toString('latin1');
  const lines = text.split('\n').map(stripCarriageReturn);
  const requestLine = lines[0] ?? '';

  const [method = '', target = ''] = requestLine.split(/\s+/).filter((token) => token.length > 0);
  if (method === '' || target === '') {
    throw new RequestParseError('Malformed request line', requestLine);
  }
  if (!target.startsWith('/')) {
    throw new RequestParseError('Request target must be an absolute path', requestLine);
  }

  const queryStart = target.indexOf('?');
  const path = queryStart === -1 ? target : target.slice(0, queryStart);
  const search = queryStart === -1 ? '' : target.slice(queryStart + 1);

  const headers = new Map<string, string>();
  for (const line of lines.slice(1)) {
    if (line === '') break;

    const colon = line.indexOf(':');
    if (colon === -1) {
      options.logger?.warn('Malformed header line', { line });
      continue;
    }

    const name = line.slice(0, colon);
    const value = line.slice(colon + 1).replace(/^[ \t]+/, '');
    headers.set(name, value);
  }

  return new HttpRequest({
    method,
    path,
    search,
    headers,
    remoteAddress: options.remoteAddress,
  });
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}
