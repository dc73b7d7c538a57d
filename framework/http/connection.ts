/**
 * Connection
 *
 * Drives one accepted socket through a single request/response cycle:
 * reading → dispatching → writing → closed. There is no keep-alive; the
 * socket is shut down once the response has been written.
 */

import { performance } from 'node:perf_hooks';

import { HEADER_TERMINATOR, HttpRequest, RequestParseError, parseRequestHead } from './request.ts';
import { HttpResponse, serializeResponse } from './response.ts';
import { UNMATCHED_ROUTE, type RequestResolver } from './types.ts';
import { getLogger, toError, type Logger } from '../telemetry/logger.ts';
import { SpanKind, recordHttpRequest, withSpan } from '../telemetry/otel.ts';

export type ConnectionState = 'reading' | 'dispatching' | 'writing' | 'closed';

/**
 * The subset of `net.Socket` a connection uses
 */
export interface TransportSocket {
  readonly remoteAddress?: string;
  on(event: 'data', listener: (chunk: Buffer) => void): this;
  on(event: 'end', listener: () => void): this;
  on(event: 'close', listener: (hadError: boolean) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
  removeListener(event: 'data', listener: (chunk: Buffer) => void): this;
  removeListener(event: 'end', listener: () => void): this;
  removeListener(event: 'close', listener: (hadError: boolean) => void): this;
  write(data: Uint8Array, callback: (error?: Error | null) => void): boolean;
  end(callback?: () => void): this;
  destroy(error?: Error): this;
  pause(): this;
  resume(): this;
}

export interface ConnectionOptions {
  logger?: Logger;
  id?: number;
}

const BENIGN_ERROR_CODES = new Set(['ECANCELED', 'ECONNRESET', 'EPIPE', 'ERR_STREAM_DESTROYED']);

/**
 * Whether a transport error only means the peer went away or the operation
 * was cancelled by our own close.
 */
export function isBenignSocketError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  const { code } = error;
  return typeof code === 'string' && BENIGN_ERROR_CODES.has(code);
}

/**
 * One client connection
 */
export class Connection {
  private _state: ConnectionState = 'reading';
  private chunks: Buffer[] = [];
  private receivedLength = 0;
  /** Last bytes received, enough to find a terminator split across chunks */
  private tail = Buffer.alloc(0);
  private request: HttpRequest | null = null;
  private readonly response = new HttpResponse();
  private readonly socket: TransportSocket;
  private readonly resolver: RequestResolver;
  private readonly logger: Logger;
  private readonly closed: Promise<void>;
  private readonly resolveClosed: () => void;

  constructor(socket: TransportSocket, resolver: RequestResolver, options: ConnectionOptions = {}) {
    this.socket = socket;
    this.resolver = resolver;
    const base = options.logger ?? getLogger();
    this.logger = options.id === undefined ? base : base.child({ connection: options.id });

    let resolveClosed = (): void => undefined;
    this.closed = new Promise<void>((resolve) => {
      resolveClosed = resolve;
    });
    this.resolveClosed = resolveClosed;

    this.socket.on('error', (error) => this.handleSocketError(error));
    this.socket.on('close', () => this.close());
  }

  get state(): ConnectionState {
    return this._state;
  }

  /**
   * Serve the connection's one request. Resolves once the socket is closed;
   * never rejects.
   */
  async serve(): Promise<void> {
    const head = await this.readHead();

    if (head === null) {
      this.close();
      return this.closed;
    }

    try {
      this.request = parseRequestHead(head, {
        logger: this.logger,
        remoteAddress: this.socket.remoteAddress,
      });
    } catch (error) {
      const line = error instanceof RequestParseError ? error.line : head.toString('latin1');
      this.logger.warn(`Malformed request line: ${line}`, { reason: toError(error).message });
      this.response.status(400).text('Bad Request');
    }

    if (this.request) {
      this.logger.info(`Request: ${this.request.method} ${this.request.path}`);
      await this.dispatch(this.request);
    }

    this.write();
    return this.closed;
  }

  /**
   * Accumulate chunks until the header terminator arrives. Resolves with the
   * head (terminator excluded), or null if the socket ended first.
   */
  private readHead(): Promise<Buffer | null> {
    return new Promise((resolve) => {
      const finish = (head: Buffer | null): void => {
        this.socket.removeListener('data', onData);
        this.socket.removeListener('end', onEnd);
        this.socket.removeListener('close', onEnd);
        resolve(head);
      };

      const onData = (chunk: Buffer): void => {
        const window = Buffer.concat([this.tail, chunk]);
        const found = window.indexOf(HEADER_TERMINATOR);
        const windowStart = this.receivedLength - this.tail.length;

        this.chunks.push(chunk);
        this.receivedLength += chunk.length;
        this.tail = window.subarray(Math.max(0, window.length - (HEADER_TERMINATOR.length - 1)));

        if (found !== -1) {
          this.socket.pause();
          const received = Buffer.concat(this.chunks, this.receivedLength);
          finish(received.subarray(0, windowStart + found));
        }
      };

      const onEnd = (): void => {
        if (this.receivedLength > 0) {
          this.logger.debug('Peer closed before sending a complete request head', {
            bytes: this.receivedLength,
          });
        }
        finish(null);
      };

      this.socket.on('data', onData);
      this.socket.on('end', onEnd);
      this.socket.on('close', onEnd);
      this.socket.resume();
    });
  }

  /**
   * Resolve and run the handler. Failures become a 500.
   */
  private async dispatch(request: HttpRequest): Promise<void> {
    this._state = 'dispatching';
    const startedAt = performance.now();

    let route: string = UNMATCHED_ROUTE;

    try {
      const resolved = await this.resolver.resolve(request);
      route = resolved.route;
      const { handler } = resolved;
      await withSpan(
        `${request.method} ${route}`,
        async (span) => {
          await handler(request, this.response);
          span.setAttribute('http.response.status_code', this.response.statusCode);
        },
        {
          kind: SpanKind.SERVER,
          attributes: {
            'http.request.method': request.method,
            'http.route': route,
            'url.path': request.path,
          },
        }
      );
    } catch (error) {
      this.logger.error(
        `Handler threw exception for ${request.method} ${request.path}`,
        toError(error),
        { method: request.method, path: request.path }
      );
      this.response.reset().status(500).text('Internal Server Error');
    }

    recordHttpRequest({
      method: request.method,
      route,
      statusCode: this.response.statusCode,
      durationMs: performance.now() - startedAt,
    });
  }

  /**
   * Write the serialized response, then shut the socket down
   */
  private write(): void {
    if (this._state === 'closed') return;
    this._state = 'writing';

    const payload = serializeResponse(this.response);
    const method = this.request?.method ?? '-';
    const path = this.request?.path ?? '-';

    try {
      this.socket.write(payload, (error) => {
        if (error) {
          // Reported through the socket's 'error' event
          this.close();
          return;
        }
        this.logger.info(
          `Sent response (${payload.length} bytes) for ${method} ${path} with status ${this.response.statusCode}`
        );
        this.shutdown();
      });
    } catch (error) {
      this.handleSocketError(toError(error));
      this.close();
    }
  }

  /**
   * End both directions, then release the socket
   */
  private shutdown(): void {
    try {
      // Drain any request body the client sent so the close is clean
      this.socket.resume();
      this.socket.end(() => this.close());
    } catch (error) {
      this.logger.warn(`Socket shutdown error: ${toError(error).message}`);
      this.close();
    }
  }

  private close(): void {
    if (this._state === 'closed') return;
    this._state = 'closed';

    try {
      this.socket.destroy();
    } catch (error) {
      this.logger.warn(`Socket close error: ${toError(error).message}`);
    }

    this.resolveClosed();
  }

  private handleSocketError(error: Error): void {
    const phase = this._state === 'writing' ? 'Write' : 'Read';
    if (isBenignSocketError(error)) {
      this.logger.debug(`${phase} ended by peer: ${error.message}`);
      return;
    }
    if (this._state === 'closed') {
      this.logger.warn(`Socket error after close: ${error.message}`);
      return;
    }
    this.logger.error(`${phase} error: ${error.message}`, error);
  }
}
