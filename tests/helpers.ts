/**
 * Shared test fixtures
 */

import { EventEmitter } from 'node:events';
import path from 'node:path';

import type { TransportSocket } from '../framework/http/connection.ts';
import { HttpRequest } from '../framework/http/request.ts';
import { HttpResponse } from '../framework/http/response.ts';
import type { RequestResolver } from '../framework/http/types.ts';
import type { StaticFileSystem } from '../framework/router/static.ts';
import { Logger, type LogEntry, type LogLevel } from '../framework/telemetry/logger.ts';

/**
 * Logger that keeps entries in memory instead of printing them
 */
export function captureLogger(level: LogLevel = 'debug'): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level, output: (entry) => entries.push(entry) });
  return { logger, entries };
}

export function silentLogger(): Logger {
  return new Logger({ level: 'error', output: () => undefined });
}

/**
 * Resolve and run a request through a router, returning the response built
 */
export async function dispatch(
  resolver: RequestResolver,
  method: string,
  requestPath: string
): Promise<HttpResponse> {
  const req = new HttpRequest({ method, path: requestPath });
  const res = new HttpResponse();
  const handler = await resolver.match(req);
  await handler(req, res);
  return res;
}

/**
 * In-process socket. Writes are captured; callbacks and 'close' fire on the
 * microtask queue the way a real socket defers them.
 */
export class FakeSocket extends EventEmitter implements TransportSocket {
  remoteAddress = '127.0.0.1';
  written: Buffer[] = [];
  ended = false;
  destroyed = false;
  paused = false;
  writeError: Error | null = null;
  throwOnWrite: Error | null = null;

  write(data: Uint8Array, callback: (error?: Error | null) => void): boolean {
    if (this.throwOnWrite) {
      throw this.throwOnWrite;
    }
    const failure = this.writeError;
    if (failure) {
      queueMicrotask(() => {
        this.emit('error', failure);
        callback(failure);
      });
      return false;
    }
    this.written.push(Buffer.from(data));
    queueMicrotask(() => callback(null));
    return true;
  }

  end(callback?: () => void): this {
    this.ended = true;
    if (callback) queueMicrotask(callback);
    return this;
  }

  destroy(): this {
    if (!this.destroyed) {
      this.destroyed = true;
      queueMicrotask(() => this.emit('close', false));
    }
    return this;
  }

  pause(): this {
    this.paused = true;
    return this;
  }

  resume(): this {
    this.paused = false;
    return this;
  }

  /** Deliver bytes from the peer */
  receive(text: string): void {
    this.emit('data', Buffer.from(text, 'latin1'));
  }

  get output(): string {
    return Buffer.concat(this.written).toString('utf8');
  }
}

/**
 * In-memory filesystem keyed by absolute path. Directories are every
 * ancestor of a file; `links` maps a path to the canonical path it resolves
 * to.
 */
export class MemoryFileSystem implements StaticFileSystem {
  readonly reads: string[] = [];
  private readonly files: Map<string, Buffer>;
  private readonly directories = new Set<string>();
  private readonly links: Map<string, string>;
  failReads = false;

  constructor(files: Record<string, string>, links: Record<string, string> = {}) {
    this.files = new Map(
      Object.entries(files).map(([file, content]): [string, Buffer] => [
        file,
        Buffer.from(content, 'utf8'),
      ])
    );
    this.links = new Map(Object.entries(links));
    for (const file of this.files.keys()) {
      let dir = path.dirname(file);
      while (!this.directories.has(dir)) {
        this.directories.add(dir);
        dir = path.dirname(dir);
      }
    }
  }

  async realpath(target: string): Promise<string> {
    const linked = this.links.get(target);
    if (linked !== undefined) return linked;
    if (this.files.has(target) || this.directories.has(target)) return target;
    throw Object.assign(new Error(`ENOENT: no such file or directory, realpath '${target}'`), {
      code: 'ENOENT',
    });
  }

  async isFile(target: string): Promise<boolean> {
    return this.files.has(this.links.get(target) ?? target);
  }

  async readFile(target: string): Promise<Buffer> {
    this.reads.push(target);
    const content = this.files.get(this.links.get(target) ?? target);
    if (this.failReads || content === undefined) {
      throw Object.assign(new Error(`EACCES: permission denied, open '${target}'`), {
        code: 'EACCES',
      });
    }
    return content;
  }
}
