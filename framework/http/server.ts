/**
 * HTTP Server
 *
 * Owns the router and a TCP accept loop. Every accepted socket gets its own
 * Connection; there is no cap on outstanding connections.
 */

import net from 'node:net';
import type { AddressInfo } from 'node:net';

import { Connection } from './connection.ts';
import type { Handler } from './types.ts';
import { Router } from '../router/router.ts';
import type { RouteGroup } from '../router/group.ts';
import type { StaticFileSystem } from '../router/static.ts';
import { getLogger, toError, type Logger } from '../telemetry/logger.ts';

export interface ServerOptions {
  port?: number;
  hostname?: string;
  logger?: Logger;
  /** Router to serve; a new one is created when omitted */
  router?: Router;
  /** Filesystem for a router created by the server */
  fileSystem?: StaticFileSystem;
  onListen?: (addr: AddressInfo) => void;
}

/**
 * HTTP Server
 */
export class Server {
  readonly router: Router;
  private readonly logger: Logger;
  private readonly options: ServerOptions;
  private readonly listener: net.Server;
  private readonly sockets = new Set<net.Socket>();
  private nextConnectionId = 1;

  constructor(options: ServerOptions = {}) {
    this.options = {
      ...options,
      port: options.port ?? 8080,
      hostname: options.hostname ?? '127.0.0.1',
    };
    this.logger = options.logger ?? getLogger();
    this.router =
      options.router ?? new Router({ logger: this.logger, fileSystem: options.fileSystem });

    this.listener = net.createServer((socket) => this.accept(socket));
    this.listener.on('error', (error) => {
      this.logger.error(`Accept error: ${error.message}`, error);
    });
  }

  get(path: string, handler: Handler): this {
    this.router.get(path, handler);
    return this;
  }

  post(path: string, handler: Handler): this {
    this.router.post(path, handler);
    return this;
  }

  serveStatic(prefix: string, root: string): this {
    this.router.serveStatic(prefix, root);
    return this;
  }

  group(prefix: string, callback: (group: RouteGroup) => void): this {
    this.router.group(prefix, callback);
    return this;
  }

  mount(prefix: string, router: Router): this {
    this.router.mount(prefix, router);
    return this;
  }

  /**
   * Bind and start accepting. Resolves with the bound address.
   */
  listen(): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(error);
      };
      this.listener.once('error', onError);
      this.listener.listen(this.options.port, this.options.hostname, () => {
        this.listener.removeListener('error', onError);
        const addr = this.address();
        if (!addr) {
          reject(new Error('Server is not bound to a TCP address'));
          return;
        }
        this.logger.info(`Running on http://${addr.address}:${addr.port}`);
        this.options.onListen?.(addr);
        resolve(addr);
      });
    });
  }

  /**
   * Listen, then resolve only when the server has been closed
   */
  async run(): Promise<void> {
    const stopped = new Promise<void>((resolve) => {
      this.listener.once('close', () => resolve());
    });
    await this.listen();
    this.logger.info('Server starting...');
    await stopped;
    this.logger.info('Server stopped.');
  }

  /**
   * Stop accepting and drop outstanding connections
   */
  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.listener.listening) {
        resolve();
        return;
      }
      this.listener.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
      for (const socket of this.sockets) {
        socket.destroy();
      }
    });
  }

  address(): AddressInfo | null {
    const addr = this.listener.address();
    return addr !== null && typeof addr === 'object' ? addr : null;
  }

  private accept(socket: net.Socket): void {
    const id = this.nextConnectionId++;
    this.sockets.add(socket);
    socket.once('close', () => this.sockets.delete(socket));

    this.logger.info(`New connection from ${socket.remoteAddress ?? 'unknown address'}`, {
      connection: id,
    });

    const connection = new Connection(socket, this.router, { logger: this.logger, id });
    connection.serve().catch((error: unknown) => {
      this.logger.error('Connection failed', toError(error), { connection: id });
      socket.destroy();
    });
  }
}
