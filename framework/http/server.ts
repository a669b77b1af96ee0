/**
 * HTTP Server
 *
 * Accepts TCP connections and runs each one's read, dispatch and write
 * as an independent task. The accept loop never waits on a handler, and
 * there is no cap on connections in flight.
 */

import { createServer, type Server, type Socket } from 'node:net';
import { parseAddress } from '../config/config.ts';
import { Router } from '../router/router.ts';
import { openInBrowser } from '../runtime/browser.ts';
import { SharedState } from '../state/shared_state.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';
import { finish, readRequest } from './connection.ts';
import { Dispatcher } from './dispatcher.ts';
import { parseRequest } from './request.ts';
import { INTERNAL_SERVER_ERROR_LINE } from './response.ts';
import type { Handler, ListenAddress, Method } from './types.ts';

export interface WebServiceOptions {
  logger?: Logger;
  onListen?: (addr: ListenAddress) => void;
}

/**
 * Embeddable web service: register routes, then listen
 */
export class WebService<T> {
  private bindAddress: ListenAddress;
  private router = new Router<T>();
  private state: SharedState<T>;
  private dispatcher: Dispatcher<T>;
  private logger: Logger;
  private options: WebServiceOptions;
  private server?: Server;
  private sockets = new Set<Socket>();

  constructor(addr: string, sharedState: T, options: WebServiceOptions = {}) {
    this.bindAddress = parseAddress(addr);
    this.state = new SharedState(sharedState);
    this.options = options;
    this.logger = options.logger ?? getLogger();
    this.dispatcher = new Dispatcher(this.router, this.state, this.logger);
  }

  /**
   * Add a route. Routes for the same method match in registration order.
   */
  register(pattern: string, method: Method, handler: Handler<T>): this {
    this.router.register(method, pattern, handler);
    return this;
  }

  /**
   * The route table
   */
  getRouter(): Router<T> {
    return this.router;
  }

  /**
   * Address actually bound, once listening
   */
  address(): ListenAddress | null {
    const addr = this.server?.address();
    if (!addr || typeof addr === 'string') return null;
    return { host: addr.address, port: addr.port };
  }

  /**
   * Bind and accept connections until the service is closed.
   *
   * With `autoOpen`, the URL is also opened in a browser; that is best
   * effort and never fails the listen.
   */
  listen(autoOpen = false): Promise<void> {
    return new Promise((resolve, reject) => {
      // Half-open, so a peer that stops sending can still read the reply
      const server = createServer({ allowHalfOpen: true }, (socket) => this.accept(socket));
      this.server = server;

      const onStartupError = (error: Error) => {
        this.server = undefined;
        reject(error);
      };

      server.once('error', onStartupError);
      server.once('close', () => resolve());

      server.listen(this.bindAddress.port, this.bindAddress.host, () => {
        server.off('error', onStartupError);
        server.on('error', (error) => this.logger.error('Server error', error));
        this.onListening(autoOpen);
      });
    });
  }

  /**
   * Stop accepting, drop connections still open, and wait for the
   * listen promise to settle.
   */
  close(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();

    return new Promise((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      for (const socket of this.sockets) {
        socket.destroy();
      }
    });
  }

  private onListening(autoOpen: boolean): void {
    const addr = this.address() ?? this.bindAddress;
    const host = addr.host.includes(':') ? `[${addr.host}]` : addr.host;
    const url = `http://${host}:${addr.port}`;

    if (autoOpen) {
      openInBrowser(url, (error) => this.logger.debug('Could not open browser', { url, error: error.message }));
    }

    this.logger.info(`Listening on ${url}`);
    this.options.onListen?.(addr);
  }

  private accept(socket: Socket): void {
    this.sockets.add(socket);
    socket.once('close', () => this.sockets.delete(socket));
    socket.on('error', (error) => this.logger.debug('Socket error', { error: error.message }));

    this.handleConnection(socket).catch((error: unknown) => {
      this.logger.debug('Connection dropped', {
        error: error instanceof Error ? error.message : String(error),
      });
      socket.destroy();
    });
  }

  private async handleConnection(socket: Socket): Promise<void> {
    const data = await readRequest(socket);
    const request = parseRequest(data);

    if (!request) {
      this.logger.debug('Malformed request', { bytes: data.length });
      await finish(socket, INTERNAL_SERVER_ERROR_LINE);
      return;
    }

    if (request.rawMethod !== request.method) {
      this.logger.debug('Unknown method, dispatching as GET', { method: request.rawMethod });
    }

    await this.dispatcher.dispatch(request, socket);
  }
}
