/**
 * Dispatcher
 *
 * Resolves a parsed request to a handler, runs it once and writes its
 * response back on the same connection.
 */

import type { Buffer } from 'node:buffer';
import type { Socket } from 'node:net';
import type { Router, RouteMatch } from '../router/router.ts';
import type { SharedState } from '../state/shared_state.ts';
import type { Logger } from '../telemetry/logger.ts';
import { finish } from './connection.ts';
import { ServerRequest, type ParsedRequest } from './request.ts';
import { encodeResponse, INTERNAL_SERVER_ERROR_LINE, NOT_FOUND_LINE } from './response.ts';
import type { Method } from './types.ts';

/**
 * Literal GET pattern consulted when nothing else matches
 */
export const NOT_FOUND_PATTERN = '404';

export class Dispatcher<T> {
  constructor(
    private router: Router<T>,
    private state: SharedState<T>,
    private logger: Logger
  ) {}

  /**
   * Find the route for a request, falling back to the `404` GET route
   */
  resolve(method: Method, path: string): RouteMatch<T> | null {
    return this.router.find(method, path) ?? this.router.find('GET', NOT_FOUND_PATTERN);
  }

  /**
   * Run the matching handler and write its response.
   *
   * A handler that throws, including one that hits poisoned state, gets
   * the generic 500 line.
   */
  async dispatch(request: ParsedRequest, socket: Socket): Promise<void> {
    const match = this.resolve(request.method, request.path);
    if (!match) {
      await finish(socket, NOT_FOUND_LINE);
      return;
    }

    const req = new ServerRequest<T>({
      state: this.state,
      params: match.params,
      args: request.args,
      body: request.body,
      socket,
    });

    let payload: Buffer | string;
    try {
      payload = encodeResponse(await match.handler(req));
    } catch (error) {
      this.logger.error('Handler failed', error, {
        method: request.method,
        pattern: match.route.pattern,
      });
      payload = INTERNAL_SERVER_ERROR_LINE;
    }

    await finish(socket, payload);
  }
}
