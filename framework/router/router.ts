/**
 * Route Table
 *
 * Per-method buckets of (pattern, handler) pairs. Within a bucket the
 * first structurally compatible pattern wins, so registration order is
 * match priority.
 */

import { METHODS, type Handler, type Method } from '../http/types.ts';
import { compare, extract, stripQuery, type PatternParams } from './patterns.ts';

export interface RouteDefinition<T> {
  method: Method;
  pattern: string;
  handler: Handler<T>;
}

export interface RouteMatch<T> {
  route: RouteDefinition<T>;
  params: PatternParams;
  // Convenience accessor for the handler
  handler: Handler<T>;
}

/**
 * URL Router
 */
export class Router<T> {
  private buckets = new Map<Method, RouteDefinition<T>[]>();

  constructor() {
    for (const method of METHODS) {
      this.buckets.set(method, []);
    }
  }

  /**
   * Append a route to its method's bucket.
   * Patterns are not validated; a malformed one simply never matches.
   */
  register(method: Method, pattern: string, handler: Handler<T>): this {
    this.bucket(method).push({ method, pattern, handler });
    return this;
  }

  /**
   * Register a GET route
   */
  get(pattern: string, handler: Handler<T>): this {
    return this.register('GET', pattern, handler);
  }

  /**
   * Register a POST route
   */
  post(pattern: string, handler: Handler<T>): this {
    return this.register('POST', pattern, handler);
  }

  /**
   * Register a PUT route
   */
  put(pattern: string, handler: Handler<T>): this {
    return this.register('PUT', pattern, handler);
  }

  /**
   * Register a PATCH route
   */
  patch(pattern: string, handler: Handler<T>): this {
    return this.register('PATCH', pattern, handler);
  }

  /**
   * Register a DELETE route
   */
  delete(pattern: string, handler: Handler<T>): this {
    return this.register('DELETE', pattern, handler);
  }

  /**
   * Find the first route in the method's bucket compatible with the path.
   * Any `?query` suffix is ignored.
   */
  find(method: Method, path: string): RouteMatch<T> | null {
    const bare = stripQuery(path);
    const route = this.bucket(method).find((r) => compare(bare, r.pattern));

    if (!route) {
      return null;
    }

    return {
      route,
      params: extract(bare, route.pattern),
      handler: route.handler,
    };
  }

  /**
   * Get all registered routes (for debugging)
   */
  getRoutes(): RouteDefinition<T>[] {
    return METHODS.flatMap((method) => [...this.bucket(method)]);
  }

  private bucket(method: Method): RouteDefinition<T>[] {
    let routes = this.buckets.get(method);
    if (!routes) {
      routes = [];
      this.buckets.set(method, routes);
    }
    return routes;
  }
}
