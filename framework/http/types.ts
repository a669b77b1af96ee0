/**
 * HTTP Type Definitions
 */

import type { ServerRequest } from './request.ts';
import type { WebResponse } from './response.ts';

/**
 * HTTP methods understood by the route table
 */
export const METHODS = [
  'GET',
  'POST',
  'PUT',
  'PATCH',
  'DELETE',
  'HEAD',
  'OPTIONS',
  'TRACE',
] as const;

export type Method = (typeof METHODS)[number];

/**
 * Check whether a request-line token names a known method.
 * Matching is case-sensitive.
 */
export function isMethod(value: string): value is Method {
  return METHODS.some((method) => method === value);
}

/**
 * Error kinds a handler can answer with.
 *
 * The numeric value is the conventional status code. It is never put on
 * the wire: every error renders as the generic 500 line.
 */
export enum WebError {
  BAD_REQUEST = 400,
  NOT_FOUND = 404,
  INTERNAL_SERVER_ERROR = 500,
}

export type HandlerResult = WebResponse | Promise<WebResponse>;

/**
 * Route handler. Receives the request context, returns exactly one response.
 */
export type Handler<T> = (req: ServerRequest<T>) => HandlerResult;

/**
 * Bound address of a listening service
 */
export interface ListenAddress {
  host: string;
  port: number;
}
