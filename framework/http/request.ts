/**
 * Request parsing and the per-dispatch request context
 *
 * Turns the bytes read from one connection into a ParsedRequest, and
 * wraps a matched request into the ServerRequest handed to handlers.
 */

import { Buffer } from 'node:buffer';
import type { Socket } from 'node:net';
import type { SharedState } from '../state/shared_state.ts';
import { isMethod, type Method } from './types.ts';

export const HEADER_TERMINATOR = '\r\n\r\n';

export interface ParsedRequest {
  method: Method;
  /** Request-line method text, before the GET fallback */
  rawMethod: string;
  /** Path without the query suffix */
  path: string;
  /** Path and query as sent */
  target: string;
  args: Record<string, string>;
  headers: Map<string, string>;
  body: Buffer;
}

export interface RequestLine {
  method: string;
  target: string;
  version: string;
}

/**
 * Parse a request line (`METHOD SP TARGET SP HTTP/x`).
 */
export function parseRequestLine(line: string): RequestLine | null {
  const parts = line.split(' ');
  if (parts.length !== 3) return null;

  const [method, target, version] = parts;
  if (!method || !target || !version.startsWith('HTTP/')) return null;

  return { method, target, version };
}

/**
 * Parse a `name: value` header line. Names are lower-cased.
 */
export function parseHeaderLine(line: string): [string, string] | null {
  const idx = line.indexOf(':');
  if (idx <= 0) return null;

  const name = line.slice(0, idx).trim();
  if (!name || /\s/.test(name)) return null;

  return [name.toLowerCase(), line.slice(idx + 1).trim()];
}

/**
 * Split a target on its first `?` and parse the query arguments.
 *
 * Tokens without both a name and a value part are dropped; a later
 * duplicate key overwrites an earlier one. Nothing is URL-decoded.
 */
export function parseQuery(target: string): { path: string; args: Record<string, string> } {
  const idx = target.indexOf('?');
  if (idx < 0) {
    return { path: target, args: Object.create(null) };
  }

  const args: Record<string, string> = Object.create(null);
  for (const token of target.slice(idx + 1).split('&')) {
    const [name, value] = token.split('=');
    if (name !== undefined && value !== undefined) {
      args[name] = value;
    }
  }

  return { path: target.slice(0, idx), args };
}

/**
 * Parse the accumulated bytes of one connection.
 *
 * Returns null when there is no complete header block, the request line is
 * malformed, or there is not a single valid header line. Unknown method
 * text falls back to GET.
 */
export function parseRequest(data: Buffer): ParsedRequest | null {
  const end = data.indexOf(HEADER_TERMINATOR);
  if (end < 0) return null;

  const [requestLine, ...headerLines] = data.subarray(0, end).toString('latin1').split('\r\n');
  const line = parseRequestLine(requestLine);
  if (!line || headerLines.length === 0) return null;

  const headers = new Map<string, string>();
  for (const headerLine of headerLines) {
    const header = parseHeaderLine(headerLine);
    if (!header) return null;
    headers.set(header[0], header[1]);
  }

  const { path, args } = parseQuery(line.target);

  return {
    method: isMethod(line.method) ? line.method : 'GET',
    rawMethod: line.method,
    path,
    target: line.target,
    args,
    headers,
    body: Buffer.from(data.subarray(end + HEADER_TERMINATOR.length)),
  };
}

export interface RequestContext<T> {
  state: SharedState<T>;
  params: Record<string, string>;
  args: Record<string, string>;
  body: Buffer;
  socket: Socket;
}

/**
 * Request context passed to handlers
 */
export class ServerRequest<T> {
  private _context: RequestContext<T>;

  constructor(context: RequestContext<T>) {
    this._context = context;
  }

  /**
   * Application state shared by every handler, behind a lock
   */
  get state(): SharedState<T> {
    return this._context.state;
  }

  /**
   * Wildcard bindings from the matched pattern
   */
  get params(): Record<string, string> {
    return this._context.params;
  }

  /**
   * Query arguments
   */
  get args(): Record<string, string> {
    return this._context.args;
  }

  /**
   * Raw request body
   */
  get body(): Buffer {
    return this._context.body;
  }

  /**
   * Connection socket, valid only while the handler runs
   */
  get socket(): Socket {
    return this._context.socket;
  }

  /**
   * Body decoded as UTF-8
   */
  text(): string {
    return this._context.body.toString('utf8');
  }

  /**
   * Body parsed as JSON, or null when it is not valid JSON
   */
  json<R = unknown>(): R | null {
    try {
      const parsed: R = JSON.parse(this.text());
      return parsed;
    } catch {
      return null;
    }
  }
}
