/**
 * Test Helpers
 *
 * Loopback clients, a capturing logger and environment overrides.
 */

import { Buffer } from 'node:buffer';
import { connect } from 'node:net';
import type { WebService, WebServiceOptions } from '../framework/http/server.ts';
import { Logger, type LogEntry } from '../framework/telemetry/logger.ts';

export function captureLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level: 'debug', output: (entry) => entries.push(entry) });
  return { logger, entries };
}

export interface RunningService<T> {
  service: WebService<T>;
  port: number;
  entries: LogEntry[];
}

/**
 * Build a service on an ephemeral port and wait until it accepts
 */
export async function startService<T>(
  build: (addr: string, options: WebServiceOptions) => WebService<T>
): Promise<RunningService<T>> {
  const { logger, entries } = captureLogger();
  let onListen: (port: number) => void = () => {};
  const ready = new Promise<number>((resolve) => {
    onListen = resolve;
  });

  const service = build('127.0.0.1:0', { logger, onListen: (addr) => onListen(addr.port) });
  const listening = service.listen(false).then((): number => {
    throw new Error('service closed before listening');
  });

  const port = await Promise.race([ready, listening]);
  return { service, port, entries };
}

/**
 * Send raw bytes and collect everything until the server closes.
 * Each entry of `parts` is written separately, `gapMs` apart; with
 * `halfClose` our side is ended after the last one.
 */
export function send(
  port: number,
  parts: (string | Buffer)[],
  gapMs = 0,
  halfClose = false
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    const socket = connect(port, '127.0.0.1');

    socket.on('data', (chunk: Buffer) => chunks.push(chunk));
    socket.on('end', () => resolve(Buffer.concat(chunks)));
    socket.on('error', reject);

    socket.once('connect', () => {
      parts.forEach((part, i) => {
        setTimeout(() => socket.write(part), i * gapMs);
      });
      if (halfClose) {
        setTimeout(() => socket.end(), parts.length * gapMs);
      }
    });
  });
}

/**
 * Build an HTTP/1.1 request with a Content-Length header
 */
export function request(method: string, target: string, body = ''): string {
  const length = Buffer.byteLength(body);
  return (
    `${method} ${target} HTTP/1.1\r\n` +
    'Host: localhost\r\n' +
    `Content-Length: ${length}\r\n` +
    '\r\n' +
    body
  );
}

export async function fetchText(port: number, method: string, target: string, body = ''): Promise<string> {
  const reply = await send(port, [request(method, target, body)]);
  return reply.toString('utf8');
}

/**
 * Split a 200 reply into its head and body
 */
export function splitReply(reply: string): { head: string; body: string } {
  const idx = reply.indexOf('\r\n\r\n');
  if (idx < 0) return { head: reply, body: '' };
  return { head: reply.slice(0, idx), body: reply.slice(idx + 4) };
}

/**
 * Run `fn` with environment variables set (or removed, for undefined)
 */
export async function withEnv<R>(
  vars: Record<string, string | undefined>,
  fn: () => R | Promise<R>
): Promise<R> {
  const saved = new Map<string, string | undefined>();
  for (const [key, value] of Object.entries(vars)) {
    saved.set(key, process.env[key]);
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }

  try {
    return await fn();
  } finally {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  }
}
