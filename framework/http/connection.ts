/**
 * Socket plumbing for one connection
 *
 * Reading stops once a whole request has arrived: the header block plus
 * `Content-Length` body bytes. A peer that half-closes ends the read with
 * whatever it sent.
 */

import { Buffer } from 'node:buffer';
import type { Socket } from 'node:net';
import { HEADER_TERMINATOR, parseHeaderLine, parseRequestLine } from './request.ts';

/**
 * Declared body length, if the header block carries a usable one
 */
export function declaredLength(head: string): number | undefined {
  for (const line of head.split('\r\n').slice(1)) {
    const header = parseHeaderLine(line);
    if (header?.[0] === 'content-length' && /^\d+$/.test(header[1])) {
      return Number(header[1]);
    }
  }
  return undefined;
}

/**
 * Total bytes the request needs: head, terminator and declared body.
 * Undefined until the header terminator has arrived.
 */
export function requiredLength(data: Buffer): number | undefined {
  const end = data.indexOf(HEADER_TERMINATOR);
  if (end < 0) return undefined;

  const length = declaredLength(data.subarray(0, end).toString('latin1')) ?? 0;
  return end + HEADER_TERMINATOR.length + length;
}

/**
 * Whether the bytes read so far are enough to parse.
 *
 * A malformed request line counts as complete, so garbage is answered
 * without waiting for a header terminator that may never come.
 */
export function isRequestComplete(data: Buffer): boolean {
  const lineEnd = data.indexOf('\r\n');
  if (lineEnd >= 0 && !parseRequestLine(data.subarray(0, lineEnd).toString('latin1'))) {
    return true;
  }

  const required = requiredLength(data);
  return required !== undefined && data.length >= required;
}

/**
 * Accumulate the bytes of one request
 */
export function readRequest(socket: Socket): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    const cleanup = () => {
      socket.off('data', onData);
      socket.off('end', onEnd);
      socket.off('close', onEnd);
      socket.off('error', onError);
    };
    const done = () => {
      cleanup();
      socket.pause();
      resolve(Buffer.concat(chunks, size));
    };
    // Known once the head is in; after that only byte counts are compared
    let required: number | undefined;

    const onData = (chunk: Buffer) => {
      chunks.push(chunk);
      size += chunk.length;

      if (required !== undefined) {
        if (size >= required) done();
        return;
      }

      const data = Buffer.concat(chunks, size);
      chunks.length = 0;
      chunks.push(data);

      if (isRequestComplete(data)) {
        done();
        return;
      }
      required = requiredLength(data);
    };
    const onEnd = () => done();
    const onError = (error: Error) => {
      cleanup();
      reject(error);
    };

    socket.on('data', onData);
    socket.once('end', onEnd);
    socket.once('close', onEnd);
    socket.once('error', onError);
  });
}

/**
 * Write the final bytes of a connection and close our side
 */
export function finish(socket: Socket, data: Buffer | string): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.write(data, (error) => {
      if (error) {
        reject(error);
        return;
      }
      socket.end(() => resolve());
    });
  });
}
