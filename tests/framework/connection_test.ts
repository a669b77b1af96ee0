/**
 * Connection Tests
 *
 * When enough bytes have arrived to parse a request.
 */

import { Buffer } from 'node:buffer';
import { expect, test } from 'vitest';
import { declaredLength, isRequestComplete, requiredLength } from '../../framework/http/connection.ts';

test('declaredLength - reads Content-Length case-insensitively', () => {
  expect(declaredLength('POST / HTTP/1.1\r\ncontent-LENGTH: 5')).toBe(5);
  expect(declaredLength('POST / HTTP/1.1\r\nHost: a')).toBeUndefined();
  expect(declaredLength('POST / HTTP/1.1\r\nContent-Length: five')).toBeUndefined();
});

test('isRequestComplete - waits for the header terminator', () => {
  expect(isRequestComplete(Buffer.from('GET /'))).toBe(false);
  expect(isRequestComplete(Buffer.from('GET / HTTP/1.1\r\nHost: a\r\n'))).toBe(false);
  expect(isRequestComplete(Buffer.from('GET / HTTP/1.1\r\nHost: a\r\n\r\n'))).toBe(true);
});

test('isRequestComplete - waits for the declared body', () => {
  const head = 'POST / HTTP/1.1\r\nContent-Length: 5\r\n\r\n';
  expect(isRequestComplete(Buffer.from(head + 'abc'))).toBe(false);
  expect(isRequestComplete(Buffer.from(head + 'abcde'))).toBe(true);
});

test('isRequestComplete - a malformed request line is final', () => {
  expect(isRequestComplete(Buffer.from('GARBAGE\r\n'))).toBe(true);
});

test('requiredLength - head, terminator and declared body', () => {
  expect(requiredLength(Buffer.from('GET / HTTP/1.1\r\nHost: a\r\n'))).toBeUndefined();
  expect(requiredLength(Buffer.from('GET / HTTP/1.1\r\nHost: a\r\n\r\n'))).toBe(27);
  expect(requiredLength(Buffer.from('POST / HTTP/1.1\r\nContent-Length: 5\r\n\r\nab'))).toBe(43);
});
