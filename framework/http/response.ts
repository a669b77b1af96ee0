/**
 * Responses and their wire encoding
 *
 * A handler answers with one tagged WebResponse. The encoder turns it into
 * a status line, a single Content-Type header and the payload.
 */

import { Buffer } from 'node:buffer';
import { WebError } from './types.ts';

type TextType = 'html' | 'xml' | 'svg' | 'js' | 'text' | 'css';
type BinaryType = 'png' | 'jpg' | 'gif' | 'webp';

export type TextResponse = { type: TextType; body: string };
export type JsonResponse = { type: 'json'; body: unknown };
export type BinaryResponse = { type: BinaryType; body: Uint8Array };
export type ErrorResponse = { type: 'error'; error: WebError };

export type WebResponse = TextResponse | JsonResponse | BinaryResponse | ErrorResponse;

export type ResponseType = WebResponse['type'];

export const CONTENT_TYPES: Readonly<Record<Exclude<ResponseType, 'error'>, string>> = {
  html: 'text/html',
  xml: 'text/xml',
  svg: 'image/svg+xml',
  js: 'application/javascript',
  json: 'application/json',
  text: 'text/plain',
  css: 'text/css',
  png: 'image/png',
  jpg: 'image/jpeg',
  gif: 'image/gif',
  webp: 'image/webp',
};

export const INTERNAL_SERVER_ERROR_LINE = 'HTTP/1.1 500 INTERNAL SERVER ERROR';
export const NOT_FOUND_LINE = 'HTTP/1.1 404 NOT FOUND';

/**
 * Response constructors
 */
export const respond = {
  html: (body: string): WebResponse => ({ type: 'html', body }),
  xml: (body: string): WebResponse => ({ type: 'xml', body }),
  svg: (body: string): WebResponse => ({ type: 'svg', body }),
  js: (body: string): WebResponse => ({ type: 'js', body }),
  json: (body: unknown): WebResponse => ({ type: 'json', body }),
  text: (body: string): WebResponse => ({ type: 'text', body }),
  css: (body: string): WebResponse => ({ type: 'css', body }),
  png: (body: Uint8Array): WebResponse => ({ type: 'png', body }),
  jpg: (body: Uint8Array): WebResponse => ({ type: 'jpg', body }),
  gif: (body: Uint8Array): WebResponse => ({ type: 'gif', body }),
  webp: (body: Uint8Array): WebResponse => ({ type: 'webp', body }),
  error: (error: WebError): WebResponse => ({ type: 'error', error }),
};

/**
 * Content type associated with a response, if it has one
 */
export function contentTypeOf(response: WebResponse): string | undefined {
  if (response.type === 'error') return undefined;
  return CONTENT_TYPES[response.type];
}

function payloadOf(response: Exclude<WebResponse, ErrorResponse>): Buffer {
  switch (response.type) {
    case 'json':
      return Buffer.from(JSON.stringify(response.body) ?? 'null', 'utf8');
    case 'png':
    case 'jpg':
    case 'gif':
    case 'webp':
      return Buffer.from(response.body);
    default:
      return Buffer.from(response.body, 'utf8');
  }
}

/**
 * Encode a response for the wire.
 *
 * Error responses, whatever their kind, become the fixed 500 line.
 */
export function encodeResponse(response: WebResponse): Buffer {
  const contentType = contentTypeOf(response);
  if (response.type === 'error' || contentType === undefined) {
    return Buffer.from(INTERNAL_SERVER_ERROR_LINE, 'utf8');
  }

  const head = `HTTP/1.1 200 OK\r\nContent-Type: ${contentType}\r\n\r\n`;
  return Buffer.concat([Buffer.from(head, 'utf8'), payloadOf(response)]);
}
