/**
 * HTTP/Server Layer
 *
 * Raw TCP connections in, tagged responses out.
 *
 * Responsibilities:
 * - Accept connections and read whole requests
 * - Parse the request line, headers, query and body
 * - Dispatch to the route table, with the `404` route as fallback
 * - Encode the handler's response onto the wire
 */

export { WebService, type WebServiceOptions } from './server.ts';
export { Dispatcher, NOT_FOUND_PATTERN } from './dispatcher.ts';
export {
  ServerRequest,
  parseHeaderLine,
  parseQuery,
  parseRequest,
  parseRequestLine,
  type ParsedRequest,
  type RequestContext,
  type RequestLine,
} from './request.ts';
export {
  CONTENT_TYPES,
  INTERNAL_SERVER_ERROR_LINE,
  NOT_FOUND_LINE,
  contentTypeOf,
  encodeResponse,
  respond,
  type BinaryResponse,
  type ErrorResponse,
  type JsonResponse,
  type ResponseType,
  type TextResponse,
  type WebResponse,
} from './response.ts';
export { declaredLength, finish, isRequestComplete, readRequest, requiredLength } from './connection.ts';
export {
  METHODS,
  WebError,
  isMethod,
  type Handler,
  type HandlerResult,
  type ListenAddress,
  type Method,
} from './types.ts';
