/**
 * plainserve
 *
 * A minimal embeddable HTTP server: raw TCP in, pattern-routed handlers,
 * tagged responses out.
 *
 * @module plainserve
 */

// HTTP/Server
export {
  WebService,
  ServerRequest,
  WebError,
  METHODS,
  respond,
  encodeResponse,
  parseQuery,
  parseRequest,
  type Handler,
  type HandlerResult,
  type ListenAddress,
  type Method,
  type ParsedRequest,
  type WebResponse,
  type WebServiceOptions,
} from './http/mod.ts';

// Router
export { Router, type RouteDefinition, type RouteMatch } from './router/mod.ts';

// Shared state
export {
  SharedState,
  PoisonedStateError,
  StateGuardReleasedError,
  type StateGuard,
} from './state/mod.ts';

// Configuration
export { Config, AddressError, loadConfig, parseAddress, type ConfigOptions } from './config/mod.ts';

// Telemetry
export { Logger, getLogger, setLogger, type LogEntry, type LogLevel } from './telemetry/mod.ts';

// Runtime
export { Environment, openInBrowser } from './runtime/mod.ts';
