/**
 * Telemetry
 *
 * Operational logging for the server.
 */

export {
  Logger,
  formatPretty,
  getLogger,
  isLogLevel,
  parseLogLevel,
  setLogger,
  type LogEntry,
  type LogFormat,
  type LoggerOptions,
  type LogLevel,
} from './logger.ts';
