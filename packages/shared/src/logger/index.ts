/**
 * Shared logger system for the dispatch pipeline
 *
 * This module provides a structured logging system with:
 * - Multiple log levels (debug, info, warn, error)
 * - TraceID support for distributed tracing
 * - JSON and human-readable output formats
 * - Child loggers for per-request context
 */

export {
  LogLevel,
  Logger,
  createLogger,
  type LogEntry,
  type LoggerConfig,
  type LogSink,
} from './logger'
export {
  generateTraceId,
  createTraceContext,
  createChildSpan,
  type TraceContext,
} from './trace'
