/**
 * Shared error system for the dispatch pipeline
 *
 * This module provides a centralized error handling system with:
 * - Standardized error codes
 * - HTTP status mapping
 * - Abortable and diagnosable failure capabilities
 * - Suggestions for error resolution
 */

export { ErrorCode, ERROR_HTTP_STATUS } from './codes'
export type {
  ConfigErrorContext,
  TimeoutErrorContext,
  ValidationErrorContext,
  ErrorContext,
} from './context'
export {
  type Abortable,
  type Diagnosable,
  isAbortable,
  isDiagnosable,
  reasonPhrase,
  formatDiagnostics,
} from './capabilities'
export { type AbortOptions, Abort, isAbort } from './abort'
