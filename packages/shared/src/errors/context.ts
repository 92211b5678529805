/**
 * Error metadata shapes attached to aborts
 * Each context type corresponds to a specific category of failure
 */

/**
 * Configuration error context
 */
export type ConfigErrorContext = {
  issues: Array<{
    field: string
    message: string
  }>
}

/**
 * Request timeout error context
 */
export type TimeoutErrorContext = {
  method: string
  path: string
  timeoutMs: number
}

/**
 * Validation error context
 */
export type ValidationErrorContext = {
  field: string
  value: unknown
  constraint: string
  expectedType?: string
}

/**
 * Union type of all error contexts
 */
export type ErrorContext = ConfigErrorContext | TimeoutErrorContext | ValidationErrorContext
