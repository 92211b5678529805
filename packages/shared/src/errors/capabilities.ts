/**
 * Failure capabilities
 *
 * A thrown value may carry an HTTP status (abortable), developer diagnostics
 * (diagnosable), both, or neither. The pipeline probes for each capability
 * separately at the point where a failure becomes a response.
 */

import { STATUS_CODES } from 'node:http'

/**
 * A failure that carries the HTTP status to answer with
 */
export interface Abortable {
  readonly status: number
  readonly metadata?: Record<string, unknown>
}

/**
 * A failure that carries structured developer diagnostics
 */
export interface Diagnosable {
  /** Human readable name of the failure type, e.g. `Abort` */
  readonly readableName: string
  readonly reason: string
  /** Stable identifier, unique per failure kind */
  readonly identifier: string
  readonly possibleCauses: readonly string[]
  readonly suggestedFixes: readonly string[]
  readonly documentationLinks: readonly string[]
  readonly stackOverflowQuestions: readonly string[]
  readonly gitHubIssues: readonly string[]
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

function isStringList(value: unknown): value is readonly string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string')
}

/**
 * Check if a failure carries an HTTP status
 */
export function isAbortable(error: unknown): error is Abortable {
  if (!isObject(error) || typeof error.status !== 'number') {
    return false
  }
  return error.metadata === undefined || isObject(error.metadata)
}

/**
 * Check if a failure carries developer diagnostics
 */
export function isDiagnosable(error: unknown): error is Diagnosable {
  return (
    isObject(error) &&
    typeof error.readableName === 'string' &&
    typeof error.reason === 'string' &&
    typeof error.identifier === 'string' &&
    isStringList(error.possibleCauses) &&
    isStringList(error.suggestedFixes) &&
    isStringList(error.documentationLinks) &&
    isStringList(error.stackOverflowQuestions) &&
    isStringList(error.gitHubIssues)
  )
}

/**
 * Standard reason phrase for an HTTP status
 */
export function reasonPhrase(status: number): string {
  return STATUS_CODES[status] ?? 'Unknown Status'
}

/**
 * Render diagnostics as a single log line
 *
 * @example
 * `[Abort: Not Found] [Identifier: Abort.NOT_FOUND] [Suggested Fixes: Check the request path]`
 */
export function formatDiagnostics(diagnosable: Diagnosable): string {
  const parts: string[] = [
    `${diagnosable.readableName}: ${diagnosable.reason}`,
    `Identifier: ${diagnosable.identifier}`,
  ]

  const lists: Array<[string, readonly string[]]> = [
    ['Possible Causes', diagnosable.possibleCauses],
    ['Suggested Fixes', diagnosable.suggestedFixes],
    ['Documentation Links', diagnosable.documentationLinks],
    ['Stack Overflow Questions', diagnosable.stackOverflowQuestions],
    ['GitHub Issues', diagnosable.gitHubIssues],
  ]

  for (const [label, items] of lists) {
    if (items.length > 0) {
      parts.push(`${label}: ${items.join(', ')}`)
    }
  }

  return parts.map(part => `[${part}]`).join(' ')
}
