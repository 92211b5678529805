/**
 * Error Normalizer
 *
 * The single place where a failure raised during dispatch becomes a
 * response. Logs always carry every detail the failure offers; what the
 * client sees is gated by the environment.
 */

import { inspect } from 'node:util'
import {
  formatDiagnostics,
  isAbortable,
  isDiagnosable,
  reasonPhrase,
} from '@switchyard/shared/errors'
import type { LogSink } from '@switchyard/shared/logger'
import type { Environment } from '../config'
import { prefers } from './accept'
import type { DispatchRequest } from './request'
import { jsonResponse } from './response-builder'
import type { ViewRenderer } from './view'

/**
 * JSON body of an error response
 */
export interface ErrorDocument {
  error: true
  reason: string
  metadata?: Record<string, unknown>
  identifier?: string
  possibleCauses?: string[]
  suggestedFixes?: string[]
  documentationLinks?: string[]
  stackOverflowQuestions?: string[]
  gitHubIssues?: string[]
}

export interface ErrorNormalizerOptions {
  environment: Environment
  logger: LogSink
  view: ViewRenderer
}

const INTERNAL_SERVER_ERROR = 500

function isResponseStatus(status: number): boolean {
  return Number.isInteger(status) && status >= 200 && status <= 599
}

/**
 * Status to answer a failure with
 */
export function statusOf(error: unknown): number {
  if (isAbortable(error) && isResponseStatus(error.status)) {
    return error.status
  }
  return INTERNAL_SERVER_ERROR
}

function typeName(error: unknown): string {
  if (typeof error === 'object' && error !== null) {
    return error.constructor?.name || 'Object'
  }
  return typeof error
}

function describe(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return typeof error === 'string' ? error : inspect(error)
}

export class ErrorNormalizer {
  private readonly environment: Environment
  private readonly logger: LogSink
  private readonly view: ViewRenderer

  constructor(options: ErrorNormalizerOptions) {
    this.environment = options.environment
    this.logger = options.logger
    this.view = options.view
  }

  /**
   * Observe a successful response; never changes it
   */
  inspect(response: Response): void {
    if (response.status !== 304 && !response.headers.has('Content-Type')) {
      this.logger.warn("Response had no 'Content-Type' header.")
    }
  }

  /**
   * Convert a failure into a response
   */
  async normalize(error: unknown, req: DispatchRequest): Promise<Response> {
    const status = statusOf(error)
    this.report(error)

    if (prefers(req.accept, 'html')) {
      try {
        return await this.view.render(error, {
          status,
          environment: this.environment,
          request: req,
        })
      } catch (renderError) {
        this.logger.error('Error view failed to render; answering with JSON instead', renderError)
      }
    }

    return this.serialize(this.buildDocument(error, status), status)
  }

  /**
   * Serve an error document, dropping metadata JSON cannot encode
   *
   * Every other field is a string or a string list.
   */
  private serialize(document: ErrorDocument, status: number): Response {
    try {
      return jsonResponse(document, status)
    } catch (serializeError) {
      this.logger.error('Error document could not be serialized; answering without metadata', serializeError)
    }

    const { metadata: _metadata, ...serializable } = document
    return jsonResponse(serializable, status)
  }

  /**
   * Build the JSON error document for a failure
   */
  buildDocument(error: unknown, status: number): ErrorDocument {
    if (this.environment === 'production') {
      return { error: true, reason: reasonPhrase(status) }
    }

    const document: ErrorDocument = { error: true, reason: reasonPhrase(status) }

    if (isAbortable(error) && error.metadata !== undefined) {
      document.metadata = error.metadata
    }

    if (isDiagnosable(error)) {
      document.reason = error.reason
      document.identifier = error.identifier
      if (error.possibleCauses.length > 0) {
        document.possibleCauses = [...error.possibleCauses]
      }
      if (error.suggestedFixes.length > 0) {
        document.suggestedFixes = [...error.suggestedFixes]
      }
      if (error.documentationLinks.length > 0) {
        document.documentationLinks = [...error.documentationLinks]
      }
      if (error.stackOverflowQuestions.length > 0) {
        document.stackOverflowQuestions = [...error.stackOverflowQuestions]
      }
      if (error.gitHubIssues.length > 0) {
        document.gitHubIssues = [...error.gitHubIssues]
      }
    }

    return document
  }

  private report(error: unknown): void {
    if (isDiagnosable(error)) {
      this.logger.error(formatDiagnostics(error))
      return
    }

    const type = typeName(error)
    this.logger.error(`[${type}: ${describe(error)}]`)
    this.logger.info(`Implement 'Diagnosable' on '${type}' to provide more debug information.`)
  }
}
