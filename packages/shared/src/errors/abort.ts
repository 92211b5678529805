import { ErrorCode, ERROR_HTTP_STATUS } from './codes'
import { reasonPhrase, type Abortable, type Diagnosable } from './capabilities'

/**
 * Suggestions for common error codes
 */
const ERROR_SUGGESTIONS: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.UNAUTHORIZED]: 'Provide valid authentication credentials',
  [ErrorCode.FORBIDDEN]: 'Verify your permissions for this resource',
  [ErrorCode.NOT_FOUND]: 'Check that the request path and method match a registered route',
  [ErrorCode.METHOD_NOT_ALLOWED]: 'Use one of the methods listed in the Allow header',
  [ErrorCode.REQUEST_TIMEOUT]: 'Retry the request or raise the request timeout',
  [ErrorCode.TOO_MANY_REQUESTS]: 'Wait for the rate limit window to pass before retrying',
  [ErrorCode.VALIDATION_ERROR]: 'Correct the invalid fields and send the request again',
  [ErrorCode.INVALID_CONFIG]: 'Fix the listed environment variables and restart the server',
}

export interface AbortOptions {
  /** Overrides the status mapped from the error code */
  status?: number
  reason?: string
  metadata?: Record<string, unknown>
  possibleCauses?: string[]
  suggestedFixes?: string[]
  documentationLinks?: string[]
  stackOverflowQuestions?: string[]
  gitHubIssues?: string[]
  cause?: unknown
}

/**
 * Failure that maps onto an HTTP response
 */
export class Abort extends Error implements Abortable, Diagnosable {
  public readonly readableName = 'Abort'
  public readonly code: ErrorCode
  public readonly status: number
  public readonly reason: string
  public readonly metadata?: Record<string, unknown>
  public readonly possibleCauses: string[]
  public readonly suggestedFixes: string[]
  public readonly documentationLinks: string[]
  public readonly stackOverflowQuestions: string[]
  public readonly gitHubIssues: string[]

  constructor(code: ErrorCode, options: AbortOptions = {}) {
    const status = options.status ?? ERROR_HTTP_STATUS[code]
    const reason = options.reason ?? reasonPhrase(status)
    super(reason)
    this.name = 'Abort'
    this.code = code
    this.status = status
    this.reason = reason
    this.metadata = options.metadata
    this.possibleCauses = options.possibleCauses ?? []
    this.suggestedFixes = options.suggestedFixes ?? defaultSuggestions(code)
    this.documentationLinks = options.documentationLinks ?? []
    this.stackOverflowQuestions = options.stackOverflowQuestions ?? []
    this.gitHubIssues = options.gitHubIssues ?? []

    // Maintain proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, Abort)
    }

    if (options.cause !== undefined) {
      this.cause = options.cause
    }
  }

  get identifier(): string {
    return `Abort.${this.code}`
  }

  static badRequest(options?: AbortOptions): Abort {
    return new Abort(ErrorCode.BAD_REQUEST, options)
  }

  static unauthorized(options?: AbortOptions): Abort {
    return new Abort(ErrorCode.UNAUTHORIZED, options)
  }

  static forbidden(options?: AbortOptions): Abort {
    return new Abort(ErrorCode.FORBIDDEN, options)
  }

  static notFound(options?: AbortOptions): Abort {
    return new Abort(ErrorCode.NOT_FOUND, options)
  }

  static methodNotAllowed(options?: AbortOptions): Abort {
    return new Abort(ErrorCode.METHOD_NOT_ALLOWED, options)
  }

  static notAcceptable(options?: AbortOptions): Abort {
    return new Abort(ErrorCode.NOT_ACCEPTABLE, options)
  }

  static requestTimeout(options?: AbortOptions): Abort {
    return new Abort(ErrorCode.REQUEST_TIMEOUT, options)
  }

  static payloadTooLarge(options?: AbortOptions): Abort {
    return new Abort(ErrorCode.PAYLOAD_TOO_LARGE, options)
  }

  static unsupportedMediaType(options?: AbortOptions): Abort {
    return new Abort(ErrorCode.UNSUPPORTED_MEDIA_TYPE, options)
  }

  static tooManyRequests(options?: AbortOptions): Abort {
    return new Abort(ErrorCode.TOO_MANY_REQUESTS, options)
  }

  static serverError(options?: AbortOptions): Abort {
    return new Abort(ErrorCode.INTERNAL_ERROR, options)
  }

  static notImplemented(options?: AbortOptions): Abort {
    return new Abort(ErrorCode.NOT_IMPLEMENTED, options)
  }

  static serviceUnavailable(options?: AbortOptions): Abort {
    return new Abort(ErrorCode.SERVICE_UNAVAILABLE, options)
  }

  /**
   * Abort with an arbitrary status; the code follows the status class
   */
  static custom(status: number, options: Omit<AbortOptions, 'status'> = {}): Abort {
    const code = status >= 500 ? ErrorCode.INTERNAL_ERROR : ErrorCode.BAD_REQUEST
    return new Abort(code, { ...options, status })
  }

  /**
   * Convert error to JSON format; the stack stays out of serialized bodies
   */
  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      status: this.status,
      identifier: this.identifier,
      metadata: this.metadata,
      suggestedFixes: this.suggestedFixes,
    }
  }
}

function defaultSuggestions(code: ErrorCode): string[] {
  const suggestion = ERROR_SUGGESTIONS[code]
  return suggestion ? [suggestion] : []
}

/**
 * Check if an error is an Abort
 */
export function isAbort(error: unknown): error is Abort {
  return error instanceof Abort
}
