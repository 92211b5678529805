/**
 * Response Builder Utilities
 *
 * Standardized response helpers for consistent API responses
 */

const JSON_CONTENT_TYPE = 'application/json; charset=utf-8'
const TEXT_CONTENT_TYPE = 'text/plain; charset=utf-8'

/**
 * Statuses the fetch Response refuses to pair with a body
 */
const NULL_BODY_STATUSES = new Set([101, 204, 205, 304])

export function isNullBodyStatus(status: number): boolean {
  return NULL_BODY_STATUSES.has(status)
}

/**
 * Create a JSON response
 * @param document - Serializable document
 * @param status - HTTP status code (default: 200)
 */
export function jsonResponse(document: unknown, status: number = 200): Response {
  return new Response(isNullBodyStatus(status) ? null : JSON.stringify(document), {
    status,
    headers: {
      'Content-Type': JSON_CONTENT_TYPE,
    },
  })
}

/**
 * Create a success response
 * @param data - Response data
 * @param status - HTTP status code (default: 200)
 */
export function successResponse<T>(data: T, status: number = 200): Response {
  return jsonResponse(data, status)
}

/**
 * Create a plain text response
 */
export function textResponse(text: string, status: number = 200): Response {
  return new Response(isNullBodyStatus(status) ? null : text, {
    status,
    headers: {
      'Content-Type': TEXT_CONTENT_TYPE,
    },
  })
}

/**
 * Create a response with no body
 */
export function emptyResponse(status: number, headers?: Record<string, string>): Response {
  return new Response(null, { status, headers })
}

/**
 * Create a no-content response (204)
 */
export function noContentResponse(): Response {
  return emptyResponse(204)
}

/**
 * Copy a response with extra headers set
 *
 * Responses may carry immutable headers, so they are rebuilt rather
 * than mutated.
 */
export function withHeaders(response: Response, headers: Record<string, string>): Response {
  const newHeaders = new Headers(response.headers)
  for (const [name, value] of Object.entries(headers)) {
    newHeaders.set(name, value)
  }

  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers: newHeaders,
  })
}

/**
 * Copy a response without its body, keeping status and headers
 */
export function withoutBody(response: Response): Response {
  return new Response(null, {
    status: response.status,
    statusText: response.statusText,
    headers: new Headers(response.headers),
  })
}
