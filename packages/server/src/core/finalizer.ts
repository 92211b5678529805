import { withoutBody } from './response-builder'

/**
 * Enforce the last protocol invariants on a dispatched response
 *
 * A response to HEAD never carries a body; status and headers are kept.
 * See RFC 9110, section 9.3.2.
 */
export function finalizeResponse(originalMethod: string, response: Response): Response {
  if (originalMethod === 'HEAD') {
    return withoutBody(response)
  }
  return response
}
