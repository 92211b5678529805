/**
 * Default handler for requests no route matches
 */

import { Abort } from '@switchyard/shared/errors'
import type { DispatchRequest } from './request'
import { emptyResponse } from './response-builder'

const STANDARD_METHODS: ReadonlySet<string> = new Set(['GET', 'POST', 'PUT', 'PATCH', 'DELETE'])

/**
 * Standard verbs are missing routes (404), OPTIONS always succeeds with a
 * bare `Allow: OPTIONS`, and any other verb is unimplemented (501).
 */
export async function fallbackHandler(req: DispatchRequest): Promise<Response> {
  if (STANDARD_METHODS.has(req.method)) {
    throw Abort.notFound()
  }

  if (req.method === 'OPTIONS') {
    return emptyResponse(200, { Allow: 'OPTIONS' })
  }

  return emptyResponse(501)
}
