/**
 * HTTP Router with Pattern Matching
 *
 * Supports path parameters (e.g., /users/:id) and query parameters.
 * Plugs into the dispatcher through the RouterAdapter contract.
 */

import type { Handler } from './middleware'
import type { DispatchRequest } from './request'

export type RouteHandler = (req: DispatchRequest, params: RouteParams) => Promise<Response>

export interface RouteParams {
  path: Record<string, string>
  query: Record<string, string>
}

export interface RouteMatch {
  handler: RouteHandler
  params: RouteParams
}

/**
 * What the dispatcher needs from a router
 *
 * `route` must be safe to call concurrently and returns null when no
 * route matches; a miss is not an error.
 */
export interface RouterAdapter {
  route(req: DispatchRequest): Handler | null
}

export class Router implements RouterAdapter {
  private routes = new Map<string, Map<string, RouteHandler>>()

  /**
   * Register a route handler
   * @param method - HTTP method (GET, POST, etc.)
   * @param pattern - URL pattern with optional :param placeholders
   * @param handler - Route handler function
   */
  register(method: string, pattern: string, handler: RouteHandler): this {
    const normalizedMethod = method.toUpperCase()

    let methodRoutes = this.routes.get(normalizedMethod)
    if (!methodRoutes) {
      methodRoutes = new Map()
      this.routes.set(normalizedMethod, methodRoutes)
    }

    methodRoutes.set(pattern, handler)
    return this
  }

  /**
   * Match a request to a registered route
   * @param method - HTTP method
   * @param url - Request URL (path + query string)
   * @returns RouteMatch if found, null otherwise
   */
  match(method: string, url: string): RouteMatch | null {
    const methodRoutes = this.routes.get(method.toUpperCase())

    if (!methodRoutes) {
      return null
    }

    // Parse URL to separate path and query
    const urlObj = new URL(url, 'http://localhost')
    const path = urlObj.pathname
    const query = Object.fromEntries(urlObj.searchParams)

    for (const [pattern, handler] of methodRoutes) {
      const pathParams = this.matchPattern(pattern, path)
      if (pathParams !== null) {
        return {
          handler,
          params: {
            path: pathParams,
            query,
          },
        }
      }
    }

    return null
  }

  /**
   * Resolve a request to a handler with its path parameters bound
   */
  route(req: DispatchRequest): Handler | null {
    const match = this.match(req.method, req.url.href)
    if (!match) {
      return null
    }

    return async request => {
      request.params = match.params.path
      return match.handler(request, match.params)
    }
  }

  /**
   * Match a URL path against a pattern
   * @returns Object with extracted params, or null if no match
   */
  private matchPattern(pattern: string, path: string): Record<string, string> | null {
    const patternParts = pattern.split('/').filter(Boolean)
    const pathParts = path.split('/').filter(Boolean)

    // Must have same number of segments
    if (patternParts.length !== pathParts.length) {
      return null
    }

    const params: Record<string, string> = {}

    for (const [i, patternPart] of patternParts.entries()) {
      const pathPart = pathParts[i] ?? ''

      if (patternPart.startsWith(':')) {
        params[patternPart.slice(1)] = safeDecode(pathPart)
      } else if (patternPart !== pathPart) {
        return null
      }
    }

    return params
  }

  /**
   * Get all registered routes (for debugging)
   */
  getRoutes(): ReadonlyMap<string, ReadonlyMap<string, RouteHandler>> {
    return this.routes
  }
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment)
  } catch {
    // Malformed escapes stay as sent
    return segment
  }
}
