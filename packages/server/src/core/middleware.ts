/**
 * Middleware Pipeline System
 *
 * Provides request/response middleware with support for:
 * - Composition of an ordered middleware list around a terminal handler
 * - CORS headers
 * - Request logging with TraceID
 * - Request timeouts
 */

import { Abort, type TimeoutErrorContext } from '@switchyard/shared/errors'
import { createChildSpan, createTraceContext, type Logger } from '@switchyard/shared/logger'
import type { DispatchRequest } from './request'
import { withHeaders } from './response-builder'

export type Handler = (req: DispatchRequest) => Promise<Response>
export type Middleware = (req: DispatchRequest, next: Handler) => Promise<Response>

/**
 * Compose middlewares around the innermost handler
 *
 * The first middleware is outermost: it sees the request first and the
 * response last. Failures pass through untouched unless a middleware
 * catches them.
 */
export function chainMiddlewares(middlewares: readonly Middleware[], innermost: Handler): Handler {
  return middlewares.reduceRight<Handler>(
    (next, middleware) => req => middleware(req, next),
    innermost
  )
}

export interface CorsOptions {
  origin?: string
  methods?: string[]
  headers?: string[]
  credentials?: boolean
}

/**
 * CORS Middleware
 * Answers preflight requests and adds CORS headers to responses
 */
export function corsMiddleware(options: CorsOptions = {}): Middleware {
  const {
    origin = '*',
    methods = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    headers = ['Content-Type', 'Authorization', 'X-Trace-ID'],
    credentials = true,
  } = options

  return async (req, next) => {
    // Only a true preflight carries Access-Control-Request-Method
    if (req.method === 'OPTIONS' && req.headers.has('Access-Control-Request-Method')) {
      return new Response(null, {
        status: 204,
        headers: {
          'Access-Control-Allow-Origin': origin,
          'Access-Control-Allow-Methods': methods.join(', '),
          'Access-Control-Allow-Headers': headers.join(', '),
          'Access-Control-Allow-Credentials': credentials.toString(),
          'Access-Control-Max-Age': '86400',
        },
      })
    }

    const response = await next(req)

    const corsHeaders: Record<string, string> = { 'Access-Control-Allow-Origin': origin }
    if (credentials) {
      corsHeaders['Access-Control-Allow-Credentials'] = 'true'
    }
    return withHeaders(response, corsHeaders)
  }
}

/**
 * Logger Middleware
 * Logs requests with TraceID support and echoes the TraceID back
 */
export function loggerMiddleware(logger: Logger): Middleware {
  return async (req, next) => {
    const startTime = Date.now()
    const { method, path } = req

    const upstream = req.headers.get('X-Trace-ID')
    const trace = upstream ? createChildSpan(createTraceContext(upstream)) : createTraceContext()
    const requestLogger = logger.child(trace)

    requestLogger.info(`${method} ${path}`, {
      method,
      path,
      query: req.query,
    })

    try {
      const response = await next(req)

      requestLogger.info(`${method} ${path} ${response.status}`, {
        method,
        path,
        status: response.status,
        duration: Date.now() - startTime,
      })

      return withHeaders(response, { 'X-Trace-ID': trace.traceId })
    } catch (error) {
      requestLogger.error(`${method} ${path} ERROR`, error, {
        method,
        path,
        duration: Date.now() - startTime,
      })

      throw error
    }
  }
}

/**
 * Request Timeout Middleware
 * Fails with 408 when the rest of the chain does not settle in time
 */
export function timeoutMiddleware(timeoutMs = 30000): Middleware {
  return async (req, next) => {
    let timer: NodeJS.Timeout | undefined

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const metadata: TimeoutErrorContext = { method: req.method, path: req.path, timeoutMs }
        reject(Abort.requestTimeout({ reason: `Request timeout after ${timeoutMs}ms`, metadata }))
      }, timeoutMs)
    })

    try {
      return await Promise.race([next(req), timeout])
    } finally {
      clearTimeout(timer)
    }
  }
}
