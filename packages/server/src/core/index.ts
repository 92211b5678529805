/**
 * Core Architecture Components
 *
 * Exports the building blocks of the dispatch pipeline
 */

export { ServiceContainer } from './container'
export type { ServiceFactory } from './container'

export { DispatchRequest, parseBodyFields } from './request'
export type { BodyFields, DispatchRequestInit, HttpMethod } from './request'

export { parseAccept, prefers } from './accept'
export type { AcceptPreference } from './accept'

export { Router } from './router'
export type { RouteHandler, RouteParams, RouteMatch, RouterAdapter } from './router'

export { chainMiddlewares, corsMiddleware, loggerMiddleware, timeoutMiddleware } from './middleware'
export type { CorsOptions, Handler, Middleware } from './middleware'

export { DEFAULT_METHOD_OVERRIDE_FIELD, normalizeMethod } from './method-normalizer'
export { fallbackHandler } from './fallback'
export { ErrorNormalizer, statusOf } from './error-normalizer'
export type { ErrorDocument, ErrorNormalizerOptions } from './error-normalizer'
export { finalizeResponse } from './finalizer'
export { htmlErrorView, escapeHtml } from './view'
export type { ViewContext, ViewRenderer } from './view'
export { Dispatcher } from './dispatcher'
export type { DispatcherOptions } from './dispatcher'

export {
  resolveOrigin,
  toDispatchRequest,
  toHeaders,
  toOutgoingHeaders,
  toRequestUrl,
  writeResponse,
} from './node-adapter'

export {
  successResponse,
  jsonResponse,
  textResponse,
  emptyResponse,
  noContentResponse,
  withHeaders,
  withoutBody,
  isNullBodyStatus,
} from './response-builder'
