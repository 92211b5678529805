/**
 * Dispatcher
 *
 * Turns one request into exactly one response:
 * method normalization, the middleware chain around the router (or the
 * fallback handler on a miss), error normalization, then finalization.
 */

import { createLogger, type LogSink } from '@switchyard/shared/logger'
import type { Environment } from '../config'
import { ErrorNormalizer } from './error-normalizer'
import { fallbackHandler } from './fallback'
import { finalizeResponse } from './finalizer'
import { DEFAULT_METHOD_OVERRIDE_FIELD, normalizeMethod } from './method-normalizer'
import { chainMiddlewares, type Handler, type Middleware } from './middleware'
import { DispatchRequest } from './request'
import type { RouterAdapter } from './router'
import { htmlErrorView, type ViewRenderer } from './view'

export interface DispatcherOptions {
  router: RouterAdapter
  middlewares?: readonly Middleware[]
  environment?: Environment
  logger?: LogSink
  view?: ViewRenderer
  /** Body field whose value overrides the request method */
  methodOverrideField?: string
}

export class Dispatcher {
  private readonly logger: LogSink
  private readonly responder: Handler
  private readonly errors: ErrorNormalizer
  private readonly methodOverrideField: string

  constructor(options: DispatcherOptions) {
    const { router } = options
    this.logger = options.logger ?? createLogger({ name: 'dispatcher' })
    this.methodOverrideField = options.methodOverrideField ?? DEFAULT_METHOD_OVERRIDE_FIELD
    this.errors = new ErrorNormalizer({
      environment: options.environment ?? 'development',
      logger: this.logger,
      view: options.view ?? htmlErrorView,
    })

    // The router is shared and owned elsewhere; only a handle is kept here
    const routerResponder: Handler = async req => {
      const handler = router.route(req)
      return handler ? handler(req) : fallbackHandler(req)
    }

    this.responder = chainMiddlewares(options.middlewares ?? [], routerResponder)
  }

  /**
   * Dispatch a request; never rejects
   */
  async respond(req: DispatchRequest): Promise<Response> {
    this.logger.info(`${req.method} ${req.path}`)

    const originalMethod = normalizeMethod(req, this.methodOverrideField)

    let response: Response
    try {
      response = await this.responder(req)
      this.errors.inspect(response)
    } catch (error) {
      response = await this.errors.normalize(error, req)
    }

    return finalizeResponse(originalMethod, response)
  }

  /**
   * Dispatch a fetch Request
   */
  async handle(request: Request): Promise<Response> {
    return this.respond(await DispatchRequest.fromRequest(request))
  }
}
