/**
 * Switchyard HTTP Server
 * Serves the dispatch pipeline over node:http with Router + DI Container architecture
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http'
import type { AddressInfo } from 'node:net'
import { createLogger, type Logger } from '@switchyard/shared/logger'
import type { ServerConfig } from './config'
import { ServiceContainer } from './core/container'
import { Dispatcher } from './core/dispatcher'
import { corsMiddleware, loggerMiddleware, timeoutMiddleware, type Middleware } from './core/middleware'
import { toDispatchRequest, writeResponse } from './core/node-adapter'
import { textResponse } from './core/response-builder'
import { Router } from './core/router'
import type { ViewRenderer } from './core/view'
import { HealthHandler } from './handlers/health'

export const VERSION = '1.0.0'

interface Services {
  logger: Logger
  router: Router
  healthHandler: HealthHandler
  dispatcher: Dispatcher
}

export interface ServerOptions {
  /** Extra middleware, run inside the built-in ones */
  middlewares?: Middleware[]
  view?: ViewRenderer
}

export class SwitchyardServer {
  private readonly config: ServerConfig
  private readonly container = new ServiceContainer<Services>()
  private readonly options: ServerOptions
  private server?: Server

  constructor(config: ServerConfig, options: ServerOptions = {}) {
    this.config = config
    this.options = options

    this.setupServices()
    this.setupRoutes()
  }

  private setupServices(): void {
    this.container.register('logger', () =>
      createLogger({ level: this.config.logLevel, enableJson: this.config.logJson })
    )
    this.container.register('router', () => new Router())
    this.container.register(
      'healthHandler',
      () => new HealthHandler(VERSION, this.config.environment)
    )
    this.container.register('dispatcher', () => {
      const logger = this.container.get('logger')
      return new Dispatcher({
        router: this.container.get('router'),
        middlewares: this.setupMiddlewares(logger),
        environment: this.config.environment,
        logger: logger.child({ name: 'dispatcher' }),
        view: this.options.view,
        methodOverrideField: this.config.methodOverrideField,
      })
    })
  }

  private setupMiddlewares(logger: Logger): Middleware[] {
    const middlewares: Middleware[] = [loggerMiddleware(logger.child({ name: 'http' }))]
    if (this.config.enableCors) {
      middlewares.push(corsMiddleware())
    }
    if (this.config.requestTimeoutMs !== undefined) {
      middlewares.push(timeoutMiddleware(this.config.requestTimeoutMs))
    }
    return [...middlewares, ...(this.options.middlewares ?? [])]
  }

  private setupRoutes(): void {
    const healthHandler = this.container.get('healthHandler')

    this.router.register('GET', '/health', async () => healthHandler.handleHealth())
  }

  /**
   * Router for application routes; register before the first request
   */
  get router(): Router {
    return this.container.get('router')
  }

  get dispatcher(): Dispatcher {
    return this.container.get('dispatcher')
  }

  async start(): Promise<AddressInfo> {
    const logger = this.container.get('logger')
    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch(error => {
        logger.error('Failed to write error response', error)
        res.destroy()
      })
    })
    this.server = server

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject)
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', reject)
        resolve()
      })
    })

    const address = server.address()
    if (address === null || typeof address === 'string') {
      throw new Error(`Unexpected server address: ${String(address)}`)
    }

    logger.info(`Switchyard HTTP Server running on ${address.address}:${address.port}`)
    logger.info(`Environment: ${this.config.environment}`)
    return address
  }

  async stop(): Promise<void> {
    const server = this.server
    if (!server) {
      return
    }
    this.server = undefined

    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()))
    })
    this.container.get('logger').info('Server stopped')
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const fallbackOrigin = `http://${this.config.host}:${this.config.port}`

    try {
      const request = await toDispatchRequest(req, fallbackOrigin)
      const response = await this.dispatcher.respond(request)
      await writeResponse(res, response)
    } catch (error) {
      // Transport failures happen outside the pipeline
      this.container.get('logger').error('Failed to serve request', error, {
        method: req.method,
        url: req.url,
      })

      if (res.headersSent) {
        res.destroy()
        return
      }
      await writeResponse(res, textResponse('Internal Server Error', 500))
    }
  }
}
