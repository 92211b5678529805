/**
 * Health Handler
 * Handles health checks for load balancers and probes
 */

import type { Environment } from '../config'
import { successResponse } from '../core/response-builder'

export interface HealthStatus {
  status: 'healthy'
  timestamp: string
  version: string
  environment: Environment
  uptime: number
}

export class HealthHandler {
  private readonly startTime: number

  constructor(
    private readonly version: string,
    private readonly environment: Environment,
    private readonly now: () => number = Date.now
  ) {
    this.startTime = now()
  }

  /**
   * Handle health check request
   */
  async handleHealth(): Promise<Response> {
    const health: HealthStatus = {
      status: 'healthy',
      timestamp: new Date(this.now()).toISOString(),
      version: this.version,
      environment: this.environment,
      uptime: (this.now() - this.startTime) / 1000,
    }

    return successResponse(health)
  }
}
