/**
 * Unit tests for HealthHandler
 */

import { describe, it, expect } from 'vitest'
import { HealthHandler } from '../../src/handlers/health'

describe('HealthHandler', () => {
  it('should report status, version, environment and uptime', async () => {
    let now = Date.parse('2026-01-01T00:00:00.000Z')
    const handler = new HealthHandler('1.2.3', 'test', () => now)
    now += 1500

    const response = await handler.handleHealth()

    expect(response.status).toBe(200)
    expect(await response.json()).toEqual({
      status: 'healthy',
      timestamp: '2026-01-01T00:00:01.500Z',
      version: '1.2.3',
      environment: 'test',
      uptime: 1.5,
    })
  })
})
