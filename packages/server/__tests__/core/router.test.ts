/**
 * Unit tests for Router
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { Router } from '../../src/core/router'
import type { RouteHandler } from '../../src/core/router'
import { DispatchRequest } from '../../src/core/request'
import { textResponse } from '../../src/core/response-builder'

describe('Router', () => {
  let router: Router

  beforeEach(() => {
    router = new Router()
  })

  describe('register', () => {
    it('should register a route handler', () => {
      const handler: RouteHandler = async () => textResponse('OK')
      router.register('GET', '/test', handler)

      expect(router.getRoutes().has('GET')).toBe(true)
    })

    it('should normalize HTTP methods to uppercase', () => {
      const handler: RouteHandler = async () => textResponse('OK')
      router.register('get', '/test', handler)
      router.register('Post', '/test2', handler)

      const routes = router.getRoutes()
      expect(routes.has('GET')).toBe(true)
      expect(routes.has('POST')).toBe(true)
    })

    it('should support multiple routes for same method', () => {
      const handler: RouteHandler = async () => textResponse('OK')
      router
        .register('GET', '/route1', handler)
        .register('GET', '/route2', handler)
        .register('GET', '/route3', handler)

      expect(router.getRoutes().get('GET')?.size).toBe(3)
    })
  })

  describe('match', () => {
    it('should match exact static routes', () => {
      const handler: RouteHandler = async () => textResponse('OK')
      router.register('GET', '/files/list', handler)

      const match = router.match('GET', 'http://localhost:3000/files/list')
      expect(match?.handler).toBe(handler)
    })

    it('should match patterns registered without a leading slash', () => {
      const handler: RouteHandler = async () => textResponse('index')
      router.register('GET', 'users', handler)

      expect(router.match('GET', '/users')?.handler).toBe(handler)
    })

    it('should return null for non-existent route', () => {
      router.register('GET', '/test', async () => textResponse('OK'))

      expect(router.match('GET', 'http://localhost:3000/nonexistent')).toBeNull()
    })

    it('should return null for wrong HTTP method', () => {
      router.register('GET', '/test', async () => textResponse('OK'))

      expect(router.match('POST', 'http://localhost:3000/test')).toBeNull()
    })

    it('should extract path parameters', () => {
      router.register('GET', '/users/:id/posts/:postId', async () => textResponse('OK'))

      const match = router.match('GET', '/users/42/posts/7')
      expect(match?.params.path).toEqual({ id: '42', postId: '7' })
    })

    it('should decode URL-encoded path parameters', () => {
      router.register('GET', '/files/:name', async () => textResponse('OK'))

      const match = router.match('GET', '/files/my%20file.txt')
      expect(match?.params.path).toEqual({ name: 'my file.txt' })
    })

    it('should keep malformed escapes as sent', () => {
      router.register('GET', '/files/:name', async () => textResponse('OK'))

      const match = router.match('GET', '/files/%E0%A4%A')
      expect(match?.params.path).toEqual({ name: '%E0%A4%A' })
    })

    it('should parse query parameters', () => {
      router.register('GET', '/search', async () => textResponse('OK'))

      const match = router.match('GET', '/search?q=term&limit=10')
      expect(match?.params.query).toEqual({ q: 'term', limit: '10' })
    })

    it('should not match when segment counts differ', () => {
      router.register('GET', '/users/:id', async () => textResponse('OK'))

      expect(router.match('GET', '/users')).toBeNull()
      expect(router.match('GET', '/users/1/extra')).toBeNull()
    })
  })

  describe('route', () => {
    it('should return null when nothing matches', () => {
      const req = new DispatchRequest({ method: 'GET', url: '/missing' })

      expect(router.route(req)).toBeNull()
    })

    it('should bind path parameters onto the request', async () => {
      router.register('GET', '/users/:name', async (req, params) =>
        textResponse(`user ${req.params.name} (${params.query.format})`)
      )
      const req = new DispatchRequest({ method: 'GET', url: '/users/bob?format=short' })

      const handler = router.route(req)
      expect(handler).not.toBeNull()

      const response = await handler?.(req)
      expect(await response?.text()).toBe('user bob (short)')
      expect(req.params).toEqual({ name: 'bob' })
    })
  })
})
