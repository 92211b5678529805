/**
 * Unit tests for the response finalizer
 */

import { describe, it, expect } from 'vitest'
import { finalizeResponse } from '../../src/core/finalizer'
import { textResponse } from '../../src/core/response-builder'

describe('finalizeResponse', () => {
  it('should strip the body for HEAD and keep status and headers', async () => {
    const original = textResponse('hello', 201)
    original.headers.set('ETag', '"abc"')

    const response = finalizeResponse('HEAD', original)

    expect(response.status).toBe(201)
    expect(response.headers.get('Content-Type')).toBe('text/plain; charset=utf-8')
    expect(response.headers.get('ETag')).toBe('"abc"')
    expect(await response.text()).toBe('')
  })

  it('should pass other methods through untouched', () => {
    const original = textResponse('hello')

    expect(finalizeResponse('GET', original)).toBe(original)
  })
})
