/**
 * Unit tests for DispatchRequest
 */

import { describe, it, expect } from 'vitest'
import { DispatchRequest, parseBodyFields } from '../../src/core/request'

const encoder = new TextEncoder()

describe('DispatchRequest', () => {
  it('should resolve relative URLs against localhost', () => {
    const req = new DispatchRequest({ method: 'get', url: '/users?page=2' })

    expect(req.method).toBe('GET')
    expect(req.url.href).toBe('http://localhost/users?page=2')
    expect(req.path).toBe('/users')
    expect(req.query).toEqual({ page: '2' })
  })

  it('should expose headers case-insensitively', () => {
    const req = new DispatchRequest({
      method: 'GET',
      url: '/',
      headers: { 'X-Request-Source': 'test' },
    })

    expect(req.headers.get('x-request-source')).toBe('test')
  })

  it('should parse the Accept header', () => {
    const req = new DispatchRequest({
      method: 'GET',
      url: '/',
      headers: { Accept: 'application/json;q=0.5, text/html' },
    })

    expect(req.accept).toEqual([
      { mediaType: 'text/html', quality: 1 },
      { mediaType: 'application/json', quality: 0.5 },
    ])
  })

  it('should keep the raw body and decode it', () => {
    const req = new DispatchRequest({
      method: 'POST',
      url: '/',
      headers: { 'Content-Type': 'application/json' },
      body: '{"name":"bob","age":30,"admin":false,"tags":["a"]}',
    })

    expect(req.text()).toBe('{"name":"bob","age":30,"admin":false,"tags":["a"]}')
    expect(req.json()).toEqual({ name: 'bob', age: 30, admin: false, tags: ['a'] })
    expect(req.fields).toEqual({ name: 'bob', age: '30', admin: 'false' })
  })

  it('should start with no path parameters', () => {
    expect(new DispatchRequest({ method: 'GET', url: '/' }).params).toEqual({})
  })

  it('should build from a fetch Request', async () => {
    const req = await DispatchRequest.fromRequest(
      new Request('http://example.com/users', {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: '_method=PUT&name=alice',
      })
    )

    expect(req.method).toBe('POST')
    expect(req.url.href).toBe('http://example.com/users')
    expect(req.fields).toEqual({ _method: 'PUT', name: 'alice' })
  })

  it('should build from a bodiless fetch Request', async () => {
    const req = await DispatchRequest.fromRequest(new Request('http://example.com/'))

    expect(req.body.byteLength).toBe(0)
    expect(req.fields).toEqual({})
  })
})

describe('parseBodyFields', () => {
  it('should parse url-encoded forms', () => {
    expect(
      parseBodyFields('application/x-www-form-urlencoded; charset=utf-8', encoder.encode('a=1&b=two+words'))
    ).toEqual({ a: '1', b: 'two words' })
  })

  it('should accept +json media types', () => {
    expect(parseBodyFields('application/merge-patch+json', encoder.encode('{"_method":"PATCH"}'))).toEqual({
      _method: 'PATCH',
    })
  })

  it('should yield no fields for malformed JSON', () => {
    expect(parseBodyFields('application/json', encoder.encode('{not json'))).toEqual({})
  })

  it('should yield no fields for JSON arrays', () => {
    expect(parseBodyFields('application/json', encoder.encode('[1,2]'))).toEqual({})
  })

  it('should yield no fields without a content type', () => {
    expect(parseBodyFields(null, encoder.encode('a=1'))).toEqual({})
  })

  it('should ignore other media types', () => {
    expect(parseBodyFields('text/plain', encoder.encode('a=1'))).toEqual({})
  })
})
