/**
 * Unit tests for the shared error system
 */

import { describe, it, expect } from 'vitest'
import {
  Abort,
  ErrorCode,
  ERROR_HTTP_STATUS,
  formatDiagnostics,
  isAbort,
  isAbortable,
  isDiagnosable,
  reasonPhrase,
} from '../src/errors'

describe('Abort', () => {
  it('should take status, reason and suggestions from its code', () => {
    const abort = Abort.notFound()

    expect(abort).toBeInstanceOf(Error)
    expect(abort.name).toBe('Abort')
    expect(abort.status).toBe(404)
    expect(abort.reason).toBe('Not Found')
    expect(abort.message).toBe('Not Found')
    expect(abort.identifier).toBe('Abort.NOT_FOUND')
    expect(abort.suggestedFixes).toEqual(['Check that the request path and method match a registered route'])
    expect(abort.possibleCauses).toEqual([])
    expect(abort.metadata).toBeUndefined()
  })

  it('should accept a custom reason, metadata and diagnostics', () => {
    const abort = Abort.badRequest({
      reason: 'Missing email',
      metadata: { field: 'email' },
      possibleCauses: ['Form was submitted empty'],
      suggestedFixes: ['Fill in the email field'],
    })

    expect(abort.status).toBe(400)
    expect(abort.reason).toBe('Missing email')
    expect(abort.metadata).toEqual({ field: 'email' })
    expect(abort.possibleCauses).toEqual(['Form was submitted empty'])
    expect(abort.suggestedFixes).toEqual(['Fill in the email field'])
  })

  it('should map every factory to its status', () => {
    expect(Abort.unauthorized().status).toBe(401)
    expect(Abort.forbidden().status).toBe(403)
    expect(Abort.methodNotAllowed().status).toBe(405)
    expect(Abort.notAcceptable().status).toBe(406)
    expect(Abort.requestTimeout().status).toBe(408)
    expect(Abort.payloadTooLarge().status).toBe(413)
    expect(Abort.unsupportedMediaType().status).toBe(415)
    expect(Abort.tooManyRequests().status).toBe(429)
    expect(Abort.serverError().status).toBe(500)
    expect(Abort.notImplemented().status).toBe(501)
    expect(Abort.serviceUnavailable().status).toBe(503)
  })

  it('should describe the less common statuses', () => {
    expect(Abort.notAcceptable().reason).toBe('Not Acceptable')
    expect(Abort.payloadTooLarge().identifier).toBe('Abort.PAYLOAD_TOO_LARGE')
    expect(Abort.unsupportedMediaType().identifier).toBe('Abort.UNSUPPORTED_MEDIA_TYPE')
    expect(Abort.serviceUnavailable().reason).toBe('Service Unavailable')
  })

  it('should build custom statuses', () => {
    const teapot = Abort.custom(418)
    const gateway = Abort.custom(502, { reason: 'Upstream down' })

    expect(teapot.status).toBe(418)
    expect(teapot.reason).toBe("I'm a Teapot")
    expect(teapot.code).toBe(ErrorCode.BAD_REQUEST)
    expect(gateway.code).toBe(ErrorCode.INTERNAL_ERROR)
    expect(gateway.identifier).toBe('Abort.INTERNAL_ERROR')
    expect(gateway.reason).toBe('Upstream down')
  })

  it('should keep the cause', () => {
    const cause = new Error('socket hang up')

    expect(Abort.serverError({ cause }).cause).toBe(cause)
  })

  it('should serialize to JSON', () => {
    const json = Abort.forbidden({ metadata: { role: 'guest' } }).toJSON()

    expect(json).toMatchObject({
      name: 'Abort',
      message: 'Forbidden',
      code: ErrorCode.FORBIDDEN,
      status: 403,
      identifier: 'Abort.FORBIDDEN',
      metadata: { role: 'guest' },
    })
    expect(json).not.toHaveProperty('stack')
  })

  it('should map every error code to a status', () => {
    for (const code of Object.values(ErrorCode)) {
      expect(ERROR_HTTP_STATUS[code]).toBeGreaterThanOrEqual(400)
    }
  })
})

describe('capability probes', () => {
  it('should recognise abortable values', () => {
    expect(isAbortable(Abort.notFound())).toBe(true)
    expect(isAbortable({ status: 400 })).toBe(true)
    expect(isAbortable({ status: 400, metadata: { a: 1 } })).toBe(true)
    expect(isAbortable({ status: '400' })).toBe(false)
    expect(isAbortable({ status: 400, metadata: 'oops' })).toBe(false)
    expect(isAbortable(new Error('plain'))).toBe(false)
    expect(isAbortable(null)).toBe(false)
  })

  it('should recognise diagnosable values', () => {
    const diagnosable = {
      readableName: 'Cache Error',
      reason: 'Cache unreachable',
      identifier: 'Cache.unreachable',
      possibleCauses: [],
      suggestedFixes: [],
      documentationLinks: [],
      stackOverflowQuestions: [],
      gitHubIssues: [],
    }

    expect(isDiagnosable(Abort.notFound())).toBe(true)
    expect(isDiagnosable(diagnosable)).toBe(true)
    expect(isDiagnosable({ ...diagnosable, gitHubIssues: undefined })).toBe(false)
    expect(isDiagnosable({ ...diagnosable, possibleCauses: [1] })).toBe(false)
    expect(isDiagnosable(new Error('plain'))).toBe(false)
  })

  it('should tell Abort instances apart', () => {
    expect(isAbort(Abort.notFound())).toBe(true)
    expect(isAbort({ status: 404 })).toBe(false)
  })
})

describe('reasonPhrase', () => {
  it('should return standard phrases', () => {
    expect(reasonPhrase(404)).toBe('Not Found')
    expect(reasonPhrase(500)).toBe('Internal Server Error')
  })

  it('should fall back for unknown statuses', () => {
    expect(reasonPhrase(799)).toBe('Unknown Status')
  })
})

describe('formatDiagnostics', () => {
  it('should bracket each part and comma-join lists', () => {
    const abort = new Abort(ErrorCode.NOT_FOUND, {
      possibleCauses: ['Route was never registered', 'Typo in path'],
      gitHubIssues: ['https://github.com/example/switchyard/issues/1'],
    })

    expect(formatDiagnostics(abort)).toBe(
      '[Abort: Not Found] [Identifier: Abort.NOT_FOUND] ' +
        '[Possible Causes: Route was never registered, Typo in path] ' +
        '[Suggested Fixes: Check that the request path and method match a registered route] ' +
        '[GitHub Issues: https://github.com/example/switchyard/issues/1]'
    )
  })

  it('should omit empty lists', () => {
    const abort = new Abort(ErrorCode.CONFLICT)

    expect(formatDiagnostics(abort)).toBe('[Abort: Conflict] [Identifier: Abort.CONFLICT]')
  })
})
