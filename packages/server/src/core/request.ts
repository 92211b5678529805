/**
 * Dispatch Request
 *
 * The mutable request value a single dispatch owns. The method normalizer
 * rewrites `method` in place; the router fills in `params`.
 */

import { parseAccept, type AcceptPreference } from './accept'

export type HttpMethod =
  | 'GET'
  | 'POST'
  | 'PUT'
  | 'PATCH'
  | 'DELETE'
  | 'OPTIONS'
  | 'HEAD'
  | (string & {})

export type BodyFields = Record<string, string>

export interface DispatchRequestInit {
  method: string
  /** Absolute URL, or a path resolved against http://localhost */
  url: string | URL
  headers?: Headers | Record<string, string> | Array<[string, string]>
  body?: Uint8Array | string
}

const FALLBACK_ORIGIN = 'http://localhost'

const decoder = new TextDecoder()
const encoder = new TextEncoder()

function toFieldValue(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value)
  }
  return undefined
}

/**
 * Parse form or JSON-object body fields
 *
 * A body that does not parse as its declared type has no fields.
 */
export function parseBodyFields(contentType: string | null, body: Uint8Array): BodyFields {
  const fields: BodyFields = {}
  if (body.byteLength === 0 || !contentType) {
    return fields
  }

  const mediaType = contentType.split(';')[0]?.trim().toLowerCase()

  if (mediaType === 'application/x-www-form-urlencoded') {
    for (const [key, value] of new URLSearchParams(decoder.decode(body))) {
      fields[key] = value
    }
    return fields
  }

  if (mediaType === 'application/json' || mediaType?.endsWith('+json')) {
    let parsed: unknown
    try {
      parsed = JSON.parse(decoder.decode(body))
    } catch {
      return fields
    }
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      for (const [key, value] of Object.entries(parsed)) {
        const fieldValue = toFieldValue(value)
        if (fieldValue !== undefined) {
          fields[key] = fieldValue
        }
      }
    }
  }

  return fields
}

export class DispatchRequest {
  method: HttpMethod
  readonly url: URL
  readonly headers: Headers
  readonly body: Uint8Array
  readonly fields: BodyFields
  readonly accept: AcceptPreference[]
  params: Record<string, string> = {}

  constructor(init: DispatchRequestInit) {
    this.method = init.method.toUpperCase()
    this.url = new URL(init.url, FALLBACK_ORIGIN)
    this.headers = new Headers(init.headers)
    this.body = typeof init.body === 'string' ? encoder.encode(init.body) : (init.body ?? new Uint8Array())
    this.fields = parseBodyFields(this.headers.get('content-type'), this.body)
    this.accept = parseAccept(this.headers.get('accept'))
  }

  /**
   * Build a dispatch request from a fetch Request, reading its body
   */
  static async fromRequest(request: Request): Promise<DispatchRequest> {
    const body = request.body === null ? undefined : new Uint8Array(await request.arrayBuffer())
    return new DispatchRequest({
      method: request.method,
      url: request.url,
      headers: request.headers,
      body,
    })
  }

  get path(): string {
    return this.url.pathname
  }

  get query(): Record<string, string> {
    return Object.fromEntries(this.url.searchParams)
  }

  text(): string {
    return decoder.decode(this.body)
  }

  json(): unknown {
    return JSON.parse(this.text())
  }
}
