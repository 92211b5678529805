/**
 * Bridges node:http messages and the dispatch pipeline
 */

import type { IncomingMessage, OutgoingHttpHeaders, ServerResponse } from 'node:http'
import { DispatchRequest } from './request'

function readBody(message: IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []
    message.on('data', (chunk: Buffer | string) => {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk)
    })
    message.once('end', () => resolve(Buffer.concat(chunks)))
    message.once('error', reject)
  })
}

/**
 * Copy node's header record into fetch Headers, keeping repeated values
 */
export function toHeaders(incoming: IncomingMessage['headers']): Headers {
  const headers = new Headers()
  for (const [name, value] of Object.entries(incoming)) {
    if (value === undefined) {
      continue
    }
    if (Array.isArray(value)) {
      for (const item of value) {
        headers.append(name, item)
      }
    } else {
      headers.set(name, value)
    }
  }
  return headers
}

/**
 * Origin named by the Host header, or the fallback when the header is
 * missing or names more than a host and port
 */
export function resolveOrigin(host: string | undefined, fallback: string): string {
  if (!host) {
    return fallback
  }

  try {
    const url = new URL(`http://${host}`)
    if (url.pathname !== '/' || url.search || url.hash || url.username || url.password) {
      return fallback
    }
    return url.origin
  } catch {
    return fallback
  }
}

/**
 * Resolve a request target against a trusted origin
 *
 * Origin-form targets are appended to the origin as they are, so a path
 * starting with `//` stays a path instead of naming a host.
 */
export function toRequestUrl(target: string, origin: string): URL {
  if (target.startsWith('/')) {
    return new URL(origin + target)
  }

  try {
    return new URL(target, origin)
  } catch {
    return new URL('/', origin)
  }
}

/**
 * Build a dispatch request from an incoming message
 *
 * Any method token is accepted, including ones fetch Request refuses.
 * `fallbackOrigin` is used when the Host header does not name a valid host.
 */
export async function toDispatchRequest(message: IncomingMessage, fallbackOrigin: string): Promise<DispatchRequest> {
  const body = await readBody(message)
  const origin = resolveOrigin(message.headers.host, fallbackOrigin)
  return new DispatchRequest({
    method: message.method ?? 'GET',
    url: toRequestUrl(message.url ?? '/', origin),
    headers: toHeaders(message.headers),
    body,
  })
}

/**
 * Flatten fetch Headers for writeHead, keeping every Set-Cookie
 */
export function toOutgoingHeaders(headers: Headers): OutgoingHttpHeaders {
  const outgoing: OutgoingHttpHeaders = {}
  headers.forEach((value, name) => {
    if (name !== 'set-cookie') {
      outgoing[name] = value
    }
  })

  const cookies = headers.getSetCookie()
  if (cookies.length > 0) {
    outgoing['set-cookie'] = cookies
  }
  return outgoing
}

/**
 * Write a response to the node socket
 */
export async function writeResponse(res: ServerResponse, response: Response): Promise<void> {
  const body = response.body === null ? undefined : Buffer.from(await response.arrayBuffer())

  res.writeHead(response.status, response.statusText || undefined, toOutgoingHeaders(response.headers))
  res.end(body)
}
