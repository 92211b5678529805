/**
 * Markup rendering of failures for clients that prefer HTML
 */

import { isDiagnosable, reasonPhrase } from '@switchyard/shared/errors'
import type { Environment } from '../config'
import type { DispatchRequest } from './request'
import { isNullBodyStatus } from './response-builder'

export interface ViewContext {
  status: number
  environment: Environment
  request: DispatchRequest
}

export interface ViewRenderer {
  render(error: unknown, context: ViewContext): Response | Promise<Response>
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
}

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char)
}

/**
 * Default error page
 *
 * Outside production the diagnostic reason is shown under the status line.
 */
export const htmlErrorView: ViewRenderer = {
  render(error, { status, environment }) {
    const title = `${status} ${reasonPhrase(status)}`
    const detail =
      environment !== 'production' && isDiagnosable(error)
        ? `<p>${escapeHtml(error.reason)}</p>`
        : ''

    const html =
      '<!DOCTYPE html>' +
      `<html><head><meta charset="utf-8"><title>${escapeHtml(title)}</title></head>` +
      `<body><h1>${escapeHtml(title)}</h1>${detail}</body></html>`

    return new Response(isNullBodyStatus(status) ? null : html, {
      status,
      headers: { 'Content-Type': 'text/html; charset=utf-8' },
    })
  },
}
