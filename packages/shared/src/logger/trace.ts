/**
 * TraceID generation and management for distributed tracing
 */

import { randomBytes, randomUUID } from 'node:crypto'

/**
 * Generate a unique trace ID
 */
export function generateTraceId(): string {
  return randomUUID()
}

function generateSpanId(): string {
  return randomBytes(8).toString('hex')
}

/**
 * Trace context for propagating trace information
 */
export interface TraceContext {
  traceId: string
  spanId?: string
  parentSpanId?: string
  timestamp: number
}

/**
 * Create a new trace context, continuing an upstream trace id when given
 */
export function createTraceContext(traceId?: string): TraceContext {
  return {
    traceId: traceId || generateTraceId(),
    spanId: generateSpanId(),
    timestamp: Date.now(),
  }
}

/**
 * Create a child span from parent trace context
 */
export function createChildSpan(parent: TraceContext): TraceContext {
  return {
    traceId: parent.traceId,
    spanId: generateSpanId(),
    parentSpanId: parent.spanId,
    timestamp: Date.now(),
  }
}
