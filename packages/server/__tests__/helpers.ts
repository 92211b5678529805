/**
 * Shared test fixtures
 */

import { vi } from 'vitest'
import type { LogSink } from '@switchyard/shared/logger'

export function createLogSink() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies LogSink
}
