/**
 * Structured logger with TraceID support
 */

import type { TraceContext } from './trace'

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

/**
 * Log level priority for filtering
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
}

/**
 * The leveled sink the pipeline writes to
 */
export interface LogSink {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, error?: unknown, context?: Record<string, unknown>): void
}

/**
 * Log entry structure
 */
export interface LogEntry {
  level: LogLevel
  message: string
  timestamp: string
  name?: string
  traceId?: string
  spanId?: string
  context?: Record<string, unknown>
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel
  enableConsole: boolean
  enableJson: boolean
  /** Component name printed with every entry */
  name?: string
}

/**
 * Logger class with TraceID support
 */
export class Logger implements LogSink {
  private readonly config: LoggerConfig
  private readonly traceContext?: TraceContext

  constructor(config: Partial<LoggerConfig> = {}, traceContext?: TraceContext) {
    this.config = {
      level: config.level ?? LogLevel.INFO,
      enableConsole: config.enableConsole ?? true,
      enableJson: config.enableJson ?? false,
      name: config.name,
    }
    this.traceContext = traceContext
  }

  /**
   * Create a child logger bound to a trace context
   *
   * Loggers are immutable, so a child per request keeps concurrent
   * requests from overwriting each other's trace ids.
   */
  child(context: Partial<TraceContext> & { name?: string }): Logger {
    const { name, ...trace } = context
    const traceContext: TraceContext = {
      traceId: trace.traceId ?? this.traceContext?.traceId ?? '',
      spanId: trace.spanId ?? this.traceContext?.spanId,
      parentSpanId: trace.parentSpanId ?? this.traceContext?.parentSpanId,
      timestamp: trace.timestamp ?? Date.now(),
    }
    return new Logger({ ...this.config, name: name ?? this.config.name }, traceContext)
  }

  get trace(): TraceContext | undefined {
    return this.traceContext
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context)
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context)
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context)
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, {
      ...context,
      ...(error === undefined ? {} : { error: serializeError(error) }),
    })
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.level]
  }

  /**
   * Internal log method
   */
  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) {
      return
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      name: this.config.name,
      traceId: this.traceContext?.traceId || undefined,
      spanId: this.traceContext?.spanId,
      context: context && Object.keys(context).length > 0 ? context : undefined,
    }

    if (this.config.enableConsole) {
      console.log(this.format(entry))
    }
  }

  /**
   * Render a log entry as one output line
   */
  format(entry: LogEntry): string {
    if (this.config.enableJson) {
      return JSON.stringify(entry)
    }

    const { level, message, timestamp, name, traceId, context } = entry
    const contextStr = context ? ` ${JSON.stringify(context)}` : ''
    const traceStr = traceId ? ` [trace:${traceId}]` : ''
    const nameStr = name ? ` (${name})` : ''

    return this.colorizeLog(
      level,
      `[${timestamp}] ${level.toUpperCase()}:${nameStr}${traceStr} ${message}${contextStr}`
    )
  }

  /**
   * Add color to log messages (for terminal output)
   */
  private colorizeLog(level: LogLevel, message: string): string {
    const colors = {
      [LogLevel.DEBUG]: '\x1b[36m', // Cyan
      [LogLevel.INFO]: '\x1b[32m', // Green
      [LogLevel.WARN]: '\x1b[33m', // Yellow
      [LogLevel.ERROR]: '\x1b[31m', // Red
    }
    const reset = '\x1b[0m'
    return `${colors[level]}${message}${reset}`
  }
}

function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    }
  }
  return { value: String(error) }
}

/**
 * Create a default logger instance
 */
export function createLogger(config?: Partial<LoggerConfig>): Logger {
  return new Logger(config)
}
