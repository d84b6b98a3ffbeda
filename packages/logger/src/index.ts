export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal"

export type LogFormat = "pretty" | "json"

export interface LogContext {
  component?: string
  phase?: string
  step?: string
  host?: string
  revision?: string
  [key: string]: unknown
}

export interface LogEntry {
  level: LogLevel
  message: string
  error?: unknown
  context?: LogContext
  timestamp: string
}

export type LogSink = (entry: LogEntry) => void

export interface Logger {
  debug: (message: string, context?: LogContext) => void
  info: (message: string, context?: LogContext) => void
  warn: (message: string, error?: unknown, context?: LogContext) => void
  error: (message: string, error?: unknown, context?: LogContext) => void
  fatal: (message: string, error?: unknown, context?: LogContext) => void
  /** Logger with `context` merged under every entry's own context */
  child: (context: LogContext) => Logger
}

export interface LoggerOptions {
  sink?: LogSink
  /** Entries below this level are dropped (default: info) */
  level?: LogLevel
  context?: LogContext
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LEVEL_ORDER, value)
}

function describeError(error: unknown): string | undefined {
  if (error === undefined) return undefined
  if (error instanceof Error) return error.message
  return String(error)
}

/**
 * `[component] message` lines; warnings and errors go to stderr
 */
export function prettySink(entry: LogEntry): void {
  const prefix = entry.context?.component ? `[${entry.context.component}] ` : ""
  const detail = describeError(entry.error)
  const line = detail ? `${prefix}${entry.message}: ${detail}` : `${prefix}${entry.message}`

  if (LEVEL_ORDER[entry.level] >= LEVEL_ORDER.warn) {
    console.error(line)
  } else {
    console.log(line)
  }
}

/**
 * One JSON object per line, for log collectors
 */
export function jsonSink(entry: LogEntry): void {
  const payload = {
    level: entry.level,
    message: entry.message,
    error: describeError(entry.error),
    context: entry.context,
    timestamp: entry.timestamp,
  }
  const line = JSON.stringify(payload)
  if (LEVEL_ORDER[entry.level] >= LEVEL_ORDER.warn) {
    console.error(line)
  } else {
    console.log(line)
  }
}

export function sinkForFormat(format: LogFormat): LogSink {
  return format === "json" ? jsonSink : prettySink
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? prettySink
  const threshold = LEVEL_ORDER[options.level ?? "info"]
  const bound = options.context

  const log = (level: LogLevel, message: string, error?: unknown, context?: LogContext): void => {
    if (LEVEL_ORDER[level] < threshold) return
    const merged = bound || context ? { ...bound, ...context } : undefined
    sink({
      level,
      message,
      error,
      context: merged,
      timestamp: new Date().toISOString(),
    })
  }

  return {
    debug: (message, context) => log("debug", message, undefined, context),
    info: (message, context) => log("info", message, undefined, context),
    warn: (message, error, context) => log("warn", message, error, context),
    error: (message, error, context) => log("error", message, error, context),
    fatal: (message, error, context) => log("fatal", message, error, context),
    child: context => createLogger({ ...options, context: { ...bound, ...context } }),
  }
}

/** Drops everything; for callers that want results without output */
export const silentLogger: Logger = createLogger({ sink: () => {} })
