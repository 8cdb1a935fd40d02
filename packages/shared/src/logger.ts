/**
 * Structured JSON-line logger.
 *
 * Emits one JSON object per line with `ts`, `level`, `event` and any bound
 * or per-call fields. Works with any log aggregator that reads JSON lines.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }

export type LogFields = Record<string, unknown>

/** Anything with a `write` method: process.stdout, process.stderr, a test buffer. */
export interface LogSink {
  write(chunk: string): unknown
}

export interface Logger {
  readonly level: LogLevel
  debug(event: string, fields?: LogFields): void
  info(event: string, fields?: LogFields): void
  warn(event: string, fields?: LogFields): void
  error(event: string, fields?: LogFields): void
  /** Logger that adds `bindings` to every entry. */
  child(bindings: LogFields): Logger
}

export interface LoggerOptions {
  level?: LogLevel
  sink?: LogSink
  bindings?: LogFields
  clock?: () => Date
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value)
}

function serialize(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message }
  }
  return value
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info'
  const sink = options.sink ?? process.stdout
  const bindings = options.bindings ?? {}
  const clock = options.clock ?? (() => new Date())

  const emit = (entryLevel: LogLevel, event: string, fields: LogFields = {}): void => {
    if (SEVERITY[entryLevel] < SEVERITY[level]) return

    const entry: LogFields = { ts: clock().toISOString(), level: entryLevel, event, ...bindings }
    for (const [key, value] of Object.entries(fields)) {
      entry[key] = serialize(value)
    }
    sink.write(JSON.stringify(entry) + '\n')
  }

  return {
    level,
    debug: (event, fields) => emit('debug', event, fields),
    info: (event, fields) => emit('info', event, fields),
    warn: (event, fields) => emit('warn', event, fields),
    error: (event, fields) => emit('error', event, fields),
    child: (extra) => createLogger({ level, sink, clock, bindings: { ...bindings, ...extra } }),
  }
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  level: 'error',
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
}
