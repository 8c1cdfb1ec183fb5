/**
 * Line logger for the API process.
 *
 * Output: `[HH:MM:SS] LEVEL message key=value ...`, written through the console
 * so container log collectors pick it up unchanged.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogFields = Record<string, unknown>

export type LogSink = (level: LogLevel, line: string) => void

export interface Logger {
  debug(message: string, fields?: LogFields): void
  info(message: string, fields?: LogFields): void
  warn(message: string, fields?: LogFields): void
  error(message: string, fields?: LogFields): void
  /** Returns a logger that adds `bindings` to every line. */
  child(bindings: LogFields): Logger
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

function formatValue(value: unknown): string {
  if (value instanceof Date) return value.toISOString()
  if (value instanceof Error) return JSON.stringify(value.message)
  if (typeof value === 'string') {
    return /[\s="]/.test(value) || value === '' ? JSON.stringify(value) : value
  }
  if (typeof value === 'number' || typeof value === 'boolean' || value === null) return String(value)
  return JSON.stringify(value) ?? String(value)
}

export function formatLogLine(level: LogLevel, message: string, fields: LogFields = {}, at = new Date()): string {
  const timestamp = at.toISOString().split('T')[1].split('.')[0]
  const pairs = Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
  return [`[${timestamp}]`, level.toUpperCase(), message, ...pairs].join(' ')
}

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') console.error(line)
  else if (level === 'warn') console.warn(line)
  else console.log(line)
}

export type LoggerOptions = {
  level?: LogLevel
  bindings?: LogFields
  sink?: LogSink
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', bindings = {}, sink = consoleSink } = options
  const threshold = LEVEL_WEIGHT[level]

  const write = (lineLevel: LogLevel, message: string, fields?: LogFields) => {
    if (LEVEL_WEIGHT[lineLevel] < threshold) return
    sink(lineLevel, formatLogLine(lineLevel, message, { ...bindings, ...fields }))
  }

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
    child: (childBindings) => createLogger({ level, sink, bindings: { ...bindings, ...childBindings } }),
  }
}

/** Logger that drops everything; handy for tests and scripts. */
export const silentLogger: Logger = createLogger({ sink: () => {} })
