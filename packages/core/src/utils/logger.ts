/**
 * Logger
 *
 * Prefixed line logger with optional `key=value` fields. Debug lines are
 * written only when enabled, either per logger or through `RIGBENCH_DEBUG`
 * / `DEBUG=rigbench`.
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error'

type LogFields = Record<string, string | number | boolean | null | undefined>

/** Receives every line the logger emits; the default writes to the console. */
type LogSink = (level: LogLevel, line: string) => void

interface LoggerOptions {
  prefix?: string
  debug?: boolean
  sink?: LogSink
}

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') console.error(line)
  else if (level === 'warn') console.warn(line)
  else console.log(line)
}

const isDebugEnabled = (): boolean => {
  return process.env.RIGBENCH_DEBUG === 'true' || process.env.DEBUG?.includes('rigbench') === true
}

function formatFields(fields: LogFields): string {
  return Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => {
      const text = String(value)
      return `${key}=${/\s/.test(text) ? JSON.stringify(text) : text}`
    })
    .join(' ')
}

class Logger {
  private readonly prefix: string
  private readonly debugMode: boolean
  private readonly sink: LogSink

  constructor(options: LoggerOptions = {}) {
    this.prefix = options.prefix ?? ''
    this.debugMode = options.debug ?? isDebugEnabled()
    this.sink = options.sink ?? consoleSink
  }

  private write(level: LogLevel, message: string, fields?: LogFields): void {
    const parts = [this.prefix ? `[${this.prefix}]` : '', level === 'debug' ? '(debug)' : '', message]
    if (fields) parts.push(formatFields(fields))
    this.sink(level, parts.filter(Boolean).join(' '))
  }

  isDebugEnabled(): boolean {
    return this.debugMode
  }

  debug(message: string, fields?: LogFields): void {
    if (this.debugMode) this.write('debug', message, fields)
  }

  info(message: string, fields?: LogFields): void {
    this.write('info', message, fields)
  }

  warn(message: string, fields?: LogFields): void {
    this.write('warn', message, fields)
  }

  error(message: string, error?: unknown): void {
    if (error === undefined) {
      this.write('error', message)
    } else {
      this.write('error', `${message}: ${error instanceof Error ? error.message : String(error)}`)
    }
  }

  child(prefix: string): Logger {
    return new Logger({
      prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix,
      debug: this.debugMode,
      sink: this.sink,
    })
  }
}

export const logger = new Logger({ prefix: 'rigbench' })

export function createLogger(prefix: string, options: Omit<LoggerOptions, 'prefix'> = {}): Logger {
  return new Logger({ ...options, prefix })
}

export { Logger, type LogFields, type LoggerOptions, type LogLevel, type LogSink }
