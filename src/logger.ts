/**
 * Levelled, coloured console logger. Data blocks are printed as indented JSON
 * with credential-like keys redacted.
 *
 * @module logger
 */

import chalk from 'chalk'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

type LineKind = LogLevel | 'success'

export type Logger = {
  debug: (message: string, data?: Record<string, unknown>) => void
  info: (message: string, data?: Record<string, unknown>) => void
  warn: (message: string, data?: Record<string, unknown>) => void
  error: (message: string, data?: Record<string, unknown>) => void
  /** Printed at `info` rank, in green. */
  success: (message: string, data?: Record<string, unknown>) => void
}

export type LoggerOptions = {
  /** Lowest level printed. @defaultValue `'info'` */
  level?: LogLevel
  /** Line sink. @defaultValue `console.log` */
  write?: (line: string) => void
  /** Clock for timestamps. */
  now?: () => Date
}

const LEVEL_RANK: Record<LineKind, number> = {
  debug: 10,
  info: 20,
  success: 20,
  warn: 30,
  error: 40,
}

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'authorization']

function formatTimestamp(date: Date): string {
  return chalk.gray(
    date.toLocaleString('en-US', {
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hour12: false,
    }),
  )
}

function levelTag(kind: LineKind): string {
  switch (kind) {
    case 'debug':
      return chalk.gray('[DEBUG]')
    case 'info':
      return chalk.cyan('[INFO]')
    case 'warn':
      return chalk.yellow('[WARN]')
    case 'error':
      return chalk.red('[ERROR]')
    case 'success':
      return chalk.green('[✓]')
  }
}

function isSensitive(key: string): boolean {
  const lower = key.toLowerCase()
  return SENSITIVE_KEYS.some((needle) => lower.includes(needle))
}

/** Deep copy of `value` with credential-like keys replaced by `'[REDACTED]'`. */
export function redact(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redact)
  if (typeof value !== 'object' || value === null) return value

  const out: Record<string, unknown> = {}
  for (const [key, child] of Object.entries(value)) {
    out[key] = isSensitive(key) ? '[REDACTED]' : redact(child)
  }
  return out
}

function formatData(data: Record<string, unknown>): string {
  const replacer = (_key: string, value: unknown) => (typeof value === 'bigint' ? value.toString() : value)
  return '\n  ' + JSON.stringify(redact(data), replacer, 2).split('\n').join('\n  ')
}

/**
 * Create a logger that prints lines at or above `level`.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: 'debug' })
 * logger.warn('Sampling failed', { restBase: 'books' })
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? 'info']
  const write = options.write ?? ((line: string) => console.log(line))
  const now = options.now ?? (() => new Date())

  function log(kind: LineKind, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_RANK[kind] < threshold) return
    const text = kind === 'error' ? chalk.red(message) : message
    let line = `${formatTimestamp(now())} ${levelTag(kind)} ${text}`
    if (data && Object.keys(data).length > 0) {
      line += formatData(data)
    }
    write(line)
  }

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
    success: (message, data) => log('success', message, data),
  }
}
