/**
 * Task logger
 *
 * Writes prefixed lines to the console and, when a log file is configured,
 * appends one JSON line per entry to it. A log file that fails is reported
 * once and dropped; logging never throws. A logger is created per task and
 * handed to the components that need it.
 */

import fs from 'fs'
import path from 'path'
import { errorMessage } from './errors.js'

export type LogLevel = 'info' | 'warn' | 'error'

export type LogFields = Record<string, unknown>

export interface LogEntry {
  time: string
  level: LogLevel
  scope: string
  message: string
  fields?: LogFields
}

export interface Logger {
  info(message: string, fields?: LogFields): void
  warn(message: string, fields?: LogFields): void
  error(message: string, fields?: LogFields): void
  /** Logger writing to the same outputs under `scope:suffix` */
  child(suffix: string): Logger
}

export interface LoggerOptions {
  scope: string
  /** Append-only JSON lines file */
  file?: string
  /** Print to the console (default: true) */
  console?: boolean
  /** Extra receiver for every entry */
  sink?: (entry: LogEntry) => void
}

function formatFields(fields?: LogFields): string {
  if (!fields) return ''
  const parts = Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`)
  return parts.length > 0 ? ` (${parts.join(', ')})` : ''
}

/** Log file shared by a logger and its children */
interface FileTarget {
  path: string
  enabled: boolean
}

export function createLogger(options: LoggerOptions): Logger {
  let target: FileTarget | undefined
  if (options.file) {
    target = { path: options.file, enabled: true }
    try {
      fs.mkdirSync(path.dirname(options.file), { recursive: true })
    } catch (error) {
      disableFile(target, error)
    }
  }
  return buildLogger(options, target)
}

/**
 * Stop writing to a log file that cannot be written. The console and sink
 * keep receiving entries.
 */
function disableFile(target: FileTarget, error: unknown): void {
  target.enabled = false
  console.error(`Log file ${target.path} disabled: ${errorMessage(error)}`)
}

function buildLogger(options: LoggerOptions, target: FileTarget | undefined): Logger {
  const { scope, sink } = options
  const toConsole = options.console ?? true

  function write(level: LogLevel, message: string, fields?: LogFields): void {
    const entry: LogEntry = {
      time: new Date().toISOString(),
      level,
      scope,
      message,
      ...(fields ? { fields } : {})
    }

    if (toConsole) {
      const line = `[${scope}] ${message}${formatFields(fields)}`
      if (level === 'error') console.error(line)
      else if (level === 'warn') console.warn(line)
      else console.log(line)
    }

    if (target?.enabled) {
      try {
        fs.appendFileSync(target.path, JSON.stringify(entry) + '\n', 'utf8')
      } catch (error) {
        disableFile(target, error)
      }
    }

    sink?.(entry)
  }

  return {
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
    child: (suffix) => buildLogger({ ...options, scope: `${scope}:${suffix}` }, target)
  }
}

/**
 * Logger that only keeps entries in memory
 */
export function createMemoryLogger(scope = 'test'): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = []
  const logger = createLogger({ scope, console: false, sink: entry => entries.push(entry) })
  return Object.assign(logger, { entries })
}
