import type { LogLevel } from '../config'

type Method = Exclude<LogLevel, 'silent'>

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
}

let threshold: LogLevel = 'info'

export const setLogLevel = (level: LogLevel): void => {
  threshold = level
}

const write = (level: Method, message: string, meta?: Record<string, unknown>): void => {
  if (RANK[level] < RANK[threshold]) return

  const line = `${new Date().toISOString()} ${level.toUpperCase()} ${message}`
  const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log

  if (meta) {
    sink(line, meta)
  } else {
    sink(line)
  }
}

export const logger = {
  debug: (message: string, meta?: Record<string, unknown>) => write('debug', message, meta),
  info: (message: string, meta?: Record<string, unknown>) => write('info', message, meta),
  warn: (message: string, meta?: Record<string, unknown>) => write('warn', message, meta),
  error: (message: string, meta?: Record<string, unknown>) => write('error', message, meta)
}

export default logger
