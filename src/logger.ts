export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

type LogContext = Record<string, unknown>

type LoggerFn = (message: string, context?: LogContext) => void

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

let threshold: LogLevel = 'info'

export function setLogLevel(level: LogLevel): void {
  threshold = level
}

export function getLogLevel(): LogLevel {
  return threshold
}

const emit = (
  level: Exclude<LogLevel, 'silent'>,
  message: string,
  context?: LogContext,
): void => {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return
  // stdout carries command output (`validate` prints the document), so every
  // log line goes to stderr.
  const logger = level === 'warn' ? console.warn : console.error
  if (context && Object.keys(context).length > 0) {
    logger(message, context)
    return
  }
  logger(message)
}

export const logDebug: LoggerFn = (message, context) =>
  emit('debug', message, context)
export const logInfo: LoggerFn = (message, context) =>
  emit('info', message, context)
export const logWarning: LoggerFn = (message, context) =>
  emit('warn', message, context)
export const logError: LoggerFn = (message, context) =>
  emit('error', message, context)
