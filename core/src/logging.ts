/**
 * @file src/logging.ts
 * @description
 * Console logging for the color engine.
 * Each component logs under a scope; scopes can be switched off one by one
 * and everything below the configured level is dropped.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface Logger {
  debug: (message: string, ...args: unknown[]) => void
  info: (message: string, ...args: unknown[]) => void
  warn: (message: string, ...args: unknown[]) => void
  error: (message: string, ...args: unknown[]) => void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
}

// Scope overrides, `default` applies to every scope not listed
let loggingConfig: { level: LogLevel, scopes: { [scope: string]: boolean } } = {
  level: 'info',
  scopes: { default: true }
}

export function configureLogging(config: { level?: LogLevel, scopes?: { [scope: string]: boolean } }): void {
  loggingConfig = {
    level: config.level ?? loggingConfig.level,
    scopes: { ...loggingConfig.scopes, ...config.scopes }
  }
}

const isEnabled = (scope: string, level: LogLevel): boolean => {
  const scopeEnabled = loggingConfig.scopes[scope] !== undefined
    ? loggingConfig.scopes[scope]
    : loggingConfig.scopes.default
  return scopeEnabled && LEVEL_ORDER[level] >= LEVEL_ORDER[loggingConfig.level]
}

const safeFormat = (val: unknown): unknown => {
  if (typeof val === 'object' && val !== null && !(val instanceof Error)) {
    try {
      return JSON.stringify(val)
    } catch {
      return '[unserializable object]'
    }
  }
  return val
}

export function createLogger(scope: string): Logger {
  const emit = (level: LogLevel, sink: (...data: unknown[]) => void) =>
    (message: string, ...args: unknown[]): void => {
      if (!isEnabled(scope, level)) return
      sink(`[${new Date().toISOString()}] [${level}] [${scope}]`, message, ...args.map(safeFormat))
    }

  return {
    debug: emit('debug', console.debug),
    info: emit('info', console.log),
    warn: emit('warn', console.warn),
    error: emit('error', console.error)
  }
}

/** A logger that drops everything */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
}
