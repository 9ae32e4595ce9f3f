import pino from 'pino'

/**
 * Log levels:
 * - fatal (60): Application crash
 * - error (50): Error messages
 * - warn (40): Warning messages
 * - info (30): General informational messages (default)
 * - debug (20): Per-prefix exploration traces
 * - trace (10): Raw query parameters
 */

type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace'

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace']

function isLevel(value: string): value is pino.LevelWithSilent {
  return value === 'silent' || LOG_LEVELS.some(level => level === value)
}

function resolveLogLevel(value: string | undefined): pino.LevelWithSilent {
  const normalized = value?.trim().toLowerCase()
  return normalized && isLevel(normalized) ? normalized : 'info'
}

// Get log level from environment variable or default to 'info'
const logLevel = resolveLogLevel(process.env.LOG_LEVEL)

// Create the base logger
const baseLogger = pino({
  level: logLevel,
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:HH:MM:ss',
      ignore: 'pid,hostname,context',
      messageFormat: '{if context}[{context}] {end}{msg}',
      customColors: 'fatal:bgRed,error:red,warn:yellow,info:cyan,debug:green,trace:gray',
      customLevels: 'fatal:60,error:50,warn:40,info:30,debug:20,trace:10'
    }
  }
})

function formatArgument(value: unknown): string {
  if (value instanceof Error) {
    return value.message
  }

  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value, null, 2)
  }

  return String(value)
}

/**
 * Wrapper to make logger more flexible with arguments
 */
const createLoggerWrapper = (logger: pino.Logger) => {
  const wrap = (level: LogLevel) => {
    return (msgOrObj: unknown, ...args: unknown[]) => {
      // Message first, then every extra argument rendered on the same line
      const message = [msgOrObj, ...args].map(formatArgument).join(' ')
      logger[level](message)
    }
  }

  return {
    fatal: wrap('fatal'),
    error: wrap('error'),
    warn: wrap('warn'),
    info: wrap('info'),
    debug: wrap('debug'),
    trace: wrap('trace'),
    child: (bindings: pino.Bindings): Logger => createLoggerWrapper(logger.child(bindings))
  }
}

type Logger = {
  fatal: (msgOrObj: unknown, ...args: unknown[]) => void
  error: (msgOrObj: unknown, ...args: unknown[]) => void
  warn: (msgOrObj: unknown, ...args: unknown[]) => void
  info: (msgOrObj: unknown, ...args: unknown[]) => void
  debug: (msgOrObj: unknown, ...args: unknown[]) => void
  trace: (msgOrObj: unknown, ...args: unknown[]) => void
  child: (bindings: pino.Bindings) => Logger
}

/**
 * Logger instance for the application
 *
 * Usage:
 * ```typescript
 * import { log } from '@workspace/logger';
 *
 * log.info('Starting harvest...');
 * log.debug('Snapshot loaded:', { streets: 120 });
 * log.warn('Query failed for prefix', prefix);
 * log.error('Save failed:', error);
 * ```
 *
 * Set log level via environment variable:
 * ```bash
 * LOG_LEVEL=debug npm run harvest
 * LOG_LEVEL=trace npm run harvest -- --dataDir=./tmp/stuttgart
 * ```
 */
export const log: Logger = createLoggerWrapper(baseLogger)

/**
 * Create a child logger with a specific context
 *
 * @param context - Context name shown in front of every message
 *
 * @example
 * ```typescript
 * const explorerLog = createLogger('Explorer');
 * explorerLog.debug('Exploring prefix: Ab');
 * ```
 */
export function createLogger(context: string): Logger {
  return createLoggerWrapper(baseLogger.child({ context }))
}

/**
 * Set the log level dynamically
 *
 * @example
 * ```typescript
 * setLogLevel('debug');
 * ```
 */
export function setLogLevel(level: pino.LevelWithSilent): void {
  baseLogger.level = level
}

export type { Logger, LogLevel }
