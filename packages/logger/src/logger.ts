import { pino, type Bindings, type LevelWithSilent, type Logger as PinoLogger } from 'pino'

/**
 * Log levels:
 * - fatal (60): Process cannot continue
 * - error (50): Terminal request failures
 * - warn (40): Retries and degraded behavior
 * - info (30): General informational messages (default)
 * - debug (20): Per-attempt details and request/response dumps
 * - trace (10): Very detailed trace messages
 */

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

function resolveLevel(value: string | undefined): LevelWithSilent {
  const level = LOG_LEVELS.find(candidate => candidate === value?.toLowerCase())
  return level ?? 'info'
}

// Pretty output is for humans at a terminal; tests and LOG_PRETTY=false get JSON lines
const usePretty = process.env.LOG_PRETTY !== 'false' && process.env.NODE_ENV !== 'test'

const baseLogger = pino({
  level: resolveLevel(process.env.LOG_LEVEL),
  ...(usePretty
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname',
            messageFormat: '{if context}[{context}] {end}{msg}',
            customColors: 'fatal:bgRed,error:red,warn:yellow,info:cyan,debug:green,trace:gray'
          }
        }
      }
    : {})
})

type LogMethod = (msgOrObj: unknown, ...args: unknown[]) => void

type Logger = {
  fatal: LogMethod
  error: LogMethod
  warn: LogMethod
  info: LogMethod
  debug: LogMethod
  trace: LogMethod
  child: (bindings: Bindings) => Logger
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.message
  }

  if (typeof arg === 'object' && arg !== null) {
    return JSON.stringify(arg, null, 2)
  }

  return String(arg)
}

/**
 * Renders the loose `(message, ...args)` call style into a single line.
 * Objects become indented JSON and errors collapse to their message.
 */
export function formatLogMessage(msgOrObj: unknown, args: unknown[]): string {
  return [msgOrObj, ...args].map(formatArg).join(' ')
}

/**
 * Wrapper to make logger more flexible with arguments
 */
const createLoggerWrapper = (logger: PinoLogger): Logger => {
  const wrap = (level: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace'): LogMethod => {
    return (msgOrObj, ...args) => {
      if (!logger.isLevelEnabled(level)) {
        return
      }

      logger[level](formatLogMessage(msgOrObj, args))
    }
  }

  return {
    fatal: wrap('fatal'),
    error: wrap('error'),
    warn: wrap('warn'),
    info: wrap('info'),
    debug: wrap('debug'),
    trace: wrap('trace'),
    child: bindings => createLoggerWrapper(logger.child(bindings))
  }
}

/**
 * Logger instance for the application
 *
 * Usage:
 * ```typescript
 * import { log } from '@rest-engine/logger';
 *
 * log.info('Executor ready');
 * log.debug('Attempt details:', { attempt: 2 });
 * log.error('Request failed:', error);
 * ```
 *
 * Set log level via environment variable:
 * ```bash
 * LOG_LEVEL=debug npm test
 * ```
 */
export const log = createLoggerWrapper(baseLogger)

/**
 * Create a child logger with a specific context
 *
 * @example
 * ```typescript
 * const executorLog = createLogger('RequestExecutor');
 * executorLog.warn('Retrying request');
 * ```
 */
export function createLogger(context: string): Logger {
  return createLoggerWrapper(baseLogger.child({ context }))
}

/**
 * Set the log level dynamically
 */
export function setLogLevel(level: LevelWithSilent): void {
  baseLogger.level = level
}

export function getLogLevel(): string {
  return baseLogger.level
}

export type { Logger, LogMethod }
