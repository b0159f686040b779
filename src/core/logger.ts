/**
 * Logging for comparison runs
 * @module core/logger
 */

import type { AlgorithmName } from '../types/trace.js'

export type LogContext = Record<string, unknown>

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Sink for comparison run events
 */
export interface Logger {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, context?: LogContext): void
}

function consoleWriter(level: LogLevel) {
  const tag = `[${level.toUpperCase()}]`
  return (message: string, context?: LogContext) => {
    const line = `${tag} ${message}`
    if (level === 'warn') console.warn(line, context ?? '')
    else if (level === 'error') console.error(line, context ?? '')
    // debug and info share stdout
    else console.log(line, context ?? '')
  }
}

/**
 * Console logger tagging each line with its level
 */
export const defaultLogger: Logger = {
  debug: consoleWriter('debug'),
  info: consoleWriter('info'),
  warn: consoleWriter('warn'),
  error: consoleWriter('error'),
}

/**
 * Creates a no-op logger for silent operation
 */
export function createSilentLogger(): Logger {
  const noop = () => {}
  return { debug: noop, info: noop, warn: noop, error: noop }
}

/**
 * Child logger for one matcher's run. Messages are tagged `[algorithm]` and
 * every context carries the algorithm name and the comparison run id.
 *
 * @example
 * ```typescript
 * const log = createMatcherLogger(logger, 'naive', runId)
 * log.debug('Run complete', { steps: 3 })
 * // logger.debug('[naive] Run complete', { algorithm: 'naive', runId, steps: 3 })
 * ```
 */
export function createMatcherLogger(
  base: Logger,
  algorithm: AlgorithmName,
  runId: string
): Logger {
  const scoped = (level: LogLevel) => (message: string, context?: LogContext) =>
    base[level](`[${algorithm}] ${message}`, {
      algorithm,
      runId,
      ...context,
    })

  return {
    debug: scoped('debug'),
    info: scoped('info'),
    warn: scoped('warn'),
    error: scoped('error'),
  }
}
