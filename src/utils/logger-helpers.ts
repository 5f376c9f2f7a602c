/**
 * Logger Performance Helpers
 *
 * Lazy evaluation of log context objects: only build context objects when
 * the log level is actually enabled. Hot paths (per-event streaming, per
 * acquire) use these for debug output.
 */

import type { Logger } from 'pino';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

/**
 * Lazy log helper that only evaluates context when log level is enabled
 *
 * @param logger - Pino logger instance (can be undefined)
 * @param level - Log level (trace, debug, info, warn, error, fatal)
 * @param contextBuilder - Function that builds the context object (only called if logging)
 * @param message - Log message string
 *
 * @example
 * // Context only created if debug is enabled
 * lazyLog(logger, 'debug', () => ({ sessionId, stats: pool.stats() }), 'Session acquired');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger) {
    return;
  }

  if (!logger.isLevelEnabled(level)) {
    return;
  }

  const context = contextBuilder();
  logger[level](context, message);
}
