/**
 * Root logger construction.
 *
 * Components never build their own root logger; they accept an optional
 * pino `Logger` and derive children from it so every record carries the
 * component name. Log level can be controlled via AGENT_RELAY_LOG_LEVEL.
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';
import { LOGGING } from '../config/defaults.js';

export interface LoggerOptions {
  level?: LevelWithSilent;
  name?: string;
}

const LEVELS: ReadonlySet<string> = new Set([
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
]);

function isLevel(value: string | undefined): value is LevelWithSilent {
  return value !== undefined && LEVELS.has(value);
}

/**
 * Create the root pino logger
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug' });
 * const poolLogger = componentLogger(logger, 'SessionPool');
 * poolLogger?.info({ sessionId }, 'Session released');
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const envLevel = process.env.AGENT_RELAY_LOG_LEVEL?.toLowerCase();

  return pino({
    name: options.name ?? LOGGING.NAME,
    level: options.level ?? (isLevel(envLevel) ? envLevel : LOGGING.LEVEL),
  });
}

/**
 * Child logger tagged with a component name
 */
export function componentLogger(logger: Logger | undefined, component: string): Logger | undefined {
  return logger?.child({ component });
}
