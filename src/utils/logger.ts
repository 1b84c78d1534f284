/**
 * Logger helpers
 *
 * pino loggers bound to a component name, plus lazy context evaluation for
 * hot paths such as per-test filtering.
 */

import pino, { type DestinationStream, type Logger } from 'pino';
import { LOGGING } from '../config/defaults.js';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

/**
 * Create a logger for one component.
 *
 * The level comes from `SUITE_PLANNER_LOG_LEVEL` when set, then from
 * `level`, then defaults to `info`. Lines go to `destination`, or to
 * stderr so they never mix with command output on stdout.
 *
 * @example
 * const logger = createLogger('suite-run');
 * logger.info({ suite: 'openshift/build' }, 'Dispatching suite');
 */
export function createLogger(
  component: string,
  level?: string,
  destination?: DestinationStream
): Logger {
  return pino(
    {
      name: 'suite-planner',
      level: process.env[LOGGING.LEVEL_ENV] ?? level ?? LOGGING.DEFAULT_LEVEL,
      base: { component },
    },
    destination ?? pino.destination(2)
  );
}

/**
 * Lazy log helper that only evaluates context when log level is enabled
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ test: name, suite }), 'Test excluded');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
