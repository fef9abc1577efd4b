/**
 * Logging
 *
 * One root pino logger named "benchdiff". Output goes to stderr so stdout
 * carries only the report. Modules ask for a child logger per call, so a
 * level change made by the CLI after startup reaches them.
 *
 * @module logging/logger
 */

import { pino } from 'pino';

type Logger = pino.Logger;

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

/**
 * Type guard for log level names
 */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Options for building the root logger
 */
export interface LoggerOptions {
  level?: LogLevel;
  /** Human-readable output through pino-pretty */
  pretty?: boolean;
  /** Custom sink, used by tests; ignored when pretty is set */
  destination?: pino.DestinationStream;
}

/**
 * Create a root logger. JSON lines on stderr unless a destination is given.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? DEFAULT_LOG_LEVEL;

  if (options.pretty) {
    return pino({
      name: 'benchdiff',
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: 2,
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino({ name: 'benchdiff', level }, options.destination ?? pino.destination(2));
}

let root: Logger = createLogger();

/**
 * Replace the root logger, e.g. once the configured level is known
 */
export function configureLogger(options: LoggerOptions = {}): Logger {
  root = createLogger(options);
  return root;
}

/**
 * Child logger tagged with a component name
 */
export function getLogger(component: string): Logger {
  return root.child({ component });
}

/**
 * Whether BENCHDIFF_LOG_PRETTY asks for pretty output
 */
export function prettyRequested(env: NodeJS.ProcessEnv): boolean {
  return env.BENCHDIFF_LOG_PRETTY === '1';
}
