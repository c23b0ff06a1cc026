/**
 * Structured Logging Module
 *
 * Provides pino-based structured logging with scoped child loggers.
 * Supports JSON output for production and pretty-printing for development.
 * Heart-rate readings only ever go to the log stream, never to disk.
 */

import pino, { Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

let rootLogger: Logger | null = null;

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function envLevel(): LogLevel | undefined {
  const level = process.env.LOG_LEVEL;
  return isLogLevel(level) ? level : undefined;
}

function createRootLogger(config: LoggerConfig): Logger {
  const level = config.level ?? envLevel() ?? 'info';
  const pretty = config.pretty ?? process.env.NODE_ENV !== 'production';

  if (pretty) {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
          messageFormat: '[{module}] {msg}',
        },
      },
    });
  }
  return pino({ level });
}

/**
 * Initialize the root logger. Call once at startup.
 */
export function initLogger(config: LoggerConfig = {}): Logger {
  rootLogger = createRootLogger(config);
  return rootLogger;
}

/**
 * Get the root logger instance.
 * Auto-initializes if not already initialized.
 */
export function getRootLogger(): Logger {
  return rootLogger ?? initLogger();
}

/**
 * Get a scoped logger for a specific module.
 */
export function getLogger(module: string): Logger {
  return getRootLogger().child({ module });
}
