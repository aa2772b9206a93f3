/**
 * Structured logger for power-control.
 *
 * Uses Pino for JSON logging; LOG_FORMAT=pretty switches to pino-pretty for terminals.
 */

import pino from 'pino';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LEVEL_ALIASES: Record<string, LogLevel> = {
  trace: 'trace',
  debug: 'debug',
  info: 'info',
  warn: 'warn',
  warning: 'warn',
  error: 'error',
  fatal: 'fatal',
  critical: 'fatal',
};

/**
 * Normalize a level name (case-insensitive, accepts `warning` and `critical`).
 *
 * @returns The pino level, or undefined for an unknown name
 */
export function normalizeLogLevel(level: string | undefined): LogLevel | undefined {
  if (!level) {
    return undefined;
  }
  return LEVEL_ALIASES[level.trim().toLowerCase()];
}

let rootLogger: pino.Logger | undefined;

/**
 * Shared root logger, built on first use. LOG_FORMAT is read once so every
 * module writes to the same destination (one pino-pretty transport in pretty mode).
 */
function getRootLogger(): pino.Logger {
  if (rootLogger) {
    return rootLogger;
  }

  if (process.env.LOG_FORMAT?.trim().toLowerCase() === 'pretty') {
    // pino-pretty labels numeric levels itself
    rootLogger = pino({
      level: 'trace',
      transport: {
        target: 'pino-pretty',
        options: { colorize: false, translateTime: 'SYS:standard' },
      },
    });
  } else {
    rootLogger = pino({
      level: 'trace',
      formatters: {
        level: (label) => ({ level: label.toUpperCase() }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    });
  }

  return rootLogger;
}

/**
 * Create a named Pino logger.
 *
 * Loggers are children of one root logger. The level comes from `level`, then
 * LOG_LEVEL, then 'info'.
 *
 * @param name - Logger name
 * @param level - Optional log level override
 * @returns Configured Pino logger
 */
export function setupLogger(name: string = 'power-control', level?: string): pino.Logger {
  const logger = getRootLogger().child({ name });
  logger.level = normalizeLogLevel(level) ?? normalizeLogLevel(process.env.LOG_LEVEL) ?? 'info';
  return logger;
}
