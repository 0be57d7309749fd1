/**
 * Logger Utility
 * Provides structured logging with pino
 */

import pino from 'pino';

/**
 * Log level type
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Get log level from environment variable
 */
function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return 'info';
}

/**
 * Check if running in development mode
 */
function isDevelopment(): boolean {
  return process.env.NODE_ENV === 'development';
}

/**
 * Create pino transport options for pretty printing in development
 * Logs go to stderr; stdout carries command output.
 */
function getTransport(): pino.TransportSingleOptions | undefined {
  if (isDevelopment()) {
    return {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: 2,
      },
    };
  }
  return undefined;
}

function createRootLogger(): pino.Logger {
  const transport = getTransport();
  if (transport) {
    return pino({ level: getLogLevel(), transport });
  }
  return pino({ level: getLogLevel() }, pino.destination(2));
}

/**
 * Default logger instance
 * Uses pino-pretty in development, JSON in production
 */
export const logger = createRootLogger();

const componentLoggers: pino.Logger[] = [];

/**
 * Create a child logger with a specific component name
 * @param component - Component name for log context
 */
export function createLogger(component: string): pino.Logger {
  const child = logger.child({ component });
  componentLoggers.push(child);
  return child;
}

/**
 * Apply a log level to the root logger and every component logger
 */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
  for (const child of componentLoggers) {
    child.level = level;
  }
}

/**
 * Pre-configured loggers for common components
 */
export const calendarLogger = createLogger('calendar');
export const icsLogger = createLogger('ics');
export const syncLogger = createLogger('sync');
export const transportLogger = createLogger('transport');
export const configLogger = createLogger('config');
export const cliLogger = createLogger('cli');
