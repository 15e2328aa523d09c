/**
 * Process logger for the CLI and any host that wants console output.
 *
 * Messages are prefixed with the calling `file:line` and filtered by the
 * `LAB_LINKS_LOG_LEVEL` environment variable (default `info`).
 */

import type { LogLevel } from './loggerUtils';
import { LOG_LEVELS, createLogger, formatMessage, getCallerFileLine, isLogLevel } from './loggerUtils';

export const LOG_LEVEL_ENV = 'LAB_LINKS_LOG_LEVEL';

let threshold: LogLevel = resolveThreshold(process.env[LOG_LEVEL_ENV]);

function resolveThreshold(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
}

/**
 * Overrides the level read from the environment at load time.
 */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

const consoleByLevel: Record<LogLevel, (text: string) => void> = {
  debug: (text) => console.debug(text),
  info: (text) => console.info(text),
  warn: (text) => console.warn(text),
  error: (text) => console.error(text),
};

function logMessage(level: LogLevel, message: unknown): void {
  if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(threshold)) return;

  const formatted = formatMessage(message);
  const fileLine = getCallerFileLine();
  consoleByLevel[level](`${fileLine} - ${formatted}`);
}

/**
 * Logger with convenience methods for all supported log levels.
 */
export const log = createLogger(logMessage);
