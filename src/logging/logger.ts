/**
 * Console logger for the netgen CLI.
 *
 * Each line carries the level and the calling `file:line`. Messages below the
 * configured threshold are dropped. The threshold starts from the
 * `NETGEN_LOG_LEVEL` environment variable and can be changed at run time
 * (the CLI applies `logLevel` from the configuration file).
 */

import {
  createLogger,
  formatMessage,
  getCallerFileLine,
  isLogLevel,
  levelEnabled,
  type LogLevel
} from "../shared/utilities/loggerUtils";

export const LOG_LEVEL_ENV = "NETGEN_LOG_LEVEL";

function initialLevel(): LogLevel {
  const fromEnv = process.env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

let threshold: LogLevel = initialLevel();

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

const consoleFns: Record<LogLevel, (text: string) => void> = {
  debug: (text) => console.debug(text),
  info: (text) => console.info(text),
  warn: (text) => console.warn(text),
  error: (text) => console.error(text)
};

/**
 * Core logging routine.
 *
 * @param level - Severity of the log message.
 * @param message - The message to log.
 */
function logMessage(level: LogLevel, message: unknown): void {
  if (!levelEnabled(level, threshold)) return;
  // skip logMessage and the level method
  const fileLine = getCallerFileLine(2);
  const text = `[${level}] ${fileLine} - ${formatMessage(message)}`;
  consoleFns[level](text);
}

/**
 * Logger with convenience methods for all supported log levels.
 */
export const log = createLogger(logMessage);
