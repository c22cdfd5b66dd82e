/**
 * Defines the available log levels.
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

let currentLogLevel: LogLevel = LogLevel.INFO;

/**
 * Sets the current logging level for the process.
 */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

/**
 * Maps a level name such as "debug" or "WARN" to a {@link LogLevel}.
 * Unknown or missing names yield `fallback`.
 */
export function parseLogLevel(
  value: string | undefined,
  fallback: LogLevel = LogLevel.INFO,
): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case "error":
      return LogLevel.ERROR;
    case "warn":
    case "warning":
      return LogLevel.WARN;
    case "info":
      return LogLevel.INFO;
    case "debug":
      return LogLevel.DEBUG;
    default:
      return fallback;
  }
}

/**
 * Leveled console logger shared by every component.
 * Everything goes to stderr so that CLI output on stdout stays machine-readable.
 */
export const logger = {
  debug: (message: string) => {
    if (currentLogLevel >= LogLevel.DEBUG) {
      console.debug(message);
    }
  },
  info: (message: string) => {
    if (currentLogLevel >= LogLevel.INFO) {
      console.error(message);
    }
  },
  warn: (message: string) => {
    if (currentLogLevel >= LogLevel.WARN) {
      console.warn(message);
    }
  },
  error: (message: string) => {
    if (currentLogLevel >= LogLevel.ERROR) {
      console.error(message);
    }
  },
};
