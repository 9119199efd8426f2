import type { LogFormat, LogLevel } from "./schema";

export interface LoggerConfig {
  level: LogLevel;
  /** "pretty" for a readable line in development, "json" otherwise */
  format?: LogFormat;
  /** Static context merged into every entry */
  bindings?: Record<string, unknown>;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

const logLevels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const shouldLog = (level: LogLevel, currentLevel: LogLevel): boolean =>
  logLevels[level] >= logLevels[currentLevel];

const createLogEntry = (
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
  error?: Error,
): LogEntry => ({
  timestamp: new Date().toISOString(),
  level,
  message,
  ...(context && Object.keys(context).length > 0 && { context }),
  ...(error && {
    error: {
      name: error.name,
      message: error.message,
      ...(error.stack && { stack: error.stack }),
    },
  }),
});

const formatLog = (entry: LogEntry, format: LogFormat): string => {
  if (format === "pretty") {
    return `${entry.timestamp} [${entry.level.toUpperCase()}] ${entry.message}${
      entry.context ? ` ${JSON.stringify(entry.context)}` : ""
    }${entry.error ? ` ${entry.error.name}: ${entry.error.message}` : ""}`;
  }
  return JSON.stringify(entry);
};

export interface Logger {
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void;
  /** Returns a logger that adds `bindings` to every entry */
  child: (bindings: Record<string, unknown>) => Logger;
}

export const createLogger = (loggerConfig: LoggerConfig = { level: "info" }): Logger => {
  const { level, format = "json", bindings } = loggerConfig;

  const withBindings = (context?: Record<string, unknown>): Record<string, unknown> | undefined =>
    bindings ? { ...bindings, ...context } : context;

  return {
    debug: (message, context): void => {
      if (shouldLog("debug", level)) {
        console.log(formatLog(createLogEntry("debug", message, withBindings(context)), format));
      }
    },

    info: (message, context): void => {
      if (shouldLog("info", level)) {
        console.log(formatLog(createLogEntry("info", message, withBindings(context)), format));
      }
    },

    warn: (message, context): void => {
      if (shouldLog("warn", level)) {
        console.warn(formatLog(createLogEntry("warn", message, withBindings(context)), format));
      }
    },

    error: (message, error, context): void => {
      if (shouldLog("error", level)) {
        console.error(
          formatLog(createLogEntry("error", message, withBindings(context), error), format),
        );
      }
    },

    child: (childBindings) =>
      createLogger({ level, format, bindings: { ...bindings, ...childBindings } }),
  };
};

/**
 * Logger that discards everything; the default for components built without one.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};

/**
 * Converts a caught value into an Error for `logger.error`.
 */
export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));
