// Perplexity Sectioner - Logging
// Console-backed, leveled logger shared by the sectioner, materializer and CLIs.

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const ts = () => new Date().toISOString();

/**
 * Creates a logger that prefixes every line with `[LEVEL] [timestamp] [component]`.
 * Messages below `minLevel` are dropped.
 */
export function createConsoleLogger(component: string, minLevel: LogLevel = "info"): Logger {
  const threshold = LOG_LEVELS.indexOf(minLevel);
  const enabled = (level: LogLevel) => LOG_LEVELS.indexOf(level) >= threshold;
  const prefix = (level: LogLevel) => `[${level.toUpperCase()}] [${ts()}] [${component}]`;

  return {
    debug: (msg, ...args) => {
      if (enabled("debug")) console.log(`${prefix("debug")} ${msg}`, ...args);
    },
    info: (msg, ...args) => {
      if (enabled("info")) console.log(`${prefix("info")} ${msg}`, ...args);
    },
    warn: (msg, ...args) => {
      if (enabled("warn")) console.warn(`${prefix("warn")} ${msg}`, ...args);
    },
    error: (msg, ...args) => {
      if (enabled("error")) console.error(`${prefix("error")} ${msg}`, ...args);
    },
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
