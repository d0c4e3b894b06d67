/**
 * Scoped stderr logger for the tuna pipeline.
 *
 * Everything goes to stderr through `console.error` so stdout stays free
 * for MCP traffic and CLI output. Loggers are plain objects handed to each
 * collaborator; there is no process-wide logging configuration.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  readonly scope: string;
  readonly level: LogLevel;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  /** Same level, nested scope: `[parent:child]`. */
  child(scope: string): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  const threshold = LEVEL_RANK[level];

  const emit = (lvl: Exclude<LogLevel, "silent">, message: string, details: unknown[]): void => {
    if (LEVEL_RANK[lvl] < threshold) return;
    const prefix = lvl === "info" || lvl === "debug" ? `[${scope}]` : `[${scope}] ${lvl.toUpperCase()}:`;
    console.error(`${prefix} ${message}`, ...details);
  };

  return {
    scope,
    level,
    debug: (message, ...details) => emit("debug", message, details),
    info: (message, ...details) => emit("info", message, details),
    warn: (message, ...details) => emit("warn", message, details),
    error: (message, ...details) => emit("error", message, details),
    child: (child) => createLogger(`${scope}:${child}`, level),
  };
}

/** Logger that drops everything; handy as a default in tests. */
export const silentLogger: Logger = createLogger("silent", "silent");
