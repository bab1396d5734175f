/**
 * Structured logging utility
 *
 * Console-backed. `DEBUG` enables debug output, `LOG_LEVEL` raises the floor.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, error?: unknown): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function minimumLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (configured === "debug" || configured === "info" || configured === "warn" || configured === "error") {
    return configured;
  }
  return process.env.DEBUG ? "debug" : "info";
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel()];
}

function formatMeta(meta?: Record<string, unknown>): string {
  return meta ? JSON.stringify(meta) : "";
}

function createLogger(prefix: string): Logger {
  const tag = (level: string, msg: string) => `[${level}]${prefix} ${msg}`;

  return {
    debug: (msg, meta) => {
      if (enabled("debug")) {
        console.log(tag("DEBUG", msg), formatMeta(meta));
      }
    },

    info: (msg, meta) => {
      if (enabled("info")) {
        console.log(tag("INFO", msg), formatMeta(meta));
      }
    },

    warn: (msg, meta) => {
      if (enabled("warn")) {
        console.warn(tag("WARN", msg), formatMeta(meta));
      }
    },

    error: (msg, error) => {
      console.error(tag("ERROR", msg), error ?? "");
    },

    child: (scope) => createLogger(`${prefix} [${scope}]`),
  };
}

export const logger: Logger = createLogger("");
