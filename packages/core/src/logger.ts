/**
 * Scoped Logging
 *
 * Thin prefixing layer over `console`. Each logger writes lines tagged with
 * `[kindred:<scope>]`; debug output is gated by the `debug` config flag.
 *
 * @example
 * ```typescript
 * const log = createLogger("laws");
 * log.debug("checking", lawName);   // only when config.debug is true
 * log.warn("skipped law", lawName); // → [kindred:laws] skipped law ...
 * ```
 */

import { config } from "./config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Destination for formatted log lines.
 */
export type LogSink = (level: LogLevel, message: string, ...details: unknown[]) => void;

export interface Logger {
  readonly scope: string;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const consoleSink: LogSink = (level, message, ...details) => {
  switch (level) {
    case "debug":
      console.debug(message, ...details);
      break;
    case "info":
      console.info(message, ...details);
      break;
    case "warn":
      console.warn(message, ...details);
      break;
    case "error":
      console.error(message, ...details);
      break;
  }
};

let sink: LogSink = consoleSink;

/**
 * Route all log output to `next` instead of the console.
 */
export function setLogSink(next: LogSink): void {
  sink = next;
}

export function resetLogSink(): void {
  sink = consoleSink;
}

export function createLogger(scope: string): Logger {
  const prefix = `[kindred:${scope}]`;
  const write = (level: LogLevel, message: string, details: unknown[]): void => {
    sink(level, `${prefix} ${message}`, ...details);
  };

  return {
    scope,
    debug: (message, ...details) => {
      if (config.getBoolean("debug", false)) write("debug", message, details);
    },
    info: (message, ...details) => write("info", message, details),
    warn: (message, ...details) => write("warn", message, details),
    error: (message, ...details) => write("error", message, details),
  };
}
