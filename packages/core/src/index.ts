/**
 * @kindred/core
 *
 * Ambient stack shared by the kindred packages: configuration, scoped
 * logging, the error hierarchy and runtime safety helpers.
 *
 * @packageDocumentation
 */

export { config, defineConfig } from "./config.js";
export type { KindredConfig, ShowConfig, LawsConfig } from "./config.js";

export { createLogger, setLogSink, resetLogSink } from "./logger.js";
export type { Logger, LogLevel, LogSink } from "./logger.js";

export { KindredError, InvariantError, UnreachableError, isKindredError } from "./errors.js";

export { invariant, unreachable, debugOnly } from "./safety.js";
