/**
 * Error Types
 *
 * Every error raised by kindred packages derives from `KindredError`, which
 * carries a stable machine-readable `code` next to the human message.
 */

/**
 * Base class for all kindred errors.
 */
export class KindredError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = "KindredError";
  }
}

/**
 * Thrown when an `invariant()` check fails.
 */
export class InvariantError extends KindredError {
  constructor(message: string) {
    super(message, "INVARIANT");
    this.name = "InvariantError";
  }
}

/**
 * Thrown when code marked `unreachable()` runs.
 */
export class UnreachableError extends KindredError {
  constructor(message = "Unreachable code reached") {
    super(message, "UNREACHABLE");
    this.name = "UnreachableError";
  }
}

/**
 * Narrow an unknown thrown value to a KindredError with the given code.
 */
export function isKindredError(e: unknown, code?: string): e is KindredError {
  return e instanceof KindredError && (code === undefined || e.code === code);
}
