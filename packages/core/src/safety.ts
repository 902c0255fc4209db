/**
 * Runtime Safety Primitives
 *
 * - `invariant(condition, message)`: runtime assertion
 * - `unreachable(value?)`: mark impossible code paths
 * - `debugOnly(fn)`: code that only runs when `debug` is configured
 *
 * @example
 * ```typescript
 * function replicate<A>(n: number, a: A): A[] {
 *   invariant(n >= 0, "replicate: n must be non-negative");
 *   return Array.from({ length: n }, () => a);
 * }
 *
 * type Shape = { kind: "circle" } | { kind: "square" };
 * function sides(shape: Shape): number {
 *   switch (shape.kind) {
 *     case "circle": return 0;
 *     case "square": return 4;
 *     default: return unreachable(shape);
 *   }
 * }
 * ```
 */

import { config } from "./config.js";
import { InvariantError, UnreachableError } from "./errors.js";

/**
 * Runtime invariant check.
 *
 * @throws InvariantError if condition is false
 */
export function invariant(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new InvariantError(message ?? "Invariant violation");
  }
}

/**
 * Mark a code path as unreachable. Passing the narrowed value makes the
 * compiler reject the call once a union grows a new member.
 */
export function unreachable(_value?: never): never {
  throw new UnreachableError();
}

/**
 * Run `fn` only when debug mode is on.
 */
export function debugOnly(fn: () => void): void {
  if (config.getBoolean("debug", false)) {
    fn();
  }
}
