/**
 * Law Definition Types for @kindred/fp
 *
 * Re-exports the law types of @kindred/testing and adds the equality used
 * when comparing F-wrapped values.
 *
 * @module
 */

export type { Law, LawSet } from "@kindred/testing";

/**
 * Equality for law checks. Async structures such as OptionAsync can only be
 * compared once settled, so `eqv` may answer with a promise. Every `Eq` is a
 * `LawEq`.
 */
export interface LawEq<T> {
  readonly eqv: (x: T, y: T) => boolean | Promise<boolean>;
}
