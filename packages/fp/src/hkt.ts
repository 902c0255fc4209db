/**
 * Higher-Kinded Types for @kindred/fp
 *
 * TypeScript has no type constructors as parameters, so a type constructor
 * is modelled as an interface (a "type function") whose `_` member mentions
 * `this["__kind__"]`. Applying it intersects the interface with a concrete
 * `__kind__` and reads `_` back:
 *
 * ```typescript
 * interface OptionF extends TypeFunction {
 *   readonly __kind__: unknown;
 *   readonly _: Option<this["__kind__"]>;
 * }
 *
 * type X = Kind<OptionF, number>; // → number | null
 * ```
 *
 * Typeclasses are then written once over `F extends TypeFunction`:
 *
 * ```typescript
 * interface Functor<F extends TypeFunction> {
 *   map<A, B>(fa: $<F, A>, f: (a: A) => B): $<F, B>;
 * }
 * ```
 *
 * The encoding exists only at the type level. At runtime an instance is a
 * plain dictionary object.
 *
 * ## Multi-arity type constructors
 *
 * For types with multiple parameters (Either<E, A>), all but the rightmost
 * parameter are fixed:
 *
 * ```typescript
 * interface EitherF<E> extends TypeFunction { _: Either<E, this["__kind__"]> }
 * // Kind<EitherF<string>, number> → Either<string, number>
 * ```
 */

import type { Option } from "./data/option.js";
import type { Either } from "./data/either.js";
import type { Seq } from "./data/seq.js";
import type { OptionAsync } from "./async/option-async.js";

export type { Option, Either, Seq, OptionAsync };

// ============================================================================
// Core Encoding
// ============================================================================

/**
 * A type-level function from one type to another.
 */
export interface TypeFunction {
  readonly __kind__: unknown;
  readonly _: unknown;
}

/**
 * Apply the type function `F` to `A`.
 */
export type Kind<F extends TypeFunction, A> = (F & { readonly __kind__: A })["_"];

/**
 * Short alias for {@link Kind}.
 */
export type $<F extends TypeFunction, A> = Kind<F, A>;

// ============================================================================
// Type-Level Functions for Built-in Types
// ============================================================================

/**
 * Type-level function for `Array<A>`.
 *
 * @example
 * ```typescript
 * type NumberArray = Kind<ArrayF, number>; // → Array<number>
 * ```
 */
export interface ArrayF extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: Array<this["__kind__"]>;
}

/**
 * Type-level function for `Promise<A>`, the task type.
 */
export interface PromiseF extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: Promise<this["__kind__"]>;
}

// ============================================================================
// Type-Level Functions for @kindred/fp Data Types
// ============================================================================

/**
 * Type-level function for `Option<A>`.
 *
 * @example
 * ```typescript
 * type MaybeNumber = Kind<OptionF, number>; // → Option<number>
 * ```
 */
export interface OptionF extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: Option<this["__kind__"]>;
}

/**
 * Type-level function for `Either<E, A>` with E fixed.
 */
export interface EitherF<E> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: Either<E, this["__kind__"]>;
}

export interface SeqF extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: Seq<this["__kind__"]>;
}

export interface OptionAsyncF extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: OptionAsync<this["__kind__"]>;
}

// ============================================================================
// Identity
// ============================================================================

/**
 * The identity type: `Id<A>` is `A`.
 */
export type Id<A> = A;

/**
 * Type-level identity function. `Kind<IdF, A>` is `A`, which lets any
 * `Traverse` be run without an effect.
 */
export interface IdF extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: this["__kind__"];
}
