/**
 * SemigroupK, MonoidK, and Alternative Typeclasses
 *
 * These typeclasses provide monoidal operations at the type constructor level.
 * While Semigroup/Monoid work on types, SemigroupK/MonoidK work on type constructors.
 *
 * Laws:
 *   - Associativity: combineK(combineK(x, y), z) === combineK(x, combineK(y, z))
 *   - Left identity: combineK(emptyK, x) === x
 *   - Right identity: combineK(x, emptyK) === x
 */

import type { Applicative } from "./applicative.js";
import type { $, TypeFunction } from "../hkt.js";

// ============================================================================
// SemigroupK
// ============================================================================

/**
 * SemigroupK typeclass - Semigroup at the type constructor level
 */
export interface SemigroupK<F extends TypeFunction> {
  readonly combineK: <A>(x: $<F, A>, y: $<F, A>) => $<F, A>;
}

// ============================================================================
// MonoidK
// ============================================================================

/**
 * MonoidK typeclass - Monoid at the type constructor level
 */
export interface MonoidK<F extends TypeFunction> extends SemigroupK<F> {
  readonly emptyK: <A>() => $<F, A>;
}

// ============================================================================
// Alternative
// ============================================================================

/**
 * Alternative typeclass - MonoidK with Applicative
 */
export interface Alternative<F extends TypeFunction> extends Applicative<F>, MonoidK<F> {}

// ============================================================================
// Derived Operations
// ============================================================================

/**
 * Combine one or more values left to right
 */
export function combineAllK<F extends TypeFunction>(
  F: SemigroupK<F>,
): <A>(head: $<F, A>, ...tail: $<F, A>[]) => $<F, A> {
  return <A>(head: $<F, A>, ...tail: $<F, A>[]) =>
    tail.reduce<$<F, A>>((acc, fa) => F.combineK<A>(acc, fa), head);
}

/**
 * Try first, if "empty" use second
 */
export function orElseK<F extends TypeFunction>(
  F: SemigroupK<F>,
): <A>(fa: $<F, A>, fb: () => $<F, A>) => $<F, A> {
  return <A>(fa: $<F, A>, fb: () => $<F, A>) => F.combineK<A>(fa, fb());
}

/**
 * Combine all values, using emptyK for an empty array
 */
export function combineAllOptionK<F extends TypeFunction>(
  F: MonoidK<F>,
): <A>(fas: readonly $<F, A>[]) => $<F, A> {
  return <A>(fas: readonly $<F, A>[]): $<F, A> =>
    fas.reduce<$<F, A>>((acc, fa) => F.combineK<A>(acc, fa), F.emptyK<A>());
}

// ============================================================================
// Instance Creators
// ============================================================================

export function makeMonoidK<F extends TypeFunction>(
  combineK: <A>(x: $<F, A>, y: $<F, A>) => $<F, A>,
  emptyK: <A>() => $<F, A>,
): MonoidK<F> {
  return { combineK, emptyK };
}

export function makeAlternative<F extends TypeFunction>(
  A: Applicative<F>,
  M: MonoidK<F>,
): Alternative<F> {
  return { ...A, ...M };
}
