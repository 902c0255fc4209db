/**
 * Functor Typeclass
 *
 * A type class of types that can be mapped over.
 * Instances must satisfy the following laws:
 *   - Identity: fa.map(a => a) === fa
 *   - Composition: fa.map(f).map(g) === fa.map(a => g(f(a)))
 *
 * All derived operations accept the typeclass dictionary as the first
 * argument and return a function specialized to that instance.
 */

import type { $, TypeFunction } from "../hkt.js";

// ============================================================================
// Functor
// ============================================================================

export interface Functor<F extends TypeFunction> {
  readonly map: <A, B>(fa: $<F, A>, f: (a: A) => B) => $<F, B>;
}

// ============================================================================
// Derived Operations
// ============================================================================

/**
 * Replace all A values with a constant B value
 */
export function as<F extends TypeFunction>(F: Functor<F>): <A, B>(fa: $<F, A>, b: B) => $<F, B> {
  return <A, B>(fa: $<F, A>, b: B) => F.map<A, B>(fa, () => b);
}

/**
 * Replace all A values with void/undefined
 */
export function void_<F extends TypeFunction>(F: Functor<F>): <A>(fa: $<F, A>) => $<F, void> {
  return <A>(fa: $<F, A>) => F.map<A, void>(fa, () => undefined);
}

/**
 * Tuple the value with a constant on the left
 */
export function tupleLeft<F extends TypeFunction>(
  F: Functor<F>,
): <A, B>(fa: $<F, A>, b: B) => $<F, [B, A]> {
  return <A, B>(fa: $<F, A>, b: B) => F.map<A, [B, A]>(fa, (a) => [b, a]);
}

/**
 * Tuple the value with a constant on the right
 */
export function tupleRight<F extends TypeFunction>(
  F: Functor<F>,
): <A, B>(fa: $<F, A>, b: B) => $<F, [A, B]> {
  return <A, B>(fa: $<F, A>, b: B) => F.map<A, [A, B]>(fa, (a) => [a, b]);
}

/**
 * Lift a function to work on Functor values
 */
export function lift<F extends TypeFunction>(
  F: Functor<F>,
): <A, B>(f: (a: A) => B) => (fa: $<F, A>) => $<F, B> {
  return <A, B>(f: (a: A) => B) =>
    (fa: $<F, A>) =>
      F.map<A, B>(fa, f);
}

/**
 * Apply a function inside the functor to a value
 */
export function flap<F extends TypeFunction>(
  F: Functor<F>,
): <A, B>(a: A, fab: $<F, (a: A) => B>) => $<F, B> {
  return <A, B>(a: A, fab: $<F, (a: A) => B>) => F.map<(a: A) => B, B>(fab, (f) => f(a));
}

// ============================================================================
// Instance Creators
// ============================================================================

/**
 * Create a Functor instance from a map function
 */
export function makeFunctor<F extends TypeFunction>(
  map: <A, B>(fa: $<F, A>, f: (a: A) => B) => $<F, B>,
): Functor<F> {
  return { map };
}
