/**
 * FlatMap and Monad Typeclasses
 *
 * FlatMap adds flatMap (bind) to Apply - sequencing dependent computations.
 * Monad combines FlatMap with Applicative.
 *
 * Laws:
 *   - Left identity: pure(a).flatMap(f) === f(a)
 *   - Right identity: m.flatMap(pure) === m
 *   - Associativity: m.flatMap(f).flatMap(g) === m.flatMap(a => f(a).flatMap(g))
 */

import type { Applicative, Apply } from "./applicative.js";
import type { $, TypeFunction } from "../hkt.js";

// ============================================================================
// FlatMap
// ============================================================================

/**
 * FlatMap typeclass - adds flatMap to Apply
 */
export interface FlatMap<F extends TypeFunction> extends Apply<F> {
  readonly flatMap: <A, B>(fa: $<F, A>, f: (a: A) => $<F, B>) => $<F, B>;
}

// ============================================================================
// Monad
// ============================================================================

/**
 * Monad typeclass - combines FlatMap with Applicative
 */
export interface Monad<F extends TypeFunction> extends FlatMap<F>, Applicative<F> {}

// ============================================================================
// Derived Operations from FlatMap
// ============================================================================

/**
 * Flatten a nested structure
 */
export function flatten<F extends TypeFunction>(
  F: FlatMap<F>,
): <A>(ffa: $<F, $<F, A>>) => $<F, A> {
  return <A>(ffa: $<F, $<F, A>>) => F.flatMap<$<F, A>, A>(ffa, (x) => x);
}

/**
 * Run a dependent effect and keep the original value
 */
export function flatTap<F extends TypeFunction>(
  F: FlatMap<F>,
): <A, B>(fa: $<F, A>, f: (a: A) => $<F, B>) => $<F, A> {
  return <A, B>(fa: $<F, A>, f: (a: A) => $<F, B>) =>
    F.flatMap<A, A>(fa, (a) => F.map<B, A>(f(a), () => a));
}

/**
 * Conditional flatMap - pick a branch from an effectful boolean
 */
export function ifM<F extends TypeFunction>(
  F: FlatMap<F>,
): <A>(fb: $<F, boolean>, ifTrue: () => $<F, A>, ifFalse: () => $<F, A>) => $<F, A> {
  return <A>(fb: $<F, boolean>, ifTrue: () => $<F, A>, ifFalse: () => $<F, A>) =>
    F.flatMap<boolean, A>(fb, (b) => (b ? ifTrue() : ifFalse()));
}

/**
 * Kleisli composition (>=>) - compose two monadic functions
 */
export function andThen<F extends TypeFunction>(
  F: FlatMap<F>,
): <A, B, C>(f: (a: A) => $<F, B>, g: (b: B) => $<F, C>) => (a: A) => $<F, C> {
  return <A, B, C>(f: (a: A) => $<F, B>, g: (b: B) => $<F, C>) =>
    (a: A) =>
      F.flatMap<B, C>(f(a), g);
}

/**
 * Kleisli composition (<=<) - compose two monadic functions (reversed)
 */
export function compose<F extends TypeFunction>(
  F: FlatMap<F>,
): <B, C, A>(g: (b: B) => $<F, C>, f: (a: A) => $<F, B>) => (a: A) => $<F, C> {
  return <B, C, A>(g: (b: B) => $<F, C>, f: (a: A) => $<F, B>) =>
    (a: A) =>
      F.flatMap<B, C>(f(a), g);
}

// ============================================================================
// Derived Operations from Monad
// ============================================================================

/**
 * Perform an action repeatedly, collecting results while predicate holds
 */
export function whileM<F extends TypeFunction>(
  F: Monad<F>,
): <A>(p: $<F, boolean>, body: $<F, A>) => $<F, A[]> {
  return <A>(p: $<F, boolean>, body: $<F, A>): $<F, A[]> => {
    const loop = (acc: A[]): $<F, A[]> =>
      F.flatMap<boolean, A[]>(p, (continue_) => {
        if (!continue_) return F.pure(acc);
        return F.flatMap<A, A[]>(body, (a) => loop([...acc, a]));
      });
    return loop([]);
  };
}

/**
 * Perform an action repeatedly until predicate holds
 */
export function untilM<F extends TypeFunction>(
  F: Monad<F>,
): <A>(body: $<F, A>, p: $<F, boolean>) => $<F, A[]> {
  return <A>(body: $<F, A>, p: $<F, boolean>): $<F, A[]> => {
    const loop = (acc: A[]): $<F, A[]> =>
      F.flatMap<A, A[]>(body, (a) => {
        const next = [...acc, a];
        return F.flatMap<boolean, A[]>(p, (done) => (done ? F.pure(next) : loop(next)));
      });
    return loop([]);
  };
}

// ============================================================================
// Instance Creator
// ============================================================================

/**
 * Create a Monad instance; `ap` is derived from `flatMap` and `map`.
 */
export function makeMonad<F extends TypeFunction>(
  map: <A, B>(fa: $<F, A>, f: (a: A) => B) => $<F, B>,
  flatMap: <A, B>(fa: $<F, A>, f: (a: A) => $<F, B>) => $<F, B>,
  pure: <A>(a: A) => $<F, A>,
): Monad<F> {
  return {
    map,
    flatMap,
    pure,
    ap: <A, B>(fab: $<F, (a: A) => B>, fa: $<F, A>) =>
      flatMap<(a: A) => B, B>(fab, (f) => map<A, B>(fa, f)),
  };
}
