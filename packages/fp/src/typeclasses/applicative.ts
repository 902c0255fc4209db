/**
 * Apply and Applicative Typeclasses
 *
 * Apply extends Functor with the ability to apply a function in a context.
 * Applicative extends Apply with the ability to lift a value into a context.
 *
 * Laws:
 *   - Identity: pure(id).ap(v) === v
 *   - Homomorphism: pure(f).ap(pure(x)) === pure(f(x))
 *   - Interchange: u.ap(pure(y)) === pure(f => f(y)).ap(u)
 *   - Composition: pure(compose).ap(u).ap(v).ap(w) === u.ap(v.ap(w))
 */

import type { Functor } from "./functor.js";
import type { $, TypeFunction } from "../hkt.js";

// ============================================================================
// Apply
// ============================================================================

/**
 * Apply typeclass - extends Functor with application
 */
export interface Apply<F extends TypeFunction> extends Functor<F> {
  readonly ap: <A, B>(fab: $<F, (a: A) => B>, fa: $<F, A>) => $<F, B>;
}

// ============================================================================
// Applicative
// ============================================================================

/**
 * Applicative typeclass - extends Apply with pure
 */
export interface Applicative<F extends TypeFunction> extends Apply<F> {
  readonly pure: <A>(a: A) => $<F, A>;
}

// ============================================================================
// Derived Operations from Apply
// ============================================================================

/**
 * Apply two functorial values and combine with a function
 */
export function map2<F extends TypeFunction>(
  F: Apply<F>,
): <A, B, C>(fa: $<F, A>, fb: $<F, B>, f: (a: A, b: B) => C) => $<F, C> {
  return <A, B, C>(fa: $<F, A>, fb: $<F, B>, f: (a: A, b: B) => C): $<F, C> =>
    F.ap<B, C>(
      F.map<A, (b: B) => C>(fa, (a) => (b) => f(a, b)),
      fb,
    );
}

/**
 * Apply three functorial values and combine with a function
 */
export function map3<F extends TypeFunction>(
  F: Apply<F>,
): <A, B, C, D>(
  fa: $<F, A>,
  fb: $<F, B>,
  fc: $<F, C>,
  f: (a: A, b: B, c: C) => D,
) => $<F, D> {
  return <A, B, C, D>(
    fa: $<F, A>,
    fb: $<F, B>,
    fc: $<F, C>,
    f: (a: A, b: B, c: C) => D,
  ): $<F, D> => {
    const partialF = map2(F)<A, B, (c: C) => D>(fa, fb, (a, b) => (c) => f(a, b, c));
    return F.ap<C, D>(partialF, fc);
  };
}

/**
 * Tuple two functorial values
 */
export function tuple2<F extends TypeFunction>(
  F: Apply<F>,
): <A, B>(fa: $<F, A>, fb: $<F, B>) => $<F, [A, B]> {
  return <A, B>(fa: $<F, A>, fb: $<F, B>) => map2(F)<A, B, [A, B]>(fa, fb, (a, b) => [a, b]);
}

/**
 * Sequence two actions, keeping only the left value
 */
export function productL<F extends TypeFunction>(
  F: Apply<F>,
): <A, B>(fa: $<F, A>, fb: $<F, B>) => $<F, A> {
  return <A, B>(fa: $<F, A>, fb: $<F, B>) => map2(F)<A, B, A>(fa, fb, (a) => a);
}

/**
 * Sequence two actions, keeping only the right value
 */
export function productR<F extends TypeFunction>(
  F: Apply<F>,
): <A, B>(fa: $<F, A>, fb: $<F, B>) => $<F, B> {
  return <A, B>(fa: $<F, A>, fb: $<F, B>) => map2(F)<A, B, B>(fa, fb, (_, b) => b);
}

// ============================================================================
// Derived Operations from Applicative
// ============================================================================

/**
 * Lift a value into the applicative context
 */
export function unit<F extends TypeFunction>(F: Applicative<F>): $<F, void> {
  return F.pure<void>(undefined);
}

/**
 * Perform an action when a condition is true
 */
export function when<F extends TypeFunction>(
  F: Applicative<F>,
): (condition: boolean, action: $<F, void>) => $<F, void> {
  return (condition, action) => (condition ? action : unit(F));
}

/**
 * Perform an action unless a condition is true
 */
export function unless<F extends TypeFunction>(
  F: Applicative<F>,
): (condition: boolean, action: $<F, void>) => $<F, void> {
  return (condition, action) => when(F)(!condition, action);
}

/**
 * Replicate an action n times and collect results
 */
export function replicateA<F extends TypeFunction>(
  F: Applicative<F>,
): <A>(n: number, fa: $<F, A>) => $<F, A[]> {
  return <A>(n: number, fa: $<F, A>): $<F, A[]> => {
    if (n <= 0) return F.pure<A[]>([]);
    let acc = F.map<A, A[]>(fa, (a) => [a]);
    for (let i = 1; i < n; i++) {
      acc = map2(F)<A[], A, A[]>(acc, fa, (arr, a) => [...arr, a]);
    }
    return acc;
  };
}

// ============================================================================
// Instance Creators
// ============================================================================

/**
 * Create an Apply instance
 */
export function makeApply<F extends TypeFunction>(
  map: <A, B>(fa: $<F, A>, f: (a: A) => B) => $<F, B>,
  ap: <A, B>(fab: $<F, (a: A) => B>, fa: $<F, A>) => $<F, B>,
): Apply<F> {
  return { map, ap };
}

/**
 * Create an Applicative instance
 */
export function makeApplicative<F extends TypeFunction>(
  map: <A, B>(fa: $<F, A>, f: (a: A) => B) => $<F, B>,
  ap: <A, B>(fab: $<F, (a: A) => B>, fa: $<F, A>) => $<F, B>,
  pure: <A>(a: A) => $<F, A>,
): Applicative<F> {
  return { map, ap, pure };
}
