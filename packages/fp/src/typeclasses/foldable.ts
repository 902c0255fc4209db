/**
 * Foldable Typeclass
 *
 * Data structures that can be reduced to a summary value.
 *
 * Laws:
 *   - foldRight is consistent with foldMap using the Endo monoid
 *   - foldLeft visits elements in the reverse order of foldRight
 */

import type { Monoid } from "./semigroup.js";
import type { $, TypeFunction } from "../hkt.js";
import type { Option } from "../data/option.js";

// ============================================================================
// Foldable
// ============================================================================

export interface Foldable<F extends TypeFunction> {
  readonly foldLeft: <A, B>(fa: $<F, A>, b: B, f: (b: B, a: A) => B) => B;
  readonly foldRight: <A, B>(fa: $<F, A>, b: B, f: (a: A, b: B) => B) => B;
}

// ============================================================================
// Derived Operations
// ============================================================================

/**
 * Map each element to a monoid and combine
 */
export function foldMap<F extends TypeFunction>(
  F: Foldable<F>,
): <M>(M: Monoid<M>) => <A>(fa: $<F, A>, f: (a: A) => M) => M {
  return <M>(M: Monoid<M>) =>
    <A>(fa: $<F, A>, f: (a: A) => M) =>
      F.foldLeft<A, M>(fa, M.empty, (acc, a) => M.combine(acc, f(a)));
}

/**
 * Combine all elements using a monoid
 */
export function fold<F extends TypeFunction>(
  F: Foldable<F>,
): <A>(M: Monoid<A>) => (fa: $<F, A>) => A {
  return <A>(M: Monoid<A>) =>
    (fa: $<F, A>) =>
      F.foldLeft<A, A>(fa, M.empty, M.combine);
}

export function exists<F extends TypeFunction>(
  F: Foldable<F>,
): <A>(fa: $<F, A>, p: (a: A) => boolean) => boolean {
  return <A>(fa: $<F, A>, p: (a: A) => boolean) =>
    F.foldLeft<A, boolean>(fa, false, (acc, a) => acc || p(a));
}

/**
 * Check if all elements satisfy a predicate (vacuously true when empty)
 */
export function forall<F extends TypeFunction>(
  F: Foldable<F>,
): <A>(fa: $<F, A>, p: (a: A) => boolean) => boolean {
  return <A>(fa: $<F, A>, p: (a: A) => boolean) =>
    F.foldLeft<A, boolean>(fa, true, (acc, a) => acc && p(a));
}

export function isEmpty<F extends TypeFunction>(F: Foldable<F>): <A>(fa: $<F, A>) => boolean {
  return <A>(fa: $<F, A>) => F.foldLeft<A, boolean>(fa, true, () => false);
}

export function nonEmpty<F extends TypeFunction>(F: Foldable<F>): <A>(fa: $<F, A>) => boolean {
  return <A>(fa: $<F, A>) => !isEmpty(F)<A>(fa);
}

/**
 * Count the number of elements
 */
export function size<F extends TypeFunction>(F: Foldable<F>): <A>(fa: $<F, A>) => number {
  return <A>(fa: $<F, A>) => F.foldLeft<A, number>(fa, 0, (acc) => acc + 1);
}

/**
 * Find the first element satisfying a predicate
 */
export function find<F extends TypeFunction>(
  F: Foldable<F>,
): <A>(fa: $<F, A>, p: (a: A) => boolean) => Option<A> {
  return <A>(fa: $<F, A>, p: (a: A) => boolean): Option<A> =>
    F.foldLeft<A, Option<A>>(fa, null, (acc, a) => (acc !== null ? acc : p(a) ? a : null));
}

export function head<F extends TypeFunction>(F: Foldable<F>): <A>(fa: $<F, A>) => Option<A> {
  return <A>(fa: $<F, A>) => find(F)<A>(fa, () => true);
}

export function last<F extends TypeFunction>(F: Foldable<F>): <A>(fa: $<F, A>) => Option<A> {
  return <A>(fa: $<F, A>): Option<A> => F.foldLeft<A, Option<A>>(fa, null, (_, a) => a);
}

/**
 * Collect the elements, left to right
 */
export function toArray<F extends TypeFunction>(F: Foldable<F>): <A>(fa: $<F, A>) => A[] {
  return <A>(fa: $<F, A>): A[] =>
    F.foldLeft<A, A[]>(fa, [], (acc, a) => {
      acc.push(a);
      return acc;
    });
}

/**
 * Filter elements and collect to array
 */
export function filter<F extends TypeFunction>(
  F: Foldable<F>,
): <A>(fa: $<F, A>, p: (a: A) => boolean) => A[] {
  return <A>(fa: $<F, A>, p: (a: A) => boolean): A[] =>
    F.foldLeft<A, A[]>(fa, [], (acc, a) => {
      if (p(a)) acc.push(a);
      return acc;
    });
}

export function minimum<F extends TypeFunction>(
  F: Foldable<F>,
): <A>(fa: $<F, A>, compare: (a: A, b: A) => number) => Option<A> {
  return <A>(fa: $<F, A>, compare: (a: A, b: A) => number): Option<A> =>
    F.foldLeft<A, Option<A>>(fa, null, (acc, a) =>
      acc === null ? a : compare(a, acc) < 0 ? a : acc,
    );
}

export function maximum<F extends TypeFunction>(
  F: Foldable<F>,
): <A>(fa: $<F, A>, compare: (a: A, b: A) => number) => Option<A> {
  return <A>(fa: $<F, A>, compare: (a: A, b: A) => number): Option<A> =>
    F.foldLeft<A, Option<A>>(fa, null, (acc, a) =>
      acc === null ? a : compare(a, acc) > 0 ? a : acc,
    );
}

/**
 * Check if an element exists in the structure
 */
export function contains<F extends TypeFunction>(
  F: Foldable<F>,
): <A>(fa: $<F, A>, a: A, eq?: (x: A, y: A) => boolean) => boolean {
  return <A>(fa: $<F, A>, a: A, eq: (x: A, y: A) => boolean = (x, y) => x === y) =>
    exists(F)<A>(fa, (x) => eq(x, a));
}

// ============================================================================
// Instance Creator
// ============================================================================

export function makeFoldable<F extends TypeFunction>(
  foldLeft: <A, B>(fa: $<F, A>, b: B, f: (b: B, a: A) => B) => B,
  foldRight: <A, B>(fa: $<F, A>, b: B, f: (a: A, b: B) => B) => B,
): Foldable<F> {
  return { foldLeft, foldRight };
}
