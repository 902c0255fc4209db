/**
 * Semigroup and Monoid
 *
 * `combine` must be associative. A Monoid's `empty` is neutral on both
 * sides. `foldMap` and `fold` in ./foldable.ts reduce through a Monoid; the
 * data types build theirs with `getSemigroup`/`getMonoid`.
 */

import type { Option } from "../data/option.js";

export interface Semigroup<A> {
  readonly combine: (x: A, y: A) => A;
}

export interface Monoid<A> extends Semigroup<A> {
  readonly empty: A;
}

/**
 * Left-to-right reduction; None when there is nothing to combine
 */
export function combineAll<A>(S: Semigroup<A>): (as: readonly A[]) => Option<A> {
  return (as) => (as.length === 0 ? null : as.reduce((acc, a) => S.combine(acc, a)));
}

export function combineAllMonoid<A>(M: Monoid<A>): (as: readonly A[]) => A {
  return (as) => as.reduce((acc, a) => M.combine(acc, a), M.empty);
}

export const semigroupSum: Semigroup<number> = { combine: (x, y) => x + y };
export const monoidSum: Monoid<number> = { ...semigroupSum, empty: 0 };

export const semigroupString: Semigroup<string> = { combine: (x, y) => x.concat(y) };
export const monoidString: Monoid<string> = { ...semigroupString, empty: "" };
