/**
 * Eq and Ord
 *
 * `Eq` decides equality for values that `===` cannot compare (Options of
 * records, Seqs, Eithers). `Ord` adds a three-way comparison, used by
 * `minimum`/`maximum` and by the data types' ordering helpers.
 *
 * An instance should be reflexive, symmetric and transitive; `compare` must
 * agree with `eqv` on `EQ`.
 */

export type Ordering = -1 | 0 | 1;

export const LT: Ordering = -1;
export const EQ: Ordering = 0;
export const GT: Ordering = 1;

export interface Eq<A> {
  readonly eqv: (x: A, y: A) => boolean;
}

export interface Ord<A> extends Eq<A> {
  readonly compare: (x: A, y: A) => Ordering;
}

/**
 * The smaller of two values; `x` on a tie
 */
export function min<A>(O: Ord<A>): (x: A, y: A) => A {
  return (x, y) => (O.compare(y, x) === LT ? y : x);
}

/**
 * The larger of two values; `x` on a tie
 */
export function max<A>(O: Ord<A>): (x: A, y: A) => A {
  return (x, y) => (O.compare(y, x) === GT ? y : x);
}

// ============================================================================
// Instances and builders
// ============================================================================

export function eqStrict<A>(): Eq<A> {
  return { eqv: (x, y) => x === y };
}

/**
 * Compare two values through a projection, e.g. records by id
 */
export function eqBy<A, B>(E: Eq<B>, f: (a: A) => B): Eq<A> {
  return { eqv: (x, y) => E.eqv(f(x), f(y)) };
}

/**
 * Same length and pairwise equal
 */
export function eqArray<A>(E: Eq<A>): Eq<readonly A[]> {
  return {
    eqv: (xs, ys) => xs.length === ys.length && xs.every((x, i) => E.eqv(x, ys[i])),
  };
}

export const eqString: Eq<string> = eqStrict();
export const eqNumber: Eq<number> = eqStrict();

function primitiveCompare<A extends string | number>(x: A, y: A): Ordering {
  if (x === y) return EQ;
  return x < y ? LT : GT;
}

export const ordString: Ord<string> = makeOrd<string>(primitiveCompare);
export const ordNumber: Ord<number> = makeOrd<number>(primitiveCompare);

export function makeOrd<A>(compare: (x: A, y: A) => Ordering): Ord<A> {
  return { eqv: (x, y) => compare(x, y) === EQ, compare };
}

/**
 * Ord from a comparator that returns any number, such as
 * `(a, b) => a.localeCompare(b)`
 */
export function fromCompare<A>(comparator: (x: A, y: A) => number): Ord<A> {
  return makeOrd((x, y) => {
    const n = comparator(x, y);
    return n === 0 ? EQ : n < 0 ? LT : GT;
  });
}
