/**
 * Seq Data Type
 *
 * An immutable, ordered sequence backed by a frozen array. Operations never
 * mutate their input; each returns a new Seq.
 *
 * @example
 * ```typescript
 * const xs = Seq.of(1, 2, 3);
 * Seq.map(xs, (n) => n * 2);            // Seq(2, 4, 6)
 * Seq.foldLeft(xs, 0, (acc, n) => acc + n); // 6
 * ```
 */

import { config, invariant } from "@kindred/core";
import type { Option } from "./option.js";
import type { Eq } from "../typeclasses/eq.js";
import type { Show } from "../typeclasses/show.js";
import type { Semigroup, Monoid } from "../typeclasses/semigroup.js";

// ============================================================================
// Seq Type Definition
// ============================================================================

export interface Seq<A> {
  readonly _tag: "Seq";
  readonly items: readonly A[];
}

function make<A>(items: A[]): Seq<A> {
  return { _tag: "Seq", items: Object.freeze(items) };
}

// ============================================================================
// Constructors
// ============================================================================

export const Empty: Seq<never> = make<never>([]);

export function empty<A = never>(): Seq<A> {
  return Empty;
}

export function of<A>(...as: A[]): Seq<A> {
  return make(as);
}

export function singleton<A>(a: A): Seq<A> {
  return make([a]);
}

/**
 * One-element Seq; alias of `singleton`
 */
export const Seq1 = singleton;

/**
 * Copy an array into a Seq
 */
export function fromArray<A>(as: readonly A[]): Seq<A> {
  return make([...as]);
}

export function fromIterable<A>(as: Iterable<A>): Seq<A> {
  return make(Array.from(as));
}

/**
 * Integers from `start` (inclusive) to `end` (exclusive)
 */
export function range(start: number, end: number): Seq<number> {
  const out: number[] = [];
  for (let i = start; i < end; i++) out.push(i);
  return make(out);
}

export function replicate<A>(n: number, a: A): Seq<A> {
  invariant(n >= 0, `replicate: n must be non-negative, got ${n}`);
  return make(Array.from({ length: n }, () => a));
}

// ============================================================================
// Accessors
// ============================================================================

export function isSeq(value: unknown): value is Seq<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "_tag" in value &&
    value._tag === "Seq" &&
    "items" in value &&
    Array.isArray(value.items)
  );
}

export function length<A>(seq: Seq<A>): number {
  return seq.items.length;
}

export function isEmpty<A>(seq: Seq<A>): boolean {
  return seq.items.length === 0;
}

/**
 * Element at index `i`, or None when out of range
 */
export function get<A>(seq: Seq<A>, i: number): Option<A> {
  return Number.isInteger(i) && i >= 0 && i < seq.items.length ? seq.items[i] : null;
}

export function head<A>(seq: Seq<A>): Option<A> {
  return get(seq, 0);
}

export function last<A>(seq: Seq<A>): Option<A> {
  return get(seq, seq.items.length - 1);
}

/**
 * All but the first element; empty for an empty Seq
 */
export function tail<A>(seq: Seq<A>): Seq<A> {
  return make(seq.items.slice(1));
}

// ============================================================================
// Transformations
// ============================================================================

export function map<A, B>(seq: Seq<A>, f: (a: A) => B): Seq<B> {
  return make(seq.items.map((a) => f(a)));
}

export function flatMap<A, B>(seq: Seq<A>, f: (a: A) => Seq<B>): Seq<B> {
  const out: B[] = [];
  for (const a of seq.items) out.push(...f(a).items);
  return make(out);
}

export function filter<A>(seq: Seq<A>, predicate: (a: A) => boolean): Seq<A> {
  return make(seq.items.filter((a) => predicate(a)));
}

export function append<A>(seq: Seq<A>, a: A): Seq<A> {
  return make([...seq.items, a]);
}

export function concat<A>(x: Seq<A>, y: Seq<A>): Seq<A> {
  if (x.items.length === 0) return y;
  if (y.items.length === 0) return x;
  return make([...x.items, ...y.items]);
}

export function reverse<A>(seq: Seq<A>): Seq<A> {
  return make([...seq.items].reverse());
}

export function take<A>(seq: Seq<A>, n: number): Seq<A> {
  return make(seq.items.slice(0, Math.max(0, n)));
}

export function drop<A>(seq: Seq<A>, n: number): Seq<A> {
  return make(seq.items.slice(Math.max(0, n)));
}

/**
 * Pair elements positionally; the result is as long as the shorter input
 */
export function zip<A, B>(x: Seq<A>, y: Seq<B>): Seq<[A, B]> {
  const n = Math.min(x.items.length, y.items.length);
  const out: [A, B][] = [];
  for (let i = 0; i < n; i++) out.push([x.items[i], y.items[i]]);
  return make(out);
}

export function foldLeft<A, B>(seq: Seq<A>, b: B, f: (b: B, a: A) => B): B {
  let acc = b;
  for (const a of seq.items) acc = f(acc, a);
  return acc;
}

export function foldRight<A, B>(seq: Seq<A>, b: B, f: (a: A, b: B) => B): B {
  let acc = b;
  for (let i = seq.items.length - 1; i >= 0; i--) acc = f(seq.items[i], acc);
  return acc;
}

/**
 * Copy the elements into a fresh mutable array
 */
export function toArray<A>(seq: Seq<A>): A[] {
  return [...seq.items];
}

export function mkString<A>(seq: Seq<A>, separator = ", "): string {
  return seq.items.map((a) => String(a)).join(separator);
}

// ============================================================================
// Typeclass Instances
// ============================================================================

export function getEq<A>(E: Eq<A>): Eq<Seq<A>> {
  return {
    eqv: (x, y) =>
      x.items.length === y.items.length && x.items.every((a, i) => E.eqv(a, y.items[i])),
  };
}

/**
 * Show as `Seq(a, b, c)`. Output stops after `show.maxItems` elements and
 * ends with `…` when more remain.
 */
export function getShow<A>(S: Show<A>): Show<Seq<A>> {
  return {
    show: (seq) => {
      const maxItems = config.getNumber("show.maxItems", 100);
      const shown = seq.items.slice(0, maxItems).map((a) => S.show(a));
      if (seq.items.length > maxItems) shown.push("…");
      return `Seq(${shown.join(", ")})`;
    },
  };
}

export function getSemigroup<A>(): Semigroup<Seq<A>> {
  return { combine: concat };
}

export function getMonoid<A>(): Monoid<Seq<A>> {
  return { combine: concat, empty: Empty };
}

// ============================================================================
// Companion Object
// ============================================================================

/**
 * Namespace-style access: `Seq.of(1, 2)`, `Seq.map(xs, f)`.
 */
export const Seq = {
  Empty,
  empty,
  of,
  singleton,
  fromArray,
  fromIterable,
  range,
  replicate,
  isSeq,
  length,
  isEmpty,
  get,
  head,
  last,
  tail,
  map,
  flatMap,
  filter,
  append,
  concat,
  reverse,
  take,
  drop,
  zip,
  foldLeft,
  foldRight,
  toArray,
  mkString,
  getEq,
  getShow,
  getSemigroup,
  getMonoid,
} as const;
