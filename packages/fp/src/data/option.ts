/**
 * Option
 *
 * `Option<A>` is `A | null`: a present value is the value itself, absence is
 * `null`. Nothing is boxed, so an Option can be handed to any API that
 * expects a nullable and back again without conversion.
 *
 * Two rules follow from the encoding:
 * - `Some` refuses `null` and `undefined` and throws `ValueIsNullError`.
 *   Untrusted input goes through `fromNullable` instead.
 * - `Option<Option<A>>` collapses, since both levels of None are `null`.
 *   Wrap the inner value with `defined` when the nesting must survive.
 *
 * @example
 * ```typescript
 * const port = Option.fromNullable(process.env.PORT);
 * Option.getOrElse(Option.map(port, Number), () => 8080);
 * ```
 */

import type { Eq, Ord, Ordering } from "../typeclasses/eq.js";
import { EQ, GT, LT } from "../typeclasses/eq.js";
import type { Show } from "../typeclasses/show.js";
import type { Semigroup, Monoid } from "../typeclasses/semigroup.js";
import { Left, Right, type Either } from "./either.js";
import { ValueIsNoneError, ValueIsNullError } from "../errors.js";

export type Option<A> = A | null;
export type Some<A> = A;
export type None = null;

/**
 * Box for a value that may itself be `null`, so it can sit inside an Option:
 * `defined(null)` is Some, `None` is still `null`.
 */
export type Defined<T> = { readonly value: T };

export function defined<T>(value: T): Defined<T> {
  return { value };
}

export function unwrapDefined<T>(d: Defined<T>): T {
  return d.value;
}

// ============================================================================
// Constructors
// ============================================================================

/**
 * @throws ValueIsNullError for `null` or `undefined`
 */
export function Some<A>(value: A): Option<A> {
  if (value === null || value === undefined) {
    throw new ValueIsNullError("Some requires a non-null value");
  }
  return value;
}

export const None: Option<never> = null;

export function some<A>(a: A): Option<A> {
  return Some(a);
}

export function none<A = never>(): Option<A> {
  return null;
}

/**
 * `undefined` and `null` both become None
 */
export function fromNullable<A>(value: A | null | undefined): Option<A> {
  return value === undefined ? null : value;
}

export function fromPredicate<A>(value: A, predicate: (a: A) => boolean): Option<A> {
  return predicate(value) ? value : null;
}

/**
 * None when `f` throws or returns a nullish value. The exception itself is
 * dropped; use `Either.tryCatch` to keep it.
 */
export function tryCatch<A>(f: () => A): Option<A> {
  let result: A;
  try {
    result = f();
  } catch {
    return null;
  }
  return fromNullable(result);
}

export function isSome<A>(opt: Option<A>): opt is A {
  return opt !== null;
}

export function isNone<A>(opt: Option<A>): opt is null {
  return opt === null;
}

// ============================================================================
// Transformations
// ============================================================================

export function map<A, B>(opt: Option<A>, f: (a: A) => B): Option<B> {
  return opt === null ? null : f(opt);
}

export function flatMap<A, B>(opt: Option<A>, f: (a: A) => Option<B>): Option<B> {
  return opt === null ? null : f(opt);
}

export function ap<A, B>(optF: Option<(a: A) => B>, optA: Option<A>): Option<B> {
  return optF === null || optA === null ? null : optF(optA);
}

export function filter<A>(opt: Option<A>, predicate: (a: A) => boolean): Option<A> {
  return opt !== null && predicate(opt) ? opt : null;
}

export function orElse<A>(opt: Option<A>, fallback: () => Option<A>): Option<A> {
  return opt === null ? fallback() : opt;
}

export function zip<A, B>(optA: Option<A>, optB: Option<B>): Option<[A, B]> {
  return zipWith(optA, optB, (a, b): [A, B] => [a, b]);
}

export function zipWith<A, B, C>(
  optA: Option<A>,
  optB: Option<B>,
  f: (a: A, b: B) => C,
): Option<C> {
  return optA === null || optB === null ? null : f(optA, optB);
}

/**
 * Run `f` on a present value and return `opt` unchanged
 */
export function tap<A>(opt: Option<A>, f: (a: A) => void): Option<A> {
  if (opt !== null) f(opt);
  return opt;
}

// ============================================================================
// Eliminators
// ============================================================================

/** Handlers in None, Some order */
export function fold<A, B>(opt: Option<A>, onNone: () => B, onSome: (a: A) => B): B {
  return opt === null ? onNone() : onSome(opt);
}

export function match<A, B>(opt: Option<A>, cases: { None: () => B; Some: (a: A) => B }): B {
  return fold(opt, cases.None, cases.Some);
}

export function getOrElse<A>(opt: Option<A>, fallback: () => A): A {
  return opt === null ? fallback() : opt;
}

export function getOrElseStrict<A>(opt: Option<A>, fallback: A): A {
  return opt === null ? fallback : opt;
}

/**
 * @throws ValueIsNoneError for None
 */
export function getOrThrow<A>(opt: Option<A>, message?: string): A {
  if (opt === null) throw new ValueIsNoneError(message ?? "Called getOrThrow on None");
  return opt;
}

export function exists<A>(opt: Option<A>, predicate: (a: A) => boolean): boolean {
  return opt !== null && predicate(opt);
}

/** True for None */
export function forall<A>(opt: Option<A>, predicate: (a: A) => boolean): boolean {
  return opt === null || predicate(opt);
}

export function contains<A>(
  opt: Option<A>,
  value: A,
  eq: (a: A, b: A) => boolean = (a, b) => a === b,
): boolean {
  return exists(opt, (a) => eq(a, value));
}

export function toEither<E, A>(opt: Option<A>, left: () => E): Either<E, A> {
  return opt === null ? Left(left()) : Right(opt);
}

export function toArray<A>(opt: Option<A>): A[] {
  return opt === null ? [] : [opt];
}

export function toNullable<A>(opt: Option<A>): A | null {
  return opt;
}

export function toUndefined<A>(opt: Option<A>): A | undefined {
  return opt ?? undefined;
}

// ============================================================================
// Instances
// ============================================================================

export function getEq<A>(E: Eq<A>): Eq<Option<A>> {
  return {
    eqv: (x, y) => (x === null || y === null ? x === y : E.eqv(x, y)),
  };
}

/**
 * None sorts before every Some
 */
export function getOrd<A>(O: Ord<A>): Ord<Option<A>> {
  const compare = (x: Option<A>, y: Option<A>): Ordering => {
    if (x === null) return y === null ? EQ : LT;
    if (y === null) return GT;
    return O.compare(x, y);
  };
  return { eqv: getEq(O).eqv, compare };
}

/**
 * `Some(<inner>)` or `None`; OptionAsync's `show` renders through this too
 */
export function getShow<A>(S: Show<A>): Show<Option<A>> {
  return { show: (opt) => (opt === null ? "None" : `Some(${S.show(opt)})`) };
}

/**
 * Combines two Somes with `S`; a None on either side is skipped
 */
export function getSemigroup<A>(S: Semigroup<A>): Semigroup<Option<A>> {
  return {
    combine: (x, y) => (x === null ? y : y === null ? x : S.combine(x, y)),
  };
}

export function getMonoid<A>(S: Semigroup<A>): Monoid<Option<A>> {
  return { ...getSemigroup(S), empty: null };
}

/** Keeps the leftmost Some */
export function getFirstMonoid<A>(): Monoid<Option<A>> {
  return { combine: (x, y) => (x === null ? y : x), empty: null };
}

export const Option = {
  Some,
  None,
  some,
  none,
  fromNullable,
  fromPredicate,
  tryCatch,
  isSome,
  isNone,
  map,
  flatMap,
  ap,
  fold,
  match,
  getOrElse,
  getOrElseStrict,
  getOrThrow,
  orElse,
  filter,
  exists,
  forall,
  contains,
  toEither,
  toArray,
  toNullable,
  toUndefined,
  zip,
  zipWith,
  tap,
  getEq,
  getOrd,
  getShow,
  getSemigroup,
  getMonoid,
  getFirstMonoid,
} as const;
