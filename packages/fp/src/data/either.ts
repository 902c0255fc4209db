/**
 * Either Data Type
 *
 * Either represents a value of one of two possible types (a disjoint union).
 * An Either<E, A> is either Left<E> (representing failure/error) or Right<A>
 * (representing success).
 * By convention, Right is the "right" (correct/success) case.
 */

import type { Option } from "./option.js";
import type { Eq } from "../typeclasses/eq.js";
import type { Show } from "../typeclasses/show.js";
import { BottomError } from "../errors.js";

// ============================================================================
// Either Type Definition
// ============================================================================

export type Either<E, A> = Left<E> | Right<A>;

export interface Left<E> {
  readonly _tag: "Left";
  readonly left: E;
}

export interface Right<A> {
  readonly _tag: "Right";
  readonly right: A;
}

// ============================================================================
// Constructors
// ============================================================================

export function Left<E, A = never>(left: E): Either<E, A> {
  return { _tag: "Left", left };
}

export function Right<E = never, A = unknown>(right: A): Either<E, A> {
  return { _tag: "Right", right };
}

/**
 * Right for a present value, Left(onNull()) for `null`/`undefined`
 */
export function fromNullable<E, A>(value: A | null | undefined, onNull: () => E): Either<E, A> {
  return value === null || value === undefined ? Left(onNull()) : Right(value);
}

export function fromPredicate<E, A>(
  value: A,
  predicate: (a: A) => boolean,
  onFalse: (a: A) => E,
): Either<E, A> {
  return predicate(value) ? Right(value) : Left(onFalse(value));
}

/**
 * Run `f`, capturing a thrown exception as Left
 */
export function tryCatch<E, A>(f: () => A, onError: (error: unknown) => E): Either<E, A> {
  try {
    return Right(f());
  } catch (error) {
    return Left(onError(error));
  }
}

export function fromOption<E, A>(opt: Option<A>, onNone: () => E): Either<E, A> {
  return opt !== null ? Right(opt) : Left(onNone());
}

// ============================================================================
// Type Guards
// ============================================================================

export function isLeft<E, A>(either: Either<E, A>): either is Left<E> {
  return either._tag === "Left";
}

export function isRight<E, A>(either: Either<E, A>): either is Right<A> {
  return either._tag === "Right";
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Fold over Either - provide handlers for both cases.
 *
 * @throws BottomError for a value tagged neither Left nor Right
 */
export function fold<E, A, B>(either: Either<E, A>, onLeft: (e: E) => B, onRight: (a: A) => B): B {
  switch (either._tag) {
    case "Right":
      return onRight(either.right);
    case "Left":
      return onLeft(either.left);
    default:
      throw new BottomError("Either is neither Left nor Right");
  }
}

/**
 * Fold with object syntax
 */
export function match<E, A, B>(
  either: Either<E, A>,
  patterns: { Left: (e: E) => B; Right: (a: A) => B },
): B {
  return fold(either, patterns.Left, patterns.Right);
}

export function map<E, A, B>(either: Either<E, A>, f: (a: A) => B): Either<E, B> {
  return isRight(either) ? Right(f(either.right)) : either;
}

export function mapLeft<E, A, E2>(either: Either<E, A>, f: (e: E) => E2): Either<E2, A> {
  return isLeft(either) ? Left(f(either.left)) : either;
}

export function bimap<E, A, E2, B>(
  either: Either<E, A>,
  f: (e: E) => E2,
  g: (a: A) => B,
): Either<E2, B> {
  return fold<E, A, Either<E2, B>>(
    either,
    (e) => Left(f(e)),
    (a) => Right(g(a)),
  );
}

export function flatMap<E, A, B>(either: Either<E, A>, f: (a: A) => Either<E, B>): Either<E, B> {
  return isRight(either) ? f(either.right) : either;
}

/**
 * Apply a function in Either to a value in Either; the first Left wins
 */
export function ap<E, A, B>(eitherF: Either<E, (a: A) => B>, eitherA: Either<E, A>): Either<E, B> {
  return flatMap(eitherF, (f) => map(eitherA, f));
}

export function swap<E, A>(either: Either<E, A>): Either<A, E> {
  return isRight(either) ? Left(either.right) : Right(either.left);
}

export function flatten<E, A>(either: Either<E, Either<E, A>>): Either<E, A> {
  return flatMap(either, (inner) => inner);
}

// ============================================================================
// Extraction
// ============================================================================

export function getOrElse<E, A>(either: Either<E, A>, defaultValue: (e: E) => A): A {
  return isRight(either) ? either.right : defaultValue(either.left);
}

/**
 * Get the Right value, throwing the Left value otherwise
 */
export function getOrThrow<E, A>(either: Either<E, A>): A {
  if (isRight(either)) return either.right;
  throw either.left;
}

/**
 * Return this if Right, or evaluate the fallback
 */
export function orElse<E, A, E2>(
  either: Either<E, A>,
  fallback: (e: E) => Either<E2, A>,
): Either<E2, A> {
  return isRight(either) ? either : fallback(either.left);
}

export function toOption<E, A>(either: Either<E, A>): Option<A> {
  return isRight(either) ? either.right : null;
}

export function toArray<E, A>(either: Either<E, A>): A[] {
  return isRight(either) ? [either.right] : [];
}

/**
 * Merge Left and Right into a single value
 */
export function merge<A>(either: Either<A, A>): A {
  return isRight(either) ? either.right : either.left;
}

export function exists<E, A>(either: Either<E, A>, predicate: (a: A) => boolean): boolean {
  return isRight(either) && predicate(either.right);
}

/**
 * True for Left, otherwise the predicate on the Right value
 */
export function forall<E, A>(either: Either<E, A>, predicate: (a: A) => boolean): boolean {
  return isLeft(either) || predicate(either.right);
}

// ============================================================================
// Typeclass Instances
// ============================================================================

export function getEq<E, A>(EE: Eq<E>, EA: Eq<A>): Eq<Either<E, A>> {
  return {
    eqv: (x, y) => {
      if (isLeft(x) && isLeft(y)) return EE.eqv(x.left, y.left);
      if (isRight(x) && isRight(y)) return EA.eqv(x.right, y.right);
      return false;
    },
  };
}

export function getShow<E, A>(SE: Show<E>, SA: Show<A>): Show<Either<E, A>> {
  return {
    show: (either) =>
      isRight(either) ? `Right(${SA.show(either.right)})` : `Left(${SE.show(either.left)})`,
  };
}

// ============================================================================
// Companion Object
// ============================================================================

export const Either = {
  Left,
  Right,
  fromNullable,
  fromPredicate,
  tryCatch,
  fromOption,
  isLeft,
  isRight,
  fold,
  match,
  map,
  mapLeft,
  bimap,
  flatMap,
  ap,
  swap,
  flatten,
  getOrElse,
  getOrThrow,
  orElse,
  toOption,
  toArray,
  merge,
  exists,
  forall,
  getEq,
  getShow,
} as const;
