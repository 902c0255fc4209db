/**
 * Optional Typeclass
 *
 * Structures that hold zero or one value and can be matched on. Option is
 * the canonical instance; the async counterpart lives in `./async.ts`.
 */

import type { $, TypeFunction } from "../hkt.js";
import { Left, Right, type Either } from "../data/either.js";

export interface Optional<F extends TypeFunction> {
  readonly isSome: <A>(fa: $<F, A>) => boolean;
  readonly isNone: <A>(fa: $<F, A>) => boolean;
  readonly match: <A, B>(fa: $<F, A>, some: (a: A) => B, none: () => B) => B;
  readonly some: <A>(a: A) => $<F, A>;
  readonly none: <A>() => $<F, A>;
  /** Some for a present value, None for `null`/`undefined` */
  readonly optional: <A>(a: A | null | undefined) => $<F, A>;
}

// ============================================================================
// Derived Operations
// ============================================================================

/**
 * Match without committing to the element type
 */
export function matchUntyped<F extends TypeFunction>(
  O: Optional<F>,
): <A, B>(fa: $<F, A>, some: (a: unknown) => B, none: () => B) => B {
  return <A, B>(fa: $<F, A>, some: (a: unknown) => B, none: () => B) =>
    O.match<A, B>(fa, some, none);
}

export function toArray<F extends TypeFunction>(O: Optional<F>): <A>(fa: $<F, A>) => A[] {
  return <A>(fa: $<F, A>) =>
    O.match<A, A[]>(
      fa,
      (a) => [a],
      () => [],
    );
}

export function toEither<F extends TypeFunction>(
  O: Optional<F>,
): <L, A>(fa: $<F, A>, left: () => L) => Either<L, A> {
  return <L, A>(fa: $<F, A>, left: () => L) =>
    O.match<A, Either<L, A>>(
      fa,
      (a) => Right(a),
      () => Left(left()),
    );
}

/**
 * The value, or the fallback's result for None
 */
export function ifNone<F extends TypeFunction>(
  O: Optional<F>,
): <A>(fa: $<F, A>, fallback: () => A) => A {
  return <A>(fa: $<F, A>, fallback: () => A) => O.match<A, A>(fa, (a) => a, fallback);
}

export function ifSome<F extends TypeFunction>(
  O: Optional<F>,
): <A>(fa: $<F, A>, f: (a: A) => void) => void {
  return <A>(fa: $<F, A>, f: (a: A) => void) =>
    O.match<A, void>(fa, f, () => undefined);
}
