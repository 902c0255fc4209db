/**
 * ApplicativeError and MonadError Typeclasses
 *
 * These extend Applicative and Monad with error handling capabilities.
 *
 * Laws:
 *   - raiseError(e).handleErrorWith(f) === f(e)
 *   - pure(a).handleErrorWith(f) === pure(a)
 *   - raiseError(e).flatMap(f) === raiseError(e)
 */

import type { Applicative } from "./applicative.js";
import type { Monad } from "./monad.js";
import type { $, TypeFunction } from "../hkt.js";
import { Left, Right, type Either } from "../data/either.js";

// ============================================================================
// ApplicativeError
// ============================================================================

/**
 * ApplicativeError typeclass - Applicative with error handling
 *
 * E is the error type, F is the type constructor
 */
export interface ApplicativeError<F extends TypeFunction, E> extends Applicative<F> {
  readonly raiseError: <A>(e: E) => $<F, A>;
  readonly handleErrorWith: <A>(fa: $<F, A>, f: (e: E) => $<F, A>) => $<F, A>;
}

// ============================================================================
// MonadError
// ============================================================================

export interface MonadError<F extends TypeFunction, E> extends ApplicativeError<F, E>, Monad<F> {}

// ============================================================================
// Derived Operations
// ============================================================================

/**
 * Handle errors with a pure recovery function
 */
export function handleError<F extends TypeFunction, E>(
  F: ApplicativeError<F, E>,
): <A>(fa: $<F, A>, f: (e: E) => A) => $<F, A> {
  return <A>(fa: $<F, A>, f: (e: E) => A) => F.handleErrorWith<A>(fa, (e) => F.pure(f(e)));
}

/**
 * Recover from errors, providing a fallback value
 */
export function recover<F extends TypeFunction, E>(
  F: ApplicativeError<F, E>,
): <A>(fa: $<F, A>, fallback: A) => $<F, A> {
  return <A>(fa: $<F, A>, fallback: A) => handleError(F)<A>(fa, () => fallback);
}

/**
 * Move the error into the value as an Either
 */
export function attempt<F extends TypeFunction, E>(
  F: ApplicativeError<F, E>,
): <A>(fa: $<F, A>) => $<F, Either<E, A>> {
  return <A>(fa: $<F, A>): $<F, Either<E, A>> =>
    F.handleErrorWith<Either<E, A>>(
      F.map<A, Either<E, A>>(fa, (a) => Right(a)),
      (e) => F.pure<Either<E, A>>(Left(e)),
    );
}

/**
 * Ensure a condition holds, raising error if not
 */
export function ensure<F extends TypeFunction, E>(
  F: MonadError<F, E>,
): <A>(fa: $<F, A>, error: (a: A) => E, p: (a: A) => boolean) => $<F, A> {
  return <A>(fa: $<F, A>, error: (a: A) => E, p: (a: A) => boolean) =>
    F.flatMap<A, A>(fa, (a) => (p(a) ? F.pure(a) : F.raiseError<A>(error(a))));
}
