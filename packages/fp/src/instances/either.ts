/**
 * Typeclass Instances for Either<E, _>
 *
 * Either has two type parameters, so each instance is built by a factory
 * that fixes the Left type E. Left short-circuits everywhere.
 */

import type { $, EitherF, TypeFunction } from "../hkt.js";
import type { Functor } from "../typeclasses/functor.js";
import type { Applicative } from "../typeclasses/applicative.js";
import { makeMonad, type Monad } from "../typeclasses/monad.js";
import type { MonadError } from "../typeclasses/monad-error.js";
import type { Foldable } from "../typeclasses/foldable.js";
import type { Traverse } from "../typeclasses/traverse.js";
import * as E from "../data/either.js";
import type { Either } from "../data/either.js";

export function eitherFunctor<L>(): Functor<EitherF<L>> {
  return {
    map: <A, B>(fa: Either<L, A>, f: (a: A) => B): Either<L, B> => E.map(fa, f),
  };
}

export function eitherMonad<L>(): Monad<EitherF<L>> {
  return makeMonad<EitherF<L>>(
    eitherFunctor<L>().map,
    <A, B>(fa: Either<L, A>, f: (a: A) => Either<L, B>): Either<L, B> => E.flatMap(fa, f),
    <A>(a: A): Either<L, A> => E.Right<L, A>(a),
  );
}

export function eitherMonadError<L>(): MonadError<EitherF<L>, L> {
  return {
    ...eitherMonad<L>(),
    raiseError: <A>(e: L): Either<L, A> => E.Left<L, A>(e),
    handleErrorWith: <A>(fa: Either<L, A>, f: (e: L) => Either<L, A>): Either<L, A> =>
      E.isLeft(fa) ? f(fa.left) : fa,
  };
}

/**
 * A Right holds one element; a Left holds none.
 */
export function eitherFoldable<L>(): Foldable<EitherF<L>> {
  return {
    foldLeft: <A, B>(fa: Either<L, A>, b: B, f: (b: B, a: A) => B): B =>
      E.isRight(fa) ? f(b, fa.right) : b,
    foldRight: <A, B>(fa: Either<L, A>, b: B, f: (a: A, b: B) => B): B =>
      E.isRight(fa) ? f(fa.right, b) : b,
  };
}

export function eitherTraverse<L>(): Traverse<EitherF<L>> {
  return {
    ...eitherFunctor<L>(),
    ...eitherFoldable<L>(),
    traverse:
      <G extends TypeFunction>(G: Applicative<G>) =>
      <A, B>(fa: Either<L, A>, f: (a: A) => $<G, B>): $<G, Either<L, B>> =>
        E.isRight(fa)
          ? G.map<B, Either<L, B>>(f(fa.right), (b) => E.Right<L, B>(b))
          : G.pure<Either<L, B>>(fa),
  };
}
