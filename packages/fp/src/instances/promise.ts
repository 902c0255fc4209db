/**
 * Typeclass Instances for Promise, the task type
 *
 * A Promise starts running when it is created, so `ap` sees two computations
 * that are already in flight and only waits for both to settle.
 */

import type { PromiseF } from "../hkt.js";
import type { Functor } from "../typeclasses/functor.js";
import type { Applicative } from "../typeclasses/applicative.js";
import type { Monad } from "../typeclasses/monad.js";
import type { MonadError } from "../typeclasses/monad-error.js";

/**
 * Wait for both promises concurrently. Rejects as soon as either side does.
 */
export function zipPromises<A, B>(pa: Promise<A>, pb: Promise<B>): Promise<[A, B]> {
  return Promise.all([pa, pb]).then(() => pa.then((a) => pb.then((b): [A, B] => [a, b])));
}

export const promiseFunctor: Functor<PromiseF> = {
  map: <A, B>(fa: Promise<A>, f: (a: A) => B): Promise<B> => fa.then((a) => f(a)),
};

export const promiseApplicative: Applicative<PromiseF> = {
  ...promiseFunctor,
  ap: <A, B>(fab: Promise<(a: A) => B>, fa: Promise<A>): Promise<B> =>
    zipPromises(fab, fa).then(([f, a]) => f(a)),
  pure: <A>(a: A): Promise<A> => Promise.resolve(a),
};

export const promiseMonad: Monad<PromiseF> = {
  ...promiseApplicative,
  flatMap: <A, B>(fa: Promise<A>, f: (a: A) => Promise<B>): Promise<B> => fa.then((a) => f(a)),
};

/**
 * Rejections are the error channel; their reason is `unknown`.
 */
export const promiseMonadError: MonadError<PromiseF, unknown> = {
  ...promiseMonad,
  raiseError: <A>(e: unknown): Promise<A> => Promise.reject(e),
  handleErrorWith: <A>(fa: Promise<A>, f: (e: unknown) => Promise<A>): Promise<A> =>
    fa.catch((e: unknown) => f(e)),
};
