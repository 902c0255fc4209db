/**
 * Typeclass Instances for the identity type
 *
 * `Kind<IdF, A>` is `A`, so these instances apply functions directly. They let
 * generic code such as `traverse` run with no effect at all.
 */

import type { $, IdF, TypeFunction } from "../hkt.js";
import type { Applicative } from "../typeclasses/applicative.js";
import type { Monad } from "../typeclasses/monad.js";
import type { Traverse } from "../typeclasses/traverse.js";

export const idMonad: Monad<IdF> = {
  map: <A, B>(fa: A, f: (a: A) => B): B => f(fa),
  ap: <A, B>(fab: (a: A) => B, fa: A): B => fab(fa),
  pure: <A>(a: A): A => a,
  flatMap: <A, B>(fa: A, f: (a: A) => B): B => f(fa),
};

export const idTraverse: Traverse<IdF> = {
  map: idMonad.map,
  foldLeft: <A, B>(fa: A, b: B, f: (b: B, a: A) => B): B => f(b, fa),
  foldRight: <A, B>(fa: A, b: B, f: (a: A, b: B) => B): B => f(fa, b),
  traverse:
    <G extends TypeFunction>(_G: Applicative<G>) =>
    <A, B>(fa: A, f: (a: A) => $<G, B>): $<G, B> =>
      f(fa),
};
