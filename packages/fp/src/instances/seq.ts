/**
 * Typeclass Instances for Seq
 *
 * Like Array, the Seq applicative is cartesian. `seqTraverse` walks the
 * items left to right through {@link traverseArray}, which runs in linear
 * time for any applicative.
 */

import type { $, SeqF, TypeFunction } from "../hkt.js";
import type { Functor } from "../typeclasses/functor.js";
import type { Applicative } from "../typeclasses/applicative.js";
import { makeMonad, type Monad } from "../typeclasses/monad.js";
import type { Foldable } from "../typeclasses/foldable.js";
import { sequence, type Traverse } from "../typeclasses/traverse.js";
import {
  makeAlternative,
  makeMonoidK,
  type Alternative,
  type MonoidK,
} from "../typeclasses/alternative.js";
import type { Option } from "../data/option.js";
import * as S from "../data/seq.js";
import type { Seq } from "../data/seq.js";
import { traverseArray } from "./array.js";
import { optionTraverse } from "./option.js";

export const seqFunctor: Functor<SeqF> = {
  map: <A, B>(fa: Seq<A>, f: (a: A) => B): Seq<B> => S.map(fa, f),
};

export const seqMonad: Monad<SeqF> = makeMonad<SeqF>(
  seqFunctor.map,
  <A, B>(fa: Seq<A>, f: (a: A) => Seq<B>): Seq<B> => S.flatMap(fa, f),
  <A>(a: A): Seq<A> => S.singleton(a),
);

export const seqApplicative: Applicative<SeqF> = seqMonad;

export const seqFoldable: Foldable<SeqF> = {
  foldLeft: <A, B>(fa: Seq<A>, b: B, f: (b: B, a: A) => B): B => S.foldLeft(fa, b, f),
  foldRight: <A, B>(fa: Seq<A>, b: B, f: (a: A, b: B) => B): B => S.foldRight(fa, b, f),
};

export const seqTraverse: Traverse<SeqF> = {
  ...seqFunctor,
  ...seqFoldable,
  traverse:
    <G extends TypeFunction>(G: Applicative<G>) =>
    <A, B>(fa: Seq<A>, f: (a: A) => $<G, B>): $<G, Seq<B>> =>
      G.map<B[], Seq<B>>(traverseArray(G)<A, B>(fa.items, f), S.fromArray),
};

export const seqMonoidK: MonoidK<SeqF> = makeMonoidK<SeqF>(
  <A>(x: Seq<A>, y: Seq<A>): Seq<A> => S.concat(x, y),
  <A>(): Seq<A> => S.empty<A>(),
);

export const seqAlternative: Alternative<SeqF> = makeAlternative(seqMonad, seqMonoidK);

/**
 * Turn an optional sequence into a sequence of options.
 *
 * ```typescript
 * sequenceSeq(None);              // Seq(None)
 * sequenceSeq(Some(Seq.empty())); // Seq()
 * sequenceSeq(Some(Seq.of(1, 2))); // Seq(Some(1), Some(2))
 * ```
 */
export function sequenceSeq<A>(fa: Option<Seq<A>>): Seq<Option<A>> {
  return sequence(optionTraverse)(seqApplicative)<A>(fa);
}
