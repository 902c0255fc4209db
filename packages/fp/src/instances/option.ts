/**
 * Typeclass Instances for Option
 *
 * Option<A> is `A | null` at runtime, so every instance below works on bare
 * values: Some(42) is 42 and None is null.
 */

import type { $, OptionF, TypeFunction } from "../hkt.js";
import type { Functor } from "../typeclasses/functor.js";
import type { Applicative } from "../typeclasses/applicative.js";
import { makeMonad, type Monad } from "../typeclasses/monad.js";
import type { Foldable } from "../typeclasses/foldable.js";
import type { Traverse } from "../typeclasses/traverse.js";
import {
  makeAlternative,
  makeMonoidK,
  type Alternative,
  type MonoidK,
} from "../typeclasses/alternative.js";
import type { Optional } from "../typeclasses/optional.js";
import { Some, fromNullable, type Option } from "../data/option.js";

export const optionFunctor: Functor<OptionF> = {
  map: <A, B>(fa: Option<A>, f: (a: A) => B): Option<B> => (fa !== null ? f(fa) : null),
};

export const optionMonad: Monad<OptionF> = makeMonad<OptionF>(
  optionFunctor.map,
  <A, B>(fa: Option<A>, f: (a: A) => Option<B>): Option<B> => (fa !== null ? f(fa) : null),
  <A>(a: A): Option<A> => Some(a),
);

export const optionFoldable: Foldable<OptionF> = {
  foldLeft: <A, B>(fa: Option<A>, b: B, f: (b: B, a: A) => B): B => (fa !== null ? f(b, fa) : b),
  foldRight: <A, B>(fa: Option<A>, b: B, f: (a: A, b: B) => B): B => (fa !== null ? f(fa, b) : b),
};

/**
 * None traverses to `G.pure(None)`; Some(a) maps `f(a)` back into Some.
 */
export const optionTraverse: Traverse<OptionF> = {
  ...optionFunctor,
  ...optionFoldable,
  traverse:
    <G extends TypeFunction>(G: Applicative<G>) =>
    <A, B>(fa: Option<A>, f: (a: A) => $<G, B>): $<G, Option<B>> =>
      fa !== null ? G.map<B, Option<B>>(f(fa), (b) => b) : G.pure<Option<B>>(null),
};

/**
 * First Some wins
 */
export const optionMonoidK: MonoidK<OptionF> = makeMonoidK<OptionF>(
  <A>(x: Option<A>, y: Option<A>): Option<A> => (x !== null ? x : y),
  <A>(): Option<A> => null,
);

export const optionAlternative: Alternative<OptionF> = makeAlternative(optionMonad, optionMonoidK);

export const optionOptional: Optional<OptionF> = {
  isSome: <A>(fa: Option<A>): boolean => fa !== null,
  isNone: <A>(fa: Option<A>): boolean => fa === null,
  match: <A, B>(fa: Option<A>, some: (a: A) => B, none: () => B): B =>
    fa !== null ? some(fa) : none(),
  some: <A>(a: A): Option<A> => Some(a),
  none: <A>(): Option<A> => null,
  optional: <A>(a: A | null | undefined): Option<A> => fromNullable(a),
};
