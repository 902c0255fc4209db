/**
 * Typeclass Instances for OptionAsync
 *
 * These dictionaries carry all of OptionAsync's behavior; the class itself
 * only forwards to them. Each operation reads the settled Option through
 * `toOption()` and wraps the follow-up promise in a new OptionAsync, which
 * stays lazy while its source is.
 */

import type { OptionAsyncF } from "../hkt.js";
import type { Functor } from "../typeclasses/functor.js";
import type { Applicative } from "../typeclasses/applicative.js";
import type { Monad } from "../typeclasses/monad.js";
import {
  makeAlternative,
  makeMonoidK,
  type Alternative,
  type MonoidK,
} from "../typeclasses/alternative.js";
import type {
  Awaitable,
  BiFoldableAsync,
  FoldableAsync,
  OptionalAsync,
} from "../typeclasses/async.js";
import { Some, type Option } from "../data/option.js";
import { OptionAsync } from "../async/option-async.js";
import { zipPromises } from "./promise.js";

/**
 * Build the OptionAsync that continues `run`. When any source is still lazy
 * the result is lazy as well, so chaining onto `OptionAsync.lazy` starts
 * nothing until the result itself is awaited.
 */
function continueFrom<B>(
  sources: readonly { readonly isLazy: boolean }[],
  run: () => Promise<Option<B>>,
): OptionAsync<B> {
  return sources.some((s) => s.isLazy)
    ? OptionAsync.lazy<B>(run)
    : OptionAsync.fromPromise<B>(run());
}

/**
 * Continue from the settled Option of `fa`
 */
export function continueWith<A, B>(
  fa: OptionAsync<A>,
  next: (o: Option<A>) => Awaitable<Option<B>>,
): OptionAsync<B> {
  return continueFrom<B>([fa], () => fa.toOption().then<Option<B>>(next));
}

export const optionAsyncFunctor: Functor<OptionAsyncF> = {
  map: <A, B>(fa: OptionAsync<A>, f: (a: A) => B): OptionAsync<B> =>
    continueWith<A, B>(fa, (o) => (o !== null ? Some(f(o)) : null)),
};

/**
 * `ap` starts both sides before waiting on either. None on either side gives
 * None.
 */
export const optionAsyncApplicative: Applicative<OptionAsyncF> = {
  ...optionAsyncFunctor,
  ap: <A, B>(fab: OptionAsync<(a: A) => B>, fa: OptionAsync<A>): OptionAsync<B> =>
    continueFrom<B>([fab, fa], () =>
      zipPromises(fab.toOption(), fa.toOption()).then<Option<B>>(([f, a]) =>
        f !== null && a !== null ? Some(f(a)) : null,
      ),
    ),
  pure: <A>(a: A): OptionAsync<A> => OptionAsync.some(a),
};

export const optionAsyncMonad: Monad<OptionAsyncF> = {
  ...optionAsyncApplicative,
  flatMap: <A, B>(fa: OptionAsync<A>, f: (a: A) => OptionAsync<B>): OptionAsync<B> =>
    continueWith<A, B>(fa, (o) => (o !== null ? f(o).toOption() : null)),
};

/**
 * Coalescing: the left side if it is Some, otherwise the right side. The
 * right side is only awaited when the left side settles to None.
 */
export const optionAsyncMonoidK: MonoidK<OptionAsyncF> = makeMonoidK<OptionAsyncF>(
  <A>(x: OptionAsync<A>, y: OptionAsync<A>): OptionAsync<A> =>
    continueWith<A, A>(x, (o) => (o !== null ? o : y.toOption())),
  <A>(): OptionAsync<A> => OptionAsync.none<A>(),
);

export const optionAsyncAlternative: Alternative<OptionAsyncF> = makeAlternative(
  optionAsyncMonad,
  optionAsyncMonoidK,
);

export const optionAsyncFoldable: FoldableAsync<OptionAsyncF> = {
  foldLeftAsync: <A, S>(
    fa: OptionAsync<A>,
    state: S,
    f: (state: S, a: A) => Awaitable<S>,
  ): Promise<S> => fa.toOption().then<S>((o) => (o !== null ? f(state, o) : state)),
  foldRightAsync: <A, S>(
    fa: OptionAsync<A>,
    state: S,
    f: (a: A, state: S) => Awaitable<S>,
  ): Promise<S> => fa.toOption().then<S>((o) => (o !== null ? f(o, state) : state)),
};

export const optionAsyncBiFoldable: BiFoldableAsync<OptionAsyncF> = {
  biFoldAsync: <A, S>(
    fa: OptionAsync<A>,
    state: S,
    some: (state: S, a: A) => Awaitable<S>,
    none: (state: S) => Awaitable<S>,
  ): Promise<S> => fa.toOption().then<S>((o) => (o !== null ? some(state, o) : none(state))),
};

export const optionAsyncOptional: OptionalAsync<OptionAsyncF> = {
  isSome: <A>(fa: OptionAsync<A>): Promise<boolean> => fa.toOption().then((o) => o !== null),
  isNone: <A>(fa: OptionAsync<A>): Promise<boolean> => fa.toOption().then((o) => o === null),
  matchAsync: <A, B>(
    fa: OptionAsync<A>,
    some: (a: A) => Awaitable<B>,
    none: () => Awaitable<B>,
  ): Promise<B> => fa.toOption().then<B>((o) => (o !== null ? some(o) : none())),
  some: <A>(a: A): OptionAsync<A> => OptionAsync.some(a),
  none: <A>(): OptionAsync<A> => OptionAsync.none<A>(),
  optional: <A>(a: A | null | undefined): OptionAsync<A> => OptionAsync.optional(a),
};
