/**
 * Async Typeclasses
 *
 * Counterparts of Foldable and Optional for structures whose contents are
 * only known once a promise settles. Every callback may answer synchronously
 * or with a promise (`Awaitable<B>`); every result is a promise. Derived
 * operations are written once here and shared by all instances.
 *
 * @example
 * ```typescript
 * const count = countAsync(optionAsyncFoldable);
 * await count(OptionAsync.some(1)); // → 1
 * ```
 */

import type { $, TypeFunction } from "../hkt.js";
import type { Option } from "../data/option.js";
import { Left, Right, type Either } from "../data/either.js";
import { fromArray, type Seq } from "../data/seq.js";
import { checkResult } from "../errors.js";

/**
 * A value, or a promise of one.
 */
export type Awaitable<A> = A | PromiseLike<A>;

// ============================================================================
// FoldableAsync
// ============================================================================

export interface FoldableAsync<F extends TypeFunction> {
  readonly foldLeftAsync: <A, S>(
    fa: $<F, A>,
    state: S,
    f: (state: S, a: A) => Awaitable<S>,
  ) => Promise<S>;
  readonly foldRightAsync: <A, S>(
    fa: $<F, A>,
    state: S,
    f: (a: A, state: S) => Awaitable<S>,
  ) => Promise<S>;
}

/**
 * Number of elements
 */
export function countAsync<F extends TypeFunction>(
  F: FoldableAsync<F>,
): <A>(fa: $<F, A>) => Promise<number> {
  return <A>(fa: $<F, A>) => F.foldLeftAsync<A, number>(fa, 0, (n) => n + 1);
}

export function existsAsync<F extends TypeFunction>(
  F: FoldableAsync<F>,
): <A>(fa: $<F, A>, p: (a: A) => Awaitable<boolean>) => Promise<boolean> {
  return <A>(fa: $<F, A>, p: (a: A) => Awaitable<boolean>) =>
    F.foldLeftAsync<A, boolean>(fa, false, (acc, a) => (acc ? true : p(a)));
}

/**
 * True when every element satisfies `p` (vacuously true when empty)
 */
export function forAllAsync<F extends TypeFunction>(
  F: FoldableAsync<F>,
): <A>(fa: $<F, A>, p: (a: A) => Awaitable<boolean>) => Promise<boolean> {
  return <A>(fa: $<F, A>, p: (a: A) => Awaitable<boolean>) =>
    F.foldLeftAsync<A, boolean>(fa, true, (acc, a) => (acc ? p(a) : false));
}

export function iterAsync<F extends TypeFunction>(
  F: FoldableAsync<F>,
): <A>(fa: $<F, A>, f: (a: A) => Awaitable<void>) => Promise<void> {
  return async <A>(fa: $<F, A>, f: (a: A) => Awaitable<void>) => {
    await F.foldLeftAsync<A, void>(fa, undefined, async (_, a) => {
      await f(a);
    });
  };
}

export function toArrayAsync<F extends TypeFunction>(
  F: FoldableAsync<F>,
): <A>(fa: $<F, A>) => Promise<A[]> {
  return <A>(fa: $<F, A>) =>
    F.foldLeftAsync<A, A[]>(fa, [], (acc, a) => {
      acc.push(a);
      return acc;
    });
}

export function toSeqAsync<F extends TypeFunction>(
  F: FoldableAsync<F>,
): <A>(fa: $<F, A>) => Promise<Seq<A>> {
  return async <A>(fa: $<F, A>) => fromArray(await toArrayAsync(F)<A>(fa));
}

// ============================================================================
// BiFoldableAsync
// ============================================================================

/**
 * Fold over a two-state structure, with a folder for each state.
 */
export interface BiFoldableAsync<F extends TypeFunction> {
  readonly biFoldAsync: <A, S>(
    fa: $<F, A>,
    state: S,
    some: (state: S, a: A) => Awaitable<S>,
    none: (state: S) => Awaitable<S>,
  ) => Promise<S>;
}

export function biExistsAsync<F extends TypeFunction>(
  F: BiFoldableAsync<F>,
): <A>(
  fa: $<F, A>,
  some: (a: A) => Awaitable<boolean>,
  none: () => Awaitable<boolean>,
) => Promise<boolean> {
  return <A>(fa: $<F, A>, some: (a: A) => Awaitable<boolean>, none: () => Awaitable<boolean>) =>
    F.biFoldAsync<A, boolean>(
      fa,
      false,
      (acc, a) => (acc ? true : some(a)),
      (acc) => (acc ? true : none()),
    );
}

export function biForAllAsync<F extends TypeFunction>(
  F: BiFoldableAsync<F>,
): <A>(
  fa: $<F, A>,
  some: (a: A) => Awaitable<boolean>,
  none: () => Awaitable<boolean>,
) => Promise<boolean> {
  return <A>(fa: $<F, A>, some: (a: A) => Awaitable<boolean>, none: () => Awaitable<boolean>) =>
    F.biFoldAsync<A, boolean>(
      fa,
      true,
      (acc, a) => (acc ? some(a) : false),
      (acc) => (acc ? none() : false),
    );
}

export function biIterAsync<F extends TypeFunction>(
  F: BiFoldableAsync<F>,
): <A>(fa: $<F, A>, some: (a: A) => Awaitable<void>, none: () => Awaitable<void>) => Promise<void> {
  return async <A>(
    fa: $<F, A>,
    some: (a: A) => Awaitable<void>,
    none: () => Awaitable<void>,
  ) => {
    await F.biFoldAsync<A, void>(
      fa,
      undefined,
      async (_, a) => {
        await some(a);
      },
      async () => {
        await none();
      },
    );
  };
}

// ============================================================================
// OptionalAsync
// ============================================================================

export interface OptionalAsync<F extends TypeFunction> {
  readonly isSome: <A>(fa: $<F, A>) => Promise<boolean>;
  readonly isNone: <A>(fa: $<F, A>) => Promise<boolean>;
  /** Raw match: handler results pass through unchecked */
  readonly matchAsync: <A, B>(
    fa: $<F, A>,
    some: (a: A) => Awaitable<B>,
    none: () => Awaitable<B>,
  ) => Promise<B>;
  readonly some: <A>(a: A) => $<F, A>;
  readonly none: <A>() => $<F, A>;
  readonly optional: <A>(a: A | null | undefined) => $<F, A>;
}

/**
 * Match, rejecting with ResultIsNullError when the chosen handler yields
 * `null` or `undefined`
 */
export function matchStrictAsync<F extends TypeFunction>(
  O: OptionalAsync<F>,
): <A, B>(
  fa: $<F, A>,
  some: (a: A) => Awaitable<B | null | undefined>,
  none: () => Awaitable<B | null | undefined>,
) => Promise<B> {
  return async <A, B>(
    fa: $<F, A>,
    some: (a: A) => Awaitable<B | null | undefined>,
    none: () => Awaitable<B | null | undefined>,
  ) => checkResult(await O.matchAsync<A, B | null | undefined>(fa, some, none));
}

/**
 * Match allowing `null`/`undefined` results
 */
export function matchUnsafeAsync<F extends TypeFunction>(
  O: OptionalAsync<F>,
): <A, B>(
  fa: $<F, A>,
  some: (a: A) => Awaitable<B | null | undefined>,
  none: () => Awaitable<B | null | undefined>,
) => Promise<B | null | undefined> {
  return <A, B>(
    fa: $<F, A>,
    some: (a: A) => Awaitable<B | null | undefined>,
    none: () => Awaitable<B | null | undefined>,
  ) => O.matchAsync<A, B | null | undefined>(fa, some, none);
}

export function matchUntypedAsync<F extends TypeFunction>(
  O: OptionalAsync<F>,
): <A, B>(
  fa: $<F, A>,
  some: (a: unknown) => Awaitable<B>,
  none: () => Awaitable<B>,
) => Promise<B> {
  return <A, B>(fa: $<F, A>, some: (a: unknown) => Awaitable<B>, none: () => Awaitable<B>) =>
    O.matchAsync<A, B>(fa, some, none);
}

/**
 * The value, or the fallback's result; rejects with ResultIsNullError if the
 * fallback yields `null`/`undefined`
 */
export function ifNoneAsync<F extends TypeFunction>(
  O: OptionalAsync<F>,
): <A>(fa: $<F, A>, fallback: () => Awaitable<A | null | undefined>) => Promise<A> {
  return <A>(fa: $<F, A>, fallback: () => Awaitable<A | null | undefined>) =>
    matchStrictAsync(O)<A, A>(fa, (a) => a, fallback);
}

export function ifNoneUnsafeAsync<F extends TypeFunction>(
  O: OptionalAsync<F>,
): <A>(
  fa: $<F, A>,
  fallback: () => Awaitable<A | null | undefined>,
) => Promise<A | null | undefined> {
  return <A>(fa: $<F, A>, fallback: () => Awaitable<A | null | undefined>) =>
    matchUnsafeAsync(O)<A, A>(fa, (a) => a, fallback);
}

export function ifSomeAsync<F extends TypeFunction>(
  O: OptionalAsync<F>,
): <A>(fa: $<F, A>, f: (a: A) => Awaitable<void>) => Promise<void> {
  return <A>(fa: $<F, A>, f: (a: A) => Awaitable<void>) =>
    O.matchAsync<A, void>(fa, f, () => undefined);
}

export function toEitherAsync<F extends TypeFunction>(
  O: OptionalAsync<F>,
): <L, A>(fa: $<F, A>, left: () => Awaitable<L>) => Promise<Either<L, A>> {
  return <L, A>(fa: $<F, A>, left: () => Awaitable<L>) =>
    O.matchAsync<A, Either<L, A>>(
      fa,
      (a) => Right(a),
      async () => Left(await left()),
    );
}

export function toOptionAsync<F extends TypeFunction>(
  O: OptionalAsync<F>,
): <A>(fa: $<F, A>) => Promise<Option<A>> {
  return <A>(fa: $<F, A>) =>
    O.matchAsync<A, Option<A>>(
      fa,
      (a) => a,
      () => null,
    );
}
