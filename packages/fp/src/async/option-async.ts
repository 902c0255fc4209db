/**
 * OptionAsync - an Option whose state is known once a promise settles
 *
 * An OptionAsync<A> wraps a `Promise<Option<A>>`. Construction starts the
 * computation immediately and the promise memoizes its result, so every
 * member can be called any number of times. `OptionAsync.lazy` defers the
 * computation until the value is first awaited; transformations chained onto
 * a lazy OptionAsync are lazy too.
 *
 * The class is a facade. Each member forwards to one of the OptionAsync
 * typeclass instances, or to a derived operation written once against a
 * typeclass, so the same code also serves any other async optional type.
 *
 * OptionAsync is not a thenable: `await` never unwraps it. Use `toOption()`.
 *
 * @example
 * ```typescript
 * const user = OptionAsync.someAsync(fetchUser(id))
 *   .map((u) => u.name)
 *   .filter((name) => name.length > 0);
 *
 * await user.match(
 *   (name) => `Hello, ${name}`,
 *   () => "Who are you?",
 * );
 * ```
 */

import type { Option } from "../data/option.js";
import { Some, fromNullable, getEq, getShow } from "../data/option.js";
import type { Either } from "../data/either.js";
import type { Seq } from "../data/seq.js";
import type { Eq } from "../typeclasses/eq.js";
import { eqStrict } from "../typeclasses/eq.js";
import type { Show } from "../typeclasses/show.js";
import { showDefault } from "../typeclasses/show.js";
import { tuple2 } from "../typeclasses/applicative.js";
import type { OptionAsyncF } from "../hkt.js";
import {
  biExistsAsync,
  biForAllAsync,
  biIterAsync,
  countAsync,
  existsAsync,
  forAllAsync,
  ifNoneAsync,
  ifNoneUnsafeAsync,
  ifSomeAsync,
  iterAsync,
  matchStrictAsync,
  matchUnsafeAsync,
  matchUntypedAsync,
  toArrayAsync,
  toEitherAsync,
  toSeqAsync,
  type Awaitable,
} from "../typeclasses/async.js";
import {
  optionAsyncApplicative,
  optionAsyncBiFoldable,
  optionAsyncFoldable,
  optionAsyncFunctor,
  optionAsyncMonad,
  optionAsyncMonoidK,
  optionAsyncOptional,
  continueWith,
} from "../instances/option-async.js";
import { zipPromises } from "../instances/promise.js";

function toPromise<A>(value: Awaitable<A>): Promise<A> {
  return new Promise<A>((resolve) => resolve(value));
}

/**
 * A value given directly, or a thunk producing it. A function-typed `A`
 * is always treated as a thunk.
 */
type ValueOrThunk<A> = A | (() => Awaitable<A>);

function isThunk<A>(value: ValueOrThunk<A>): value is () => Awaitable<A> {
  return typeof value === "function";
}

function force<A>(value: ValueOrThunk<A>): () => Awaitable<A> {
  return isThunk(value) ? value : () => value;
}

export class OptionAsync<A> {
  private promise: Promise<Option<A>> | undefined;
  private thunk: (() => Awaitable<Option<A>>) | undefined;

  private constructor(
    promise: Promise<Option<A>> | undefined,
    thunk?: () => Awaitable<Option<A>>,
  ) {
    this.promise = promise;
    this.thunk = thunk;
  }

  // ==========================================================================
  // Constructors
  // ==========================================================================

  static readonly None: OptionAsync<never> = new OptionAsync<never>(Promise.resolve(null));

  static none<A = never>(): OptionAsync<A> {
    return new OptionAsync<A>(Promise.resolve(null));
  }

  /**
   * Some(a). The result rejects with ValueIsNullError when `a` is null or
   * undefined.
   */
  static some<A>(a: A): OptionAsync<A> {
    return new OptionAsync<A>(new Promise<Option<A>>((resolve) => resolve(Some(a))));
  }

  /**
   * Some for a present value, None for `null`/`undefined`
   */
  static optional<A>(a: A | null | undefined): OptionAsync<A> {
    return new OptionAsync<A>(Promise.resolve(fromNullable(a)));
  }

  static fromOption<A>(opt: Option<A>): OptionAsync<A> {
    return new OptionAsync<A>(Promise.resolve(opt));
  }

  static fromPromise<A>(promise: PromiseLike<Option<A>>): OptionAsync<A> {
    return new OptionAsync<A>(toPromise(promise));
  }

  /**
   * Some of the promised value; rejects with ValueIsNullError when it
   * resolves to null or undefined
   */
  static someAsync<A>(value: Awaitable<A>): OptionAsync<A> {
    return new OptionAsync<A>(toPromise(value).then((a) => Some(a)));
  }

  /**
   * The first element as an Option: None for an empty iterable or a nullish
   * first element
   */
  static fromIterable<A>(as: Iterable<A | null | undefined>): OptionAsync<A> {
    for (const a of as) {
      return OptionAsync.optional(a);
    }
    return OptionAsync.none<A>();
  }

  /**
   * Defer `thunk` until a member first needs the value. The thunk runs at
   * most once.
   */
  static lazy<A>(thunk: () => Awaitable<Option<A>>): OptionAsync<A> {
    return new OptionAsync<A>(undefined, thunk);
  }

  // ==========================================================================
  // State
  // ==========================================================================

  /**
   * True while a lazily built OptionAsync has not started its computation
   */
  get isLazy(): boolean {
    return this.promise === undefined;
  }

  /**
   * The settled Option. Starts a lazy computation.
   */
  toOption(): Promise<Option<A>> {
    if (this.promise === undefined) {
      const thunk = this.thunk;
      this.thunk = undefined;
      this.promise = new Promise<Option<A>>((resolve) =>
        resolve(thunk === undefined ? null : thunk()),
      );
    }
    return this.promise;
  }

  isSome(): Promise<boolean> {
    return optionAsyncOptional.isSome<A>(this);
  }

  isNone(): Promise<boolean> {
    return optionAsyncOptional.isNone<A>(this);
  }

  /**
   * This if it is Some, otherwise `other`
   */
  or(other: OptionAsync<A>): OptionAsync<A> {
    return optionAsyncMonoidK.combineK<A>(this, other);
  }

  // ==========================================================================
  // Transformations
  // ==========================================================================

  map<B>(f: (a: A) => Awaitable<B>): OptionAsync<B> {
    return optionAsyncMonad.flatMap<A, B>(this, (a) => OptionAsync.someAsync<B>(f(a)));
  }

  flatMap<B>(f: (a: A) => OptionAsync<B>): OptionAsync<B> {
    return optionAsyncMonad.flatMap<A, B>(this, f);
  }

  /**
   * Bind, then combine the outer and inner values with `project`
   */
  flatMapWith<B, C>(
    bind: (a: A) => OptionAsync<B>,
    project: (a: A, b: B) => Awaitable<C>,
  ): OptionAsync<C> {
    return this.flatMap((a) => bind(a).map((b) => project(a, b)));
  }

  filter(predicate: (a: A) => Awaitable<boolean>): OptionAsync<A> {
    return optionAsyncMonad.flatMap<A, A>(this, (a) =>
      OptionAsync.fromPromise<A>(toPromise(predicate(a)).then((keep) => (keep ? a : null))),
    );
  }

  /**
   * Map both states into a Some. Rejects with ValueIsNullError when the
   * chosen handler yields null or undefined.
   */
  biMap<B>(some: (a: A) => Awaitable<B>, none: () => Awaitable<B>): OptionAsync<B> {
    return continueWith<A, B>(this, (o) =>
      toPromise(o !== null ? some(o) : none()).then((b) => Some(b)),
    );
  }

  /**
   * Some of `project(a, b)` when both sides are Some and their keys are equal
   */
  join<B, K, C>(
    inner: OptionAsync<B>,
    outerKey: (a: A) => K,
    innerKey: (b: B) => K,
    project: (a: A, b: B) => C,
  ): OptionAsync<C> {
    return tuple2<OptionAsyncF>(optionAsyncApplicative)<A, B>(this, inner)
      .filter(([a, b]) => outerKey(a) === innerKey(b))
      .map(([a, b]) => project(a, b));
  }

  /**
   * Apply the first argument of a two-argument function
   */
  parMap<B, C>(f: (a: A, b: B) => C): OptionAsync<(b: B) => C> {
    return optionAsyncFunctor.map<A, (b: B) => C>(this, (a) => (b) => f(a, b));
  }

  /**
   * Apply the first argument of a three-argument function, leaving the rest
   * curried
   */
  parMap3<B, C, D>(f: (a: A, b: B, c: C) => D): OptionAsync<(b: B) => (c: C) => D> {
    return optionAsyncFunctor.map<A, (b: B) => (c: C) => D>(this, (a) => (b) => (c) => f(a, b, c));
  }

  // ==========================================================================
  // Matching
  // ==========================================================================

  /**
   * Rejects with ResultIsNullError when the chosen handler yields null or
   * undefined
   */
  match<B>(some: (a: A) => Awaitable<B>, none: () => Awaitable<B>): Promise<B> {
    return matchStrictAsync(optionAsyncOptional)<A, B>(this, some, none);
  }

  matchUnsafe<B>(
    some: (a: A) => Awaitable<B | null | undefined>,
    none: () => Awaitable<B | null | undefined>,
  ): Promise<B | null | undefined> {
    return matchUnsafeAsync(optionAsyncOptional)<A, B>(this, some, none);
  }

  matchUntyped<B>(some: (a: unknown) => Awaitable<B>, none: () => Awaitable<B>): Promise<B> {
    return matchUntypedAsync(optionAsyncOptional)<A, B>(this, some, none);
  }

  // ==========================================================================
  // Side Effects
  // ==========================================================================

  ifSome(f: (a: A) => Awaitable<void>): Promise<void> {
    return ifSomeAsync(optionAsyncOptional)<A>(this, f);
  }

  /**
   * The value, or the fallback for None. Rejects with ResultIsNullError when
   * the fallback yields null or undefined.
   */
  ifNone(fallback: ValueOrThunk<A>): Promise<A> {
    return ifNoneAsync(optionAsyncOptional)<A>(this, force(fallback));
  }

  ifNoneUnsafe(fallback: ValueOrThunk<A | null | undefined>): Promise<A | null | undefined> {
    return ifNoneUnsafeAsync(optionAsyncOptional)<A>(this, force(fallback));
  }

  // ==========================================================================
  // Folds
  // ==========================================================================

  fold<S>(state: S, folder: (state: S, a: A) => Awaitable<S>): Promise<S> {
    return optionAsyncFoldable.foldLeftAsync<A, S>(this, state, folder);
  }

  foldBack<S>(state: S, folder: (state: S, a: A) => Awaitable<S>): Promise<S> {
    return optionAsyncFoldable.foldRightAsync<A, S>(this, state, (a, s) => folder(s, a));
  }

  biFold<S>(
    state: S,
    some: (state: S, a: A) => Awaitable<S>,
    none: (state: S) => Awaitable<S>,
  ): Promise<S> {
    return optionAsyncBiFoldable.biFoldAsync<A, S>(this, state, some, none);
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  count(): Promise<number> {
    return countAsync(optionAsyncFoldable)<A>(this);
  }

  /**
   * True for None
   */
  forAll(predicate: (a: A) => Awaitable<boolean>): Promise<boolean> {
    return forAllAsync(optionAsyncFoldable)<A>(this, predicate);
  }

  exists(predicate: (a: A) => Awaitable<boolean>): Promise<boolean> {
    return existsAsync(optionAsyncFoldable)<A>(this, predicate);
  }

  biForAll(
    some: (a: A) => Awaitable<boolean>,
    none: () => Awaitable<boolean>,
  ): Promise<boolean> {
    return biForAllAsync(optionAsyncBiFoldable)<A>(this, some, none);
  }

  biExists(
    some: (a: A) => Awaitable<boolean>,
    none: () => Awaitable<boolean>,
  ): Promise<boolean> {
    return biExistsAsync(optionAsyncBiFoldable)<A>(this, some, none);
  }

  iter(f: (a: A) => Awaitable<void>): Promise<void> {
    return iterAsync(optionAsyncFoldable)<A>(this, f);
  }

  biIter(some: (a: A) => Awaitable<void>, none: () => Awaitable<void>): Promise<void> {
    return biIterAsync(optionAsyncBiFoldable)<A>(this, some, none);
  }

  // ==========================================================================
  // Conversions
  // ==========================================================================

  toArray(): Promise<A[]> {
    return toArrayAsync(optionAsyncFoldable)<A>(this);
  }

  toSeq(): Promise<Seq<A>> {
    return toSeqAsync(optionAsyncFoldable)<A>(this);
  }

  toEither<L>(left: ValueOrThunk<L>): Promise<Either<L, A>> {
    return toEitherAsync(optionAsyncOptional)<L, A>(this, force(left));
  }

  /**
   * Resolves to `Some(x)` or `None`
   */
  show(S: Show<A> = showDefault<A>()): Promise<string> {
    return this.toOption().then((o) => getShow(S).show(o));
  }

  /**
   * Compare the settled Options of both sides
   */
  equals(other: OptionAsync<A>, E: Eq<A> = eqStrict<A>()): Promise<boolean> {
    return zipPromises(this.toOption(), other.toOption()).then(([x, y]) => getEq(E).eqv(x, y));
  }
}
