/**
 * @kindred/fp: typeclasses and data types for TypeScript
 *
 * Features:
 * - Typeclass hierarchy (Functor, Applicative, Monad, Foldable, Traverse, ...)
 *   over a higher-kinded type encoding
 * - Data types: Option, Either, Seq
 * - Instances for Option, Array, Seq, Promise, Either, Id and OptionAsync
 * - Async typeclasses that accept sync or async callbacks alike
 * - OptionAsync, an asynchronous Option
 * - Typeclass laws as data
 *
 * @example
 * ```typescript
 * import { Option, Some, Seq, sequence, optionTraverse, seqApplicative } from "@kindred/fp";
 *
 * const doubled = Option.map(Some(2), (x) => x * 2);
 *
 * sequence(optionTraverse)(seqApplicative)(Some(Seq.of(1, 2, 3)));
 * // → Seq(Some(1), Some(2), Some(3))
 * ```
 */

// ============================================================================
// HKT Foundation
// ============================================================================

export type {
  $,
  Kind,
  TypeFunction,
  ArrayF,
  PromiseF,
  OptionF,
  EitherF,
  SeqF,
  OptionAsyncF,
  Id,
  IdF,
} from "./hkt.js";

// ============================================================================
// Typeclasses - namespace export to avoid collisions
// ============================================================================

export * as TC from "./typeclasses/index.js";
export type {
  Functor,
  Apply,
  Applicative,
  FlatMap,
  Monad,
  ApplicativeError,
  MonadError,
  Foldable,
  Traverse,
  SemigroupK,
  MonoidK,
  Alternative,
  Semigroup,
  Monoid,
  Eq,
  Ord,
  Ordering,
  Show,
  Optional,
  Awaitable,
  FoldableAsync,
  BiFoldableAsync,
  OptionalAsync,
} from "./typeclasses/index.js";

export { sequence, traverseWithIndex, traverse_, sequence_ } from "./typeclasses/traverse.js";
export {
  eqStrict,
  eqBy,
  eqNumber,
  eqString,
  ordNumber,
  ordString,
} from "./typeclasses/eq.js";
export { showNumber, showString } from "./typeclasses/show.js";
export { semigroupSum, monoidSum, monoidString } from "./typeclasses/semigroup.js";

// ============================================================================
// Data Types
// ============================================================================

export {
  Option,
  Some,
  None,
  isSome,
  isNone,
  defined,
  unwrapDefined,
  type Defined,
  Either,
  Left,
  Right,
  isLeft,
  isRight,
  Seq,
  Seq1,
} from "./data/index.js";

// ============================================================================
// Instances
// ============================================================================

export * from "./instances/index.js";

// ============================================================================
// Async
// ============================================================================

export { OptionAsync } from "./async/option-async.js";

// ============================================================================
// Errors
// ============================================================================

export {
  ValueIsNoneError,
  ValueIsNullError,
  ResultIsNullError,
  BottomError,
  checkResult,
} from "./errors.js";

// ============================================================================
// Typeclass Laws
// ============================================================================

export * as Laws from "./laws/index.js";
export type { Law, LawSet, LawEq } from "./laws/index.js";
export {
  functorLaws,
  monadLaws,
  foldableLaws,
  traverseLaws,
  optionalAsyncLaws,
} from "./laws/index.js";
