/**
 * Typeclass Instances
 *
 * Dictionaries for every container type. Pass them to the derived
 * operations in `../typeclasses`:
 *
 * ```typescript
 * sequence(optionTraverse)(seqApplicative)(Some(Seq.of(1, 2)));
 * // → Seq(Some(1), Some(2))
 * ```
 */

export {
  optionFunctor,
  optionMonad,
  optionFoldable,
  optionTraverse,
  optionMonoidK,
  optionAlternative,
  optionOptional,
} from "./option.js";

export {
  arrayFunctor,
  arrayMonad,
  arrayFoldable,
  arrayTraverse,
  arrayMonoidK,
  traverseArray,
} from "./array.js";

export {
  seqFunctor,
  seqMonad,
  seqApplicative,
  seqFoldable,
  seqTraverse,
  seqMonoidK,
  seqAlternative,
  sequenceSeq,
} from "./seq.js";

export {
  promiseFunctor,
  promiseApplicative,
  promiseMonad,
  promiseMonadError,
  zipPromises,
} from "./promise.js";

export {
  eitherFunctor,
  eitherMonad,
  eitherMonadError,
  eitherFoldable,
  eitherTraverse,
} from "./either.js";

export { idMonad, idTraverse } from "./id.js";

export {
  optionAsyncFunctor,
  optionAsyncApplicative,
  optionAsyncMonad,
  optionAsyncMonoidK,
  optionAsyncAlternative,
  optionAsyncFoldable,
  optionAsyncBiFoldable,
  optionAsyncOptional,
} from "./option-async.js";
