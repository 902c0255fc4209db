/**
 * @kindred/fp Law Definitions
 *
 * Laws are data: each generator returns a `LawSet` that `verifyLaws` or
 * `assertLaws` from @kindred/testing checks against generated samples.
 *
 * ```typescript
 * import { assertLaws, arbInt, arbOption } from "@kindred/testing";
 *
 * await assertLaws(
 *   functorLaws(optionFunctor, getEq(eqNumber), (n) => n + 1, (n) => n * 2),
 *   arbOption(arbInt()),
 * );
 * ```
 *
 * @module
 */

export type { Law, LawSet, LawEq } from "./types.js";
export { functorLaws } from "./functor.js";
export { monadLaws } from "./monad.js";
export { foldableLaws } from "./foldable.js";
export { traverseLaws } from "./traverse.js";
export { optionalAsyncLaws } from "./optional-async.js";
