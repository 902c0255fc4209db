/**
 * Functor Laws
 *
 * Functor Laws:
 *   - Identity: F.map(fa, a => a) === fa
 *   - Composition: F.map(F.map(fa, f), g) === F.map(fa, a => g(f(a)))
 *
 * @module
 */

import type { Functor } from "../typeclasses/functor.js";
import type { $, TypeFunction } from "../hkt.js";
import type { LawEq, LawSet } from "./types.js";

/**
 * Generate laws for a Functor instance, checked against the sample `fa`.
 *
 * @example
 * ```typescript
 * const laws = functorLaws(optionFunctor, getEq(eqNumber), (n) => n + 1, (n) => n * 2);
 * await assertLaws(laws, arbOption(arbInt()));
 * ```
 */
export function functorLaws<F extends TypeFunction, A>(
  F: Functor<F>,
  eq: LawEq<$<F, A>>,
  f: (a: A) => A,
  g: (a: A) => A,
): LawSet<$<F, A>> {
  return [
    {
      name: "functor identity",
      description: "Mapping identity preserves structure: F.map(fa, a => a) === fa",
      check: (fa) => eq.eqv(F.map<A, A>(fa, (a) => a), fa),
    },
    {
      name: "functor composition",
      description: "Mapping composes: F.map(F.map(fa, f), g) === F.map(fa, a => g(f(a)))",
      check: (fa) =>
        eq.eqv(
          F.map<A, A>(F.map<A, A>(fa, f), g),
          F.map<A, A>(fa, (a) => g(f(a))),
        ),
    },
  ];
}
