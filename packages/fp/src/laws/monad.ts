/**
 * Monad Laws
 *
 * Monad Laws:
 *   - Left identity: M.flatMap(M.pure(a), f) === f(a)
 *   - Right identity: M.flatMap(fa, M.pure) === fa
 *   - Associativity: M.flatMap(M.flatMap(fa, f), g) === M.flatMap(fa, a => M.flatMap(f(a), g))
 *
 * @module
 */

import type { Monad } from "../typeclasses/monad.js";
import type { $, TypeFunction } from "../hkt.js";
import type { LawEq, LawSet } from "./types.js";

/**
 * Generate laws for a Monad instance. Each sample pairs a plain value (for
 * left identity) with a wrapped one.
 */
export function monadLaws<F extends TypeFunction, A>(
  M: Monad<F>,
  eq: LawEq<$<F, A>>,
  f: (a: A) => $<F, A>,
  g: (a: A) => $<F, A>,
): LawSet<readonly [A, $<F, A>]> {
  return [
    {
      name: "monad left identity",
      description: "M.flatMap(M.pure(a), f) === f(a)",
      check: ([a]) => eq.eqv(M.flatMap<A, A>(M.pure<A>(a), f), f(a)),
    },
    {
      name: "monad right identity",
      description: "M.flatMap(fa, M.pure) === fa",
      check: ([, fa]) => eq.eqv(M.flatMap<A, A>(fa, (a) => M.pure<A>(a)), fa),
    },
    {
      name: "monad associativity",
      description: "M.flatMap(M.flatMap(fa, f), g) === M.flatMap(fa, a => M.flatMap(f(a), g))",
      check: ([, fa]) =>
        eq.eqv(
          M.flatMap<A, A>(M.flatMap<A, A>(fa, f), g),
          M.flatMap<A, A>(fa, (a) => M.flatMap<A, A>(f(a), g)),
        ),
    },
  ];
}
