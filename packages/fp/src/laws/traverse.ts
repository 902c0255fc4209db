/**
 * Traverse Laws
 *
 * Traverse Laws:
 *   - Identity: traverse(Id)(fa, a => a) === fa
 *   - Purity: traverse(G)(fa, G.pure) === G.pure(fa)
 *   - Sequence: sequence(G)(map(fa, G.pure)) === traverse(G)(fa, G.pure)
 *
 * @module
 */

import type { Traverse } from "../typeclasses/traverse.js";
import { sequence } from "../typeclasses/traverse.js";
import type { Applicative } from "../typeclasses/applicative.js";
import type { $, IdF, TypeFunction } from "../hkt.js";
import { idMonad } from "../instances/id.js";
import type { LawEq, LawSet } from "./types.js";

/**
 * Generate laws for a Traverse instance. The purity and sequence laws run
 * through the applicative `G`, compared with `eqG`.
 */
export function traverseLaws<F extends TypeFunction, G extends TypeFunction, A>(
  T: Traverse<F>,
  eq: LawEq<$<F, A>>,
  G: Applicative<G>,
  eqG: LawEq<$<G, $<F, A>>>,
): LawSet<$<F, A>> {
  return [
    {
      name: "traverse identity",
      description: "Traversing with the identity applicative is a no-op",
      check: (fa) => eq.eqv(T.traverse<IdF>(idMonad)<A, A>(fa, (a) => a), fa),
    },
    {
      name: "traverse purity",
      description: "traverse(G)(fa, G.pure) === G.pure(fa)",
      check: (fa) =>
        eqG.eqv(T.traverse(G)<A, A>(fa, (a) => G.pure<A>(a)), G.pure<$<F, A>>(fa)),
    },
    {
      name: "sequence is traverse with identity",
      description: "sequence(G)(map(fa, G.pure)) === traverse(G)(fa, G.pure)",
      check: (fa) =>
        eqG.eqv(
          sequence(T)(G)<A>(T.map<A, $<G, A>>(fa, (a) => G.pure<A>(a))),
          T.traverse(G)<A, A>(fa, (a) => G.pure<A>(a)),
        ),
    },
  ];
}
