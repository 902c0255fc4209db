/**
 * Foldable Laws
 *
 * A lawful Foldable visits the same elements, in the same order, whichever
 * way it folds.
 *
 * @module
 */

import type { Foldable } from "../typeclasses/foldable.js";
import type { $, TypeFunction } from "../hkt.js";
import { eqArray, type Eq } from "../typeclasses/eq.js";
import type { LawSet } from "./types.js";

export function foldableLaws<F extends TypeFunction, A>(
  F: Foldable<F>,
  eq: Eq<A>,
): LawSet<$<F, A>> {
  const visited = eqArray(eq);
  return [
    {
      name: "foldable left/right consistency",
      description: "foldLeft and foldRight visit the same elements in the same order",
      check: (fa) => {
        const fromLeft = F.foldLeft<A, A[]>(fa, [], (acc, a) => [...acc, a]);
        const fromRight = F.foldRight<A, A[]>(fa, [], (a, acc) => [a, ...acc]);
        return visited.eqv(fromLeft, fromRight);
      },
    },
    {
      name: "foldable size consistency",
      description: "Counting with foldLeft agrees with counting with foldRight",
      check: (fa) => {
        const fromLeft = F.foldLeft<A, number>(fa, 0, (n) => n + 1);
        return fromLeft === F.foldRight<A, number>(fa, 0, (_, n) => n + 1);
      },
    },
  ];
}
