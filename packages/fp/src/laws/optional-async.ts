/**
 * OptionalAsync Laws
 *
 * Values put in with `some`/`optional` come back out through `matchAsync`,
 * and `none` always takes the none branch.
 *
 * @module
 */

import type { OptionalAsync } from "../typeclasses/async.js";
import type { TypeFunction } from "../hkt.js";
import type { Eq } from "../typeclasses/eq.js";
import type { LawSet } from "./types.js";

/**
 * Generate laws for an OptionalAsync instance. Samples must be non-null.
 */
export function optionalAsyncLaws<F extends TypeFunction, A>(
  O: OptionalAsync<F>,
  eq: Eq<A>,
): LawSet<A> {
  return [
    {
      name: "some round-trip",
      description: "matchAsync(some(a), x => x, ...) resolves to a",
      check: async (a) => {
        const out = await O.matchAsync<A, A | null>(O.some<A>(a), (x) => x, () => null);
        return out !== null && eq.eqv(out, a);
      },
    },
    {
      name: "none takes the none branch",
      description: "matchAsync(none(), ...) runs the none handler",
      check: () => O.matchAsync<A, boolean>(O.none<A>(), () => false, () => true),
    },
    {
      name: "optional of a present value is some",
      description: "isSome(optional(a)) and not isNone(optional(a))",
      check: async (a) => {
        const fa = O.optional<A>(a);
        return (await O.isSome<A>(fa)) && !(await O.isNone<A>(fa));
      },
    },
    {
      name: "optional of null is none",
      description: "isNone(optional(null))",
      check: () => O.isNone<A>(O.optional<A>(null)),
    },
  ];
}
