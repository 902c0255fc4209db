/**
 * Typeclass Instances for Array
 *
 * The Array applicative is cartesian: `ap(fs, as)` applies every function to
 * every value, functions in the outer loop.
 */

import type { $, ArrayF, TypeFunction } from "../hkt.js";
import type { Functor } from "../typeclasses/functor.js";
import type { Applicative } from "../typeclasses/applicative.js";
import { makeMonad, type Monad } from "../typeclasses/monad.js";
import { makeFoldable, type Foldable } from "../typeclasses/foldable.js";
import { makeTraverse, type Traverse } from "../typeclasses/traverse.js";
import { makeMonoidK, type MonoidK } from "../typeclasses/alternative.js";

// ============================================================================
// Linear Traversal
// ============================================================================

type Cons<B> = readonly [] | readonly [head: B, tail: Cons<B>];

function consToArray<B>(list: Cons<B>): B[] {
  const out: B[] = [];
  let cell: Cons<B> = list;
  while (cell.length === 2) {
    out.push(cell[0]);
    cell = cell[1];
  }
  return out.reverse();
}

/**
 * Traverse a readonly array left to right inside `G`.
 *
 * Results are accumulated as a cons list and reversed once at the end, so
 * each branch of a non-deterministic `G` shares its prefix instead of
 * copying it. The empty list is `[]` rather than null, since some
 * applicatives (Option) cannot hold null.
 */
export function traverseArray<G extends TypeFunction>(
  G: Applicative<G>,
): <A, B>(as: readonly A[], f: (a: A) => $<G, B>) => $<G, B[]> {
  return <A, B>(as: readonly A[], f: (a: A) => $<G, B>): $<G, B[]> => {
    let acc = G.pure<Cons<B>>([]);
    for (const a of as) {
      acc = G.ap<B, Cons<B>>(
        G.map<Cons<B>, (b: B) => Cons<B>>(acc, (tail) => (head) => [head, tail]),
        f(a),
      );
    }
    return G.map<Cons<B>, B[]>(acc, consToArray);
  };
}

// ============================================================================
// Instances
// ============================================================================

export const arrayFunctor: Functor<ArrayF> = {
  map: <A, B>(fa: A[], f: (a: A) => B): B[] => fa.map((a) => f(a)),
};

export const arrayMonad: Monad<ArrayF> = makeMonad<ArrayF>(
  arrayFunctor.map,
  <A, B>(fa: A[], f: (a: A) => B[]): B[] => fa.flatMap((a) => f(a)),
  <A>(a: A): A[] => [a],
);

export const arrayFoldable: Foldable<ArrayF> = makeFoldable<ArrayF>(
  <A, B>(fa: A[], b: B, f: (b: B, a: A) => B): B => fa.reduce(f, b),
  <A, B>(fa: A[], b: B, f: (a: A, b: B) => B): B => fa.reduceRight((acc, a) => f(a, acc), b),
);

export const arrayTraverse: Traverse<ArrayF> = makeTraverse<ArrayF>(
  arrayFunctor.map,
  arrayFoldable.foldLeft,
  arrayFoldable.foldRight,
  traverseArray,
);

export const arrayMonoidK: MonoidK<ArrayF> = makeMonoidK<ArrayF>(
  <A>(x: A[], y: A[]): A[] => [...x, ...y],
  <A>(): A[] => [],
);
