/**
 * Traverse Typeclass
 *
 * Traverse extends Functor and Foldable with the ability to traverse
 * a structure while accumulating effects.
 *
 * `sequence` is the operation most callers want: it turns a structure of
 * effects inside out, e.g. `Option<Seq<A>>` into `Seq<Option<A>>`, using the
 * Traverse of the outer shape and the Applicative of the inner one.
 *
 * Laws:
 *   - Identity: traverse(Id)(fa, a => a) === fa
 *   - Purity: traverse(G)(fa, G.pure) === G.pure(fa)
 *   - Naturality: t(traverse(G)(fa, f)) === traverse(H)(fa, t . f) for any applicative
 *     transformation t
 */

import type { Applicative } from "./applicative.js";
import type { Functor } from "./functor.js";
import type { Foldable } from "./foldable.js";
import type { MonoidK } from "./alternative.js";
import type { $, TypeFunction } from "../hkt.js";

// ============================================================================
// Traverse
// ============================================================================

export interface Traverse<F extends TypeFunction> extends Functor<F>, Foldable<F> {
  readonly traverse: <G extends TypeFunction>(
    G: Applicative<G>,
  ) => <A, B>(fa: $<F, A>, f: (a: A) => $<G, B>) => $<G, $<F, B>>;
}

// ============================================================================
// Derived Operations
// ============================================================================

/**
 * Sequence a structure of effects into an effect of structure
 *
 * @example
 * ```typescript
 * sequence(optionTraverse)(seqApplicative)(Some(Seq.of(1, 2)));
 * // → Seq(Some(1), Some(2))
 *
 * sequence(seqTraverse)(optionMonad)(Seq.of(Some(1), None));
 * // → None
 * ```
 */
export function sequence<F extends TypeFunction>(
  F: Traverse<F>,
): <G extends TypeFunction>(G: Applicative<G>) => <A>(fga: $<F, $<G, A>>) => $<G, $<F, A>> {
  return <G extends TypeFunction>(G: Applicative<G>) =>
    <A>(fga: $<F, $<G, A>>) =>
      F.traverse(G)<$<G, A>, A>(fga, (ga) => ga);
}

/**
 * Traverse with the element's position in visiting order
 */
export function traverseWithIndex<F extends TypeFunction>(
  F: Traverse<F>,
): <G extends TypeFunction>(
  G: Applicative<G>,
) => <A, B>(fa: $<F, A>, f: (i: number, a: A) => $<G, B>) => $<G, $<F, B>> {
  return <G extends TypeFunction>(G: Applicative<G>) =>
    <A, B>(fa: $<F, A>, f: (i: number, a: A) => $<G, B>) => {
      let index = 0;
      return F.traverse(G)<A, B>(fa, (a) => f(index++, a));
    };
}

/**
 * Map each element to an action, evaluate actions left-to-right,
 * and ignore the results
 */
export function traverse_<F extends TypeFunction>(
  F: Traverse<F>,
): <G extends TypeFunction>(
  G: Applicative<G>,
) => <A, B>(fa: $<F, A>, f: (a: A) => $<G, B>) => $<G, void> {
  return <G extends TypeFunction>(G: Applicative<G>) =>
    <A, B>(fa: $<F, A>, f: (a: A) => $<G, B>) =>
      G.map<$<F, B>, void>(F.traverse(G)<A, B>(fa, f), () => undefined);
}

/**
 * Evaluate effects in structure left-to-right and ignore the results
 */
export function sequence_<F extends TypeFunction>(
  F: Traverse<F>,
): <G extends TypeFunction>(G: Applicative<G>) => <A>(fga: $<F, $<G, A>>) => $<G, void> {
  return <G extends TypeFunction>(G: Applicative<G>) =>
    <A>(fga: $<F, $<G, A>>) =>
      traverse_(F)(G)<$<G, A>, A>(fga, (ga) => ga);
}

/**
 * Traverse with a function returning a nested structure, then flatten the
 * inner layer by combining with MonoidK.
 *
 * @example
 * ```typescript
 * flatTraverseK(seqTraverse, seqMonoidK)(optionMonad)(
 *   Seq.of(1, 2),
 *   (n) => Some(Seq.of(n, n)),
 * );
 * // → Some(Seq(1, 1, 2, 2))
 * ```
 */
export function flatTraverseK<F extends TypeFunction>(
  F: Traverse<F>,
  MK: MonoidK<F>,
): <G extends TypeFunction>(
  G: Applicative<G>,
) => <A, B>(fa: $<F, A>, f: (a: A) => $<G, $<F, B>>) => $<G, $<F, B>> {
  return <G extends TypeFunction>(G: Applicative<G>) =>
    <A, B>(fa: $<F, A>, f: (a: A) => $<G, $<F, B>>): $<G, $<F, B>> =>
      G.map<$<F, $<F, B>>, $<F, B>>(F.traverse(G)<A, $<F, B>>(fa, f), (nested) =>
        F.foldLeft<$<F, B>, $<F, B>>(nested, MK.emptyK<B>(), (acc, fb) => MK.combineK<B>(acc, fb)),
      );
}

// ============================================================================
// Instance Creator
// ============================================================================

export function makeTraverse<F extends TypeFunction>(
  map: <A, B>(fa: $<F, A>, f: (a: A) => B) => $<F, B>,
  foldLeft: <A, B>(fa: $<F, A>, b: B, f: (b: B, a: A) => B) => B,
  foldRight: <A, B>(fa: $<F, A>, b: B, f: (a: A, b: B) => B) => B,
  traverse: <G extends TypeFunction>(
    G: Applicative<G>,
  ) => <A, B>(fa: $<F, A>, f: (a: A) => $<G, B>) => $<G, $<F, B>>,
): Traverse<F> {
  return { map, foldLeft, foldRight, traverse };
}
