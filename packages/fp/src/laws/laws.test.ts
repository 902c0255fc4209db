import { describe, it, expect } from "vitest";
import {
  arbArray,
  arbInt,
  arbOption,
  arbTuple,
  assertLaws,
  verifyLaws,
  LawViolationError,
  type Arbitrary,
} from "@kindred/testing";
import type { ArrayF, EitherF, OptionAsyncF, OptionF, PromiseF, SeqF } from "../hkt.js";
import type { Functor } from "../typeclasses/functor.js";
import { eqArray, eqNumber, eqString, type Eq } from "../typeclasses/eq.js";
import { None, getEq as getOptionEq, type Option } from "../data/option.js";
import { Left, Right, getEq as getEitherEq, type Either } from "../data/either.js";
import { Seq } from "../data/seq.js";
import { OptionAsync } from "../async/option-async.js";
import {
  arrayFoldable,
  arrayFunctor,
  arrayTraverse,
  eitherFoldable,
  eitherFunctor,
  eitherMonad,
  eitherTraverse,
  optionAsyncFunctor,
  optionAsyncMonad,
  optionAsyncOptional,
  optionFoldable,
  optionFunctor,
  optionMonad,
  optionTraverse,
  promiseApplicative,
  seqApplicative,
  seqFoldable,
  seqFunctor,
  seqMonad,
  seqTraverse,
} from "../instances/index.js";
import { functorLaws } from "./functor.js";
import { monadLaws } from "./monad.js";
import { foldableLaws } from "./foldable.js";
import { traverseLaws } from "./traverse.js";
import { optionalAsyncLaws } from "./optional-async.js";
import type { LawEq } from "./types.js";

// ============================================================================
// Samples and equalities
// ============================================================================

const arbSeq: Arbitrary<Seq<number>> = (seed) => Seq.fromArray(arbArray(arbInt())(seed));

const arbEither: Arbitrary<Either<string, number>> = (seed) => {
  const n = arbInt()(seed);
  return n % 3 === 0 ? Left(`e${n}`) : Right(n);
};

const arbOptionAsync: Arbitrary<OptionAsync<number>> = (seed) =>
  OptionAsync.fromOption(arbOption(arbInt())(seed));

const eqOption: Eq<Option<number>> = getOptionEq(eqNumber);
const eqSeq: Eq<Seq<number>> = Seq.getEq(eqNumber);
const eqEither: Eq<Either<string, number>> = getEitherEq(eqString, eqNumber);
const eqOptionAsync: LawEq<OptionAsync<number>> = { eqv: (x, y) => x.equals(y) };

const inc = (n: number): number => n + 1;
const double = (n: number): number => n * 2;

describe("Typeclass laws", () => {
  // ==========================================================================
  // Functor
  // ==========================================================================

  describe("Functor", () => {
    it("Option should be a lawful functor", async () => {
      await assertLaws(
        functorLaws<OptionF, number>(optionFunctor, eqOption, inc, double),
        arbOption(arbInt()),
      );
    });

    it("Seq should be a lawful functor", async () => {
      await assertLaws(functorLaws<SeqF, number>(seqFunctor, eqSeq, inc, double), arbSeq);
    });

    it("Array should be a lawful functor", async () => {
      await assertLaws(
        functorLaws<ArrayF, number>(arrayFunctor, eqArray(eqNumber), inc, double),
        arbArray(arbInt()),
      );
    });

    it("Either should be a lawful functor", async () => {
      await assertLaws(
        functorLaws<EitherF<string>, number>(eitherFunctor<string>(), eqEither, inc, double),
        arbEither,
      );
    });

    it("OptionAsync should be a lawful functor", async () => {
      await assertLaws(
        functorLaws<OptionAsyncF, number>(optionAsyncFunctor, eqOptionAsync, inc, double),
        arbOptionAsync,
      );
    });
  });

  // ==========================================================================
  // Monad
  // ==========================================================================

  describe("Monad", () => {
    it("Option should be a lawful monad", async () => {
      const laws = monadLaws<OptionF, number>(
        optionMonad,
        eqOption,
        (n) => (n % 2 === 0 ? n / 2 : None),
        (n) => n + 1,
      );
      await assertLaws(laws, arbTuple(arbInt(), arbOption(arbInt())));
    });

    it("Seq should be a lawful monad", async () => {
      const laws = monadLaws<SeqF, number>(
        seqMonad,
        eqSeq,
        (n) => Seq.of(n, n + 1),
        (n) => (n % 3 === 0 ? Seq.empty<number>() : Seq.of(n * 2)),
      );
      await assertLaws(laws, arbTuple(arbInt(), arbSeq));
    });

    it("Either should be a lawful monad", async () => {
      const laws = monadLaws<EitherF<string>, number>(
        eitherMonad<string>(),
        eqEither,
        (n) => (n > 0 ? Right(n) : Left("not positive")),
        (n) => Right(n - 1),
      );
      await assertLaws(laws, arbTuple(arbInt(), arbEither));
    });

    it("OptionAsync should be a lawful monad", async () => {
      const laws = monadLaws<OptionAsyncF, number>(
        optionAsyncMonad,
        eqOptionAsync,
        (n) => (n > 0 ? OptionAsync.some(n) : OptionAsync.none<number>()),
        (n) => OptionAsync.someAsync(Promise.resolve(n * 2)),
      );
      await assertLaws(laws, arbTuple(arbInt(), arbOptionAsync));
    });
  });

  // ==========================================================================
  // Foldable
  // ==========================================================================

  describe("Foldable", () => {
    it("Option, Seq, Array and Either should fold consistently", async () => {
      await assertLaws(
        foldableLaws<OptionF, number>(optionFoldable, eqNumber),
        arbOption(arbInt()),
      );
      await assertLaws(foldableLaws<SeqF, number>(seqFoldable, eqNumber), arbSeq);
      await assertLaws(foldableLaws<ArrayF, number>(arrayFoldable, eqNumber), arbArray(arbInt()));
      await assertLaws(
        foldableLaws<EitherF<string>, number>(eitherFoldable<string>(), eqNumber),
        arbEither,
      );
    });
  });

  // ==========================================================================
  // Traverse
  // ==========================================================================

  describe("Traverse", () => {
    it("Seq traversed through Option should be lawful", async () => {
      await assertLaws(
        traverseLaws<SeqF, OptionF, number>(seqTraverse, eqSeq, optionMonad, getOptionEq(eqSeq)),
        arbSeq,
      );
    });

    it("Option traversed through Seq should be lawful", async () => {
      await assertLaws(
        traverseLaws<OptionF, SeqF, number>(
          optionTraverse,
          eqOption,
          seqApplicative,
          Seq.getEq(eqOption),
        ),
        arbOption(arbInt()),
      );
    });

    it("Array traversed through Option should be lawful", async () => {
      const eqNumbers = eqArray(eqNumber);
      await assertLaws(
        traverseLaws<ArrayF, OptionF, number>(
          arrayTraverse,
          eqNumbers,
          optionMonad,
          getOptionEq(eqNumbers),
        ),
        arbArray(arbInt()),
      );
    });

    it("Either traversed through Promise should be lawful", async () => {
      const eqAwaited: LawEq<Promise<Either<string, number>>> = {
        eqv: async (x, y) => eqEither.eqv(await x, await y),
      };
      await assertLaws(
        traverseLaws<EitherF<string>, PromiseF, number>(
          eitherTraverse<string>(),
          eqEither,
          promiseApplicative,
          eqAwaited,
        ),
        arbEither,
      );
    });
  });

  // ==========================================================================
  // OptionalAsync
  // ==========================================================================

  describe("OptionalAsync", () => {
    it("OptionAsync should round-trip values through some and optional", async () => {
      await assertLaws(
        optionalAsyncLaws<OptionAsyncF, number>(optionAsyncOptional, eqNumber),
        arbInt(),
      );
    });
  });

  // ==========================================================================
  // Failing instances
  // ==========================================================================

  describe("law violations", () => {
    const dropsFirst: Functor<ArrayF> = {
      map: <A, B>(fa: A[], f: (a: A) => B): B[] => fa.slice(1).map((a) => f(a)),
    };

    it("verifyLaws should report every broken law", async () => {
      const summary = await verifyLaws(
        functorLaws<ArrayF, number>(dropsFirst, eqArray(eqNumber), inc, double),
        arbArray(arbInt()),
      );
      expect(summary.passed).toEqual([]);
      expect(summary.failed.map((f) => f.law)).toEqual(["functor identity", "functor composition"]);
    });

    it("assertLaws should throw LawViolationError", async () => {
      await expect(
        assertLaws(
          functorLaws<ArrayF, number>(dropsFirst, eqArray(eqNumber), inc, double),
          arbArray(arbInt()),
        ),
      ).rejects.toBeInstanceOf(LawViolationError);
    });
  });
});
