/**
 * Data Types Tests - Option, Either, Seq
 */
import { afterEach, describe, it, expect, vi } from "vitest";
import { config, InvariantError } from "@kindred/core";
import {
  Option,
  Some,
  None,
  defined,
  unwrapDefined,
  fromNullable,
  isSome,
  isNone,
  type Defined,
} from "./option.js";
import { Either, Left, Right, isLeft, isRight } from "./either.js";
import { Seq } from "./seq.js";
import { eqNumber, eqString, ordNumber, LT, GT, EQ } from "../typeclasses/eq.js";
import { showNumber, showString } from "../typeclasses/show.js";
import { semigroupSum } from "../typeclasses/semigroup.js";
import { BottomError, ValueIsNoneError, ValueIsNullError } from "../errors.js";

// ============================================================================
// Option Tests
// ============================================================================

describe("Option", () => {
  describe("constructors", () => {
    it("Some should be the bare value", () => {
      const opt = Some(42);
      expect(opt).toBe(42);
      expect(isSome(opt)).toBe(true);
    });

    it("Some should reject null and undefined", () => {
      expect(() => Some(null)).toThrow(ValueIsNullError);
      expect(() => Some(undefined)).toThrow("Some requires a non-null value");
    });

    it("None should be null", () => {
      expect(None).toBe(null);
      expect(isNone(None)).toBe(true);
    });

    it("fromNullable should map null and undefined to None", () => {
      expect(fromNullable(null)).toBe(null);
      expect(fromNullable(undefined)).toBe(null);
      expect(fromNullable(0)).toBe(0);
    });

    it("fromPredicate should keep values that pass", () => {
      expect(Option.fromPredicate(5, (n) => n > 3)).toBe(5);
      expect(Option.fromPredicate(2, (n) => n > 3)).toBe(null);
    });

    it("tryCatch should turn a throw into None", () => {
      expect(
        Option.tryCatch(() => {
          throw new Error("boom");
        }),
      ).toBe(null);
      expect(Option.tryCatch(() => "ok")).toBe("ok");
    });

    it("defined should allow a null payload", () => {
      const present: Option<Defined<null>> = defined(null);
      expect(isSome(present)).toBe(true);
      expect(present !== null ? unwrapDefined(present) : "absent").toBe(null);
    });
  });

  describe("operations", () => {
    it("map should transform Some and skip None", () => {
      expect(Option.map(Some(2), (x) => x * 3)).toBe(6);
      expect(Option.map(None, (x: number) => x * 3)).toBe(null);
    });

    it("flatMap should chain", () => {
      const half = (n: number): Option<number> => (n % 2 === 0 ? n / 2 : None);
      expect(Option.flatMap(Some(8), half)).toBe(4);
      expect(Option.flatMap(Some(3), half)).toBe(null);
    });

    it("ap should apply a wrapped function", () => {
      const inc = (n: number) => n + 1;
      expect(Option.ap(Some(inc), Some(1))).toBe(2);
      expect(Option.ap(Some(inc), None)).toBe(null);
    });

    it("fold and match should pick the branch", () => {
      expect(Option.fold(None, () => "none", (n: number) => `v${n}`)).toBe("none");
      expect(Option.match(Some(1), { None: () => 0, Some: (n) => n + 10 })).toBe(11);
    });

    it("getOrElse should fall back for None", () => {
      expect(Option.getOrElse(None, () => 5)).toBe(5);
      expect(Option.getOrElse(Some(1), () => 5)).toBe(1);
      expect(Option.getOrElseStrict<number>(None, 7)).toBe(7);
    });

    it("getOrThrow should throw ValueIsNoneError for None", () => {
      expect(() => Option.getOrThrow(None)).toThrow(ValueIsNoneError);
      expect(() => Option.getOrThrow(None)).toThrow("Called getOrThrow on None");
      expect(Option.getOrThrow(Some("x"))).toBe("x");
    });

    it("orElse should only evaluate the fallback for None", () => {
      const fallback = vi.fn(() => Some(3));
      expect(Option.orElse(Some(1), fallback)).toBe(1);
      expect(fallback).not.toHaveBeenCalled();
      expect(Option.orElse<number>(None, fallback)).toBe(3);
    });

    it("filter, exists, forall and contains should test the value", () => {
      const even = (n: number) => n % 2 === 0;
      expect(Option.filter(Some(4), even)).toBe(4);
      expect(Option.filter(Some(3), even)).toBe(null);
      expect(Option.exists(Some(4), even)).toBe(true);
      expect(Option.exists(None, even)).toBe(false);
      expect(Option.forall(None, even)).toBe(true);
      expect(Option.forall(Some(3), even)).toBe(false);
      expect(Option.contains(Some(2), 2)).toBe(true);
    });
  });

  describe("conversions and combinators", () => {
    it("toEither should build Left or Right", () => {
      expect(Option.toEither(None, () => "missing")).toEqual({ _tag: "Left", left: "missing" });
      expect(Option.toEither(Some(1), () => "missing")).toEqual({ _tag: "Right", right: 1 });
    });

    it("toArray, toNullable and toUndefined should convert", () => {
      expect(Option.toArray(Some(1))).toEqual([1]);
      expect(Option.toArray(None)).toEqual([]);
      expect(Option.toNullable(None)).toBe(null);
      expect(Option.toUndefined(None)).toBe(undefined);
    });

    it("zip and zipWith should need both sides", () => {
      expect(Option.zip(Some(1), Some("a"))).toEqual([1, "a"]);
      expect(Option.zip(Some(1), None)).toBe(null);
      expect(Option.zipWith(Some(2), Some(3), (a, b) => a * b)).toBe(6);
    });

    it("tap should run the effect on Some only", () => {
      const seen: number[] = [];
      Option.tap(Some(1), (n) => seen.push(n));
      Option.tap(None, (n: number) => seen.push(n));
      expect(seen).toEqual([1]);
    });
  });

  describe("instances", () => {
    it("getOrd should order None before Some", () => {
      const O = Option.getOrd(ordNumber);
      expect(O.compare(None, Some(1))).toBe(LT);
      expect(O.compare(Some(2), Some(1))).toBe(GT);
      expect(O.compare(None, None)).toBe(EQ);
    });

    it("getShow should render Some and None", () => {
      expect(Option.getShow(showNumber).show(Some(3))).toBe("Some(3)");
      expect(Option.getShow(showString).show(Some("a"))).toBe('Some("a")');
      expect(Option.getShow(showNumber).show(None)).toBe("None");
    });

    it("getEq should compare by content", () => {
      const E = Option.getEq(eqNumber);
      expect(E.eqv(Some(1), Some(1))).toBe(true);
      expect(E.eqv(Some(1), None)).toBe(false);
      expect(E.eqv(None, None)).toBe(true);
    });

    it("getMonoid should combine inner values", () => {
      const M = Option.getMonoid(semigroupSum);
      expect(M.combine(Some(1), Some(2))).toBe(3);
      expect(M.combine(None, Some(2))).toBe(2);
      expect(M.empty).toBe(null);
    });

    it("getFirstMonoid should keep the first Some", () => {
      const M = Option.getFirstMonoid<number>();
      expect(M.combine(Some(1), Some(2))).toBe(1);
      expect(M.combine(None, Some(2))).toBe(2);
    });
  });
});

// ============================================================================
// Either Tests
// ============================================================================

describe("Either", () => {
  describe("constructors", () => {
    it("Left and Right should tag their values", () => {
      expect(Left("e")).toEqual({ _tag: "Left", left: "e" });
      expect(Right(1)).toEqual({ _tag: "Right", right: 1 });
      expect(isLeft(Left("e"))).toBe(true);
      expect(isRight(Right(1))).toBe(true);
    });

    it("fromNullable should use the fallback for null", () => {
      expect(Either.fromNullable(null, () => "none")).toEqual(Left("none"));
      expect(Either.fromNullable(3, () => "none")).toEqual(Right(3));
    });

    it("fromPredicate should report the rejected value", () => {
      const positive = (n: number) =>
        Either.fromPredicate(
          n,
          (x) => x > 0,
          (x) => `${x} is not positive`,
        );
      expect(positive(-2)).toEqual(Left("-2 is not positive"));
      expect(positive(2)).toEqual(Right(2));
    });

    it("tryCatch should capture exceptions", () => {
      const parsed = Either.tryCatch(
        () => JSON.parse("{"),
        () => "bad json",
      );
      expect(parsed).toEqual(Left("bad json"));
    });

    it("fromOption should lift Option", () => {
      expect(Either.fromOption(Some(1), () => "e")).toEqual(Right(1));
      expect(Either.fromOption(None, () => "e")).toEqual(Left("e"));
    });
  });

  describe("operations", () => {
    it("map and mapLeft should touch one side each", () => {
      expect(Either.map(Right<string, number>(2), (n) => n + 1)).toEqual(Right(3));
      expect(Either.map(Left<string, number>("e"), (n) => n + 1)).toEqual(Left("e"));
      expect(Either.mapLeft(Left<string, number>("e"), (e) => e.toUpperCase())).toEqual(Left("E"));
    });

    it("bimap should map whichever side is present", () => {
      const f = (e: string) => e.length;
      const g = (n: number) => n * 2;
      expect(Either.bimap(Left<string, number>("abc"), f, g)).toEqual(Left(3));
      expect(Either.bimap(Right<string, number>(4), f, g)).toEqual(Right(8));
    });

    it("flatMap should short-circuit on Left", () => {
      const check = (n: number): Either<string, number> => (n > 0 ? Right(n) : Left("negative"));
      expect(Either.flatMap(Right<string, number>(5), check)).toEqual(Right(5));
      expect(Either.flatMap(Right<string, number>(-5), check)).toEqual(Left("negative"));
      expect(Either.flatMap(Left<string, number>("first"), check)).toEqual(Left("first"));
    });

    it("ap should keep the first Left", () => {
      const inc = Right<string, (n: number) => number>((n) => n + 1);
      expect(Either.ap(inc, Right<string, number>(1))).toEqual(Right(2));
      const noFn = Left<string, (n: number) => number>("f");
      expect(Either.ap(noFn, Left<string, number>("a"))).toEqual(Left("f"));
    });

    it("swap and flatten should restructure", () => {
      expect(Either.swap(Right<string, number>(1))).toEqual(Left(1));
      expect(Either.flatten(Right<string, Either<string, number>>(Right(1)))).toEqual(Right(1));
    });

    it("match should dispatch on the tag", () => {
      const render = (e: Either<string, number>) =>
        Either.match(e, { Left: (l) => `error ${l}`, Right: (r) => `value ${r}` });
      expect(render(Left("x"))).toBe("error x");
      expect(render(Right(1))).toBe("value 1");
    });

    it("fold should raise BottomError for an untagged value", () => {
      const bogus: Either<string, number> = JSON.parse('{"_tag":"Middle"}');
      expect(() =>
        Either.fold(
          bogus,
          () => 0,
          () => 1,
        ),
      ).toThrow(BottomError);
    });
  });

  describe("extraction", () => {
    it("getOrElse should receive the Left value", () => {
      expect(Either.getOrElse(Left<string, number>("abc"), (e) => e.length)).toBe(3);
    });

    it("getOrThrow should throw the Left value", () => {
      expect(() => Either.getOrThrow(Left(new Error("boom")))).toThrow("boom");
      expect(Either.getOrThrow(Right(1))).toBe(1);
    });

    it("orElse should recover from Left", () => {
      const recovered = Either.orElse(Left<string, number>("e"), () => Right<string, number>(0));
      expect(recovered).toEqual(Right(0));
    });

    it("toOption, toArray and merge should convert", () => {
      expect(Either.toOption(Left("e"))).toBe(null);
      expect(Either.toOption(Right(2))).toBe(2);
      expect(Either.toArray(Right(2))).toEqual([2]);
      expect(Either.merge(Left<number, number>(1))).toBe(1);
    });

    it("exists and forall should treat Left as empty", () => {
      const big = (n: number) => n > 10;
      expect(Either.exists(Left<string, number>("e"), big)).toBe(false);
      expect(Either.forall(Left<string, number>("e"), big)).toBe(true);
      expect(Either.forall(Right<string, number>(3), big)).toBe(false);
    });

    it("getEq and getShow should cover both sides", () => {
      const E = Either.getEq(eqString, eqNumber);
      expect(E.eqv(Right(1), Right(1))).toBe(true);
      expect(E.eqv(Left("a"), Right(1))).toBe(false);
      const S = Either.getShow(showString, showNumber);
      expect(S.show(Left("e"))).toBe('Left("e")');
      expect(S.show(Right(5))).toBe("Right(5)");
    });
  });
});

// ============================================================================
// Seq Tests
// ============================================================================

describe("Seq", () => {
  afterEach(() => {
    config.reset();
  });

  describe("constructors", () => {
    it("of should freeze its items", () => {
      const xs = Seq.of(1, 2, 3);
      expect(xs.items).toEqual([1, 2, 3]);
      expect(Object.isFrozen(xs.items)).toBe(true);
      expect(Seq.isSeq(xs)).toBe(true);
      expect(Seq.isSeq([1, 2, 3])).toBe(false);
    });

    it("fromArray should copy its input", () => {
      const source = [1, 2];
      const xs = Seq.fromArray(source);
      source.push(3);
      expect(xs.items).toEqual([1, 2]);
    });

    it("range should exclude the end", () => {
      expect(Seq.range(0, 3).items).toEqual([0, 1, 2]);
      expect(Seq.range(3, 3).items).toEqual([]);
    });

    it("replicate should repeat a value", () => {
      expect(Seq.replicate(2, "x").items).toEqual(["x", "x"]);
      expect(() => Seq.replicate(-1, "x")).toThrow(InvariantError);
    });

    it("fromIterable and singleton should build sequences", () => {
      expect(Seq.fromIterable(new Set([3, 4])).items).toEqual([3, 4]);
      expect(Seq.singleton("a").items).toEqual(["a"]);
      expect(Seq.empty<number>().items).toEqual([]);
    });
  });

  describe("accessors", () => {
    const xs = Seq.of(10, 20, 30);

    it("get, head and last should return Option", () => {
      expect(Seq.get(xs, 1)).toBe(20);
      expect(Seq.get(xs, 5)).toBe(null);
      expect(Seq.get(xs, -1)).toBe(null);
      expect(Seq.head(xs)).toBe(10);
      expect(Seq.last(xs)).toBe(30);
      expect(Seq.head(Seq.empty())).toBe(null);
    });

    it("tail, length and isEmpty should describe the shape", () => {
      expect(Seq.tail(xs).items).toEqual([20, 30]);
      expect(Seq.tail(Seq.empty()).items).toEqual([]);
      expect(Seq.length(xs)).toBe(3);
      expect(Seq.isEmpty(Seq.Empty)).toBe(true);
    });
  });

  describe("transformations", () => {
    const xs = Seq.of(1, 2, 3);

    it("map, flatMap and filter should not mutate the input", () => {
      expect(Seq.map(xs, (n) => n * 2).items).toEqual([2, 4, 6]);
      expect(Seq.flatMap(xs, (n) => Seq.of(n, n)).items).toEqual([1, 1, 2, 2, 3, 3]);
      expect(Seq.filter(xs, (n) => n !== 2).items).toEqual([1, 3]);
      expect(xs.items).toEqual([1, 2, 3]);
    });

    it("append, concat and reverse should build new sequences", () => {
      expect(Seq.append(xs, 4).items).toEqual([1, 2, 3, 4]);
      expect(Seq.concat(xs, Seq.of(9)).items).toEqual([1, 2, 3, 9]);
      expect(Seq.reverse(xs).items).toEqual([3, 2, 1]);
    });

    it("take and drop should clamp negative counts", () => {
      expect(Seq.take(xs, 2).items).toEqual([1, 2]);
      expect(Seq.take(xs, -1).items).toEqual([]);
      expect(Seq.drop(xs, 2).items).toEqual([3]);
      expect(Seq.drop(xs, -1).items).toEqual([1, 2, 3]);
    });

    it("zip should stop at the shorter sequence", () => {
      expect(Seq.zip(xs, Seq.of("a", "b")).items).toEqual([
        [1, "a"],
        [2, "b"],
      ]);
    });

    it("foldLeft and foldRight should visit in opposite orders", () => {
      const letters = Seq.of("a", "b", "c");
      expect(Seq.foldLeft(letters, "", (acc, s) => acc + s)).toBe("abc");
      expect(Seq.foldRight(letters, "", (s, acc) => acc + s)).toBe("cba");
    });

    it("toArray and mkString should export the items", () => {
      const arr = Seq.toArray(xs);
      arr.push(4);
      expect(xs.items).toEqual([1, 2, 3]);
      expect(Seq.mkString(xs)).toBe("1, 2, 3");
      expect(Seq.mkString(xs, "-")).toBe("1-2-3");
    });
  });

  describe("instances", () => {
    it("getShow should render every item by default", () => {
      expect(Seq.getShow(showNumber).show(Seq.of(1, 2, 3))).toBe("Seq(1, 2, 3)");
      expect(Seq.getShow(showNumber).show(Seq.empty())).toBe("Seq()");
    });

    it("getShow should truncate after show.maxItems", () => {
      config.set({ show: { maxItems: 2 } });
      expect(Seq.getShow(showNumber).show(Seq.of(1, 2, 3))).toBe("Seq(1, 2, …)");
      expect(Seq.getShow(showNumber).show(Seq.of(1, 2))).toBe("Seq(1, 2)");
    });

    it("getEq should compare element-wise", () => {
      const E = Seq.getEq(eqNumber);
      expect(E.eqv(Seq.of(1, 2), Seq.of(1, 2))).toBe(true);
      expect(E.eqv(Seq.of(1, 2), Seq.of(1))).toBe(false);
    });

    it("getMonoid should concatenate", () => {
      const M = Seq.getMonoid<number>();
      expect(M.combine(Seq.of(1), Seq.of(2)).items).toEqual([1, 2]);
      expect(M.combine(M.empty, Seq.of(2)).items).toEqual([2]);
    });
  });
});
