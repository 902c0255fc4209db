/**
 * Data Types Index
 *
 * - Type: `Option<A>`, `Either<E, A>`, `Seq<A>`
 * - Operations: `Option.map(...)`, `Either.flatMap(...)`, `Seq.foldLeft(...)`
 * - Constructors: `Some(...)`, `None`, `Left(...)`, `Right(...)`, `Seq.of(...)`
 */

// ============================================================================
// Option: optional values (null-based)
// ============================================================================

// Option is both a type (Option<A> = A | null) and a namespace object
export { Option, Some, None, isSome, isNone, defined, unwrapDefined } from "./option.js";
export type { Defined } from "./option.js";

// ============================================================================
// Either: typed error handling
// ============================================================================

export { Either, Left, Right, isLeft, isRight } from "./either.js";

// ============================================================================
// Seq: immutable sequences
// ============================================================================

export { Seq, Seq1 } from "./seq.js";
