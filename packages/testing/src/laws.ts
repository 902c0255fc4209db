/**
 * Law Definition Types and Verification
 *
 * A law is a named predicate over one sample input. Law generators (see
 * `@kindred/fp`'s laws module) return a `LawSet`; `verifyLaws` checks every
 * law against seeded samples.
 *
 * @example
 * ```typescript
 * const laws: LawSet<[number, number]> = [
 *   { name: "commutativity", check: ([a, b]) => a + b === b + a },
 * ];
 *
 * await assertLaws(laws, arbTuple(arbInt(), arbInt()));
 * ```
 */

import { config, createLogger, KindredError } from "@kindred/core";
import type { Arbitrary } from "./arbitrary.js";
import { describeInput, sampleSeed } from "./property.js";

// ============================================================================
// Core Law Types
// ============================================================================

export interface Law<T> {
  /**
   * Human-readable name of the law.
   * @example "left identity", "functor composition"
   */
  readonly name: string;
  readonly description?: string;
  /** Returns true if the law holds for the sample. */
  readonly check: (input: T) => boolean | Promise<boolean>;
}

export type LawSet<T> = readonly Law<T>[];

export interface LawFailure {
  readonly law: string;
  readonly input: unknown;
  /** 1-based sample number */
  readonly iteration: number;
  /** Present when the check threw instead of returning false */
  readonly error?: unknown;
}

export interface LawVerificationSummary {
  readonly passed: readonly string[];
  readonly failed: readonly LawFailure[];
}

/**
 * Thrown by `assertLaws` when at least one law fails.
 */
export class LawViolationError extends KindredError {
  constructor(public readonly failures: readonly LawFailure[]) {
    super(
      failures
        .map((f) => `Law "${f.law}" failed on sample ${f.iteration}: ${describeInput(f.input)}`)
        .join("\n"),
      "LAW_VIOLATION",
    );
    this.name = "LawViolationError";
  }
}

// ============================================================================
// Verification
// ============================================================================

const log = createLogger("laws");

async function verifyLaw<T>(
  law: Law<T>,
  arbitrary: Arbitrary<T>,
  count: number,
): Promise<LawFailure | undefined> {
  for (let i = 0; i < count; i++) {
    const input = arbitrary(sampleSeed(i));
    try {
      if (!(await law.check(input))) {
        return { law: law.name, input, iteration: i + 1 };
      }
    } catch (error) {
      return { law: law.name, input, iteration: i + 1, error };
    }
  }
  return undefined;
}

/**
 * Check every law against `count` samples. A law stops at its first failing
 * sample; the remaining laws still run.
 */
export async function verifyLaws<T>(
  laws: LawSet<T>,
  arbitrary: Arbitrary<T>,
  count: number = config.getNumber("laws.iterations", 100),
): Promise<LawVerificationSummary> {
  const passed: string[] = [];
  const failed: LawFailure[] = [];

  for (const law of laws) {
    log.debug(`verifying "${law.name}" over ${count} samples`);
    const failure = await verifyLaw(law, arbitrary, count);
    if (failure) {
      log.debug(`"${law.name}" failed on sample ${failure.iteration}`);
      failed.push(failure);
    } else {
      passed.push(law.name);
    }
  }

  return { passed, failed };
}

export async function assertLaws<T>(
  laws: LawSet<T>,
  arbitrary: Arbitrary<T>,
  count?: number,
): Promise<void> {
  const summary = await verifyLaws(laws, arbitrary, count);
  if (summary.failed.length > 0) {
    throw new LawViolationError(summary.failed);
  }
}
