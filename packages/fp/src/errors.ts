/**
 * Errors raised by @kindred/fp data types.
 */

import { KindredError } from "@kindred/core";

/**
 * A value was demanded from a None.
 */
export class ValueIsNoneError extends KindredError {
  constructor(message = "Value is none") {
    super(message, "VALUE_IS_NONE");
    this.name = "ValueIsNoneError";
  }
}

/**
 * `null` or `undefined` was supplied where a Some value is required.
 */
export class ValueIsNullError extends KindredError {
  constructor(message = "Value is null") {
    super(message, "VALUE_IS_NULL");
    this.name = "ValueIsNullError";
  }
}

/**
 * A match handler that must produce a value returned `null` or `undefined`.
 */
export class ResultIsNullError extends KindredError {
  constructor(message = "Result is null") {
    super(message, "RESULT_IS_NULL");
    this.name = "ResultIsNullError";
  }
}

/**
 * A structure was found in neither of its states.
 */
export class BottomError extends KindredError {
  constructor(message = "Value is bottom") {
    super(message, "BOTTOM");
    this.name = "BottomError";
  }
}

/**
 * Pass `value` through, rejecting `null`/`undefined` with ResultIsNullError.
 */
export function checkResult<B>(value: B | null | undefined): B {
  if (value === null || value === undefined) {
    throw new ResultIsNullError();
  }
  return value;
}
