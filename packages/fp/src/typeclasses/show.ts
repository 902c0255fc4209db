/**
 * Show
 *
 * Renders a value for diagnostics. The data types take the Show of their
 * element, so `Option.getShow(showString)` renders `Some("a")` and
 * `OptionAsync.show()` falls back to `showDefault` when given none.
 */

export interface Show<A> {
  readonly show: (a: A) => string;
}

/** Quoted, with JSON escapes */
export const showString: Show<string> = { show: (s) => JSON.stringify(s) };

export const showNumber: Show<number> = { show: (n) => String(n) };

export function showDefault<A>(): Show<A> {
  return { show: (a) => String(a) };
}
