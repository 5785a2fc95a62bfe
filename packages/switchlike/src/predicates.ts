/**
 * switchlike/predicates
 *
 * Ready-made match predicates for {@link dispatch}. Each factory returns a
 * `(input, key) => boolean` function to pass as the predicate argument.
 *
 * @example
 * ```typescript
 * import { dispatch } from 'switchlike/dispatch';
 * import { inRange } from 'switchlike/predicates';
 *
 * const grade = dispatch(score, [
 *   [[90, 100], () => "A"],
 *   [[75, 89], () => "B"],
 * ], () => "C", inRange());
 * ```
 */

import type { Predicate } from "./dispatch";

/** The default predicate: `key === input`. */
export function strictEquals(input: unknown, key: unknown): boolean {
  return key === input;
}

// =============================================================================
// Equality
// =============================================================================

/** Strict equality between a key and the input, typed for a single value type. */
export function equals<T>(): Predicate<T, T> {
  return strictEquals;
}

/**
 * Keys are lists; a case matches when its list contains the input. Lets
 * several values share one producer in place of `switch` fall-through.
 *
 * Membership uses `Array.prototype.includes` (SameValueZero), so unlike the
 * default `===` predicate a `NaN` input matches a list containing `NaN`.
 *
 * @example
 * ```typescript
 * dispatch(day, [
 *   [["sat", "sun"], () => "weekend"],
 * ], () => "weekday", oneOf<string>());
 * ```
 */
export function oneOf<T>(): Predicate<T, ReadonlyArray<T>> {
  return (input, keys) => keys.includes(input);
}

/** Case-insensitive string equality. */
export function ignoringCase(): Predicate<string, string> {
  return (input, key) => input.toLowerCase() === key.toLowerCase();
}

// =============================================================================
// Patterns and ranges
// =============================================================================

/**
 * Keys are regular expressions tested against the input. Global and sticky
 * patterns are tested from index 0, and each key's `lastIndex` is restored
 * afterwards.
 */
export function matches(): Predicate<string, RegExp> {
  return (input, pattern) => {
    const { lastIndex } = pattern;
    pattern.lastIndex = 0;
    try {
      return pattern.test(input);
    } finally {
      pattern.lastIndex = lastIndex;
    }
  };
}

/** Keys are inclusive `[min, max]` bounds. */
export function inRange(): Predicate<number, readonly [min: number, max: number]> {
  return (input, [min, max]) => min <= input && input <= max;
}

/** Matches when the input is a multiple of the key. */
export function divisibleBy(): Predicate<number, number> {
  return (input, divisor) => input % divisor === 0;
}

// =============================================================================
// Combinators
// =============================================================================

/** Invert a predicate. */
export function not<Input, Key>(predicate: Predicate<Input, Key>): Predicate<Input, Key> {
  return (input, key) => !predicate(input, key);
}
