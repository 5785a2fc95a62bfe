/**
 * switchlike
 *
 * A `switch` that returns a value, takes any input type and lets the caller
 * decide what "matches" means.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { dispatch } from 'switchlike';
 *
 * // Translate a string to a number, 0 when unknown
 * const n = dispatch(word, [
 *   ["one", () => 1],
 *   ["two", () => 2],
 * ], () => 0);
 *
 * // Custom predicate, no result: the default may be omitted
 * dispatch(n, [
 *   [3, () => say("fizz")],
 * ], undefined, (input, key) => input % key === 0);
 * ```
 *
 * ## Entry Points
 *
 * - `switchlike` - everything below
 * - `switchlike/dispatch` - dispatch() and createDispatcher()
 * - `switchlike/predicates` - ready-made match predicates
 * - `switchlike/errors` - tagged errors
 */

export * from "./dispatch-entry";
export * from "./predicates-entry";
export * from "./errors-entry";
