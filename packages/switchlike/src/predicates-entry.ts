/**
 * switchlike/predicates
 *
 * Match predicates for dispatch: lists, patterns, ranges, case-insensitive
 * strings.
 *
 * @example
 * ```typescript
 * import { oneOf } from 'switchlike/predicates';
 *
 * dispatch(day, [[["sat", "sun"], () => "weekend"]], () => "weekday", oneOf<string>());
 * ```
 */

export {
  strictEquals,
  equals,
  oneOf,
  ignoringCase,
  matches,
  inRange,
  divisibleBy,
  not,
} from "./predicates";
