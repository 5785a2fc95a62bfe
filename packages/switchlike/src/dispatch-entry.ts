/**
 * switchlike/dispatch
 *
 * Value-returning, predicate-customizable `switch`.
 *
 * @example
 * ```typescript
 * import { dispatch } from 'switchlike/dispatch';
 *
 * const code = dispatch(name, [
 *   ["foo", () => 1],
 *   ["bar", () => 2],
 * ], () => 0);
 * ```
 */

export {
  // Types
  type Producer,
  type Predicate,
  type Case,
  type Cases,

  // Functions
  dispatch,
} from "./dispatch";

export {
  // Types
  type DispatchEvent,
  type DispatcherObserver,
  type DispatcherOptions,
  type VoidDispatcherOptions,
  type WithPredicate,
  type Dispatcher,

  // Functions
  createDispatcher,
} from "./dispatcher";
