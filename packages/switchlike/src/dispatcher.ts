/**
 * Bound dispatchers: a case table fixed once and applied to many inputs.
 */

import {
  NO_MATCH,
  selectCase,
  validateDispatchArguments,
  type Cases,
  type Predicate,
  type Producer,
} from "./dispatch";
import { strictEquals } from "./predicates";

// =============================================================================
// Events
// =============================================================================

/**
 * Emitted once per call, after a branch is chosen and before its producer
 * runs.
 */
export type DispatchEvent<Key = unknown> =
  | { type: "case_matched"; name?: string; index: number; key: Key; ts: number }
  | { type: "default_selected"; name?: string; casesTried: number; ts: number };

export interface DispatcherObserver<Key> {
  /** Label copied onto every event. */
  name?: string;
  /** Called synchronously with each selection. */
  onEvent?: (event: DispatchEvent<Key>) => void;
}

// =============================================================================
// Options
// =============================================================================

export interface DispatcherOptions<Key, Result> extends DispatcherObserver<Key> {
  cases: Cases<Key, Result>;
  defaultProducer: Producer<Result>;
}

export interface VoidDispatcherOptions<Key> extends DispatcherObserver<Key> {
  cases: Cases<Key, void>;
  defaultProducer?: Producer<void>;
}

export interface WithPredicate<Input, Key> {
  predicate: Predicate<Input, Key>;
}

interface WithoutPredicate {
  predicate?: undefined;
}

export type Dispatcher<Input, Result> = (input: Input) => Result;

// =============================================================================
// createDispatcher
// =============================================================================

/**
 * Fix a case table, default and predicate once and get back a function of
 * the input. The case list is copied, so later changes to the caller's array
 * do not affect the dispatcher.
 *
 * Without a predicate the dispatcher takes inputs of the key type and
 * compares with `===`.
 *
 * @example
 * ```typescript
 * const toHttpStatus = createDispatcher({
 *   name: "toHttpStatus",
 *   cases: [
 *     ["NOT_FOUND", () => 404],
 *     ["FORBIDDEN", () => 403],
 *   ],
 *   defaultProducer: () => 500,
 *   onEvent: (event) => logger.debug(event),
 * });
 *
 * toHttpStatus("FORBIDDEN"); // 403
 * ```
 */
export function createDispatcher<Key, Result>(
  options: DispatcherOptions<Key, Result> & WithoutPredicate
): Dispatcher<Key, Result>;
export function createDispatcher<Input, Key, Result>(
  options: DispatcherOptions<Key, Result> & WithPredicate<Input, Key>
): Dispatcher<Input, Result>;
export function createDispatcher<Key>(
  options: VoidDispatcherOptions<Key> & WithoutPredicate
): Dispatcher<Key, void>;
export function createDispatcher<Input, Key>(
  options: VoidDispatcherOptions<Key> & WithPredicate<Input, Key>
): Dispatcher<Input, void>;
export function createDispatcher<Input, Key, Result>(
  options: DispatcherObserver<Key> & {
    cases: Cases<Key, Result>;
    defaultProducer?: Producer<Result>;
    predicate?: Predicate<Input, Key>;
  }
): Dispatcher<Input, Result | undefined> {
  validateDispatchArguments(options.cases, options.defaultProducer, options.predicate);

  const cases = [...options.cases];
  const predicate = options.predicate ?? strictEquals;
  const defaultProducer = options.defaultProducer;
  const { name, onEvent } = options;

  return (input: Input) => {
    const index = selectCase(input, cases, predicate);

    if (index === NO_MATCH) {
      onEvent?.({ type: "default_selected", name, casesTried: cases.length, ts: Date.now() });
      return defaultProducer ? defaultProducer() : undefined;
    }

    const [key, producer] = cases[index];
    onEvent?.({ type: "case_matched", name, index, key, ts: Date.now() });
    return producer();
  };
}
