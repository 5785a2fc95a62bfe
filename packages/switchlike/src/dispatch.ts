/**
 * switchlike/dispatch
 *
 * A value-returning `switch` over any input type, with a pluggable match
 * predicate. Cases are `[key, producer]` pairs tried in order; the first key
 * the predicate accepts runs its producer and nothing else runs.
 */

import { DispatchArgumentError } from "./errors";
import { strictEquals } from "./predicates";

// =============================================================================
// Types
// =============================================================================

/** Zero-argument case body. */
export type Producer<Result> = () => Result;

/**
 * Decides whether a case key matches the input. Called once per case, in
 * order, until it returns `true`.
 */
export type Predicate<Input, Key> = (input: Input, key: Key) => boolean;

/** A `[key, producer]` pair. */
export type Case<Key, Result> = readonly [key: Key, producer: Producer<Result>];

/** Ordered case list. Insertion order decides ties. */
export type Cases<Key, Result> = ReadonlyArray<Case<Key, Result>>;

/** Returned by {@link selectCase} when no case matches. */
export const NO_MATCH = -1;

// =============================================================================
// Internals shared with createDispatcher
// =============================================================================

const noop = (): undefined => undefined;

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/**
 * Throws {@link DispatchArgumentError} for arguments the type system would
 * have rejected. Runs before any predicate or producer is called.
 */
export function validateDispatchArguments(
  cases: unknown,
  defaultProducer: unknown,
  predicate: unknown
): void {
  if (!Array.isArray(cases)) {
    throw new DispatchArgumentError({
      argument: "cases",
      expected: "an array",
      received: describe(cases),
    });
  }

  // Indexed so holes in a sparse list are visited as `undefined`
  for (let index = 0; index < cases.length; index++) {
    const entry: unknown = cases[index];
    if (!Array.isArray(entry)) {
      throw new DispatchArgumentError({
        argument: "cases",
        index,
        expected: "a [key, producer] pair",
        received: describe(entry),
      });
    }
    if (typeof entry[1] !== "function") {
      throw new DispatchArgumentError({
        argument: "cases",
        index,
        expected: "a [key, producer] pair",
        received: `[${describe(entry[0])}, ${describe(entry[1])}]`,
      });
    }
  }

  if (defaultProducer !== undefined && typeof defaultProducer !== "function") {
    throw new DispatchArgumentError({
      argument: "defaultProducer",
      expected: "a function",
      received: describe(defaultProducer),
    });
  }

  if (predicate !== undefined && typeof predicate !== "function") {
    throw new DispatchArgumentError({
      argument: "predicate",
      expected: "a function",
      received: describe(predicate),
    });
  }
}

/**
 * Index of the first case whose key the predicate accepts, or
 * {@link NO_MATCH}. Stops at the first match.
 */
export function selectCase<Input, Key, Result>(
  input: Input,
  cases: Cases<Key, Result>,
  predicate: Predicate<Input, Key>
): number {
  for (let index = 0; index < cases.length; index++) {
    if (predicate(input, cases[index][0])) {
      return index;
    }
  }
  return NO_MATCH;
}

// =============================================================================
// dispatch
// =============================================================================

/**
 * Run the producer of the first case matching `input`, or the default.
 *
 * Without a predicate, a case matches when `key === input` (the comparison a
 * `switch` statement uses). Omitting the predicate requires keys to be
 * assignable to the input type, so unrelated keys need an explicit predicate.
 *
 * The default producer may only be omitted when the result is `void`; a call
 * without one resolves to a `void` overload, so its result can never be used
 * as a value.
 *
 * Errors thrown by the predicate or a producer propagate unchanged.
 *
 * @example
 * ```typescript
 * const code = dispatch(status, [
 *   ["active", () => 1],
 *   ["paused", () => 2],
 * ], () => 0);
 *
 * dispatch(n, [
 *   [3, () => console.log("fizz")],
 *   [5, () => console.log("buzz")],
 * ], undefined, (input, key) => input % key === 0);
 * ```
 */
export function dispatch<Input, Key extends Input, Result>(
  input: Input,
  cases: Cases<Key, Result>,
  defaultProducer: Producer<Result>
): Result;
export function dispatch<Input, Key, Result>(
  input: Input,
  cases: Cases<Key, Result>,
  defaultProducer: Producer<Result>,
  predicate: Predicate<Input, Key>
): Result;
export function dispatch<Input, Key extends Input>(
  input: Input,
  cases: Cases<Key, void>,
  defaultProducer?: Producer<void>
): void;
export function dispatch<Input, Key>(
  input: Input,
  cases: Cases<Key, void>,
  defaultProducer: Producer<void> | undefined,
  predicate: Predicate<Input, Key>
): void;
export function dispatch<Input, Key, Result>(
  input: Input,
  cases: Cases<Key, Result>,
  defaultProducer?: Producer<Result>,
  predicate?: Predicate<Input, Key>
): Result | undefined {
  validateDispatchArguments(cases, defaultProducer, predicate);

  const index = selectCase(input, cases, predicate ?? strictEquals);
  if (index === NO_MATCH) {
    return (defaultProducer ?? noop)();
  }
  return cases[index][1]();
}
