/**
 * switchlike/errors
 *
 * Errors raised by the dispatcher itself. Failures inside predicates and
 * producers are never wrapped: they reach the caller as thrown.
 */

import { TaggedError } from "./tagged-error";

/** Which dispatch argument was malformed. */
export type DispatchArgument = "cases" | "defaultProducer" | "predicate";

export interface DispatchArgumentErrorProps {
  argument: DispatchArgument;
  /** Position of the offending entry, for `cases` entries only. */
  index?: number;
  /** What the argument should have been, e.g. `"a function"`. */
  expected: string;
  /** What was passed instead, e.g. `"string"`. */
  received: string;
}

/**
 * Thrown at call time when a dispatch argument has the wrong shape, which
 * only happens when the overloads were bypassed (plain JavaScript callers,
 * `any`-typed values). Thrown before any predicate or producer runs.
 *
 * @example
 * ```typescript
 * const error = new DispatchArgumentError({
 *   argument: "cases",
 *   index: 1,
 *   expected: "a [key, producer] pair",
 *   received: "string",
 * });
 * console.log(error.message);
 * // "DispatchArgumentError: cases[1] must be a [key, producer] pair, received string"
 * ```
 */
export class DispatchArgumentError extends TaggedError("DispatchArgumentError", {
  message: (p: DispatchArgumentErrorProps) => {
    const position = p.index === undefined ? "" : `[${p.index}]`;
    return `DispatchArgumentError: ${p.argument}${position} must be ${p.expected}, received ${p.received}`;
  },
}) {}

export function isDispatchArgumentError(value: unknown): value is DispatchArgumentError {
  return value instanceof DispatchArgumentError;
}
