/**
 * switchlike/errors
 *
 * Tagged errors raised by the dispatcher.
 *
 * @example
 * ```typescript
 * import { isDispatchArgumentError } from 'switchlike/errors';
 *
 * try {
 *   dispatch(input, untrustedCases, fallback);
 * } catch (error) {
 *   if (isDispatchArgumentError(error)) {
 *     console.error(error.argument, error.index);
 *   }
 *   throw error;
 * }
 * ```
 */

export {
  // Types
  type DispatchArgument,
  type DispatchArgumentErrorProps,

  // Classes and guards
  DispatchArgumentError,
  isDispatchArgumentError,
} from "./errors";

export {
  // Types
  type TaggedErrorBase,
  type TaggedErrorOptions,
  type TaggedErrorCreateOptions,
  type TaggedErrorConstructor,
  type GenericTaggedErrorConstructor,
  type TagOf,

  // Factory and guard
  TaggedError,
  isTaggedError,
} from "./tagged-error";
