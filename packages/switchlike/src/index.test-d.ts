/**
 * Type tests for switchlike
 * Checked by `tsc --noEmit`; these functions are never called.
 *
 * The overloads are the compile-time half of the contract: a default
 * producer is mandatory for value results, and the `===` default is only
 * offered when keys are assignable to the input.
 */
/* eslint-disable @typescript-eslint/no-unused-vars */
import { expectType } from "tsd";
import {
  dispatch,
  createDispatcher,
  oneOf,
  inRange,
  type Dispatcher,
  type DispatchEvent,
} from "./index";

declare const word: string;
declare const count: number;
type Status = "active" | "paused" | "closed";
declare const status: Status;

// =============================================================================
// TEST 1: result type is inferred from producers and default
// =============================================================================

function _test1() {
  const n = dispatch(word, [["one", () => 1], ["two", () => 2]], () => 0);
  expectType<number>(n);

  const label = dispatch(count, [[1, () => "one"]], () => "many");
  expectType<string>(label);
}

// =============================================================================
// TEST 2: omitting the default yields void, never a value
// =============================================================================

function _test2() {
  expectType<void>(dispatch(word, [["a", () => undefined]]));

  // @ts-expect-error - a value result requires a default producer
  const n: number = dispatch(count, [[1, () => 5]]);
}

// =============================================================================
// TEST 3: default equality needs keys assignable to the input
// =============================================================================

function _test3() {
  dispatch(status, [["active", () => 1], ["paused", () => 2]], () => 0);

  // @ts-expect-error - "archived" is not a Status
  dispatch(status, [["archived", () => 1]], () => 0);

  // @ts-expect-error - number keys cannot be compared with a string input
  dispatch(word, [[1, () => 1]], () => 0);

  // With a predicate, key and input types are independent
  const r = dispatch(word, [[3, () => "short"]], () => "long", (input, max) => input.length <= max);
  expectType<string>(r);
}

// =============================================================================
// TEST 4: predicate parameters are contextually typed
// =============================================================================

function _test4() {
  dispatch(count, [[3, () => undefined]], undefined, (input, key) => {
    expectType<number>(input);
    expectType<number>(key);
    return input % key === 0;
  });

  // @ts-expect-error - mismatched case and default results only fit the void overload
  const s: string = dispatch(count, [[1, () => "one"]], () => 0, (a, b) => a === b);
}

// =============================================================================
// TEST 5: predicate helpers fix the key type
// =============================================================================

function _test5() {
  const grade = dispatch(count, [[[90, 100], () => "A"]], () => "B", inRange());
  expectType<string>(grade);

  const kind = dispatch(word, [[["sat", "sun"], () => "weekend"]], () => "weekday", oneOf<string>());
  expectType<string>(kind);
}

// =============================================================================
// TEST 6: createDispatcher
// =============================================================================

function _test6() {
  const toCode = createDispatcher<Status, number>({
    cases: [["active", () => 1]],
    defaultProducer: () => 0,
  });
  expectType<Dispatcher<Status, number>>(toCode);
  expectType<number>(toCode("paused"));

  const byDivisor = createDispatcher({
    cases: [[3, () => "fizz"]],
    defaultProducer: () => "",
    predicate: (input: number, key: number) => input % key === 0,
  });
  expectType<string>(byDivisor(9));

  const onEvent = (event: DispatchEvent<string>) => {
    if (event.type === "case_matched") {
      expectType<string>(event.key);
      expectType<number>(event.index);
    }
  };
  const log = createDispatcher({ cases: [["a", () => undefined]], onEvent });
  expectType<void>(log("a"));

  // @ts-expect-error - a value result requires a default producer
  const bad: Dispatcher<string, number> = createDispatcher({ cases: [["a", () => 1]] });
}
