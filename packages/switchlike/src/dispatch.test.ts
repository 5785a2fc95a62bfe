/**
 * Tests for dispatch.ts - case selection, defaults, predicates, argument checks
 */
import { describe, it, expect, vi } from "vitest";
import { dispatch, selectCase, NO_MATCH, type Cases } from "./dispatch";
import { DispatchArgumentError, isDispatchArgumentError } from "./errors";

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected function to throw");
}

describe("dispatch()", () => {
  describe("case selection", () => {
    it("runs the producer whose key equals the input", () => {
      const input: string = "foo";
      const bar = vi.fn();
      const foo = vi.fn();

      dispatch(input, [
        ["bar", bar],
        ["foo", foo],
      ]);

      expect(foo).toHaveBeenCalledTimes(1);
      expect(bar).not.toHaveBeenCalled();
    });

    it("returns the matching producer's value", () => {
      const y = dispatch(1, [[1, () => 5]], () => -1);

      expect(y).toBe(5);
    });

    it("falls back to the default when the predicate rejects every key", () => {
      const onFive = vi.fn(() => "five");
      const fallback = vi.fn(() => "fallback");

      const result = dispatch(1, [[5, onFive]], fallback, (a: number, b: number) => a % b === 0);

      expect(result).toBe("fallback");
      expect(fallback).toHaveBeenCalledTimes(1);
      expect(onFive).not.toHaveBeenCalled();
    });

    it("always uses the default for an empty case list", () => {
      const fallback = vi.fn(() => 42);

      const result = dispatch(7, [], fallback);

      expect(result).toBe(42);
      expect(fallback).toHaveBeenCalledTimes(1);
    });

    it("picks the earliest case when several match", () => {
      const first = vi.fn(() => "first");
      const second = vi.fn(() => "second");

      const result = dispatch(
        10,
        [
          [2, first],
          [5, second],
        ],
        () => "none",
        (a: number, b: number) => a % b === 0
      );

      expect(result).toBe("first");
      expect(second).not.toHaveBeenCalled();
    });

    it("stops calling the predicate after the first match", () => {
      const predicate = vi.fn((input: string, key: string) => input === key);

      dispatch("b", [
        ["a", () => 1],
        ["b", () => 2],
        ["c", () => 3],
      ], () => 0, predicate);

      expect(predicate).toHaveBeenCalledTimes(2);
      expect(predicate).toHaveBeenNthCalledWith(1, "b", "a");
      expect(predicate).toHaveBeenNthCalledWith(2, "b", "b");
    });

    it("never runs the default or later producers after a match", () => {
      const fallback = vi.fn(() => "default");
      const later = vi.fn(() => "later");

      const result = dispatch("x", [
        ["x", () => "x"],
        ["x", later],
      ], fallback);

      expect(result).toBe("x");
      expect(later).not.toHaveBeenCalled();
      expect(fallback).not.toHaveBeenCalled();
    });

    it("invokes exactly one producer for every input", () => {
      const producers = [vi.fn(), vi.fn(), vi.fn()];
      const fallback = vi.fn();
      const cases: Cases<number, void> = [
        [1, producers[0]],
        [2, producers[1]],
        [2, producers[2]],
      ];

      for (const input of [0, 1, 2, 3]) {
        dispatch(input, cases, fallback);
      }

      const calls = [...producers, fallback].map((fn) => fn.mock.calls.length);
      expect(calls).toEqual([1, 1, 0, 2]);
    });

    it("selects the same branch on repeated calls", () => {
      const cases: Cases<string, string> = [
        ["red", () => "stop"],
        ["green", () => "go"],
      ];

      const first = dispatch("green", cases, () => "wait");
      const second = dispatch("green", cases, () => "wait");

      expect(first).toBe("go");
      expect(second).toBe("go");
    });
  });

  describe("default predicate", () => {
    it("compares with strict equality", () => {
      const input: number | string = 1;
      const result = dispatch<number | string, number | string, string>(input, [
        ["1", () => "string"],
        [1, () => "number"],
      ], () => "none");

      expect(result).toBe("number");
    });

    it("does not match NaN against NaN", () => {
      const result = dispatch(Number.NaN, [[Number.NaN, () => "nan"]], () => "none");

      expect(result).toBe("none");
    });

    it("matches objects by reference only", () => {
      const key = { id: 1 };

      expect(dispatch({ id: 1 }, [[key, () => "same"]], () => "other")).toBe("other");
      expect(dispatch(key, [[key, () => "same"]], () => "other")).toBe("same");
    });
  });

  describe("void results", () => {
    it("treats a missing default as a no-op", () => {
      const onA = vi.fn();

      const result = dispatch("z", [["a", onA]]);

      expect(result).toBeUndefined();
      expect(onA).not.toHaveBeenCalled();
    });

    it("accepts a predicate without a default", () => {
      const fizz = vi.fn();

      dispatch(9, [[3, fizz]], undefined, (a: number, b: number) => a % b === 0);

      expect(fizz).toHaveBeenCalledTimes(1);
    });
  });

  describe("failures", () => {
    it("propagates errors thrown by the predicate", () => {
      const boom = new Error("predicate failed");
      const producer = vi.fn();
      const fallback = vi.fn();

      expect(() =>
        dispatch(1, [[1, producer]], fallback, () => {
          throw boom;
        })
      ).toThrow(boom);
      expect(producer).not.toHaveBeenCalled();
      expect(fallback).not.toHaveBeenCalled();
    });

    it("propagates errors thrown by the selected producer", () => {
      const fallback = vi.fn(() => 0);

      expect(() =>
        dispatch(1, [[1, (): number => {
          throw new RangeError("producer failed");
        }]], fallback)
      ).toThrow(RangeError);
      expect(fallback).not.toHaveBeenCalled();
    });

    it("propagates errors thrown by the default", () => {
      expect(() =>
        dispatch(2, [[1, () => 1]], (): number => {
          throw new Error("no default value");
        })
      ).toThrow("no default value");
    });
  });

  describe("argument validation", () => {
    it("rejects a case list that is not an array", () => {
      // @ts-expect-error - testing runtime error for non-array cases
      const error = thrownBy(() => dispatch(1, "nope", () => 0));

      expect(error).toBeInstanceOf(DispatchArgumentError);
      expect(isDispatchArgumentError(error)).toBe(true);
      if (isDispatchArgumentError(error)) {
        expect(error.argument).toBe("cases");
        expect(error.index).toBeUndefined();
        expect(error.received).toBe("string");
        expect(error.message).toBe(
          "DispatchArgumentError: cases must be an array, received string"
        );
      }
    });

    it("reports null distinctly", () => {
      // @ts-expect-error - testing runtime error for null cases
      expect(() => dispatch(1, null, () => 0)).toThrow(
        "DispatchArgumentError: cases must be an array, received null"
      );
    });

    it("rejects an entry that is not a pair", () => {
      const producer = vi.fn(() => 1);

      // @ts-expect-error - testing runtime error for a bare key entry
      expect(() => dispatch(1, [[1, producer], 2], () => 0)).toThrow(
        "DispatchArgumentError: cases[1] must be a [key, producer] pair, received number"
      );
      expect(producer).not.toHaveBeenCalled();
    });

    it("rejects an entry whose producer is not a function, before matching", () => {
      const producer = vi.fn(() => 1);
      const predicate = vi.fn(() => true);

      // @ts-expect-error - testing runtime error for a non-function producer
      const error = thrownBy(() => dispatch(1, [[1, producer], [2, "two"]], () => 0, predicate));

      expect(isDispatchArgumentError(error)).toBe(true);
      if (isDispatchArgumentError(error)) {
        expect(error.index).toBe(1);
        expect(error.message).toBe(
          "DispatchArgumentError: cases[1] must be a [key, producer] pair, received [number, string]"
        );
      }
      expect(predicate).not.toHaveBeenCalled();
      expect(producer).not.toHaveBeenCalled();
    });

    it("rejects holes in a sparse case list", () => {
      const cases: Cases<number, number> = new Array(2);
      const predicate = vi.fn(() => true);

      expect(() => dispatch(1, cases, () => 0, predicate)).toThrow(
        "DispatchArgumentError: cases[0] must be a [key, producer] pair, received undefined"
      );
      expect(predicate).not.toHaveBeenCalled();
    });

    it("rejects a default producer that is not a function", () => {
      // @ts-expect-error - testing runtime error for a non-function default
      expect(() => dispatch(1, [], 5)).toThrow(
        "DispatchArgumentError: defaultProducer must be a function, received number"
      );
    });

    it("rejects a predicate that is not a function", () => {
      // @ts-expect-error - testing runtime error for a non-function predicate
      expect(() => dispatch(1, [], () => 0, "eq")).toThrow(
        "DispatchArgumentError: predicate must be a function, received string"
      );
    });
  });
});

describe("selectCase()", () => {
  it("returns the index of the first match", () => {
    const cases: Cases<string, number> = [
      ["a", () => 1],
      ["b", () => 2],
      ["b", () => 3],
    ];

    expect(selectCase("b", cases, (input, key) => input === key)).toBe(1);
  });

  it("returns NO_MATCH when nothing matches", () => {
    expect(selectCase("z", [["a", () => 1]], (input, key) => input === key)).toBe(NO_MATCH);
  });
});
