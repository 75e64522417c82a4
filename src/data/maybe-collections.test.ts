/**
 * Maybe collection utilities - cat, mapMaybe, parseInteger
 */
import { describe, it, expect, vi } from "vitest";
import { Maybe, cat, mapMaybe, maybe, nothing, parseInteger } from "./maybe.js";

const ALPHANUMERIC = "abcdefghijklmnopqrstuvwxyz0123456789";

// ============================================================================
// cat
// ============================================================================

describe("cat()", () => {
  it("should keep Some values in order", () => {
    expect(cat([maybe(5), nothing<number>(), maybe(10), nothing<number>()])).toEqual([5, 10]);
  });

  it("should accept any iterable", () => {
    function* values() {
      yield maybe("a");
      yield nothing<string>();
      yield maybe("b");
    }
    expect(cat(values())).toEqual(["a", "b"]);
    expect(cat(new Set([maybe(1), maybe(2)]))).toEqual([1, 2]);
  });

  it("should drop everything but the digits", () => {
    expect(cat(Array.from(ALPHANUMERIC, parseInteger))).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it("should return an empty array for no input", () => {
    expect(cat([])).toEqual([]);
  });
});

// ============================================================================
// mapMaybe
// ============================================================================

describe("mapMaybe()", () => {
  it("should parse the digits out of a string", () => {
    expect(mapMaybe(parseInteger, "a1b2c3")).toEqual([1, 2, 3]);
    expect(mapMaybe(parseInteger, ALPHANUMERIC)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it("should call fn once per input, in order", () => {
    const fn = vi.fn((n: number) => maybe(n * 2, (v) => v > 2));
    expect(mapMaybe(fn, [1, 2, 3])).toEqual([4, 6]);
    expect(fn.mock.calls.map(([n]) => n)).toEqual([1, 2, 3]);
  });

  it("should be reachable through the companion object", () => {
    expect(Maybe.map(Maybe.int, ["1", "two", "3"])).toEqual([1, 3]);
    expect(Maybe.cat([Maybe.of(1), Maybe.nothing<number>()])).toEqual([1]);
  });
});

// ============================================================================
// parseInteger
// ============================================================================

describe("parseInteger()", () => {
  it.each([
    ["42", 42],
    [" -17 ", -17],
    ["+8", 8],
    ["007", 7],
    ["1_000", 1000],
    [4.7, 4],
    [-4.7, -4],
    [12, 12],
    [true, 1],
    [false, 0],
    [10n, 10],
  ])("should parse %o as %d", (input, expected) => {
    expect(parseInteger(input).unwrap()).toBe(expected);
  });

  it.each([
    ["ten"],
    [""],
    ["4.2"],
    ["0x10"],
    ["1__0"],
    ["_1"],
    ["1_"],
    ["١٢"],
    ["9007199254740993"],
    [NaN],
    [Infinity],
    [2n ** 60n],
    [null],
    [undefined],
    [{}],
    [[1]],
  ])("should give Nothing for %o", (input) => {
    expect(parseInteger(input).isNothing()).toBe(true);
  });

  it("should normalize negative zero", () => {
    expect(Object.is(parseInteger("-0").unwrap(), 0)).toBe(true);
    expect(Object.is(parseInteger(-0.5).unwrap(), 0)).toBe(true);
  });
});
