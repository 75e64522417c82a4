import { describe, it, expect } from "vitest";
import { describeType, lookupAttribute, lookupItem } from "./access.js";
import { IndexOrKeyError } from "../core/errors.js";

class Widget {}

describe("describeType", () => {
  it("should name primitives by typeof", () => {
    expect(describeType(null)).toBe("null");
    expect(describeType(undefined)).toBe("undefined");
    expect(describeType(1)).toBe("number");
    expect(describeType("s")).toBe("string");
  });

  it("should name objects by constructor", () => {
    expect(describeType([])).toBe("Array");
    expect(describeType(new Map())).toBe("Map");
    expect(describeType(new Widget())).toBe("Widget");
    expect(describeType({})).toBe("Object");
    expect(describeType(Object.create(null))).toBe("Object");
  });
});

describe("lookupAttribute", () => {
  it("should find own, inherited and boxed members", () => {
    expect(lookupAttribute({ a: 1 }, "a")).toEqual({ found: true, value: 1 });
    expect(lookupAttribute([1, 2], "length")).toEqual({ found: true, value: 2 });
    expect(lookupAttribute(5, "toFixed").found).toBe(true);
  });

  it("should report missing members and absent targets", () => {
    expect(lookupAttribute({ a: 1 }, "b")).toEqual({ found: false });
    expect(lookupAttribute(null, "a")).toEqual({ found: false });
  });

  it("should find symbol keys", () => {
    const key = Symbol("k");
    expect(lookupAttribute({ [key]: "v" }, key)).toEqual({ found: true, value: "v" });
  });
});

describe("lookupItem", () => {
  it("should index typed arrays", () => {
    expect(lookupItem(new Uint8Array([7, 8]), 1)).toEqual({ kind: "found", value: 8 });
  });

  it("should index strings by code point", () => {
    expect(lookupItem("😀a", 0)).toEqual({ kind: "found", value: "😀" });
    expect(lookupItem("😀a", 1)).toEqual({ kind: "found", value: "a" });
    expect(lookupItem("😀a", -1)).toEqual({ kind: "found", value: "a" });
    expect(() => lookupItem("ab", "0")).toThrow("string indices must be integers, not string");
  });

  it("should report string length in code points", () => {
    const lookup = lookupItem("😀a", 2);
    expect(lookup.kind).toBe("missing");
    if (lookup.kind === "missing") {
      expect(lookup.error.message).toBe("index 2 out of range for string of length 2");
    }
  });

  it("should not treat inherited object members as keys", () => {
    const lookup = lookupItem({ a: 1 }, "toString");
    expect(lookup.kind).toBe("missing");
  });

  it("should describe a missing index", () => {
    const lookup = lookupItem([1], -2);
    expect(lookup.kind).toBe("missing");
    if (lookup.kind === "missing") {
      expect(lookup.error).toBeInstanceOf(IndexOrKeyError);
      expect(lookup.error.message).toBe("index -2 out of range for Array of length 1");
    }
  });

  it("should mark non-indexable values unsupported", () => {
    expect(lookupItem(42, 0)).toEqual({ kind: "unsupported" });
    expect(lookupItem(new Widget(), "a")).toEqual({ kind: "unsupported" });
    expect(lookupItem(new DataView(new ArrayBuffer(2)), 0)).toEqual({ kind: "unsupported" });
  });

  it("should reject malformed accessors", () => {
    expect(() => lookupItem([1], 0.5)).toThrow("Array indices must be integers, not number");
    expect(() => lookupItem({}, {})).toThrow(
      "Object keys must be strings, numbers or symbols, not Object"
    );
  });
});
