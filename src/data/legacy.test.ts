import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { wrap } from "./legacy.js";
import { maybe } from "./maybe.js";
import { config } from "../core/config.js";
import { resetDeprecations } from "../core/deprecation.js";

const NOTICE = "[maybetype] WARN: wrap() is deprecated, use maybe() instead";

describe("wrap() (deprecated)", () => {
  beforeEach(() => {
    config.reset();
    resetDeprecations();
  });

  afterEach(() => {
    config.reset();
    vi.restoreAllMocks();
  });

  it("should behave like maybe() without a predicate", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(wrap(5).equals(maybe(5))).toBe(true);
    expect(wrap(null).isNothing()).toBe(true);
    expect(wrap(0).unwrap()).toBe(0);
  });

  it("should warn on every call by default", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    wrap(1);
    wrap(2);
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledWith(NOTICE);
  });

  it("should warn only once when configured", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    config.set({ deprecations: { once: true } });
    wrap(1);
    wrap(2);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("should stay silent when turned off", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    config.set({ deprecations: { level: "off" } });
    wrap(1);
    expect(warn).not.toHaveBeenCalled();
  });

  it("should report through console.error at the error level", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    config.set({ deprecations: { level: "error" } });
    wrap(1);
    expect(error).toHaveBeenCalledWith(
      "[maybetype] ERROR: wrap() is deprecated, use maybe() instead"
    );
  });
});
