import { describe, it, expect } from "vitest";
import { applyIndexRange } from "./indexRange.js";

describe("applyIndexRange", () => {
  it("should extract the elements of an array range", () => {
    expect(applyIndexRange([10, 20, 30, 40], "1:2")).toEqual({ ok: true, value: [20, 30] });
  });

  it("should extract a single element", () => {
    expect(applyIndexRange([10, 20, 30, 40], "0")).toEqual({ ok: true, value: [10] });
  });

  it("should reject a range outside the array", () => {
    expect(applyIndexRange([10, 20, 30], "5:6").ok).toBe(false);
  });

  it("should reject malformed ranges", () => {
    expect(applyIndexRange([1, 2, 3], "a:b").ok).toBe(false);
    expect(applyIndexRange([1, 2, 3], "2:1").ok).toBe(false);
  });

  it("should reject scalar values", () => {
    expect(applyIndexRange(7, "1:2")).toEqual({ ok: false, reason: "Value is not an array" });
  });
});
