import { describe, it, expect } from "@effect/vitest";
import { roundTo } from "../../../microgrid-simulator/rounding.js";

describe("roundTo", () => {
  it("should keep the requested number of decimals", () => {
    expect(roundTo(1.234, 2)).toBe(1.23);
    expect(roundTo(1.236, 2)).toBe(1.24);
  });

  it("should round halves towards +Infinity", () => {
    expect(roundTo(0.125, 2)).toBe(0.13);
    expect(roundTo(2.5, 0)).toBe(3);
    expect(roundTo(-0.125, 2)).toBe(-0.12);
  });
});
