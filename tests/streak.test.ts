import { describe, expect, it } from "vitest";
import { resolveBonus } from "../src/engine/streak.js";

describe("resolveBonus", () => {
  it("gives nothing for no streak or a single day", () => {
    expect(resolveBonus(0)).toBe(0);
    expect(resolveBonus(1)).toBe(0);
  });

  it("adds 10% for each day after the first", () => {
    expect(resolveBonus(2)).toBeCloseTo(0.1);
    expect(resolveBonus(6)).toBeCloseTo(0.5);
  });

  it("caps at 100%", () => {
    expect(resolveBonus(11)).toBe(1);
    expect(resolveBonus(40)).toBe(1);
  });

  it("treats garbage input as no streak", () => {
    expect(resolveBonus(-3)).toBe(0);
    expect(resolveBonus(Number.NaN)).toBe(0);
  });

  it("counts only whole days", () => {
    expect(resolveBonus(2.9)).toBeCloseTo(0.1);
  });

  it("always stays within [0, 1]", () => {
    for (let days = -5; days <= 30; days++) {
      const bonus = resolveBonus(days);
      expect(bonus).toBeGreaterThanOrEqual(0);
      expect(bonus).toBeLessThanOrEqual(1);
    }
  });
});
