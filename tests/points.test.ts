import { describe, expect, it } from "vitest";
import { computePoints } from "../src/engine/points.js";
import type { ComputedTaskPoints, TaskSnapshot } from "../src/engine/types.js";

function task(overrides: Partial<TaskSnapshot> = {}): TaskSnapshot {
  return {
    title: "Read",
    basePoints: 5,
    target: 1,
    completed: 0,
    max: 3,
    isRoutine: true,
    isOptional: false,
    reward: 0,
    scalar: 1,
    bonus: 0,
    ...overrides,
  };
}

function scored(snapshot: TaskSnapshot): ComputedTaskPoints {
  const result = computePoints(snapshot);
  if (!result.ok) throw new Error(result.error.message);
  return result.value;
}

describe("computePoints", () => {
  it("gives a routine at target its full base points", () => {
    expect(scored(task({ basePoints: 5, target: 1, max: 3, completed: 1 })).earnedPoints).toBe(5);
  });

  it("gives an untouched routine nothing", () => {
    expect(scored(task({ basePoints: 8, target: 1, max: 3, completed: 0 })).earnedPoints).toBe(0);
  });

  it("gives a task below target nothing", () => {
    const result = scored(task({ isRoutine: false, basePoints: 6, target: 2, max: 2, completed: 1 }));
    expect(result.earnedPoints).toBe(0);
  });

  it("gives a task at target its points plus reward", () => {
    const result = scored(task({ isRoutine: false, basePoints: 6, target: 2, max: 2, completed: 2, reward: 2 }));
    expect(result.earnedPoints).toBe(8);
  });

  it("applies the streak bonus to a routine", () => {
    const result = scored(task({ basePoints: 5, target: 1, max: 1, completed: 1, bonus: 0.3 }));
    expect(result.effectiveBase).toBeCloseTo(6.5);
    expect(result.ratio).toBe(1);
    expect(result.earnedPoints).toBeCloseTo(6.5);
  });

  it("gives routines linear partial credit", () => {
    const result = scored(task({ basePoints: 6, target: 3, max: 6, completed: 1 }));
    expect(result.ratio).toBeCloseTo(1 / 3);
    expect(result.earnedPoints).toBeCloseTo(2);
  });

  it("treats an infinite max as no ceiling", () => {
    expect(scored(task({ basePoints: 2, target: 1, max: Infinity, completed: 5 })).earnedPoints).toBe(10);
    expect(scored(task({ basePoints: 2, target: 1, max: Number.NaN, completed: 5 })).earnedPoints).toBe(2);
  });

  it("credits routine completions past target up to max", () => {
    expect(scored(task({ basePoints: 2, target: 2, max: 4, completed: 3 })).earnedPoints).toBe(3);
    expect(scored(task({ basePoints: 2, target: 2, max: 4, completed: 7 })).earnedPoints).toBe(4);
  });

  it("never decreases as a routine gains completions, and stops growing at max", () => {
    const earned = Array.from({ length: 11 }, (_, completed) =>
      scored(task({ basePoints: 3, target: 3, max: 6, reward: 1, completed })).earnedPoints);

    for (let i = 1; i < earned.length; i++) {
      expect(earned[i]).toBeGreaterThanOrEqual(earned[i - 1] ?? 0);
    }
    expect(earned[6]).toBe(7);
    expect(earned.slice(6)).toEqual([7, 7, 7, 7, 7]);
  });

  it("only ever gives a task its reward or its full points plus reward", () => {
    for (let completed = 0; completed <= 5; completed++) {
      const result = scored(task({ isRoutine: false, basePoints: 4, scalar: 1.5, target: 3, max: 5, reward: 1, completed }));
      expect(result.earnedPoints).toBe(completed >= 3 ? 7 : 1);
    }
  });

  it("adds the reward whatever the completion ratio", () => {
    expect(scored(task({ completed: 0, reward: 2 })).earnedPoints).toBe(2);
    expect(scored(task({ isRoutine: false, target: 2, completed: 0, reward: 2 })).earnedPoints).toBe(2);
  });

  it("ignores the bonus on tasks that are not routines", () => {
    const result = scored(task({ isRoutine: false, basePoints: 10, completed: 1, bonus: 0.5 }));
    expect(result.effectiveBase).toBe(10);
    expect(result.earnedPoints).toBe(10);
  });

  it("multiplies by the scalar", () => {
    expect(scored(task({ basePoints: 4, scalar: 2.5, completed: 1 })).earnedPoints).toBe(10);
  });

  it.each([0, -1, 1.5, Number.NaN])("rejects a target of %s", target => {
    const result = computePoints(task({ title: "Broken", target }));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("InvalidTarget");
      expect(Number.isNaN(target) ? Number.isNaN(result.error.target) : result.error.target === target).toBe(true);
    }
  });

  it("names the task in the InvalidTarget message", () => {
    const result = computePoints(task({ title: "Broken", target: 0 }));
    expect(result).toEqual({
      ok: false,
      error: {
        kind: "InvalidTarget",
        target: 0,
        message: "Cannot score \"Broken\": target must be a whole number of at least 1 (got 0)",
      },
    });
  });

  it("clamps out-of-range attributes instead of failing", () => {
    expect(scored(task({ completed: 1, bonus: -0.5 })).earnedPoints).toBe(5);
    expect(scored(task({ completed: 1, scalar: 0 })).earnedPoints).toBe(5);
    expect(scored(task({ completed: 1, scalar: undefined, bonus: undefined })).earnedPoints).toBe(5);
    expect(scored(task({ completed: -2, reward: -1 })).earnedPoints).toBe(0);
    expect(scored(task({ basePoints: 3, target: 3, max: 1, completed: 5 })).earnedPoints).toBe(3);
  });
});
