import { describe, expect, it } from "vitest";
import { aggregate, applyStreakBonus, progressRatio, scoreDay } from "../src/engine/progress.js";
import type { DaySnapshot, TaskSnapshot } from "../src/engine/types.js";

function task(overrides: Partial<TaskSnapshot> = {}): TaskSnapshot {
  return {
    title: "Walk",
    basePoints: 5,
    target: 1,
    completed: 1,
    max: 1,
    isRoutine: true,
    isOptional: false,
    reward: 0,
    ...overrides,
  };
}

function day(tasks: TaskSnapshot[], targetPoints = 10, priorConsecutiveDays = 0): DaySnapshot {
  return { targetPoints, tasks, priorConsecutiveDays };
}

describe("aggregate", () => {
  it("sums task points and caps progress at 1", () => {
    const result = aggregate(day([
      task({ basePoints: 5, max: 3 }),
      task({ basePoints: 5, bonus: 0.3 }),
    ]));
    expect(result.totalPoints).toBeCloseTo(11.5);
    expect(result.progressRatio).toBe(1);
    expect(result.unscoreable).toEqual([]);
  });

  it("reports partial progress", () => {
    const result = aggregate(day([task({ basePoints: 2.5 })], 10));
    expect(result.totalPoints).toBe(2.5);
    expect(result.progressRatio).toBe(0.25);
  });

  it("shows no progress for a day without a positive target", () => {
    expect(aggregate(day([task()], 0)).progressRatio).toBe(0);
    expect(aggregate(day([task()], -5)).progressRatio).toBe(0);
    expect(aggregate(day([task()], 0)).totalPoints).toBe(5);
  });

  it("gives the same total whatever the task order", () => {
    const tasks = [
      task({ title: "a", basePoints: 0.1 }),
      task({ title: "b", basePoints: 0.2, reward: 0.7 }),
      task({ title: "c", basePoints: 0.3, isRoutine: false }),
      task({ title: "d", basePoints: 1.1, bonus: 0.1 }),
      task({ title: "e", basePoints: 3, target: 3, completed: 1, max: 3 }),
    ];
    const expected = aggregate(day(tasks)).totalPoints;

    const orders = [
      [...tasks].reverse(),
      [...tasks.slice(2), ...tasks.slice(0, 2)],
      [tasks[3], tasks[0], tasks[4], tasks[2], tasks[1]].filter((t): t is TaskSnapshot => t !== undefined),
    ];
    for (const order of orders) {
      expect(aggregate(day(order)).totalPoints).toBe(expected);
    }
  });

  it("skips tasks with an invalid target and lists them", () => {
    const result = aggregate(day([task({ basePoints: 5 }), task({ title: "Broken", target: 0 })]));
    expect(result.totalPoints).toBe(5);
    expect(result.tasks[1]).toBeNull();
    expect(result.unscoreable).toHaveLength(1);
    expect(result.unscoreable[0]?.index).toBe(1);
    expect(result.unscoreable[0]?.title).toBe("Broken");
    expect(result.unscoreable[0]?.error.kind).toBe("InvalidTarget");
  });

  it("keeps per-task results in input order", () => {
    const result = aggregate(day([task({ basePoints: 1 }), task({ basePoints: 2 })]));
    expect(result.tasks.map(t => t?.earnedPoints)).toEqual([1, 2]);
  });
});

describe("applyStreakBonus", () => {
  it("injects the resolved bonus into routines only", () => {
    const input = day([task({ title: "routine" }), task({ title: "task", isRoutine: false })], 10, 4);
    const result = applyStreakBonus(input);

    expect(result.tasks[0]?.bonus).toBeCloseTo(0.3);
    expect(result.tasks[1]?.bonus).toBeUndefined();
    expect(input.tasks[0]?.bonus).toBeUndefined();
  });
});

describe("scoreDay", () => {
  it("scores routines with the streak bonus", () => {
    const result = scoreDay(day([
      task({ basePoints: 10 }),
      task({ basePoints: 10, isRoutine: false }),
    ], 30, 3));
    expect(result.tasks[0]?.earnedPoints).toBeCloseTo(12);
    expect(result.tasks[1]?.earnedPoints).toBe(10);
    expect(result.totalPoints).toBeCloseTo(22);
  });
});

describe("progressRatio", () => {
  it("stays within [0, 1]", () => {
    expect(progressRatio(0, 5)).toBe(0);
    expect(progressRatio(5, 5)).toBe(1);
    expect(progressRatio(50, 5)).toBe(1);
    expect(progressRatio(5, Number.NaN)).toBe(0);
  });
});
