import { describe, expect, it } from "vitest";
import { currentStreak, longestStreak, resolveDay, resolveHistory } from "../src/data/history.js";
import type { DayRecord, TaskRecord } from "../src/data/types.js";

function rec(overrides: Partial<TaskRecord> = {}): TaskRecord {
  return {
    id: "task-1",
    title: "Stretch",
    points: 5,
    target: 1,
    completed: 1,
    max: 1,
    routine: false,
    optional: false,
    reward: 0,
    scalar: 1,
    position: 0,
    createdAt: "2026-03-01T08:00:00.000Z",
    updatedAt: "2026-03-01T08:00:00.000Z",
    ...overrides,
  };
}

/** A day of target 5 that is met when `met` is true */
function simpleDay(date: string, met: boolean): DayRecord {
  return { date, target: 5, points: 0, tasks: [rec({ completed: met ? 1 : 0 })] };
}

describe("resolveHistory", () => {
  it("counts the qualifying run leading into each day", () => {
    const days = [
      simpleDay("2026-03-01", true),
      simpleDay("2026-03-02", true),
      simpleDay("2026-03-03", true),
      { date: "2026-03-04", target: 5, points: 0, tasks: [rec({ routine: true, points: 10, completed: 0 })] },
    ];
    const resolved = resolveHistory(days);

    expect(resolved.map(r => r.priorConsecutiveDays)).toEqual([0, 1, 2, 3]);
    expect(resolved[3]?.bonus).toBeCloseTo(0.2);
    expect(resolved.map(r => r.qualified)).toEqual([true, true, true, false]);
  });

  it("resets after a missing date", () => {
    const resolved = resolveHistory([
      simpleDay("2026-03-01", true),
      simpleDay("2026-03-02", true),
      simpleDay("2026-03-04", true),
    ]);
    expect(resolved.map(r => r.priorConsecutiveDays)).toEqual([0, 1, 0]);
  });

  it("resets after a day short of its target", () => {
    const resolved = resolveHistory([
      simpleDay("2026-03-01", true),
      simpleDay("2026-03-02", false),
      simpleDay("2026-03-03", true),
    ]);
    expect(resolved.map(r => r.priorConsecutiveDays)).toEqual([0, 1, 0]);
  });

  it("lets a day's own bonus carry it over its target", () => {
    const boosted: DayRecord = {
      date: "2026-03-03",
      target: 10.5,
      points: 0,
      tasks: [rec({ routine: true, points: 10 })],
    };

    const withStreak = resolveHistory([simpleDay("2026-03-01", true), simpleDay("2026-03-02", true), boosted]);
    expect(withStreak[2]?.progress.totalPoints).toBeCloseTo(11);
    expect(withStreak[2]?.qualified).toBe(true);

    const alone = resolveHistory([boosted]);
    expect(alone[0]?.progress.totalPoints).toBe(10);
    expect(alone[0]?.qualified).toBe(false);
  });

  it("sorts days before walking them", () => {
    const resolved = resolveHistory([simpleDay("2026-03-02", true), simpleDay("2026-03-01", true)]);
    expect(resolved.map(r => r.date)).toEqual(["2026-03-01", "2026-03-02"]);
    expect(resolved[1]?.priorConsecutiveDays).toBe(1);
  });

  it("never qualifies a day without a target", () => {
    const resolved = resolveHistory([{ date: "2026-03-01", target: 0, points: 0, tasks: [rec()] }]);
    expect(resolved[0]?.qualified).toBe(false);
  });
});

describe("resolveDay", () => {
  it("scores an unsaved day against the stored history", () => {
    const history = [simpleDay("2026-03-01", true), simpleDay("2026-03-02", true)];
    const fresh: DayRecord = { date: "2026-03-03", target: 5, points: 0, tasks: [] };
    const resolved = resolveDay(history, fresh);

    expect(resolved.priorConsecutiveDays).toBe(2);
    expect(resolved.bonus).toBeCloseTo(0.1);
    expect(resolved.progress.totalPoints).toBe(0);
  });

  it("ignores days after the one being scored", () => {
    const history = [simpleDay("2026-03-02", true), simpleDay("2026-03-03", true)];
    expect(resolveDay(history, simpleDay("2026-03-01", true)).priorConsecutiveDays).toBe(0);
  });
});

describe("streaks", () => {
  const days = [
    simpleDay("2026-03-01", true),
    simpleDay("2026-03-02", true),
    simpleDay("2026-03-03", true),
    simpleDay("2026-03-04", false),
    simpleDay("2026-03-05", true),
  ];

  it("includes the day itself once it qualifies", () => {
    expect(currentStreak(days, "2026-03-03")).toBe(3);
  });

  it("falls back to the run ending yesterday while today is open", () => {
    expect(currentStreak(days.slice(0, 4), "2026-03-04")).toBe(3);
    expect(currentStreak(days.slice(0, 3), "2026-03-04")).toBe(3);
  });

  it("is zero once the run is broken", () => {
    expect(currentStreak(days.slice(0, 4), "2026-03-05")).toBe(0);
    expect(currentStreak(days, "2026-03-07")).toBe(0);
    expect(currentStreak([], "2026-03-01")).toBe(0);
  });

  it("finds the longest run", () => {
    expect(longestStreak(days)).toBe(3);
    expect(longestStreak([])).toBe(0);
  });
});
