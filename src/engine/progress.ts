// ============================================================
// Points Engine — Day Aggregation
// ============================================================

import { computePoints } from "./points.js";
import { resolveBonus } from "./streak.js";
import type { ComputedDayProgress, ComputedTaskPoints, DaySnapshot, UnscoreableTask } from "./types.js";

/**
 * Total and progress for a day, using each task's bonus as supplied.
 * Tasks with an invalid target add nothing and are listed as unscoreable.
 */
export function aggregate(day: DaySnapshot): ComputedDayProgress {
  const tasks: (ComputedTaskPoints | null)[] = [];
  const unscoreable: UnscoreableTask[] = [];
  const earned: number[] = [];

  day.tasks.forEach((task, index) => {
    const result = computePoints(task);
    if (result.ok) {
      tasks.push(result.value);
      earned.push(result.value.earnedPoints);
    } else {
      tasks.push(null);
      unscoreable.push({ index, title: task.title, error: result.error });
    }
  });

  const totalPoints = sumPoints(earned);
  return {
    totalPoints,
    progressRatio: progressRatio(totalPoints, day.targetPoints),
    tasks,
    unscoreable,
  };
}

/** Copy of the day with the streak bonus injected into every routine */
export function applyStreakBonus(day: DaySnapshot): DaySnapshot {
  const bonus = resolveBonus(day.priorConsecutiveDays);
  return {
    ...day,
    tasks: day.tasks.map(task => (task.isRoutine ? { ...task, bonus } : task)),
  };
}

export function scoreDay(day: DaySnapshot): ComputedDayProgress {
  return aggregate(applyStreakBonus(day));
}

/** A day without a positive target shows no progress */
export function progressRatio(totalPoints: number, targetPoints: number): number {
  if (!(targetPoints > 0)) return 0;
  return Math.min(1, Math.max(0, totalPoints / targetPoints));
}

// Summed in sorted order so the total never depends on task order
function sumPoints(values: readonly number[]): number {
  return [...values].sort((a, b) => a - b).reduce((sum, v) => sum + v, 0);
}
