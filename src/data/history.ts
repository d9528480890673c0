// ============================================================
// Points — Streak History
// ============================================================

import { scoreDay } from "../engine/progress.js";
import { resolveBonus } from "../engine/streak.js";
import type { ComputedDayProgress, DaySnapshot, TaskSnapshot } from "../engine/types.js";
import { daysBetween, shiftDate } from "./dates.js";
import type { DayRecord, TaskRecord } from "./types.js";

/** A stored day scored against the streak leading into it */
export interface ResolvedDay {
  date: string;
  priorConsecutiveDays: number;
  bonus: number;
  progress: ComputedDayProgress;
  /** Reached its own target */
  qualified: boolean;
}

export function toTaskSnapshot(task: TaskRecord): TaskSnapshot {
  return {
    title: task.title,
    basePoints: task.points,
    target: task.target,
    completed: task.completed,
    max: task.max,
    isRoutine: task.routine,
    isOptional: task.optional,
    reward: task.reward,
    scalar: task.scalar,
  };
}

export function toDaySnapshot(day: DayRecord, priorConsecutiveDays: number): DaySnapshot {
  return {
    targetPoints: day.target,
    tasks: day.tasks.map(toTaskSnapshot),
    priorConsecutiveDays,
  };
}

/**
 * Scores every day in date order. A day's streak is the run of
 * calendar-consecutive qualifying days right before it; a missing date
 * or a day short of its target ends the run.
 */
export function resolveHistory(days: readonly DayRecord[]): ResolvedDay[] {
  const ordered = [...days].sort((a, b) => a.date.localeCompare(b.date));
  const resolved: ResolvedDay[] = [];
  for (const day of ordered) {
    resolved.push(resolveNext(resolved[resolved.length - 1], day));
  }
  return resolved;
}

/** Scores one day (stored or not) against the days before it */
export function resolveDay(history: readonly DayRecord[], day: DayRecord): ResolvedDay {
  const before = resolveHistory(history.filter(d => d.date < day.date));
  return resolveNext(before[before.length - 1], day);
}

/** Qualifying run ending at `date`, or at the day before when `date` has not qualified yet */
export function currentStreak(days: readonly DayRecord[], date: string): number {
  const resolved = resolveHistory(days.filter(d => d.date <= date));
  const last = resolved[resolved.length - 1];
  if (!last) return 0;
  if (last.date === date && last.qualified) return last.priorConsecutiveDays + 1;
  const yesterday = last.date === date ? resolved[resolved.length - 2] : last;
  return yesterday && yesterday.date === shiftDate(date, -1) && yesterday.qualified
    ? yesterday.priorConsecutiveDays + 1
    : 0;
}

export function longestStreak(days: readonly DayRecord[]): number {
  let longest = 0;
  for (const day of resolveHistory(days)) {
    if (day.qualified) longest = Math.max(longest, day.priorConsecutiveDays + 1);
  }
  return longest;
}

function resolveNext(previous: ResolvedDay | undefined, day: DayRecord): ResolvedDay {
  const priorConsecutiveDays =
    previous && previous.qualified && daysBetween(previous.date, day.date) === 1
      ? previous.priorConsecutiveDays + 1
      : 0;
  const progress = scoreDay(toDaySnapshot(day, priorConsecutiveDays));
  return {
    date: day.date,
    priorConsecutiveDays,
    bonus: resolveBonus(priorConsecutiveDays),
    progress,
    qualified: day.target > 0 && progress.progressRatio >= 1,
  };
}
