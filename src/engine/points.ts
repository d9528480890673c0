// ============================================================
// Points Engine — Per-Task Scoring
// ============================================================

import type { ComputedTaskPoints, InvalidTargetError, Result, TaskSnapshot } from "./types.js";

/**
 * Points currently earned by one task.
 *
 * Routines earn linear partial credit below target and keep accruing up
 * to `max` completions; other tasks are all-or-nothing. `reward` is added
 * whatever the ratio, so a routine with a reward earns it even at zero
 * completions. That is the intended incentive model.
 *
 * A target below 1 cannot be scored and comes back as `InvalidTarget`.
 * Every other out-of-range attribute is clamped. An infinite `max` means
 * completions past target are credited without a ceiling.
 */
export function computePoints(task: TaskSnapshot): Result<ComputedTaskPoints, InvalidTargetError> {
  if (!Number.isInteger(task.target) || task.target < 1) {
    return { ok: false, error: invalidTarget(task) };
  }

  const target = task.target;
  const max = Number.isNaN(task.max) ? target : Math.max(task.max, target);
  const completed = nonNegative(task.completed);
  const scalar = task.scalar !== undefined && Number.isFinite(task.scalar) && task.scalar > 0 ? task.scalar : 1;
  const bonus = task.isRoutine ? nonNegative(task.bonus ?? 0) : 0;

  const effectiveBase = nonNegative(task.basePoints) * scalar * (1 + bonus);
  const ratio = task.isRoutine
    ? routineRatio(completed, target, max)
    : completed >= target ? 1 : 0;

  return {
    ok: true,
    value: {
      earnedPoints: effectiveBase * ratio + nonNegative(task.reward),
      effectiveBase,
      ratio,
    },
  };
}

function routineRatio(completed: number, target: number, max: number): number {
  if (completed < target) return completed / target;
  // max / target is the ceiling: completions past max add nothing
  return Math.min(Math.min(completed, max) / target, max / target);
}

function nonNegative(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

function invalidTarget(task: TaskSnapshot): InvalidTargetError {
  const label = task.title ? `"${task.title}"` : "task";
  return {
    kind: "InvalidTarget",
    target: task.target,
    message: `Cannot score ${label}: target must be a whole number of at least 1 (got ${task.target})`,
  };
}
