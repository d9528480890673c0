// ============================================================
// Points Engine — Value Types
// ============================================================

/** One task as the engine sees it. Built by the caller for each computation. */
export interface TaskSnapshot {
  title: string; // display only
  basePoints: number;
  target: number; // completions required for "done", integer >= 1
  completed: number; // may exceed max
  max: number; // completions beyond this earn nothing more
  isRoutine: boolean;
  isOptional: boolean; // no effect on scoring
  reward: number; // fixed points, added whatever the completion ratio
  scalar?: number; // defaults to 1.0
  bonus?: number; // streak bonus fraction, routines only; defaults to 0.0
}

/** A day's goal, its tasks, and the streak leading into it */
export interface DaySnapshot {
  targetPoints: number;
  tasks: readonly TaskSnapshot[];
  priorConsecutiveDays: number;
}

export interface ComputedTaskPoints {
  earnedPoints: number;
  effectiveBase: number;
  ratio: number;
}

export interface UnscoreableTask {
  index: number;
  title: string;
  error: InvalidTargetError;
}

export interface ComputedDayProgress {
  totalPoints: number;
  progressRatio: number; // [0, 1]
  /** Per-task results in input order; null where the task could not be scored */
  tasks: (ComputedTaskPoints | null)[];
  unscoreable: UnscoreableTask[];
}

export interface InvalidTargetError {
  kind: "InvalidTarget";
  target: number;
  message: string;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };
