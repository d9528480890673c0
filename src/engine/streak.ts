// ============================================================
// Points Engine — Streak Bonus
// ============================================================

/** Bonus added per qualifying day after the first */
export const STREAK_STEP = 0.1;

/** Bonus ceiling (100%) */
export const MAX_STREAK_BONUS = 1.0;

/**
 * Bonus fraction for a run of consecutive days that met their target.
 *
 * The first qualifying day earns nothing; every further day adds 10%,
 * up to 100%. Garbage input (negative, NaN) resolves to 0.
 */
export function resolveBonus(priorConsecutiveDays: number): number {
  if (!Number.isFinite(priorConsecutiveDays) || priorConsecutiveDays < 1) return 0;
  const days = Math.floor(priorConsecutiveDays);
  return Math.min(MAX_STREAK_BONUS, Math.max(0, (days - 1) * STREAK_STEP));
}
