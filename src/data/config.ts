import type { PointsConfig, PointsConfigFile } from "./types.js";

export const DEFAULT_CONFIG: PointsConfig = {
  dayTargetPoints: 5,
  task: { points: 1, target: 3, max: 8, reward: 0 },
  routine: { points: 3, target: 3, max: 8, reward: 1 },
};

export function resolveConfig(file: PointsConfigFile | null): PointsConfig {
  if (!file) return DEFAULT_CONFIG;
  return {
    dayTargetPoints: file.dayTargetPoints ?? DEFAULT_CONFIG.dayTargetPoints,
    task: { ...DEFAULT_CONFIG.task, ...file.task },
    routine: { ...DEFAULT_CONFIG.routine, ...file.routine },
  };
}
