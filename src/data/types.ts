// ============================================================
// Points — Stored Record Types
// ============================================================

import { type Static, Type } from "@sinclair/typebox";

/** A task or routine logged against one date */
export const TaskRecordSchema = Type.Object({
  id: Type.String(),
  title: Type.String(),
  points: Type.Number(), // base points
  target: Type.Integer(),
  completed: Type.Integer(),
  max: Type.Integer(),
  routine: Type.Boolean(),
  optional: Type.Boolean(),
  reward: Type.Number(),
  scalar: Type.Number(),
  position: Type.Integer(),
  createdAt: Type.String(),
  updatedAt: Type.String(),
});
export type TaskRecord = Static<typeof TaskRecordSchema>;

/** One calendar date: its point target, cached total, and tasks */
export const DayRecordSchema = Type.Object({
  date: Type.String({ pattern: "^\\d{4}-\\d{2}-\\d{2}$" }),
  target: Type.Number(),
  points: Type.Number(),
  tasks: Type.Array(TaskRecordSchema),
});
export type DayRecord = Static<typeof DayRecordSchema>;

/** Reusable task definition stamped onto dates */
export const TemplateRecordSchema = Type.Object({
  id: Type.String(),
  title: Type.String(),
  points: Type.Number(),
  target: Type.Integer(),
  max: Type.Integer(),
  routine: Type.Boolean(),
  optional: Type.Boolean(),
  reward: Type.Number(),
  scalar: Type.Number(),
});
export type TemplateRecord = Static<typeof TemplateRecordSchema>;

export const TemplateListSchema = Type.Array(TemplateRecordSchema);

const TaskDefaultsSchema = Type.Object({
  points: Type.Number({ minimum: 0 }),
  target: Type.Integer({ minimum: 1 }),
  max: Type.Integer({ minimum: 1 }),
  reward: Type.Number({ minimum: 0 }),
});
export type TaskDefaults = Static<typeof TaskDefaultsSchema>;

/** config.json — every field optional, merged over the defaults */
export const PointsConfigSchema = Type.Object({
  dayTargetPoints: Type.Optional(Type.Number({ minimum: 0 })),
  task: Type.Optional(Type.Partial(TaskDefaultsSchema)),
  routine: Type.Optional(Type.Partial(TaskDefaultsSchema)),
});
export type PointsConfigFile = Static<typeof PointsConfigSchema>;

export interface PointsConfig {
  dayTargetPoints: number;
  task: TaskDefaults;
  routine: TaskDefaults;
}
