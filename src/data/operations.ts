// ============================================================
// Points — Task & Template Operations
// ============================================================
//
// Every mutation reloads the day, applies the change, rescores it
// against the stored history and persists the new total. Later days are
// rescored too, since their streak bonus depends on this one.

import { v4 as uuid } from "uuid";
import type { Result } from "../engine/types.js";
import { resolveDay, resolveHistory, type ResolvedDay } from "./history.js";
import type { PointsStore } from "./store.js";
import type { DayRecord, PointsConfig, TaskRecord, TemplateRecord } from "./types.js";

export interface OperationError {
  kind: "NotFound" | "InvalidTask";
  message: string;
}

export type OperationResult<T> = Result<T, OperationError>;

/** Editable task attributes; anything omitted falls back to config or the current value */
export interface TaskInput {
  title?: string;
  points?: number;
  target?: number;
  max?: number;
  reward?: number;
  scalar?: number;
  routine?: boolean;
  optional?: boolean;
}

export interface DayChange {
  day: DayRecord;
  resolved: ResolvedDay;
  task?: TaskRecord;
}

// ── Days ─────────────────────────────────────────────────

/** Rescores and saves a day, then refreshes the cached totals of the days after it */
export function commitDay(store: PointsStore, day: DayRecord): ResolvedDay {
  const others = store.getAllDays().filter(d => d.date !== day.date);
  const resolved = resolveDay(others, day);
  day.points = resolved.progress.totalPoints;
  store.saveDay(day);

  const later = others.filter(d => d.date > day.date);
  if (later.length > 0) {
    for (const next of resolveHistory([...others, day])) {
      const record = later.find(d => d.date === next.date);
      if (record && record.points !== next.progress.totalPoints) {
        record.points = next.progress.totalPoints;
        store.saveDay(record);
      }
    }
  }
  return resolved;
}

export function viewDay(store: PointsStore, date: string): DayChange {
  const day = store.getOrCreateDay(date);
  const others = store.getAllDays().filter(d => d.date !== date);
  return { day, resolved: resolveDay(others, day) };
}

export function setDayTarget(store: PointsStore, date: string, target: number): OperationResult<DayChange> {
  if (!Number.isFinite(target) || target < 0) {
    return invalid(`Day target must be zero or more (got ${target})`);
  }
  const day = store.getOrCreateDay(date);
  day.target = target;
  return { ok: true, value: { day, resolved: commitDay(store, day) } };
}

/** Sets every completion count on the day back to 0 */
export function resetDay(store: PointsStore, date: string): DayChange {
  const day = store.getOrCreateDay(date);
  const now = new Date().toISOString();
  for (const task of day.tasks) {
    task.completed = 0;
    task.updatedAt = now;
  }
  return { day, resolved: commitDay(store, day) };
}

export function clearDay(store: PointsStore, date: string): DayChange {
  const day = store.getOrCreateDay(date);
  day.tasks = [];
  return { day, resolved: commitDay(store, day) };
}

// ── Tasks ────────────────────────────────────────────────

export function addTask(store: PointsStore, date: string, input: TaskInput): OperationResult<DayChange> {
  const title = input.title?.trim();
  if (!title) return invalid("Task title is required");

  const config = store.getConfig();
  const routine = input.routine ?? false;
  const fields = withDefaults(config, input, routine);
  const problem = validateTask(fields);
  if (problem) return invalid(problem);

  const day = store.getOrCreateDay(date);
  const now = new Date().toISOString();
  const task: TaskRecord = {
    id: uuid(),
    title,
    ...fields,
    completed: 0,
    position: day.tasks.length,
    createdAt: now,
    updatedAt: now,
  };
  day.tasks.push(task);
  return { ok: true, value: { day, task, resolved: commitDay(store, day) } };
}

export function updateTask(store: PointsStore, date: string, taskId: string, patch: TaskInput): OperationResult<DayChange> {
  return mutateTask(store, date, taskId, task => {
    const next = {
      points: patch.points ?? task.points,
      target: patch.target ?? task.target,
      max: patch.max ?? task.max,
      reward: patch.reward ?? task.reward,
      scalar: patch.scalar ?? task.scalar,
      routine: patch.routine ?? task.routine,
      optional: patch.optional ?? task.optional,
    };
    // A raised target drags the ceiling with it unless a max was given
    if (patch.target !== undefined && patch.max === undefined && next.max < next.target) {
      next.max = next.target;
    }
    const problem = validateTask(next);
    if (problem) return problem;
    if (patch.title !== undefined) {
      if (!patch.title.trim()) return "Task title is required";
      task.title = patch.title.trim();
    }
    Object.assign(task, next);
    return null;
  });
}

/** One more completion; no-op once `max` is reached */
export function incrementTask(store: PointsStore, date: string, taskId: string): OperationResult<DayChange> {
  return mutateTask(store, date, taskId, task => {
    if (task.completed < task.max) task.completed += 1;
    return null;
  });
}

/** One fewer completion; no-op at 0 */
export function decrementTask(store: PointsStore, date: string, taskId: string): OperationResult<DayChange> {
  return mutateTask(store, date, taskId, task => {
    if (task.completed > 0) task.completed -= 1;
    return null;
  });
}

export function deleteTask(store: PointsStore, date: string, taskId: string): OperationResult<DayChange> {
  const day = store.getOrCreateDay(date);
  const task = day.tasks.find(t => t.id === taskId);
  if (!task) return notFound(taskId, date);
  day.tasks = day.tasks.filter(t => t.id !== taskId).map((t, i) => ({ ...t, position: i }));
  return { ok: true, value: { day, task, resolved: commitDay(store, day) } };
}

/** Appends a copy with no completions */
export function duplicateTask(store: PointsStore, date: string, taskId: string): OperationResult<DayChange> {
  const day = store.getOrCreateDay(date);
  const source = day.tasks.find(t => t.id === taskId);
  if (!source) return notFound(taskId, date);
  const now = new Date().toISOString();
  const task: TaskRecord = {
    ...source,
    id: uuid(),
    completed: 0,
    position: day.tasks.length,
    createdAt: now,
    updatedAt: now,
  };
  day.tasks.push(task);
  return { ok: true, value: { day, task, resolved: commitDay(store, day) } };
}

// ── Templates ────────────────────────────────────────────

export function addTemplate(store: PointsStore, input: TaskInput): OperationResult<TemplateRecord> {
  const title = input.title?.trim();
  if (!title) return invalid("Template title is required");
  const routine = input.routine ?? false;
  const fields = withDefaults(store.getConfig(), input, routine);
  const problem = validateTask(fields);
  if (problem) return invalid(problem);

  const template: TemplateRecord = { id: uuid(), title, ...fields };
  store.saveTemplates([...store.getTemplates(), template]);
  return { ok: true, value: template };
}

export function removeTemplate(store: PointsStore, templateId: string): OperationResult<TemplateRecord> {
  const templates = store.getTemplates();
  const template = templates.find(t => t.id === templateId);
  if (!template) return { ok: false, error: { kind: "NotFound", message: `Template '${templateId}' not found` } };
  store.saveTemplates(templates.filter(t => t.id !== templateId));
  return { ok: true, value: template };
}

/** Copies a day's task into the templates */
export function saveAsTemplate(store: PointsStore, date: string, taskId: string): OperationResult<TemplateRecord> {
  const task = store.getOrCreateDay(date).tasks.find(t => t.id === taskId);
  if (!task) return notFound(taskId, date);
  const template: TemplateRecord = { id: uuid(), title: task.title, ...taskFields(task) };
  store.saveTemplates([...store.getTemplates(), template]);
  return { ok: true, value: template };
}

/** Stamps every template onto the date, skipping titles already there */
export function applyTemplates(store: PointsStore, date: string): DayChange & { added: TaskRecord[] } {
  const day = store.getOrCreateDay(date);
  const existing = new Set(day.tasks.map(t => t.title.toLowerCase()));
  const now = new Date().toISOString();
  const added: TaskRecord[] = [];

  for (const template of store.getTemplates()) {
    if (existing.has(template.title.toLowerCase())) continue;
    const task: TaskRecord = {
      id: uuid(),
      title: template.title,
      ...taskFields(template),
      completed: 0,
      position: day.tasks.length,
      createdAt: now,
      updatedAt: now,
    };
    day.tasks.push(task);
    existing.add(template.title.toLowerCase());
    added.push(task);
  }
  return { day, added, resolved: commitDay(store, day) };
}

// ── Helpers ──────────────────────────────────────────────

type TaskFields = Pick<TaskRecord, "points" | "target" | "max" | "reward" | "scalar" | "routine" | "optional">;

function withDefaults(config: PointsConfig, input: TaskInput, routine: boolean): TaskFields {
  const defaults = routine ? config.routine : config.task;
  const target = input.target ?? defaults.target;
  return {
    points: input.points ?? defaults.points,
    target,
    // Explicit targets get a little headroom; the defaults carry their own max
    max: input.max ?? (input.target !== undefined ? target + 2 : Math.max(defaults.max, target)),
    reward: input.reward ?? defaults.reward,
    scalar: input.scalar ?? 1,
    routine,
    optional: input.optional ?? false,
  };
}

function taskFields(source: TaskFields): TaskFields {
  return {
    points: source.points,
    target: source.target,
    max: source.max,
    reward: source.reward,
    scalar: source.scalar,
    routine: source.routine,
    optional: source.optional,
  };
}

function validateTask(fields: TaskFields): string | null {
  if (!Number.isInteger(fields.target) || fields.target < 1) return `Target must be a whole number of at least 1 (got ${fields.target})`;
  if (!Number.isInteger(fields.max) || fields.max < fields.target) return `Max must be a whole number no lower than target ${fields.target} (got ${fields.max})`;
  if (!(fields.points >= 0)) return `Points cannot be negative (got ${fields.points})`;
  if (!(fields.reward >= 0)) return `Reward cannot be negative (got ${fields.reward})`;
  if (!(fields.scalar > 0)) return `Scalar must be positive (got ${fields.scalar})`;
  return null;
}

function mutateTask(
  store: PointsStore,
  date: string,
  taskId: string,
  apply: (task: TaskRecord) => string | null,
): OperationResult<DayChange> {
  const day = store.getOrCreateDay(date);
  const task = day.tasks.find(t => t.id === taskId);
  if (!task) return notFound(taskId, date);
  const problem = apply(task);
  if (problem) return invalid(problem);
  task.updatedAt = new Date().toISOString();
  return { ok: true, value: { day, task, resolved: commitDay(store, day) } };
}

function notFound<T>(taskId: string, date: string): OperationResult<T> {
  return { ok: false, error: { kind: "NotFound", message: `Task '${taskId}' not found on ${date}` } };
}

function invalid<T>(message: string): OperationResult<T> {
  return { ok: false, error: { kind: "InvalidTask", message } };
}
