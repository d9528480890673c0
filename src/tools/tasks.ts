import { StringEnum } from "@mariozechner/pi-ai";
import type { ExtensionAPI } from "@mariozechner/pi-coding-agent";
import { Text } from "@mariozechner/pi-tui";
import { type Static, Type } from "@sinclair/typebox";
import { isDateKey, today } from "../data/dates.js";
import {
  addTask,
  clearDay,
  decrementTask,
  deleteTask,
  duplicateTask,
  incrementTask,
  resetDay,
  setDayTarget,
  updateTask,
  viewDay,
  type DayChange,
  type OperationResult,
  type TaskInput,
} from "../data/operations.js";
import { StoreError, type PointsStore } from "../data/store.js";
import { describeDay, errorResult, formatPoints, textResult, type ToolDetails, type ToolOutput } from "./format.js";

export const TasksParams = Type.Object({
  action: StringEnum(["list", "add", "increment", "decrement", "update", "delete", "duplicate", "reset", "clear", "target"] as const),
  date: Type.Optional(Type.String({ description: "Date (YYYY-MM-DD), defaults to today" })),
  taskId: Type.Optional(Type.String({ description: "Task ID for increment/decrement/update/delete/duplicate" })),
  title: Type.Optional(Type.String({ description: "Task title (for add/update)" })),
  points: Type.Optional(Type.Number({ description: "Base points" })),
  target: Type.Optional(Type.Number({ description: "Completions needed to count as done" })),
  max: Type.Optional(Type.Number({ description: "Completions beyond which no more points accrue" })),
  reward: Type.Optional(Type.Number({ description: "Fixed points added on top" })),
  scalar: Type.Optional(Type.Number({ description: "Point multiplier (default 1)" })),
  routine: Type.Optional(Type.Boolean({ description: "Recurring routine: partial credit and streak bonus" })),
  optional: Type.Optional(Type.Boolean({ description: "Mark as optional" })),
  dayTarget: Type.Optional(Type.Number({ description: "Day's point target (for target)" })),
});

export type TasksParamsType = Static<typeof TasksParams>;

export function runTasksAction(store: PointsStore, params: TasksParamsType): ToolOutput {
  const date = params.date ?? today();
  if (!isDateKey(date)) return errorResult(`Invalid date '${date}', expected YYYY-MM-DD`);

  try {
    switch (params.action) {
      case "list": {
        const view = viewDay(store, date);
        return textResult(describeDay(view.day, view.resolved).join("\n"), {
          action: "list",
          date,
          totalPoints: view.resolved.progress.totalPoints,
          progressRatio: view.resolved.progress.progressRatio,
          tasks: view.day.tasks,
        });
      }

      case "add": {
        const result = addTask(store, date, taskInput(params));
        return report(result, "add", change => `➕ Added ${change.task?.title ?? "task"} [${change.task?.id ?? ""}]`);
      }

      case "increment": {
        if (!params.taskId) return errorResult("taskId required");
        return report(incrementTask(store, date, params.taskId), "increment", change =>
          `✅ ${change.task?.title ?? params.taskId}: ${change.task?.completed ?? 0}/${change.task?.target ?? 0}`);
      }

      case "decrement": {
        if (!params.taskId) return errorResult("taskId required");
        return report(decrementTask(store, date, params.taskId), "decrement", change =>
          `↩️ ${change.task?.title ?? params.taskId}: ${change.task?.completed ?? 0}/${change.task?.target ?? 0}`);
      }

      case "update": {
        if (!params.taskId) return errorResult("taskId required");
        return report(updateTask(store, date, params.taskId, taskInput(params)), "update", change =>
          `✏️ Updated ${change.task?.title ?? params.taskId}`);
      }

      case "delete": {
        if (!params.taskId) return errorResult("taskId required");
        return report(deleteTask(store, date, params.taskId), "delete", change =>
          `🗑️ Deleted ${change.task?.title ?? params.taskId}`);
      }

      case "duplicate": {
        if (!params.taskId) return errorResult("taskId required");
        return report(duplicateTask(store, date, params.taskId), "duplicate", change =>
          `📄 Duplicated as [${change.task?.id ?? ""}]`);
      }

      case "reset":
        return report({ ok: true, value: resetDay(store, date) }, "reset", () => `🔄 Completions reset for ${date}`);

      case "clear":
        return report({ ok: true, value: clearDay(store, date) }, "clear", () => `🧹 Cleared all tasks for ${date}`);

      case "target": {
        if (params.dayTarget === undefined) return errorResult("dayTarget required");
        return report(setDayTarget(store, date, params.dayTarget), "target", change =>
          `🎯 Target for ${date} set to ${formatPoints(change.day.target)} pts`);
      }

      default:
        return errorResult(`Unknown action: ${String(params.action)}`);
    }
  } catch (err) {
    if (err instanceof StoreError) return errorResult(`Points data unreadable: ${err.message}`);
    throw err;
  }
}

export function registerTasksTool(pi: ExtensionAPI, getStore: () => PointsStore): void {
  pi.registerTool<typeof TasksParams, ToolDetails>({
    name: "points_tasks",
    label: "Points Tasks",
    description:
      "Manage the tasks and routines logged on a date. Actions: list (tasks with earned points), add (new task; routine=true for a routine), increment/decrement (log or undo a completion), update, delete, duplicate, reset (zero all completions), clear (remove all tasks), target (set the day's point target via dayTarget).",
    parameters: TasksParams,

    async execute(_toolCallId, params, _signal, _onUpdate, _ctx) {
      return runTasksAction(getStore(), params);
    },

    renderCall(args, theme) {
      let text = theme.fg("toolTitle", theme.bold("points_tasks ")) + theme.fg("muted", args.action);
      if (args.taskId) text += " " + theme.fg("accent", args.taskId);
      return new Text(text, 0, 0);
    },

    renderResult(result, _options, theme) {
      const text = result.content[0];
      const content = text?.type === "text" ? text.text : "";
      if (result.details?.error) return new Text(theme.fg("error", content), 0, 0);
      return new Text(theme.fg("success", "✓ ") + theme.fg("muted", content.split("\n")[0] ?? ""), 0, 0);
    },
  });
}

function taskInput(params: TasksParamsType): TaskInput {
  return {
    title: params.title,
    points: params.points,
    target: params.target,
    max: params.max,
    reward: params.reward,
    scalar: params.scalar,
    routine: params.routine,
    optional: params.optional,
  };
}

function report(result: OperationResult<DayChange>, action: string, headline: (change: DayChange) => string): ToolOutput {
  if (!result.ok) return errorResult(result.error.message);
  const change = result.value;
  const p = change.resolved.progress;
  const text = [
    headline(change),
    `⭐ ${change.day.date}: ${formatPoints(p.totalPoints)}/${formatPoints(change.day.target)} pts`,
  ].join("\n");
  return textResult(text, {
    action,
    date: change.day.date,
    task: change.task,
    totalPoints: p.totalPoints,
    progressRatio: p.progressRatio,
  });
}
