import { StringEnum } from "@mariozechner/pi-ai";
import type { ExtensionAPI } from "@mariozechner/pi-coding-agent";
import { Text } from "@mariozechner/pi-tui";
import { type Static, Type } from "@sinclair/typebox";
import { isDateKey, today } from "../data/dates.js";
import { addTemplate, applyTemplates, removeTemplate, saveAsTemplate } from "../data/operations.js";
import { StoreError, type PointsStore } from "../data/store.js";
import { errorResult, formatPoints, textResult, type ToolDetails, type ToolOutput } from "./format.js";

export const TemplatesParams = Type.Object({
  action: StringEnum(["list", "add", "remove", "apply", "save"] as const),
  templateId: Type.Optional(Type.String({ description: "Template ID to remove" })),
  taskId: Type.Optional(Type.String({ description: "Task ID to save as a template (for save)" })),
  date: Type.Optional(Type.String({ description: "Date (YYYY-MM-DD) for apply/save, defaults to today" })),
  title: Type.Optional(Type.String({ description: "Template title (for add)" })),
  points: Type.Optional(Type.Number({ description: "Base points" })),
  target: Type.Optional(Type.Number({ description: "Completions needed" })),
  max: Type.Optional(Type.Number({ description: "Completion ceiling" })),
  reward: Type.Optional(Type.Number({ description: "Fixed reward points" })),
  scalar: Type.Optional(Type.Number({ description: "Point multiplier" })),
  routine: Type.Optional(Type.Boolean({ description: "Routine template" })),
  optional: Type.Optional(Type.Boolean({ description: "Optional task" })),
});

export type TemplatesParamsType = Static<typeof TemplatesParams>;

export function runTemplatesAction(store: PointsStore, params: TemplatesParamsType): ToolOutput {
  const date = params.date ?? today();
  if (!isDateKey(date)) return errorResult(`Invalid date '${date}', expected YYYY-MM-DD`);

  try {
    switch (params.action) {
      case "list": {
        const templates = store.getTemplates();
        if (templates.length === 0) {
          return textResult("No templates. Use 'add' or 'save' a task from a date.", { action: "list", templates });
        }
        const lines = [`📋 Templates (${templates.length})`, ""];
        for (const t of templates) {
          const kind = t.routine ? "🔁" : "☐";
          lines.push(`  ${kind} [${t.id}] ${t.title} — ${formatPoints(t.points)} pts, target ${t.target}, max ${t.max}`);
        }
        return textResult(lines.join("\n"), { action: "list", templates });
      }

      case "add": {
        const result = addTemplate(store, {
          title: params.title,
          points: params.points,
          target: params.target,
          max: params.max,
          reward: params.reward,
          scalar: params.scalar,
          routine: params.routine,
          optional: params.optional,
        });
        if (!result.ok) return errorResult(result.error.message);
        return textResult(`➕ Added template: ${result.value.title} [${result.value.id}]`, { action: "add", template: result.value });
      }

      case "remove": {
        if (!params.templateId) return errorResult("templateId required");
        const result = removeTemplate(store, params.templateId);
        if (!result.ok) return errorResult(result.error.message);
        return textResult(`🗑️ Removed template: ${result.value.title}`, { action: "remove", template: result.value });
      }

      case "save": {
        if (!params.taskId) return errorResult("taskId required");
        const result = saveAsTemplate(store, date, params.taskId);
        if (!result.ok) return errorResult(result.error.message);
        return textResult(`💾 Saved template: ${result.value.title} [${result.value.id}]`, { action: "save", template: result.value });
      }

      case "apply": {
        const change = applyTemplates(store, date);
        const text = change.added.length > 0
          ? `📥 Added ${change.added.length} task${change.added.length > 1 ? "s" : ""} to ${date}: ${change.added.map(t => t.title).join(", ")}`
          : `Nothing to add: every template is already on ${date}`;
        return textResult(text, { action: "apply", date, added: change.added });
      }

      default:
        return errorResult(`Unknown action: ${String(params.action)}`);
    }
  } catch (err) {
    if (err instanceof StoreError) return errorResult(`Points data unreadable: ${err.message}`);
    throw err;
  }
}

export function registerTemplatesTool(pi: ExtensionAPI, getStore: () => PointsStore): void {
  pi.registerTool<typeof TemplatesParams, ToolDetails>({
    name: "points_templates",
    label: "Points Templates",
    description:
      "Reusable task definitions. Actions: list, add (new template), remove (by templateId), save (copy a date's task into templates), apply (stamp all templates onto a date, skipping titles already there).",
    parameters: TemplatesParams,

    async execute(_toolCallId, params, _signal, _onUpdate, _ctx) {
      return runTemplatesAction(getStore(), params);
    },

    renderCall(args, theme) {
      return new Text(theme.fg("toolTitle", theme.bold("points_templates ")) + theme.fg("muted", args.action), 0, 0);
    },

    renderResult(result, _options, theme) {
      const text = result.content[0];
      const content = text?.type === "text" ? text.text : "";
      if (result.details?.error) return new Text(theme.fg("error", content), 0, 0);
      return new Text(theme.fg("success", "✓ ") + theme.fg("muted", content.split("\n")[0] ?? ""), 0, 0);
    },
  });
}
