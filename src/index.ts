/**
 * Points Extension for pi
 *
 * Log routines and one-off tasks against calendar dates, earn points for
 * completing them, and build streaks that boost routine points:
 * - Per-task scoring (partial credit for routines, all-or-nothing tasks)
 * - Daily point targets with progress
 * - Streak bonus: +10% on routines per consecutive day on target, up to +100%
 * - Reusable task templates
 *
 * Commands:
 *   /points        — Open the dashboard overlay (also Ctrl+H)
 *   /points-day    — Open the interactive day tracker
 *   /points-export — Export all data to markdown
 *
 * Tools (LLM callable):
 *   points_tasks     — Manage a date's tasks and log completions
 *   points_templates — Manage reusable task templates
 *   points_progress  — Query totals, history and streaks
 */

import type { ExtensionAPI, ExtensionContext } from "@mariozechner/pi-coding-agent";
import { Key } from "@mariozechner/pi-tui";

import { today } from "./data/dates.js";
import { currentStreak } from "./data/history.js";
import { viewDay, type DayChange } from "./data/operations.js";
import { PointsStore, StoreError } from "./data/store.js";
import { formatPercent, formatPoints } from "./tools/format.js";
import { registerProgressTool } from "./tools/progress.js";
import { registerTasksTool } from "./tools/tasks.js";
import { registerTemplatesTool } from "./tools/templates.js";
import { showDashboard } from "./ui/dashboard.js";
import { showDayTracker } from "./ui/day-tracker.js";

export default function pointsExtension(pi: ExtensionAPI): void {
  let store: PointsStore;

  // ── Initialize store on session events ──────────────────

  function initStore(ctx: ExtensionContext): void {
    store = new PointsStore(ctx.cwd);
  }

  function reportStoreError(ctx: ExtensionContext, err: unknown): void {
    if (!(err instanceof StoreError)) throw err;
    ctx.ui.notify(`Points data unreadable: ${err.message}`, "error");
  }

  // ── Widget & Status Updates ─────────────────────────────

  function updateWidgetAndStatus(ctx: ExtensionContext): void {
    let view: DayChange;
    let streak: number;
    try {
      view = viewDay(store, today());
      streak = currentStreak(store.getAllDays(), today());
    } catch (err) {
      ctx.ui.setStatus("points", ctx.ui.theme.fg("error", "⭐ points: data error"));
      reportStoreError(ctx, err);
      return;
    }

    const th = ctx.ui.theme;
    const p = view.resolved.progress;
    const statusText = `⭐ ${formatPoints(p.totalPoints)}/${formatPoints(view.day.target)}`;
    ctx.ui.setStatus("points", th.fg(p.progressRatio >= 1 ? "success" : "accent", statusText));

    if (view.day.tasks.length === 0 && streak === 0) {
      ctx.ui.setWidget("points-progress", undefined);
      return;
    }

    const done = view.day.tasks.filter(t => t.completed >= t.target).length;
    const parts = [
      `${formatPercent(p.progressRatio)} of target`,
      `✅ ${done}/${view.day.tasks.length}`,
      streak > 0 ? `🔥 ${streak}d` : "",
      view.resolved.bonus > 0 ? `+${formatPercent(view.resolved.bonus)} routines` : "",
    ].filter(Boolean);
    const line = th.fg("accent", "⭐ ") + th.fg("muted", parts.join(" │ "));
    ctx.ui.setWidget("points-progress", [line]);
  }

  // ── Session Events ──────────────────────────────────────

  pi.on("session_start", async (_event, ctx) => {
    initStore(ctx);
    updateWidgetAndStatus(ctx);
  });

  pi.on("session_switch", async (_event, ctx) => { initStore(ctx); updateWidgetAndStatus(ctx); });
  pi.on("session_fork", async (_event, ctx) => { initStore(ctx); updateWidgetAndStatus(ctx); });
  pi.on("session_tree", async (_event, ctx) => { initStore(ctx); updateWidgetAndStatus(ctx); });

  // Refresh widget after tool calls that modify points data
  pi.on("tool_result", async (event, ctx) => {
    if (event.toolName?.startsWith("points_")) {
      updateWidgetAndStatus(ctx);
    }
  });

  // ── Context Injection ───────────────────────────────────

  pi.on("before_agent_start", async (_event, ctx) => {
    let view: DayChange;
    try {
      view = viewDay(store, today());
    } catch (err) {
      reportStoreError(ctx, err);
      return;
    }
    if (view.day.tasks.length === 0) return;

    const p = view.resolved.progress;
    const pending = view.day.tasks.filter(t => !t.optional && t.completed < t.target);
    let context = `[POINTS CONTEXT]
Today (${view.day.date}): ${formatPoints(p.totalPoints)}/${formatPoints(view.day.target)} points (${formatPercent(p.progressRatio)})
Streak bonus on routines: +${formatPercent(view.resolved.bonus)}`;

    if (pending.length > 0) {
      context += `\nNot done yet: ${pending.map(t => `${t.title} (${t.completed}/${t.target})`).join(", ")}`;
    }

    return {
      message: {
        customType: "points-context",
        content: context,
        display: false,
      },
    };
  });

  // ── Register Tools ──────────────────────────────────────

  registerTasksTool(pi, () => store);
  registerTemplatesTool(pi, () => store);
  registerProgressTool(pi, () => store);

  // ── Register Commands ───────────────────────────────────

  pi.registerCommand("points", {
    description: "Open the points dashboard overlay",
    handler: async (_args, ctx) => {
      if (!ctx.hasUI) { ctx.ui.notify("/points requires interactive mode", "error"); return; }
      try {
        await showDashboard(ctx, store);
      } catch (err) {
        reportStoreError(ctx, err);
      }
      updateWidgetAndStatus(ctx);
    },
  });

  pi.registerCommand("points-day", {
    description: "Log task completions for a date",
    handler: async (_args, ctx) => {
      if (!ctx.hasUI) { ctx.ui.notify("/points-day requires interactive mode", "error"); return; }
      try {
        await showDayTracker(ctx, store);
      } catch (err) {
        reportStoreError(ctx, err);
      }
      updateWidgetAndStatus(ctx);
    },
  });

  pi.registerCommand("points-export", {
    description: "Export all points data to markdown",
    handler: async (_args, ctx) => {
      if (store.listDates().length === 0) {
        ctx.ui.notify("No points data to export.", "warning");
        return;
      }
      pi.sendUserMessage("Use the points_progress tool with action 'report' to generate a complete markdown export of my points history, then write it to .pi/points/export.md");
    },
  });

  // ── Keyboard Shortcut ───────────────────────────────────

  pi.registerShortcut(Key.ctrl("h"), {
    description: "Open points dashboard",
    handler: async (ctx) => {
      try {
        await showDashboard(ctx, store);
      } catch (err) {
        reportStoreError(ctx, err);
      }
      updateWidgetAndStatus(ctx);
    },
  });
}
