import { StringEnum } from "@mariozechner/pi-ai";
import type { ExtensionAPI } from "@mariozechner/pi-coding-agent";
import { Text } from "@mariozechner/pi-tui";
import { type Static, Type } from "@sinclair/typebox";
import { dateRange, isDateKey, shiftDate, today } from "../data/dates.js";
import { currentStreak, longestStreak, resolveHistory } from "../data/history.js";
import { viewDay } from "../data/operations.js";
import { StoreError, type PointsStore } from "../data/store.js";
import { describeDay, errorResult, formatPercent, formatPoints, progressBar, textResult, type ToolDetails, type ToolOutput } from "./format.js";

const MAX_HISTORY_DAYS = 365;

export const ProgressParams = Type.Object({
  action: StringEnum(["day", "history", "streak", "report"] as const),
  date: Type.Optional(Type.String({ description: "Date (YYYY-MM-DD), defaults to today" })),
  days: Type.Optional(Type.Number({ description: "Number of days for history (default 7, at most 365)" })),
});

export type ProgressParamsType = Static<typeof ProgressParams>;

export function runProgressAction(store: PointsStore, params: ProgressParamsType): ToolOutput {
  const date = params.date ?? today();
  if (!isDateKey(date)) return errorResult(`Invalid date '${date}', expected YYYY-MM-DD`);

  try {
    switch (params.action) {
      case "day": {
        const view = viewDay(store, date);
        const p = view.resolved.progress;
        const lines = describeDay(view.day, view.resolved);
        lines.push("");
        p.tasks.forEach((computed, i) => {
          const task = view.day.tasks[i];
          if (!task || !computed) return;
          lines.push(`  ${task.title}: ${formatPoints(computed.effectiveBase)} × ${formatPercent(computed.ratio)} + ${formatPoints(task.reward)} reward = ${formatPoints(computed.earnedPoints)}`);
        });
        return textResult(lines.join("\n"), { action: "day", date, resolved: view.resolved });
      }

      case "history": {
        const requested = params.days !== undefined && Number.isFinite(params.days) ? Math.floor(params.days) : 7;
        const numDays = Math.min(MAX_HISTORY_DAYS, Math.max(1, requested));
        const dates = dateRange(shiftDate(date, -(numDays - 1)), date);
        const resolved = resolveHistory(store.getAllDays());
        const byDate = new Map(resolved.map(r => [r.date, r]));

        const lines = [`📈 Points History (last ${numDays} days)`, ""];
        const rows: { date: string; totalPoints: number; progressRatio: number; bonus: number }[] = [];
        for (const d of dates) {
          const r = byDate.get(d);
          if (!r) {
            lines.push(`  ${d}  —`);
            continue;
          }
          const p = r.progress;
          rows.push({ date: d, totalPoints: p.totalPoints, progressRatio: p.progressRatio, bonus: r.bonus });
          const mark = r.qualified ? " ✅" : "";
          const bonus = r.bonus > 0 ? ` 🔥+${formatPercent(r.bonus)}` : "";
          lines.push(`  ${d}  ${progressBar(p.progressRatio, 15)} ${formatPoints(p.totalPoints).padStart(6)} pts${mark}${bonus}`);
        }
        return textResult(lines.join("\n"), { action: "history", numDays, days: rows });
      }

      case "streak": {
        const days = store.getAllDays();
        const current = currentStreak(days, date);
        const longest = longestStreak(days);
        const view = viewDay(store, date);
        const text = [
          `🔥 Streak: ${current} day${current === 1 ? "" : "s"} (best: ${longest})`,
          `🎁 Routine bonus on ${date}: +${formatPercent(view.resolved.bonus)}`,
        ].join("\n");
        return textResult(text, { action: "streak", current, longest, bonus: view.resolved.bonus });
      }

      case "report": {
        const days = store.getAllDays();
        const resolved = resolveHistory(days);
        const qualified = resolved.filter(r => r.qualified).length;
        const total = resolved.reduce((s, r) => s + r.progress.totalPoints, 0);
        const lines = [
          "# Points — Progress Report",
          `> Generated ${today()}`,
          "",
          `- Days logged: **${resolved.length}**`,
          `- Days on target: **${qualified}**`,
          `- Total points: **${formatPoints(total)}**`,
          `- Current streak: **${currentStreak(days, date)} days**`,
          `- Longest streak: **${longestStreak(days)} days**`,
          "",
        ];
        for (const r of [...resolved].reverse()) {
          const day = days.find(d => d.date === r.date);
          if (!day) continue;
          lines.push(`## ${r.date} — ${formatPoints(r.progress.totalPoints)}/${formatPoints(day.target)} (${formatPercent(r.progress.progressRatio)})`);
          day.tasks.forEach((task, i) => {
            const earned = r.progress.tasks[i]?.earnedPoints;
            const done = task.completed >= task.target ? "x" : " ";
            const score = earned === undefined ? "unscoreable" : `${formatPoints(earned)} pts`;
            lines.push(`- [${done}] ${task.title}${task.routine ? " 🔁" : ""} — ${task.completed}/${task.target}, ${score}`);
          });
          lines.push("");
        }
        return textResult(lines.join("\n"), { action: "report", days: resolved.length, totalPoints: total });
      }

      default:
        return errorResult(`Unknown action: ${String(params.action)}`);
    }
  } catch (err) {
    if (err instanceof StoreError) return errorResult(`Points data unreadable: ${err.message}`);
    throw err;
  }
}

export function registerProgressTool(pi: ExtensionAPI, getStore: () => PointsStore): void {
  pi.registerTool<typeof ProgressParams, ToolDetails>({
    name: "points_progress",
    label: "Points Progress",
    description:
      "Query points and progress. Actions: day (per-task point breakdown for a date), history (daily totals for N days), streak (current and best run of days on target, and the routine bonus it earns), report (complete markdown report).",
    parameters: ProgressParams,

    async execute(_toolCallId, params, _signal, _onUpdate, _ctx) {
      return runProgressAction(getStore(), params);
    },

    renderCall(args, theme) {
      return new Text(theme.fg("toolTitle", theme.bold("points_progress ")) + theme.fg("muted", args.action), 0, 0);
    },

    renderResult(result, _options, theme) {
      const text = result.content[0];
      const content = text?.type === "text" ? text.text : "";
      if (result.details?.error) return new Text(theme.fg("error", content), 0, 0);
      return new Text(theme.fg("success", "✓ ") + theme.fg("muted", content.split("\n")[0] ?? ""), 0, 0);
    },
  });
}
