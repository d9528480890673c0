import type { ResolvedDay } from "../data/history.js";
import type { DayRecord, TaskRecord } from "../data/types.js";

export interface ToolDetails {
  error?: boolean;
  action?: string;
  [key: string]: unknown;
}

export interface ToolOutput {
  content: { type: "text"; text: string }[];
  details: ToolDetails;
}

export function textResult(text: string, details: ToolDetails): ToolOutput {
  return { content: [{ type: "text", text }], details };
}

export function errorResult(message: string): ToolOutput {
  return { content: [{ type: "text", text: message }], details: { error: true } };
}

/** Points rounded to two decimals, without trailing zeros */
export function formatPoints(points: number): string {
  return String(Math.round(points * 100) / 100);
}

export function formatPercent(ratio: number): string {
  return `${Math.round(ratio * 100)}%`;
}

export function progressBar(ratio: number, width: number): string {
  const filled = Math.round(Math.min(1, Math.max(0, ratio)) * width);
  return "█".repeat(filled) + "░".repeat(width - filled);
}

/** "[id] Title  2/3 (max 5)  4.5 pts" */
export function describeTask(task: TaskRecord, earned: number | null): string {
  const kind = task.routine ? "🔁" : "☐";
  const mark = task.completed >= task.target ? "✅" : kind;
  const flags = task.optional ? " (optional)" : "";
  const score = earned === null ? "⚠️ unscoreable" : `${formatPoints(earned)} pts`;
  return `${mark} [${task.id}] ${task.title}${flags} — ${task.completed}/${task.target} (max ${task.max}) — ${score}`;
}

export function describeDay(day: DayRecord, resolved: ResolvedDay): string[] {
  const p = resolved.progress;
  const lines = [
    `⭐ ${day.date}: ${formatPoints(p.totalPoints)}/${formatPoints(day.target)} pts ${progressBar(p.progressRatio, 20)} ${formatPercent(p.progressRatio)}`,
  ];
  if (resolved.bonus > 0) {
    lines.push(`🔥 Streak bonus: +${formatPercent(resolved.bonus)} on routines (${resolved.priorConsecutiveDays} days in a row)`);
  }
  lines.push("");
  if (day.tasks.length === 0) {
    lines.push("  No tasks for this date.");
  } else {
    day.tasks.forEach((task, i) => {
      lines.push(`  ${describeTask(task, p.tasks[i]?.earnedPoints ?? null)}`);
    });
  }
  for (const u of p.unscoreable) {
    lines.push(`  ⚠️ ${u.error.message}`);
  }
  return lines;
}
