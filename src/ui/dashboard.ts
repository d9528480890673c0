/**
 * Points Dashboard Overlay
 *
 * A centered overlay showing one date at a time:
 * - Points earned against the day's target
 * - Each task's completions and earned points
 * - Current and best streak, and the routine bonus in effect
 */

import type { ExtensionContext, Theme } from "@mariozechner/pi-coding-agent";
import { matchesKey, truncateToWidth, visibleWidth } from "@mariozechner/pi-tui";
import { shiftDate, today } from "../data/dates.js";
import { currentStreak, longestStreak } from "../data/history.js";
import { viewDay, type DayChange } from "../data/operations.js";
import { readSafely, type PointsStore } from "../data/store.js";
import type { DayRecord } from "../data/types.js";
import { formatPercent, formatPoints } from "../tools/format.js";

class DashboardComponent {
  private store: PointsStore;
  private theme: Theme;
  private done: (result: void) => void;
  private date = today();
  private view: DayChange;
  private streak = { current: 0, longest: 0 };
  private error?: string;
  private cachedWidth?: number;
  private cachedLines?: string[];

  constructor(store: PointsStore, theme: Theme, done: (result: void) => void) {
    this.store = store;
    this.theme = theme;
    this.done = done;
    this.view = viewDay(store, this.date);
    this.streak = this.loadStreak(store.getAllDays());
  }

  handleInput(data: string): void {
    if (matchesKey(data, "escape") || matchesKey(data, "q")) {
      this.done();
      return;
    }
    if (matchesKey(data, "left")) {
      this.load(shiftDate(this.date, -1));
    }
    if (matchesKey(data, "right") && this.date < today()) {
      this.load(shiftDate(this.date, 1));
    }
    if (matchesKey(data, "r")) {
      this.load(this.date);
    }
  }

  render(width: number): string[] {
    if (this.cachedLines && this.cachedWidth === width) {
      return this.cachedLines;
    }

    const th = this.theme;
    const { day, resolved } = this.view;
    const p = resolved.progress;
    const innerW = Math.min(width - 2, 72);
    const lines: string[] = [];

    const pad = (content: string, w: number) => {
      const vis = visibleWidth(content);
      return content + " ".repeat(Math.max(0, w - vis));
    };
    const row = (content: string) =>
      th.fg("border", "│") + " " + pad(content, innerW - 2) + " " + th.fg("border", "│");
    const hr = (char = "─") => th.fg("border", `├${char.repeat(innerW)}┤`);

    lines.push(th.fg("border", `╭${"─".repeat(innerW)}╮`));
    lines.push(row(th.fg("accent", th.bold("⭐ POINTS DASHBOARD"))));
    lines.push(row(""));

    const isToday = this.date === today();
    lines.push(row(th.fg("muted", `📅 ${this.date}${isToday ? " (today)" : ""}`)));

    // Day progress
    const barWidth = 30;
    const filled = Math.round(p.progressRatio * barWidth);
    const barColor = p.progressRatio >= 1 ? "success" : "accent";
    const bar = th.fg(barColor, "█".repeat(filled)) + th.fg("dim", "░".repeat(barWidth - filled));
    lines.push(row(
      `  ${bar} ${th.fg("text", `${formatPoints(p.totalPoints)}/${formatPoints(day.target)}`)} ${th.fg("muted", formatPercent(p.progressRatio))}`,
    ));

    lines.push(hr());
    lines.push(row(th.fg("accent", th.bold("✅ Tasks"))));

    if (day.tasks.length === 0) {
      lines.push(row(th.fg("dim", "  No tasks logged for this date")));
    } else {
      day.tasks.forEach((task, i) => {
        const computed = p.tasks[i];
        const done = task.completed >= task.target;
        const mark = done ? th.fg("success", "✅") : th.fg("dim", task.routine ? "🔁" : "☐ ");
        const label = truncateToWidth(task.title, 30).padEnd(30);
        const count = `${task.completed}/${task.target}`.padStart(6);
        const score = computed
          ? th.fg("text", `${formatPoints(computed.earnedPoints)} pts`.padStart(10))
          : th.fg("error", "invalid".padStart(10));
        lines.push(row(`  ${mark} ${done ? th.fg("muted", label) : th.fg("text", label)} ${th.fg("dim", count)} ${score}`));
      });
    }

    for (const u of p.unscoreable) {
      lines.push(row(th.fg("warning", `  ⚠️ ${truncateToWidth(u.error.message, innerW - 8)}`)));
    }

    lines.push(hr());
    lines.push(row(th.fg("accent", th.bold("🔥 Streak"))));
    lines.push(row(
      th.fg("muted", `  Current: ${th.fg("text", `${this.streak.current}d`)}`)
      + th.fg("muted", `  │  Best: ${th.fg("text", `${this.streak.longest}d`)}`)
      + th.fg("muted", `  │  Routine bonus: ${th.fg("text", `+${formatPercent(resolved.bonus)}`)}`),
    ));

    lines.push(row(""));
    if (this.error) lines.push(row(th.fg("error", truncateToWidth(this.error, innerW - 4))));
    lines.push(row(th.fg("dim", "  ←→ change date • r refresh • q/Esc close")));
    lines.push(th.fg("border", `╰${"─".repeat(innerW)}╯`));

    this.cachedWidth = width;
    this.cachedLines = lines;
    return lines;
  }

  invalidate(): void {
    this.cachedWidth = undefined;
    this.cachedLines = undefined;
  }

  private load(date: string): void {
    const read = readSafely(() => ({ view: viewDay(this.store, date), days: this.store.getAllDays() }));
    if (read.ok) {
      this.date = date;
      this.view = read.value.view;
      this.streak = this.loadStreak(read.value.days);
      this.error = undefined;
    } else {
      this.error = read.error;
    }
    this.invalidate();
  }

  private loadStreak(days: DayRecord[]): { current: number; longest: number } {
    return { current: currentStreak(days, this.date), longest: longestStreak(days) };
  }
}

export async function showDashboard(ctx: ExtensionContext, store: PointsStore): Promise<void> {
  await ctx.ui.custom<void>(
    (_tui, theme, _kb, done) => new DashboardComponent(store, theme, done),
    {
      overlay: true,
      overlayOptions: {
        anchor: "center",
        width: 76,
        maxHeight: "90%",
      },
    },
  );
}
