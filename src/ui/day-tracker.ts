/**
 * Day Tracker Overlay
 *
 * Log completions for one date interactively. Points are rescored and
 * saved after every change.
 */

import type { ExtensionContext, Theme } from "@mariozechner/pi-coding-agent";
import { matchesKey, truncateToWidth, visibleWidth } from "@mariozechner/pi-tui";
import { shiftDate, today } from "../data/dates.js";
import { decrementTask, incrementTask, viewDay, type DayChange, type OperationResult } from "../data/operations.js";
import { readSafely, type PointsStore } from "../data/store.js";
import { formatPercent, formatPoints } from "../tools/format.js";

class DayTrackerComponent {
  private store: PointsStore;
  private theme: Theme;
  private done: (result: void) => void;
  private date = today();
  private view: DayChange;
  private selected = 0;
  private message?: string;
  private cachedWidth?: number;
  private cachedLines?: string[];

  constructor(store: PointsStore, theme: Theme, done: (result: void) => void) {
    this.store = store;
    this.theme = theme;
    this.done = done;
    this.view = viewDay(store, this.date);
  }

  handleInput(data: string): void {
    if (matchesKey(data, "escape") || matchesKey(data, "q")) {
      this.done();
      return;
    }
    const tasks = this.view.day.tasks;
    if (matchesKey(data, "up")) {
      this.selected = Math.max(0, this.selected - 1);
      this.invalidate();
    }
    if (matchesKey(data, "down")) {
      this.selected = Math.min(Math.max(0, tasks.length - 1), this.selected + 1);
      this.invalidate();
    }
    if (matchesKey(data, "left")) {
      this.switchDate(shiftDate(this.date, -1));
    }
    if (matchesKey(data, "right") && this.date < today()) {
      this.switchDate(shiftDate(this.date, 1));
    }

    const task = tasks[this.selected];
    if (!task) return;
    if (matchesKey(data, "return") || matchesKey(data, "space") || data === "+") {
      this.apply(() => incrementTask(this.store, this.date, task.id));
    }
    if (matchesKey(data, "backspace") || data === "-") {
      this.apply(() => decrementTask(this.store, this.date, task.id));
    }
  }

  render(width: number): string[] {
    if (this.cachedLines && this.cachedWidth === width) {
      return this.cachedLines;
    }

    const th = this.theme;
    const { day, resolved } = this.view;
    const p = resolved.progress;
    const innerW = Math.min(width - 2, 62);
    const lines: string[] = [];

    const pad = (content: string, w: number) => {
      const vis = visibleWidth(content);
      return content + " ".repeat(Math.max(0, w - vis));
    };
    const row = (content: string) =>
      th.fg("border", "│") + " " + pad(content, innerW - 2) + " " + th.fg("border", "│");

    lines.push(th.fg("border", `╭${"─".repeat(innerW)}╮`));
    lines.push(row(th.fg("accent", th.bold("📋 DAY TRACKER"))));
    lines.push(row(""));
    lines.push(row(th.fg("muted", `📅 ${this.date}  ⭐ ${formatPoints(p.totalPoints)}/${formatPoints(day.target)} (${formatPercent(p.progressRatio)})`)));
    if (resolved.bonus > 0) {
      lines.push(row(th.fg("success", `🔥 +${formatPercent(resolved.bonus)} routine bonus`)));
    }
    lines.push(row(th.fg("border", "─".repeat(innerW - 4))));

    if (day.tasks.length === 0) {
      lines.push(row(th.fg("dim", "  No tasks. Ask me to add some or apply your templates.")));
    }

    const nameW = Math.min(28, innerW - 26);
    day.tasks.forEach((task, i) => {
      const isSelected = i === this.selected;
      const prefix = isSelected ? th.fg("accent", "▶ ") : "  ";
      const name = truncateToWidth(task.title, nameW);
      const styledName = isSelected ? th.fg("accent", name) : th.fg("text", name);
      const slots = Math.min(task.max, 10);
      let pips = "";
      for (let s = 0; s < slots; s++) {
        if (s < task.completed) pips += th.fg(s < task.target ? "success" : "warning", "●");
        else pips += th.fg(s < task.target ? "muted" : "dim", "○");
      }
      const earned = p.tasks[i];
      const score = earned ? formatPoints(earned.earnedPoints) : "—";
      lines.push(row(
        prefix + styledName + " ".repeat(Math.max(0, nameW - visibleWidth(name)))
        + " " + pips + " ".repeat(Math.max(1, 11 - slots)) + th.fg("text", score.padStart(6)),
      ));
    });

    lines.push(row(""));
    if (this.message) lines.push(row(th.fg("warning", truncateToWidth(this.message, innerW - 4))));
    lines.push(row(th.fg("dim", "  ↑↓ select • Enter/+ log • -/Backspace undo • ←→ date • q close")));
    lines.push(th.fg("border", `╰${"─".repeat(innerW)}╯`));

    this.cachedWidth = width;
    this.cachedLines = lines;
    return lines;
  }

  invalidate(): void {
    this.cachedWidth = undefined;
    this.cachedLines = undefined;
  }

  private apply(run: () => OperationResult<DayChange>): void {
    const read = readSafely(run);
    if (!read.ok) {
      this.message = read.error;
    } else if (read.value.ok) {
      this.view = read.value.value;
      this.message = undefined;
    } else {
      this.message = read.value.error.message;
    }
    this.invalidate();
  }

  private switchDate(date: string): void {
    const read = readSafely(() => viewDay(this.store, date));
    if (read.ok) {
      this.date = date;
      this.view = read.value;
      this.selected = 0;
      this.message = undefined;
    } else {
      this.message = read.error;
    }
    this.invalidate();
  }
}

export async function showDayTracker(ctx: ExtensionContext, store: PointsStore): Promise<void> {
  await ctx.ui.custom<void>(
    (_tui, theme, _kb, done) => new DayTrackerComponent(store, theme, done),
    {
      overlay: true,
      overlayOptions: {
        anchor: "center",
        width: 66,
        maxHeight: "85%",
      },
    },
  );
}
