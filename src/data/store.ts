// ============================================================
// Points — Data Persistence Layer
// ============================================================

import * as fs from "node:fs";
import * as path from "node:path";
import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { resolveConfig } from "./config.js";
import type { Result } from "../engine/types.js";
import { isDateKey } from "./dates.js";
import {
  DayRecordSchema,
  PointsConfigSchema,
  TemplateListSchema,
  type DayRecord,
  type PointsConfig,
  type PointsConfigFile,
  type TemplateRecord,
} from "./types.js";

/** A data file exists but cannot be used */
export class StoreError extends Error {
  readonly file: string;

  constructor(file: string, reason: string) {
    super(`${file}: ${reason}`);
    this.name = "StoreError";
    this.file = file;
  }
}

/**
 * Run a store access from a place that must not throw, such as a key
 * handler. An unreadable file becomes a message; other errors propagate.
 */
export function readSafely<T>(read: () => T): Result<T, string> {
  try {
    return { ok: true, value: read() };
  } catch (err) {
    if (err instanceof StoreError) return { ok: false, error: `Points data unreadable: ${err.message}` };
    throw err;
  }
}

export class PointsStore {
  private dataDir: string;

  constructor(cwd: string) {
    this.dataDir = path.join(cwd, ".pi", "points");
    this.ensureDir(this.dataDir);
    this.ensureDir(path.join(this.dataDir, "days"));
  }

  // ── Config ─────────────────────────────────────────────

  getConfig(): PointsConfig {
    return resolveConfig(this.readJson("config.json", PointsConfigSchema));
  }

  saveConfig(config: PointsConfigFile): void {
    this.writeJson("config.json", config);
  }

  // ── Days ───────────────────────────────────────────────

  getDay(date: string): DayRecord | null {
    return this.readJson(path.join("days", `${date}.json`), DayRecordSchema);
  }

  /** Stored day, or a fresh unsaved one carrying the configured target */
  getOrCreateDay(date: string): DayRecord {
    return this.getDay(date) ?? {
      date,
      target: this.getConfig().dayTargetPoints,
      points: 0,
      tasks: [],
    };
  }

  saveDay(day: DayRecord): void {
    this.writeJson(path.join("days", `${day.date}.json`), day);
  }

  /** Stored date keys, oldest first */
  listDates(): string[] {
    const daysDir = path.join(this.dataDir, "days");
    if (!fs.existsSync(daysDir)) return [];
    return fs.readdirSync(daysDir)
      .filter(f => f.endsWith(".json"))
      .map(f => f.slice(0, -".json".length))
      .filter(isDateKey)
      .sort();
  }

  getAllDays(): DayRecord[] {
    const days: DayRecord[] = [];
    for (const date of this.listDates()) {
      const day = this.getDay(date);
      if (day) days.push(day);
    }
    return days;
  }

  // ── Templates ──────────────────────────────────────────

  getTemplates(): TemplateRecord[] {
    return this.readJson("templates.json", TemplateListSchema) ?? [];
  }

  saveTemplates(templates: TemplateRecord[]): void {
    this.writeJson("templates.json", templates);
  }

  // ── Helpers ────────────────────────────────────────────

  private readJson<T extends TSchema>(filename: string, schema: T): Static<T> | null {
    const filepath = path.join(this.dataDir, filename);
    if (!fs.existsSync(filepath)) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filepath, "utf-8"));
    } catch (err) {
      throw new StoreError(filename, `invalid JSON (${err instanceof Error ? err.message : String(err)})`);
    }

    if (!Value.Check(schema, parsed)) {
      const first = Value.Errors(schema, parsed).First();
      const where = first?.path ? ` at ${first.path}` : "";
      throw new StoreError(filename, `unexpected shape${where}: ${first?.message ?? "schema mismatch"}`);
    }
    return parsed;
  }

  private writeJson(filename: string, data: unknown): void {
    const filepath = path.join(this.dataDir, filename);
    const dir = path.dirname(filepath);
    this.ensureDir(dir);
    const tmp = filepath + ".tmp";
    fs.writeFileSync(tmp, JSON.stringify(data, null, 2), "utf-8");
    fs.renameSync(tmp, filepath);
  }

  private ensureDir(dir: string): void {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }
}
