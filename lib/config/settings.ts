import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { z } from "zod";
import type { NamedRegion } from "@/lib/extraction/region";

const DEFAULT_SETTINGS_PATH = join(process.cwd(), "config/settings.json");

const regionSchema = z.object({
  x: z.number().int().nonnegative(),
  y: z.number().int().nonnegative(),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

const thresholdSchema = z.number().min(0).max(1);

export const settingsSchema = z.object({
  capture: z
    .object({
      fps: z.number().positive().max(120).default(10),
      sourceDir: z.string().default("data/captures"),
      loop: z.boolean().default(true),
      stopTimeoutMs: z.number().int().positive().default(2000),
    })
    .default({}),
  regions: z.record(z.string(), regionSchema).default({}),
  vision: z
    .object({
      referencesDir: z.string().default("data/card-references"),
      minTextRegion: z
        .object({
          width: z.number().int().positive().default(40),
          height: z.number().int().positive().default(20),
        })
        .default({}),
      ocrMinIntervalMs: z.number().int().nonnegative().default(250),
      ocrMaxDurationMs: z.number().int().positive().default(1000),
      ocrLanguage: z.string().default("eng"),
      thresholds: z
        .object({
          stackSize: thresholdSchema.default(0.7),
          potSize: thresholdSchema.default(0.7),
          timer: thresholdSchema.default(0.7),
          playerName: thresholdSchema.default(0.6),
        })
        .default({}),
    })
    .default({}),
  database: z
    .object({
      path: z.string().default("data/table-vision.db"),
      errorLogPath: z.string().default("data/error-logs.db"),
      retentionDays: z.number().int().positive().default(30),
    })
    .default({}),
  performance: z
    .object({
      callbackWarnMs: z.number().int().positive().default(50),
    })
    .default({}),
  bettingOptions: z
    .object({
      minBet: z.number().nonnegative().default(0),
      maxBet: z.number().nonnegative().default(0),
      sliderPositions: z.record(z.string(), z.number()).default({}),
    })
    .default({}),
});

export type Settings = z.infer<typeof settingsSchema>;
export type FieldThresholds = Settings["vision"]["thresholds"];
export type BettingOptions = Settings["bettingOptions"];

export class SettingsError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
    this.name = "SettingsError";
  }
}

/** Validate raw settings data, filling defaults for anything missing. */
export function parseSettings(raw: unknown): Settings {
  const parsed = settingsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new SettingsError(`Invalid settings: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}

/**
 * Load settings from disk. `TABLE_VISION_SETTINGS` overrides the file path,
 * `TABLE_VISION_DB` overrides the game-state database path.
 * A missing file yields the defaults.
 */
export function loadSettings(
  filePath = process.env.TABLE_VISION_SETTINGS ?? DEFAULT_SETTINGS_PATH,
): Settings {
  let raw: unknown = {};

  if (existsSync(filePath)) {
    try {
      raw = JSON.parse(readFileSync(filePath, "utf-8"));
    } catch (err) {
      throw new SettingsError(
        `Failed to read settings from ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  const settings = parseSettings(raw);
  if (process.env.TABLE_VISION_DB) {
    settings.database.path = process.env.TABLE_VISION_DB;
  }
  return settings;
}

/** Regions as named rectangles, in the order they appear in the settings. */
export function namedRegions(settings: Settings): NamedRegion[] {
  return Object.entries(settings.regions).map(([name, rect]) => ({ name, ...rect }));
}

/** Seat regions (`player_0`, `player_1`, ...) sorted by seat number. */
export function seatRegions(settings: Settings): NamedRegion[] {
  return namedRegions(settings)
    .flatMap((region) => {
      const match = /^player_(\d+)$/.exec(region.name);
      return match ? [{ seat: Number(match[1]), region }] : [];
    })
    .sort((a, b) => a.seat - b.seat)
    .map(({ region }) => region);
}
