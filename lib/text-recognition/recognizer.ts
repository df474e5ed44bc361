import type { RawImage } from "@/lib/capture/types";
import type { ErrorReporter } from "@/lib/errors/types";
import { clampToImage, type NamedRegion, unionOf } from "@/lib/extraction/region";
import { createLogger, type Logger } from "@/lib/logging/logger";
import { cropImage } from "@/lib/utils/image";
import { attributeToRegion } from "./attribution";
import { FallbackTextReader } from "./fallback-reader";
import type { FallbackReason, RegionReading, TextElement, TextEngine, TextReadResult } from "./types";

const COMPONENT = "text-recognition.recognizer";

export interface BatchedTextRecognizerOptions {
  engine: TextEngine;
  reporter: ErrorReporter;
  logger?: Logger;
  minRegion?: { width: number; height: number };
  minIntervalMs?: number;
  maxDurationMs?: number;
  fallback?: FallbackTextReader;
  now?: () => number;
}

/**
 * Runs the text engine at most once per frame over the union of all usable
 * regions, then attributes words back to regions by their center point.
 *
 * Gates, in order: region size, engine availability, minimum interval since
 * the last successful pass, and a hard ceiling on pass duration. Anything
 * gated out is served by the fallback reader.
 */
export class BatchedTextRecognizer {
  private readonly engine: TextEngine;
  private readonly reporter: ErrorReporter;
  private readonly logger: Logger;
  private readonly minRegion: { width: number; height: number };
  private readonly minIntervalMs: number;
  private readonly maxDurationMs: number;
  private readonly fallback: FallbackTextReader;
  private readonly now: () => number;

  private available = false;
  private lastSuccessAt: number | null = null;

  constructor(options: BatchedTextRecognizerOptions) {
    this.engine = options.engine;
    this.reporter = options.reporter;
    this.logger = options.logger ?? createLogger({ module: COMPONENT });
    this.minRegion = options.minRegion ?? { width: 40, height: 20 };
    this.minIntervalMs = options.minIntervalMs ?? 250;
    this.maxDurationMs = options.maxDurationMs ?? 1000;
    this.fallback = options.fallback ?? new FallbackTextReader();
    this.now = options.now ?? Date.now;
  }

  get isAvailable(): boolean {
    return this.available;
  }

  /** Start the engine. On failure every later read uses the fallback. */
  async init(): Promise<boolean> {
    try {
      await this.engine.init();
      this.available = true;
      this.logger.info(`Text engine ${this.engine.name} ready`);
    } catch (error) {
      this.available = false;
      this.reporter.logError({
        severity: "HIGH",
        category: "VISION",
        message: "Text engine failed to initialize",
        component: COMPONENT,
        function: "init",
        error,
        data: { engine: this.engine.name },
      });
    }
    return this.available;
  }

  async read(image: RawImage, regions: NamedRegion[]): Promise<TextReadResult> {
    const startedAt = this.now();
    const readings = new Map<string, RegionReading>();
    const usable: NamedRegion[] = [];

    const useFallback = (region: NamedRegion, reason: FallbackReason) => {
      readings.set(region.name, {
        region,
        source: "fallback",
        reason,
        elements: this.fallback.read(region.name, startedAt),
      });
    };

    for (const region of regions) {
      if (!clampToImage(region, image.width, image.height)) {
        useFallback(region, "out_of_frame");
      } else if (region.width < this.minRegion.width || region.height < this.minRegion.height) {
        useFallback(region, "too_small");
      } else {
        usable.push(region);
      }
    }

    const gate = this.gate(startedAt);
    const union = unionOf(usable);
    const bounds = union ? clampToImage(union, image.width, image.height) : null;

    if (gate || !bounds) {
      for (const region of usable) useFallback(region, gate ?? "out_of_frame");
      return { readings, primaryPass: false, durationMs: null };
    }

    let elements: TextElement[];
    try {
      const words = await this.engine.recognize(cropImage(image, bounds));
      elements = words.map((word) => ({
        text: word.text,
        confidence: word.confidence,
        bbox: { ...word.bbox, x: word.bbox.x + bounds.x, y: word.bbox.y + bounds.y },
        source: "primary",
      }));
    } catch (error) {
      this.reporter.logError({
        severity: "MEDIUM",
        category: "VISION",
        message: "Text recognition failed",
        component: COMPONENT,
        function: "read",
        error,
        data: { engine: this.engine.name, regions: usable.map((r) => r.name) },
      });
      for (const region of usable) useFallback(region, "engine_error");
      return { readings, primaryPass: false, durationMs: this.now() - startedAt };
    }

    const finishedAt = this.now();
    const durationMs = finishedAt - startedAt;

    if (durationMs > this.maxDurationMs) {
      this.reporter.logPerformance("Text recognition exceeded duration ceiling", {
        component: COMPONENT,
        function: "read",
        processingTimeMs: durationMs,
        severity: "LOW",
        data: { ocr_time_ms: durationMs, ceiling_ms: this.maxDurationMs },
      });
      for (const region of usable) useFallback(region, "too_slow");
      return { readings, primaryPass: false, durationMs };
    }

    this.lastSuccessAt = finishedAt;
    for (const region of usable) {
      const attributed = attributeToRegion(elements, region);
      this.fallback.remember(region.name, attributed, finishedAt);
      readings.set(region.name, { region, source: "primary", elements: attributed });
    }

    return { readings, primaryPass: true, durationMs };
  }

  async terminate(): Promise<void> {
    this.available = false;
    await this.engine.terminate();
  }

  private gate(at: number): FallbackReason | null {
    if (!this.available) return "engine_unavailable";
    if (this.lastSuccessAt !== null && at - this.lastSuccessAt < this.minIntervalMs) {
      return "rate_limited";
    }
    return null;
  }
}
