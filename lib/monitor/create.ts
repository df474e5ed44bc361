import { CardDetectionStage } from "@/lib/card-detection/stage";
import { HeuristicCardDetector } from "@/lib/card-detection/heuristic-detector";
import { ReferenceStore } from "@/lib/card-detection/match";
import { TemplateCardDetector } from "@/lib/card-detection/template-detector";
import { DirectoryFrameSource } from "@/lib/capture/frame-source";
import { CaptureScheduler } from "@/lib/capture/scheduler";
import type { FrameSource } from "@/lib/capture/types";
import { namedRegions, type Settings } from "@/lib/config/settings";
import type { ErrorReporter } from "@/lib/errors/types";
import { ExtractionPipeline } from "@/lib/extraction/pipeline";
import { StateReconstructor } from "@/lib/game-state/reconstruct";
import { createLogger } from "@/lib/logging/logger";
import { GameStateRepository } from "@/lib/storage/game-states";
import { BatchedTextRecognizer } from "@/lib/text-recognition/recognizer";
import { TesseractEngine } from "@/lib/text-recognition/tesseract-engine";
import type { TextEngine } from "@/lib/text-recognition/types";
import { TableMonitor } from "./table-monitor";

export interface TableMonitorDependencies {
  reporter: ErrorReporter;
  source?: FrameSource;
  textEngine?: TextEngine;
}

/** Wire a monitor from settings. Frames default to the configured capture directory. */
export function createTableMonitor(settings: Settings, deps: TableMonitorDependencies): TableMonitor {
  const { reporter } = deps;

  const scheduler = new CaptureScheduler({
    source: deps.source ?? new DirectoryFrameSource(settings.capture.sourceDir, { loop: settings.capture.loop }),
    targetFps: settings.capture.fps,
    reporter,
    callbackWarnMs: settings.performance.callbackWarnMs,
    stopTimeoutMs: settings.capture.stopTimeoutMs,
    logger: createLogger({ module: "capture.scheduler" }),
  });

  const cards = new CardDetectionStage({
    primary: new TemplateCardDetector(new ReferenceStore(settings.vision.referencesDir)),
    fallback: new HeuristicCardDetector(),
    reporter,
  });

  const textRecognizer = new BatchedTextRecognizer({
    engine: deps.textEngine ?? new TesseractEngine(settings.vision.ocrLanguage),
    reporter,
    minRegion: settings.vision.minTextRegion,
    minIntervalMs: settings.vision.ocrMinIntervalMs,
    maxDurationMs: settings.vision.ocrMaxDurationMs,
  });

  const pipeline = new ExtractionPipeline({
    cards,
    text: textRecognizer,
    regions: namedRegions(settings),
    thresholds: settings.vision.thresholds,
  });

  return new TableMonitor({
    scheduler,
    reconstructor: new StateReconstructor({ pipeline, reporter, bettingOptions: settings.bettingOptions }),
    repository: new GameStateRepository({ dbPath: settings.database.path }),
    reporter,
    textRecognizer,
  });
}
