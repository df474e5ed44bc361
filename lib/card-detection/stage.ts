import type { RawImage } from "@/lib/capture/types";
import type { ErrorReporter } from "@/lib/errors/types";
import type { NamedRegion } from "@/lib/extraction/region";
import { createLogger, type Logger } from "@/lib/logging/logger";
import type { Card, CardDetector, DetectionOutcome } from "./types";

const COMPONENT = "card-detection.stage";

export interface CardDetectionResult {
  region: string;
  cards: Card[];
  /** What the primary detector reported, or the fallback's outcome when the primary is not in use. */
  outcome: DetectionOutcome;
  usedFallback: boolean;
}

type CardDetectionStageOptions = {
  primary: CardDetector;
  fallback: CardDetector;
  reporter: ErrorReporter;
  logger?: Logger;
};

/**
 * Chooses between the primary and fallback detectors.
 *
 * The primary is probed once at construction. When it is available, an empty
 * result from it stands as the answer; only an `error` or `unavailable`
 * outcome sends that one call to the fallback.
 */
export class CardDetectionStage {
  readonly primaryAvailable: boolean;
  private readonly primary: CardDetector;
  private readonly fallback: CardDetector;
  private readonly reporter: ErrorReporter;
  private readonly logger: Logger;

  constructor(options: CardDetectionStageOptions) {
    this.primary = options.primary;
    this.fallback = options.fallback;
    this.reporter = options.reporter;
    this.logger = options.logger ?? createLogger({ module: COMPONENT });
    this.primaryAvailable = this.probePrimary();

    if (this.primaryAvailable) {
      this.logger.info(`Using ${this.primary.name} card detector`);
    } else {
      this.logger.warn(`${this.primary.name} card detector unavailable, using ${this.fallback.name}`);
    }
  }

  get activeDetector(): string {
    return this.primaryAvailable ? this.primary.name : this.fallback.name;
  }

  async detect(image: RawImage, region: NamedRegion): Promise<CardDetectionResult> {
    if (!this.primaryAvailable) {
      const outcome = await this.runFallback(image, region);
      return { region: region.name, cards: cardsOf(outcome), outcome, usedFallback: true };
    }

    let outcome: DetectionOutcome;
    try {
      outcome = await this.primary.detect(image, region);
    } catch (error) {
      outcome = { kind: "error", error };
    }

    switch (outcome.kind) {
      case "detected":
        return { region: region.name, cards: outcome.cards, outcome, usedFallback: false };
      case "empty":
        return { region: region.name, cards: [], outcome, usedFallback: false };
      case "unavailable":
        this.logger.warn(`${this.primary.name} detector unavailable for ${region.name}: ${outcome.reason}`);
        break;
      case "error":
        this.reporter.logError({
          severity: "MEDIUM",
          category: "VISION",
          message: "Primary card detector failed",
          component: COMPONENT,
          function: "detect",
          error: outcome.error,
          data: { region: region.name, detector: this.primary.name },
        });
        break;
    }

    const fallbackOutcome = await this.runFallback(image, region);
    return { region: region.name, cards: cardsOf(fallbackOutcome), outcome, usedFallback: true };
  }

  private async runFallback(image: RawImage, region: NamedRegion): Promise<DetectionOutcome> {
    let outcome: DetectionOutcome;
    try {
      outcome = await this.fallback.detect(image, region);
    } catch (error) {
      outcome = { kind: "error", error };
    }

    if (outcome.kind === "error") {
      this.reporter.logError({
        severity: "HIGH",
        category: "VISION",
        message: "Fallback card detector failed",
        component: COMPONENT,
        function: "runFallback",
        error: outcome.error,
        data: { region: region.name, detector: this.fallback.name },
      });
    }
    return outcome;
  }

  private probePrimary(): boolean {
    try {
      return this.primary.probe();
    } catch (error) {
      this.reporter.logError({
        severity: "MEDIUM",
        category: "VISION",
        message: "Primary card detector probe failed",
        component: COMPONENT,
        function: "probe",
        error,
      });
      return false;
    }
  }
}

function cardsOf(outcome: DetectionOutcome): Card[] {
  return outcome.kind === "detected" ? outcome.cards : [];
}
