import { CardDetectionStage } from "@/lib/card-detection/stage";
import type { Card, CardDetector, DetectionOutcome } from "@/lib/card-detection/types";
import { blankImage, fillRect } from "@/lib/capture/testing";
import type { RawImage } from "@/lib/capture/types";
import type { FieldThresholds } from "@/lib/config/settings";
import type { ErrorReporter } from "@/lib/errors/types";
import { silentLogger } from "@/lib/logging/logger";
import { BatchedTextRecognizer } from "@/lib/text-recognition/recognizer";
import { FakeTextEngine, wordAt } from "@/lib/text-recognition/testing";
import { ExtractionPipeline } from "./pipeline";
import type { NamedRegion, Rect } from "./region";

/**
 * A 400×300 table with one seat. Text regions batch into one crop whose
 * origin is (10, 90).
 */
export const TABLE_REGIONS: NamedRegion[] = [
  { name: "community_cards", x: 100, y: 20, width: 200, height: 60 },
  { name: "pot_display", x: 150, y: 90, width: 100, height: 30 },
  { name: "timer", x: 300, y: 90, width: 60, height: 30 },
  { name: "action_buttons", x: 0, y: 250, width: 400, height: 50 },
  { name: "player_0", x: 60, y: 150, width: 120, height: 90 },
];

export const TEXT_ORIGIN = { x: 10, y: 90 };

export const THRESHOLDS: FieldThresholds = { stackSize: 0.7, potSize: 0.7, timer: 0.7, playerName: 0.6 };

/** Felt with a red fold button in the action area. */
export function tableImage(): RawImage {
  const image = blankImage(400, 300, [20, 80, 40]);
  fillRect(image, { x: 20, y: 260, width: 30, height: 20 }, [220, 30, 30]);
  return image;
}

export const tableWords = () => [
  wordAt("2,400", 0.9, { x: 170, y: 95, width: 40, height: 20 }, TEXT_ORIGIN),
  wordAt("0:15", 0.9, { x: 310, y: 95, width: 30, height: 20 }, TEXT_ORIGIN),
  wordAt("Hero", 0.8, { x: 65, y: 155, width: 40, height: 20 }, TEXT_ORIGIN),
  wordAt("1,500", 0.9, { x: 105, y: 200, width: 10, height: 10 }, TEXT_ORIGIN),
  wordAt("50", 0.9, { x: 20, y: 225, width: 20, height: 10 }, TEXT_ORIGIN),
];

export const card = (rank: Card["rank"], suit: Card["suit"], x: number, confidence = 0.95): Card => ({
  rank,
  suit,
  confidence,
  position: { x, y: 50 },
  source: "primary",
});

/** Primary detector answering per region from a lookup keyed by region x. */
export function scriptedDetector(byRegionX: Map<number, Card[]>): CardDetector {
  return {
    name: "scripted",
    source: "primary",
    probe: () => true,
    detect: async (_image: RawImage, region: Rect): Promise<DetectionOutcome> => {
      const cards = byRegionX.get(region.x) ?? [];
      return cards.length > 0 ? { kind: "detected", cards } : { kind: "empty" };
    },
  };
}

export const neverDetector: CardDetector = {
  name: "none",
  source: "fallback",
  probe: () => true,
  detect: async () => ({ kind: "empty" }),
};

/** Community region x for `scriptedDetector` lookups. */
export const COMMUNITY_X = 100;
/** Hole-card region x of player_0. */
export const HOLE_CARDS_X = 120;

export async function buildTablePipeline(options: {
  reporter: ErrorReporter;
  board?: Card[];
  holeCards?: Card[];
  engine?: FakeTextEngine;
}) {
  const engine = options.engine ?? new FakeTextEngine();
  if (!options.engine) engine.words = tableWords();

  const cards = new CardDetectionStage({
    primary: scriptedDetector(
      new Map([
        [COMMUNITY_X, options.board ?? []],
        [HOLE_CARDS_X, options.holeCards ?? []],
      ]),
    ),
    fallback: neverDetector,
    reporter: options.reporter,
    logger: silentLogger,
  });

  const text = new BatchedTextRecognizer({ engine, reporter: options.reporter, logger: silentLogger, minIntervalMs: 0 });
  await text.init();

  const pipeline = new ExtractionPipeline({
    cards,
    text,
    regions: TABLE_REGIONS,
    thresholds: THRESHOLDS,
    logger: silentLogger,
  });
  return { pipeline, engine, cards, text };
}
