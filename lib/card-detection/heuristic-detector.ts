import type { RawImage } from "@/lib/capture/types";
import { centerOf, type Rect } from "@/lib/extraction/region";
import { locateCards } from "./locate";
import type { Card, CardDetector, DetectionOutcome } from "./types";

/** Upper bound on fallback confidence; fallback cards never pass as identified. */
export const FALLBACK_MAX_CONFIDENCE = 0.5;

/**
 * Fallback detector: reports card-shaped blobs without identifying them.
 * Rank and suit are "?", confidence is half the blob's fill ratio.
 */
export class HeuristicCardDetector implements CardDetector {
  readonly name = "heuristic";
  readonly source = "fallback";

  probe(): boolean {
    return true;
  }

  async detect(image: RawImage, region: Rect): Promise<DetectionOutcome> {
    try {
      const cards: Card[] = locateCards(image, region).map((card) => ({
        rank: "?",
        suit: "?",
        confidence: Math.round(Math.min(FALLBACK_MAX_CONFIDENCE, card.fillRatio * 0.5) * 1000) / 1000,
        position: centerOf(card),
        source: "fallback",
      }));
      return cards.length > 0 ? { kind: "detected", cards } : { kind: "empty" };
    } catch (error) {
      return { kind: "error", error };
    }
  }
}
