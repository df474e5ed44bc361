import type { RawImage } from "@/lib/capture/types";
import { centerOf, type Rect } from "@/lib/extraction/region";
import { locateCards } from "./locate";
import { isConfidentMatch, matchCorner, type ReferenceStore } from "./match";
import { preprocessCorner } from "./preprocess";
import { type Card, type CardDetector, type DetectionOutcome, parseCardCode } from "./types";

/**
 * Primary detector: locate card blobs, then identify each one by matching its
 * rank/suit corner against the reference templates. Only HIGH and MEDIUM
 * matches are reported; their match score becomes the card confidence.
 */
export class TemplateCardDetector implements CardDetector {
  readonly name = "template";
  readonly source = "primary";

  constructor(private readonly references: ReferenceStore) {}

  probe(): boolean {
    return this.references.size > 0;
  }

  async detect(image: RawImage, region: Rect): Promise<DetectionOutcome> {
    const refs = this.references.load();
    if (refs.size === 0) {
      return { kind: "unavailable", reason: `No card references in ${this.references.dir}` };
    }

    try {
      const located = locateCards(image, region);
      const matches = await Promise.all(
        located.map(async (card) => {
          const preprocessed = await preprocessCorner(image, card.corner);
          if (!preprocessed) return null;

          const match = matchCorner(preprocessed, refs);
          if (!isConfidentMatch(match) || !match.card) return null;

          const { rank, suit } = parseCardCode(match.card);
          const result: Card = {
            rank,
            suit,
            confidence: match.matchScore,
            position: centerOf(card),
            source: "primary",
          };
          return result;
        }),
      );

      const cards = matches.filter((card): card is Card => card !== null);
      return cards.length > 0 ? { kind: "detected", cards } : { kind: "empty" };
    } catch (error) {
      return { kind: "error", error };
    }
  }
}
