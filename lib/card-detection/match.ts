import { existsSync, mkdirSync, readdirSync, readFileSync, writeFileSync } from "fs";
import { join } from "path";
import { similarity } from "./preprocess";
import { type CardCode, type CardMatch, isCardCode } from "./types";

/**
 * Preprocessed rank/suit templates stored as `<dir>/<CardCode>.bin`.
 * Loaded lazily on first use; `save` invalidates the cache.
 */
export class ReferenceStore {
  private cache: Map<CardCode, Buffer> | null = null;

  constructor(readonly dir: string) {}

  load(): Map<CardCode, Buffer> {
    if (this.cache) return this.cache;

    const refs = new Map<CardCode, Buffer>();
    if (existsSync(this.dir)) {
      for (const file of readdirSync(this.dir)) {
        if (!file.endsWith(".bin")) continue;
        const code = file.slice(0, -".bin".length);
        if (isCardCode(code)) refs.set(code, readFileSync(join(this.dir, file)));
      }
    }

    this.cache = refs;
    return refs;
  }

  get size(): number {
    return this.load().size;
  }

  save(code: CardCode, preprocessed: Buffer): void {
    mkdirSync(this.dir, { recursive: true });
    writeFileSync(join(this.dir, `${code}.bin`), preprocessed);
    this.cache = null;
  }

  clear(): void {
    this.cache = null;
  }
}

/**
 * Match a preprocessed corner against every reference.
 *
 * Confidence levels:
 *   HIGH:   match > 90% AND gap to second-best > 10%
 *   MEDIUM: match > 85% AND gap > 5%
 *   LOW:    match > 75% (possible match but uncertain)
 *   NONE:   no references or no match above threshold
 */
export function matchCorner(preprocessed: Buffer, refs: Map<CardCode, Buffer>): CardMatch {
  if (refs.size === 0) {
    return { card: null, confidence: "NONE", matchScore: 0, gap: 0 };
  }

  let bestCard: CardCode | null = null;
  let bestScore = 0;
  let secondBestScore = 0;

  for (const [card, ref] of refs) {
    const score = similarity(preprocessed, ref);
    if (score > bestScore) {
      secondBestScore = bestScore;
      bestScore = score;
      bestCard = card;
    } else if (score > secondBestScore) {
      secondBestScore = score;
    }
  }

  const gap = bestScore - secondBestScore;
  let confidence: CardMatch["confidence"];

  if (bestScore > 0.9 && gap > 0.1) {
    confidence = "HIGH";
  } else if (bestScore > 0.85 && gap > 0.05) {
    confidence = "MEDIUM";
  } else if (bestScore > 0.75) {
    confidence = "LOW";
  } else {
    confidence = "NONE";
  }

  return {
    card: confidence !== "NONE" ? bestCard : null,
    confidence,
    matchScore: Math.round(bestScore * 1000) / 1000,
    gap: Math.round(gap * 1000) / 1000,
  };
}

export const isConfidentMatch = (m: CardMatch) => m.confidence === "HIGH" || m.confidence === "MEDIUM";
