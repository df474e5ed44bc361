import type { TextElement } from "./types";

const DEFAULT_MAX_AGE_MS = 5000;
const DEFAULT_DECAY = 0.9;

type Remembered = { elements: TextElement[]; at: number; reuses: number };

/**
 * Stand-in for the text engine: replays the last primary reading of a region.
 * Each reuse multiplies confidence by `decay`; readings older than `maxAgeMs`
 * are forgotten.
 */
export class FallbackTextReader {
  private readonly memory = new Map<string, Remembered>();
  private readonly maxAgeMs: number;
  private readonly decay: number;

  constructor(options: { maxAgeMs?: number; decay?: number } = {}) {
    this.maxAgeMs = options.maxAgeMs ?? DEFAULT_MAX_AGE_MS;
    this.decay = options.decay ?? DEFAULT_DECAY;
  }

  remember(regionName: string, elements: TextElement[], at: number): void {
    if (elements.length === 0) return;
    this.memory.set(regionName, { elements, at, reuses: 0 });
  }

  read(regionName: string, at: number): TextElement[] {
    const entry = this.memory.get(regionName);
    if (!entry) return [];

    if (at - entry.at > this.maxAgeMs) {
      this.memory.delete(regionName);
      return [];
    }

    entry.reuses += 1;
    const factor = this.decay ** entry.reuses;
    return entry.elements.map((element) => ({
      ...element,
      confidence: element.confidence * factor,
      source: "fallback",
    }));
  }

  clear(): void {
    this.memory.clear();
  }
}
