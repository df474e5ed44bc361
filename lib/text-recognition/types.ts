import type { RawImage } from "@/lib/capture/types";
import type { NamedRegion, Rect } from "@/lib/extraction/region";

export type TextSource = "primary" | "fallback";

/** One recognized word in frame coordinates. Confidence is 0 to 1. */
export interface TextElement {
  text: string;
  confidence: number;
  bbox: Rect;
  source: TextSource;
}

export interface RecognizedWord {
  text: string;
  confidence: number;
  /** Relative to the image passed to the engine. */
  bbox: Rect;
}

export interface TextEngine {
  readonly name: string;
  init(): Promise<void>;
  recognize(image: RawImage): Promise<RecognizedWord[]>;
  terminate(): Promise<void>;
}

export type FallbackReason =
  | "too_small"
  | "engine_unavailable"
  | "rate_limited"
  | "too_slow"
  | "engine_error"
  | "out_of_frame";

export type RegionReading =
  | { region: NamedRegion; source: "primary"; elements: TextElement[] }
  | { region: NamedRegion; source: "fallback"; reason: FallbackReason; elements: TextElement[] };

export interface TextReadResult {
  readings: Map<string, RegionReading>;
  /** Whether an engine pass ran and its result was kept. */
  primaryPass: boolean;
  durationMs: number | null;
}
