import type { RawImage } from "@/lib/capture/types";
import type { Rect } from "@/lib/extraction/region";
import type { RecognizedWord, TextEngine } from "./types";

/** Scripted TextEngine for tests. Returns `words` for every pass. */
export class FakeTextEngine implements TextEngine {
  readonly name = "fake";
  readonly calls: RawImage[] = [];
  words: RecognizedWord[] = [];
  failInit = false;
  failRecognize: Error | null = null;
  onRecognize: () => void = () => {};

  async init(): Promise<void> {
    if (this.failInit) throw new Error("missing language data");
  }

  async recognize(image: RawImage): Promise<RecognizedWord[]> {
    this.calls.push(image);
    this.onRecognize();
    if (this.failRecognize) throw this.failRecognize;
    return this.words;
  }

  async terminate(): Promise<void> {}
}

/** A word placed in frame coordinates, expressed relative to a crop origin. */
export function wordAt(text: string, confidence: number, frameBox: Rect, origin: { x: number; y: number }): RecognizedWord {
  return {
    text,
    confidence,
    bbox: { ...frameBox, x: frameBox.x - origin.x, y: frameBox.y - origin.y },
  };
}
