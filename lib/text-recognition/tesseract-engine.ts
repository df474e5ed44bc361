import sharp from "sharp";
import { createWorker, type Worker } from "tesseract.js";
import { rawChannels } from "@/lib/card-detection/preprocess";
import type { RawImage } from "@/lib/capture/types";
import type { RecognizedWord, TextEngine } from "./types";

/** tesseract.js worker behind the TextEngine interface. */
export class TesseractEngine implements TextEngine {
  readonly name = "tesseract";
  private worker: Worker | null = null;

  constructor(private readonly language = "eng") {}

  async init(): Promise<void> {
    if (this.worker) return;
    this.worker = await createWorker(this.language);
  }

  async recognize(image: RawImage): Promise<RecognizedWord[]> {
    if (!this.worker) {
      throw new Error("Text engine used before init()");
    }

    const png = await sharp(image.data, {
      raw: { width: image.width, height: image.height, channels: rawChannels(image.channels) },
    })
      .greyscale()
      .normalize()
      .png()
      .toBuffer();

    const { data } = await this.worker.recognize(png);
    return data.words
      .filter((word) => word.text.trim().length > 0)
      .map((word) => ({
        text: word.text.trim(),
        confidence: word.confidence / 100,
        bbox: {
          x: word.bbox.x0,
          y: word.bbox.y0,
          width: word.bbox.x1 - word.bbox.x0,
          height: word.bbox.y1 - word.bbox.y0,
        },
      }));
  }

  async terminate(): Promise<void> {
    const worker = this.worker;
    this.worker = null;
    if (worker) await worker.terminate();
  }
}
