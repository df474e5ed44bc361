import sharp from "sharp";
import { readdir } from "fs/promises";
import { extname, join } from "path";
import type { FrameSource, RawImage } from "./types";

const IMAGE_EXTENSIONS = new Set([".png", ".jpg", ".jpeg", ".webp"]);

export class FrameSourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FrameSourceError";
  }
}

/** Decode an encoded image (PNG, JPEG, ...) into raw RGB pixels. */
export async function decodeImage(input: Buffer | string): Promise<RawImage> {
  const { data, info } = await sharp(input)
    .removeAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });

  return { data, width: info.width, height: info.height, channels: info.channels };
}

/**
 * Replays screenshots from a directory in file-name order.
 * With `loop` the sequence restarts after the last file; without it,
 * `grab` fails once every file has been served.
 */
export class DirectoryFrameSource implements FrameSource {
  readonly name: string;
  private files: string[] = [];
  private cursor = 0;

  constructor(
    private readonly dir: string,
    private readonly options: { loop?: boolean } = {},
  ) {
    this.name = `directory:${dir}`;
  }

  async open(): Promise<void> {
    let entries: string[];
    try {
      entries = await readdir(this.dir);
    } catch (err) {
      throw new FrameSourceError(
        `Cannot read capture directory ${this.dir}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    this.files = entries
      .filter((file) => IMAGE_EXTENSIONS.has(extname(file).toLowerCase()))
      .sort()
      .map((file) => join(this.dir, file));
    this.cursor = 0;

    if (this.files.length === 0) {
      throw new FrameSourceError(`No captures found in ${this.dir}`);
    }
  }

  async grab(): Promise<RawImage> {
    if (this.files.length === 0) {
      throw new FrameSourceError("Frame source is not open");
    }
    if (this.cursor >= this.files.length) {
      if (!this.options.loop) throw new FrameSourceError(`Captures in ${this.dir} exhausted`);
      this.cursor = 0;
    }

    const file = this.files[this.cursor];
    this.cursor += 1;
    return decodeImage(file);
  }

  async close(): Promise<void> {
    this.files = [];
    this.cursor = 0;
  }
}

/** Serves pre-decoded images in order, cycling when `loop` is set. */
export class BufferFrameSource implements FrameSource {
  readonly name = "buffer";
  private cursor = 0;
  private isOpen = false;

  constructor(
    private readonly images: RawImage[],
    private readonly options: { loop?: boolean } = { loop: true },
  ) {}

  async open(): Promise<void> {
    if (this.images.length === 0) throw new FrameSourceError("No frames to serve");
    this.cursor = 0;
    this.isOpen = true;
  }

  async grab(): Promise<RawImage> {
    if (!this.isOpen) throw new FrameSourceError("Frame source is not open");
    if (this.cursor >= this.images.length) {
      if (!this.options.loop) throw new FrameSourceError("Frames exhausted");
      this.cursor = 0;
    }
    const image = this.images[this.cursor];
    this.cursor += 1;
    return image;
  }

  async close(): Promise<void> {
    this.isOpen = false;
  }
}
