/** Decoded pixels, row-major, `channels` bytes per pixel (RGB or RGBA). */
export interface RawImage {
  data: Buffer;
  width: number;
  height: number;
  channels: number;
}

export interface Frame extends RawImage {
  /** Epoch milliseconds at acquisition. */
  capturedAt: number;
  /** Monotonic acquisition counter, starting at 1. */
  index: number;
}

/**
 * Where frames come from. Owned exclusively by the capture loop:
 * `open` before the first `grab`, `close` after the last.
 */
export interface FrameSource {
  readonly name: string;
  open(): Promise<void>;
  grab(): Promise<RawImage>;
  close(): Promise<void>;
}

export type FrameHandler = (frame: Frame) => void | Promise<void>;

export interface CaptureStats {
  currentFps: number;
  targetFps: number;
  framesCaptured: number;
  framesDropped: number;
  consecutiveFailures: number;
  isRunning: boolean;
}
