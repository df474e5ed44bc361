const DEFAULT_WINDOW_MS = 1000;

/** Frame rate over a sliding window of acquisition timestamps. */
export class RollingFps {
  private timestamps: number[] = [];

  constructor(private readonly windowMs = DEFAULT_WINDOW_MS) {}

  record(timestamp: number): void {
    this.timestamps.push(timestamp);
    const cutoff = timestamp - this.windowMs;
    while (this.timestamps.length > 0 && this.timestamps[0] < cutoff) {
      this.timestamps.shift();
    }
  }

  /** Intervals in the window divided by the span they cover. Zero until two frames are seen. */
  get value(): number {
    const count = this.timestamps.length;
    if (count < 2) return 0;

    const spanMs = this.timestamps[count - 1] - this.timestamps[0];
    return spanMs > 0 ? ((count - 1) * 1000) / spanMs : 0;
  }

  reset(): void {
    this.timestamps = [];
  }
}
