import type { ErrorReporter, ErrorSeverity } from "@/lib/errors/types";
import { createLogger, type Logger } from "@/lib/logging/logger";
import { LatestFrameChannel } from "./channel";
import { RollingFps } from "./fps";
import type { CaptureStats, Frame, FrameHandler, FrameSource } from "./types";

const COMPONENT = "capture.scheduler";
const DEFAULT_CALLBACK_WARN_MS = 50;
const DEFAULT_STOP_TIMEOUT_MS = 2000;

type Sleep = (ms: number) => Promise<void>;

export type CaptureSchedulerOptions = {
  source: FrameSource;
  targetFps: number;
  reporter: ErrorReporter;
  logger?: Logger;
  /** Handler durations above this emit a PERFORMANCE event. */
  callbackWarnMs?: number;
  stopTimeoutMs?: number;
  /** Epoch milliseconds; used for frame timestamps and durations. */
  now?: () => number;
  sleep?: Sleep;
};

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/** Severity for the nth consecutive acquisition failure. */
export function severityForFailureStreak(streak: number): ErrorSeverity {
  if (streak > 10) return "CRITICAL";
  if (streak > 5) return "HIGH";
  return "MEDIUM";
}

/** Severity of a slow handler invocation, or null when it stayed under the threshold. */
export function severityForCallbackTime(elapsedMs: number, warnMs: number): ErrorSeverity | null {
  if (elapsedMs > warnMs * 2) return "MEDIUM";
  if (elapsedMs > warnMs) return "LOW";
  return null;
}

function waitWithTimeout(work: Promise<unknown>, timeoutMs: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });
  return Promise.race([work.then(() => true), timeout]).finally(() => clearTimeout(timer));
}

/**
 * Acquires frames at a target rate and hands the most recent one to a
 * single registered handler.
 *
 * The producer loop grabs a frame, publishes it to a single-slot channel and
 * sleeps for what is left of the interval. The consumer loop takes the latest
 * frame and runs the handler, so a slow handler causes intermediate frames to
 * be dropped rather than queued.
 */
export class CaptureScheduler {
  private readonly source: FrameSource;
  private readonly reporter: ErrorReporter;
  private readonly logger: Logger;
  private readonly intervalMs: number;
  private readonly targetFps: number;
  private readonly callbackWarnMs: number;
  private readonly stopTimeoutMs: number;
  private readonly now: () => number;
  private readonly sleep: Sleep;

  private handler: FrameHandler | null = null;
  private channel = new LatestFrameChannel<Frame>();
  private readonly fps = new RollingFps();
  private running = false;
  private producer: Promise<void> | null = null;
  private consumer: Promise<void> | null = null;
  private frameIndex = 0;
  private framesCaptured = 0;
  private consecutiveFailures = 0;
  private lastCallbackMs = 0;

  constructor(options: CaptureSchedulerOptions) {
    this.source = options.source;
    this.reporter = options.reporter;
    this.logger = options.logger ?? createLogger({ module: COMPONENT });
    this.targetFps = options.targetFps;
    this.intervalMs = 1000 / options.targetFps;
    this.callbackWarnMs = options.callbackWarnMs ?? DEFAULT_CALLBACK_WARN_MS;
    this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Register the frame handler. A later call replaces the earlier handler. */
  onFrame(handler: FrameHandler): void {
    this.handler = handler;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Open the source and start both loops. Resolves false (after reporting)
   * when the source cannot be opened; never rejects.
   */
  async start(): Promise<boolean> {
    if (this.running) {
      this.logger.warn("Capture already running");
      return true;
    }

    try {
      await this.source.open();
    } catch (err) {
      this.reporter.logError({
        severity: "HIGH",
        category: "CAPTURE",
        message: "Failed to open frame source",
        component: COMPONENT,
        function: "start",
        error: err,
        data: { source: this.source.name },
      });
      return false;
    }

    this.running = true;
    this.channel = new LatestFrameChannel<Frame>();
    this.fps.reset();
    this.consecutiveFailures = 0;
    this.producer = this.produce();
    this.consumer = this.consume();

    this.logger.info("Capture started", { source: this.source.name, targetFps: this.targetFps });
    return true;
  }

  /** Stop both loops, waiting at most `stopTimeoutMs`, then close the source. */
  async stop(): Promise<void> {
    if (!this.running && !this.producer && !this.consumer) return;

    this.running = false;
    this.channel.close();

    const loops = Promise.all([this.producer, this.consumer]);
    const joined = await waitWithTimeout(loops, this.stopTimeoutMs);
    if (!joined) {
      this.logger.warn(`Capture loops did not finish within ${this.stopTimeoutMs}ms`);
    }
    this.producer = null;
    this.consumer = null;

    try {
      await this.source.close();
    } catch (err) {
      this.reporter.logError({
        severity: "LOW",
        category: "CAPTURE",
        message: "Failed to close frame source",
        component: COMPONENT,
        function: "stop",
        error: err,
      });
    }

    this.logger.info("Capture stopped", { framesCaptured: this.framesCaptured });
  }

  getStats(): CaptureStats {
    return {
      currentFps: Math.round(this.fps.value * 10) / 10,
      targetFps: this.targetFps,
      framesCaptured: this.framesCaptured,
      framesDropped: this.channel.dropped,
      consecutiveFailures: this.consecutiveFailures,
      isRunning: this.running,
    };
  }

  get lastCallbackTimeMs(): number {
    return this.lastCallbackMs;
  }

  /**
   * One acquisition attempt: grab, stamp and publish a frame, or record the
   * failure and escalate by streak length. Returns whether a frame was produced.
   */
  async captureOnce(): Promise<boolean> {
    let frame: Frame;
    try {
      const image = await this.source.grab();
      const capturedAt = this.now();
      this.frameIndex += 1;
      frame = { ...image, capturedAt, index: this.frameIndex };
    } catch (err) {
      this.consecutiveFailures += 1;
      this.reporter.logError({
        severity: severityForFailureStreak(this.consecutiveFailures),
        category: "CAPTURE",
        message: "Frame acquisition failed",
        component: COMPONENT,
        function: "captureOnce",
        error: err,
        data: { consecutive_failures: this.consecutiveFailures },
      });
      return false;
    }

    if (this.consecutiveFailures > 0) {
      this.logger.info(`Frame acquisition recovered after ${this.consecutiveFailures} failures`);
    }
    this.consecutiveFailures = 0;
    this.framesCaptured += 1;
    this.fps.record(frame.capturedAt);
    this.channel.publish(frame);
    return true;
  }

  /** Run the handler on one frame, timing it. Handler errors are reported, never thrown. */
  async dispatch(frame: Frame): Promise<void> {
    const handler = this.handler;
    if (!handler) return;

    const started = this.now();
    try {
      await handler(frame);
    } catch (err) {
      this.reporter.logError({
        severity: "MEDIUM",
        category: "VISION",
        message: "Frame handler failed",
        component: COMPONENT,
        function: "dispatch",
        error: err,
        frameNumber: frame.index,
      });
    }

    const elapsed = this.now() - started;
    this.lastCallbackMs = elapsed;

    const severity = severityForCallbackTime(elapsed, this.callbackWarnMs);
    if (severity) {
      this.reporter.logPerformance("Slow frame handler", {
        component: COMPONENT,
        function: "dispatch",
        processingTimeMs: Math.round(elapsed),
        severity,
        data: { callback_time_ms: elapsed, threshold_ms: this.callbackWarnMs, frame: frame.index },
      });
    }
  }

  private async produce(): Promise<void> {
    while (this.running) {
      const cycleStart = this.now();
      await this.captureOnce();
      const elapsed = this.now() - cycleStart;
      if (!this.running) break;
      await this.sleep(Math.max(0, this.intervalMs - elapsed));
    }
  }

  private async consume(): Promise<void> {
    for (;;) {
      const frame = await this.channel.take();
      if (frame === null) break;
      await this.dispatch(frame);
    }
  }
}
