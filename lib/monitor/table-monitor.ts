import type { CaptureScheduler } from "@/lib/capture/scheduler";
import type { CaptureStats, Frame } from "@/lib/capture/types";
import type { ErrorReporter } from "@/lib/errors/types";
import { computeVisionMetrics } from "@/lib/game-state/metrics";
import type { StateReconstructor } from "@/lib/game-state/reconstruct";
import type { GameState, VisionMetrics } from "@/lib/game-state/types";
import { createLogger, type Logger } from "@/lib/logging/logger";
import type { GameStateRepository, SessionStats } from "@/lib/storage/game-states";
import type { BatchedTextRecognizer } from "@/lib/text-recognition/recognizer";

const COMPONENT = "monitor.table-monitor";

export interface PerformanceStats {
  capture: CaptureStats;
  framesProcessed: number;
  statesProduced: number;
  averageProcessingTimeMs: number;
  lastCallbackTimeMs: number;
  lastMetrics: VisionMetrics | null;
}

export interface TableMonitorOptions {
  scheduler: CaptureScheduler;
  reconstructor: StateReconstructor;
  repository: GameStateRepository;
  reporter: ErrorReporter;
  /** Started with the monitor and terminated when it stops. */
  textRecognizer?: BatchedTextRecognizer;
  logger?: Logger;
  now?: () => number;
}

/**
 * Runs the whole pipeline: every captured frame is reconstructed, measured
 * and persisted. Persistence failures are reported and never reach the
 * capture loop. Dashboards poll the `get*` accessors.
 */
export class TableMonitor {
  private readonly scheduler: CaptureScheduler;
  private readonly reconstructor: StateReconstructor;
  private readonly repository: GameStateRepository;
  private readonly reporter: ErrorReporter;
  private readonly textRecognizer: BatchedTextRecognizer | undefined;
  private readonly logger: Logger;
  private readonly now: () => number;

  private starting = false;
  private sessionId: number | null = null;
  private currentState: GameState | null = null;
  private lastMetrics: VisionMetrics | null = null;
  private framesProcessed = 0;
  private statesProduced = 0;
  private totalProcessingMs = 0;

  constructor(options: TableMonitorOptions) {
    this.scheduler = options.scheduler;
    this.reconstructor = options.reconstructor;
    this.repository = options.repository;
    this.reporter = options.reporter;
    this.textRecognizer = options.textRecognizer;
    this.logger = options.logger ?? createLogger({ module: COMPONENT });
    this.now = options.now ?? Date.now;

    this.scheduler.onFrame((frame) => this.processFrame(frame));
  }

  get currentSessionId(): number | null {
    return this.sessionId;
  }

  async start(): Promise<boolean> {
    if (this.scheduler.isRunning || this.starting) {
      this.logger.warn("Monitor already running");
      return true;
    }

    this.starting = true;
    try {
      if (this.textRecognizer && !this.textRecognizer.isAvailable) {
        await this.textRecognizer.init();
      }

      this.sessionId = this.persist("createSession", () => this.repository.createSession());

      const started = await this.scheduler.start();
      if (!started) {
        this.endSession();
        return false;
      }
    } finally {
      this.starting = false;
    }

    this.logger.info(`Monitoring started${this.sessionId !== null ? ` (session ${this.sessionId})` : ""}`);
    return true;
  }

  async stop(): Promise<void> {
    await this.scheduler.stop();
    this.endSession();
    if (this.textRecognizer) {
      await this.textRecognizer.terminate();
    }
    this.logger.info(`Monitoring stopped after ${this.framesProcessed} frames`);
  }

  /** Reconstruct, measure and store one frame. Never throws. */
  async processFrame(frame: Frame): Promise<void> {
    const startedAt = this.now();
    const analysis = await this.reconstructor.reconstruct(frame);
    const processingTimeMs = this.now() - startedAt;

    const metrics = computeVisionMetrics({
      timestamp: frame.capturedAt,
      processingTimeMs,
      frameRate: this.scheduler.getStats().currentFps,
      state: analysis.state,
      extraction: analysis.extraction,
      error: analysis.error,
    });

    this.framesProcessed += 1;
    this.totalProcessingMs += processingTimeMs;
    this.lastMetrics = metrics;

    const sessionId = this.sessionId;
    if (analysis.state) {
      const state = analysis.state;
      this.currentState = state;
      this.statesProduced += 1;
      if (sessionId !== null) {
        this.persist("saveGameState", () => this.repository.saveGameState(sessionId, state), frame.index);
      }
    }

    this.persist("saveVisionMetrics", () => this.repository.saveVisionMetrics(sessionId, metrics), frame.index);
  }

  getCurrentGameState(): GameState | null {
    return this.currentState;
  }

  getPerformanceStats(): PerformanceStats {
    return {
      capture: this.scheduler.getStats(),
      framesProcessed: this.framesProcessed,
      statesProduced: this.statesProduced,
      averageProcessingTimeMs: this.framesProcessed > 0 ? this.totalProcessingMs / this.framesProcessed : 0,
      lastCallbackTimeMs: this.scheduler.lastCallbackTimeMs,
      lastMetrics: this.lastMetrics,
    };
  }

  getSessionStats(): SessionStats | null {
    const sessionId = this.sessionId;
    if (sessionId === null) return null;
    return this.persist("getSessionStats", () => this.repository.getSessionStats(sessionId));
  }

  private endSession(): void {
    const sessionId = this.sessionId;
    if (sessionId === null) return;
    this.persist("endSession", () => this.repository.endSession(sessionId));
  }

  private persist<T>(fn: string, operation: () => T, frameNumber?: number): T | null {
    try {
      return operation();
    } catch (error) {
      this.reporter.logError({
        severity: "HIGH",
        category: "DATABASE",
        message: "Game state persistence failed",
        component: COMPONENT,
        function: fn,
        error,
        sessionId: this.sessionId ?? undefined,
        frameNumber,
      });
      return null;
    }
  }
}
