import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { BufferFrameSource, DirectoryFrameSource } from "@/lib/capture/frame-source";
import { CaptureScheduler } from "@/lib/capture/scheduler";
import type { Frame, FrameSource } from "@/lib/capture/types";
import { RecordingReporter } from "@/lib/errors/testing";
import { buildTablePipeline, card, tableImage } from "@/lib/extraction/testing";
import { StateReconstructor } from "@/lib/game-state/reconstruct";
import { silentLogger } from "@/lib/logging/logger";
import { GameStateRepository } from "@/lib/storage/game-states";
import { TableMonitor } from "./table-monitor";

describe("TableMonitor", () => {
  let dir: string;
  let repository: GameStateRepository;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "table-monitor-"));
    repository = new GameStateRepository({ dbPath: join(dir, "table.db"), logger: silentLogger });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  async function setup(source: FrameSource = new BufferFrameSource([tableImage()], { loop: true })) {
    const reporter = new RecordingReporter();
    const { pipeline, text } = await buildTablePipeline({
      reporter,
      board: [card("A", "h", 150), card("7", "c", 200), card("K", "d", 250)],
    });
    const scheduler = new CaptureScheduler({ source, targetFps: 100, reporter, logger: silentLogger });
    const monitor = new TableMonitor({
      scheduler,
      reconstructor: new StateReconstructor({
        pipeline,
        reporter,
        bettingOptions: { minBet: 20, maxBet: 1000, sliderPositions: {} },
        logger: silentLogger,
      }),
      repository,
      reporter,
      textRecognizer: text,
      logger: silentLogger,
    });
    return { monitor, reporter, pipeline };
  }

  const frame = (index: number): Frame => ({ ...tableImage(), capturedAt: 1000 + index, index });

  it("keeps the latest state and metrics for polling", async () => {
    const { monitor } = await setup();
    expect(monitor.getCurrentGameState()).toBeNull();

    await monitor.processFrame(frame(1));

    expect(monitor.getCurrentGameState()?.phase).toBe("FLOP");
    expect(monitor.getCurrentGameState()?.potSize).toBe(2400);
    const stats = monitor.getPerformanceStats();
    expect(stats.framesProcessed).toBe(1);
    expect(stats.statesProduced).toBe(1);
    expect(stats.lastMetrics?.elementsFailed).toBe(0);
    expect(stats.capture.isRunning).toBe(false);
    expect(monitor.getSessionStats()).toBeNull();
  });

  it("keeps the previous state and records a failure when a frame yields none", async () => {
    const { monitor, pipeline } = await setup();
    await monitor.processFrame(frame(1));
    const first = monitor.getCurrentGameState();

    vi.spyOn(pipeline, "extract").mockRejectedValueOnce(new Error("bad frame"));
    await monitor.processFrame(frame(2));

    expect(monitor.getCurrentGameState()).toBe(first);
    expect(monitor.getPerformanceStats().statesProduced).toBe(1);
    expect(monitor.getPerformanceStats().lastMetrics?.errorDetails).toEqual(["Failed to parse game state: bad frame"]);
  });

  it("reports persistence failures without throwing", async () => {
    const { monitor, reporter } = await setup();
    vi.spyOn(repository, "saveVisionMetrics").mockImplementation(() => {
      throw new Error("disk full");
    });

    await expect(monitor.processFrame(frame(1))).resolves.toBeUndefined();

    expect(monitor.getCurrentGameState()).not.toBeNull();
    expect(reporter.errors).toHaveLength(1);
    expect(reporter.errors[0]).toMatchObject({
      severity: "HIGH",
      category: "DATABASE",
      component: "monitor.table-monitor",
      function: "saveVisionMetrics",
      frameNumber: 1,
    });
  });

  it("runs a session from start to stop", async () => {
    const { monitor } = await setup();

    await expect(monitor.start()).resolves.toBe(true);
    const sessionId = monitor.currentSessionId;
    expect(sessionId).not.toBeNull();

    await vi.waitFor(() => expect(monitor.getPerformanceStats().framesProcessed).toBeGreaterThanOrEqual(2), {
      timeout: 2000,
    });
    await monitor.stop();

    const stats = monitor.getSessionStats();
    expect(stats?.handsPlayed).toBe(1);
    expect(stats?.gameStatesRecorded).toBe(monitor.getPerformanceStats().statesProduced);
    expect(stats?.session.status).toBe("completed");
    expect(stats?.session.totalFramesProcessed).toBe(monitor.getPerformanceStats().framesProcessed);
  });

  it("opens a single session when start is called twice at once", async () => {
    const { monitor } = await setup();
    const createSession = vi.spyOn(repository, "createSession");

    const results = await Promise.all([monitor.start(), monitor.start()]);
    await monitor.stop();

    expect(results).toEqual([true, true]);
    expect(createSession).toHaveBeenCalledTimes(1);
    expect(monitor.getSessionStats()?.session.status).toBe("completed");
  });

  it("ends the session when capture cannot start", async () => {
    const { monitor, reporter } = await setup(new DirectoryFrameSource(join(dir, "missing")));

    await expect(monitor.start()).resolves.toBe(false);

    expect(reporter.errors[0]).toMatchObject({ severity: "HIGH", category: "CAPTURE" });
    expect(monitor.getSessionStats()?.session.status).toBe("completed");
  });
});
