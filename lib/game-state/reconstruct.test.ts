import { describe, expect, it, vi } from "vitest";
import type { Frame } from "@/lib/capture/types";
import type { BettingOptions } from "@/lib/config/settings";
import { RecordingReporter } from "@/lib/errors/testing";
import { buildTablePipeline, card, tableImage } from "@/lib/extraction/testing";
import { silentLogger } from "@/lib/logging/logger";
import { FakeTextEngine } from "@/lib/text-recognition/testing";
import { handIdFor } from "./hand-identity";
import { computeVisionMetrics } from "./metrics";
import { StateReconstructor } from "./reconstruct";

const BETTING: BettingOptions = { minBet: 20, maxBet: 1000, sliderPositions: { pot: 100 } };

const frameAt = (capturedAt: number, index = 1): Frame => ({ ...tableImage(), capturedAt, index });

async function setup(options: { board?: ReturnType<typeof card>[]; engine?: FakeTextEngine } = {}) {
  const reporter = new RecordingReporter();
  const { pipeline } = await buildTablePipeline({
    reporter,
    board: options.board ?? [card("K", "d", 250), card("A", "h", 150), card("7", "c", 200)],
    holeCards: [card("Q", "s", 140), card("Q", "h", 160)],
    engine: options.engine,
  });
  const reconstructor = new StateReconstructor({ pipeline, reporter, bettingOptions: BETTING, logger: silentLogger });
  return { reporter, pipeline, reconstructor };
}

describe("StateReconstructor", () => {
  it("assembles a full game state from one frame", async () => {
    const { reconstructor } = await setup();

    const { state, error } = await reconstructor.reconstruct(frameAt(5000));

    expect(error).toBeNull();
    expect(state).not.toBeNull();
    if (!state) return;
    expect(state.timestamp).toBe(5000);
    expect(state.phase).toBe("FLOP");
    expect(state.handId).toBe(handIdFor(1, [{ position: 0, name: "Hero", holeCards: [] }], ["Ah", "7c", "Kd"]));
    expect(state.potSize).toBe(2400);
    expect(state.timerRemaining).toBe(15);
    expect(state.availableActions).toEqual(["fold"]);
    expect(state.bettingOptions).toBe(BETTING);
    expect(state.communityCards.map((c) => `${c.rank}${c.suit}`)).toEqual(["Ah", "7c", "Kd"]);
    expect(state.players).toEqual([
      {
        position: 0,
        name: "Hero",
        stackSize: 1500,
        holeCards: [card("Q", "s", 140), card("Q", "h", 160)],
        currentBet: 50,
        isActive: true,
        isCurrent: false,
      },
    ]);
    expect(Object.isFrozen(state)).toBe(true);
  });

  it("keeps the hand id across frames of the same hand", async () => {
    const { reconstructor } = await setup();

    const first = await reconstructor.reconstruct(frameAt(5000, 1));
    const second = await reconstructor.reconstruct(frameAt(5100, 2));

    expect(second.state?.handId).toBe(first.state?.handId);
    expect(reconstructor.hands.handsSeen).toBe(1);
  });

  it("degrades unread seat fields to defaults", async () => {
    const engine = new FakeTextEngine();
    const { reconstructor } = await setup({ board: [], engine });

    const { state } = await reconstructor.reconstruct(frameAt(5000));

    expect(state?.phase).toBe("PREFLOP");
    expect(state?.potSize).toBe(0);
    expect(state?.timerRemaining).toBe(0);
    expect(state?.players[0]).toMatchObject({ position: 0, name: "Player_0", stackSize: 0, currentBet: 0 });
  });

  it("yields no state and reports when extraction throws", async () => {
    const { reconstructor, pipeline, reporter } = await setup();
    const failure = new Error("bad frame");
    vi.spyOn(pipeline, "extract").mockRejectedValue(failure);

    const analysis = await reconstructor.reconstruct(frameAt(5000, 7));

    expect(analysis).toEqual({ state: null, extraction: null, error: failure });
    expect(reporter.errors).toEqual([
      {
        severity: "MEDIUM",
        category: "VISION",
        message: "Game state reconstruction failed",
        component: "game-state.reconstruct",
        function: "reconstruct",
        error: failure,
        frameNumber: 7,
      },
    ]);
  });
});

describe("computeVisionMetrics", () => {
  it("summarizes a successful frame", async () => {
    const { reconstructor } = await setup();
    const { state, extraction } = await reconstructor.reconstruct(frameAt(5000));

    const metrics = computeVisionMetrics({
      timestamp: 5000,
      processingTimeMs: 42.4,
      frameRate: 9.5,
      state,
      extraction,
    });

    expect(metrics.processingTimeMs).toBe(42);
    expect(metrics.frameRate).toBe(9.5);
    expect(metrics.detectionConfidence).toBeCloseTo(0.95);
    expect(metrics.textConfidence).toBeCloseTo(0.88);
    expect(metrics.elementsDetected).toBe(9);
    expect(metrics.elementsFailed).toBe(0);
    expect(metrics.errorDetails).toEqual([]);
  });

  it("excludes fallback cards from detection confidence and lists unread fields", async () => {
    const engine = new FakeTextEngine();
    const { reconstructor } = await setup({
      board: [{ ...card("?", "?", 150, 0.3), source: "fallback" }, card("A", "h", 200, 0.8)],
      engine,
    });
    const { state, extraction } = await reconstructor.reconstruct(frameAt(5000));

    const metrics = computeVisionMetrics({ timestamp: 5000, processingTimeMs: 10, frameRate: 0, state, extraction });

    expect(metrics.detectionConfidence).toBeCloseTo((0.8 + 0.95 + 0.95) / 3);
    expect(metrics.textConfidence).toBe(0);
    expect(metrics.elementsFailed).toBe(4);
    expect(metrics.errorDetails).toEqual([
      "pot not read",
      "timer not read",
      "player_0 name not read",
      "player_0 stack not read",
    ]);
  });

  it("counts a frame without state as one failure", () => {
    const metrics = computeVisionMetrics({
      timestamp: 5000,
      processingTimeMs: 3,
      frameRate: 10,
      state: null,
      extraction: null,
      error: new Error("bad frame"),
    });

    expect(metrics).toEqual({
      timestamp: 5000,
      processingTimeMs: 3,
      frameRate: 10,
      detectionConfidence: 0,
      textConfidence: 0,
      elementsDetected: 0,
      elementsFailed: 1,
      errorDetails: ["Failed to parse game state: bad frame"],
    });
  });
});
