import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { Card } from "@/lib/card-detection/types";
import type { GameState, VisionMetrics } from "@/lib/game-state/types";
import { silentLogger } from "@/lib/logging/logger";
import { GameStateRepository } from "./game-states";

const DAY_MS = 24 * 60 * 60 * 1000;
const START = Date.UTC(2024, 4, 1, 12, 0, 0);

const card = (rank: Card["rank"], suit: Card["suit"], x: number): Card => ({
  rank,
  suit,
  confidence: 0.9,
  position: { x, y: 40 },
  source: "primary",
});

function makeState(handId: string, timestamp: number, potSize: number, board: Card[] = []): GameState {
  return {
    timestamp,
    handId,
    phase: board.length === 3 ? "FLOP" : "PREFLOP",
    potSize,
    communityCards: board,
    players: [
      {
        position: 0,
        name: "alice",
        stackSize: 1500,
        holeCards: [card("Q", "s", 300), card("Q", "h", 330)],
        currentBet: 50,
        isActive: true,
        isCurrent: true,
      },
      {
        position: 1,
        name: "Player_1",
        stackSize: 0,
        holeCards: [],
        currentBet: 0,
        isActive: false,
        isCurrent: false,
      },
    ],
    timerRemaining: 15,
    availableActions: ["fold"],
    bettingOptions: { minBet: 20, maxBet: 1000, sliderPositions: { pot: 100 } },
  };
}

function makeMetrics(timestamp: number, overrides: Partial<VisionMetrics> = {}): VisionMetrics {
  return {
    timestamp,
    processingTimeMs: 40,
    frameRate: 10,
    detectionConfidence: 0.9,
    textConfidence: 0.8,
    elementsDetected: 9,
    elementsFailed: 0,
    errorDetails: [],
    ...overrides,
  };
}

describe("GameStateRepository", () => {
  let dir: string;
  let clock: number;
  let repo: GameStateRepository;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "game-states-"));
    clock = START;
    repo = new GameStateRepository({ dbPath: join(dir, "table.db"), logger: silentLogger, now: () => clock });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("creates the hand row once and numbers hands per session", () => {
    const sessionId = repo.createSession();
    repo.saveGameState(sessionId, makeState("hand_a", START, 100));
    repo.saveGameState(sessionId, makeState("hand_a", START + 100, 300));
    repo.saveGameState(sessionId, makeState("hand_b", START + 200, 40));

    const recent = repo.getRecentGameStates(sessionId);
    expect(recent.map((s) => [s.state.handId, s.handNumber])).toEqual([
      ["hand_b", 2],
      ["hand_a", 1],
      ["hand_a", 1],
    ]);
    expect(repo.getSession(sessionId)?.totalHands).toBe(2);

    const other = repo.createSession();
    repo.saveGameState(other, makeState("hand_a", START + 300, 100));
    expect(repo.getRecentGameStates(other).map((s) => s.handNumber)).toEqual([1]);
  });

  it("reads back stored states unchanged", () => {
    const sessionId = repo.createSession();
    const state = makeState("hand_a", START, 300, [card("A", "h", 10), card("7", "c", 60), card("K", "d", 110)]);
    repo.saveGameState(sessionId, state);

    const [stored] = repo.getRecentGameStates(sessionId, 1);
    expect(stored.state).toEqual(state);
  });

  it("reads back a state whose board has an unusual card count", () => {
    const sessionId = repo.createSession();
    const board = [10, 60, 110, 160, 210, 260].map((x): Card => ({
      rank: "?",
      suit: "?",
      confidence: 0.4,
      position: { x, y: 40 },
      source: "fallback",
    }));
    const state = makeState("hand_a", START, 300, board);
    repo.saveGameState(sessionId, state);

    const [stored] = repo.getRecentGameStates(sessionId, 1);
    expect(stored.state).toEqual(state);
    expect(stored.state.phase).toBe("PREFLOP");
  });

  it("limits recent states, newest first", () => {
    const sessionId = repo.createSession();
    for (let i = 0; i < 5; i++) {
      repo.saveGameState(sessionId, makeState("hand_a", START + i * 100, i));
    }

    expect(repo.getRecentGameStates(sessionId, 2).map((s) => s.state.potSize)).toEqual([4, 3]);
  });

  it("reports session statistics over the last hour of metrics", () => {
    const sessionId = repo.createSession();
    repo.saveGameState(sessionId, makeState("hand_a", START, 100));
    repo.saveGameState(sessionId, makeState("hand_b", START + 100, 100));
    repo.saveVisionMetrics(sessionId, makeMetrics(START - 2 * 60 * 60 * 1000, { frameRate: 100 }));
    repo.saveVisionMetrics(sessionId, makeMetrics(START));
    repo.saveVisionMetrics(
      sessionId,
      makeMetrics(START, { detectionConfidence: 0.7, textConfidence: 0.6, frameRate: 8, processingTimeMs: 60 }),
    );

    const stats = repo.getSessionStats(sessionId);
    expect(stats).not.toBeNull();
    if (!stats) return;
    expect(stats.handsPlayed).toBe(2);
    expect(stats.gameStatesRecorded).toBe(2);
    expect(stats.session.totalFramesProcessed).toBe(3);
    expect(stats.session.status).toBe("active");
    expect(stats.recentMetricsCount).toBe(2);
    expect(stats.averageDetectionConfidence).toBeCloseTo(0.8);
    expect(stats.averageTextConfidence).toBeCloseTo(0.7);
    expect(stats.averageFrameRate).toBeCloseTo(9);
    expect(stats.averageProcessingTimeMs).toBeCloseTo(50);
  });

  it("returns null stats for an unknown session", () => {
    expect(repo.getSessionStats(42)).toBeNull();
  });

  it("ends a session with its totals", () => {
    const sessionId = repo.createSession();
    repo.saveGameState(sessionId, makeState("hand_a", START, 100));
    clock = START + 60_000;
    repo.endSession(sessionId);

    expect(repo.getSession(sessionId)).toEqual({
      id: sessionId,
      startTime: START,
      endTime: START + 60_000,
      totalHands: 1,
      totalFramesProcessed: 0,
      status: "completed",
    });
  });

  it("exports a session to JSON", () => {
    const sessionId = repo.createSession();
    repo.saveGameState(sessionId, makeState("hand_a", START, 100));
    repo.saveGameState(sessionId, makeState("hand_b", START + 100, 40));
    repo.saveVisionMetrics(sessionId, makeMetrics(START, { errorDetails: ["pot not read"] }));

    const path = repo.exportSession(sessionId, join(dir, "exports", "session.json"));
    const document = JSON.parse(readFileSync(path, "utf-8"));

    expect(document.session_id).toBe(sessionId);
    expect(document.export_timestamp).toBe("2024-05-01T12:00:00.000Z");
    expect(document.total_states).toBe(2);
    expect(document.game_states.map((s: { hand_number: number }) => s.hand_number)).toEqual([1, 2]);
    expect(document.game_states[0].hand_id).toBe("hand_a");
    expect(document.game_states[0].players[0].stack_size).toBe(1500);
    expect(document.vision_metrics).toHaveLength(1);
    expect(document.vision_metrics[0].error_details).toEqual(["pot not read"]);
  });

  it("cleans up data from old sessions", () => {
    const sessionId = repo.createSession();
    repo.saveGameState(sessionId, makeState("hand_a", START, 100));
    repo.saveGameState(sessionId, makeState("hand_a", START + 100, 200));
    repo.saveVisionMetrics(sessionId, makeMetrics(START));

    clock = START + 31 * DAY_MS;
    const fresh = repo.createSession();
    repo.saveGameState(fresh, makeState("hand_a", clock, 100));

    expect(repo.cleanupOldData(30)).toBe(2);
    expect(repo.getRecentGameStates(sessionId)).toEqual([]);
    expect(repo.getRecentGameStates(fresh)).toHaveLength(1);
  });
});
