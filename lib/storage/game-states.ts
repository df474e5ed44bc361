import { mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import { and, asc, avg, count, desc, eq, gte, inArray, lt, max } from "drizzle-orm";
import { parseGameStateJson, toGameStateJson, toVisionMetricsJson } from "@/lib/game-state/serialize";
import type { GameState, VisionMetrics } from "@/lib/game-state/types";
import { createLogger, type Logger } from "@/lib/logging/logger";
import { type TableVisionDatabase, withDatabase } from "./client";
import {
  type GameStateRow,
  gameStates,
  hands,
  type PlayerStateRow,
  playerStates,
  type SessionStatus,
  sessions,
  visionMetrics,
} from "./schema";

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export interface SessionInfo {
  id: number;
  startTime: number;
  endTime: number | null;
  totalHands: number;
  totalFramesProcessed: number;
  status: SessionStatus;
}

export interface SessionStats {
  session: SessionInfo;
  handsPlayed: number;
  gameStatesRecorded: number;
  /** Averages over the session's metrics from the last hour. */
  averageDetectionConfidence: number;
  averageTextConfidence: number;
  averageFrameRate: number;
  averageProcessingTimeMs: number;
  recentMetricsCount: number;
}

export interface StoredGameState {
  id: number;
  handNumber: number;
  state: GameState;
}

export type GameStateRepositoryOptions = {
  dbPath: string;
  logger?: Logger;
  now?: () => number;
};

/** Sessions, hands, per-frame game states and vision metrics. */
export class GameStateRepository {
  private readonly dbPath: string;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: GameStateRepositoryOptions) {
    this.dbPath = options.dbPath;
    this.logger = options.logger ?? createLogger({ module: "storage.game-states" });
    this.now = options.now ?? Date.now;
  }

  createSession(): number {
    const id = withDatabase(this.dbPath, (db) =>
      db.insert(sessions).values({ startTime: this.now(), status: "active" }).returning({ id: sessions.id }).get().id,
    );
    this.logger.info(`Created session ${id}`);
    return id;
  }

  endSession(sessionId: number): void {
    const session = withDatabase(this.dbPath, (db) =>
      db
        .update(sessions)
        .set({ endTime: this.now(), totalHands: countHands(db, sessionId), status: "completed" })
        .where(eq(sessions.id, sessionId))
        .returning()
        .get(),
    );
    if (session) {
      this.logger.info(
        `Session ${sessionId} ended - ${session.totalHands} hands, ${session.totalFramesProcessed} frames`,
      );
    }
  }

  /**
   * Store one game state with its players. The hand row is created on the
   * hand's first state and numbered within the session.
   */
  saveGameState(sessionId: number, state: GameState): number {
    const json = toGameStateJson(state);
    const currentPlayer = state.players.find((player) => player.isCurrent);

    return withDatabase(this.dbPath, (db) =>
      db.transaction((tx) => {
        const hand = tx
          .select()
          .from(hands)
          .where(and(eq(hands.sessionId, sessionId), eq(hands.handId, state.handId)))
          .get();

        let handRowId: number;
        if (hand) {
          handRowId = hand.id;
          tx.update(hands).set({ lastSeen: state.timestamp, finalPot: state.potSize }).where(eq(hands.id, hand.id)).run();
        } else {
          const last = tx
            .select({ value: max(hands.handNumber) })
            .from(hands)
            .where(eq(hands.sessionId, sessionId))
            .get();
          handRowId = tx
            .insert(hands)
            .values({
              sessionId,
              handId: state.handId,
              handNumber: (last?.value ?? 0) + 1,
              startTime: state.timestamp,
              lastSeen: state.timestamp,
              finalPot: state.potSize,
            })
            .returning({ id: hands.id })
            .get().id;
          tx.update(sessions).set({ totalHands: countHands(tx, sessionId) }).where(eq(sessions.id, sessionId)).run();
        }

        const gameStateId = tx
          .insert(gameStates)
          .values({
            handRowId,
            handId: state.handId,
            timestamp: state.timestamp,
            phase: state.phase,
            potSize: state.potSize,
            communityCardsJson: JSON.stringify(json.community_cards),
            timerRemaining: state.timerRemaining,
            currentPlayerPosition: currentPlayer?.position ?? null,
            availableActionsJson: JSON.stringify(json.available_actions),
            bettingOptionsJson: JSON.stringify(json.betting_options),
          })
          .returning({ id: gameStates.id })
          .get().id;

        if (json.players.length > 0) {
          tx.insert(playerStates)
            .values(
              json.players.map((player) => ({
                gameStateId,
                position: player.position,
                name: player.name,
                stackSize: player.stack_size,
                holeCardsJson: JSON.stringify(player.hole_cards),
                currentBet: player.current_bet,
                isActive: player.is_active,
                isCurrent: player.is_current,
              })),
            )
            .run();
        }

        return gameStateId;
      }),
    );
  }

  /** Store one frame's metrics and count the frame against the session. */
  saveVisionMetrics(sessionId: number | null, metrics: VisionMetrics): void {
    withDatabase(this.dbPath, (db) =>
      db.transaction((tx) => {
        tx.insert(visionMetrics)
          .values({
            sessionId,
            timestamp: metrics.timestamp,
            processingTimeMs: metrics.processingTimeMs,
            frameRate: metrics.frameRate,
            detectionConfidence: metrics.detectionConfidence,
            textConfidence: metrics.textConfidence,
            elementsDetected: metrics.elementsDetected,
            elementsFailed: metrics.elementsFailed,
            errorDetailsJson: JSON.stringify(metrics.errorDetails),
          })
          .run();

        if (sessionId !== null) {
          const session = tx.select().from(sessions).where(eq(sessions.id, sessionId)).get();
          if (session) {
            tx.update(sessions)
              .set({ totalFramesProcessed: session.totalFramesProcessed + 1 })
              .where(eq(sessions.id, sessionId))
              .run();
          }
        }
      }),
    );
  }

  getSession(sessionId: number): SessionInfo | null {
    return withDatabase(this.dbPath, (db) => db.select().from(sessions).where(eq(sessions.id, sessionId)).get() ?? null);
  }

  getSessionStats(sessionId: number): SessionStats | null {
    const since = this.now() - HOUR_MS;

    return withDatabase(this.dbPath, (db) => {
      const session = db.select().from(sessions).where(eq(sessions.id, sessionId)).get();
      if (!session) return null;

      const states = db
        .select({ value: count() })
        .from(gameStates)
        .innerJoin(hands, eq(gameStates.handRowId, hands.id))
        .where(eq(hands.sessionId, sessionId))
        .get();

      const metrics = db
        .select({
          detection: avg(visionMetrics.detectionConfidence).mapWith(Number),
          text: avg(visionMetrics.textConfidence).mapWith(Number),
          frameRate: avg(visionMetrics.frameRate).mapWith(Number),
          processing: avg(visionMetrics.processingTimeMs).mapWith(Number),
          total: count(),
        })
        .from(visionMetrics)
        .where(and(eq(visionMetrics.sessionId, sessionId), gte(visionMetrics.timestamp, since)))
        .get();

      return {
        session,
        handsPlayed: countHands(db, sessionId),
        gameStatesRecorded: states?.value ?? 0,
        averageDetectionConfidence: metrics?.detection || 0,
        averageTextConfidence: metrics?.text || 0,
        averageFrameRate: metrics?.frameRate || 0,
        averageProcessingTimeMs: metrics?.processing || 0,
        recentMetricsCount: metrics?.total ?? 0,
      };
    });
  }

  /** Newest first. */
  getRecentGameStates(sessionId: number, limit = 10): StoredGameState[] {
    return withDatabase(this.dbPath, (db) => {
      const rows = db
        .select({ state: gameStates, handNumber: hands.handNumber })
        .from(gameStates)
        .innerJoin(hands, eq(gameStates.handRowId, hands.id))
        .where(eq(hands.sessionId, sessionId))
        .orderBy(desc(gameStates.timestamp), desc(gameStates.id))
        .limit(limit)
        .all();
      return loadStates(db, rows);
    });
  }

  /** Write every state and metric of a session to a JSON file. Returns the file path. */
  exportSession(sessionId: number, outPath: string): string {
    const document = withDatabase(this.dbPath, (db) => {
      const rows = db
        .select({ state: gameStates, handNumber: hands.handNumber })
        .from(gameStates)
        .innerJoin(hands, eq(gameStates.handRowId, hands.id))
        .where(eq(hands.sessionId, sessionId))
        .orderBy(asc(gameStates.timestamp), asc(gameStates.id))
        .all();

      const metrics = db
        .select()
        .from(visionMetrics)
        .where(eq(visionMetrics.sessionId, sessionId))
        .orderBy(asc(visionMetrics.timestamp))
        .all();

      const states = loadStates(db, rows);
      return {
        session_id: sessionId,
        export_timestamp: new Date(this.now()).toISOString(),
        total_states: states.length,
        game_states: states.map(({ handNumber, state }) => ({ hand_number: handNumber, ...toGameStateJson(state) })),
        vision_metrics: metrics.map((row) =>
          toVisionMetricsJson({
            timestamp: row.timestamp,
            processingTimeMs: row.processingTimeMs,
            frameRate: row.frameRate,
            detectionConfidence: row.detectionConfidence,
            textConfidence: row.textConfidence,
            elementsDetected: row.elementsDetected,
            elementsFailed: row.elementsFailed,
            errorDetails: parseStringArray(row.errorDetailsJson),
          }),
        ),
      };
    });

    mkdirSync(dirname(outPath), { recursive: true });
    writeFileSync(outPath, JSON.stringify(document, null, 2));
    this.logger.info(`Session data exported to ${outPath}`);
    return outPath;
  }

  /**
   * Delete metrics older than `days`, and the hands, states and players of
   * sessions that started before then. Returns the number of game states removed.
   */
  cleanupOldData(days = 30): number {
    const cutoff = this.now() - days * DAY_MS;

    const removed = withDatabase(this.dbPath, (db) =>
      db.transaction((tx) => {
        tx.delete(visionMetrics).where(lt(visionMetrics.timestamp, cutoff)).run();

        const oldSessions = tx.select({ id: sessions.id }).from(sessions).where(lt(sessions.startTime, cutoff)).all();
        if (oldSessions.length === 0) return 0;

        const oldHands = tx
          .select({ id: hands.id })
          .from(hands)
          .where(inArray(hands.sessionId, oldSessions.map((s) => s.id)))
          .all()
          .map((h) => h.id);
        if (oldHands.length === 0) return 0;

        const oldStates = tx
          .select({ id: gameStates.id })
          .from(gameStates)
          .where(inArray(gameStates.handRowId, oldHands))
          .all()
          .map((s) => s.id);

        if (oldStates.length > 0) {
          tx.delete(playerStates).where(inArray(playerStates.gameStateId, oldStates)).run();
          tx.delete(gameStates).where(inArray(gameStates.id, oldStates)).run();
        }
        tx.delete(hands).where(inArray(hands.id, oldHands)).run();
        return oldStates.length;
      }),
    );

    this.logger.info(`Cleaned up ${removed} game states older than ${days} days`);
    return removed;
  }
}

type Executor = Pick<TableVisionDatabase, "select">;

function countHands(db: Executor, sessionId: number): number {
  return db.select({ value: count() }).from(hands).where(eq(hands.sessionId, sessionId)).get()?.value ?? 0;
}

function loadStates(db: TableVisionDatabase, rows: { state: GameStateRow; handNumber: number }[]): StoredGameState[] {
  if (rows.length === 0) return [];

  const players = db
    .select()
    .from(playerStates)
    .where(inArray(playerStates.gameStateId, rows.map((row) => row.state.id)))
    .all();

  const byState = new Map<number, PlayerStateRow[]>();
  for (const player of players) {
    const list = byState.get(player.gameStateId) ?? [];
    list.push(player);
    byState.set(player.gameStateId, list);
  }

  return rows.map(({ state, handNumber }) => ({
    id: state.id,
    handNumber,
    state: parseGameStateJson({
      timestamp: new Date(state.timestamp).toISOString(),
      hand_id: state.handId,
      phase: state.phase,
      pot_size: state.potSize,
      community_cards: JSON.parse(state.communityCardsJson),
      players: (byState.get(state.id) ?? []).map((player) => ({
        position: player.position,
        name: player.name,
        stack_size: player.stackSize,
        hole_cards: JSON.parse(player.holeCardsJson),
        current_bet: player.currentBet,
        is_active: player.isActive,
        is_current: player.isCurrent,
      })),
      timer_remaining: state.timerRemaining,
      available_actions: JSON.parse(state.availableActionsJson),
      betting_options: JSON.parse(state.bettingOptionsJson),
    }),
  }));
}

function parseStringArray(json: string): string[] {
  const parsed: unknown = JSON.parse(json);
  return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === "string") : [];
}
