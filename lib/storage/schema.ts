import {
  index,
  integer,
  real,
  sqliteTable,
  text,
  uniqueIndex,
} from "drizzle-orm/sqlite-core";
import {
  ERROR_CATEGORIES,
  ERROR_SEVERITIES,
  RESOLUTION_STATUSES,
} from "@/lib/errors/types";
import { GAME_PHASES } from "@/lib/game-state/types";

// All timestamps are epoch milliseconds.

export const SESSIONS_TABLE = "sessions" as const;

export const SESSION_STATUSES = ["active", "completed"] as const;
export type SessionStatus = (typeof SESSION_STATUSES)[number];

export const sessions = sqliteTable(SESSIONS_TABLE, {
  id: integer("id").primaryKey({ autoIncrement: true }),
  startTime: integer("start_time").notNull(),
  endTime: integer("end_time"),
  totalHands: integer("total_hands").notNull().default(0),
  totalFramesProcessed: integer("total_frames_processed").notNull().default(0),
  status: text("status", { enum: SESSION_STATUSES }).notNull().default("active"),
});

export const HANDS_TABLE = "hands" as const;

export const hands = sqliteTable(
  HANDS_TABLE,
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    sessionId: integer("session_id")
      .notNull()
      .references(() => sessions.id),
    handNumber: integer("hand_number").notNull(),
    handId: text("hand_id").notNull(),
    startTime: integer("start_time").notNull(),
    lastSeen: integer("last_seen").notNull(),
    finalPot: integer("final_pot").notNull().default(0),
  },
  (table) => ({
    sessionIdx: index("idx_hands_session_id").on(table.sessionId),
    handIdIdx: uniqueIndex("idx_hands_session_hand_id").on(table.sessionId, table.handId),
  }),
);

export const GAME_STATES_TABLE = "game_states" as const;

export const gameStates = sqliteTable(
  GAME_STATES_TABLE,
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    handRowId: integer("hand_row_id")
      .notNull()
      .references(() => hands.id),
    handId: text("hand_id").notNull(),
    timestamp: integer("timestamp").notNull(),
    phase: text("phase", { enum: GAME_PHASES }).notNull(),
    potSize: integer("pot_size").notNull(),
    communityCardsJson: text("community_cards").notNull(),
    timerRemaining: integer("timer_remaining").notNull(),
    currentPlayerPosition: integer("current_player_position"),
    availableActionsJson: text("available_actions").notNull(),
    bettingOptionsJson: text("betting_options").notNull(),
  },
  (table) => ({
    handIdx: index("idx_game_states_hand_id").on(table.handRowId),
    timestampIdx: index("idx_game_states_timestamp").on(table.timestamp),
  }),
);

export const PLAYER_STATES_TABLE = "player_states" as const;

export const playerStates = sqliteTable(
  PLAYER_STATES_TABLE,
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    gameStateId: integer("game_state_id")
      .notNull()
      .references(() => gameStates.id),
    position: integer("position").notNull(),
    name: text("name").notNull(),
    stackSize: integer("stack_size").notNull(),
    holeCardsJson: text("hole_cards").notNull(),
    currentBet: integer("current_bet").notNull(),
    isActive: integer("is_active", { mode: "boolean" }).notNull(),
    isCurrent: integer("is_current", { mode: "boolean" }).notNull(),
  },
  (table) => ({
    gameStateIdx: index("idx_player_states_game_state_id").on(table.gameStateId),
  }),
);

export const VISION_METRICS_TABLE = "vision_metrics" as const;

export const visionMetrics = sqliteTable(
  VISION_METRICS_TABLE,
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    sessionId: integer("session_id").references(() => sessions.id),
    timestamp: integer("timestamp").notNull(),
    processingTimeMs: integer("processing_time_ms").notNull(),
    frameRate: real("frame_rate").notNull(),
    detectionConfidence: real("detection_confidence").notNull(),
    textConfidence: real("text_confidence").notNull(),
    elementsDetected: integer("elements_detected").notNull(),
    elementsFailed: integer("elements_failed").notNull(),
    errorDetailsJson: text("error_details").notNull(),
  },
  (table) => ({
    timestampIdx: index("idx_vision_metrics_timestamp").on(table.timestamp),
  }),
);

export const ERROR_LOGS_TABLE = "error_logs" as const;

export const errorLogs = sqliteTable(
  ERROR_LOGS_TABLE,
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    dedupKey: text("dedup_key").notNull(),
    timestamp: integer("timestamp").notNull(),
    severity: text("severity", { enum: ERROR_SEVERITIES }).notNull(),
    category: text("category", { enum: ERROR_CATEGORIES }).notNull(),
    component: text("component").notNull(),
    function: text("function").notNull(),
    message: text("message").notNull(),
    exceptionType: text("exception_type").notNull().default(""),
    stackTrace: text("stack_trace").notNull().default(""),
    contextJson: text("context_json").notNull().default("{}"),
    resolutionStatus: text("resolution_status", { enum: RESOLUTION_STATUSES })
      .notNull()
      .default("OPEN"),
    resolutionNotes: text("resolution_notes").notNull().default(""),
    occurrenceCount: integer("occurrence_count").notNull().default(1),
    firstSeen: integer("first_seen").notNull(),
    lastSeen: integer("last_seen").notNull(),
  },
  (table) => ({
    timestampIdx: index("idx_error_timestamp").on(table.timestamp),
    severityCategoryIdx: index("idx_error_severity_category").on(
      table.severity,
      table.category,
    ),
    componentIdx: index("idx_error_component").on(table.component, table.function),
    dedupIdx: index("idx_error_dedup_key").on(table.dedupKey),
  }),
);

export const schema = {
  sessions,
  hands,
  gameStates,
  playerStates,
  visionMetrics,
  errorLogs,
};

export type SessionRow = typeof sessions.$inferSelect;
export type HandRow = typeof hands.$inferSelect;
export type GameStateRow = typeof gameStates.$inferSelect;
export type NewGameStateRow = typeof gameStates.$inferInsert;
export type PlayerStateRow = typeof playerStates.$inferSelect;
export type VisionMetricsRow = typeof visionMetrics.$inferSelect;
export type ErrorLogRow = typeof errorLogs.$inferSelect;
export type NewErrorLogRow = typeof errorLogs.$inferInsert;
