import Database from "better-sqlite3";
import { type BetterSQLite3Database, drizzle } from "drizzle-orm/better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import {
  ERROR_LOGS_TABLE,
  GAME_STATES_TABLE,
  HANDS_TABLE,
  PLAYER_STATES_TABLE,
  SESSIONS_TABLE,
  VISION_METRICS_TABLE,
  schema,
} from "./schema";

export type TableVisionDatabase = BetterSQLite3Database<typeof schema>;

const DDL = `
  CREATE TABLE IF NOT EXISTS ${SESSIONS_TABLE} (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    start_time INTEGER NOT NULL,
    end_time INTEGER,
    total_hands INTEGER NOT NULL DEFAULT 0,
    total_frames_processed INTEGER NOT NULL DEFAULT 0,
    status TEXT NOT NULL DEFAULT 'active'
  );

  CREATE TABLE IF NOT EXISTS ${HANDS_TABLE} (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    session_id INTEGER NOT NULL REFERENCES ${SESSIONS_TABLE}(id),
    hand_number INTEGER NOT NULL,
    hand_id TEXT NOT NULL,
    start_time INTEGER NOT NULL,
    last_seen INTEGER NOT NULL,
    final_pot INTEGER NOT NULL DEFAULT 0
  );
  CREATE INDEX IF NOT EXISTS idx_hands_session_id ON ${HANDS_TABLE}(session_id);
  CREATE UNIQUE INDEX IF NOT EXISTS idx_hands_session_hand_id ON ${HANDS_TABLE}(session_id, hand_id);

  CREATE TABLE IF NOT EXISTS ${GAME_STATES_TABLE} (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    hand_row_id INTEGER NOT NULL REFERENCES ${HANDS_TABLE}(id),
    hand_id TEXT NOT NULL,
    timestamp INTEGER NOT NULL,
    phase TEXT NOT NULL,
    pot_size INTEGER NOT NULL,
    community_cards TEXT NOT NULL,
    timer_remaining INTEGER NOT NULL,
    current_player_position INTEGER,
    available_actions TEXT NOT NULL,
    betting_options TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_game_states_hand_id ON ${GAME_STATES_TABLE}(hand_row_id);
  CREATE INDEX IF NOT EXISTS idx_game_states_timestamp ON ${GAME_STATES_TABLE}(timestamp);

  CREATE TABLE IF NOT EXISTS ${PLAYER_STATES_TABLE} (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    game_state_id INTEGER NOT NULL REFERENCES ${GAME_STATES_TABLE}(id),
    position INTEGER NOT NULL,
    name TEXT NOT NULL,
    stack_size INTEGER NOT NULL,
    hole_cards TEXT NOT NULL,
    current_bet INTEGER NOT NULL,
    is_active INTEGER NOT NULL,
    is_current INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_player_states_game_state_id ON ${PLAYER_STATES_TABLE}(game_state_id);

  CREATE TABLE IF NOT EXISTS ${VISION_METRICS_TABLE} (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    session_id INTEGER REFERENCES ${SESSIONS_TABLE}(id),
    timestamp INTEGER NOT NULL,
    processing_time_ms INTEGER NOT NULL,
    frame_rate REAL NOT NULL,
    detection_confidence REAL NOT NULL,
    text_confidence REAL NOT NULL,
    elements_detected INTEGER NOT NULL,
    elements_failed INTEGER NOT NULL,
    error_details TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_vision_metrics_timestamp ON ${VISION_METRICS_TABLE}(timestamp);

  CREATE TABLE IF NOT EXISTS ${ERROR_LOGS_TABLE} (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    dedup_key TEXT NOT NULL,
    timestamp INTEGER NOT NULL,
    severity TEXT NOT NULL,
    category TEXT NOT NULL,
    component TEXT NOT NULL,
    function TEXT NOT NULL,
    message TEXT NOT NULL,
    exception_type TEXT NOT NULL DEFAULT '',
    stack_trace TEXT NOT NULL DEFAULT '',
    context_json TEXT NOT NULL DEFAULT '{}',
    resolution_status TEXT NOT NULL DEFAULT 'OPEN',
    resolution_notes TEXT NOT NULL DEFAULT '',
    occurrence_count INTEGER NOT NULL DEFAULT 1,
    first_seen INTEGER NOT NULL,
    last_seen INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_error_timestamp ON ${ERROR_LOGS_TABLE}(timestamp);
  CREATE INDEX IF NOT EXISTS idx_error_severity_category ON ${ERROR_LOGS_TABLE}(severity, category);
  CREATE INDEX IF NOT EXISTS idx_error_component ON ${ERROR_LOGS_TABLE}(component, function);
  CREATE INDEX IF NOT EXISTS idx_error_dedup_key ON ${ERROR_LOGS_TABLE}(dedup_key);
`;

/**
 * Run `fn` against a fresh connection to the database at `path` and close it
 * afterwards. Tables and indexes are created if missing.
 */
export function withDatabase<T>(path: string, fn: (db: TableVisionDatabase) => T): T {
  mkdirSync(dirname(path), { recursive: true });

  const sqlite = new Database(path);
  try {
    sqlite.pragma("journal_mode = WAL");
    sqlite.pragma("foreign_keys = ON");
    sqlite.exec(DDL);
    return fn(drizzle(sqlite, { schema }));
  } finally {
    sqlite.close();
  }
}
