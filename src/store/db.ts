import Database from "better-sqlite3";
import { join } from "node:path";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS coaching_prompts (
  id              TEXT PRIMARY KEY,
  user_id         TEXT NOT NULL,
  timing_type     TEXT NOT NULL,
  priority        TEXT NOT NULL CHECK(priority IN ('HIGH','MEDIUM','LOW')),
  state           TEXT NOT NULL CHECK(state IN ('pending','queued','delivering','delivered','responded','expired','failed')),
  title           TEXT NOT NULL DEFAULT '',
  message         TEXT NOT NULL DEFAULT '',
  quick_replies   TEXT NOT NULL DEFAULT '[]',
  channel         TEXT CHECK(channel IN ('in_app','push','email')),
  subject_key     TEXT NOT NULL DEFAULT '',
  metadata        TEXT NOT NULL DEFAULT '{}',
  retry_count     INTEGER NOT NULL DEFAULT 0,
  next_attempt_at INTEGER,
  last_error      TEXT,
  created_at      INTEGER NOT NULL,
  expires_at      INTEGER NOT NULL,
  scheduled_for   INTEGER,
  delivered_at    INTEGER,
  acknowledged_at INTEGER,
  responded_at    INTEGER,
  response_value  TEXT,
  response_action TEXT,
  parked_at       INTEGER,
  version         INTEGER NOT NULL DEFAULT 0
);
CREATE UNIQUE INDEX IF NOT EXISTS idx_prompts_in_flight_subject
  ON coaching_prompts(user_id, timing_type, subject_key)
  WHERE state IN ('pending','queued','delivering');
CREATE INDEX IF NOT EXISTS idx_prompts_due
  ON coaching_prompts(state, next_attempt_at);
CREATE INDEX IF NOT EXISTS idx_prompts_user_created
  ON coaching_prompts(user_id, created_at);
CREATE INDEX IF NOT EXISTS idx_prompts_user_delivered
  ON coaching_prompts(user_id, delivered_at);

CREATE TABLE IF NOT EXISTS prompt_interactions (
  id               INTEGER PRIMARY KEY AUTOINCREMENT,
  prompt_id        TEXT NOT NULL REFERENCES coaching_prompts(id),
  user_id          TEXT NOT NULL,
  value            TEXT NOT NULL,
  action           TEXT NOT NULL,
  result           TEXT,
  client_timestamp INTEGER,
  recorded_at      INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_interactions_prompt
  ON prompt_interactions(prompt_id);

CREATE TABLE IF NOT EXISTS notification_preferences (
  user_id              TEXT PRIMARY KEY,
  enabled              INTEGER NOT NULL DEFAULT 1,
  daily_max            INTEGER,
  hourly_max           INTEGER,
  min_interval_minutes REAL,
  quiet_enabled        INTEGER,
  quiet_start          TEXT,
  quiet_end            TEXT,
  timezone             TEXT,
  channels             TEXT,
  enabled_timing_types TEXT,
  updated_at           INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS connection_presence (
  connection_id TEXT PRIMARY KEY,
  user_id       TEXT NOT NULL,
  process_id    TEXT NOT NULL,
  created_at    INTEGER NOT NULL,
  last_seen     INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_presence_user
  ON connection_presence(user_id);
`;

export class CoachingDB {
  private db: Database.Database;

  constructor(stateDir: string) {
    this.db = new Database(join(stateDir, "pacer.db"));
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA_SQL);
    this.migrate();
  }

  /**
   * Forward-only migrations for existing databases.
   * Each migration is idempotent (checks before altering).
   */
  private migrate(): void {
    const columns = this.db
      .prepare("PRAGMA table_info(coaching_prompts)")
      .all() as Array<{ name: string }>;
    if (columns.length > 0 && !columns.some((c) => c.name === "acknowledged_at")) {
      this.db.exec("ALTER TABLE coaching_prompts ADD COLUMN acknowledged_at INTEGER");
    }
    if (columns.length > 0 && !columns.some((c) => c.name === "parked_at")) {
      this.db.exec("ALTER TABLE coaching_prompts ADD COLUMN parked_at INTEGER");
    }
  }

  raw(): Database.Database {
    return this.db;
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
