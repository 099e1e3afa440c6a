import type { CoachingDB } from "../store/db.js";

export interface PresenceEntry {
  readonly connectionId: string;
  readonly userId: string;
  readonly processId: string;
  readonly createdAt: number;
  readonly lastSeen: number;
}

/** Cross-process view of which connection ids are live for which user. */
export interface PresenceStore {
  add(entry: Omit<PresenceEntry, "lastSeen">): void;
  touch(connectionId: string, at: number): void;
  remove(connectionId: string): void;
  connectionsFor(userId: string): string[];
  /** Drop rows not seen since `before`. Returns the removed entries. */
  pruneOlderThan(before: number): PresenceEntry[];
  removeProcess(processId: string): number;
}

interface PresenceRow {
  connection_id: string;
  user_id: string;
  process_id: string;
  created_at: number;
  last_seen: number;
}

function toEntry(row: PresenceRow): PresenceEntry {
  return {
    connectionId: row.connection_id,
    userId: row.user_id,
    processId: row.process_id,
    createdAt: row.created_at,
    lastSeen: row.last_seen,
  };
}

export class SqlitePresenceStore implements PresenceStore {
  private readonly db;

  constructor(coachingDb: CoachingDB) {
    this.db = coachingDb.raw();
  }

  add(entry: Omit<PresenceEntry, "lastSeen">): void {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO connection_presence
         (connection_id, user_id, process_id, created_at, last_seen)
         VALUES (?, ?, ?, ?, ?)`,
      )
      .run(entry.connectionId, entry.userId, entry.processId, entry.createdAt, entry.createdAt);
  }

  touch(connectionId: string, at: number): void {
    this.db
      .prepare("UPDATE connection_presence SET last_seen = ? WHERE connection_id = ? AND last_seen < ?")
      .run(at, connectionId, at);
  }

  remove(connectionId: string): void {
    this.db.prepare("DELETE FROM connection_presence WHERE connection_id = ?").run(connectionId);
  }

  connectionsFor(userId: string): string[] {
    const rows = this.db
      .prepare("SELECT connection_id FROM connection_presence WHERE user_id = ? ORDER BY created_at")
      .all(userId) as Array<{ connection_id: string }>;
    return rows.map((r) => r.connection_id);
  }

  pruneOlderThan(before: number): PresenceEntry[] {
    const prune = this.db.transaction((cutoff: number) => {
      const rows = this.db
        .prepare("SELECT * FROM connection_presence WHERE last_seen < ?")
        .all(cutoff) as PresenceRow[];
      this.db.prepare("DELETE FROM connection_presence WHERE last_seen < ?").run(cutoff);
      return rows.map(toEntry);
    });
    return prune(before);
  }

  removeProcess(processId: string): number {
    return this.db.prepare("DELETE FROM connection_presence WHERE process_id = ?").run(processId).changes;
  }
}
