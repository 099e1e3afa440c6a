import { randomUUID } from "node:crypto";
import Database from "better-sqlite3";
import { z } from "zod";
import type { CoachingDB } from "../store/db.js";
import {
  IN_FLIGHT_STATES,
  PRIORITIES,
  PROMPT_STATES,
  CHANNELS,
  subjectKeyOf,
  type Channel,
  type Prompt,
  type PromptContent,
  type PromptState,
  type PromptTiming,
} from "../coaching/types.js";

const ALLOWED_TRANSITIONS: Record<PromptState, readonly PromptState[]> = {
  pending: ["queued", "expired", "failed"],
  queued: ["delivering", "expired", "failed"],
  delivering: ["delivered", "queued", "failed"],
  delivered: ["responded", "expired"],
  responded: [],
  expired: [],
  failed: [],
};

export function canTransition(from: PromptState, to: PromptState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/** States an operator may cancel from. A prompt mid-attempt must settle first. */
export const CANCELLABLE_STATES: readonly PromptState[] = ["pending", "queued", "delivered"];
const CANCEL_ATTEMPTS = 3;

export interface CancelledPrompt {
  readonly prompt: Prompt;
  readonly from: PromptState;
}

/**
 * Move a prompt to EXPIRED with `lastError = "cancelled"`, retrying the
 * compare-and-swap when a concurrent writer bumped the version.
 */
export function cancelPrompt(store: PromptStore, promptId: string): CancelledPrompt | null {
  for (let i = 0; i < CANCEL_ATTEMPTS; i++) {
    const current = store.get(promptId);
    if (!current || !CANCELLABLE_STATES.includes(current.state)) return null;
    const prompt = store.transition(current.id, current.state, "expired", { lastError: "cancelled" });
    if (prompt) return { prompt, from: current.state };
  }
  return null;
}

export interface CreatePromptParams {
  readonly timing: PromptTiming;
  readonly content: PromptContent;
  readonly state: Extract<PromptState, "pending" | "failed">;
  readonly ttlSeconds: number;
  readonly lastError?: string | null;
  /** Earliest delivery time; omitted means deliverable now. */
  readonly notBefore?: number;
  readonly now: number;
}

/** Fields a transition may set. Anything omitted keeps its stored value. */
export interface TransitionPatch {
  readonly channel?: Channel;
  readonly retryCount?: number;
  readonly nextAttemptAt?: number | null;
  readonly lastError?: string | null;
  readonly scheduledFor?: number;
  readonly deliveredAt?: number;
  readonly acknowledgedAt?: number;
  readonly respondedAt?: number;
  readonly responseValue?: string;
  readonly responseAction?: string;
}

export interface InteractionParams {
  readonly promptId: string;
  readonly userId: string;
  readonly value: string;
  readonly action: string;
  readonly result: string | null;
  readonly clientTimestamp: number | null;
  readonly recordedAt: number;
}

export interface EngagementSample {
  readonly delivered: number;
  readonly responded: number;
}

interface PromptRow {
  id: string;
  user_id: string;
  timing_type: string;
  priority: string;
  state: string;
  title: string;
  message: string;
  quick_replies: string;
  channel: string | null;
  subject_key: string;
  metadata: string;
  retry_count: number;
  next_attempt_at: number | null;
  last_error: string | null;
  created_at: number;
  expires_at: number;
  scheduled_for: number | null;
  delivered_at: number | null;
  acknowledged_at: number | null;
  responded_at: number | null;
  response_value: string | null;
  response_action: string | null;
  parked_at: number | null;
  version: number;
}

const quickRepliesSchema = z.array(
  z.object({
    text: z.string(),
    value: z.string(),
    nextStep: z.string().nullable().optional(),
  }),
);
const metadataSchema = z.record(z.string(), z.unknown());
const prioritySchema = z.enum(PRIORITIES);
const stateSchema = z.enum(PROMPT_STATES);
const channelSchema = z.enum(CHANNELS);

const IN_FLIGHT_SQL = `(${IN_FLIGHT_STATES.map((s) => `'${s}'`).join(",")})`;

export class PromptStore {
  private readonly db;

  constructor(coachingDb: CoachingDB) {
    this.db = coachingDb.raw();
  }

  // ── Creation ──

  /**
   * Persist a new prompt. Returns null when an in-flight prompt already
   * exists for the same (user, timing type, subject).
   */
  create(params: CreatePromptParams): Prompt | null {
    const id = randomUUID();
    const { timing, content, now } = params;
    try {
      this.db
        .prepare(
          `INSERT INTO coaching_prompts
           (id, user_id, timing_type, priority, state, title, message, quick_replies,
            subject_key, metadata, last_error, created_at, expires_at, scheduled_for, next_attempt_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          id,
          timing.userId,
          timing.type,
          timing.priority,
          params.state,
          content.title,
          content.message,
          JSON.stringify(content.quickReplies),
          subjectKeyOf(timing.metadata),
          JSON.stringify(timing.metadata),
          params.lastError ?? null,
          now,
          now + params.ttlSeconds * 1000,
          params.state === "pending" ? Math.max(now, params.notBefore ?? now) : null,
          params.state === "pending" ? params.notBefore ?? null : null,
        );
    } catch (err) {
      if (err instanceof Database.SqliteError && err.code === "SQLITE_CONSTRAINT_UNIQUE") {
        return null;
      }
      throw err;
    }
    return this.get(id);
  }

  get(id: string): Prompt | null {
    const row = this.db
      .prepare("SELECT * FROM coaching_prompts WHERE id = ?")
      .get(id) as PromptRow | undefined;
    return row ? this.toPrompt(row) : null;
  }

  hasInFlight(userId: string, timingType: string, subjectKey: string): boolean {
    const row = this.db
      .prepare(
        `SELECT 1 FROM coaching_prompts
         WHERE user_id = ? AND timing_type = ? AND subject_key = ? AND state IN ${IN_FLIGHT_SQL}
         LIMIT 1`,
      )
      .get(userId, timingType, subjectKey);
    return row !== undefined;
  }

  // ── State transitions ──

  /**
   * Compare-and-swap transition. Succeeds only if the prompt is still in
   * `from` at the version read here; returns null if another writer got
   * there first.
   */
  transition(id: string, from: PromptState, to: PromptState, patch: TransitionPatch = {}): Prompt | null {
    if (!canTransition(from, to)) {
      throw new Error(`Illegal prompt transition ${from} -> ${to}`);
    }

    const current = this.get(id);
    if (!current || current.state !== from) return null;

    const scheduledFor = patch.scheduledFor ?? current.scheduledFor;
    const deliveredAt = patch.deliveredAt === undefined
      ? current.deliveredAt
      : Math.max(patch.deliveredAt, scheduledFor ?? patch.deliveredAt);
    const respondedAt = patch.respondedAt === undefined
      ? current.respondedAt
      : Math.max(patch.respondedAt, deliveredAt ?? patch.respondedAt);

    const result = this.db
      .prepare(
        `UPDATE coaching_prompts SET
           state = ?, channel = ?, retry_count = ?, next_attempt_at = ?, last_error = ?,
           scheduled_for = ?, delivered_at = ?, acknowledged_at = ?, responded_at = ?,
           response_value = ?, response_action = ?, parked_at = NULL, version = version + 1
         WHERE id = ? AND state = ? AND version = ?`,
      )
      .run(
        to,
        current.channel ?? patch.channel ?? null,
        patch.retryCount ?? current.retryCount,
        patch.nextAttemptAt === undefined ? current.nextAttemptAt : patch.nextAttemptAt,
        patch.lastError === undefined ? current.lastError : patch.lastError,
        scheduledFor,
        deliveredAt,
        patch.acknowledgedAt ?? current.acknowledgedAt,
        respondedAt,
        patch.responseValue ?? current.responseValue,
        patch.responseAction ?? current.responseAction,
        id,
        from,
        current.version,
      );

    return result.changes > 0 ? this.get(id) : null;
  }

  // ── Queries for the dispatcher ──

  /**
   * Pending or queued prompts whose retry back-off has elapsed and that have
   * not expired. Parked prompts wait for a connection, not the clock.
   */
  listDue(now: number, limit: number): Prompt[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM coaching_prompts
         WHERE state IN ('pending','queued')
           AND parked_at IS NULL
           AND (next_attempt_at IS NULL OR next_attempt_at <= ?)
           AND expires_at > ?
         ORDER BY created_at ASC LIMIT ?`,
      )
      .all(now, now, limit) as PromptRow[];
    return rows.map((r) => this.toPrompt(r));
  }

  /** Hold a queued prompt back from the pump until `releaseParked`. */
  markParked(id: string, at: number): boolean {
    const result = this.db
      .prepare("UPDATE coaching_prompts SET parked_at = ? WHERE id = ? AND state = 'queued'")
      .run(at, id);
    return result.changes > 0;
  }

  /** Un-park every queued prompt of the user and return them, oldest first. */
  releaseParked(userId: string): Prompt[] {
    const release = this.db.transaction((uid: string) => {
      const rows = this.db
        .prepare(
          `SELECT * FROM coaching_prompts
           WHERE user_id = ? AND state = 'queued' AND parked_at IS NOT NULL
           ORDER BY created_at ASC`,
        )
        .all(uid) as PromptRow[];
      this.db
        .prepare("UPDATE coaching_prompts SET parked_at = NULL WHERE user_id = ? AND state = 'queued'")
        .run(uid);
      return rows;
    });
    return release(userId).map((r) => this.toPrompt(r));
  }

  /** Drop every park marker, so the pump re-offers those prompts. */
  clearParked(): number {
    return this.db
      .prepare("UPDATE coaching_prompts SET parked_at = NULL WHERE parked_at IS NOT NULL")
      .run().changes;
  }

  /** Push a queued prompt's next attempt out to `at`. */
  reschedule(id: string, at: number): boolean {
    const result = this.db
      .prepare(
        `UPDATE coaching_prompts SET next_attempt_at = ?, version = version + 1
         WHERE id = ? AND state = 'queued'`,
      )
      .run(at, id);
    return result.changes > 0;
  }

  listExpirable(now: number, limit = 500): Prompt[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM coaching_prompts
         WHERE state IN ('pending','queued') AND expires_at <= ?
         ORDER BY expires_at ASC LIMIT ?`,
      )
      .all(now, limit) as PromptRow[];
    return rows.map((r) => this.toPrompt(r));
  }

  /**
   * Prompts stuck in `delivering`, e.g. after a crash mid-attempt. An attempt
   * stamps `next_attempt_at` with its start time.
   */
  listDelivering(startedBefore: number): Prompt[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM coaching_prompts
         WHERE state = 'delivering' AND COALESCE(next_attempt_at, created_at) <= ?`,
      )
      .all(startedBefore) as PromptRow[];
    return rows.map((r) => this.toPrompt(r));
  }

  /** Delivered prompts whose reply window has closed without an answer. */
  listUnansweredExpired(now: number, limit = 500): Prompt[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM coaching_prompts
         WHERE state = 'delivered' AND expires_at <= ?
         ORDER BY expires_at ASC LIMIT ?`,
      )
      .all(now, limit) as PromptRow[];
    return rows.map((r) => this.toPrompt(r));
  }

  /** Delivered in-app prompts the user has not answered yet, oldest first. */
  listAwaitingReply(userId: string, now: number): Prompt[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM coaching_prompts
         WHERE user_id = ? AND state = 'delivered' AND channel = 'in_app' AND expires_at > ?
         ORDER BY delivered_at ASC`,
      )
      .all(userId, now) as PromptRow[];
    return rows.map((r) => this.toPrompt(r));
  }

  listForUser(userId: string, states?: readonly PromptState[], limit = 50): Prompt[] {
    const filter = states && states.length > 0
      ? `AND state IN (${states.map(() => "?").join(",")})`
      : "";
    const rows = this.db
      .prepare(
        `SELECT * FROM coaching_prompts
         WHERE user_id = ? ${filter}
         ORDER BY created_at DESC LIMIT ?`,
      )
      .all(userId, ...(states ?? []), limit) as PromptRow[];
    return rows.map((r) => this.toPrompt(r));
  }

  countByState(): Record<PromptState, number> {
    const rows = this.db
      .prepare("SELECT state, COUNT(*) AS cnt FROM coaching_prompts GROUP BY state")
      .all() as Array<{ state: string; cnt: number }>;
    const counts: Record<PromptState, number> = {
      pending: 0,
      queued: 0,
      delivering: 0,
      delivered: 0,
      responded: 0,
      expired: 0,
      failed: 0,
    };
    for (const row of rows) {
      counts[stateSchema.parse(row.state)] = row.cnt;
    }
    return counts;
  }

  // ── Queries for the frequency controller ──

  /** In-flight prompts plus anything delivered since `since`. */
  countDeliveredOrQueued(userId: string, since: number): number {
    const row = this.db
      .prepare(
        `SELECT COUNT(*) AS cnt FROM coaching_prompts
         WHERE user_id = ?
           AND (state IN ${IN_FLIGHT_SQL} OR (delivered_at IS NOT NULL AND delivered_at >= ?))`,
      )
      .get(userId, since) as { cnt: number };
    return row.cnt;
  }

  /**
   * Anchor for spacing prompts apart: the latest delivery, or the planned
   * send time of a prompt still in flight, whichever is later.
   */
  lastScheduledAt(userId: string): number | null {
    const row = this.db
      .prepare(
        `SELECT MAX(t) AS last FROM (
           SELECT delivered_at AS t FROM coaching_prompts
           WHERE user_id = ? AND delivered_at IS NOT NULL
           UNION ALL
           SELECT COALESCE(scheduled_for, created_at) AS t FROM coaching_prompts
           WHERE user_id = ? AND state IN ${IN_FLIGHT_SQL}
         )`,
      )
      .get(userId, userId) as { last: number | null };
    return row.last;
  }

  /** Response rate over the user's last `window` delivered prompts. */
  engagementSample(userId: string, window: number): EngagementSample {
    const row = this.db
      .prepare(
        `SELECT COUNT(*) AS delivered,
                COALESCE(SUM(CASE WHEN state = 'responded' THEN 1 ELSE 0 END), 0) AS responded
         FROM (
           SELECT state FROM coaching_prompts
           WHERE user_id = ? AND delivered_at IS NOT NULL
           ORDER BY delivered_at DESC LIMIT ?
         )`,
      )
      .get(userId, window) as { delivered: number; responded: number };
    return { delivered: row.delivered, responded: row.responded };
  }

  /** Creation time of the latest non-failed prompt of this type for the user. */
  lastProducedAt(userId: string, timingType: string): number | null {
    const row = this.db
      .prepare(
        `SELECT MAX(created_at) AS last FROM coaching_prompts
         WHERE user_id = ? AND timing_type = ? AND state != 'failed'`,
      )
      .get(userId, timingType) as { last: number | null };
    return row.last;
  }

  // ── Interaction audit ──

  recordInteraction(params: InteractionParams): void {
    this.db
      .prepare(
        `INSERT INTO prompt_interactions
         (prompt_id, user_id, value, action, result, client_timestamp, recorded_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        params.promptId,
        params.userId,
        params.value,
        params.action,
        params.result,
        params.clientTimestamp,
        params.recordedAt,
      );
  }

  countInteractions(promptId: string): number {
    const row = this.db
      .prepare("SELECT COUNT(*) AS cnt FROM prompt_interactions WHERE prompt_id = ?")
      .get(promptId) as { cnt: number };
    return row.cnt;
  }

  // ── Row mapper ──

  private toPrompt(row: PromptRow): Prompt {
    return {
      id: row.id,
      userId: row.user_id,
      timingType: row.timing_type,
      priority: prioritySchema.parse(row.priority),
      state: stateSchema.parse(row.state),
      content: {
        title: row.title,
        message: row.message,
        quickReplies: quickRepliesSchema.parse(JSON.parse(row.quick_replies)),
      },
      channel: row.channel === null ? null : channelSchema.parse(row.channel),
      subjectKey: row.subject_key,
      metadata: metadataSchema.parse(JSON.parse(row.metadata)),
      retryCount: row.retry_count,
      nextAttemptAt: row.next_attempt_at,
      lastError: row.last_error,
      createdAt: row.created_at,
      expiresAt: row.expires_at,
      scheduledFor: row.scheduled_for,
      deliveredAt: row.delivered_at,
      acknowledgedAt: row.acknowledged_at,
      respondedAt: row.responded_at,
      responseValue: row.response_value,
      responseAction: row.response_action,
      version: row.version,
    };
  }
}
