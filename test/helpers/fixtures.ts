import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import pino from "pino";
import { parseConfig, type PacerConfig } from "../../src/config/schema.js";
import type { Logger } from "../../src/logging/logger.js";
import { CoachingDB } from "../../src/store/db.js";
import type { Clock } from "../../src/frequency/clock.js";
import type { Prompt, PromptContent, PromptTiming, UserNotificationPreference } from "../../src/coaching/types.js";
import type { UserActivitySnapshot } from "../../src/detection/types.js";
import type { ConnectionHandle } from "../../src/connections/registry.js";
import type { StreamEvent, StreamEventType } from "../../src/connections/events.js";

/** 2025-03-12T12:00:00Z, a Wednesday. */
export const NOON_UTC = Date.UTC(2025, 2, 12, 12, 0, 0);

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function makeConfig(raw: Record<string, unknown> = {}): PacerConfig {
  return parseConfig(raw);
}

export interface TempDb {
  dir: string;
  db: CoachingDB;
  cleanup(): void;
}

export function openTempDb(prefix = "pacer-test-"): TempDb {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  const db = new CoachingDB(dir);
  return {
    dir,
    db,
    cleanup() {
      db.close();
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

/** Manually advanced clock. */
export class FakeClock {
  constructor(public current: number = NOON_UTC) {}

  readonly now: Clock = () => this.current;

  advance(ms: number): number {
    this.current += ms;
    return this.current;
  }
}

export function makeTiming(overrides: Partial<PromptTiming> = {}): PromptTiming {
  return {
    type: "habit_missed",
    userId: "user-1",
    priority: "MEDIUM",
    confidence: 0.8,
    metadata: { subject_id: "habit-walk", habit_id: "habit-walk", habit_name: "a walk" },
    ...overrides,
  };
}

export function makeContent(overrides: Partial<PromptContent> = {}): PromptContent {
  return {
    title: "Keep it going",
    message: "Time for a walk?",
    quickReplies: [
      { text: "Done", value: "complete_now" },
      { text: "Later", value: "snooze", nextStep: "follow_up" },
    ],
    ...overrides,
  };
}

/** An in-memory prompt row, for code that takes a Prompt without reading the store. */
export function makePrompt(overrides: Partial<Prompt> = {}): Prompt {
  return {
    id: "prompt-1",
    userId: "user-1",
    timingType: "habit_missed",
    priority: "MEDIUM",
    state: "queued",
    content: makeContent(),
    channel: null,
    subjectKey: "habit-walk",
    metadata: { subject_id: "habit-walk", habit_id: "habit-walk", habit_name: "a walk" },
    retryCount: 0,
    nextAttemptAt: null,
    lastError: null,
    createdAt: NOON_UTC,
    expiresAt: NOON_UTC + 3_600_000,
    scheduledFor: NOON_UTC,
    deliveredAt: null,
    acknowledgedAt: null,
    respondedAt: null,
    responseValue: null,
    responseAction: null,
    version: 1,
    ...overrides,
  };
}

export function makePrefs(overrides: Partial<UserNotificationPreference> = {}): UserNotificationPreference {
  return {
    userId: "user-1",
    enabled: true,
    dailyMax: 5,
    hourlyMax: 2,
    minIntervalMinutes: 60,
    quietHours: { enabled: false, start: "22:00", end: "08:00" },
    timezone: "UTC",
    channels: { in_app: true, push: true, email: true },
    enabledTimingTypes: [],
    ...overrides,
  };
}

export function makeSnapshot(overrides: Partial<UserActivitySnapshot> = {}): UserActivitySnapshot {
  return {
    userId: "user-1",
    timezone: "UTC",
    lastConversationAt: null,
    activeWindow: null,
    habits: [],
    lastProgressAt: null,
    lastActivityAt: null,
    lastLogAt: null,
    ...overrides,
  };
}

/** Resolve once `check` holds, polling on the macrotask queue. */
export async function waitFor(check: () => boolean, timeoutMs = 2_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) throw new Error("waitFor timed out");
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

/** Connection handle that records what it was sent. */
export class FakeConnection implements ConnectionHandle {
  readonly sent: StreamEvent[] = [];
  closed = false;
  failWith: Error | null = null;
  /** Runs after each event lands, e.g. to acknowledge a prompt. */
  onEvent: ((event: StreamEvent) => void) | null = null;

  constructor(
    readonly id: string,
    readonly userId = "user-1",
  ) {}

  async send(event: StreamEvent): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.sent.push(event);
    this.onEvent?.(event);
  }

  close(): void {
    this.closed = true;
  }

  ofType(type: StreamEventType): StreamEvent[] {
    return this.sent.filter((e) => e.type === type);
  }
}
