import { describe, it, expect, vi } from "vitest";
import {
  dailyCheckin,
  habitMissed,
  logReminder,
  progressStalled,
  reEngagement,
} from "../../src/detection/rules.js";
import { TimingDetector, detectTimings, mergeCandidates } from "../../src/detection/detector.js";
import type { ActivitySource, HeuristicDetector } from "../../src/detection/types.js";
import { StaticActivitySource } from "../../src/integrations/local.js";
import { DetectionError } from "../../src/coaching/errors.js";
import { makeConfig, makeSnapshot, makeTiming, silentLogger, NOON_UTC } from "../helpers/fixtures.js";

const DAY = 86_400_000;
const config = makeConfig().detection;
const ctx = { now: NOON_UTC, config };

describe("timing rules", () => {
  it("checks in when the user has not talked to the coach today", () => {
    expect(dailyCheckin.evaluate(makeSnapshot(), ctx)).toEqual([{
      type: "daily_checkin",
      userId: "user-1",
      priority: "MEDIUM",
      confidence: 0.9,
      metadata: { subject_id: "2025-03-12" },
    }]);
  });

  it("skips the check-in after a conversation today or outside the active window", () => {
    expect(dailyCheckin.evaluate(makeSnapshot({ lastConversationAt: NOON_UTC - 3_600_000 }), ctx)).toEqual([]);
    expect(dailyCheckin.evaluate(makeSnapshot({ activeWindow: { startHour: 18, endHour: 22 } }), ctx)).toEqual([]);
  });

  it("escalates a missed habit after enough days", () => {
    const snapshot = makeSnapshot({
      habits: [
        { id: "h-water", name: "water", consecutiveMissedDays: 1 },
        { id: "h-walk", name: "walk", consecutiveMissedDays: 2 },
        { id: "h-stretch", name: "stretching", consecutiveMissedDays: 3 },
      ],
    });
    const timings = habitMissed.evaluate(snapshot, ctx);

    expect(timings.map((t) => [t.metadata["habit_id"], t.priority])).toEqual([
      ["h-walk", "MEDIUM"],
      ["h-stretch", "HIGH"],
    ]);
    expect(timings[0]?.confidence).toBeCloseTo(0.8);
    expect(timings[1]?.metadata).toEqual({
      subject_id: "h-stretch",
      habit_id: "h-stretch",
      habit_name: "stretching",
      missed_days: 3,
    });
  });

  it("flags stalled progress and dormant users", () => {
    const snapshot = makeSnapshot({
      lastProgressAt: NOON_UTC - 4 * DAY,
      lastActivityAt: NOON_UTC - 8 * DAY,
    });
    expect(progressStalled.evaluate(snapshot, ctx)[0]?.metadata).toEqual({ days_since_progress: 4 });
    expect(reEngagement.evaluate(snapshot, ctx)[0]?.metadata).toEqual({ days_inactive: 8 });
    expect(progressStalled.evaluate(makeSnapshot({ lastProgressAt: NOON_UTC - 2 * DAY }), ctx)).toEqual([]);
  });

  it("reminds to log only in the evening and only once nothing was logged", () => {
    const evening = { now: Date.UTC(2025, 2, 12, 20, 30), config };
    expect(logReminder.evaluate(makeSnapshot(), ctx)).toEqual([]);
    expect(logReminder.evaluate(makeSnapshot(), evening)[0]?.metadata).toEqual({ subject_id: "2025-03-12" });
    expect(logReminder.evaluate(makeSnapshot({ lastLogAt: Date.UTC(2025, 2, 12, 8) }), evening)).toEqual([]);
  });
});

describe("mergeCandidates", () => {
  it("keeps the best candidate per type, ranked by priority then confidence", () => {
    const merged = mergeCandidates([
      makeTiming({ type: "progress_stalled", priority: "LOW", confidence: 0.7 }),
      makeTiming({ type: "habit_missed", priority: "MEDIUM", confidence: 0.8 }),
      makeTiming({ type: "habit_missed", priority: "HIGH", confidence: 0.6 }),
      makeTiming({ type: "daily_checkin", priority: "MEDIUM", confidence: 0.9 }),
    ], 2);
    expect(merged.map((t) => [t.type, t.priority])).toEqual([
      ["habit_missed", "HIGH"],
      ["daily_checkin", "MEDIUM"],
    ]);
  });
});

describe("detectTimings", () => {
  it("caps the candidates per user", async () => {
    const snapshot = makeSnapshot({
      habits: [{ id: "h", name: "walk", consecutiveMissedDays: 3 }],
      lastProgressAt: NOON_UTC - 4 * DAY,
      lastActivityAt: NOON_UTC - 8 * DAY,
    });
    const batch = await detectTimings([snapshot], { config, logger: silentLogger(), now: NOON_UTC });
    expect(batch.failures).toEqual([]);
    expect(batch.detections[0]?.timings.map((t) => t.type)).toEqual([
      "habit_missed",
      "daily_checkin",
      "progress_stalled",
    ]);
  });

  it("adds confident heuristic candidates under the snapshot's user", async () => {
    const heuristic: HeuristicDetector = {
      detect: vi.fn().mockResolvedValue([
        makeTiming({ type: "sleep_dip", userId: "someone-else", priority: "LOW", confidence: 0.7 }),
        makeTiming({ type: "hunch", priority: "HIGH", confidence: 0.3 }),
      ]),
    };
    const batch = await detectTimings([makeSnapshot()], {
      config,
      logger: silentLogger(),
      now: NOON_UTC,
      heuristic,
    });
    const timings = batch.detections[0]?.timings ?? [];
    expect(timings.map((t) => [t.type, t.userId])).toEqual([
      ["daily_checkin", "user-1"],
      ["sleep_dip", "user-1"],
    ]);
  });

  it("isolates a failing user from the rest of the batch", async () => {
    const heuristic: HeuristicDetector = {
      detect: async (snapshot) => {
        if (snapshot.userId === "user-bad") throw new Error("model offline");
        return [];
      },
    };
    const batch = await detectTimings(
      [makeSnapshot({ userId: "user-bad" }), makeSnapshot({ userId: "user-good" })],
      { config, logger: silentLogger(), now: NOON_UTC, heuristic },
    );
    expect(batch.detections.map((d) => d.snapshot.userId)).toEqual(["user-good"]);
    expect(batch.failures).toHaveLength(1);
    expect(batch.failures[0]).toBeInstanceOf(DetectionError);
    expect(batch.failures[0]?.userId).toBe("user-bad");
    expect(batch.failures[0]?.message).toBe("Timing detection failed for user user-bad: model offline");
  });
});

describe("TimingDetector", () => {
  it("lists active users up to the batch limit", async () => {
    const source = new StaticActivitySource([
      makeSnapshot({ userId: "a" }),
      makeSnapshot({ userId: "b" }),
    ]);
    const detector = new TimingDetector({
      source,
      config: { ...config, batchLimit: 1 },
      logger: silentLogger(),
    });
    expect(await detector.listActiveUsers()).toEqual(["a"]);
  });

  it("reports users whose snapshot could not be fetched", async () => {
    const source: ActivitySource = {
      listActiveUsers: async () => ["a", "b"],
      getSnapshot: async (userId) => {
        if (userId === "b") throw new Error("404");
        return makeSnapshot({ userId });
      },
    };
    const detector = new TimingDetector({ source, config, logger: silentLogger() });
    const batch = await detector.detectBatch(["a", "b"], NOON_UTC);
    expect(batch.detections.map((d) => d.snapshot.userId)).toEqual(["a"]);
    expect(batch.failures.map((f) => f.userId)).toEqual(["b"]);
  });
});
