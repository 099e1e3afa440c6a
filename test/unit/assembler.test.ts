import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { PromptAssembler, type PromptIntake } from "../../src/pipeline/assembler.js";
import { CoachingCycle } from "../../src/pipeline/coaching-cycle.js";
import { PromptStore } from "../../src/prompts/store.js";
import { PreferenceStore } from "../../src/preferences/store.js";
import { FrequencyController } from "../../src/frequency/controller.js";
import { TimingDetector } from "../../src/detection/detector.js";
import { StaticActivitySource } from "../../src/integrations/local.js";
import { TemplateContentSynthesizer } from "../../src/synthesis/template-synthesizer.js";
import type { ContentSynthesizer } from "../../src/synthesis/types.js";
import type { Prompt } from "../../src/coaching/types.js";
import {
  openTempDb,
  makeConfig,
  makeTiming,
  makeContent,
  makeSnapshot,
  silentLogger,
  FakeClock,
  NOON_UTC,
  type TempDb,
} from "../helpers/fixtures.js";

class RecordingIntake implements PromptIntake {
  readonly received: Prompt[] = [];

  enqueue(prompt: Prompt): boolean {
    this.received.push(prompt);
    return true;
  }
}

describe("PromptAssembler", () => {
  let tmp: TempDb;
  let store: PromptStore;
  let intake: RecordingIntake;
  let clock: FakeClock;

  beforeEach(() => {
    tmp = openTempDb("pacer-assembler-");
    store = new PromptStore(tmp.db);
    intake = new RecordingIntake();
    clock = new FakeClock(NOON_UTC);
  });

  afterEach(() => {
    tmp.cleanup();
  });

  function assembler(synthesizer: ContentSynthesizer, synthesisTimeoutMs = 1_000): PromptAssembler {
    return new PromptAssembler({
      store,
      synthesizer,
      intake,
      logger: silentLogger(),
      synthesisTimeoutMs,
      defaultTtlSeconds: 86_400,
      clock: clock.now,
    });
  }

  it("persists synthesized content and hands the prompt to delivery", async () => {
    const synthesize = vi.fn().mockResolvedValue({ content: makeContent(), ttlSeconds: 600 });
    const outcome = await assembler({ synthesize }).assemble(makeTiming(), { streak: 4 });

    expect(outcome.kind).toBe("queued");
    if (outcome.kind !== "queued") return;
    expect(outcome.prompt.state).toBe("pending");
    expect(outcome.prompt.content.title).toBe("Keep it going");
    expect(outcome.prompt.expiresAt).toBe(NOON_UTC + 600_000);
    expect(intake.received.map((p) => p.id)).toEqual([outcome.prompt.id]);
    expect(synthesize.mock.calls[0]?.[1]).toEqual({ streak: 4 });
  });

  it("uses the default lifetime when the synthesizer names none", async () => {
    const outcome = await assembler(new TemplateContentSynthesizer()).assemble(makeTiming(), {});
    expect(outcome.kind === "queued" && outcome.prompt.expiresAt).toBe(NOON_UTC + 86_400_000);
  });

  it("records a FAILED prompt when synthesis fails", async () => {
    const outcome = await assembler(new TemplateContentSynthesizer()).assemble(
      makeTiming({ type: "unknown_type" }),
      {},
    );

    expect(outcome.kind).toBe("failed");
    if (outcome.kind !== "failed") return;
    expect(outcome.error).toBe('No template for timing type "unknown_type"');
    expect(outcome.prompt.state).toBe("failed");
    expect(outcome.prompt.content).toEqual({ title: "", message: "", quickReplies: [] });
    expect(outcome.prompt.lastError).toBe('No template for timing type "unknown_type"');
    expect(intake.received).toEqual([]);
  });

  it("gives up on a synthesizer that does not answer in time", async () => {
    const hanging: ContentSynthesizer = { synthesize: () => new Promise<never>(() => {}) };
    const outcome = await assembler(hanging, 20).assemble(makeTiming(), {});
    expect(outcome.kind === "failed" && outcome.error).toBe("content synthesis timed out after 20ms");
  });

  it("skips synthesis when the subject already has a prompt in flight", async () => {
    const synth = new TemplateContentSynthesizer();
    await assembler(synth).assemble(makeTiming(), {});

    const synthesize = vi.fn();
    const outcome = await assembler({ synthesize }).assemble(makeTiming(), {});
    expect(outcome).toEqual({ kind: "duplicate" });
    expect(synthesize).not.toHaveBeenCalled();
  });

  it("holds deferred prompts back from delivery", async () => {
    const outcome = await assembler(new TemplateContentSynthesizer()).assemble(makeTiming(), {}, {
      notBefore: NOON_UTC + 3_600_000,
    });
    expect(outcome.kind === "queued" && outcome.prompt.scheduledFor).toBe(NOON_UTC + 3_600_000);
    expect(intake.received).toEqual([]);
  });
});

describe("CoachingCycle", () => {
  let tmp: TempDb;

  beforeEach(() => {
    tmp = openTempDb("pacer-cycle-");
  });

  afterEach(() => {
    tmp.cleanup();
  });

  it("detects, admits and assembles, then respects caps and recurrence on the next pass", async () => {
    const config = makeConfig();
    const clock = new FakeClock(NOON_UTC);
    const logger = silentLogger();
    const store = new PromptStore(tmp.db);
    const intake = new RecordingIntake();

    const source = new StaticActivitySource([
      makeSnapshot({ userId: "user-1" }),
      makeSnapshot({ userId: "user-2", habits: [{ id: "h-walk", name: "a walk", consecutiveMissedDays: 3 }] }),
    ]);
    const cycle = new CoachingCycle({
      detector: new TimingDetector({ source, config: config.detection, logger }),
      controller: new FrequencyController({
        store,
        preferences: new PreferenceStore(tmp.db, config.frequency.defaults),
        config: config.frequency,
        logger,
        clock: clock.now,
      }),
      assembler: new PromptAssembler({
        store,
        synthesizer: new TemplateContentSynthesizer(),
        intake,
        logger,
        synthesisTimeoutMs: 1_000,
        defaultTtlSeconds: 86_400,
        clock: clock.now,
      }),
      logger,
      clock: clock.now,
    });

    expect(await cycle.run()).toEqual({
      users: 2,
      detectionFailures: 0,
      timings: 3,
      admitted: 2,
      queued: 2,
      failed: 0,
      duplicates: 0,
    });
    expect(intake.received.map((p) => [p.userId, p.timingType])).toEqual([
      ["user-1", "daily_checkin"],
      ["user-2", "habit_missed"],
    ]);

    const second = await cycle.run();
    expect(second.timings).toBe(3);
    expect(second.admitted).toBe(0);
  });
});
