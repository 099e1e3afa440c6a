import type { TimingDetector } from "../detection/detector.js";
import type { FrequencyController } from "../frequency/controller.js";
import type { Logger } from "../logging/logger.js";
import { systemClock, type Clock } from "../frequency/clock.js";
import type { PromptAssembler } from "./assembler.js";

export interface CycleReport {
  readonly users: number;
  readonly detectionFailures: number;
  readonly timings: number;
  readonly admitted: number;
  readonly queued: number;
  readonly failed: number;
  readonly duplicates: number;
}

export interface CoachingCycleDeps {
  detector: TimingDetector;
  controller: FrequencyController;
  assembler: PromptAssembler;
  logger: Logger;
  clock?: Clock;
}

/** One detect → admit → assemble pass over the active users. */
export class CoachingCycle {
  private readonly detector: TimingDetector;
  private readonly controller: FrequencyController;
  private readonly assembler: PromptAssembler;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(deps: CoachingCycleDeps) {
    this.detector = deps.detector;
    this.controller = deps.controller;
    this.assembler = deps.assembler;
    this.logger = deps.logger;
    this.clock = deps.clock ?? systemClock;
  }

  async run(): Promise<CycleReport> {
    const users = await this.detector.listActiveUsers();
    const batch = await this.detector.detectBatch(users, this.clock());

    let timings = 0;
    let admitted = 0;
    let queued = 0;
    let failed = 0;
    let duplicates = 0;

    for (const { snapshot, timings: candidates } of batch.detections) {
      for (const timing of candidates) {
        timings++;
        if (!this.controller.admit(snapshot.userId, timing)) continue;
        admitted++;

        try {
          const outcome = await this.assembler.assemble(timing, snapshot.context ?? {});
          if (outcome.kind === "queued") queued++;
          else if (outcome.kind === "failed") failed++;
          else duplicates++;
        } catch (err) {
          failed++;
          this.logger.error({ err, userId: snapshot.userId, timingType: timing.type }, "Prompt assembly crashed");
        }
      }
    }

    const report: CycleReport = {
      users: users.length,
      detectionFailures: batch.failures.length,
      timings,
      admitted,
      queued,
      failed,
      duplicates,
    };
    this.logger.info(report, "Coaching cycle complete");
    return report;
  }
}
