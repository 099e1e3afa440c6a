import { PRIORITY_RANK, type PromptTiming } from "../coaching/types.js";
import { DetectionError } from "../coaching/errors.js";
import type { DetectionConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { BUILTIN_RULES, evaluateRules } from "./rules.js";
import type {
  ActivitySource,
  HeuristicDetector,
  TimingRule,
  UserActivitySnapshot,
  UserDetection,
} from "./types.js";

export interface DetectionBatch {
  readonly detections: UserDetection[];
  readonly failures: DetectionError[];
}

export interface TimingDetectorDeps {
  source: ActivitySource;
  config: DetectionConfig;
  logger: Logger;
  rules?: readonly TimingRule[];
  heuristic?: HeuristicDetector;
}

/** Higher priority first, then higher confidence. */
export function compareTimings(a: PromptTiming, b: PromptTiming): number {
  const rank = PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority];
  return rank !== 0 ? rank : b.confidence - a.confidence;
}

/**
 * Collapse candidates to one per timing type, keeping the best of each,
 * and return at most `max` of them ranked best first.
 */
export function mergeCandidates(candidates: readonly PromptTiming[], max: number): PromptTiming[] {
  const best = new Map<string, PromptTiming>();
  for (const c of candidates) {
    const current = best.get(c.type);
    if (!current || compareTimings(c, current) < 0) {
      best.set(c.type, c);
    }
  }
  return [...best.values()].sort(compareTimings).slice(0, max);
}

export interface DetectTimingsDeps {
  config: DetectionConfig;
  logger: Logger;
  now: number;
  rules?: readonly TimingRule[];
  heuristic?: HeuristicDetector;
}

/**
 * Stateless over snapshots: nothing here writes to the store. A failure for
 * one user is logged and reported without touching the rest of the batch.
 */
export async function detectTimings(
  snapshots: readonly UserActivitySnapshot[],
  deps: DetectTimingsDeps,
): Promise<DetectionBatch> {
  const detections: UserDetection[] = [];
  const failures: DetectionError[] = [];

  for (const snapshot of snapshots) {
    try {
      const timings = await detectForSnapshot(snapshot, deps);
      detections.push({ snapshot, timings });
    } catch (err) {
      failures.push(reportFailure(deps.logger, snapshot.userId, err));
    }
  }

  return { detections, failures };
}

export async function detectForSnapshot(
  snapshot: UserActivitySnapshot,
  deps: DetectTimingsDeps,
): Promise<PromptTiming[]> {
  const { config, now } = deps;
  const candidates = evaluateRules(deps.rules ?? BUILTIN_RULES, snapshot, { now, config });

  if (deps.heuristic) {
    const extra = await deps.heuristic.detect(snapshot, now);
    for (const t of extra) {
      if (t.confidence < config.heuristicMinConfidence) continue;
      candidates.push({ ...t, userId: snapshot.userId });
    }
  }

  return mergeCandidates(candidates, config.maxCandidatesPerUser);
}

function reportFailure(logger: Logger, userId: string, err: unknown): DetectionError {
  logger.warn({ err, userId }, "Timing detection failed for user");
  return new DetectionError(userId, err);
}

/** Fetches snapshots from the activity source, then runs detection over them. */
export class TimingDetector {
  private readonly source: ActivitySource;
  private readonly config: DetectionConfig;
  private readonly logger: Logger;
  private readonly rules: readonly TimingRule[] | undefined;
  private readonly heuristic: HeuristicDetector | undefined;

  constructor(deps: TimingDetectorDeps) {
    this.source = deps.source;
    this.config = deps.config;
    this.logger = deps.logger;
    this.rules = deps.rules;
    this.heuristic = deps.heuristic;
  }

  async listActiveUsers(): Promise<string[]> {
    return this.source.listActiveUsers(this.config.batchLimit);
  }

  async detectBatch(userIds: readonly string[], now: number): Promise<DetectionBatch> {
    const snapshots: UserActivitySnapshot[] = [];
    const failures: DetectionError[] = [];

    for (const userId of userIds) {
      try {
        snapshots.push(await this.source.getSnapshot(userId));
      } catch (err) {
        failures.push(reportFailure(this.logger, userId, err));
      }
    }

    const batch = await detectTimings(snapshots, {
      config: this.config,
      logger: this.logger,
      now,
      rules: this.rules,
      heuristic: this.heuristic,
    });
    return { detections: batch.detections, failures: [...failures, ...batch.failures] };
  }
}
