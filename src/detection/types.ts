import type { DetectionConfig } from "../config/types.js";
import type { PromptTiming, UserContext } from "../coaching/types.js";

export interface HabitSnapshot {
  readonly id: string;
  readonly name: string;
  /** Consecutive days up to yesterday with zero completions. */
  readonly consecutiveMissedDays: number;
}

/** Local hours [startHour, endHour) when the user usually talks to the coach. */
export interface ActiveWindow {
  readonly startHour: number;
  readonly endHour: number;
}

/**
 * Point-in-time view of one user's activity, fetched from the health-record
 * side of the system. Detection reads nothing else.
 */
export interface UserActivitySnapshot {
  readonly userId: string;
  readonly timezone: string;
  readonly lastConversationAt: number | null;
  readonly activeWindow: ActiveWindow | null;
  readonly habits: readonly HabitSnapshot[];
  readonly lastProgressAt: number | null;
  readonly lastActivityAt: number | null;
  readonly lastLogAt: number | null;
  readonly context?: UserContext;
}

export interface ActivitySource {
  listActiveUsers(limit: number): Promise<string[]>;
  getSnapshot(userId: string): Promise<UserActivitySnapshot>;
}

/** Optional model-backed detector consulted after the rules. */
export interface HeuristicDetector {
  detect(snapshot: UserActivitySnapshot, now: number): Promise<PromptTiming[]>;
}

export interface RuleContext {
  readonly now: number;
  readonly config: DetectionConfig;
}

export interface TimingRule {
  readonly id: string;
  readonly enabled: boolean;
  evaluate(snapshot: UserActivitySnapshot, ctx: RuleContext): PromptTiming[];
}

export interface UserDetection {
  readonly snapshot: UserActivitySnapshot;
  readonly timings: PromptTiming[];
}
