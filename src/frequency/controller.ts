import type { FrequencyConfig, Recurrence } from "../config/types.js";
import type { PreferenceReader, PromptTiming, UserNotificationPreference } from "../coaching/types.js";
import type { PromptStore } from "../prompts/store.js";
import type { Logger } from "../logging/logger.js";
import { isWithinQuietHours } from "./quiet-hours.js";
import { isSameLocalDay, systemClock, type Clock } from "./clock.js";

export type RejectionReason =
  | "notifications_disabled"
  | "timing_type_disabled"
  | "quiet_hours"
  | "daily_cap"
  | "hourly_cap"
  | "min_interval"
  | "low_engagement"
  | "type_recurrence";

export type AdmissionDecision =
  | { readonly admitted: true }
  | { readonly admitted: false; readonly reason: RejectionReason };

export type FrequencyStats = Pick<
  PromptStore,
  "countDeliveredOrQueued" | "lastScheduledAt" | "engagementSample" | "lastProducedAt"
>;

export interface FrequencyControllerDeps {
  store: FrequencyStats;
  preferences: PreferenceReader;
  config: FrequencyConfig;
  logger: Logger;
  clock?: Clock;
}

const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;
const ADMITTED: AdmissionDecision = { admitted: true };

function reject(reason: RejectionReason): AdmissionDecision {
  return { admitted: false, reason };
}

/**
 * Gatekeeper between detected timings and prompt creation. Checks run in a
 * fixed order and stop at the first rejection. Rejected timings are dropped;
 * the next detection cycle may emit them again.
 */
export class FrequencyController {
  private readonly store: FrequencyStats;
  private readonly preferences: PreferenceReader;
  private readonly config: FrequencyConfig;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(deps: FrequencyControllerDeps) {
    this.store = deps.store;
    this.preferences = deps.preferences;
    this.config = deps.config;
    this.logger = deps.logger;
    this.clock = deps.clock ?? systemClock;
  }

  admit(userId: string, timing: PromptTiming): boolean {
    const decision = this.evaluate(userId, timing);
    if (!decision.admitted) {
      this.logger.debug(
        { userId, timingType: timing.type, priority: timing.priority, reason: decision.reason },
        "Timing rejected",
      );
    }
    return decision.admitted;
  }

  evaluate(userId: string, timing: PromptTiming): AdmissionDecision {
    const now = this.clock();
    const prefs = this.preferences.get(userId);

    if (!prefs.enabled) return reject("notifications_disabled");
    if (prefs.enabledTimingTypes.length > 0 && !prefs.enabledTimingTypes.includes(timing.type)) {
      return reject("timing_type_disabled");
    }

    if (isWithinQuietHours(prefs.quietHours, now, prefs.timezone)) {
      return reject("quiet_hours");
    }

    const caps = this.checkCapsFor(userId, prefs, now);
    if (!caps.admitted) return caps;

    // Prompts admitted earlier in the same cycle count too, not just deliveries.
    const anchor = this.store.lastScheduledAt(userId);
    if (anchor !== null && Math.abs(now - anchor) < prefs.minIntervalMinutes * 60_000) {
      return reject("min_interval");
    }

    if (timing.priority !== "HIGH" && this.isLowEngagement(userId)) {
      return reject("low_engagement");
    }

    if (this.withinRecurrenceWindow(userId, timing.type, prefs.timezone, now)) {
      return reject("type_recurrence");
    }

    return ADMITTED;
  }

  /**
   * Only the volume caps. Follow-ups to a reply skip the timing checks but
   * never the caps.
   */
  checkCaps(userId: string): AdmissionDecision {
    return this.checkCapsFor(userId, this.preferences.get(userId), this.clock());
  }

  responseRate(userId: string): number | null {
    const sample = this.store.engagementSample(userId, this.config.engagementWindow);
    if (sample.delivered === 0) return null;
    return sample.responded / sample.delivered;
  }

  private checkCapsFor(userId: string, prefs: UserNotificationPreference, now: number): AdmissionDecision {
    // A rolling 24h window also bounds every calendar day.
    if (this.store.countDeliveredOrQueued(userId, now - DAY_MS) >= prefs.dailyMax) {
      return reject("daily_cap");
    }
    if (this.store.countDeliveredOrQueued(userId, now - HOUR_MS) >= prefs.hourlyMax) {
      return reject("hourly_cap");
    }
    return ADMITTED;
  }

  private isLowEngagement(userId: string): boolean {
    const sample = this.store.engagementSample(userId, this.config.engagementWindow);
    if (sample.delivered < this.config.engagementMinSample || sample.delivered === 0) return false;
    return sample.responded / sample.delivered < this.config.engagementThreshold;
  }

  private withinRecurrenceWindow(userId: string, timingType: string, timezone: string, now: number): boolean {
    const recurrence: Recurrence =
      this.config.typeRecurrence[timingType] ?? this.config.defaultRecurrenceHours;
    const last = this.store.lastProducedAt(userId, timingType);
    if (last === null) return false;

    if (recurrence === "calendar_day") {
      return isSameLocalDay(last, now, timezone);
    }
    return now - last < recurrence * HOUR_MS;
  }
}
