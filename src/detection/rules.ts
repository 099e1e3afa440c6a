import type { PromptTiming } from "../coaching/types.js";
import { isSameLocalDay, localTime } from "../frequency/clock.js";
import type { ActiveWindow, TimingRule, UserActivitySnapshot } from "./types.js";

const DAY_MS = 86_400_000;
const DEFAULT_ACTIVE_WINDOW: ActiveWindow = { startHour: 9, endHour: 21 };

function localDateKey(now: number, timezone: string): string {
  const t = localTime(now, timezone);
  const mm = String(t.month).padStart(2, "0");
  const dd = String(t.day).padStart(2, "0");
  return `${t.year}-${mm}-${dd}`;
}

function inWindow(hour: number, window: ActiveWindow): boolean {
  if (window.startHour <= window.endHour) {
    return hour >= window.startHour && hour < window.endHour;
  }
  return hour >= window.startHour || hour < window.endHour;
}

function daysSince(ts: number, now: number): number {
  return Math.floor((now - ts) / DAY_MS);
}

// ── Built-in timing rules ──

/** No conversation yet today, and the user is usually around at this hour. */
export const dailyCheckin: TimingRule = {
  id: "daily_checkin",
  enabled: true,
  evaluate(s, { now }) {
    if (s.lastConversationAt !== null && isSameLocalDay(s.lastConversationAt, now, s.timezone)) {
      return [];
    }
    const { hour } = localTime(now, s.timezone);
    if (!inWindow(hour, s.activeWindow ?? DEFAULT_ACTIVE_WINDOW)) return [];

    return [{
      type: "daily_checkin",
      userId: s.userId,
      priority: "MEDIUM",
      confidence: 0.9,
      metadata: { subject_id: localDateKey(now, s.timezone) },
    }];
  },
};

/** A tracked habit with no completions for several days running. */
export const habitMissed: TimingRule = {
  id: "habit_missed",
  enabled: true,
  evaluate(s, { config }) {
    return s.habits
      .filter((h) => h.consecutiveMissedDays >= config.habitMissedDays)
      .map((h): PromptTiming => ({
        type: "habit_missed",
        userId: s.userId,
        priority: h.consecutiveMissedDays >= config.habitEscalateDays ? "HIGH" : "MEDIUM",
        confidence: Math.min(1, 0.6 + 0.1 * h.consecutiveMissedDays),
        metadata: {
          subject_id: h.id,
          habit_id: h.id,
          habit_name: h.name,
          missed_days: h.consecutiveMissedDays,
        },
      }));
  },
};

export const progressStalled: TimingRule = {
  id: "progress_stalled",
  enabled: true,
  evaluate(s, { now, config }) {
    if (s.lastProgressAt === null) return [];
    const days = daysSince(s.lastProgressAt, now);
    if (days < config.progressStallDays) return [];

    return [{
      type: "progress_stalled",
      userId: s.userId,
      priority: "LOW",
      confidence: 0.7,
      metadata: { days_since_progress: days },
    }];
  },
};

/** Nothing logged, said or tracked for a long stretch. */
export const reEngagement: TimingRule = {
  id: "re_engagement",
  enabled: true,
  evaluate(s, { now, config }) {
    if (s.lastActivityAt === null) return [];
    const days = daysSince(s.lastActivityAt, now);
    if (days < config.dormantDays) return [];

    return [{
      type: "re_engagement",
      userId: s.userId,
      priority: "LOW",
      confidence: 0.6,
      metadata: { days_inactive: days },
    }];
  },
};

/** Evening nudge when nothing (weight, meals) has been logged today. */
export const logReminder: TimingRule = {
  id: "log_reminder",
  enabled: true,
  evaluate(s, { now, config }) {
    const { hour } = localTime(now, s.timezone);
    if (hour < config.logReminderHour) return [];
    if (s.lastLogAt !== null && isSameLocalDay(s.lastLogAt, now, s.timezone)) return [];

    return [{
      type: "log_reminder",
      userId: s.userId,
      priority: "LOW",
      confidence: 0.75,
      metadata: { subject_id: localDateKey(now, s.timezone) },
    }];
  },
};

export const BUILTIN_RULES: readonly TimingRule[] = [
  dailyCheckin,
  habitMissed,
  progressStalled,
  reEngagement,
  logReminder,
];

export function evaluateRules(
  rules: readonly TimingRule[],
  snapshot: UserActivitySnapshot,
  ctx: Parameters<TimingRule["evaluate"]>[1],
): PromptTiming[] {
  return rules.filter((r) => r.enabled).flatMap((r) => r.evaluate(snapshot, ctx));
}
