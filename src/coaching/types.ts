export const PRIORITIES = ["HIGH", "MEDIUM", "LOW"] as const;
export type Priority = (typeof PRIORITIES)[number];

export const PRIORITY_RANK: Record<Priority, number> = {
  HIGH: 0,
  MEDIUM: 1,
  LOW: 2,
};

export const PROMPT_STATES = [
  "pending",
  "queued",
  "delivering",
  "delivered",
  "responded",
  "expired",
  "failed",
] as const;
export type PromptState = (typeof PROMPT_STATES)[number];

/** States that count against the one-in-flight-per-subject rule. */
export const IN_FLIGHT_STATES: readonly PromptState[] = ["pending", "queued", "delivering"];

export const CHANNELS = ["in_app", "push", "email"] as const;
export type Channel = (typeof CHANNELS)[number];

export type BuiltInTimingType =
  | "daily_checkin"
  | "habit_missed"
  | "progress_stalled"
  | "re_engagement"
  | "log_reminder"
  | "follow_up";

// Heuristic detectors may emit types the built-in rules don't know about.
export type TimingType = BuiltInTimingType | (string & {});

export type PromptMetadata = Readonly<Record<string, unknown>>;

export interface PromptTiming {
  readonly type: TimingType;
  readonly userId: string;
  readonly priority: Priority;
  readonly confidence: number;
  readonly metadata: PromptMetadata;
}

export interface QuickReply {
  readonly text: string;
  readonly value: string;
  readonly nextStep?: string | null;
}

export interface PromptContent {
  readonly title: string;
  readonly message: string;
  readonly quickReplies: readonly QuickReply[];
}

export interface Prompt {
  readonly id: string;
  readonly userId: string;
  readonly timingType: TimingType;
  readonly priority: Priority;
  readonly state: PromptState;
  readonly content: PromptContent;
  readonly channel: Channel | null;
  readonly subjectKey: string;
  readonly metadata: PromptMetadata;
  readonly retryCount: number;
  readonly nextAttemptAt: number | null;
  readonly lastError: string | null;
  readonly createdAt: number;
  readonly expiresAt: number;
  readonly scheduledFor: number | null;
  readonly deliveredAt: number | null;
  readonly acknowledgedAt: number | null;
  readonly respondedAt: number | null;
  readonly responseValue: string | null;
  readonly responseAction: string | null;
  readonly version: number;
}

export interface QuietHours {
  readonly enabled: boolean;
  readonly start: string; // "HH:MM"
  readonly end: string; // "HH:MM"
}

export interface UserNotificationPreference {
  readonly userId: string;
  readonly enabled: boolean;
  readonly dailyMax: number;
  readonly hourlyMax: number;
  readonly minIntervalMinutes: number;
  readonly quietHours: QuietHours;
  readonly timezone: string;
  readonly channels: Readonly<Record<Channel, boolean>>;
  /** Empty means every timing type is enabled. */
  readonly enabledTimingTypes: readonly string[];
}

export interface PreferenceReader {
  get(userId: string): UserNotificationPreference;
}

/** Free-form context handed to the content synthesizer alongside a timing. */
export type UserContext = Readonly<Record<string, unknown>>;

export function subjectKeyOf(metadata: PromptMetadata): string {
  const subject = metadata["subject_id"];
  if (typeof subject === "string") return subject;
  if (typeof subject === "number") return String(subject);
  return "";
}
