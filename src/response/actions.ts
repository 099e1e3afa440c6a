import type { Prompt, PromptTiming, QuickReply } from "../coaching/types.js";

interface ActionPayloads {
  complete_now: { readonly habitId: string | null };
  snooze: { readonly minutes: number };
  skip_today: { readonly habitId: string | null };
  log_now: Record<never, never>;
  talk_to_coach: Record<never, never>;
  dismiss: Record<never, never>;
  unknown: { readonly value: string };
}

export type ResponseActionKind = keyof ActionPayloads;

/** Closed set of things a reply can mean, tagged by `kind`. */
export type ResponseAction<K extends ResponseActionKind = ResponseActionKind> = {
  [P in K]: { readonly kind: P } & ActionPayloads[P];
}[K];

export const DEFAULT_SNOOZE_MINUTES = 60;
const MAX_SNOOZE_MINUTES = 24 * 60;

function habitIdOf(prompt: Prompt): string | null {
  const habitId = prompt.metadata["habit_id"];
  if (typeof habitId === "string" && habitId.length > 0) return habitId;
  if (typeof habitId === "number") return String(habitId);
  return null;
}

function fromTag(tag: string, prompt: Prompt): ResponseAction | null {
  const snooze = /^snooze(?::(\d+))?$/.exec(tag);
  if (snooze) {
    const minutes = snooze[1] ? parseInt(snooze[1], 10) : DEFAULT_SNOOZE_MINUTES;
    return { kind: "snooze", minutes: Math.min(Math.max(minutes, 1), MAX_SNOOZE_MINUTES) };
  }
  switch (tag) {
    case "complete_now":
      return { kind: "complete_now", habitId: habitIdOf(prompt) };
    case "skip_today":
      return { kind: "skip_today", habitId: habitIdOf(prompt) };
    case "log_now":
      return { kind: "log_now" };
    case "talk_to_coach":
      return { kind: "talk_to_coach" };
    case "dismiss":
      return { kind: "dismiss" };
    default:
      return null;
  }
}

/**
 * Resolve a reply to one action. The quick-reply value decides; the
 * client's action field is consulted only when the value is free text.
 */
export function parseResponseAction(value: string, action: string, prompt: Prompt): ResponseAction {
  return (
    fromTag(value.trim().toLowerCase(), prompt) ??
    fromTag(action.trim().toLowerCase(), prompt) ?? { kind: "unknown", value }
  );
}

/** The quick reply the user picked, if the value matches one. */
export function matchedQuickReply(prompt: Prompt, value: string): QuickReply | null {
  return prompt.content.quickReplies.find((r) => r.value === value) ?? null;
}

export function followUpTiming(
  prompt: Prompt,
  extra: Readonly<Record<string, unknown>> = {},
): PromptTiming {
  const habitId = habitIdOf(prompt);
  return {
    type: "follow_up",
    userId: prompt.userId,
    priority: prompt.priority,
    confidence: 1,
    metadata: {
      ...extra,
      subject_id: prompt.id,
      parent_prompt_id: prompt.id,
      origin_type: prompt.timingType,
      ...(habitId ? { habit_id: habitId } : {}),
    },
  };
}
