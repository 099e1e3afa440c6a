import { SynthesisError } from "../coaching/errors.js";
import type { PromptContent, PromptTiming, QuickReply, UserContext } from "../coaching/types.js";
import type { ContentSynthesizer, SynthesizedContent } from "./types.js";

type Template = (timing: PromptTiming) => PromptContent;

function str(value: unknown, fallback: string): string {
  return typeof value === "string" && value.length > 0 ? value : fallback;
}

const DISMISS: QuickReply = { text: "Not now", value: "dismiss" };

const TEMPLATES: Record<string, Template> = {
  daily_checkin: () => ({
    title: "Daily check-in",
    message: "How are you feeling today? A quick check-in keeps your plan on track.",
    quickReplies: [
      { text: "Let's talk", value: "talk_to_coach" },
      { text: "Remind me later", value: "snooze" },
      DISMISS,
    ],
  }),
  habit_missed: (t) => {
    const habit = str(t.metadata["habit_name"], "your habit");
    return {
      title: "Habit reminder",
      message: `It's been a few days since you did ${habit}. Want to get it done now?`,
      quickReplies: [
        { text: "Done", value: "complete_now" },
        { text: "Remind me later", value: "snooze", nextStep: "follow_up" },
        { text: "Skip today", value: "skip_today" },
      ],
    };
  },
  progress_stalled: () => ({
    title: "Checking on your progress",
    message: "Progress has been flat for a few days. Want to look at what's getting in the way?",
    quickReplies: [
      { text: "Talk to coach", value: "talk_to_coach" },
      DISMISS,
    ],
  }),
  re_engagement: () => ({
    title: "We miss you",
    message: "It's been a while. Even a small step today counts.",
    quickReplies: [
      { text: "Log something", value: "log_now" },
      { text: "Talk to coach", value: "talk_to_coach" },
      DISMISS,
    ],
  }),
  log_reminder: () => ({
    title: "Time to log",
    message: "You haven't logged anything today. Add your weight or meals before the day ends.",
    quickReplies: [
      { text: "Log now", value: "log_now" },
      { text: "Skip today", value: "skip_today" },
    ],
  }),
  follow_up: (t) => ({
    title: "Following up",
    message: str(t.metadata["message"], "Ready to pick this up again?"),
    quickReplies: [
      { text: "Done", value: "complete_now" },
      DISMISS,
    ],
  }),
};

/** Built-in wording for the known timing types. No network involved. */
export class TemplateContentSynthesizer implements ContentSynthesizer {
  async synthesize(timing: PromptTiming, _context: UserContext, _signal: AbortSignal): Promise<SynthesizedContent> {
    const template = TEMPLATES[timing.type];
    if (!template) {
      throw new SynthesisError(`No template for timing type "${timing.type}"`);
    }
    return { content: template(timing) };
  }
}
