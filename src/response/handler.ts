import type { Prompt, PromptTiming } from "../coaching/types.js";
import { ValidationError } from "../coaching/errors.js";
import type { PromptStore } from "../prompts/store.js";
import type { AssembleOptions, AssemblyOutcome } from "../pipeline/assembler.js";
import type { AdmissionDecision } from "../frequency/controller.js";
import type { StreamEvent } from "../connections/events.js";
import type { Logger } from "../logging/logger.js";
import { systemClock, type Clock } from "../frequency/clock.js";
import {
  followUpTiming,
  matchedQuickReply,
  parseResponseAction,
  type ResponseAction,
  type ResponseActionKind,
} from "./actions.js";

/** Domain effects a reply can trigger, owned by the health-record side. */
export interface CoachingSideEffects {
  completeHabit(userId: string, habitId: string): Promise<void>;
  skipHabitToday(userId: string, habitId: string): Promise<void>;
  requestCoachSession(userId: string, promptId: string): Promise<void>;
}

export interface ReplyInput {
  readonly promptId: string;
  readonly userId: string;
  readonly value: string;
  readonly action: string;
  readonly clientTimestamp: number | null;
}

export interface ReplyResult {
  readonly success: true;
  readonly result: string;
  readonly followUpScheduled: boolean;
}

interface FollowUpRequest {
  readonly timing: PromptTiming;
  readonly notBefore?: number;
}

interface ActionOutcome {
  readonly result: string;
  readonly followUp?: FollowUpRequest;
}

interface ActionContext {
  readonly prompt: Prompt;
  readonly reply: ReplyInput;
  readonly now: number;
}

type ActionHandlers = {
  [K in ResponseActionKind]: (action: ResponseAction<K>, ctx: ActionContext) => Promise<ActionOutcome>;
};

export interface FollowUpAssembler {
  assemble(timing: PromptTiming, context: Record<string, unknown>, options?: AssembleOptions): Promise<AssemblyOutcome>;
}

export interface CapChecker {
  checkCaps(userId: string): AdmissionDecision;
}

export interface UserEventPublisher {
  sendToUser(userId: string, event: StreamEvent): Promise<number>;
}

export interface ResponseHandlerDeps {
  store: PromptStore;
  sideEffects: CoachingSideEffects;
  assembler: FollowUpAssembler;
  caps: CapChecker;
  publisher: UserEventPublisher;
  logger: Logger;
  clock?: Clock;
}

function dispatch<K extends ResponseActionKind>(
  handlers: ActionHandlers,
  action: ResponseAction<K>,
  ctx: ActionContext,
): Promise<ActionOutcome> {
  return handlers[action.kind](action, ctx);
}

/**
 * DELIVERED → RESPONDED. The compare-and-swap on the prompt row is the
 * idempotency guard: a second submission of the same reply sees a
 * RESPONDED prompt and is rejected before any side effect runs.
 */
export class ResponseHandler {
  private readonly store: PromptStore;
  private readonly sideEffects: CoachingSideEffects;
  private readonly assembler: FollowUpAssembler;
  private readonly caps: CapChecker;
  private readonly publisher: UserEventPublisher;
  private readonly logger: Logger;
  private readonly clock: Clock;

  private readonly handlers: ActionHandlers = {
    complete_now: async (action, { prompt }) => {
      if (!action.habitId) return { result: "acknowledged" };
      await this.sideEffects.completeHabit(prompt.userId, action.habitId);
      return { result: "habit_completed" };
    },
    snooze: async (action, { prompt, now }) => ({
      result: "snoozed",
      followUp: {
        timing: followUpTiming(prompt, { message: prompt.content.message, snoozed_minutes: action.minutes }),
        notBefore: now + action.minutes * 60_000,
      },
    }),
    skip_today: async (action, { prompt }) => {
      if (action.habitId) await this.sideEffects.skipHabitToday(prompt.userId, action.habitId);
      return { result: "skipped" };
    },
    log_now: async () => ({ result: "open_log" }),
    talk_to_coach: async (_action, { prompt }) => {
      await this.sideEffects.requestCoachSession(prompt.userId, prompt.id);
      return { result: "coach_requested" };
    },
    dismiss: async () => ({ result: "dismissed" }),
    unknown: async (action, { prompt }) => {
      this.logger.debug({ promptId: prompt.id, value: action.value }, "Reply value has no handler");
      return { result: "recorded" };
    },
  };

  constructor(deps: ResponseHandlerDeps) {
    this.store = deps.store;
    this.sideEffects = deps.sideEffects;
    this.assembler = deps.assembler;
    this.caps = deps.caps;
    this.publisher = deps.publisher;
    this.logger = deps.logger;
    this.clock = deps.clock ?? systemClock;
  }

  async handle(reply: ReplyInput): Promise<ReplyResult> {
    const now = this.clock();
    const prompt = this.validate(reply, now);
    const action = parseResponseAction(reply.value, reply.action, prompt);

    const responded = this.store.transition(prompt.id, "delivered", "responded", {
      respondedAt: now,
      responseValue: reply.value,
      responseAction: action.kind,
    });
    if (!responded) {
      throw new ValidationError("stale_prompt", `Prompt ${prompt.id} was already answered`);
    }

    const log = { promptId: prompt.id, userId: prompt.userId, action: action.kind };
    let outcome: ActionOutcome;
    try {
      outcome = await dispatch(this.handlers, action, { prompt: responded, reply, now });
    } catch (err) {
      this.logger.error({ ...log, err }, "Reply side effect failed");
      outcome = { result: `${action.kind}_failed` };
    }

    const followUp = outcome.followUp ?? this.quickReplyFollowUp(responded, reply.value);
    const followUpScheduled = followUp ? await this.scheduleFollowUp(followUp) : false;

    this.store.recordInteraction({
      promptId: prompt.id,
      userId: prompt.userId,
      value: reply.value,
      action: action.kind,
      result: outcome.result,
      clientTimestamp: reply.clientTimestamp,
      recordedAt: now,
    });
    this.logger.info({ ...log, result: outcome.result, followUpScheduled }, "Reply handled");

    this.publisher
      .sendToUser(prompt.userId, {
        type: "response_result",
        data: { prompt_id: prompt.id, result: outcome.result, follow_up_scheduled: followUpScheduled },
      })
      .catch((err) => {
        this.logger.warn({ ...log, err }, "Failed to publish response result");
      });

    return { success: true, result: outcome.result, followUpScheduled };
  }

  private validate(reply: ReplyInput, now: number): Prompt {
    const prompt = this.store.get(reply.promptId);
    if (!prompt) {
      throw new ValidationError("prompt_not_found", `Prompt ${reply.promptId} not found`);
    }
    if (prompt.userId !== reply.userId) {
      throw new ValidationError("ownership_mismatch", `Prompt ${reply.promptId} belongs to another user`);
    }
    if (prompt.state !== "delivered") {
      throw new ValidationError("stale_prompt", `Prompt ${reply.promptId} is ${prompt.state}`);
    }
    if (prompt.expiresAt <= now) {
      throw new ValidationError("stale_prompt", `Prompt ${reply.promptId} has expired`);
    }
    return prompt;
  }

  /** A quick reply carrying a next step asks for an immediate follow-up. */
  private quickReplyFollowUp(prompt: Prompt, value: string): FollowUpRequest | undefined {
    const nextStep = matchedQuickReply(prompt, value)?.nextStep;
    if (!nextStep) return undefined;
    return { timing: followUpTiming(prompt, { next_step: nextStep }) };
  }

  /** Follow-ups skip the timing checks but never the volume caps. */
  private async scheduleFollowUp(request: FollowUpRequest): Promise<boolean> {
    const { timing } = request;
    const caps = this.caps.checkCaps(timing.userId);
    if (!caps.admitted) {
      this.logger.debug({ userId: timing.userId, reason: caps.reason }, "Follow-up rejected by caps");
      return false;
    }
    try {
      const outcome = await this.assembler.assemble(timing, {}, { notBefore: request.notBefore });
      return outcome.kind === "queued";
    } catch (err) {
      this.logger.error({ err, userId: timing.userId }, "Follow-up assembly failed");
      return false;
    }
  }
}
