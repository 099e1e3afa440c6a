import type { Prompt, PromptContent, PromptTiming, UserContext } from "../coaching/types.js";
import { subjectKeyOf } from "../coaching/types.js";
import { describe } from "../coaching/errors.js";
import type { PromptStore } from "../prompts/store.js";
import type { ContentSynthesizer } from "../synthesis/types.js";
import type { Logger } from "../logging/logger.js";
import { withTimeout } from "../utils/timeout.js";
import { systemClock, type Clock } from "../frequency/clock.js";

/** Where freshly assembled prompts go. The dispatcher in production. */
export interface PromptIntake {
  enqueue(prompt: Prompt): boolean;
}

export interface AssembleOptions {
  /** Hold delivery until this time. */
  readonly notBefore?: number;
}

export type AssemblyOutcome =
  | { readonly kind: "queued"; readonly prompt: Prompt }
  | { readonly kind: "failed"; readonly prompt: Prompt; readonly error: string }
  | { readonly kind: "duplicate" };

export interface PromptAssemblerDeps {
  store: PromptStore;
  synthesizer: ContentSynthesizer;
  intake: PromptIntake;
  logger: Logger;
  synthesisTimeoutMs: number;
  defaultTtlSeconds: number;
  clock?: Clock;
}

const EMPTY_CONTENT: PromptContent = { title: "", message: "", quickReplies: [] };

export class PromptAssembler {
  private readonly store: PromptStore;
  private readonly synthesizer: ContentSynthesizer;
  private readonly intake: PromptIntake;
  private readonly logger: Logger;
  private readonly synthesisTimeoutMs: number;
  private readonly defaultTtlSeconds: number;
  private readonly clock: Clock;

  constructor(deps: PromptAssemblerDeps) {
    this.store = deps.store;
    this.synthesizer = deps.synthesizer;
    this.intake = deps.intake;
    this.logger = deps.logger;
    this.synthesisTimeoutMs = deps.synthesisTimeoutMs;
    this.defaultTtlSeconds = deps.defaultTtlSeconds;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Synthesize content for an admitted timing and persist the prompt. A
   * synthesis failure still leaves a FAILED row behind for the audit trail.
   */
  async assemble(timing: PromptTiming, context: UserContext, options: AssembleOptions = {}): Promise<AssemblyOutcome> {
    const log = { userId: timing.userId, timingType: timing.type };

    if (this.store.hasInFlight(timing.userId, timing.type, subjectKeyOf(timing.metadata))) {
      this.logger.debug(log, "Prompt already in flight for subject, skipping");
      return { kind: "duplicate" };
    }

    let content: PromptContent;
    let ttlSeconds = this.defaultTtlSeconds;
    try {
      const synthesized = await withTimeout("content synthesis", this.synthesisTimeoutMs, (signal) =>
        this.synthesizer.synthesize(timing, context, signal),
      );
      content = synthesized.content;
      ttlSeconds = synthesized.ttlSeconds ?? ttlSeconds;
    } catch (err) {
      const error = describe(err);
      const prompt = this.store.create({
        timing,
        content: EMPTY_CONTENT,
        state: "failed",
        ttlSeconds,
        lastError: error,
        now: this.clock(),
      });
      this.logger.warn({ ...log, err, promptId: prompt?.id }, "Content synthesis failed");
      if (!prompt) throw new Error(`Could not record failed prompt for user ${timing.userId}`);
      return { kind: "failed", prompt, error };
    }

    const now = this.clock();
    const prompt = this.store.create({
      timing,
      content,
      state: "pending",
      ttlSeconds,
      notBefore: options.notBefore,
      now,
    });
    if (!prompt) {
      this.logger.debug(log, "Lost dedup race, prompt already in flight");
      return { kind: "duplicate" };
    }

    this.logger.info({ ...log, promptId: prompt.id, priority: prompt.priority }, "Prompt created");
    // Deferred prompts wait for the dispatcher's pump.
    if (options.notBefore === undefined || options.notBefore <= now) {
      this.intake.enqueue(prompt);
    }
    return { kind: "queued", prompt };
  }
}
