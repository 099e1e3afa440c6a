import type { PromptContent, PromptTiming, UserContext } from "../coaching/types.js";

export interface SynthesizedContent {
  readonly content: PromptContent;
  /** Overrides the configured default lifetime when present. */
  readonly ttlSeconds?: number;
}

/**
 * Turns a timing plus user context into message content. Implementations
 * must throw rather than return partial content.
 */
export interface ContentSynthesizer {
  synthesize(timing: PromptTiming, context: UserContext, signal: AbortSignal): Promise<SynthesizedContent>;
}
