import { z } from "zod";
import { SynthesisError, describe } from "../coaching/errors.js";
import type { PromptTiming, UserContext } from "../coaching/types.js";
import type { ContentSynthesizer, SynthesizedContent } from "./types.js";

const responseSchema = z.object({
  title: z.string().min(1),
  message: z.string().min(1),
  quick_replies: z
    .array(
      z.object({
        text: z.string().min(1),
        value: z.string().min(1),
        next_step: z.string().nullable().optional(),
      }),
    )
    .default([]),
  ttl_seconds: z.number().int().positive().optional(),
});

export interface HttpSynthesizerOptions {
  url: string;
  headers?: Record<string, string>;
}

/** POSTs the timing to an external generator and validates what comes back. */
export class HttpContentSynthesizer implements ContentSynthesizer {
  constructor(private readonly options: HttpSynthesizerOptions) {}

  async synthesize(timing: PromptTiming, context: UserContext, signal: AbortSignal): Promise<SynthesizedContent> {
    let response: Response;
    try {
      response = await fetch(this.options.url, {
        method: "POST",
        headers: { "content-type": "application/json", ...this.options.headers },
        body: JSON.stringify({
          user_id: timing.userId,
          timing_type: timing.type,
          priority: timing.priority,
          confidence: timing.confidence,
          metadata: timing.metadata,
          context,
        }),
        signal,
      });
    } catch (err) {
      throw new SynthesisError(`Synthesizer request failed: ${describe(err)}`, { cause: err });
    }

    if (!response.ok) {
      throw new SynthesisError(`Synthesizer returned ${response.status} ${response.statusText}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new SynthesisError("Synthesizer returned invalid JSON", { cause: err });
    }

    const parsed = responseSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "unknown issue";
      throw new SynthesisError(`Synthesizer returned malformed content (${where})`);
    }

    const data = parsed.data;
    return {
      content: {
        title: data.title,
        message: data.message,
        quickReplies: data.quick_replies.map((r) => ({
          text: r.text,
          value: r.value,
          nextStep: r.next_step ?? null,
        })),
      },
      ttlSeconds: data.ttl_seconds,
    };
  }
}
