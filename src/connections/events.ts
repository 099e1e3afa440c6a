import { z } from "zod";
import type { Prompt } from "../coaching/types.js";

export const STREAM_EVENT_TYPES = [
  "ready",
  "coaching_prompt",
  "response_result",
  "heartbeat",
  "error",
] as const;
export type StreamEventType = (typeof STREAM_EVENT_TYPES)[number];

/** What a live client receives, whatever the transport. */
export interface StreamEvent {
  readonly type: StreamEventType;
  readonly data: Readonly<Record<string, unknown>>;
}

export const streamEventSchema = z.object({
  type: z.enum(STREAM_EVENT_TYPES),
  data: z.record(z.string(), z.unknown()),
});

export const ackMessageSchema = z.object({
  promptId: z.string(),
  userId: z.string(),
  connectionId: z.string().nullable(),
  at: z.number(),
});
export type AckMessage = z.infer<typeof ackMessageSchema>;

export const presenceMessageSchema = z.object({
  kind: z.enum(["connected", "disconnected"]),
  userId: z.string(),
  connectionId: z.string(),
  processId: z.string(),
});
export type PresenceMessage = z.infer<typeof presenceMessageSchema>;

export const ACK_TOPIC = "coaching:acks";
export const PRESENCE_TOPIC = "coaching:presence";

export function userTopic(userId: string): string {
  return `user:${userId}`;
}

export function promptEvent(prompt: Prompt): StreamEvent {
  return {
    type: "coaching_prompt",
    data: {
      prompt_id: prompt.id,
      timing_type: prompt.timingType,
      priority: prompt.priority,
      title: prompt.content.title,
      message: prompt.content.message,
      quick_replies: prompt.content.quickReplies.map((r) => ({
        text: r.text,
        value: r.value,
        next_step: r.nextStep ?? null,
      })),
      expires_at: new Date(prompt.expiresAt).toISOString(),
    },
  };
}

export function heartbeatEvent(now: number): StreamEvent {
  return { type: "heartbeat", data: { timestamp: new Date(now).toISOString() } };
}

export function errorEvent(code: string, message: string): StreamEvent {
  return { type: "error", data: { code, message } };
}
