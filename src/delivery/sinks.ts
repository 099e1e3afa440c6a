import type { Channel, Prompt } from "../coaching/types.js";
import type { WebhookSinkConfig } from "../config/types.js";
import type { ConnectionRegistry } from "../connections/registry.js";
import { promptEvent } from "../connections/events.js";
import { describe } from "../coaching/errors.js";
import type { ChannelSink, SendResult } from "./channels.js";

/**
 * In-app delivery over the live stream. Success means the client confirmed
 * receipt, not merely that a process had a socket for the user.
 */
export class InAppSink implements ChannelSink {
  readonly channel = "in_app" satisfies Channel;
  readonly requiresConnection = true;

  constructor(
    private readonly registry: ConnectionRegistry,
    private readonly ackTimeoutMs: number,
  ) {}

  isAvailable(userId: string): boolean {
    return this.registry.hasConnection(userId);
  }

  async send(prompt: Prompt, _signal: AbortSignal): Promise<SendResult> {
    const wait = this.registry.waitForAck(prompt.id, prompt.userId, this.ackTimeoutMs);

    const receivers = await this.registry.sendToUser(prompt.userId, promptEvent(prompt));
    if (receivers === 0) {
      wait.cancel();
      return { success: false, reason: "no_connection", error: `No live connection for user ${prompt.userId}` };
    }

    const outcome = await wait.result;
    switch (outcome.kind) {
      case "acked":
        return { success: true, acknowledgedAt: outcome.at };
      case "connection_lost":
        return { success: false, reason: "connection_lost", error: "Connection closed before receipt" };
      case "timeout":
        return { success: false, reason: "ack_timeout", error: `No receipt within ${this.ackTimeoutMs}ms` };
    }
  }
}

/** Hands push and email off to an external provider over HTTP. */
export class WebhookSink implements ChannelSink {
  readonly requiresConnection = false;

  constructor(
    readonly channel: Exclude<Channel, "in_app">,
    private readonly config: WebhookSinkConfig,
  ) {}

  isAvailable(_userId: string): boolean {
    return true;
  }

  async send(prompt: Prompt, signal: AbortSignal): Promise<SendResult> {
    try {
      const response = await fetch(this.config.url, {
        method: "POST",
        headers: { "content-type": "application/json", ...this.config.headers },
        body: JSON.stringify({
          channel: this.channel,
          user_id: prompt.userId,
          prompt_id: prompt.id,
          ...promptEvent(prompt).data,
        }),
        signal,
      });
      if (!response.ok) {
        return { success: false, reason: "sink_error", error: `HTTP ${response.status} ${response.statusText}` };
      }
      return { success: true };
    } catch (err) {
      return { success: false, reason: "sink_error", error: describe(err) };
    }
  }
}
