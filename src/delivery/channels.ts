import type { Channel, Prompt, UserNotificationPreference } from "../coaching/types.js";
import type { DeliveryConfig } from "../config/types.js";

export type SendFailureReason =
  | "no_connection"
  | "connection_lost"
  | "ack_timeout"
  | "sink_error"
  | "timeout";

export type SendResult =
  | { readonly success: true; readonly acknowledgedAt?: number }
  | { readonly success: false; readonly reason: SendFailureReason; readonly error: string };

/** Outbound side of one delivery channel. */
export interface ChannelSink {
  readonly channel: Channel;
  /** True when delivery needs a live client connection. */
  readonly requiresConnection: boolean;
  isAvailable(userId: string): boolean;
  send(prompt: Prompt, signal: AbortSignal): Promise<SendResult>;
}

export type ChannelSelection =
  | { readonly kind: "send"; readonly sink: ChannelSink }
  | { readonly kind: "park"; readonly channel: Channel }
  | { readonly kind: "none" };

/**
 * Walk the priority's channel order, skipping channels the user turned off
 * or that have no sink. The first available sink wins. When the only
 * candidates left need a connection the user doesn't have, the prompt waits
 * for one instead.
 */
export function selectChannel(
  prompt: Prompt,
  prefs: UserNotificationPreference,
  channelOrder: DeliveryConfig["channelOrder"],
  sinks: ReadonlyMap<Channel, ChannelSink>,
): ChannelSelection {
  let parkOn: Channel | null = null;

  for (const channel of channelOrder[prompt.priority]) {
    if (!prefs.channels[channel]) continue;
    const sink = sinks.get(channel);
    if (!sink) continue;

    if (sink.isAvailable(prompt.userId)) return { kind: "send", sink };
    if (sink.requiresConnection && parkOn === null) parkOn = channel;
  }

  return parkOn === null ? { kind: "none" } : { kind: "park", channel: parkOn };
}
