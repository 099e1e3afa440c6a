import type { Logger } from "../logging/logger.js";

export type PubSubHandler = (payload: string) => void;

/**
 * Minimal topic fan-out shared by every engine process. Payloads are
 * strings on the wire; `publish` resolves to the number of subscribers
 * that received the message.
 */
export interface PubSub {
  publish(topic: string, payload: string): Promise<number>;
  subscribe(topic: string, handler: PubSubHandler): Promise<void>;
  unsubscribe(topic: string, handler: PubSubHandler): Promise<void>;
  close(): Promise<void>;
}

/**
 * Process-local hub. Several registries sharing one instance behave like
 * several processes sharing one broker.
 */
export class InMemoryPubSub implements PubSub {
  private readonly topics = new Map<string, Set<PubSubHandler>>();
  private closed = false;

  constructor(private readonly logger?: Logger) {}

  async publish(topic: string, payload: string): Promise<number> {
    if (this.closed) return 0;
    const handlers = this.topics.get(topic);
    if (!handlers) return 0;

    let received = 0;
    for (const handler of [...handlers]) {
      try {
        handler(payload);
        received++;
      } catch (err) {
        this.logger?.error({ err, topic }, "Subscriber threw while handling message");
      }
    }
    return received;
  }

  async subscribe(topic: string, handler: PubSubHandler): Promise<void> {
    let handlers = this.topics.get(topic);
    if (!handlers) {
      handlers = new Set();
      this.topics.set(topic, handlers);
    }
    handlers.add(handler);
  }

  async unsubscribe(topic: string, handler: PubSubHandler): Promise<void> {
    const handlers = this.topics.get(topic);
    if (!handlers) return;
    handlers.delete(handler);
    if (handlers.size === 0) this.topics.delete(topic);
  }

  subscriberCount(topic: string): number {
    return this.topics.get(topic)?.size ?? 0;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.topics.clear();
  }
}
