import { randomUUID } from "node:crypto";
import type { z } from "zod";
import type { ConnectionsConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { TypedEventEmitter } from "../utils/typed-emitter.js";
import { systemClock, type Clock } from "../frequency/clock.js";
import type { PubSub, PubSubHandler } from "./pubsub.js";
import type { PresenceStore } from "./presence.js";
import {
  ACK_TOPIC,
  PRESENCE_TOPIC,
  ackMessageSchema,
  heartbeatEvent,
  presenceMessageSchema,
  streamEventSchema,
  userTopic,
  type AckMessage,
  type PresenceMessage,
  type StreamEvent,
} from "./events.js";

/** One live client stream, owned by the transport that opened it. */
export interface ConnectionHandle {
  readonly id: string;
  readonly userId: string;
  send(event: StreamEvent): Promise<void>;
  close(): void;
}

export type AckOutcome =
  | { readonly kind: "acked"; readonly at: number }
  | { readonly kind: "timeout" }
  | { readonly kind: "connection_lost" };

export interface AckWait {
  readonly result: Promise<AckOutcome>;
  cancel(): void;
}

/** Events seen from every process, not only this one. */
export interface RegistryEvents {
  connected: (userId: string, connectionId: string) => void;
  disconnected: (userId: string, connectionId: string) => void;
  ack: (ack: AckMessage) => void;
}

interface LocalConnection {
  readonly handle: ConnectionHandle;
  readonly createdAt: number;
  lastActivity: number;
}

export interface ConnectionRegistryDeps {
  pubsub: PubSub;
  presence: PresenceStore;
  config: ConnectionsConfig;
  logger: Logger;
  clock?: Clock;
}

/**
 * Live client connections for this process, plus the shared topics that let
 * any process reach a user connected somewhere else.
 */
export class ConnectionRegistry {
  readonly events = new TypedEventEmitter<RegistryEvents>({
    maxListeners: 200,
    onListenerError: (event, err) => {
      this.logger.error({ err, event }, "Registry event listener threw");
    },
  });
  readonly processId: string;

  private readonly pubsub: PubSub;
  private readonly presence: PresenceStore;
  private readonly config: ConnectionsConfig;
  private readonly logger: Logger;
  private readonly clock: Clock;

  private readonly byUser = new Map<string, Map<string, LocalConnection>>();
  private readonly byId = new Map<string, LocalConnection>();
  private readonly userHandlers = new Map<string, PubSubHandler>();
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private pruneTimer: ReturnType<typeof setInterval> | null = null;
  private started = false;

  private readonly onAck: PubSubHandler = (payload) => {
    const ack = parseJson(payload, ackMessageSchema);
    if (ack) this.events.emit("ack", ack);
  };

  private readonly onPresence: PubSubHandler = (payload) => {
    const msg = parseJson(payload, presenceMessageSchema);
    if (!msg) return;
    if (msg.kind === "connected") {
      this.events.emit("connected", msg.userId, msg.connectionId);
    } else {
      this.events.emit("disconnected", msg.userId, msg.connectionId);
    }
  };

  constructor(deps: ConnectionRegistryDeps) {
    this.pubsub = deps.pubsub;
    this.presence = deps.presence;
    this.config = deps.config;
    this.logger = deps.logger;
    this.clock = deps.clock ?? systemClock;
    this.processId = deps.config.processId ?? `pacer-${process.pid}-${randomUUID().slice(0, 8)}`;
  }

  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;
    await this.pubsub.subscribe(ACK_TOPIC, this.onAck);
    await this.pubsub.subscribe(PRESENCE_TOPIC, this.onPresence);

    this.heartbeatTimer = setInterval(() => {
      this.sendHeartbeats();
    }, this.config.heartbeatIntervalMs);
    this.heartbeatTimer.unref();

    this.pruneTimer = setInterval(() => {
      this.pruneStale().catch((err) => {
        this.logger.error({ err }, "Connection prune failed");
      });
    }, this.config.pruneIntervalMs);
    this.pruneTimer.unref();

    this.logger.info({ processId: this.processId }, "Connection registry started");
  }

  async stop(): Promise<void> {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    if (this.pruneTimer) {
      clearInterval(this.pruneTimer);
      this.pruneTimer = null;
    }

    for (const conn of [...this.byId.values()]) {
      await this.unregister(conn.handle.id, "shutdown");
    }
    this.presence.removeProcess(this.processId);

    if (this.started) {
      await this.pubsub.unsubscribe(ACK_TOPIC, this.onAck);
      await this.pubsub.unsubscribe(PRESENCE_TOPIC, this.onPresence);
      this.started = false;
    }
    this.logger.info({ processId: this.processId }, "Connection registry stopped");
  }

  // ── Local connections ──

  async register(handle: ConnectionHandle): Promise<void> {
    const now = this.clock();
    const conn: LocalConnection = { handle, createdAt: now, lastActivity: now };

    let conns = this.byUser.get(handle.userId);
    if (!conns) {
      conns = new Map();
      this.byUser.set(handle.userId, conns);
    }
    conns.set(handle.id, conn);
    this.byId.set(handle.id, conn);

    if (!this.userHandlers.has(handle.userId)) {
      const fanOut: PubSubHandler = (payload) => this.fanOut(handle.userId, payload);
      this.userHandlers.set(handle.userId, fanOut);
      await this.pubsub.subscribe(userTopic(handle.userId), fanOut);
    }

    this.presence.add({
      connectionId: handle.id,
      userId: handle.userId,
      processId: this.processId,
      createdAt: now,
    });
    await this.publishPresence({
      kind: "connected",
      userId: handle.userId,
      connectionId: handle.id,
      processId: this.processId,
    });
    this.logger.info({ userId: handle.userId, connectionId: handle.id }, "Connection registered");
  }

  async unregister(connectionId: string, reason: string): Promise<boolean> {
    const conn = this.byId.get(connectionId);
    if (!conn) return false;
    const { userId } = conn.handle;

    this.byId.delete(connectionId);
    const conns = this.byUser.get(userId);
    conns?.delete(connectionId);
    if (conns && conns.size === 0) {
      this.byUser.delete(userId);
      const handler = this.userHandlers.get(userId);
      this.userHandlers.delete(userId);
      if (handler) await this.pubsub.unsubscribe(userTopic(userId), handler);
    }

    try {
      conn.handle.close();
    } catch (err) {
      this.logger.debug({ err, connectionId }, "Closing connection handle threw");
    }

    this.presence.remove(connectionId);
    await this.publishPresence({ kind: "disconnected", userId, connectionId, processId: this.processId });
    this.logger.info({ userId, connectionId, reason }, "Connection unregistered");
    return true;
  }

  /** Record client activity. Returns false for an unknown connection. */
  touch(connectionId: string): boolean {
    const conn = this.byId.get(connectionId);
    if (!conn) return false;
    const now = this.clock();
    conn.lastActivity = now;
    this.presence.touch(connectionId, now);
    return true;
  }

  /** Record activity on every local connection of a user. */
  touchUser(userId: string): number {
    const conns = this.byUser.get(userId);
    if (!conns) return 0;
    for (const id of conns.keys()) this.touch(id);
    return conns.size;
  }

  localConnectionCount(): number {
    return this.byId.size;
  }

  localConnectionsFor(userId: string): string[] {
    return [...(this.byUser.get(userId)?.keys() ?? [])];
  }

  /** True when the user has a live connection in any process. */
  hasConnection(userId: string): boolean {
    return this.presence.connectionsFor(userId).length > 0;
  }

  // ── Messaging ──

  /** Publish to every connection of the user, wherever it lives. */
  async sendToUser(userId: string, event: StreamEvent): Promise<number> {
    return this.pubsub.publish(userTopic(userId), JSON.stringify(event));
  }

  async publishAck(ack: AckMessage): Promise<void> {
    await this.pubsub.publish(ACK_TOPIC, JSON.stringify(ack));
  }

  /**
   * Start waiting for the client to acknowledge `promptId`. Settles on the
   * ack, when the user's last connection anywhere goes away, or after
   * `timeoutMs`. Call `cancel` to stop waiting early.
   */
  waitForAck(promptId: string, userId: string, timeoutMs: number): AckWait {
    let settle: (outcome: AckOutcome) => void = () => {};
    const result = new Promise<AckOutcome>((resolve) => {
      settle = resolve;
    });

    const onAck = (ack: AckMessage): void => {
      if (ack.promptId === promptId) finish({ kind: "acked", at: ack.at });
    };
    const onDisconnected = (uid: string): void => {
      if (uid === userId && !this.hasConnection(userId)) finish({ kind: "connection_lost" });
    };
    const timer = setTimeout(() => finish({ kind: "timeout" }), timeoutMs);
    const finish = (outcome: AckOutcome): void => {
      clearTimeout(timer);
      this.events.off("ack", onAck);
      this.events.off("disconnected", onDisconnected);
      settle(outcome);
    };

    this.events.on("ack", onAck);
    this.events.on("disconnected", onDisconnected);
    return { result, cancel: () => finish({ kind: "timeout" }) };
  }

  // ── Liveness ──

  /**
   * Write a heartbeat to every local connection. A write that succeeds says
   * nothing about the client; only its own frames and pings count as activity.
   */
  sendHeartbeats(): void {
    const event = heartbeatEvent(this.clock());
    for (const conn of [...this.byId.values()]) {
      conn.handle.send(event).catch((err) => {
        this.drop(conn.handle, err);
      });
    }
  }

  /**
   * Drop local connections silent past the stale timeout, and presence rows
   * whose owning process stopped refreshing them.
   */
  async pruneStale(): Promise<number> {
    const cutoff = this.clock() - this.config.staleTimeoutMs;
    let pruned = 0;

    for (const conn of [...this.byId.values()]) {
      if (conn.lastActivity < cutoff) {
        await this.unregister(conn.handle.id, "stale");
        pruned++;
      }
    }

    for (const entry of this.presence.pruneOlderThan(cutoff)) {
      await this.publishPresence({
        kind: "disconnected",
        userId: entry.userId,
        connectionId: entry.connectionId,
        processId: entry.processId,
      });
      pruned++;
    }

    if (pruned > 0) this.logger.info({ pruned }, "Pruned stale connections");
    return pruned;
  }

  // ── Internals ──

  private fanOut(userId: string, payload: string): void {
    const event = parseJson(payload, streamEventSchema);
    if (!event) {
      this.logger.warn({ userId }, "Dropping malformed user event");
      return;
    }
    for (const conn of this.byUser.get(userId)?.values() ?? []) {
      conn.handle.send(event).catch((err) => {
        this.drop(conn.handle, err);
      });
    }
  }

  private drop(handle: ConnectionHandle, err: unknown): void {
    this.logger.warn({ err, userId: handle.userId, connectionId: handle.id }, "Connection write failed");
    this.unregister(handle.id, "write_failed").catch((unregisterErr) => {
      this.logger.error({ err: unregisterErr, connectionId: handle.id }, "Failed to unregister connection");
    });
  }

  private async publishPresence(msg: PresenceMessage): Promise<void> {
    await this.pubsub.publish(PRESENCE_TOPIC, JSON.stringify(msg));
  }
}

function parseJson<T>(payload: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch {
    return null;
  }
  const result = schema.safeParse(raw);
  return result.success ? result.data : null;
}
