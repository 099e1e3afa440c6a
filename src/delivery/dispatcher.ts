import type { DeliveryConfig } from "../config/types.js";
import type { Channel, PreferenceReader, Prompt } from "../coaching/types.js";
import { ConnectionLost, DeliveryError, TimeoutError, describe } from "../coaching/errors.js";
import { cancelPrompt, type PromptStore } from "../prompts/store.js";
import type { Logger } from "../logging/logger.js";
import type { ConnectionRegistry } from "../connections/registry.js";
import { TypedEventEmitter } from "../utils/typed-emitter.js";
import { backoffDelay } from "../utils/backoff.js";
import { withTimeout } from "../utils/timeout.js";
import { systemClock, type Clock } from "../frequency/clock.js";
import { quietHoursEnd } from "../frequency/quiet-hours.js";
import { DeliveryQueue } from "./priority-queue.js";
import { selectChannel, type ChannelSink, type SendResult } from "./channels.js";

export interface DispatcherEvents {
  delivered: (prompt: Prompt) => void;
  failed: (prompt: Prompt) => void;
  parked: (prompt: Prompt) => void;
}

export interface DeliveryDispatcherDeps {
  store: PromptStore;
  preferences: PreferenceReader;
  registry: ConnectionRegistry;
  sinks: readonly ChannelSink[];
  config: DeliveryConfig;
  logger: Logger;
  clock?: Clock;
}

/**
 * Priority queue plus a fixed pool of async workers. The store is the source
 * of truth: the in-memory queue only orders prompt ids, and every attempt
 * re-reads the prompt and moves it with a compare-and-swap.
 */
export class DeliveryDispatcher {
  readonly events = new TypedEventEmitter<DispatcherEvents>({
    onListenerError: (event, err) => {
      this.logger.error({ err, event }, "Dispatcher event listener threw");
    },
  });

  private readonly store: PromptStore;
  private readonly preferences: PreferenceReader;
  private readonly registry: ConnectionRegistry;
  private readonly sinks: ReadonlyMap<Channel, ChannelSink>;
  private readonly config: DeliveryConfig;
  private readonly logger: Logger;
  private readonly clock: Clock;

  private readonly queue: DeliveryQueue;
  private readonly parked = new Map<string, Set<string>>();
  private readonly parkedIds = new Set<string>();
  private readonly inFlight = new Set<string>();
  private active = 0;
  private scheduled = false;
  private running = false;
  private pumpTimer: ReturnType<typeof setInterval> | null = null;
  private drainWaiters: Array<() => void> = [];

  private readonly onConnected = (userId: string): void => {
    this.unpark(userId);
  };

  constructor(deps: DeliveryDispatcherDeps) {
    this.store = deps.store;
    this.preferences = deps.preferences;
    this.registry = deps.registry;
    this.sinks = new Map(deps.sinks.map((s) => [s.channel, s]));
    this.config = deps.config;
    this.logger = deps.logger;
    this.clock = deps.clock ?? systemClock;
    this.queue = new DeliveryQueue(deps.config.queueCapacity);
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.registry.events.on("connected", this.onConnected);

    const recovered = this.recoverInterrupted();
    if (recovered > 0) {
      this.logger.info({ recovered }, "Requeued prompts interrupted mid-delivery");
    }
    // Parking is per process; let the pump sort out who is reachable now.
    const unparked = this.store.clearParked();
    if (unparked > 0) {
      this.logger.info({ unparked }, "Released prompts parked before restart");
    }

    this.pumpTimer = setInterval(() => {
      this.pump();
    }, this.config.pumpIntervalMs);
    this.pumpTimer.unref();
    this.pump();

    this.logger.info(
      { workers: this.config.workers, capacity: this.config.queueCapacity },
      "Delivery dispatcher started",
    );
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.registry.events.off("connected", this.onConnected);
    if (this.pumpTimer) {
      clearInterval(this.pumpTimer);
      this.pumpTimer = null;
    }
    // Queued ids are dropped; the rows stay QUEUED and the next start re-offers them.
    this.queue.clear();
    await this.drain();
    this.logger.info("Delivery dispatcher stopped");
  }

  get queueDepth(): number {
    return this.queue.size;
  }

  get activeCount(): number {
    return this.active;
  }

  get parkedCount(): number {
    return this.parkedIds.size;
  }

  /**
   * Offer a prompt for delivery, moving it PENDING → QUEUED first. Returns
   * false when it could not be queued in memory right now; a QUEUED row is
   * picked up again by the pump.
   */
  enqueue(prompt: Prompt): boolean {
    let current: Prompt | null = prompt;
    if (current.state === "pending") {
      current = this.store.transition(current.id, "pending", "queued") ?? this.store.get(current.id);
    }
    if (!current || current.state !== "queued") return false;
    if (this.inFlight.has(current.id) || this.parkedIds.has(current.id)) return false;

    const accepted = this.queue.push({
      promptId: current.id,
      priority: current.priority,
      retryCount: current.retryCount,
    });
    if (!accepted) {
      if (!this.queue.has(current.id)) {
        this.logger.warn({ promptId: current.id, depth: this.queue.size }, "Delivery queue full");
      }
      return false;
    }

    this.schedule();
    return true;
  }

  /** Re-offer due prompts from the store. Covers retry wake-ups and restarts. */
  pump(): number {
    const due = this.store.listDue(this.clock(), this.config.pumpBatch);
    let offered = 0;
    for (const prompt of due) {
      if (this.queue.has(prompt.id)) continue;
      if (this.enqueue(prompt)) offered++;
    }
    if (offered > 0) this.logger.debug({ offered }, "Pump re-offered due prompts");
    return offered;
  }

  /** Expire undelivered prompts past their TTL, and delivered ones nobody answered. */
  sweepExpired(): number {
    const now = this.clock();
    let expired = 0;

    for (const prompt of this.store.listExpirable(now)) {
      if (this.store.transition(prompt.id, prompt.state, "expired")) {
        this.forget(prompt);
        expired++;
      }
    }
    for (const prompt of this.store.listUnansweredExpired(now)) {
      if (this.store.transition(prompt.id, "delivered", "expired")) expired++;
    }

    if (expired > 0) this.logger.info({ expired }, "Expired stale prompts");
    return expired;
  }

  /**
   * External cancellation. Anything not yet answered becomes EXPIRED; a
   * prompt mid-attempt cannot be cancelled until the attempt settles.
   */
  cancel(promptId: string): Prompt | null {
    const cancelled = cancelPrompt(this.store, promptId);
    if (!cancelled) return null;
    this.forget(cancelled.prompt);
    this.logger.info(
      { promptId, userId: cancelled.prompt.userId, from: cancelled.from },
      "Prompt cancelled",
    );
    return cancelled.prompt;
  }

  /** Wait until no attempt is running and nothing is queued in memory. */
  async drain(): Promise<void> {
    if (this.isIdle()) return;
    return new Promise<void>((resolve) => {
      this.drainWaiters.push(resolve);
    });
  }

  // ── Worker pool ──

  private schedule(): void {
    if (this.scheduled) return;
    this.scheduled = true;
    queueMicrotask(() => {
      this.scheduled = false;
      this.runWorkers();
    });
  }

  private runWorkers(): void {
    while (this.active < this.config.workers) {
      const entry = this.queue.pop();
      if (!entry) break;
      this.active++;
      this.inFlight.add(entry.promptId);

      this.attempt(entry.promptId)
        .catch((err) => {
          this.logger.error({ err, promptId: entry.promptId }, "Delivery attempt crashed");
        })
        .finally(() => {
          this.inFlight.delete(entry.promptId);
          this.active--;
          this.runWorkers();
          this.checkDrain();
        });
    }
    this.checkDrain();
  }

  private async attempt(promptId: string): Promise<void> {
    const prompt = this.store.get(promptId);
    if (!prompt || prompt.state !== "queued") {
      this.logger.debug({ promptId, state: prompt?.state }, "Skipping prompt no longer queued");
      return;
    }

    const now = this.clock();
    if (prompt.expiresAt <= now) {
      this.store.transition(prompt.id, "queued", "expired");
      return;
    }

    const prefs = this.preferences.get(prompt.userId);
    const resumeAt = quietHoursEnd(prefs.quietHours, now, prefs.timezone);
    if (resumeAt !== null) {
      if (this.store.reschedule(prompt.id, resumeAt)) {
        this.logger.debug({ promptId, userId: prompt.userId, resumeAt }, "Quiet hours, delivery deferred");
      }
      return;
    }

    const selection = selectChannel(prompt, prefs, this.config.channelOrder, this.sinks);

    if (selection.kind === "none") {
      const failed = this.store.transition(prompt.id, "queued", "failed", { lastError: "no_channel" });
      if (failed) {
        this.logger.warn({ promptId, userId: prompt.userId }, "No enabled delivery channel for prompt");
        this.events.emit("failed", failed);
      }
      return;
    }
    if (selection.kind === "park") {
      this.park(prompt);
      return;
    }

    const { sink } = selection;
    const delivering = this.store.transition(prompt.id, "queued", "delivering", { nextAttemptAt: now });
    if (!delivering) {
      this.logger.debug({ promptId }, "Prompt claimed by another worker");
      return;
    }

    const result = await this.send(sink, delivering);
    this.settle(delivering, sink.channel, result);
  }

  private async send(sink: ChannelSink, prompt: Prompt): Promise<SendResult> {
    try {
      return await withTimeout(`${sink.channel} sink`, this.config.sinkTimeoutMs, (signal) =>
        sink.send(prompt, signal),
      );
    } catch (err) {
      return {
        success: false,
        reason: err instanceof TimeoutError ? "timeout" : "sink_error",
        error: describe(err),
      };
    }
  }

  private settle(prompt: Prompt, channel: Channel, result: SendResult): void {
    const now = this.clock();
    const log = { promptId: prompt.id, userId: prompt.userId, timingType: prompt.timingType, channel };

    if (result.success) {
      const delivered = this.store.transition(prompt.id, "delivering", "delivered", {
        channel,
        deliveredAt: now,
        acknowledgedAt: result.acknowledgedAt,
        nextAttemptAt: null,
        lastError: null,
      });
      if (delivered) {
        this.logger.info(log, "Prompt delivered");
        this.events.emit("delivered", delivered);
      }
      return;
    }

    if (result.reason === "connection_lost") {
      const requeued = this.store.transition(prompt.id, "delivering", "queued", {
        nextAttemptAt: null,
        lastError: result.error,
      });
      this.logger.info(
        { ...log, err: new ConnectionLost(prompt.userId, prompt.id) },
        "Connection lost mid-delivery, waiting for reconnect",
      );
      if (requeued) this.park(requeued);
      return;
    }

    const err = new DeliveryError(prompt.id, channel, result.reason, result.error);
    const retryCount = prompt.retryCount + 1;
    if (retryCount >= this.config.maxRetries) {
      const failed = this.store.transition(prompt.id, "delivering", "failed", {
        retryCount,
        nextAttemptAt: null,
        lastError: result.error,
      });
      if (failed) {
        this.logger.warn({ ...log, retryCount, err }, "Prompt delivery failed");
        this.events.emit("failed", failed);
      }
      return;
    }

    const delay = backoffDelay(retryCount, {
      baseDelayMs: this.config.backoffBaseMs,
      maxDelayMs: this.config.backoffMaxMs,
    });
    this.store.transition(prompt.id, "delivering", "queued", {
      retryCount,
      nextAttemptAt: now + delay,
      lastError: result.error,
    });
    this.logger.debug({ ...log, retryCount, delayMs: delay, err }, "Prompt delivery will retry");
  }

  // ── Parking ──

  private park(prompt: Prompt): void {
    if (!this.store.markParked(prompt.id, this.clock())) return;
    let ids = this.parked.get(prompt.userId);
    if (!ids) {
      ids = new Set();
      this.parked.set(prompt.userId, ids);
    }
    ids.add(prompt.id);
    this.parkedIds.add(prompt.id);
    this.logger.debug({ promptId: prompt.id, userId: prompt.userId }, "Prompt parked until user connects");
    this.events.emit("parked", prompt);
  }

  private unpark(userId: string): void {
    for (const id of this.parked.get(userId) ?? []) this.parkedIds.delete(id);
    this.parked.delete(userId);

    // The store also holds prompts another process parked for this user.
    const released = this.store.releaseParked(userId);
    if (released.length === 0) return;

    let offered = 0;
    for (const prompt of released) {
      if (this.enqueue(prompt)) offered++;
    }
    this.logger.debug({ userId, released: released.length, offered }, "Unparked prompts on connect");
  }

  private forget(prompt: Prompt): void {
    this.parkedIds.delete(prompt.id);
    const ids = this.parked.get(prompt.userId);
    ids?.delete(prompt.id);
    if (ids && ids.size === 0) this.parked.delete(prompt.userId);
  }

  // ── Housekeeping ──

  private recoverInterrupted(): number {
    const cutoff = this.clock() - this.config.sinkTimeoutMs * 2;
    let recovered = 0;
    for (const prompt of this.store.listDelivering(cutoff)) {
      if (this.store.transition(prompt.id, "delivering", "queued", { nextAttemptAt: null })) recovered++;
    }
    return recovered;
  }

  private isIdle(): boolean {
    return this.active === 0 && this.queue.size === 0;
  }

  private checkDrain(): void {
    if (!this.isIdle()) return;
    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
