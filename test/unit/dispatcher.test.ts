import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { DeliveryDispatcher } from "../../src/delivery/dispatcher.js";
import { InAppSink } from "../../src/delivery/sinks.js";
import type { ChannelSink, SendResult } from "../../src/delivery/channels.js";
import { InMemoryPubSub } from "../../src/connections/pubsub.js";
import { SqlitePresenceStore } from "../../src/connections/presence.js";
import { ConnectionRegistry } from "../../src/connections/registry.js";
import { PromptStore } from "../../src/prompts/store.js";
import { PreferenceStore } from "../../src/preferences/store.js";
import type { Channel, Priority, Prompt } from "../../src/coaching/types.js";
import type { DeliveryConfig } from "../../src/config/types.js";
import {
  openTempDb,
  makeConfig,
  makeTiming,
  makeContent,
  silentLogger,
  FakeClock,
  FakeConnection,
  NOON_UTC,
  type TempDb,
} from "../helpers/fixtures.js";

/** Push-style sink that replays scripted results, succeeding by default. */
class ScriptedSink implements ChannelSink {
  readonly requiresConnection = false;
  readonly sent: string[] = [];
  results: SendResult[] = [];
  failAlways: SendResult | null = null;
  hang = false;
  delayMs = 0;

  constructor(readonly channel: Channel = "push") {}

  isAvailable(): boolean {
    return true;
  }

  async send(prompt: Prompt): Promise<SendResult> {
    this.sent.push(prompt.id);
    if (this.hang) return new Promise<SendResult>(() => {});
    if (this.delayMs > 0) await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    return this.failAlways ?? this.results.shift() ?? { success: true };
  }
}

describe("DeliveryDispatcher", () => {
  let tmp: TempDb;
  let clock: FakeClock;
  let hub: InMemoryPubSub;
  let registry: ConnectionRegistry;
  let remote: ConnectionRegistry;
  let store: PromptStore;
  let preferences: PreferenceStore;
  let push: ScriptedSink;
  let config: DeliveryConfig;
  let dispatcher: DeliveryDispatcher;

  function makeRegistry(processId: string): ConnectionRegistry {
    return new ConnectionRegistry({
      pubsub: hub,
      presence: new SqlitePresenceStore(tmp.db),
      config: { ...makeConfig().connections, processId },
      logger: silentLogger(),
      clock: clock.now,
    });
  }

  function makeDispatcher(overrides: Partial<DeliveryConfig> = {}): DeliveryDispatcher {
    return new DeliveryDispatcher({
      store,
      preferences,
      registry,
      sinks: [new InAppSink(registry, config.ackTimeoutMs), push],
      config: { ...config, ...overrides },
      logger: silentLogger(),
      clock: clock.now,
    });
  }

  function createPrompt(
    subject = "habit-walk",
    priority: Priority = "MEDIUM",
    ttlSeconds = 3_600,
    userId = "user-1",
  ): Prompt {
    const prompt = store.create({
      timing: makeTiming({ userId, priority, metadata: { subject_id: subject } }),
      content: makeContent(),
      state: "pending",
      ttlSeconds,
      now: clock.current,
    });
    if (!prompt) throw new Error("expected prompt");
    return prompt;
  }

  function reload(id: string): Prompt {
    const prompt = store.get(id);
    if (!prompt) throw new Error(`prompt ${id} vanished`);
    return prompt;
  }

  /** A client that acknowledges every prompt it is shown. */
  function ackingConnection(id: string, via: ConnectionRegistry): FakeConnection {
    const conn = new FakeConnection(id);
    conn.onEvent = (event) => {
      if (event.type !== "coaching_prompt") return;
      void via.publishAck({
        promptId: String(event.data["prompt_id"]),
        userId: conn.userId,
        connectionId: conn.id,
        at: clock.current,
      });
    };
    return conn;
  }

  beforeEach(async () => {
    tmp = openTempDb("pacer-dispatch-");
    clock = new FakeClock(NOON_UTC);
    hub = new InMemoryPubSub();
    registry = makeRegistry("proc-a");
    remote = makeRegistry("proc-b");
    await registry.start();
    await remote.start();

    const defaults = makeConfig();
    store = new PromptStore(tmp.db);
    preferences = new PreferenceStore(tmp.db, defaults.frequency.defaults);
    push = new ScriptedSink("push");
    config = makeConfig({
      delivery: {
        workers: 2,
        maxRetries: 3,
        backoffBaseMs: 1_000,
        sinkTimeoutMs: 200,
        ackTimeoutMs: 50,
        pumpIntervalMs: 60_000,
      },
    }).delivery;
    dispatcher = makeDispatcher();
    dispatcher.start();
  });

  afterEach(async () => {
    await dispatcher.stop();
    await registry.stop();
    await remote.stop();
    tmp.cleanup();
  });

  it("delivers in-app once the client acknowledges receipt", async () => {
    const conn = ackingConnection("conn-1", registry);
    await registry.register(conn);
    const delivered = vi.fn();
    dispatcher.events.on("delivered", delivered);

    const prompt = createPrompt();
    expect(dispatcher.enqueue(prompt)).toBe(true);
    await dispatcher.drain();

    const row = reload(prompt.id);
    expect(row.state).toBe("delivered");
    expect(row.channel).toBe("in_app");
    expect(row.deliveredAt).toBe(NOON_UTC);
    expect(row.acknowledgedAt).toBe(NOON_UTC);
    expect(conn.ofType("coaching_prompt")[0]?.data["prompt_id"]).toBe(prompt.id);
    expect(delivered).toHaveBeenCalledTimes(1);
    expect(push.sent).toEqual([]);
  });

  it("reaches a client connected to another process", async () => {
    await remote.register(ackingConnection("conn-remote", remote));
    const prompt = createPrompt();
    dispatcher.enqueue(prompt);
    await dispatcher.drain();

    expect(reload(prompt.id).state).toBe("delivered");
    expect(reload(prompt.id).channel).toBe("in_app");
  });

  it("falls back to push when the user is offline", async () => {
    const prompt = createPrompt();
    dispatcher.enqueue(prompt);
    await dispatcher.drain();

    expect(reload(prompt.id).channel).toBe("push");
    expect(push.sent).toEqual([prompt.id]);
  });

  it("delivers higher priorities first", async () => {
    await dispatcher.stop();
    dispatcher = makeDispatcher({ workers: 1 });
    const low = createPrompt("a", "LOW");
    const high = createPrompt("b", "HIGH");
    const medium = createPrompt("c", "MEDIUM");

    dispatcher.enqueue(low);
    dispatcher.enqueue(high);
    dispatcher.enqueue(medium);
    await dispatcher.drain();

    expect(push.sent).toEqual([high.id, medium.id, low.id]);
  });

  it("backs off after a failure and gives up at the retry limit", async () => {
    push.failAlways = { success: false, reason: "sink_error", error: "HTTP 502 Bad Gateway" };
    const failed = vi.fn();
    dispatcher.events.on("failed", failed);

    const prompt = createPrompt();
    dispatcher.enqueue(prompt);
    await dispatcher.drain();

    let row = reload(prompt.id);
    expect(row.state).toBe("queued");
    expect(row.retryCount).toBe(1);
    expect(row.nextAttemptAt).toBe(NOON_UTC + 1_000);
    expect(row.lastError).toBe("HTTP 502 Bad Gateway");
    expect(dispatcher.pump()).toBe(0);

    clock.advance(1_000);
    expect(dispatcher.pump()).toBe(1);
    await dispatcher.drain();
    row = reload(prompt.id);
    expect(row.retryCount).toBe(2);
    expect(row.nextAttemptAt).toBe(NOON_UTC + 1_000 + 2_000);

    clock.advance(2_000);
    dispatcher.pump();
    await dispatcher.drain();
    row = reload(prompt.id);
    expect(row.state).toBe("failed");
    expect(row.retryCount).toBe(3);
    expect(row.channel).toBeNull();
    expect(failed).toHaveBeenCalledTimes(1);
  });

  it("counts a missing acknowledgement as a failed attempt", async () => {
    await registry.register(new FakeConnection("silent"));
    const prompt = createPrompt();
    dispatcher.enqueue(prompt);
    await dispatcher.drain();

    const row = reload(prompt.id);
    expect(row.state).toBe("queued");
    expect(row.retryCount).toBe(1);
    expect(row.lastError).toBe("No receipt within 50ms");
  });

  it("times out a sink that never answers", async () => {
    push.hang = true;
    const prompt = createPrompt();
    dispatcher.enqueue(prompt);
    await dispatcher.drain();

    const row = reload(prompt.id);
    expect(row.state).toBe("queued");
    expect(row.lastError).toBe("push sink timed out after 200ms");
  });

  it("parks in-app-only prompts until the user connects", async () => {
    preferences.upsert("user-1", { channels: { push: false, email: false } });
    const parked = vi.fn();
    dispatcher.events.on("parked", parked);

    const prompt = createPrompt();
    dispatcher.enqueue(prompt);
    await dispatcher.drain();

    expect(parked).toHaveBeenCalledTimes(1);
    expect(dispatcher.parkedCount).toBe(1);
    expect(reload(prompt.id).state).toBe("queued");
    expect(dispatcher.pump()).toBe(0);

    await remote.register(ackingConnection("conn-1", remote));
    await dispatcher.drain();

    expect(dispatcher.parkedCount).toBe(0);
    expect(reload(prompt.id).state).toBe("delivered");
    expect(reload(prompt.id).retryCount).toBe(0);
  });

  it("keeps parked prompts from crowding due retries out of the pump", async () => {
    await dispatcher.stop();
    dispatcher = makeDispatcher({ pumpBatch: 2 });
    dispatcher.start();
    preferences.upsert("offline", { channels: { push: false, email: false } });

    for (const subject of ["a", "b", "c"]) dispatcher.enqueue(createPrompt(subject, "MEDIUM", 3_600, "offline"));
    await dispatcher.drain();
    expect(dispatcher.parkedCount).toBe(3);

    clock.advance(1_000);
    push.results = [{ success: false, reason: "sink_error", error: "HTTP 503 Service Unavailable" }];
    const retry = createPrompt("d");
    dispatcher.enqueue(retry);
    await dispatcher.drain();
    expect(reload(retry.id).nextAttemptAt).toBe(NOON_UTC + 2_000);

    clock.advance(60_000);
    expect(dispatcher.pump()).toBe(1);
    await dispatcher.drain();
    expect(reload(retry.id).state).toBe("delivered");
    expect(push.sent).toEqual([retry.id, retry.id]);
  });

  it("re-parks prompts left parked by an earlier run", async () => {
    preferences.upsert("user-1", { channels: { push: false, email: false } });
    const prompt = createPrompt();
    dispatcher.enqueue(prompt);
    await dispatcher.drain();
    await dispatcher.stop();

    dispatcher = makeDispatcher();
    dispatcher.start();
    await dispatcher.drain();
    expect(dispatcher.parkedCount).toBe(1);

    await remote.register(ackingConnection("conn-1", remote));
    await dispatcher.drain();
    expect(reload(prompt.id).state).toBe("delivered");
  });

  it("redelivers on reconnect when the connection drops before receipt", async () => {
    preferences.upsert("user-1", { channels: { push: false, email: false } });
    const flaky = new FakeConnection("flaky");
    flaky.onEvent = () => {
      void registry.unregister(flaky.id, "client_closed");
    };
    await registry.register(flaky);

    const prompt = createPrompt();
    dispatcher.enqueue(prompt);
    await dispatcher.drain();

    let row = reload(prompt.id);
    expect(row.state).toBe("queued");
    expect(row.retryCount).toBe(0);
    expect(row.lastError).toBe("Connection closed before receipt");
    expect(dispatcher.parkedCount).toBe(1);

    const steady = ackingConnection("steady", registry);
    await registry.register(steady);
    await dispatcher.drain();

    row = reload(prompt.id);
    expect(row.state).toBe("delivered");
    expect(steady.ofType("coaching_prompt")).toHaveLength(1);
  });

  describe("quiet hours", () => {
    const LATE = Date.UTC(2025, 2, 12, 23, 30);
    const MORNING = Date.UTC(2025, 2, 13, 8, 1);

    it("holds a prompt until the window ends", async () => {
      clock.current = LATE;
      const prompt = createPrompt("a", "HIGH", 86_400);
      dispatcher.enqueue(prompt);
      await dispatcher.drain();

      let row = reload(prompt.id);
      expect(row.state).toBe("queued");
      expect(row.nextAttemptAt).toBe(MORNING);
      expect(row.retryCount).toBe(0);
      expect(push.sent).toEqual([]);
      expect(dispatcher.pump()).toBe(0);

      clock.current = MORNING;
      expect(dispatcher.pump()).toBe(1);
      await dispatcher.drain();
      row = reload(prompt.id);
      expect(row.state).toBe("delivered");
      expect(row.deliveredAt).toBe(MORNING);
    });

    it("does not deliver a parked prompt when the user reconnects at night", async () => {
      preferences.upsert("user-1", { channels: { push: false, email: false } });
      const prompt = createPrompt("a", "MEDIUM", 86_400);
      dispatcher.enqueue(prompt);
      await dispatcher.drain();

      clock.current = LATE;
      const conn = ackingConnection("conn-1", remote);
      await remote.register(conn);
      await dispatcher.drain();

      const row = reload(prompt.id);
      expect(row.state).toBe("queued");
      expect(row.nextAttemptAt).toBe(MORNING);
      expect(conn.ofType("coaching_prompt")).toEqual([]);
      expect(dispatcher.parkedCount).toBe(0);
    });

    it("does not retry into the window", async () => {
      clock.current = Date.UTC(2025, 2, 12, 21, 59, 59, 500);
      push.results = [{ success: false, reason: "sink_error", error: "HTTP 502 Bad Gateway" }];
      const prompt = createPrompt("a", "MEDIUM", 86_400);
      dispatcher.enqueue(prompt);
      await dispatcher.drain();
      expect(reload(prompt.id).nextAttemptAt).toBe(Date.UTC(2025, 2, 12, 22, 0, 0, 500));

      clock.advance(1_000);
      expect(dispatcher.pump()).toBe(1);
      await dispatcher.drain();

      const row = reload(prompt.id);
      expect(row.state).toBe("queued");
      expect(row.retryCount).toBe(1);
      expect(row.nextAttemptAt).toBe(MORNING);
      expect(push.sent).toEqual([prompt.id]);
    });

    it("holds a deferred follow-up that comes due at night", async () => {
      const followUp = store.create({
        timing: makeTiming({ type: "follow_up", metadata: { subject_id: "snooze-1" } }),
        content: makeContent(),
        state: "pending",
        ttlSeconds: 86_400,
        notBefore: Date.UTC(2025, 2, 12, 23, 0),
        now: clock.current,
      });
      if (!followUp) throw new Error("expected prompt");

      clock.current = Date.UTC(2025, 2, 12, 23, 0);
      expect(dispatcher.pump()).toBe(1);
      await dispatcher.drain();

      expect(reload(followUp.id).state).toBe("queued");
      expect(reload(followUp.id).nextAttemptAt).toBe(MORNING);
      expect(push.sent).toEqual([]);
    });
  });

  it("sends each prompt once when two dispatchers race for it", async () => {
    push.delayMs = 5;
    const rival = makeDispatcher({ workers: 4 });
    rival.start();
    try {
      const prompts = ["a", "b", "c", "d", "e"].map((subject) => createPrompt(subject));
      for (const prompt of prompts) {
        dispatcher.enqueue(prompt);
        rival.enqueue(reload(prompt.id));
      }
      dispatcher.pump();
      rival.pump();
      await Promise.all([dispatcher.drain(), rival.drain()]);

      expect([...push.sent].sort()).toEqual(prompts.map((p) => p.id).sort());
      for (const prompt of prompts) expect(reload(prompt.id).state).toBe("delivered");
    } finally {
      await rival.stop();
    }
  });

  it("fails a prompt with no enabled channel", async () => {
    preferences.upsert("user-1", { channels: { in_app: false, push: false, email: false } });
    const prompt = createPrompt();
    dispatcher.enqueue(prompt);
    await dispatcher.drain();

    const row = reload(prompt.id);
    expect(row.state).toBe("failed");
    expect(row.lastError).toBe("no_channel");
  });

  it("expires a prompt whose TTL ran out while it waited", async () => {
    const prompt = createPrompt("a", "MEDIUM", 1);
    clock.advance(2_000);
    dispatcher.enqueue(prompt);
    await dispatcher.drain();

    expect(reload(prompt.id).state).toBe("expired");
    expect(push.sent).toEqual([]);
  });

  it("refuses prompts that are not pending or queued", async () => {
    const prompt = createPrompt();
    store.transition(prompt.id, "pending", "expired");
    expect(dispatcher.enqueue(reload(prompt.id))).toBe(false);
  });

  describe("cancel", () => {
    it("expires a parked prompt and forgets it", async () => {
      preferences.upsert("user-1", { channels: { push: false, email: false } });
      const prompt = createPrompt();
      dispatcher.enqueue(prompt);
      await dispatcher.drain();

      const cancelled = dispatcher.cancel(prompt.id);
      expect(cancelled?.state).toBe("expired");
      expect(cancelled?.lastError).toBe("cancelled");
      expect(dispatcher.parkedCount).toBe(0);
    });

    it("expires a delivered prompt nobody answered", async () => {
      const prompt = createPrompt();
      dispatcher.enqueue(prompt);
      await dispatcher.drain();
      expect(dispatcher.cancel(prompt.id)?.state).toBe("expired");
      expect(dispatcher.cancel(prompt.id)).toBeNull();
    });
  });

  describe("sweepExpired", () => {
    it("expires waiting and unanswered prompts past their TTL", async () => {
      const waiting = createPrompt("a", "MEDIUM", 60);
      const delivered = createPrompt("b", "MEDIUM", 60);
      dispatcher.enqueue(delivered);
      await dispatcher.drain();
      const fresh = createPrompt("c", "MEDIUM", 3_600);

      clock.advance(61_000);
      expect(dispatcher.sweepExpired()).toBe(2);
      expect(reload(waiting.id).state).toBe("expired");
      expect(reload(delivered.id).state).toBe("expired");
      expect(reload(fresh.id).state).toBe("pending");
    });
  });

  it("requeues prompts left mid-delivery by a crashed process", async () => {
    await dispatcher.stop();
    const prompt = createPrompt();
    store.transition(prompt.id, "pending", "queued");
    store.transition(prompt.id, "queued", "delivering", { nextAttemptAt: NOON_UTC - 10_000 });

    dispatcher = makeDispatcher();
    dispatcher.start();
    await dispatcher.drain();

    expect(reload(prompt.id).state).toBe("delivered");
    expect(push.sent).toEqual([prompt.id]);
  });
});
