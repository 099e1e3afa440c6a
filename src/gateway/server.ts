import { randomUUID } from "node:crypto";
import { Hono, type Context } from "hono";
import { streamSSE } from "hono/streaming";
import { serve } from "@hono/node-server";
import { createNodeWebSocket } from "@hono/node-ws";
import type { WSContext } from "hono/ws";
import { z } from "zod";
import type { ServerConfig } from "../config/types.js";
import { PROMPT_STATES, type Prompt } from "../coaching/types.js";
import { ValidationError, type ValidationCode } from "../coaching/errors.js";
import type { PromptStore } from "../prompts/store.js";
import type { ConnectionHandle, ConnectionRegistry } from "../connections/registry.js";
import { errorEvent, promptEvent, type StreamEvent } from "../connections/events.js";
import type { ReplyInput, ReplyResult, ResponseHandler } from "../response/handler.js";
import type { DeliveryDispatcher } from "../delivery/dispatcher.js";
import type { Logger } from "../logging/logger.js";
import { systemClock, type Clock } from "../frequency/clock.js";

const USER_HEADER = "x-user-id";

const STATUS_BY_CODE: Record<ValidationCode, 400 | 403 | 404 | 409> = {
  prompt_not_found: 404,
  stale_prompt: 409,
  ownership_mismatch: 403,
  invalid_reply: 400,
};

const timestampSchema = z.union([z.number(), z.string()]).optional();

const replySchema = z.object({
  prompt_id: z.string().min(1),
  user_id: z.string().min(1).optional(),
  value: z.string().min(1),
  action: z.string().default(""),
  timestamp: timestampSchema,
});

const ackSchema = z.object({ connection_id: z.string().optional() });
const heartbeatSchema = z.object({ connection_id: z.string().optional() });

const clientFrameSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("ack"), prompt_id: z.string().min(1) }),
  z.object({ type: z.literal("heartbeat") }),
  replySchema.extend({ type: z.literal("reply") }),
]);

const stateListSchema = z.array(z.enum(PROMPT_STATES));

type DispatchControl = Pick<DeliveryDispatcher, "cancel" | "queueDepth" | "activeCount" | "parkedCount">;

export interface CoachingServerDeps {
  config: ServerConfig;
  store: PromptStore;
  registry: ConnectionRegistry;
  responses: ResponseHandler;
  dispatcher: DispatchControl;
  logger: Logger;
  clock?: Clock;
}

export function toPromptView(prompt: Prompt): Record<string, unknown> {
  const iso = (ts: number | null): string | null => (ts === null ? null : new Date(ts).toISOString());
  return {
    ...promptEvent(prompt).data,
    user_id: prompt.userId,
    state: prompt.state,
    channel: prompt.channel,
    created_at: iso(prompt.createdAt),
    delivered_at: iso(prompt.deliveredAt),
    responded_at: iso(prompt.respondedAt),
    response_value: prompt.responseValue,
  };
}

function parseClientTimestamp(raw: number | string | undefined): number | null {
  if (raw === undefined) return null;
  if (typeof raw === "number") return raw;
  const parsed = Date.parse(raw);
  if (Number.isNaN(parsed)) throw new ValidationError("invalid_reply", `Unparseable timestamp "${raw}"`);
  return parsed;
}

/**
 * Client-facing HTTP surface: the live stream (SSE or WebSocket), replies,
 * receipts, liveness pings and prompt listing. The caller's identity comes
 * from a header set by the upstream auth proxy.
 */
export class CoachingServer {
  readonly app: Hono;
  private server: ReturnType<typeof serve> | null = null;
  private injectWebSocket: ReturnType<typeof createNodeWebSocket>["injectWebSocket"] | null = null;
  private readonly startedAt: number;

  private readonly config: ServerConfig;
  private readonly store: PromptStore;
  private readonly registry: ConnectionRegistry;
  private readonly responses: ResponseHandler;
  private readonly dispatcher: DispatchControl;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(deps: CoachingServerDeps) {
    this.config = deps.config;
    this.store = deps.store;
    this.registry = deps.registry;
    this.responses = deps.responses;
    this.dispatcher = deps.dispatcher;
    this.logger = deps.logger;
    this.clock = deps.clock ?? systemClock;
    this.startedAt = this.clock();
    this.app = new Hono();
    this.setupRoutes();
  }

  async start(): Promise<void> {
    this.server = serve({
      fetch: this.app.fetch,
      port: this.config.port,
      hostname: this.config.hostname,
    });
    this.injectWebSocket?.(this.server);
    this.logger.info({ port: this.config.port, hostname: this.config.hostname }, "Coaching server listening");
  }

  async stop(): Promise<void> {
    if (this.server) {
      this.server.close();
      this.server = null;
      this.logger.info("Coaching server stopped");
    }
  }

  // ── Shared operations (REST and WebSocket) ──

  async reply(userId: string, body: unknown): Promise<ReplyResult> {
    const parsed = replySchema.safeParse(body);
    if (!parsed.success) {
      throw new ValidationError("invalid_reply", parsed.error.issues.map((i) => i.message).join("; "));
    }
    const data = parsed.data;
    if (data.user_id !== undefined && data.user_id !== userId) {
      throw new ValidationError("ownership_mismatch", "Reply user does not match the authenticated user");
    }
    const input: ReplyInput = {
      promptId: data.prompt_id,
      userId,
      value: data.value,
      action: data.action,
      clientTimestamp: parseClientTimestamp(data.timestamp),
    };
    this.registry.touchUser(userId);
    return this.responses.handle(input);
  }

  async acknowledge(userId: string, promptId: string, connectionId: string | null): Promise<void> {
    const prompt = this.store.get(promptId);
    if (!prompt) throw new ValidationError("prompt_not_found", `Prompt ${promptId} not found`);
    if (prompt.userId !== userId) {
      throw new ValidationError("ownership_mismatch", `Prompt ${promptId} belongs to another user`);
    }
    if (prompt.state !== "delivering" && prompt.state !== "delivered") {
      throw new ValidationError("stale_prompt", `Prompt ${promptId} is ${prompt.state}`);
    }

    if (connectionId) this.registry.touch(connectionId);
    else this.registry.touchUser(userId);

    if (prompt.state === "delivering") {
      await this.registry.publishAck({ promptId, userId, connectionId, at: this.clock() });
    }
  }

  async handleFrame(userId: string, connectionId: string, raw: string): Promise<StreamEvent | null> {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return errorEvent("invalid_frame", "Frame is not JSON");
    }
    const frame = clientFrameSchema.safeParse(json);
    if (!frame.success) return errorEvent("invalid_frame", "Unrecognized frame");

    this.registry.touch(connectionId);
    try {
      if (frame.data.type === "ack") {
        await this.acknowledge(userId, frame.data.prompt_id, connectionId);
      } else if (frame.data.type === "reply") {
        await this.reply(userId, frame.data);
      }
      return null;
    } catch (err) {
      if (err instanceof ValidationError) return errorEvent(err.code, err.message);
      throw err;
    }
  }

  // ── Routes ──

  private setupRoutes(): void {
    const { injectWebSocket, upgradeWebSocket } = createNodeWebSocket({ app: this.app });
    this.injectWebSocket = injectWebSocket;

    this.app.onError((err, c) => {
      if (err instanceof ValidationError) return this.fail(c, err);
      this.logger.error({ err, path: c.req.path }, "Unhandled request error");
      return c.json({ success: false, error: { code: "internal_error", message: "Internal server error" } }, 500);
    });

    this.app.get("/health", (c) => {
      const uptime = this.clock() - this.startedAt;
      return c.json({
        status: "ok",
        uptime,
        uptimeHuman: formatUptime(uptime),
        processId: this.registry.processId,
        connections: this.registry.localConnectionCount(),
        delivery: {
          queueDepth: this.dispatcher.queueDepth,
          active: this.dispatcher.activeCount,
          parked: this.dispatcher.parkedCount,
        },
      });
    });

    this.app.get("/coaching/stream", (c) => {
      const userId = c.req.header(USER_HEADER);
      if (!userId) return this.unauthenticated(c);

      return streamSSE(
        c,
        async (stream) => {
          let release: () => void = () => {};
          const closed = new Promise<void>((resolve) => {
            release = resolve;
          });

          const handle: ConnectionHandle = {
            id: randomUUID(),
            userId,
            send: (event) => stream.writeSSE({ event: event.type, data: JSON.stringify(event.data) }),
            close: () => release(),
          };
          stream.onAbort(() => {
            release();
            this.registry.unregister(handle.id, "client_closed").catch((err) => {
              this.logger.error({ err, connectionId: handle.id }, "Failed to unregister stream");
            });
          });

          await this.openStream(handle);
          await closed;
        },
        async (err, stream) => {
          this.logger.warn({ err, userId }, "Stream errored");
          await stream.writeSSE({ event: "error", data: JSON.stringify({ code: "stream_error", message: "Stream error" }) });
        },
      );
    });

    this.app.get(
      "/coaching/ws",
      upgradeWebSocket((c) => {
        const userId = c.req.header(USER_HEADER) ?? null;
        const connectionId = randomUUID();

        return {
          onOpen: (_evt, ws) => {
            if (!userId) {
              ws.send(JSON.stringify({ type: "error", data: { code: "unauthenticated", message: "Missing user" } }));
              ws.close(1008, "unauthenticated");
              return;
            }
            this.openStream(this.socketHandle(connectionId, userId, ws)).catch((err) => {
              this.logger.error({ err, userId, connectionId }, "Failed to open socket stream");
              ws.close(1011, "registration failed");
            });
          },
          onMessage: (evt, ws) => {
            if (!userId || typeof evt.data !== "string") return;
            this.handleFrame(userId, connectionId, evt.data)
              .then((reply) => {
                if (reply) ws.send(JSON.stringify(reply));
              })
              .catch((err) => {
                this.logger.error({ err, userId, connectionId }, "Socket frame handling failed");
              });
          },
          onClose: () => {
            this.registry.unregister(connectionId, "client_closed").catch((err) => {
              this.logger.error({ err, connectionId }, "Failed to unregister socket");
            });
          },
        };
      }),
    );

    this.app.post("/coaching/replies", async (c) => {
      const userId = c.req.header(USER_HEADER);
      if (!userId) return this.unauthenticated(c);
      const body = await this.readJson(c);
      const result = await this.reply(userId, body);
      return c.json({ success: true, result: result.result, follow_up_scheduled: result.followUpScheduled });
    });

    this.app.post("/coaching/prompts/:id/ack", async (c) => {
      const userId = c.req.header(USER_HEADER);
      if (!userId) return this.unauthenticated(c);
      const body = ackSchema.safeParse(await this.readJson(c, {}));
      await this.acknowledge(userId, c.req.param("id"), body.success ? body.data.connection_id ?? null : null);
      return c.json({ success: true });
    });

    this.app.post("/coaching/heartbeat", async (c) => {
      const userId = c.req.header(USER_HEADER);
      if (!userId) return this.unauthenticated(c);
      const body = heartbeatSchema.safeParse(await this.readJson(c, {}));
      const connectionId = body.success ? body.data.connection_id : undefined;
      const touched = connectionId
        ? Number(this.registry.touch(connectionId))
        : this.registry.touchUser(userId);
      return c.json({ success: true, connections: touched });
    });

    this.app.post("/coaching/prompts/:id/cancel", (c) => {
      const userId = c.req.header(USER_HEADER);
      if (!userId) return this.unauthenticated(c);
      const promptId = c.req.param("id");
      const prompt = this.store.get(promptId);
      if (!prompt) throw new ValidationError("prompt_not_found", `Prompt ${promptId} not found`);
      if (prompt.userId !== userId) {
        throw new ValidationError("ownership_mismatch", `Prompt ${promptId} belongs to another user`);
      }
      const cancelled = this.dispatcher.cancel(promptId);
      if (!cancelled) throw new ValidationError("stale_prompt", `Prompt ${promptId} cannot be cancelled`);
      return c.json({ success: true, prompt: toPromptView(cancelled) });
    });

    this.app.get("/coaching/prompts", (c) => {
      const userId = c.req.header(USER_HEADER);
      if (!userId) return this.unauthenticated(c);
      const raw = c.req.query("state");
      const states = stateListSchema.safeParse(raw ? raw.split(",").map((s) => s.trim().toLowerCase()) : []);
      if (!states.success) {
        return c.json({ success: false, error: { code: "invalid_state", message: `Unknown state in "${raw}"` } }, 400);
      }
      const prompts = this.store.listForUser(userId, states.data);
      return c.json({ success: true, prompts: prompts.map(toPromptView) });
    });
  }

  // ── Helpers ──

  /** Register, greet, then replay delivered prompts still waiting for an answer. */
  private async openStream(handle: ConnectionHandle): Promise<void> {
    await this.registry.register(handle);
    await handle.send({ type: "ready", data: { connection_id: handle.id } });
    for (const prompt of this.store.listAwaitingReply(handle.userId, this.clock())) {
      await handle.send(promptEvent(prompt));
    }
  }

  private socketHandle(id: string, userId: string, ws: WSContext): ConnectionHandle {
    return {
      id,
      userId,
      send: async (event) => {
        ws.send(JSON.stringify(event));
      },
      close: () => ws.close(1000, "closed"),
    };
  }

  private async readJson(c: Context, fallback?: unknown): Promise<unknown> {
    try {
      return await c.req.json();
    } catch {
      if (fallback !== undefined) return fallback;
      throw new ValidationError("invalid_reply", "Request body must be JSON");
    }
  }

  private fail(c: Context, err: ValidationError) {
    return c.json({ success: false, error: { code: err.code, message: err.message } }, STATUS_BY_CODE[err.code]);
  }

  private unauthenticated(c: Context) {
    return c.json({ success: false, error: { code: "unauthenticated", message: `Missing ${USER_HEADER} header` } }, 401);
  }
}

function formatUptime(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) return `${days}d ${hours % 24}h`;
  if (hours > 0) return `${hours}h ${minutes % 60}m`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  return `${seconds}s`;
}
