import { z } from "zod";
import type { IntegrationsConfig } from "../config/types.js";
import type { ActivitySource, UserActivitySnapshot } from "../detection/types.js";
import type { CoachingSideEffects } from "../response/handler.js";
import { withTimeout } from "../utils/timeout.js";

const activeUsersSchema = z.object({ user_ids: z.array(z.string()) });

const timestamp = z
  .union([z.number(), z.string()])
  .nullable()
  .default(null)
  .transform((v, ctx) => {
    if (v === null || typeof v === "number") return v;
    const parsed = Date.parse(v);
    if (Number.isNaN(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid timestamp "${v}"` });
      return z.NEVER;
    }
    return parsed;
  });

export const snapshotSchema = z.object({
  user_id: z.string(),
  timezone: z.string().default("UTC"),
  last_conversation_at: timestamp,
  active_window: z
    .object({ start_hour: z.number().int().min(0).max(23), end_hour: z.number().int().min(0).max(24) })
    .nullable()
    .default(null),
  habits: z
    .array(z.object({ id: z.string(), name: z.string(), consecutive_missed_days: z.number().int().min(0) }))
    .default([]),
  last_progress_at: timestamp,
  last_activity_at: timestamp,
  last_log_at: timestamp,
  context: z.record(z.string(), z.unknown()).optional(),
});

export function toSnapshot(raw: z.output<typeof snapshotSchema>): UserActivitySnapshot {
  return {
    userId: raw.user_id,
    timezone: raw.timezone,
    lastConversationAt: raw.last_conversation_at,
    activeWindow: raw.active_window
      ? { startHour: raw.active_window.start_hour, endHour: raw.active_window.end_hour }
      : null,
    habits: raw.habits.map((h) => ({ id: h.id, name: h.name, consecutiveMissedDays: h.consecutive_missed_days })),
    lastProgressAt: raw.last_progress_at,
    lastActivityAt: raw.last_activity_at,
    lastLogAt: raw.last_log_at,
    context: raw.context,
  };
}

type HttpIntegration = Required<Pick<IntegrationsConfig, "baseUrl">> & Omit<IntegrationsConfig, "baseUrl">;

class HttpClient {
  constructor(private readonly config: HttpIntegration) {}

  async request(method: "GET" | "POST", path: string, body?: unknown): Promise<unknown> {
    const url = new URL(path, this.config.baseUrl.endsWith("/") ? this.config.baseUrl : `${this.config.baseUrl}/`);
    return withTimeout(`${method} ${url.pathname}`, this.config.timeoutMs, async (signal) => {
      const response = await fetch(url, {
        method,
        headers: { "content-type": "application/json", ...this.config.headers },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal,
      });
      if (!response.ok) {
        throw new Error(`${method} ${url.pathname} failed: ${response.status} ${response.statusText}`);
      }
      const text = await response.text();
      return text.length > 0 ? JSON.parse(text) : null;
    });
  }
}

/** Reads active users and activity snapshots from the health-record service. */
export class HttpActivitySource implements ActivitySource {
  private readonly http: HttpClient;

  constructor(config: HttpIntegration) {
    this.http = new HttpClient(config);
  }

  async listActiveUsers(limit: number): Promise<string[]> {
    const body = await this.http.request("GET", `users/active?limit=${limit}`);
    return activeUsersSchema.parse(body).user_ids.slice(0, limit);
  }

  async getSnapshot(userId: string): Promise<UserActivitySnapshot> {
    const body = await this.http.request("GET", `users/${encodeURIComponent(userId)}/activity`);
    return toSnapshot(snapshotSchema.parse(body));
  }
}

export class HttpSideEffects implements CoachingSideEffects {
  private readonly http: HttpClient;

  constructor(config: HttpIntegration) {
    this.http = new HttpClient(config);
  }

  async completeHabit(userId: string, habitId: string): Promise<void> {
    await this.http.request("POST", `habits/${encodeURIComponent(habitId)}/completions`, { user_id: userId });
  }

  async skipHabitToday(userId: string, habitId: string): Promise<void> {
    await this.http.request("POST", `habits/${encodeURIComponent(habitId)}/skips`, { user_id: userId });
  }

  async requestCoachSession(userId: string, promptId: string): Promise<void> {
    await this.http.request("POST", "coach-sessions", { user_id: userId, prompt_id: promptId });
  }
}
