import { z } from "zod";

const hhmm = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "expected HH:MM");
const prioritySchema = z.enum(["HIGH", "MEDIUM", "LOW"]);
const channelSchema = z.enum(["in_app", "push", "email"]);

const serverSchema = z.object({
  port: z.number().int().positive().default(19880),
  hostname: z.string().default("127.0.0.1"),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

const detectionSchema = z.object({
  schedule: z.string().min(1).default("*/5 * * * *"),
  batchLimit: z.number().int().positive().default(500),
  maxCandidatesPerUser: z.number().int().positive().default(3),
  habitMissedDays: z.number().int().positive().default(2),
  habitEscalateDays: z.number().int().positive().default(3),
  progressStallDays: z.number().int().positive().default(3),
  dormantDays: z.number().int().positive().default(7),
  logReminderHour: z.number().int().min(0).max(23).default(20),
  heuristicMinConfidence: z.number().min(0).max(1).default(0.5),
});

const quietHoursSchema = z.object({
  enabled: z.boolean().default(true),
  start: hhmm.default("22:00"),
  end: hhmm.default("08:00"),
});

const preferenceDefaultsSchema = z.object({
  enabled: z.boolean().default(true),
  dailyMax: z.number().int().min(0).default(5),
  hourlyMax: z.number().int().min(0).default(2),
  minIntervalMinutes: z.number().min(0).default(60),
  quietHours: quietHoursSchema.default({}),
  timezone: z.string().default("UTC"),
  channels: z.object({
    in_app: z.boolean().default(true),
    push: z.boolean().default(true),
    email: z.boolean().default(false),
  }).default({}),
  enabledTimingTypes: z.array(z.string()).default([]),
});

const recurrenceSchema = z.union([z.literal("calendar_day"), z.number().min(0)]);

const frequencySchema = z.object({
  defaults: preferenceDefaultsSchema.default({}),
  engagementWindow: z.number().int().positive().default(20),
  engagementThreshold: z.number().min(0).max(1).default(0.3),
  engagementMinSample: z.number().int().min(0).default(5),
  defaultRecurrenceHours: z.number().min(0).default(12),
  typeRecurrence: z.record(z.string(), recurrenceSchema).default({
    daily_checkin: "calendar_day",
    log_reminder: "calendar_day",
    habit_missed: 24,
    progress_stalled: 72,
    re_engagement: 168,
    follow_up: 0,
  }),
});

const synthesisSchema = z.object({
  endpoint: z.string().url().optional(),
  headers: z.record(z.string(), z.string()).default({}),
  timeoutMs: z.number().int().positive().default(5_000),
});

const webhookSinkSchema = z.object({
  url: z.string().url(),
  headers: z.record(z.string(), z.string()).default({}),
});

const deliverySchema = z.object({
  workers: z.number().int().positive().default(4),
  queueCapacity: z.number().int().positive().default(1_000),
  maxRetries: z.number().int().min(0).default(5),
  backoffBaseMs: z.number().int().positive().default(30_000),
  backoffMaxMs: z.number().int().positive().default(1_800_000),
  sinkTimeoutMs: z.number().int().positive().default(5_000),
  ackTimeoutMs: z.number().int().positive().default(4_000),
  pumpIntervalMs: z.number().int().positive().default(5_000),
  pumpBatch: z.number().int().positive().default(200),
  expirySchedule: z.string().min(1).default("*/10 * * * *"),
  defaultTtlSeconds: z.number().int().positive().default(86_400),
  channelOrder: z.object({
    HIGH: z.array(channelSchema).default(["in_app", "push", "email"]),
    MEDIUM: z.array(channelSchema).default(["in_app", "push", "email"]),
    LOW: z.array(channelSchema).default(["email", "in_app", "push"]),
  }).default({}),
  webhooks: z.object({
    push: webhookSinkSchema.optional(),
    email: webhookSinkSchema.optional(),
  }).default({}),
});

const connectionsSchema = z.object({
  processId: z.string().min(1).optional(),
  heartbeatIntervalMs: z.number().int().positive().default(30_000),
  staleTimeoutMs: z.number().int().positive().default(90_000),
  pruneIntervalMs: z.number().int().positive().default(30_000),
});

const integrationsSchema = z.object({
  /** Base URL of the health-record service; unset runs with no active users. */
  baseUrl: z.string().url().optional(),
  headers: z.record(z.string(), z.string()).default({}),
  timeoutMs: z.number().int().positive().default(5_000),
});

export const pacerConfigSchema = z.object({
  server: serverSchema.default({}),
  logging: loggingSchema.default({}),
  detection: detectionSchema.default({}),
  frequency: frequencySchema.default({}),
  synthesis: synthesisSchema.default({}),
  delivery: deliverySchema.default({}),
  connections: connectionsSchema.default({}),
  integrations: integrationsSchema.default({}),
});

export { prioritySchema, channelSchema };

export type PacerConfig = z.output<typeof pacerConfigSchema>;

export function parseConfig(raw: unknown): PacerConfig {
  return pacerConfigSchema.parse(raw);
}
