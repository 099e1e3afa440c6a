import { z } from "zod";
import type { CoachingDB } from "../store/db.js";
import type { PreferenceDefaults } from "../config/types.js";
import type {
  Channel,
  PreferenceReader,
  UserNotificationPreference,
} from "../coaching/types.js";

interface PreferenceRow {
  user_id: string;
  enabled: number;
  daily_max: number | null;
  hourly_max: number | null;
  min_interval_minutes: number | null;
  quiet_enabled: number | null;
  quiet_start: string | null;
  quiet_end: string | null;
  timezone: string | null;
  channels: string | null;
  enabled_timing_types: string | null;
  updated_at: number;
}

const channelsSchema = z
  .object({
    in_app: z.boolean(),
    push: z.boolean(),
    email: z.boolean(),
  })
  .partial();

const timingTypesSchema = z.array(z.string());

export type PreferenceOverrides = Partial<Omit<UserNotificationPreference, "userId" | "quietHours" | "channels">> & {
  readonly quietHours?: Partial<UserNotificationPreference["quietHours"]>;
  readonly channels?: Partial<Record<Channel, boolean>>;
};

/**
 * Read side of the user preference record. Columns left NULL fall back to
 * the configured defaults, so a user without a row gets the defaults.
 */
export class PreferenceStore implements PreferenceReader {
  private readonly db;

  constructor(
    coachingDb: CoachingDB,
    private readonly defaults: PreferenceDefaults,
  ) {
    this.db = coachingDb.raw();
  }

  get(userId: string): UserNotificationPreference {
    const row = this.db
      .prepare("SELECT * FROM notification_preferences WHERE user_id = ?")
      .get(userId) as PreferenceRow | undefined;

    const d = this.defaults;
    if (!row) {
      return {
        userId,
        enabled: d.enabled,
        dailyMax: d.dailyMax,
        hourlyMax: d.hourlyMax,
        minIntervalMinutes: d.minIntervalMinutes,
        quietHours: { ...d.quietHours },
        timezone: d.timezone,
        channels: { ...d.channels },
        enabledTimingTypes: [...d.enabledTimingTypes],
      };
    }

    const channels = row.channels ? channelsSchema.parse(JSON.parse(row.channels)) : {};
    return {
      userId,
      enabled: row.enabled === 1,
      dailyMax: row.daily_max ?? d.dailyMax,
      hourlyMax: row.hourly_max ?? d.hourlyMax,
      minIntervalMinutes: row.min_interval_minutes ?? d.minIntervalMinutes,
      quietHours: {
        enabled: row.quiet_enabled === null ? d.quietHours.enabled : row.quiet_enabled === 1,
        start: row.quiet_start ?? d.quietHours.start,
        end: row.quiet_end ?? d.quietHours.end,
      },
      timezone: row.timezone ?? d.timezone,
      channels: { ...d.channels, ...channels },
      enabledTimingTypes: row.enabled_timing_types
        ? timingTypesSchema.parse(JSON.parse(row.enabled_timing_types))
        : [...d.enabledTimingTypes],
    };
  }

  /**
   * Seed or overwrite a user's preferences. The engine itself never calls
   * this; it exists for the admin CLI and tests.
   */
  upsert(userId: string, overrides: PreferenceOverrides): void {
    this.db
      .prepare(
        `INSERT INTO notification_preferences
         (user_id, enabled, daily_max, hourly_max, min_interval_minutes, quiet_enabled,
          quiet_start, quiet_end, timezone, channels, enabled_timing_types, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(user_id) DO UPDATE SET
           enabled = excluded.enabled,
           daily_max = excluded.daily_max,
           hourly_max = excluded.hourly_max,
           min_interval_minutes = excluded.min_interval_minutes,
           quiet_enabled = excluded.quiet_enabled,
           quiet_start = excluded.quiet_start,
           quiet_end = excluded.quiet_end,
           timezone = excluded.timezone,
           channels = excluded.channels,
           enabled_timing_types = excluded.enabled_timing_types,
           updated_at = excluded.updated_at`,
      )
      .run(
        userId,
        overrides.enabled === false ? 0 : 1,
        overrides.dailyMax ?? null,
        overrides.hourlyMax ?? null,
        overrides.minIntervalMinutes ?? null,
        overrides.quietHours?.enabled === undefined ? null : overrides.quietHours.enabled ? 1 : 0,
        overrides.quietHours?.start ?? null,
        overrides.quietHours?.end ?? null,
        overrides.timezone ?? null,
        overrides.channels ? JSON.stringify(overrides.channels) : null,
        overrides.enabledTimingTypes ? JSON.stringify(overrides.enabledTimingTypes) : null,
        Date.now(),
      );
  }
}
