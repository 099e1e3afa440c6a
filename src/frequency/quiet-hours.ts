import type { QuietHours } from "../coaching/types.js";
import { localTime } from "./clock.js";

const MINUTES_PER_DAY = 24 * 60;

function parseTime(time: string): number {
  const [h, m] = time.split(":").map(Number);
  return (h ?? 0) * 60 + (m ?? 0);
}

/**
 * Whether `now` falls inside the do-not-disturb window. Both bounds are
 * inclusive; a window whose start is after its end wraps midnight.
 */
export function isWithinQuietHours(
  quietHours: QuietHours | undefined,
  now: number,
  timezone: string,
): boolean {
  if (!quietHours?.enabled) return false;

  const { hour, minute } = localTime(now, timezone);
  const current = hour * 60 + minute;
  const start = parseTime(quietHours.start);
  const end = parseTime(quietHours.end);

  if (start <= end) {
    // Same-day window: 13:00 - 15:00
    return current >= start && current <= end;
  }
  // Overnight window: 22:00 - 08:00
  return current >= start || current <= end;
}

/**
 * When delivery may resume: the first minute after the window's end, or
 * null when `now` is outside quiet hours.
 */
export function quietHoursEnd(
  quietHours: QuietHours | undefined,
  now: number,
  timezone: string,
): number | null {
  if (!quietHours || !isWithinQuietHours(quietHours, now, timezone)) return null;

  const { hour, minute } = localTime(now, timezone);
  const current = hour * 60 + minute;
  const minutesLeft = (parseTime(quietHours.end) - current + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  return now - (now % 60_000) + (minutesLeft + 1) * 60_000;
}
