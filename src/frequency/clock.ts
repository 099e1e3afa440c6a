export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export interface LocalTime {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timezone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timezone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat("en-US", {
      timeZone: timezone,
      year: "numeric",
      month: "numeric",
      day: "numeric",
      hour: "numeric",
      minute: "numeric",
      hourCycle: "h23",
    });
    formatters.set(timezone, fmt);
  }
  return fmt;
}

/** Wall-clock time at `now` in `timezone`. Unknown zones fall back to UTC. */
export function localTime(now: number, timezone: string): LocalTime {
  let parts: Intl.DateTimeFormatPart[];
  try {
    parts = formatterFor(timezone).formatToParts(new Date(now));
  } catch {
    // Unknown timezone, use UTC
    const d = new Date(now);
    return {
      year: d.getUTCFullYear(),
      month: d.getUTCMonth() + 1,
      day: d.getUTCDate(),
      hour: d.getUTCHours(),
      minute: d.getUTCMinutes(),
    };
  }

  const pick = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((p) => p.type === type);
    return part ? parseInt(part.value, 10) : 0;
  };
  return {
    year: pick("year"),
    month: pick("month"),
    day: pick("day"),
    hour: pick("hour"),
    minute: pick("minute"),
  };
}

export function isSameLocalDay(a: number, b: number, timezone: string): boolean {
  const ta = localTime(a, timezone);
  const tb = localTime(b, timezone);
  return ta.year === tb.year && ta.month === tb.month && ta.day === tb.day;
}
