export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

export interface ZonedParts {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timezone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timezone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: timezone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatters.set(timezone, formatter);
  }
  return formatter;
}

export function isValidTimezone(timezone: string): boolean {
  try {
    formatterFor(timezone);
    return true;
  } catch {
    return false;
  }
}

/**
 * Wall-clock components of an instant in the given IANA timezone.
 */
export function zonedParts(date: Date, timezone: string): ZonedParts {
  const parts = formatterFor(timezone).formatToParts(date);
  const read = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((p) => p.type === type);
    if (!part) {
      throw new Error(`Missing ${type} when formatting ${date.toISOString()} in ${timezone}`);
    }
    return Number(part.value);
  };

  return {
    year: read('year'),
    month: read('month'),
    day: read('day'),
    hour: read('hour'),
    minute: read('minute'),
    second: read('second'),
  };
}

/** Offset of the timezone from UTC at the given instant, in milliseconds. */
export function timezoneOffsetMs(date: Date, timezone: string): number {
  const p = zonedParts(date, timezone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  const truncated = date.getTime() - (date.getTime() % 1000);
  return asUtc - truncated;
}

/**
 * UTC instant for a local wall-clock hour. Re-checks the offset once so that
 * hours next to a DST transition land on the right side of it.
 */
export function zonedTimeToUtc(
  year: number,
  month: number,
  day: number,
  hour: number,
  timezone: string
): Date {
  const guess = Date.UTC(year, month - 1, day, hour);
  const firstOffset = timezoneOffsetMs(new Date(guess), timezone);
  let instant = guess - firstOffset;
  const secondOffset = timezoneOffsetMs(new Date(instant), timezone);
  if (secondOffset !== firstOffset) {
    instant = guess - secondOffset;
  }
  return new Date(instant);
}

/**
 * Next listed hour in the account's timezone. With `inclusive` the instant itself
 * qualifies when it sits exactly on a listed hour; otherwise the hour must be
 * strictly later than the instant's local hour. Rolls to the first listed hour of
 * the following local day when none remain today.
 */
export function nextOptimalSlot(from: Date, timezone: string, hours: number[], inclusive = false): Date {
  if (hours.length === 0) {
    throw new Error('At least one optimal hour is required');
  }

  const sorted = [...hours].sort((a, b) => a - b);
  const local = zonedParts(from, timezone);
  const onTheHour = local.minute === 0 && local.second === 0 && from.getUTCMilliseconds() === 0;

  const hour = sorted.find((h) => h > local.hour || (inclusive && onTheHour && h === local.hour));
  if (hour !== undefined) {
    return zonedTimeToUtc(local.year, local.month, local.day, hour, timezone);
  }

  const tomorrow = new Date(Date.UTC(local.year, local.month - 1, local.day + 1));
  return zonedTimeToUtc(
    tomorrow.getUTCFullYear(),
    tomorrow.getUTCMonth() + 1,
    tomorrow.getUTCDate(),
    sorted[0],
    timezone
  );
}

export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function startOfNextUtcDay(date: Date): Date {
  return new Date(startOfUtcDay(date).getTime() + DAY_MS);
}

export function utcDayKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}
