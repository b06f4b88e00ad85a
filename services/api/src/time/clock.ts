/**
 * Wall-clock view of an instant in a given time zone.
 */
export interface LocalDateTime {
  /** YYYY-MM-DD */
  date: string;
  /** 0 = Sunday */
  dayOfWeek: number;
  minuteOfDay: number;
}

/**
 * Injected time source. "Today" drives day-scoped security codes and
 * occurrences; "now" drives schedule windows and rate-limit windows.
 */
export interface Clock {
  now(): Date;
  today(): string;
  toLocal(instant: Date): LocalDateTime;
}

const WEEKDAYS: Record<string, number> = {
  Sun: 0,
  Mon: 1,
  Tue: 2,
  Wed: 3,
  Thu: 4,
  Fri: 5,
  Sat: 6,
};

const formatters = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      weekday: 'short',
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

export function toLocalDateTime(instant: Date, timeZone: string): LocalDateTime {
  const parts: Record<string, string> = {};
  for (const part of getFormatter(timeZone).formatToParts(instant)) {
    parts[part.type] = part.value;
  }

  const hour = Number(parts.hour ?? '0');
  const minute = Number(parts.minute ?? '0');

  return {
    date: `${parts.year}-${parts.month}-${parts.day}`,
    dayOfWeek: WEEKDAYS[parts.weekday ?? ''] ?? 0,
    minuteOfDay: hour * 60 + minute,
  };
}

export function createSystemClock(timeZone: string): Clock {
  return {
    now: () => new Date(),
    today: () => toLocalDateTime(new Date(), timeZone).date,
    toLocal: (instant) => toLocalDateTime(instant, timeZone),
  };
}

/**
 * Whole years between a YYYY-MM-DD birth date and `today`.
 */
export function ageOn(birthDate: string | null, today: string): number | null {
  if (!birthDate) return null;
  const [by, bm, bd] = birthDate.split('-').map(Number);
  const [ty, tm, td] = today.split('-').map(Number);
  if (by === undefined || bm === undefined || bd === undefined) return null;
  if (ty === undefined || tm === undefined || td === undefined) return null;

  let age = ty - by;
  if (tm < bm || (tm === bm && td < bd)) {
    age -= 1;
  }
  return age;
}
