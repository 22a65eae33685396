import { InvalidParameterError } from "../errors";

/**
 * Wall-clock time model. Times are minutes since midnight, dates are
 * "YYYY-MM-DD" strings. There is no timezone arithmetic here: provider times
 * are converted to the location's local time once, by the normalizer, and
 * everything downstream compares local wall-clock values.
 */

export const MINUTES_PER_DAY = 24 * 60;

/** Half-open interval [start, end) in minutes since midnight */
export interface TimeWindow {
  start: number;
  end: number;
}

const TIME_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse "HH:MM" or "HH:MM:SS" into minutes since midnight.
 * "24:00" is accepted so a window can run to the end of the day.
 */
export function parseTime(value: string): number {
  const match = TIME_PATTERN.exec(value.trim());
  if (!match) {
    throw new InvalidParameterError(`Invalid time "${value}", expected HH:MM`);
  }

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] === undefined ? 0 : Number(match[3]);

  if (minutes > 59 || seconds > 59 || hours > 24 || (hours === 24 && (minutes > 0 || seconds > 0))) {
    throw new InvalidParameterError(`Invalid time "${value}", expected HH:MM`);
  }

  return hours * 60 + minutes;
}

export function formatTime(minutes: number): string {
  const hours = Math.floor(minutes / 60);
  const rest = minutes % 60;
  return `${hours.toString().padStart(2, "0")}:${rest.toString().padStart(2, "0")}`;
}

export function isValidDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

export function parseDate(value: string): string {
  if (!isValidDate(value)) {
    throw new InvalidParameterError(`Invalid date "${value}", expected YYYY-MM-DD`);
  }
  return value;
}

export function addDays(date: string, days: number): string {
  const [year, month, day] = parseDate(date).split("-").map(Number);
  const result = new Date(Date.UTC(year, month - 1, day + days));
  return result.toISOString().slice(0, 10);
}

/**
 * Inclusive list of dates from `from` to `to`
 */
export function dateRange(from: string, to: string): string[] {
  const dates: string[] = [];
  for (let current = parseDate(from); current <= parseDate(to); current = addDays(current, 1)) {
    dates.push(current);
  }
  return dates;
}

export function assertPositiveDuration(duration: number): void {
  if (!Number.isInteger(duration) || duration <= 0) {
    throw new InvalidParameterError(`Duration must be a positive number of minutes, got ${duration}`);
  }
}

export function createWindow(start: number, end: number): TimeWindow {
  if (end <= start) {
    throw new InvalidParameterError(
      `Time window end ${formatTime(end)} must be after start ${formatTime(start)}`
    );
  }
  return { start, end };
}

/**
 * True iff a slot of `duration` minutes starting at `slotStart` lies entirely
 * inside [windowStart, windowEnd). Ending exactly on windowEnd fits.
 */
export function slotFits(
  slotStart: number,
  duration: number,
  windowStart: number,
  windowEnd: number
): boolean {
  assertPositiveDuration(duration);
  return slotStart >= windowStart && slotStart + duration <= windowEnd;
}

export function contains(window: TimeWindow, time: number): boolean {
  return time >= window.start && time < window.end;
}

export function overlaps(a: TimeWindow, b: TimeWindow): boolean {
  return a.start < b.end && b.start < a.end;
}

/**
 * Get today's date in YYYY-MM-DD format for a timezone
 */
export function todayIn(timezone: string, now: Date = new Date()): string {
  const formatter = new Intl.DateTimeFormat("en-CA", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  });
  return formatter.format(now);
}

function localParts(instant: Date, timezone: string): { date: string; minutes: number } {
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  }).formatToParts(instant);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? "00";

  return {
    date: `${part("year")}-${part("month")}-${part("day")}`,
    minutes: Number(part("hour")) * 60 + Number(part("minute")),
  };
}

function dateToUtcMs(date: string, minutes: number): number {
  const [year, month, day] = parseDate(date).split("-").map(Number);
  return Date.UTC(year, month - 1, day, 0, minutes);
}

/**
 * Convert a UTC date + time into the wall-clock date and minutes of `timezone`
 */
export function utcToLocal(
  utcDate: string,
  utcTime: string,
  timezone: string
): { date: string; minutes: number } {
  return localParts(new Date(dateToUtcMs(utcDate, parseTime(utcTime))), timezone);
}

/**
 * Inverse of utcToLocal, for booking links that the provider expects in UTC
 */
export function localToUtcIso(date: string, minutes: number, timezone: string): string {
  const guess = dateToUtcMs(date, minutes);
  const seen = localParts(new Date(guess), timezone);
  const offset = dateToUtcMs(seen.date, seen.minutes) - guess;
  return new Date(guess - offset).toISOString();
}
