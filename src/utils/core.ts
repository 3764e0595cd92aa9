import crypto from "crypto";

export const DATE_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
export const HHMM_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;

export function createId(): string {
  return crypto.randomUUID();
}

export function toMs(dateIso: string): number {
  return new Date(dateIso).getTime();
}

// Date-times must name their zone with `Z` or an offset.
const ZONED_INSTANT_PATTERN =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d{1,3})?)?(Z|[+-]\d{2}:\d{2})$/;

/** Parses a zoned ISO date-time, or a Date, into a canonical UTC ISO string. */
export function normalizeInstant(value: unknown): string | null {
  if (typeof value === "string" && !ZONED_INSTANT_PATTERN.test(value.trim())) {
    return null;
  }
  if (typeof value !== "string" && !(value instanceof Date)) {
    return null;
  }
  const date = new Date(typeof value === "string" ? value.trim() : value);
  if (Number.isNaN(date.getTime())) {
    return null;
  }
  return date.toISOString();
}

export function addMinutes(dateIso: string, minutes: number): string {
  const date = new Date(dateIso);
  return new Date(date.getTime() + minutes * 60_000).toISOString();
}

export function diffMinutes(laterIso: string, earlierIso: string): number {
  return (toMs(laterIso) - toMs(earlierIso)) / 60_000;
}

export function addDaysToDateKey(dateKey: string, days: number): string {
  const date = new Date(`${dateKey}T00:00:00.000Z`);
  return new Date(date.getTime() + days * 86_400_000).toISOString().slice(0, 10);
}

export function isValidDateKey(value: string): boolean {
  if (!DATE_KEY_PATTERN.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

export function isValidTime(value: string): boolean {
  return HHMM_PATTERN.test(value);
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

function toPartsInTimeZone(
  date: Date,
  timeZone: string,
): { year: number; month: number; day: number; hour: number; minute: number; second: number } {
  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
  });

  const parts = formatter.formatToParts(date);
  const pick = (type: string): number => {
    const value = parts.find((part) => part.type === type)?.value ?? "0";
    return Number(value);
  };

  return {
    year: pick("year"),
    month: pick("month"),
    day: pick("day"),
    hour: pick("hour"),
    minute: pick("minute"),
    second: pick("second"),
  };
}

function getTimeZoneOffsetMs(date: Date, timeZone: string): number {
  const parts = toPartsInTimeZone(date, timeZone);
  const reconstructedUtc = Date.UTC(
    parts.year,
    parts.month - 1,
    parts.day,
    parts.hour,
    parts.minute,
    parts.second,
  );
  return reconstructedUtc - date.getTime();
}

/**
 * The instant at which the wall clock of `timeZone` reads `date hh:mm`.
 * Ambiguous times take the earlier reading; skipped times move forward.
 */
export function dateAtTimeInTimeZoneIso(
  date: string,
  hhmm: string,
  timeZone: string,
): string {
  const [yearStr, monthStr, dayStr] = date.split("-");
  const [hoursStr, minutesStr] = hhmm.split(":");
  const year = Number(yearStr);
  const month = Number(monthStr);
  const day = Number(dayStr);
  const hours = Number(hoursStr);
  const minutes = Number(minutesStr);

  const utcGuessMs = Date.UTC(year, month - 1, day, hours, minutes, 0, 0);
  const firstGuess = new Date(utcGuessMs);
  const firstOffset = getTimeZoneOffsetMs(firstGuess, timeZone);
  const adjusted = new Date(utcGuessMs - firstOffset);
  const secondOffset = getTimeZoneOffsetMs(adjusted, timeZone);
  if (secondOffset === firstOffset) {
    return adjusted.toISOString();
  }
  const candidate = new Date(utcGuessMs - secondOffset);
  // A wall time skipped by a forward transition resolves to the same distance past it.
  return getTimeZoneOffsetMs(candidate, timeZone) === secondOffset
    ? candidate.toISOString()
    : adjusted.toISOString();
}

export function toDateKeyInTimeZone(dateIso: string, timeZone: string): string {
  const date = new Date(dateIso);
  const parts = toPartsInTimeZone(date, timeZone);
  const year = String(parts.year).padStart(4, "0");
  const month = String(parts.month).padStart(2, "0");
  const day = String(parts.day).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

export function toDateKey(dateIso: string): string {
  return new Date(dateIso).toISOString().slice(0, 10);
}

/** Every UTC date key touched by the half-open range [startIso, endIso). */
export function utcDateKeysBetween(startIso: string, endIso: string): string[] {
  const first = toDateKey(startIso);
  const lastInstant = new Date(Math.max(toMs(startIso), toMs(endIso) - 1)).toISOString();
  const last = toDateKey(lastInstant);
  const keys = [first];
  let cursor = first;
  while (cursor < last) {
    cursor = addDaysToDateKey(cursor, 1);
    keys.push(cursor);
  }
  return keys;
}

export function formatClockTime(dateIso: string, timeZone: string): string {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    hour: "2-digit",
    minute: "2-digit",
    hour12: true,
  }).formatToParts(new Date(dateIso));
  const pick = (type: string): string => parts.find((part) => part.type === type)?.value ?? "";
  // Assembled by hand: ICU separates the day period with U+202F.
  return `${pick("hour").padStart(2, "0")}:${pick("minute")} ${pick("dayPeriod").toUpperCase()}`;
}

/** `09:00 AM - 09:30 AM` in the given zone. */
export function formatTimeSlot(startIso: string, endIso: string, timeZone: string): string {
  return `${formatClockTime(startIso, timeZone)} - ${formatClockTime(endIso, timeZone)}`;
}

export function parsePositiveInt(
  input: unknown,
  fallback: number,
  max: number,
): number {
  const value = Number(input);
  if (!Number.isFinite(value) || value <= 0) {
    return fallback;
  }
  return Math.min(Math.trunc(value), max);
}

/** Half-open overlap test: [startA, endA) and [startB, endB). */
export function overlap(
  startA: string,
  endA: string,
  startB: string,
  endB: string,
): boolean {
  return toMs(startA) < toMs(endB) && toMs(startB) < toMs(endA);
}

export function timesOverlap(
  startA: string,
  endA: string,
  startB: string,
  endB: string,
): boolean {
  return startA < endB && startB < endA;
}
