import dayjs from "dayjs";
import utc from "dayjs/plugin/utc";
import timezone from "dayjs/plugin/timezone";

dayjs.extend(utc);
dayjs.extend(timezone);

export { dayjs };

const DATE_FORMAT = "YYYY-MM-DD";

/** Calendar date ("YYYY-MM-DD") of an instant in a time zone. */
export function localDate(at: Date, tz: string): string {
  return dayjs(at).tz(tz).format(DATE_FORMAT);
}

/** Wall-clock "HH:mm" of an instant in a time zone. */
export function localTime(at: Date, tz: string): string {
  return dayjs(at).tz(tz).format("HH:mm");
}

export function localHour(at: Date, tz: string): number {
  return dayjs(at).tz(tz).hour();
}

/** Instant of a wall-clock time ("HH:mm" or "HH:mm:ss") on a calendar date in a time zone. */
export function atLocalTime(date: string, time: string, tz: string): Date {
  return dayjs.tz(`${date} ${time}`, tz).toDate();
}

/** Adds whole calendar days to a "YYYY-MM-DD" date. */
export function addDays(date: string, days: number): string {
  return dayjs.utc(date).add(days, "day").format(DATE_FORMAT);
}

export function startOfLocalDay(at: Date, tz: string): Date {
  return atLocalTime(localDate(at, tz), "00:00", tz);
}

export function endOfLocalDay(at: Date, tz: string): Date {
  const next = atLocalTime(addDays(localDate(at, tz), 1), "00:00", tz);
  return new Date(next.getTime() - 1);
}

export function startOfLocalUnit(
  at: Date,
  unit: "week" | "month" | "year",
  tz: string,
): Date {
  // Week starts on Sunday
  const start = dayjs.utc(localDate(at, tz)).startOf(unit).format(DATE_FORMAT);
  return atLocalTime(start, "00:00", tz);
}

export function endOfLocalUnit(
  at: Date,
  unit: "week" | "month" | "year",
  tz: string,
): Date {
  const next = dayjs
    .utc(localDate(at, tz))
    .startOf(unit)
    .add(1, unit)
    .format(DATE_FORMAT);
  return new Date(atLocalTime(next, "00:00", tz).getTime() - 1);
}

/**
 * Calendar dates walked by a day cursor that starts at `start` and keeps its
 * local time of day; a date is included while the cursor is not after `end`.
 */
export function eachLocalDate(start: Date, end: Date, tz: string): string[] {
  const dates: string[] = [];
  const timeOfDay = dayjs(start).tz(tz).format("HH:mm:ss.SSS");
  let date = localDate(start, tz);
  let cursor = start;

  while (cursor.getTime() <= end.getTime()) {
    dates.push(date);
    date = addDays(date, 1);
    cursor = atLocalTime(date, timeOfDay, tz);
  }
  return dates;
}

/** All calendar dates of a "YYYY-MM" month. */
export function datesOfMonth(month: string): string[] {
  const first = dayjs.utc(`${month}-01`);
  return Array.from({ length: first.daysInMonth() }, (_, i) =>
    first.add(i, "day").format(DATE_FORMAT),
  );
}

export function isValidTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}
