// Season Kernel - Calendar dates
//
// Dates are ISO "YYYY-MM-DD" strings. All arithmetic goes through UTC
// midnight so that a day is always 86_400_000 ms; the caller decides which
// calendar day a timestamp belongs to by passing a fixed UTC offset.

import { CalendarDateV1Schema, type CalendarDateV1 } from "@seasonwatch/contracts";

export type CalendarDate = CalendarDateV1;

export type MonthDay = { month: number; day: number };

const DAY_MS = 86_400_000;

export function parseCalendarDate(date: string): { year: number; month: number; day: number } {
  const parsed = CalendarDateV1Schema.safeParse(date);
  if (!parsed.success) throw new Error(`INVALID_CALENDAR_DATE: ${date}`);
  return {
    year: Number(date.slice(0, 4)),
    month: Number(date.slice(5, 7)),
    day: Number(date.slice(8, 10)),
  };
}

function fromUtcMs(ms: number): CalendarDate {
  return new Date(ms).toISOString().slice(0, 10);
}

function toUtcMs(date: CalendarDate): number {
  const { year, month, day } = parseCalendarDate(date);
  return Date.UTC(year, month - 1, day);
}

export function makeCalendarDate(year: number, month: number, day: number): CalendarDate {
  return fromUtcMs(Date.UTC(year, month - 1, day));
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return fromUtcMs(toUtcMs(date) + days * DAY_MS);
}

export function yearOf(date: CalendarDate): number {
  return parseCalendarDate(date).year;
}

export function monthDayOf(date: CalendarDate): MonthDay {
  const { month, day } = parseCalendarDate(date);
  return { month, day };
}

/** The recurring month/day placed in a concrete year. */
export function monthDayInYear(md: MonthDay, year: number): CalendarDate {
  return makeCalendarDate(year, md.month, md.day);
}

export function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function calendarDateOfTs(ts: number, utcOffsetMinutes: number): CalendarDate {
  return fromUtcMs(ts + utcOffsetMinutes * 60_000);
}

/** [startTs, endTs) of a calendar day at a fixed UTC offset. */
export function dayBoundsMs(date: CalendarDate, utcOffsetMinutes: number): { startTs: number; endTs: number } {
  const startTs = toUtcMs(date) - utcOffsetMinutes * 60_000;
  return { startTs, endTs: startTs + DAY_MS };
}
