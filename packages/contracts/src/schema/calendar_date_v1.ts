import { z } from "zod";

const CALENDAR_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * CalendarDateV1Schema
 *
 * ISO calendar date (YYYY-MM-DD) with no time or zone. Lexicographic order
 * equals chronological order, which the engine relies on.
 */
export const CalendarDateV1Schema = z
  .string()
  .regex(CALENDAR_DATE_RE, "expected YYYY-MM-DD")
  .refine((s) => {
    const m = CALENDAR_DATE_RE.exec(s);
    if (!m) return false;
    const y = Number(m[1]);
    const mo = Number(m[2]);
    const d = Number(m[3]);
    const probe = new Date(Date.UTC(y, mo - 1, d));
    return probe.getUTCFullYear() === y && probe.getUTCMonth() === mo - 1 && probe.getUTCDate() === d;
  }, "not a valid calendar date");

export type CalendarDateV1 = z.infer<typeof CalendarDateV1Schema>;
