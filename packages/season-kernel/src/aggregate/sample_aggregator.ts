// Season Kernel - Sample Aggregator
//
// Reduces one calendar day of temperature samples to an arithmetic mean.
// No interpolation and no outlier rejection: the upstream feed is trusted.

import type { DailyMeanV1, TemperatureSampleV1 } from "@seasonwatch/contracts";
import { addDays, calendarDateOfTs, type CalendarDate } from "../calendar/calendar_date";

/**
 * Mean of the day's finite sample values, or null for an empty day (a gap, not a failure).
 */
export function computeDailyMean(date: CalendarDate, values: ReadonlyArray<number>): DailyMeanV1 | null {
  let sum = 0;
  let count = 0;
  for (const v of values) {
    if (!Number.isFinite(v)) continue;
    sum += v;
    count++;
  }
  if (count === 0) return null;
  return { date, mean_c: sum / count, sample_count: count };
}

export type AggregatorPushResult = {
  // Set when the pushed sample opened a later day and closed the previous one.
  completed: DailyMeanV1 | null;
  // Calendar days between the closed day and the new one that received no samples.
  skipped_days: CalendarDate[];
  late: boolean;
};

/**
 * Streaming form for a time-ordered feed: accumulates the open day and emits
 * its mean when the first sample of a later day arrives.
 */
export class SampleAggregator {
  private openDate: CalendarDate | null = null;
  private values: number[] = [];
  private lateCount = 0;

  constructor(private readonly utcOffsetMinutes: number) {}

  push(sample: Pick<TemperatureSampleV1, "ts" | "value">): AggregatorPushResult {
    const date = calendarDateOfTs(sample.ts, this.utcOffsetMinutes);

    if (this.openDate === null) {
      this.openDate = date;
      this.values = [sample.value];
      return { completed: null, skipped_days: [], late: false };
    }

    if (date === this.openDate) {
      this.values.push(sample.value);
      return { completed: null, skipped_days: [], late: false };
    }

    if (date < this.openDate) {
      // The open day's mean has not been emitted, but earlier days have.
      this.lateCount++;
      return { completed: null, skipped_days: [], late: true };
    }

    const completed = computeDailyMean(this.openDate, this.values);
    const skipped_days = daysStrictlyBetween(this.openDate, date);
    this.openDate = date;
    this.values = [sample.value];
    return { completed, skipped_days, late: false };
  }

  /** Closes the open day (end of feed). */
  flush(): DailyMeanV1 | null {
    if (this.openDate === null) return null;
    const out = computeDailyMean(this.openDate, this.values);
    this.openDate = null;
    this.values = [];
    return out;
  }

  get lateSamples(): number {
    return this.lateCount;
  }
}

function daysStrictlyBetween(a: CalendarDate, b: CalendarDate): CalendarDate[] {
  const out: CalendarDate[] = [];
  for (let d = addDays(a, 1); d < b; d = addDays(d, 1)) out.push(d);
  return out;
}
