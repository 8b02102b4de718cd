// Tracker runtime.
//
// Owns the only mutable copy of the engine state and the read-modify-write-persist
// cycle around the pure kernel:
//   load -> hydrate -> (kernel step) -> persist -> log events
//
// Every mutation is applied synchronously to the current state after any IO
// has finished, so requests and the daily run never interleave inside a step.

import type {
  EngineStateV1,
  SeasonHistoryV1,
  SeasonStatusV1,
  SeasonV1,
  TemperatureSampleInputV1,
  TemperatureSampleV1,
} from "@seasonwatch/contracts";
import { parseSensorValue } from "@seasonwatch/contracts";
import {
  addDays,
  buildHistoricalStatus,
  buildPrimaryStatus,
  calendarDateOfTs,
  clearArrival,
  clearManualArrival,
  computeDailyMean,
  dayBoundsMs,
  dehydrateEngineState,
  hydrateEngineState,
  makeCalendarDate,
  processDay,
  rolloverIfDue,
  setManualArrival,
  skipDay,
  type CalendarDate,
  type EngineEventV1,
  type EngineStepV1,
} from "@seasonwatch/season-kernel";

import type { TrackerConfigV1 } from "./config";
import { TrackerRequestRejected } from "./errors";
import type { TrackerLogger } from "./logger";
import type { SampleSource } from "./sources/sample_source";
import type { TrackerSqliteStore } from "./store/sqlite_store";
import { nowMs } from "./util";

// Upper bound on days replayed by one catch-up run after downtime.
export const MAX_CATCH_UP_DAYS = 366;

export type SeasonTrackerRuntimeOptions = {
  config: TrackerConfigV1;
  store: TrackerSqliteStore;
  source: SampleSource;
  logger: TrackerLogger;
  clock?: () => number;
};

export type IngestResultV1 = {
  accepted: number;
  duplicates: number;
  dropped_non_numeric: number;
  // Stored, but for a day the engine has already processed.
  late: number;
};

export type DayRunResultV1 = {
  date: CalendarDate;
  outcome: "processed" | "gap";
  sample_count: number;
  events: EngineEventV1[];
};

export type DailyCheckResultV1 = {
  today: CalendarDate;
  days: DayRunResultV1[];
  rollover_events: EngineEventV1[];
};

type EventLevel = "debug" | "info" | "warn";

function eventLevel(e: EngineEventV1): EventLevel {
  switch (e.kind) {
    case "counter_evaluated":
      return "debug";
    case "state_anomaly":
      return "warn";
    case "ledger_outcome":
      return e.outcome === "stale_year" ? "warn" : e.outcome === "committed" ? "info" : "debug";
    default:
      return "info";
  }
}

function parseStoredState(text: string | null): unknown {
  if (text === null) return null;
  try {
    return JSON.parse(text);
  } catch {
    // Hydration reports the text as STATE_UNPARSEABLE.
    return text;
  }
}

/**
 * Whether the ledger year has no unprocessed days left. Until Dec 31 of the
 * ledger year is processed, the year change waits for runDailyCheck, which
 * replays the pending December days into the old ledger first.
 * A null-year ledger counts as done, so it is opened at start-up.
 */
export function yearEndProcessed(state: EngineStateV1): boolean {
  const year = state.ledger.year;
  const last = state.last_processed_date;
  if (year === null || last === null) return true;
  return last >= makeCalendarDate(year, 12, 31);
}

export class SeasonTrackerRuntime {
  private state: EngineStateV1;
  private readonly config: TrackerConfigV1;
  private readonly store: TrackerSqliteStore;
  private readonly source: SampleSource;
  private readonly logger: TrackerLogger;
  private readonly clock: () => number;

  constructor(opts: SeasonTrackerRuntimeOptions) {
    this.config = opts.config;
    this.store = opts.store;
    this.source = opts.source;
    this.logger = opts.logger;
    this.clock = opts.clock ?? nowMs;

    const today = this.today();
    const hydrated = hydrateEngineState(parseStoredState(this.store.loadEngineStateJson()), today);
    this.logEvents(hydrated.events, "hydrate");

    this.state = hydrated.state;
    if (yearEndProcessed(hydrated.state)) {
      const rolled = rolloverIfDue(hydrated.state, today);
      if (rolled.state !== hydrated.state) this.commit(rolled, "startup");
    }
  }

  today(): CalendarDate {
    return calendarDateOfTs(this.clock(), this.config.utc_offset_minutes);
  }

  yesterday(): CalendarDate {
    return addDays(this.today(), -1);
  }

  snapshot(): EngineStateV1 {
    return dehydrateEngineState(this.state);
  }

  status(): SeasonStatusV1 {
    return buildPrimaryStatus(this.state, this.today(), this.config.locale);
  }

  history(): SeasonHistoryV1 {
    return buildHistoricalStatus(this.state, this.config.locale);
  }

  ingest(inputs: ReadonlyArray<TemperatureSampleInputV1>): IngestResultV1 {
    if (this.source.kind !== "sqlite") {
      throw new TrackerRequestRejected(409, [
        {
          code: "INGEST_DISABLED",
          path: "",
          message: `samples are read from ${this.source.kind}; ingestion is disabled`,
        },
      ]);
    }

    const samples: TemperatureSampleV1[] = [];
    let dropped = 0;
    for (const s of inputs) {
      const value = parseSensorValue(s.value);
      if (value === null) {
        dropped++;
        continue;
      }
      samples.push({ ts: s.ts, sensorId: s.sensorId ?? this.config.sensor_id, value });
    }

    const accepted = this.store.insertSamples(samples);
    const lastProcessed = this.state.last_processed_date;
    const late =
      lastProcessed === null
        ? 0
        : samples.filter(
            (s) =>
              s.sensorId === this.config.sensor_id &&
              calendarDateOfTs(s.ts, this.config.utc_offset_minutes) <= lastProcessed
          ).length;

    const result = { accepted, duplicates: samples.length - accepted, dropped_non_numeric: dropped, late };
    this.logger.debug({ ...result }, "samples ingested");
    return result;
  }

  /**
   * Processes one completed calendar day on demand. Days are processed in order:
   * a day at or before the last processed one is refused.
   */
  async processCompletedDay(date: CalendarDate): Promise<DayRunResultV1> {
    this.assertProcessable(date);
    const values = await this.readDay(date);
    this.assertProcessable(date);
    return this.applyDay(date, values, "run");
  }

  /**
   * The scheduled run: every pending completed day up to yesterday, then the
   * rollover check for today.
   */
  async runDailyCheck(): Promise<DailyCheckResultV1> {
    const today = this.today();
    const days: DayRunResultV1[] = [];

    for (const date of this.pendingDays(today)) {
      const values = await this.readDay(date);
      const last = this.state.last_processed_date;
      if (last !== null && date <= last) continue; // processed meanwhile by a request
      days.push(this.applyDay(date, values, "daily"));
    }

    const rolled = rolloverIfDue(this.state, today);
    if (rolled.state !== this.state) this.commit(rolled, "daily");
    return { today, days, rollover_events: rolled.events };
  }

  setOverride(season: SeasonV1, date: CalendarDate): SeasonStatusV1 {
    this.commit(setManualArrival(this.state, season, date), "override");
    return this.status();
  }

  clearOverride(season: SeasonV1): SeasonStatusV1 {
    this.commit(clearManualArrival(this.state, season), "override");
    return this.status();
  }

  clearArrival(season: SeasonV1): SeasonStatusV1 {
    this.commit(clearArrival(this.state, season), "clear");
    return this.status();
  }

  async close(): Promise<void> {
    await this.source.close();
    this.store.close();
  }

  private pendingDays(today: CalendarDate): CalendarDate[] {
    const yesterday = addDays(today, -1);
    const last = this.state.last_processed_date;
    if (last === null) return [yesterday];

    const out: CalendarDate[] = [];
    let d = addDays(last, 1);
    if (addDays(d, MAX_CATCH_UP_DAYS) < yesterday) {
      this.logger.warn({ last_processed_date: last, max_days: MAX_CATCH_UP_DAYS }, "catch-up window truncated");
      d = addDays(yesterday, -(MAX_CATCH_UP_DAYS - 1));
    }
    for (; d <= yesterday; d = addDays(d, 1)) out.push(d);
    return out;
  }

  private assertProcessable(date: CalendarDate): void {
    const today = this.today();
    if (date >= today) {
      throw new TrackerRequestRejected(409, [
        { code: "DAY_NOT_COMPLETED", path: "date", message: `${date} is not a completed day (today is ${today})` },
      ]);
    }
    const last = this.state.last_processed_date;
    if (last !== null && date <= last) {
      throw new TrackerRequestRejected(409, [
        { code: "DAY_ALREADY_PROCESSED", path: "date", message: `${date} is not after last processed day ${last}` },
      ]);
    }
  }

  private async readDay(date: CalendarDate): Promise<number[]> {
    const { startTs, endTs } = dayBoundsMs(date, this.config.utc_offset_minutes);
    return this.source.readValues(this.config.sensor_id, { startTs, endTs });
  }

  private applyDay(date: CalendarDate, values: number[], context: string): DayRunResultV1 {
    const processed_at_ts = this.clock();
    const mean = computeDailyMean(date, values);
    const step = mean === null ? skipDay(this.state, date, { processed_at_ts }) : processDay(this.state, mean, { processed_at_ts });
    this.commit(step, context);
    return {
      date,
      outcome: mean === null ? "gap" : "processed",
      sample_count: mean?.sample_count ?? 0,
      events: step.events,
    };
  }

  private commit(step: EngineStepV1, context: string): void {
    if (step.state !== this.state) {
      this.store.saveEngineState(dehydrateEngineState(step.state), this.clock());
      this.state = step.state;
    }
    this.logEvents(step.events, context);
  }

  private logEvents(events: ReadonlyArray<EngineEventV1>, context: string): void {
    for (const event of events) {
      this.logger[eventLevel(event)]({ context, event }, `engine ${event.kind}`);
    }
  }
}
