// Offline replay of recorded samples through the season engine.
//
// Samples must be time-ordered. Days without samples between two sampled days
// are gaps; out-of-order samples are dropped and counted.

import type {
  EngineStateV1,
  LocaleV1,
  SeasonHistoryV1,
  SeasonStatusV1,
  TemperatureSampleV1,
} from "@seasonwatch/contracts";
import {
  SampleAggregator,
  addDays,
  buildHistoricalStatus,
  buildPrimaryStatus,
  calendarDateOfTs,
  createInitialState,
  hydrateEngineState,
  processDay,
  skipDay,
  type EngineEventV1,
  type EngineStepV1,
} from "@seasonwatch/season-kernel";

import type { TrackerLogger } from "./logger";

export type ReplayOptions = {
  sensorId: string;
  utcOffsetMinutes: number;
  locale: LocaleV1;
  logger: TrackerLogger;
  // Persisted state document to continue from; absent starts empty.
  initialState?: unknown;
};

export type ReplayResultV1 = {
  days: number;
  late_samples: number;
  state: EngineStateV1;
  status: SeasonStatusV1;
  history: SeasonHistoryV1;
};

export function replaySamples(samples: ReadonlyArray<TemperatureSampleV1>, opts: ReplayOptions): ReplayResultV1 {
  const own = samples.filter((s) => s.sensorId === opts.sensorId);
  const first = own[0];
  if (first === undefined) throw new Error(`NO_SAMPLES_FOR_SENSOR: ${opts.sensorId}`);

  const logEvents = (events: ReadonlyArray<EngineEventV1>): void => {
    for (const event of events) {
      if (event.kind === "counter_evaluated") continue;
      const level = event.kind === "state_anomaly" ? "warn" : "info";
      opts.logger[level]({ event }, `engine ${event.kind}`);
    }
  };

  let state: EngineStateV1 = createInitialState();
  if (opts.initialState !== undefined) {
    const hydrated = hydrateEngineState(opts.initialState, calendarDateOfTs(first.ts, opts.utcOffsetMinutes));
    logEvents(hydrated.events);
    state = hydrated.state;
  }

  const apply = (step: EngineStepV1): void => {
    logEvents(step.events);
    state = step.state;
  };

  const agg = new SampleAggregator(opts.utcOffsetMinutes);
  let days = 0;
  for (const s of own) {
    const r = agg.push(s);
    if (!r.completed) continue;
    apply(processDay(state, r.completed));
    days++;
    for (const gap of r.skipped_days) apply(skipDay(state, gap));
  }
  const last = agg.flush();
  if (last) {
    apply(processDay(state, last));
    days++;
  }

  if (agg.lateSamples) opts.logger.warn({ late: agg.lateSamples }, "out-of-order samples dropped");

  // Status as seen on the morning after the last processed day.
  const today = state.last_processed_date ? addDays(state.last_processed_date, 1) : calendarDateOfTs(first.ts, opts.utcOffsetMinutes);
  return {
    days,
    late_samples: agg.lateSamples,
    state,
    status: buildPrimaryStatus(state, today, opts.locale),
    history: buildHistoricalStatus(state, opts.locale),
  };
}

/** The document the CLI prints on stdout: one JSON value, nothing else. */
export function renderReplayOutput(result: ReplayResultV1): string {
  return JSON.stringify({ days: result.days, status: result.status, history: result.history }, null, 2) + "\n";
}
