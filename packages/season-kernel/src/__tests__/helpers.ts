// Shared fixtures for season-kernel tests.

import { SEASONS_V1, type EngineStateV1, type SeasonV1 } from "@seasonwatch/contracts";
import { addDays, type CalendarDate } from "../calendar/calendar_date";
import type { EngineEventV1 } from "../events/engine_event";
import { processDay } from "../kernel";
import { createInitialState } from "../state/engine_state";

export type Run = { state: EngineStateV1; events: EngineEventV1[] };

/** Feeds one daily mean per consecutive calendar day, starting at `start`. */
export function runMeans(state: EngineStateV1, start: CalendarDate, means: number[]): Run {
  let cur = state;
  const events: EngineEventV1[] = [];
  means.forEach((mean_c, i) => {
    const step = processDay(cur, { date: addDays(start, i), mean_c, sample_count: 24 });
    cur = step.state;
    events.push(...step.events);
  });
  return { state: cur, events };
}

export function repeat(value: number, n: number): number[] {
  return Array.from({ length: n }, () => value);
}

export function stateWithLedger(
  year: number | null,
  dates: Partial<Record<SeasonV1, CalendarDate>>,
  manual: SeasonV1[] = []
): EngineStateV1 {
  const s = createInitialState();
  s.ledger.year = year;
  for (const season of SEASONS_V1) {
    const date = dates[season];
    if (date !== undefined) s.ledger.records[season] = { date, manually_set: manual.includes(season) };
  }
  return s;
}

export function ledgerOutcomes(events: EngineEventV1[], season: SeasonV1) {
  return events.flatMap((e) => (e.kind === "ledger_outcome" && e.season === season ? [e] : []));
}

export function thresholdDays(events: EngineEventV1[], season: SeasonV1): CalendarDate[] {
  return events.flatMap((e) => (e.kind === "threshold_reached" && e.season === season ? [e.date] : []));
}
