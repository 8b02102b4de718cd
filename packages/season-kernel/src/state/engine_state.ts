// Season Kernel - Engine state
//
// The whole mutable state is one plain value (counters + ledger + snapshot).
// The caller owns the read-modify-write-persist cycle; the kernel only
// transforms values.

import { EngineStateV1Schema, SEASONS_V1, type EngineStateV1 } from "@seasonwatch/contracts";
import { yearOf, type CalendarDate } from "../calendar/calendar_date";
import { createEmptyCounters } from "../counters/counter_bank";
import type { EngineEventV1, EngineStepV1 } from "../events/engine_event";
import { createEmptyRecords } from "../ledger/arrival_ledger";

export const ENGINE_STATE_SCHEMA_VERSION = "1.0.0" as const;

export function createInitialState(): EngineStateV1 {
  return {
    schema_version: ENGINE_STATE_SCHEMA_VERSION,
    counters: createEmptyCounters(),
    ledger: { year: null, records: createEmptyRecords() },
    snapshot: { year: null, records: createEmptyRecords() },
    last_mean: null,
    last_processed_date: null,
    last_updated_at_ts: null,
  };
}

/**
 * Accepts whatever the external store returned. Anything that does not validate
 * falls back to the initial state; inconsistencies that do validate are kept as
 * they are and reported. Never throws: the tracker must always have a state to show.
 */
export function hydrateEngineState(raw: unknown, today: CalendarDate): EngineStepV1 {
  if (raw === null || raw === undefined) {
    return {
      state: createInitialState(),
      events: [{ kind: "state_anomaly", code: "STATE_ABSENT", detail: "no persisted state; starting empty" }],
    };
  }

  const parsed = EngineStateV1Schema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .slice(0, 5)
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    return {
      state: createInitialState(),
      events: [{ kind: "state_anomaly", code: "STATE_UNPARSEABLE", detail }],
    };
  }

  const state = parsed.data;
  return { state, events: detectAnomalies(state, today) };
}

export function detectAnomalies(state: EngineStateV1, today: CalendarDate): EngineEventV1[] {
  const events: EngineEventV1[] = [];
  const currentYear = yearOf(today);
  const ledgerYear = state.ledger.year;

  if (ledgerYear !== null && ledgerYear > currentYear) {
    events.push({
      kind: "state_anomaly",
      code: "LEDGER_YEAR_IN_FUTURE",
      detail: `ledger year ${ledgerYear} is after ${currentYear}`,
    });
  }

  for (const season of SEASONS_V1) {
    const date = state.ledger.records[season].date;
    if (date === null) continue;
    const y = yearOf(date);
    if (y > currentYear) {
      events.push({ kind: "state_anomaly", code: "RECORD_IN_FUTURE_YEAR", detail: `${season} arrival ${date}` });
    } else if (ledgerYear !== null && y !== ledgerYear && y !== ledgerYear - 1) {
      // A run that started in late December and committed in January is dated in ledgerYear - 1.
      events.push({
        kind: "state_anomaly",
        code: "RECORD_OUTSIDE_LEDGER_YEAR",
        detail: `${season} arrival ${date} in ledger year ${ledgerYear}`,
      });
    }
  }

  return events;
}

/** Plain JSON data for the external store. */
export function dehydrateEngineState(state: EngineStateV1): EngineStateV1 {
  return EngineStateV1Schema.parse(JSON.parse(JSON.stringify(state)));
}
