// Season Kernel - Rollover Manager
//
// Trigger: the ledger year is strictly less than the year of `today`.
// Action: the whole ledger becomes the historical snapshot (overwriting the
// previous one) and a cleared ledger is opened for the new year.
// Re-running after a rollover is a no-op because the trigger no longer holds.

import type { EngineStateV1 } from "@seasonwatch/contracts";
import { yearOf, type CalendarDate } from "../calendar/calendar_date";
import type { EngineStepV1 } from "../events/engine_event";
import { cloneRecords, createEmptyRecords } from "./arrival_ledger";

export function isRolloverDue(state: EngineStateV1, today: CalendarDate): boolean {
  return state.ledger.year !== null && state.ledger.year < yearOf(today);
}

export function rolloverIfDue(state: EngineStateV1, today: CalendarDate): EngineStepV1 {
  const year = yearOf(today);

  if (state.ledger.year === null) {
    // Nothing recorded yet: open the year, leave the snapshot as it is.
    return {
      state: { ...state, ledger: { year, records: cloneRecords(state.ledger.records) } },
      events: [{ kind: "ledger_opened", year }],
    };
  }

  if (!isRolloverDue(state, today)) return { state, events: [] };

  const from_year = state.ledger.year;
  return {
    state: {
      ...state,
      snapshot: { year: from_year, records: cloneRecords(state.ledger.records) },
      ledger: { year, records: createEmptyRecords() },
    },
    events: [{ kind: "rollover", from_year, to_year: year }],
  };
}
