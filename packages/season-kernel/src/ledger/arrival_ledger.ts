// Season Kernel - Arrival Ledger / commit policy
//
// Precedence for an evaluation of (season, day D), Y = year(D):
//   1. D belongs to a year older than the ledger      -> stale_year
//   2. record is manually set                         -> override_blocked
//   3. record already has a date (auto commit)        -> already_set
//   4. run start (D - run_length + 1) precedes the
//      season's eligible date in year Y               -> ineligible_deferred
//   5. otherwise                                      -> committed, date = run start
//
// Only step 5 writes. Manual values and explicit clearing come from outside
// the daily tick and are the only other writers.

import type { ArrivalLedgerV1, ArrivalRecordsV1, EngineStateV1, SeasonV1 } from "@seasonwatch/contracts";
import { addDays, monthDayInYear, yearOf, type CalendarDate } from "../calendar/calendar_date";
import type { SeasonDefinitionV1 } from "../catalog/season_catalog";
import type { EngineEventV1, EngineStepV1, LedgerOutcomeV1 } from "../events/engine_event";

export type CommitDecisionV1 = {
  outcome: LedgerOutcomeV1;
  arrival_date: CalendarDate;
};

export function createEmptyRecords(): ArrivalRecordsV1 {
  return {
    winter: { date: null, manually_set: false },
    spring: { date: null, manually_set: false },
    summer: { date: null, manually_set: false },
    autumn: { date: null, manually_set: false },
  };
}

export function cloneRecords(records: ArrivalRecordsV1): ArrivalRecordsV1 {
  return {
    winter: { ...records.winter },
    spring: { ...records.spring },
    summer: { ...records.summer },
    autumn: { ...records.autumn },
  };
}

/** First day of the qualifying run that ends on `day`. */
export function runStartDate(definition: Readonly<SeasonDefinitionV1>, day: CalendarDate): CalendarDate {
  return addDays(day, -(definition.run_length - 1));
}

/**
 * Whether a run starting on `arrival` may commit, given the season's recurring gate in `year`.
 */
export function isEligibleArrival(
  definition: Readonly<SeasonDefinitionV1>,
  arrival: CalendarDate,
  year: number
): boolean {
  if (!definition.earliest_eligible) return true;
  return arrival >= monthDayInYear(definition.earliest_eligible, year);
}

export function decideCommit(
  ledger: ArrivalLedgerV1,
  definition: Readonly<SeasonDefinitionV1>,
  day: CalendarDate
): CommitDecisionV1 {
  const year = yearOf(day);
  const arrival_date = runStartDate(definition, day);
  const record = ledger.records[definition.season];

  if (ledger.year !== null && year < ledger.year) return { outcome: "stale_year", arrival_date };
  if (record.manually_set) return { outcome: "override_blocked", arrival_date };
  if (record.date !== null) return { outcome: "already_set", arrival_date };
  if (!isEligibleArrival(definition, arrival_date, year)) return { outcome: "ineligible_deferred", arrival_date };
  return { outcome: "committed", arrival_date };
}

export function applyCommitDecision(
  ledger: ArrivalLedgerV1,
  season: SeasonV1,
  decision: CommitDecisionV1
): ArrivalLedgerV1 {
  if (decision.outcome !== "committed") return ledger;
  const records = cloneRecords(ledger.records);
  records[season] = { date: decision.arrival_date, manually_set: false };
  return { year: ledger.year, records };
}

/**
 * Externally supplied arrival date. Suppresses automatic commits for the season
 * until the override is cleared.
 */
export function setManualArrival(state: EngineStateV1, season: SeasonV1, date: CalendarDate): EngineStepV1 {
  const events: EngineEventV1[] = [];
  const ledgerYear = state.ledger.year ?? yearOf(date);

  if (yearOf(date) !== ledgerYear) {
    events.push({
      kind: "state_anomaly",
      code: "OVERRIDE_OUTSIDE_LEDGER_YEAR",
      detail: `${season} override ${date} stored in ledger year ${ledgerYear}`,
    });
  }

  const records = cloneRecords(state.ledger.records);
  records[season] = { date, manually_set: true };
  events.push({ kind: "override_set", season, date });

  return { state: { ...state, ledger: { year: ledgerYear, records } }, events };
}

/**
 * Removes a manual value: the record reverts to empty and automatic commits are
 * possible again. No-op when the record is not manually set.
 */
export function clearManualArrival(state: EngineStateV1, season: SeasonV1): EngineStepV1 {
  const record = state.ledger.records[season];
  if (!record.manually_set) return { state, events: [] };

  const records = cloneRecords(state.ledger.records);
  records[season] = { date: null, manually_set: false };
  return {
    state: { ...state, ledger: { year: state.ledger.year, records } },
    events: [{ kind: "override_cleared", season, previous_date: record.date }],
  };
}

/**
 * Explicit external clearing of whatever is stored for the season this year,
 * automatic or manual.
 */
export function clearArrival(state: EngineStateV1, season: SeasonV1): EngineStepV1 {
  const record = state.ledger.records[season];
  if (record.date === null && !record.manually_set) return { state, events: [] };

  const records = cloneRecords(state.ledger.records);
  records[season] = { date: null, manually_set: false };
  return {
    state: { ...state, ledger: { year: state.ledger.year, records } },
    events: [{ kind: "arrival_cleared", season, previous_date: record.date, was_manual: record.manually_set }],
  };
}
