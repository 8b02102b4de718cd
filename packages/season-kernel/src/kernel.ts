// Season Kernel - Daily tick entrypoint
//
// processDay(state, mean) is the whole daily step:
// 1) Rollover check at the mean's date (opens a fresh year when due).
// 2) Counter Bank: all four counters evaluated against the same mean.
// 3) Commit policy for each threshold-reached edge, and for each run that is
//    still carrying a deferred (not yet eligible) commit.
// 4) The mean is kept as last_mean for display.
//
// No IO. No clock reads. The input state is never mutated.

import type { DailyMeanV1, EngineStateV1, SeasonCountersV1 } from "@seasonwatch/contracts";
import type { CalendarDate } from "./calendar/calendar_date";
import { evaluateCounters } from "./counters/counter_bank";
import type { CommitTriggerV1, EngineEventV1, EngineStepV1 } from "./events/engine_event";
import { applyCommitDecision, decideCommit } from "./ledger/arrival_ledger";
import { rolloverIfDue } from "./ledger/rollover";

export type ProcessDayOptions = {
  // Wall-clock time of the run, stored as last_updated_at_ts when given.
  processed_at_ts?: number;
};

export function processDay(state: EngineStateV1, mean: DailyMeanV1, options: ProcessDayOptions = {}): EngineStepV1 {
  const rolled = rolloverIfDue(state, mean.date);
  const events: EngineEventV1[] = [...rolled.events];

  const evaluated = evaluateCounters(rolled.state.counters, mean.mean_c);
  const counters: SeasonCountersV1 = { ...evaluated.counters };
  let ledger = rolled.state.ledger;

  for (const ev of evaluated.evaluations) {
    events.push({
      kind: "counter_evaluated",
      season: ev.season,
      date: mean.date,
      mean_c: mean.mean_c,
      satisfied: ev.satisfied,
      consecutive_days: ev.consecutive_days,
      run_length: ev.definition.run_length,
    });

    let trigger: CommitTriggerV1 | null = null;
    if (ev.threshold_reached) {
      events.push({ kind: "threshold_reached", season: ev.season, date: mean.date });
      trigger = "threshold";
    } else if (ev.deferred) {
      trigger = "deferred_recheck";
    }
    if (trigger === null) continue;

    const decision = decideCommit(ledger, ev.definition, mean.date);
    ledger = applyCommitDecision(ledger, ev.season, decision);
    counters[ev.season] = {
      consecutive_days: ev.consecutive_days,
      deferred: decision.outcome === "ineligible_deferred",
    };
    events.push({
      kind: "ledger_outcome",
      season: ev.season,
      date: mean.date,
      trigger,
      outcome: decision.outcome,
      arrival_date: decision.arrival_date,
      ledger_year: ledger.year,
    });
  }

  return {
    state: {
      ...rolled.state,
      counters,
      ledger,
      last_mean: { ...mean },
      last_processed_date: mean.date,
      last_updated_at_ts: options.processed_at_ts ?? rolled.state.last_updated_at_ts,
    },
    events,
  };
}

/**
 * A day with no samples: counters and ledger stay exactly as they are.
 */
export function skipDay(state: EngineStateV1, date: CalendarDate, options: ProcessDayOptions = {}): EngineStepV1 {
  return {
    state: {
      ...state,
      last_processed_date: date,
      last_updated_at_ts: options.processed_at_ts ?? state.last_updated_at_ts,
    },
    events: [{ kind: "day_gap", date }],
  };
}
