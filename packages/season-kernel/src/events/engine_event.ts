// Season Kernel - Engine events
//
// Advisory observability output. The kernel returns these as data; the
// caller decides how to log them. Nothing in the data model depends on them.

import type { EngineStateV1, SeasonV1 } from "@seasonwatch/contracts";
import type { CalendarDate } from "../calendar/calendar_date";

export type LedgerOutcomeV1 = "committed" | "ineligible_deferred" | "already_set" | "override_blocked" | "stale_year";

export type CommitTriggerV1 = "threshold" | "deferred_recheck";

export type StateAnomalyCodeV1 =
  | "STATE_ABSENT"
  | "STATE_UNPARSEABLE"
  | "LEDGER_YEAR_IN_FUTURE"
  | "RECORD_IN_FUTURE_YEAR"
  | "RECORD_OUTSIDE_LEDGER_YEAR"
  | "OVERRIDE_OUTSIDE_LEDGER_YEAR";

export type EngineEventV1 =
  | {
      kind: "counter_evaluated";
      season: SeasonV1;
      date: CalendarDate;
      mean_c: number;
      satisfied: boolean;
      consecutive_days: number;
      run_length: number;
    }
  | { kind: "threshold_reached"; season: SeasonV1; date: CalendarDate }
  | {
      kind: "ledger_outcome";
      season: SeasonV1;
      date: CalendarDate;
      trigger: CommitTriggerV1;
      outcome: LedgerOutcomeV1;
      // The run's first day for this evaluation (the date that would be / was committed).
      arrival_date: CalendarDate;
      ledger_year: number | null;
    }
  | { kind: "rollover"; from_year: number; to_year: number }
  | { kind: "ledger_opened"; year: number }
  | { kind: "day_gap"; date: CalendarDate }
  | { kind: "override_set"; season: SeasonV1; date: CalendarDate }
  | { kind: "override_cleared"; season: SeasonV1; previous_date: CalendarDate | null }
  | { kind: "arrival_cleared"; season: SeasonV1; previous_date: CalendarDate | null; was_manual: boolean }
  | { kind: "state_anomaly"; code: StateAnomalyCodeV1; detail: string };

/**
 * Result of every state transition in the kernel. The input state is never mutated.
 */
export type EngineStepV1 = {
  state: EngineStateV1;
  events: EngineEventV1[];
};
