// Season Kernel - Counter Bank
//
// Four independent consecutive-day counters, one per catalog entry. Every
// daily mean is evaluated against all four definitions; a single day may
// increment some counters and reset others. This is deliberately not an
// exclusive "current season" state machine.
//
// Counters keep counting past run_length (display only). The threshold event
// is edge-triggered: it fires on the day a counter goes from run_length-1 to
// run_length, and cannot fire again until the counter has been reset.

import type { SeasonCountersV1, SeasonV1 } from "@seasonwatch/contracts";
import { SEASON_CATALOG_V1, seasonCriterionHolds, type SeasonDefinitionV1 } from "../catalog/season_catalog";

export type CounterEvaluationV1 = {
  season: SeasonV1;
  definition: Readonly<SeasonDefinitionV1>;
  satisfied: boolean;
  previous_days: number;
  consecutive_days: number;
  threshold_reached: boolean;
  // Run still unbroken and carrying a deferred commit from an earlier day.
  deferred: boolean;
};

export function createEmptyCounters(): SeasonCountersV1 {
  return {
    winter: { consecutive_days: 0, deferred: false },
    spring: { consecutive_days: 0, deferred: false },
    summer: { consecutive_days: 0, deferred: false },
    autumn: { consecutive_days: 0, deferred: false },
  };
}

export function evaluateCounter(
  definition: Readonly<SeasonDefinitionV1>,
  counter: SeasonCountersV1[SeasonV1],
  meanC: number
): CounterEvaluationV1 {
  const satisfied = seasonCriterionHolds(definition, meanC);
  const previous_days = counter.consecutive_days;
  const consecutive_days = satisfied ? previous_days + 1 : 0;
  return {
    season: definition.season,
    definition,
    satisfied,
    previous_days,
    consecutive_days,
    threshold_reached: satisfied && consecutive_days === definition.run_length,
    deferred: satisfied && counter.deferred,
  };
}

/**
 * Evaluates all four counters against the same daily mean, in catalog order.
 */
export function evaluateCounters(
  counters: SeasonCountersV1,
  meanC: number
): { counters: SeasonCountersV1; evaluations: CounterEvaluationV1[] } {
  const next: SeasonCountersV1 = { ...counters };
  const evaluations: CounterEvaluationV1[] = [];

  for (const def of SEASON_CATALOG_V1) {
    const ev = evaluateCounter(def, counters[def.season], meanC);
    next[def.season] = { consecutive_days: ev.consecutive_days, deferred: ev.deferred };
    evaluations.push(ev);
  }

  return { counters: next, evaluations };
}
