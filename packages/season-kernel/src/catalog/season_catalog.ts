// Season Kernel - Season Catalog
//
// Fixed consecutive-day rules, one per season:
// - Winter: daily mean <= 0.0 °C for 5 days
// - Spring: daily mean >  0.0 °C for 7 days, not before Feb 15
// - Summer: daily mean >= 10.0 °C for 5 days
// - Autumn: daily mean <  10.0 °C for 5 days, not before Aug 1
//
// Catalog order is the resolver's tie-break order. Do not reorder.

import type { SeasonV1 } from "@seasonwatch/contracts";
import type { MonthDay } from "../calendar/calendar_date";

export type ComparatorV1 = "lte" | "gt" | "gte" | "lt";

export interface SeasonDefinitionV1 {
  season: SeasonV1;
  comparator: ComparatorV1;
  threshold_c: number;
  // Required consecutive qualifying days.
  run_length: number;
  // Recurring yearly gate; null when the season may arrive any day.
  earliest_eligible: Readonly<MonthDay> | null;
}

const DEFINITIONS_V1: SeasonDefinitionV1[] = [
  { season: "winter", comparator: "lte", threshold_c: 0.0, run_length: 5, earliest_eligible: null },
  { season: "spring", comparator: "gt", threshold_c: 0.0, run_length: 7, earliest_eligible: { month: 2, day: 15 } },
  { season: "summer", comparator: "gte", threshold_c: 10.0, run_length: 5, earliest_eligible: null },
  { season: "autumn", comparator: "lt", threshold_c: 10.0, run_length: 5, earliest_eligible: { month: 8, day: 1 } },
];

export const SEASON_CATALOG_V1: ReadonlyArray<Readonly<SeasonDefinitionV1>> = Object.freeze(
  DEFINITIONS_V1.map((d) => Object.freeze({ ...d }))
);

const CATALOG_BY_SEASON: ReadonlyMap<SeasonV1, Readonly<SeasonDefinitionV1>> = new Map(
  SEASON_CATALOG_V1.map((d) => [d.season, d] as const)
);

export function getSeasonDefinition(season: SeasonV1): Readonly<SeasonDefinitionV1> {
  const def = CATALOG_BY_SEASON.get(season);
  if (!def) throw new Error(`SEASON_NOT_IN_CATALOG: ${season} @ getSeasonDefinition`);
  return def;
}

export function evaluateComparator(comparator: ComparatorV1, mean: number, threshold: number): boolean {
  switch (comparator) {
    case "lte":
      return mean <= threshold;
    case "gt":
      return mean > threshold;
    case "gte":
      return mean >= threshold;
    case "lt":
      return mean < threshold;
    default: {
      const never: never = comparator;
      throw new Error(`UNKNOWN_COMPARATOR: ${String(never)}`);
    }
  }
}

export function seasonCriterionHolds(def: Readonly<SeasonDefinitionV1>, mean: number): boolean {
  return evaluateComparator(def.comparator, mean, def.threshold_c);
}
