// Season Kernel - Current-Season Resolver

import { SEASONS_V1, type ArrivalRecordsV1, type EngineStateV1, type SeasonLabelV1, type SeasonV1 } from "@seasonwatch/contracts";
import type { CalendarDate } from "../calendar/calendar_date";

export type ResolvedSeasonV1 = {
  season: SeasonLabelV1;
  arrival_date: CalendarDate | null;
  source: "current" | "historical" | "none";
};

/**
 * Latest arrival dated on or before `today`. Iterates in catalog order and only
 * replaces on a strictly later date, so ties go to the earlier catalog entry.
 */
export function latestArrival(
  records: ArrivalRecordsV1,
  today: CalendarDate
): { season: SeasonV1; date: CalendarDate } | null {
  let best: { season: SeasonV1; date: CalendarDate } | null = null;
  for (const season of SEASONS_V1) {
    const date = records[season].date;
    if (date === null || date > today) continue;
    if (best === null || date > best.date) best = { season, date };
  }
  return best;
}

/**
 * The single active season label. Current-year records win; otherwise the
 * prior year's snapshot still applies (e.g. a winter that began in December);
 * otherwise "unknown". Never throws.
 */
export function resolveCurrentSeason(state: EngineStateV1, today: CalendarDate): ResolvedSeasonV1 {
  const current = latestArrival(state.ledger.records, today);
  if (current) return { season: current.season, arrival_date: current.date, source: "current" };

  const historical = latestArrival(state.snapshot.records, today);
  if (historical) return { season: historical.season, arrival_date: historical.date, source: "historical" };

  return { season: "unknown", arrival_date: null, source: "none" };
}
