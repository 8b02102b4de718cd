// Season Kernel - Status records
//
// Pure projections of the engine state for display. The primary record is
// what a dashboard shows now; the historical record is last year's ledger.

import type {
  ArrivalEntryV1,
  ArrivalRecordsV1,
  EngineStateV1,
  LocaleV1,
  SeasonHistoryV1,
  SeasonProgressV1,
  SeasonStatusV1,
  SeasonV1,
} from "@seasonwatch/contracts";
import type { CalendarDate } from "../calendar/calendar_date";
import { getSeasonDefinition } from "../catalog/season_catalog";
import { resolveCurrentSeason } from "../resolve/current_season";
import { formatCalendarDate, formatTemperature, seasonText } from "./locale";

type PerSeason<T> = Record<SeasonV1, T>;

function mapSeasons<T>(fn: (season: SeasonV1) => T): PerSeason<T> {
  return { winter: fn("winter"), spring: fn("spring"), summer: fn("summer"), autumn: fn("autumn") };
}

function arrivalEntries(records: ArrivalRecordsV1, locale: LocaleV1): PerSeason<ArrivalEntryV1> {
  return mapSeasons((season) => {
    const r = records[season];
    return {
      label: seasonText(season, locale),
      date: r.date,
      date_text: r.date === null ? null : formatCalendarDate(r.date, locale),
      manually_set: r.manually_set,
    };
  });
}

export function buildPrimaryStatus(state: EngineStateV1, today: CalendarDate, locale: LocaleV1): SeasonStatusV1 {
  const resolved = resolveCurrentSeason(state, today);

  const counters = mapSeasons((season): SeasonProgressV1 => {
    const c = state.counters[season];
    const runLength = getSeasonDefinition(season).run_length;
    return {
      label: seasonText(season, locale),
      consecutive_days: c.consecutive_days,
      run_length: runLength,
      progress_text: `${c.consecutive_days}/${runLength}`,
      deferred: c.deferred,
    };
  });

  return {
    type: "season_status_v1",
    locale,
    today,
    season: resolved.season,
    season_text: seasonText(resolved.season, locale),
    source: resolved.source,
    arrival_date: resolved.arrival_date,
    arrival_date_text: resolved.arrival_date === null ? null : formatCalendarDate(resolved.arrival_date, locale),
    ledger_year: state.ledger.year,
    counters,
    last_mean:
      state.last_mean === null
        ? null
        : {
            date: state.last_mean.date,
            mean_c: state.last_mean.mean_c,
            mean_text: formatTemperature(state.last_mean.mean_c),
            sample_count: state.last_mean.sample_count,
          },
    arrivals: arrivalEntries(state.ledger.records, locale),
    last_processed_date: state.last_processed_date,
    last_updated_at_ts: state.last_updated_at_ts,
  };
}

export function buildHistoricalStatus(state: EngineStateV1, locale: LocaleV1): SeasonHistoryV1 {
  return {
    type: "season_history_v1",
    locale,
    year: state.snapshot.year,
    arrivals: arrivalEntries(state.snapshot.records, locale),
  };
}
