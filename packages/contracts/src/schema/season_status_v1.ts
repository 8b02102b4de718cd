import { z } from "zod";
import { CalendarDateV1Schema } from "./calendar_date_v1";
import { LocaleV1Schema, SeasonLabelV1Schema } from "./season_v1";

const perSeason = <T extends z.ZodTypeAny>(item: T) =>
  z.object({ winter: item, spring: item, summer: item, autumn: item });

export const SeasonProgressV1Schema = z.object({
  label: z.string(),
  consecutive_days: z.number().int().nonnegative(),
  run_length: z.number().int().positive(),
  progress_text: z.string(), // "3/5"
  deferred: z.boolean(),
});

export const ArrivalEntryV1Schema = z.object({
  label: z.string(),
  date: CalendarDateV1Schema.nullable(),
  date_text: z.string().nullable(),
  manually_set: z.boolean(),
});

/**
 * Primary status record: what a dashboard shows for the tracker.
 */
export const SeasonStatusV1Schema = z.object({
  type: z.literal("season_status_v1"),
  locale: LocaleV1Schema,
  today: CalendarDateV1Schema,
  season: SeasonLabelV1Schema,
  season_text: z.string(),
  source: z.enum(["current", "historical", "none"]),
  arrival_date: CalendarDateV1Schema.nullable(),
  arrival_date_text: z.string().nullable(),
  ledger_year: z.number().int().nullable(),
  counters: perSeason(SeasonProgressV1Schema),
  last_mean: z
    .object({
      date: CalendarDateV1Schema,
      mean_c: z.number(),
      mean_text: z.string(), // "-1.2°C"
      sample_count: z.number().int().positive(),
    })
    .nullable(),
  arrivals: perSeason(ArrivalEntryV1Schema),
  last_processed_date: CalendarDateV1Schema.nullable(),
  last_updated_at_ts: z.number().int().nullable(),
});

/**
 * Historical status record: the prior year's arrival dates, replaced wholesale at rollover.
 */
export const SeasonHistoryV1Schema = z.object({
  type: z.literal("season_history_v1"),
  locale: LocaleV1Schema,
  year: z.number().int().nullable(),
  arrivals: perSeason(ArrivalEntryV1Schema),
});

export type SeasonProgressV1 = z.infer<typeof SeasonProgressV1Schema>;
export type ArrivalEntryV1 = z.infer<typeof ArrivalEntryV1Schema>;
export type SeasonStatusV1 = z.infer<typeof SeasonStatusV1Schema>;
export type SeasonHistoryV1 = z.infer<typeof SeasonHistoryV1Schema>;
