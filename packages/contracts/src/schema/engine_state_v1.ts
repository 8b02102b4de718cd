import { z } from "zod";
import { CalendarDateV1Schema } from "./calendar_date_v1";
import { DailyMeanV1Schema } from "./daily_mean_v1";

export const SeasonCounterV1Schema = z.object({
  consecutive_days: z.number().int().nonnegative(),
  // The run crossed its length before the season's eligible date; re-checked daily while it lasts.
  deferred: z.boolean().default(false),
});

export const ArrivalRecordV1Schema = z.object({
  date: CalendarDateV1Schema.nullable(),
  manually_set: z.boolean().default(false),
});

const perSeason = <T extends z.ZodTypeAny>(item: T) =>
  z.object({ winter: item, spring: item, summer: item, autumn: item });

export const SeasonCountersV1Schema = perSeason(SeasonCounterV1Schema);
export const ArrivalRecordsV1Schema = perSeason(ArrivalRecordV1Schema);

export const ArrivalLedgerV1Schema = z.object({
  // null: fresh state, no year opened yet.
  year: z.number().int().nullable(),
  records: ArrivalRecordsV1Schema,
});

export const HistoricalSnapshotV1Schema = z.object({
  year: z.number().int().nullable(),
  records: ArrivalRecordsV1Schema,
});

export const EngineStateV1Schema = z.object({
  schema_version: z.literal("1.0.0"),
  counters: SeasonCountersV1Schema,
  ledger: ArrivalLedgerV1Schema,
  snapshot: HistoricalSnapshotV1Schema,
  last_mean: DailyMeanV1Schema.nullable(),
  last_processed_date: CalendarDateV1Schema.nullable(),
  last_updated_at_ts: z.number().int().nullable(),
});

export type SeasonCounterV1 = z.infer<typeof SeasonCounterV1Schema>;
export type ArrivalRecordV1 = z.infer<typeof ArrivalRecordV1Schema>;
export type SeasonCountersV1 = z.infer<typeof SeasonCountersV1Schema>;
export type ArrivalRecordsV1 = z.infer<typeof ArrivalRecordsV1Schema>;
export type ArrivalLedgerV1 = z.infer<typeof ArrivalLedgerV1Schema>;
export type HistoricalSnapshotV1 = z.infer<typeof HistoricalSnapshotV1Schema>;
export type EngineStateV1 = z.infer<typeof EngineStateV1Schema>;
