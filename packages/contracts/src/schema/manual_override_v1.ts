import { z } from "zod";
import { CalendarDateV1Schema } from "./calendar_date_v1";

// PUT /api/season/overrides/:season
export const ManualOverrideV1Schema = z
  .object({
    date: CalendarDateV1Schema,
  })
  .strict();

export type ManualOverrideV1 = z.infer<typeof ManualOverrideV1Schema>;

// POST /api/season/run
export const RunDayRequestV1Schema = z
  .object({
    date: CalendarDateV1Schema.optional(),
  })
  .strict();

export type RunDayRequestV1 = z.infer<typeof RunDayRequestV1Schema>;
