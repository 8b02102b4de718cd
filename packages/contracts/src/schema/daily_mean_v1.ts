import { z } from "zod";
import { CalendarDateV1Schema } from "./calendar_date_v1";

export const DailyMeanV1Schema = z.object({
  date: CalendarDateV1Schema,
  mean_c: z.number().finite(),
  sample_count: z.number().int().positive(),
});

export type DailyMeanV1 = z.infer<typeof DailyMeanV1Schema>;
