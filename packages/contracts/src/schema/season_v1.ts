import { z } from "zod";

// Declaration order is also the resolver tie-break order.
export const SEASONS_V1 = ["winter", "spring", "summer", "autumn"] as const;

export const SeasonV1Schema = z.enum(SEASONS_V1);
export type SeasonV1 = z.infer<typeof SeasonV1Schema>;

export const SeasonLabelV1Schema = z.enum(["unknown", "winter", "spring", "summer", "autumn"]);
export type SeasonLabelV1 = z.infer<typeof SeasonLabelV1Schema>;

export const LocaleV1Schema = z.enum(["en", "sv"]);
export type LocaleV1 = z.infer<typeof LocaleV1Schema>;

export function isSeasonV1(x: unknown): x is SeasonV1 {
  return SeasonV1Schema.safeParse(x).success;
}
