import { z } from "zod";

/**
 * TemperatureSampleV1Schema
 *
 * One outdoor-temperature reading in degrees Celsius.
 */
export const TemperatureSampleV1Schema = z.object({
  ts: z.number().int().finite(), // unix ms
  sensorId: z.string().min(1),
  value: z.number().finite(),
});

export type TemperatureSampleV1 = z.infer<typeof TemperatureSampleV1Schema>;

// Sensor feeds report states as text ("-3.5", "unknown", "unavailable").
// The ingestion layer keeps only entries whose value parses to a finite number.
export const TemperatureSampleInputV1Schema = z
  .object({
    ts: z.number().int().finite(),
    sensorId: z.string().min(1).optional(),
    value: z.union([z.number(), z.string()]),
  })
  .strict();

export type TemperatureSampleInputV1 = z.infer<typeof TemperatureSampleInputV1Schema>;

export const SampleBatchV1Schema = z
  .object({
    samples: z.array(TemperatureSampleInputV1Schema).min(1).max(10000),
  })
  .strict();

export type SampleBatchV1 = z.infer<typeof SampleBatchV1Schema>;

/**
 * Parses a sensor state into degrees Celsius, or null when the state is not a reading.
 */
export function parseSensorValue(v: number | string): number | null {
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  const s = v.trim();
  if (!s || s === "unknown" || s === "unavailable") return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}
