// CSV sample files for offline replay.
//
// Format: a header line naming at least `ts` and `value`, optional `sensor_id`.
// - ts:    unix ms or an ISO 8601 timestamp with zone
// - value: sensor state text; "unknown" / "unavailable" lines are skipped

import { parseSensorValue, type TemperatureSampleV1 } from "@seasonwatch/contracts";

export type CsvSkip = {
  line_no: number;
  reason: "BAD_TS" | "NOT_A_READING" | "SHORT_LINE";
};

export type CsvSamplesResult = {
  samples: TemperatureSampleV1[];
  skipped: CsvSkip[];
};

function parseTs(raw: string): number {
  const s = raw.trim();
  if (/^\d+$/.test(s)) return Number(s);
  // Without a zone Date.parse would use the host zone.
  if (!/(Z|[+-]\d{2}:?\d{2})$/.test(s)) return NaN;
  return Date.parse(s);
}

export function parseCsvSamples(text: string, defaultSensorId: string): CsvSamplesResult {
  const lines = text.split(/\r?\n/);
  const header = (lines[0] ?? "").split(",").map((h) => h.trim().toLowerCase());
  const tsCol = header.indexOf("ts");
  const valueCol = header.indexOf("value");
  const sensorCol = header.indexOf("sensor_id");
  if (tsCol === -1 || valueCol === -1) {
    throw new Error(`CSV_HEADER_MISSING: expected ts,value columns, got "${lines[0] ?? ""}"`);
  }

  const samples: TemperatureSampleV1[] = [];
  const skipped: CsvSkip[] = [];

  for (let i = 1; i < lines.length; i++) {
    const line = (lines[i] ?? "").trim();
    if (!line || line.startsWith("#")) continue;
    const cells = line.split(",").map((c) => c.trim());
    const line_no = i + 1;

    const tsRaw = cells[tsCol];
    const valueRaw = cells[valueCol];
    if (tsRaw === undefined || valueRaw === undefined) {
      skipped.push({ line_no, reason: "SHORT_LINE" });
      continue;
    }

    const ts = parseTs(tsRaw);
    if (!Number.isFinite(ts)) {
      skipped.push({ line_no, reason: "BAD_TS" });
      continue;
    }
    const value = parseSensorValue(valueRaw);
    if (value === null) {
      skipped.push({ line_no, reason: "NOT_A_READING" });
      continue;
    }

    const sensorCell = sensorCol === -1 ? undefined : cells[sensorCol];
    samples.push({ ts, sensorId: sensorCell || defaultSensorId, value });
  }

  samples.sort((a, b) => a.ts - b.ts);
  return { samples, skipped };
}
