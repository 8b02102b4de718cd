// Shared fixtures for tracker tests. Everything runs in process: in-memory
// SQLite, a settable clock and a logger that records instead of printing.

import type { TrackerConfigV1 } from "../config";
import type { LogFn, TrackerLogger } from "../logger";
import { SeasonTrackerRuntime } from "../runtime";
import { SqliteSampleSource, type SampleSource } from "../sources/sample_source";
import { TrackerSqliteStore } from "../store/sqlite_store";

export const HOUR_MS = 60 * 60 * 1000;

export function testConfig(overrides: Partial<TrackerConfigV1> = {}): TrackerConfigV1 {
  return {
    schema_version: "1.0.0",
    sensor_id: "outdoor",
    locale: "en",
    utc_offset_minutes: 60,
    sample_source: "sqlite",
    store: { file_path: ":memory:" },
    pg: { database_url: null, facts_view: "facts_replay_v1", metric: "air_temp_c" },
    schedule: { enabled: false, hour: 0, minute: 0, second: 10 },
    server: { host: "127.0.0.1", port: 3110 },
    ...overrides,
  };
}

export type LogEntry = { level: keyof TrackerLogger; obj: object; msg: string | undefined };

export function recordingLogger(): TrackerLogger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const at =
    (level: keyof TrackerLogger): LogFn =>
    (obj, msg) => {
      entries.push({ level, obj, msg });
    };
  return { entries, debug: at("debug"), info: at("info"), warn: at("warn"), error: at("error") };
}

/** 24 hourly samples covering one local day at UTC+1. */
export function hourly(date: string, value: number | ((hour: number) => number), sensorId = "outdoor") {
  const start = Date.parse(`${date}T00:00:00Z`) - HOUR_MS;
  return Array.from({ length: 24 }, (_, h) => ({
    ts: start + h * HOUR_MS,
    sensorId,
    value: typeof value === "number" ? value : value(h),
  }));
}

export type Harness = {
  store: TrackerSqliteStore;
  runtime: SeasonTrackerRuntime;
  logger: ReturnType<typeof recordingLogger>;
  setNow(iso: string): void;
};

export function harness(nowIso: string, opts: { store?: TrackerSqliteStore; source?: SampleSource } = {}): Harness {
  let now = Date.parse(nowIso);
  const store = opts.store ?? new TrackerSqliteStore({ filePath: ":memory:" });
  const logger = recordingLogger();
  const runtime = new SeasonTrackerRuntime({
    config: testConfig(),
    store,
    source: opts.source ?? new SqliteSampleSource(store),
    logger,
    clock: () => now,
  });
  return {
    store,
    runtime,
    logger,
    setNow(iso: string) {
      now = Date.parse(iso);
    },
  };
}
