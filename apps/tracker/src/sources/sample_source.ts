// Where the daily mean's raw readings come from.
//
// - sqlite: samples posted to /api/samples and kept in the tracker store
// - pg:     raw_sample_v1 facts in a Postgres facts ledger (read-only)

import type { TrackerSqliteStore } from "../store/sqlite_store";

export type SampleSourceKind = "sqlite" | "pg";

export type DayWindow = {
  startTs: number; // inclusive, unix ms
  endTs: number; // exclusive, unix ms
};

export interface SampleSource {
  readonly kind: SampleSourceKind;
  // Finite readings only, oldest first.
  readValues(sensorId: string, window: DayWindow): Promise<number[]>;
  close(): Promise<void>;
}

export class SqliteSampleSource implements SampleSource {
  readonly kind = "sqlite" as const;

  constructor(private readonly store: TrackerSqliteStore) {}

  async readValues(sensorId: string, window: DayWindow): Promise<number[]> {
    return this.store.listSamples(sensorId, window.startTs, window.endTs).map((r) => r.value);
  }

  // The store is owned by the runtime and closed there.
  async close(): Promise<void> {}
}
