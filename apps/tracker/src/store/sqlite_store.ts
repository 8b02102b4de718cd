import fs from "node:fs";
import path from "node:path";

import type { EngineStateV1, TemperatureSampleV1 } from "@seasonwatch/contracts";
import Database from "better-sqlite3";

export type TrackerStoreConfig = {
  // ":memory:" for an in-process database.
  filePath: string;
};

type SampleRow = { ts: number; value: number };
type StateRow = { state_json: string; updated_at_ts: number };

export class TrackerSqliteStore {
  private db: Database.Database;

  constructor(cfg: TrackerStoreConfig) {
    if (cfg.filePath !== ":memory:") {
      fs.mkdirSync(path.dirname(cfg.filePath), { recursive: true });
    }
    this.db = new Database(cfg.filePath);
    this.db.pragma("journal_mode = WAL");
    this.init();
  }

  private init(): void {
    // temperature_samples is append-only; engine_state holds a single document.
    this.db.exec(`
      create table if not exists temperature_samples (
        sensor_id text not null,
        ts integer not null,
        value real not null,
        primary key (sensor_id, ts)
      );

      create table if not exists engine_state (
        id integer primary key check (id = 1),
        state_json text not null,
        updated_at_ts integer not null
      );
    `);
  }

  /** Returns the number of rows written; a repeated (sensor_id, ts) is ignored. */
  insertSamples(samples: ReadonlyArray<TemperatureSampleV1>): number {
    const stmt = this.db.prepare<[string, number, number]>(
      `insert into temperature_samples (sensor_id, ts, value) values (?, ?, ?) on conflict (sensor_id, ts) do nothing`
    );
    const tx = this.db.transaction((rows: ReadonlyArray<TemperatureSampleV1>) => {
      let written = 0;
      for (const s of rows) written += stmt.run(s.sensorId, s.ts, s.value).changes;
      return written;
    });
    return tx(samples);
  }

  /** Samples in the half-open window [startTs, endTs), oldest first. */
  listSamples(sensorId: string, startTs: number, endTs: number): SampleRow[] {
    const stmt = this.db.prepare<[string, number, number], SampleRow>(
      `select ts, value from temperature_samples where sensor_id = ? and ts >= ? and ts < ? order by ts asc`
    );
    return stmt.all(sensorId, startTs, endTs);
  }

  countSamples(sensorId: string): number {
    const stmt = this.db.prepare<[string], { n: number }>(
      `select count(*) as n from temperature_samples where sensor_id = ?`
    );
    return stmt.get(sensorId)?.n ?? 0;
  }

  /** Raw JSON text of the persisted engine state; validation is the kernel's job. */
  loadEngineStateJson(): string | null {
    const stmt = this.db.prepare<[], StateRow>(`select state_json, updated_at_ts from engine_state where id = 1`);
    return stmt.get()?.state_json ?? null;
  }

  saveEngineState(state: EngineStateV1, updatedAtTs: number): void {
    const stmt = this.db.prepare<[string, number]>(
      `insert into engine_state (id, state_json, updated_at_ts) values (1, ?, ?)
       on conflict (id) do update set state_json = excluded.state_json, updated_at_ts = excluded.updated_at_ts`
    );
    stmt.run(JSON.stringify(state), updatedAtTs);
  }

  close(): void {
    this.db.close();
  }
}
