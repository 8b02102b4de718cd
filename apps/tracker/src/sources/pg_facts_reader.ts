import { parseSensorValue } from "@seasonwatch/contracts";
import { Pool } from "pg";
import { z } from "zod";

import type { DayWindow, SampleSource } from "./sample_source";

// The slice of pg.Pool this reader uses.
export interface Queryable {
  query(text: string, values: unknown[]): Promise<{ rows: unknown[] }>;
  end(): Promise<void>;
}

export type PgFactsReaderOptions = {
  // View exposing facts (fact_id, occurred_at, type, sensor_id, record_json).
  factsView: string;
  metric: string;
};

const FactValueRowSchema = z.object({
  occurred_at: z.coerce.date(),
  value: z.union([z.string(), z.number()]).nullable(),
});

export class PgFactsSampleReader implements SampleSource {
  readonly kind = "pg" as const;

  constructor(
    private readonly db: Queryable,
    private readonly opts: PgFactsReaderOptions
  ) {
    if (!/^[a-z_][a-z0-9_]*$/.test(opts.factsView)) {
      throw new Error(`INVALID_FACTS_VIEW: ${opts.factsView}`);
    }
  }

  static fromUrl(databaseUrl: string, opts: PgFactsReaderOptions): PgFactsSampleReader {
    const pool = new Pool({ connectionString: databaseUrl });
    return new PgFactsSampleReader(
      {
        query: (text, values) => pool.query(text, values),
        end: () => pool.end(),
      },
      opts
    );
  }

  async ping(): Promise<void> {
    const r = await this.db.query("select 1 as ok", []);
    if (!r.rows.length) throw new Error("pg ping failed");
  }

  async readValues(sensorId: string, window: DayWindow): Promise<number[]> {
    const sql = `
      select occurred_at, (record_json::jsonb #>> '{payload,value}') as value
      from ${this.opts.factsView}
      where type = 'raw_sample_v1'
        and sensor_id = $1
        and occurred_at >= $2::timestamptz
        and occurred_at < $3::timestamptz
        and (record_json::jsonb #>> '{payload,metric}') = $4
      order by occurred_at asc
    `;
    const r = await this.db.query(sql, [
      sensorId,
      new Date(window.startTs).toISOString(),
      new Date(window.endTs).toISOString(),
      this.opts.metric,
    ]);

    const out: number[] = [];
    for (const raw of r.rows) {
      const row = FactValueRowSchema.safeParse(raw);
      if (!row.success || row.data.value === null) continue;
      const v = parseSensorValue(row.data.value);
      if (v !== null) out.push(v);
    }
    return out;
  }

  async close(): Promise<void> {
    await this.db.end();
  }
}
