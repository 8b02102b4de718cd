import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { PgFactsSampleReader, type Queryable } from "../sources/pg_facts_reader";

type Call = { text: string; values: unknown[] };

function fakeDb(rows: unknown[]): Queryable & { calls: Call[]; ended: boolean } {
  const db = {
    calls: [] as Call[],
    ended: false,
    async query(text: string, values: unknown[]) {
      db.calls.push({ text, values });
      return { rows };
    },
    async end() {
      db.ended = true;
    },
  };
  return db;
}

const opts = { factsView: "facts_replay_v1", metric: "air_temp_c" };

describe("PgFactsSampleReader", () => {
  it("reads numeric payload values for the day window", async () => {
    const db = fakeDb([
      { occurred_at: "2025-01-01T00:10:00Z", value: "-2.5" },
      { occurred_at: "2025-01-01T01:10:00Z", value: "unavailable" },
      { occurred_at: "2025-01-01T02:10:00Z", value: null },
      { occurred_at: new Date("2025-01-01T03:10:00Z"), value: 3 },
      { value: "7" },
    ]);
    const reader = new PgFactsSampleReader(db, opts);

    const values = await reader.readValues("outdoor", {
      startTs: Date.parse("2024-12-31T23:00:00Z"),
      endTs: Date.parse("2025-01-01T23:00:00Z"),
    });

    assert.deepEqual(values, [-2.5, 3]);
    assert.equal(db.calls.length, 1);
    const call = db.calls[0];
    assert.ok(call);
    assert.match(call.text, /from facts_replay_v1\s/);
    assert.deepEqual(call.values, ["outdoor", "2024-12-31T23:00:00.000Z", "2025-01-01T23:00:00.000Z", "air_temp_c"]);
  });

  it("refuses a view name that is not an identifier", () => {
    assert.throws(() => new PgFactsSampleReader(fakeDb([]), { ...opts, factsView: "facts; drop table facts" }), {
      message: "INVALID_FACTS_VIEW: facts; drop table facts",
    });
  });

  it("pings and closes the pool", async () => {
    const db = fakeDb([{ ok: 1 }]);
    const reader = new PgFactsSampleReader(db, opts);
    await reader.ping();
    await reader.close();
    assert.equal(db.calls[0]?.text, "select 1 as ok");
    assert.equal(db.ended, true);
  });

  it("fails the ping on an empty answer", async () => {
    const reader = new PgFactsSampleReader(fakeDb([]), opts);
    await assert.rejects(reader.ping(), { message: "pg ping failed" });
  });
});
