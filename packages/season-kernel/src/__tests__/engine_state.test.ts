import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { createInitialState, dehydrateEngineState, hydrateEngineState } from "../state/engine_state";
import { repeat, runMeans, stateWithLedger } from "./helpers";

describe("engine state hydration", () => {
  it("starts empty when nothing was persisted", () => {
    const step = hydrateEngineState(null, "2025-01-10");
    assert.deepEqual(step.state, createInitialState());
    assert.equal(step.events.length, 1);
    assert.equal(step.events[0]?.kind, "state_anomaly");
  });

  it("falls back to the initial state on an unreadable document", () => {
    const step = hydrateEngineState({ schema_version: "9.9.9", counters: [] }, "2025-01-10");
    assert.deepEqual(step.state, createInitialState());
    const first = step.events[0];
    assert.ok(first && first.kind === "state_anomaly" && first.code === "STATE_UNPARSEABLE");
  });

  it("restores what it saved", () => {
    const { state } = runMeans(createInitialState(), "2024-11-20", repeat(-1, 6));
    const saved = JSON.parse(JSON.stringify(dehydrateEngineState(state)));

    const step = hydrateEngineState(saved, "2024-11-26");
    assert.deepEqual(step.state, state);
    assert.deepEqual(step.events, []);
  });

  it("defaults flags missing from older documents", () => {
    const raw = {
      schema_version: "1.0.0",
      counters: {
        winter: { consecutive_days: 2 },
        spring: { consecutive_days: 0 },
        summer: { consecutive_days: 0 },
        autumn: { consecutive_days: 2 },
      },
      ledger: {
        year: 2025,
        records: {
          winter: { date: "2025-01-03" },
          spring: { date: null },
          summer: { date: null },
          autumn: { date: null },
        },
      },
      snapshot: {
        year: null,
        records: {
          winter: { date: null },
          spring: { date: null },
          summer: { date: null },
          autumn: { date: null },
        },
      },
      last_mean: null,
      last_processed_date: null,
      last_updated_at_ts: null,
    };

    const { state } = hydrateEngineState(raw, "2025-02-01");
    assert.deepEqual(state.counters.winter, { consecutive_days: 2, deferred: false });
    assert.deepEqual(state.ledger.records.winter, { date: "2025-01-03", manually_set: false });
  });

  it("keeps but reports a record dated in a future year", () => {
    const state = stateWithLedger(2025, { winter: "2026-01-10" });
    const step = hydrateEngineState(dehydrateEngineState(state), "2025-06-01");

    assert.equal(step.state.ledger.records.winter.date, "2026-01-10");
    assert.deepEqual(step.events, [
      { kind: "state_anomaly", code: "RECORD_IN_FUTURE_YEAR", detail: "winter arrival 2026-01-10" },
    ]);
  });

  it("reports a ledger year ahead of the calendar", () => {
    const step = hydrateEngineState(dehydrateEngineState(stateWithLedger(2027, {})), "2025-06-01");
    assert.deepEqual(step.events, [
      { kind: "state_anomaly", code: "LEDGER_YEAR_IN_FUTURE", detail: "ledger year 2027 is after 2025" },
    ]);
  });

  it("reports a record far outside the ledger year", () => {
    const state = stateWithLedger(2025, { spring: "2022-03-01", winter: "2024-12-29" });
    const step = hydrateEngineState(dehydrateEngineState(state), "2025-05-01");
    // winter: run started in December of ledger year - 1.
    assert.deepEqual(step.events, [
      {
        kind: "state_anomaly",
        code: "RECORD_OUTSIDE_LEDGER_YEAR",
        detail: "spring arrival 2022-03-01 in ledger year 2025",
      },
    ]);
  });

  it("leaves a ledger from last year for the rollover check", () => {
    const step = hydrateEngineState(dehydrateEngineState(stateWithLedger(2024, { winter: "2024-11-20" })), "2025-01-02");
    assert.equal(step.state.ledger.year, 2024);
    assert.deepEqual(step.events, []);
  });
});
