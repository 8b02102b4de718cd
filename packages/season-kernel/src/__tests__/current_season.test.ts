import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { resolveCurrentSeason } from "../resolve/current_season";
import { createInitialState } from "../state/engine_state";
import { stateWithLedger } from "./helpers";

describe("current-season resolver", () => {
  it("is unknown without any data", () => {
    assert.deepEqual(resolveCurrentSeason(createInitialState(), "2025-05-01"), {
      season: "unknown",
      arrival_date: null,
      source: "none",
    });
  });

  it("picks the latest arrival on or before today", () => {
    const state = stateWithLedger(2025, { winter: "2025-01-03", spring: "2025-03-10" });
    assert.deepEqual(resolveCurrentSeason(state, "2025-03-09"), {
      season: "winter",
      arrival_date: "2025-01-03",
      source: "current",
    });
    assert.equal(resolveCurrentSeason(state, "2025-03-10").season, "spring");
  });

  it("falls back to last year's snapshot before the first commit of the year", () => {
    const state = stateWithLedger(2025, {});
    state.snapshot = {
      year: 2024,
      records: {
        winter: { date: "2024-11-28", manually_set: false },
        spring: { date: "2024-03-01", manually_set: false },
        summer: { date: "2024-05-30", manually_set: false },
        autumn: { date: "2024-09-20", manually_set: false },
      },
    };
    assert.deepEqual(resolveCurrentSeason(state, "2025-01-05"), {
      season: "winter",
      arrival_date: "2024-11-28",
      source: "historical",
    });
  });

  it("ignores current records dated after today", () => {
    const state = stateWithLedger(2025, { spring: "2025-03-10" });
    state.snapshot.year = 2024;
    state.snapshot.records.autumn = { date: "2024-09-20", manually_set: false };
    assert.equal(resolveCurrentSeason(state, "2025-02-01").season, "autumn");
  });

  it("breaks ties in catalog order", () => {
    const state = stateWithLedger(2024, { autumn: "2024-11-20", winter: "2024-11-20" });
    assert.equal(resolveCurrentSeason(state, "2024-11-24").season, "winter");
  });

  it("treats manual dates like automatic ones", () => {
    const state = stateWithLedger(2025, { winter: "2025-01-03", summer: "2025-05-20" }, ["summer"]);
    assert.equal(resolveCurrentSeason(state, "2025-06-01").season, "summer");
  });
});
