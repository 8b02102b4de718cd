import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { getSeasonDefinition } from "../catalog/season_catalog";
import {
  applyCommitDecision,
  clearArrival,
  clearManualArrival,
  decideCommit,
  runStartDate,
  setManualArrival,
} from "../ledger/arrival_ledger";
import { stateWithLedger } from "./helpers";

const winter = getSeasonDefinition("winter");
const spring = getSeasonDefinition("spring");

describe("commit policy", () => {
  it("commits the first day of the qualifying run", () => {
    const { ledger } = stateWithLedger(2024, {});
    const decision = decideCommit(ledger, winter, "2024-01-05");
    assert.deepEqual(decision, { outcome: "committed", arrival_date: "2024-01-01" });
    assert.equal(applyCommitDecision(ledger, "winter", decision).records.winter.date, "2024-01-01");
    assert.equal(runStartDate(spring, "2024-03-07"), "2024-03-01");
  });

  it("never overwrites a manual value", () => {
    const { ledger } = stateWithLedger(2024, { winter: "2024-11-01" }, ["winter"]);
    assert.equal(decideCommit(ledger, winter, "2024-12-05").outcome, "override_blocked");
  });

  it("commits at most once per season and year", () => {
    const { ledger } = stateWithLedger(2024, { winter: "2024-01-01" });
    const decision = decideCommit(ledger, winter, "2024-12-05");
    assert.equal(decision.outcome, "already_set");
    assert.equal(applyCommitDecision(ledger, "winter", decision), ledger);
  });

  it("defers a run that starts before the eligible date", () => {
    const { ledger } = stateWithLedger(2024, {});
    assert.deepEqual(decideCommit(ledger, spring, "2024-02-16"), {
      outcome: "ineligible_deferred",
      arrival_date: "2024-02-10",
    });
    assert.equal(decideCommit(ledger, spring, "2024-02-20").outcome, "ineligible_deferred");
    assert.deepEqual(decideCommit(ledger, spring, "2024-02-21"), {
      outcome: "committed",
      arrival_date: "2024-02-15",
    });
  });

  it("checks the manual flag before the eligible date", () => {
    const { ledger } = stateWithLedger(2024, { spring: "2024-02-01" }, ["spring"]);
    assert.equal(decideCommit(ledger, spring, "2024-02-10").outcome, "override_blocked");
  });

  it("ignores days from a year the ledger has already left", () => {
    const { ledger } = stateWithLedger(2025, {});
    assert.equal(decideCommit(ledger, winter, "2024-12-31").outcome, "stale_year");
  });

  it("does not mutate the ledger it commits into", () => {
    const { ledger } = stateWithLedger(2024, {});
    const next = applyCommitDecision(ledger, "winter", { outcome: "committed", arrival_date: "2024-01-01" });
    assert.equal(ledger.records.winter.date, null);
    assert.equal(next.records.winter.date, "2024-01-01");
  });
});

describe("manual values", () => {
  it("stores a manual date and flags it", () => {
    const step = setManualArrival(stateWithLedger(2024, {}), "spring", "2024-03-02");
    assert.deepEqual(step.state.ledger.records.spring, { date: "2024-03-02", manually_set: true });
    assert.deepEqual(step.events, [{ kind: "override_set", season: "spring", date: "2024-03-02" }]);
  });

  it("opens the ledger year from the manual date when none is open", () => {
    const step = setManualArrival(stateWithLedger(null, {}), "summer", "2024-06-01");
    assert.equal(step.state.ledger.year, 2024);
  });

  it("reports a manual date outside the ledger year but keeps it", () => {
    const step = setManualArrival(stateWithLedger(2024, {}), "winter", "2023-12-20");
    assert.equal(step.state.ledger.records.winter.date, "2023-12-20");
    assert.deepEqual(step.events[0], {
      kind: "state_anomaly",
      code: "OVERRIDE_OUTSIDE_LEDGER_YEAR",
      detail: "winter override 2023-12-20 stored in ledger year 2024",
    });
  });

  it("clearing an override empties the record", () => {
    const step = clearManualArrival(stateWithLedger(2024, { spring: "2024-03-02" }, ["spring"]), "spring");
    assert.deepEqual(step.state.ledger.records.spring, { date: null, manually_set: false });
    assert.deepEqual(step.events, [{ kind: "override_cleared", season: "spring", previous_date: "2024-03-02" }]);
  });

  it("clearing an override leaves an automatic date alone", () => {
    const state = stateWithLedger(2024, { spring: "2024-03-02" });
    const step = clearManualArrival(state, "spring");
    assert.equal(step.state, state);
    assert.deepEqual(step.events, []);
  });

  it("explicit clearing removes an automatic date", () => {
    const step = clearArrival(stateWithLedger(2024, { winter: "2024-01-01" }), "winter");
    assert.deepEqual(step.state.ledger.records.winter, { date: null, manually_set: false });
    assert.deepEqual(step.events, [
      { kind: "arrival_cleared", season: "winter", previous_date: "2024-01-01", was_manual: false },
    ]);
  });
});
