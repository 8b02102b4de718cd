import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { describe, it } from "node:test";
import { fileURLToPath } from "node:url";

import { CONFIG_RELATIVE_PATH, loadTrackerConfig, parseTrackerConfig } from "../config";
import { TrackerConfigInvalid } from "../errors";
import { testConfig } from "./helpers";

const repoRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..", "..", "..");

function rejectedPaths(fn: () => unknown): string[] {
  try {
    fn();
  } catch (e) {
    assert.ok(e instanceof TrackerConfigInvalid);
    return e.errors.map((x) => x.path);
  }
  assert.fail("expected TrackerConfigInvalid");
}

describe("tracker config", () => {
  it("loads the checked-in default and anchors the store at the repo root", () => {
    const cfg = loadTrackerConfig({ SEASONWATCH_CONFIG_PATH: path.join(repoRoot, CONFIG_RELATIVE_PATH) });
    const raw = JSON.parse(fs.readFileSync(path.join(repoRoot, CONFIG_RELATIVE_PATH), "utf8"));

    assert.equal(cfg.sensor_id, raw.sensor_id);
    assert.equal(cfg.sample_source, "sqlite");
    assert.deepEqual(cfg.schedule, { enabled: true, hour: 0, minute: 0, second: 10 });
    assert.equal(cfg.store.file_path, path.join(repoRoot, "apps", "tracker", "data", "tracker.sqlite"));
  });

  it("applies environment overrides", () => {
    const cfg = parseTrackerConfig(testConfig(), {
      SEASONWATCH_LOCALE: "sv",
      SEASONWATCH_UTC_OFFSET_MINUTES: "120",
      SEASONWATCH_DB_PATH: "/tmp/seasonwatch.sqlite",
      PORT: "8080",
      HOST: "localhost",
    });

    assert.equal(cfg.locale, "sv");
    assert.equal(cfg.utc_offset_minutes, 120);
    assert.equal(cfg.store.file_path, "/tmp/seasonwatch.sqlite");
    assert.deepEqual(cfg.server, { host: "localhost", port: 8080 });
  });

  it("rejects values an override makes invalid", () => {
    assert.deepEqual(
      rejectedPaths(() => parseTrackerConfig(testConfig(), { SEASONWATCH_UTC_OFFSET_MINUTES: "one hour" })),
      ["utc_offset_minutes"]
    );
    assert.deepEqual(
      rejectedPaths(() => parseTrackerConfig(testConfig(), { SEASONWATCH_LOCALE: "de" })),
      ["locale"]
    );
  });

  it("requires a database url for the pg source", () => {
    assert.deepEqual(rejectedPaths(() => parseTrackerConfig(testConfig({ sample_source: "pg" }))), [
      "pg.database_url",
    ]);

    const cfg = parseTrackerConfig(testConfig({ sample_source: "pg" }), { DATABASE_URL: "postgres://test@localhost/test" });
    assert.equal(cfg.pg.database_url, "postgres://test@localhost/test");
  });

  it("rejects unknown keys and non-identifier view names", () => {
    const paths = rejectedPaths(() =>
      parseTrackerConfig({
        ...testConfig(),
        retention_days: 30,
        pg: { database_url: null, facts_view: "facts; drop table facts", metric: "air_temp_c" },
      })
    );
    assert.ok(paths.includes("pg.facts_view"));
    assert.ok(paths.includes(""));
  });

  it("rejects a document that is not an object", () => {
    assert.deepEqual(rejectedPaths(() => parseTrackerConfig([])), [""]);
  });
});
