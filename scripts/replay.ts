#!/usr/bin/env node
/**
 * Offline replay of a sample CSV through the season engine.
 *
 * stdout carries only the resulting status/history JSON document; logs go to
 * stderr so the output can be piped.
 *
 * Usage:
 *   npm run replay -- --file ./samples.csv --sensor outdoor_temperature --offset 60 --locale sv
 *   npm run replay -- --file ./samples.csv --state ./state.json --write-state
 */

import fs from "node:fs";

import { LocaleV1Schema } from "@seasonwatch/contracts";
import { dehydrateEngineState } from "@seasonwatch/season-kernel";

import { createCliLogger } from "../apps/tracker/src/logger";
import { renderReplayOutput, replaySamples, type ReplayResultV1 } from "../apps/tracker/src/replay";
import { parseCsvSamples } from "../apps/tracker/src/sources/csv_samples";

type CliFlags = { values: Map<string, string>; switches: Set<string> };

// `--name value` pairs become values; a `--name` followed by another flag or
// nothing is a switch. "-60" is a value, so negative offsets pass.
function readFlags(argv: ReadonlyArray<string>): CliFlags {
  const values = new Map<string, string>();
  const switches = new Set<string>();
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (token === undefined || !token.startsWith("--")) continue;
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith("--")) {
      values.set(token.slice(2), next);
      i++;
    } else {
      switches.add(token.slice(2));
    }
  }
  return { values, switches };
}

const log = createCliLogger();

function fail(msg: string): never {
  log.error({}, msg);
  process.exit(2);
}

const flags = readFlags(process.argv.slice(2));
const file = flags.values.get("file") ?? fail("missing --file <samples.csv>");
const sensorId = flags.values.get("sensor") ?? "outdoor_temperature";
const offset = Number(flags.values.get("offset") ?? "0");
if (!Number.isInteger(offset)) fail("--offset must be an integer number of minutes");
const parsedLocale = LocaleV1Schema.safeParse(flags.values.get("locale") ?? "en");
if (!parsedLocale.success) fail("--locale must be en or sv");
const locale = parsedLocale.data;
const statePath = flags.values.get("state");

if (!fs.existsSync(file)) fail(`file not found: ${file}`);

const { samples, skipped } = parseCsvSamples(fs.readFileSync(file, "utf8"), sensorId);
if (skipped.length) log.warn({ skipped: skipped.length, first: skipped.slice(0, 5) }, "csv lines skipped");

const initialState: unknown =
  statePath && fs.existsSync(statePath) ? JSON.parse(fs.readFileSync(statePath, "utf8")) : undefined;

function replayOrFail(): ReplayResultV1 {
  try {
    return replaySamples(samples, { sensorId, utcOffsetMinutes: offset, locale, logger: log, initialState });
  } catch (err) {
    return fail(err instanceof Error ? err.message : String(err));
  }
}

const result = replayOrFail();

process.stdout.write(renderReplayOutput(result));

if (statePath && flags.switches.has("write-state")) {
  fs.writeFileSync(statePath, JSON.stringify(dehydrateEngineState(result.state), null, 2) + "\n");
  log.info({ statePath }, "state written");
}
