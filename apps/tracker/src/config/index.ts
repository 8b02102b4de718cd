// Tracker configuration.
//
// Source of truth:
//   config/tracker/default.json
//
// Contract:
// - Validated with zod; unknown keys are rejected.
// - Environment variables override single fields (deployment knobs only).
// - A relative store.file_path is resolved against the repo root.

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { LocaleV1Schema } from "@seasonwatch/contracts";
import { z } from "zod";

import { TrackerConfigInvalid, issuesToErrors } from "../errors";
import { findRepoRoot } from "../util";

export const CONFIG_RELATIVE_PATH = path.join("config", "tracker", "default.json");

// Table/view names are interpolated into SQL, so only plain identifiers pass.
const SqlIdentifierSchema = z.string().regex(/^[a-z_][a-z0-9_]*$/, "expected a lower-case SQL identifier");

export const TrackerConfigV1Schema = z
  .object({
    schema_version: z.literal("1.0.0"),
    sensor_id: z.string().min(1),
    locale: LocaleV1Schema,
    // Fixed offset deciding which calendar day a sample belongs to (no DST).
    utc_offset_minutes: z.number().int().min(-720).max(840),
    sample_source: z.enum(["sqlite", "pg"]),
    store: z
      .object({
        file_path: z.string().min(1),
      })
      .strict(),
    pg: z
      .object({
        database_url: z.string().nullable(),
        facts_view: SqlIdentifierSchema,
        metric: z.string().min(1),
      })
      .strict(),
    schedule: z
      .object({
        enabled: z.boolean(),
        hour: z.number().int().min(0).max(23),
        minute: z.number().int().min(0).max(59),
        second: z.number().int().min(0).max(59),
      })
      .strict(),
    server: z
      .object({
        host: z.string().min(1),
        port: z.number().int().min(1).max(65535),
      })
      .strict(),
  })
  .strict()
  .superRefine((cfg, ctx) => {
    if (cfg.sample_source === "pg" && !cfg.pg.database_url) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["pg", "database_url"],
        message: "required when sample_source is pg (or set DATABASE_URL)",
      });
    }
  });

export type TrackerConfigV1 = z.infer<typeof TrackerConfigV1Schema>;

function isObj(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

function envNumber(v: string | undefined): number | undefined {
  if (v === undefined || v.trim() === "") return undefined;
  // NaN is left for the schema to reject.
  return Number(v);
}

function withOverrides(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = { ...raw };

  if (env.SEASONWATCH_SENSOR_ID) out.sensor_id = env.SEASONWATCH_SENSOR_ID;
  if (env.SEASONWATCH_LOCALE) out.locale = env.SEASONWATCH_LOCALE;
  if (env.SEASONWATCH_SAMPLE_SOURCE) out.sample_source = env.SEASONWATCH_SAMPLE_SOURCE;
  const offset = envNumber(env.SEASONWATCH_UTC_OFFSET_MINUTES);
  if (offset !== undefined) out.utc_offset_minutes = offset;

  if (env.SEASONWATCH_DB_PATH && isObj(raw.store)) {
    out.store = { ...raw.store, file_path: env.SEASONWATCH_DB_PATH };
  }
  if (env.DATABASE_URL && isObj(raw.pg)) {
    out.pg = { ...raw.pg, database_url: env.DATABASE_URL };
  }
  if (isObj(raw.server)) {
    const port = envNumber(env.PORT);
    out.server = {
      ...raw.server,
      ...(env.HOST ? { host: env.HOST } : {}),
      ...(port !== undefined ? { port } : {}),
    };
  }
  return out;
}

/**
 * Validates a parsed config document after applying environment overrides.
 * Throws TrackerConfigInvalid.
 */
export function parseTrackerConfig(raw: unknown, env: NodeJS.ProcessEnv = {}, source = "config"): TrackerConfigV1 {
  if (!isObj(raw)) {
    throw new TrackerConfigInvalid(source, [{ code: "INVALID_CONFIG", path: "", message: "config must be an object" }]);
  }
  const parsed = TrackerConfigV1Schema.safeParse(withOverrides(raw, env));
  if (!parsed.success) {
    throw new TrackerConfigInvalid(source, issuesToErrors("INVALID_CONFIG", parsed.error.issues));
  }
  return parsed.data;
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.SEASONWATCH_CONFIG_PATH) return path.resolve(env.SEASONWATCH_CONFIG_PATH);
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.join(findRepoRoot(here, CONFIG_RELATIVE_PATH), CONFIG_RELATIVE_PATH);
}

export function loadTrackerConfig(env: NodeJS.ProcessEnv = process.env): TrackerConfigV1 {
  const fp = resolveConfigPath(env);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(fp, "utf8"));
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new TrackerConfigInvalid(fp, [{ code: "INVALID_CONFIG", path: "", message }]);
  }

  const cfg = parseTrackerConfig(raw, env, fp);
  const filePath = cfg.store.file_path;
  if (filePath === ":memory:" || path.isAbsolute(filePath)) return cfg;

  // Relative store paths are anchored at the repo root that holds the config dir.
  const root = path.resolve(path.dirname(fp), "..", "..");
  return { ...cfg, store: { file_path: path.join(root, filePath) } };
}
