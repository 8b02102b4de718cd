import path from "node:path";
import { fileURLToPath } from "node:url";

import { buildApp } from "./app";
import { loadTrackerConfig } from "./config";
import { loggerOptions } from "./logger";
import { registerTrackerRoutes } from "./routes";
import { SeasonTrackerRuntime } from "./runtime";
import { DailyScheduler } from "./scheduler";
import { PgFactsSampleReader } from "./sources/pg_facts_reader";
import { SqliteSampleSource, type SampleSource } from "./sources/sample_source";
import { TrackerSqliteStore } from "./store/sqlite_store";
import { loadDotEnvFile } from "./util";

function loadEnv(): void {
  // Repo root .env first, then package-local .env; the environment itself wins over both.
  const here = path.dirname(fileURLToPath(import.meta.url));
  loadDotEnvFile(path.resolve(here, "..", "..", "..", ".env"));
  loadDotEnvFile(path.resolve(here, "..", ".env"));
}

loadEnv();

const config = loadTrackerConfig();
const app = buildApp({ logger: loggerOptions() });

async function main(): Promise<void> {
  const store = new TrackerSqliteStore({ filePath: config.store.file_path });

  let source: SampleSource;
  if (config.sample_source === "pg" && config.pg.database_url) {
    const reader = PgFactsSampleReader.fromUrl(config.pg.database_url, {
      factsView: config.pg.facts_view,
      metric: config.pg.metric,
    });
    await reader.ping();
    source = reader;
  } else {
    source = new SqliteSampleSource(store);
  }

  const runtime = new SeasonTrackerRuntime({ config, store, source, logger: app.log });
  registerTrackerRoutes(app, runtime);

  const scheduler = new DailyScheduler({
    at: config.schedule,
    utcOffsetMinutes: config.utc_offset_minutes,
    clock: Date.now,
    logger: app.log,
    task: async () => {
      const r = await runtime.runDailyCheck();
      app.log.info({ today: r.today, days: r.days.map((d) => `${d.date}:${d.outcome}`) }, "daily run done");
    },
  });
  if (config.schedule.enabled) scheduler.start();

  app.addHook("onClose", async () => {
    scheduler.stop();
    await runtime.close();
  });

  await app.listen({ port: config.server.port, host: config.server.host });
  app.log.info({ sensor_id: config.sensor_id, source: source.kind, locale: config.locale }, "season tracker ready");
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        app.log.error(err);
        process.exit(1);
      });
  });
}

main().catch((err) => {
  app.log.error(err);
  process.exit(1);
});
