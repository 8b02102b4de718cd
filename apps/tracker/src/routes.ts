import {
  ManualOverrideV1Schema,
  RunDayRequestV1Schema,
  SampleBatchV1Schema,
  isSeasonV1,
  type SeasonV1,
} from "@seasonwatch/contracts";
import type { FastifyInstance } from "fastify";
import type { z } from "zod";

import { TrackerRequestRejected, issuesToErrors } from "./errors";
import type { SeasonTrackerRuntime } from "./runtime";

function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) throw new TrackerRequestRejected(400, issuesToErrors("INVALID_BODY", parsed.error.issues));
  return parsed.data;
}

function parseSeason(params: unknown): SeasonV1 {
  const raw = params && typeof params === "object" && "season" in params ? params.season : undefined;
  if (!isSeasonV1(raw)) {
    throw new TrackerRequestRejected(404, [
      { code: "UNKNOWN_SEASON", path: "season", message: `unknown season: ${String(raw)}` },
    ]);
  }
  return raw;
}

export function registerTrackerRoutes(app: FastifyInstance, runtime: SeasonTrackerRuntime): void {
  app.get("/api/health", async (_req, reply) => {
    return reply.send({ ok: true, today: runtime.today(), last_processed_date: runtime.snapshot().last_processed_date });
  });

  app.post("/api/samples", async (req, reply) => {
    const batch = parseBody(SampleBatchV1Schema, req.body);
    return reply.send({ ok: true, ...runtime.ingest(batch.samples) });
  });

  app.get("/api/season/status", async (_req, reply) => {
    return reply.send(runtime.status());
  });

  app.get("/api/season/history", async (_req, reply) => {
    return reply.send(runtime.history());
  });

  app.put("/api/season/overrides/:season", async (req, reply) => {
    const season = parseSeason(req.params);
    const { date } = parseBody(ManualOverrideV1Schema, req.body);
    return reply.send({ ok: true, status: runtime.setOverride(season, date) });
  });

  app.delete("/api/season/overrides/:season", async (req, reply) => {
    const season = parseSeason(req.params);
    return reply.send({ ok: true, status: runtime.clearOverride(season) });
  });

  app.delete("/api/season/arrivals/:season", async (req, reply) => {
    const season = parseSeason(req.params);
    return reply.send({ ok: true, status: runtime.clearArrival(season) });
  });

  // Processes one completed day (default: yesterday) outside the daily schedule.
  app.post("/api/season/run", async (req, reply) => {
    const body = parseBody(RunDayRequestV1Schema, req.body);
    const result = await runtime.processCompletedDay(body.date ?? runtime.yesterday());
    return reply.send({ ok: true, result, status: runtime.status() });
  });
}
