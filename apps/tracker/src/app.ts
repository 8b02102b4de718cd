import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";

import { TrackerRequestRejected } from "./errors";

export type BuildAppOptions = {
  logger?: FastifyServerOptions["logger"];
};

export function buildApp(opts: BuildAppOptions = {}): FastifyInstance {
  const app = Fastify({ logger: opts.logger ?? false, bodyLimit: 5 * 1024 * 1024 });

  app.addHook("onRequest", async (req, reply) => {
    // CORS (minimal, dev-friendly)
    reply.header("Access-Control-Allow-Origin", "*");
    reply.header("Access-Control-Allow-Headers", "content-type");
    reply.header("Access-Control-Allow-Methods", "GET,POST,PUT,DELETE,OPTIONS");
    if (req.method === "OPTIONS") return reply.code(204).send();
  });

  app.setErrorHandler((error, req, reply) => {
    if (error instanceof TrackerRequestRejected) {
      return reply.code(error.status).send({ ok: false, errors: error.errors });
    }
    const status = error.statusCode ?? 500;
    if (status >= 500) req.log.error({ err: error }, "request failed");
    return reply.code(status).send({
      ok: false,
      errors: [{ code: error.code ?? "INTERNAL_ERROR", path: "", message: status >= 500 ? "internal error" : error.message }],
    });
  });

  return app;
}
