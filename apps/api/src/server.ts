import Fastify, { type FastifyBaseLogger, type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { ZodError } from "zod";
import { PersistenceError, type GuildStore } from "@guildhall/store";
import { HttpError } from "./errors.js";
import { registerAdminRoutes } from "./routes/admins.js";
import { registerReportRoutes } from "./routes/reports.js";

export interface ServerOptions {
  store: GuildStore;
  xpLeaderboardSize: number;
  cupsLeaderboardSize: number;
  /** When set, admin mutations require a matching `x-admin-token` header. */
  apiToken?: string | undefined;
  logger?: FastifyBaseLogger | undefined;
}

export function buildServer(options: ServerOptions): FastifyInstance {
  const app = Fastify({ logger: options.logger ?? false });

  void app.register(cors, { origin: true });

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof ZodError) {
      return reply.code(400).send({ error: "invalid_request", issues: err.issues });
    }
    if (err instanceof HttpError) {
      return reply.code(err.statusCode).send({ error: err.code });
    }
    if (err instanceof PersistenceError) {
      req.log.error({ err }, "state could not be saved");
      return reply.code(503).send({ error: "storage_unavailable", message: "State could not be saved, try again later" });
    }
    // fastify's own client errors (bad JSON body, wrong content type) carry a 4xx statusCode
    if (err.statusCode !== undefined && err.statusCode >= 400 && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ error: err.code ?? "bad_request", message: err.message });
    }
    req.log.error({ err }, "request failed");
    return reply.code(500).send({ error: "internal_error" });
  });

  app.get("/health", async () => {
    return { ok: true, service: "guildhall-api", ts: new Date().toISOString() };
  });

  registerReportRoutes(app, options);
  registerAdminRoutes(app, options);

  return app;
}
