import { timingSafeEqual } from "node:crypto";
import type { FastifyInstance, FastifyRequest } from "fastify";
import { z } from "zod";
import { HttpError } from "../errors.js";
import type { ServerOptions } from "../server.js";
import { IntegerId, UserIdParams } from "./params.js";

const AdminBody = z.object({
  user_id: IntegerId,
  username: z.string().max(64).nullish(),
  full_name: z.string().max(256).nullish()
});

function sameToken(given: string, expected: string): boolean {
  const a = Buffer.from(given, "utf8");
  const b = Buffer.from(expected, "utf8");
  return a.length === b.length && timingSafeEqual(a, b);
}

function requireToken(req: FastifyRequest, token: string | undefined) {
  if (!token) return;
  const header = req.headers["x-admin-token"];
  const given = Array.isArray(header) ? header[0] : header;
  if (!given || !sameToken(given, token)) throw new HttpError(401, "unauthorized");
}

export function registerAdminRoutes(app: FastifyInstance, options: ServerOptions) {
  const { store } = options;

  app.get("/api/admins", async () => {
    const admins = store.adminDetails();
    return { total: admins.length, admins };
  });

  // POST /api/admins { user_id, username?, full_name? }
  app.post("/api/admins", async (req, reply) => {
    requireToken(req, options.apiToken);
    const body = AdminBody.parse(req.body);
    const existed = store.isAdmin(body.user_id);
    const changed = await store.addAdmin(body.user_id, { username: body.username, full_name: body.full_name });
    const admin = store.adminDetails().find((a) => a.user_id === body.user_id);
    if (!changed) {
      reply.code(409);
      return { error: "unchanged", admin };
    }
    reply.code(existed ? 200 : 201);
    return { admin };
  });

  app.delete("/api/admins/:userId", async (req, reply) => {
    requireToken(req, options.apiToken);
    const { userId } = UserIdParams.parse(req.params);
    if (!(await store.removeAdmin(userId))) {
      reply.code(404);
      return { error: "not_found" };
    }
    return reply.code(204).send();
  });
}
