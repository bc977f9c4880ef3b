import type { FastifyInstance } from "fastify";
import type { ServerOptions } from "../server.js";
import { LeaderboardQuery, UserIdParams } from "./params.js";

export function registerReportRoutes(app: FastifyInstance, options: ServerOptions) {
  const { store } = options;

  app.get("/api/applications/pending", async () => {
    const applications = store.pendingApplications();
    return { total: applications.length, applications };
  });

  app.get("/api/applications/insights", async () => {
    return store.applicationStatistics();
  });

  app.get("/api/applications/:userId/status", async (req, reply) => {
    const { userId } = UserIdParams.parse(req.params);
    const history = store.applicationStatus(userId);
    if (!history) {
      reply.code(404);
      return { error: "not_found" };
    }
    return { user_id: userId, history };
  });

  // GET /api/xp?chat_id=-100123&limit=10
  app.get("/api/xp", async (req) => {
    const query = LeaderboardQuery.parse(req.query);
    const limit = query.limit ?? options.xpLeaderboardSize;
    return { chat_id: query.chat_id, limit, leaderboard: store.xpLeaderboard(query.chat_id, limit) };
  });

  app.get("/api/cups", async (req) => {
    const query = LeaderboardQuery.parse(req.query);
    const limit = query.limit ?? options.cupsLeaderboardSize;
    return { chat_id: query.chat_id, limit, cups: store.cupHistory(query.chat_id, limit) };
  });
}
