import { z } from "zod";

export const IntegerId = z.coerce.number().int().safe();

export const UserIdParams = z.object({ userId: IntegerId });

export const LeaderboardQuery = z.object({
  chat_id: IntegerId,
  limit: z.coerce.number().int().min(1).max(100).optional()
});
