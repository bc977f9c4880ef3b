import path from "node:path";
import { fileURLToPath } from "node:url";
import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "@guildhall/store";

/** Loads `env.local` beside the app into `process.env` without overriding variables already set. */
export function loadEnvLocal() {
  const dirname = path.dirname(fileURLToPath(import.meta.url));
  dotenv.config({ path: path.resolve(dirname, "..", "env.local") });
}

const TRUTHY = new Set(["1", "true", "yes", "on"]);
const FALSY = new Set(["0", "false", "no", "off"]);

const Flag = z.string().transform((raw, ctx) => {
  const value = raw.toLowerCase();
  if (TRUTHY.has(value)) return true;
  if (FALSY.has(value)) return false;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected true or false" });
  return z.NEVER;
});

const ChatId = z.coerce.number().int().safe();

const EnvSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string(),
  BOT_SECRET_KEY: z.string(),
  OWNER_ID: ChatId,
  REVIEW_CHAT_ID: ChatId.optional(),
  STORAGE_PATH: z.string().default("data/storage.enc"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  XP_MESSAGE_REWARD: z.coerce.number().int().min(0).default(5),
  XP_LEADERBOARD_SIZE: z.coerce.number().int().min(1).default(10),
  CUPS_LEADERBOARD_SIZE: z.coerce.number().int().min(1).default(5),
  RATE_LIMIT_INTERVAL_SECONDS: z.coerce.number().positive().default(60),
  RATE_LIMIT_BURST: z.coerce.number().int().min(1).default(5),
  WEBAPP_ENABLED: Flag.default("true"),
  WEBAPP_HOST: z.string().default("0.0.0.0"),
  WEBAPP_PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  ADMIN_API_TOKEN: z.string().optional()
});

export type LogLevel = z.output<typeof EnvSchema>["LOG_LEVEL"];

export type Settings = {
  botToken: string;
  secretKey: string;
  ownerId: number;
  reviewChatId: number | null;
  storagePath: string;
  logLevel: LogLevel;
  xpMessageReward: number;
  xpLeaderboardSize: number;
  cupsLeaderboardSize: number;
  rateLimitIntervalSeconds: number;
  rateLimitBurst: number;
  webappEnabled: boolean;
  webappHost: string;
  webappPort: number;
  adminApiToken: string | undefined;
};

export function loadSettings(source: NodeJS.ProcessEnv = process.env): Settings {
  // Blank values count as unset so an `env.local` line like `REVIEW_CHAT_ID=` falls back to the default.
  const env: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = source[key]?.trim();
    if (value) env[key] = value;
  }

  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid environment: ${problems.join("; ")}`);
  }
  const E = parsed.data;
  return {
    botToken: E.TELEGRAM_BOT_TOKEN,
    secretKey: E.BOT_SECRET_KEY,
    ownerId: E.OWNER_ID,
    reviewChatId: E.REVIEW_CHAT_ID ?? null,
    storagePath: path.resolve(E.STORAGE_PATH),
    logLevel: E.LOG_LEVEL,
    xpMessageReward: E.XP_MESSAGE_REWARD,
    xpLeaderboardSize: E.XP_LEADERBOARD_SIZE,
    cupsLeaderboardSize: E.CUPS_LEADERBOARD_SIZE,
    rateLimitIntervalSeconds: E.RATE_LIMIT_INTERVAL_SECONDS,
    rateLimitBurst: E.RATE_LIMIT_BURST,
    webappEnabled: E.WEBAPP_ENABLED,
    webappHost: E.WEBAPP_HOST,
    webappPort: E.WEBAPP_PORT,
    adminApiToken: E.ADMIN_API_TOKEN
  };
}
