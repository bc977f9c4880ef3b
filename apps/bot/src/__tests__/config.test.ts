import path from "node:path";
import { describe, expect, it } from "vitest";
import { ConfigurationError } from "@guildhall/store";
import { loadSettings } from "../config.js";

const required = { TELEGRAM_BOT_TOKEN: "123:test-token", BOT_SECRET_KEY: "test-secret", OWNER_ID: "42" };

describe("loadSettings", () => {
  it("applies defaults", () => {
    expect(loadSettings(required)).toEqual({
      botToken: "123:test-token",
      secretKey: "test-secret",
      ownerId: 42,
      reviewChatId: null,
      storagePath: path.resolve("data/storage.enc"),
      logLevel: "info",
      xpMessageReward: 5,
      xpLeaderboardSize: 10,
      cupsLeaderboardSize: 5,
      rateLimitIntervalSeconds: 60,
      rateLimitBurst: 5,
      webappEnabled: true,
      webappHost: "0.0.0.0",
      webappPort: 8080,
      adminApiToken: undefined
    });
  });

  it("reads overrides and treats blank values as unset", () => {
    const settings = loadSettings({
      ...required,
      REVIEW_CHAT_ID: "-1001234",
      XP_MESSAGE_REWARD: " 3 ",
      WEBAPP_ENABLED: "off",
      ADMIN_API_TOKEN: "test-secret",
      LOG_LEVEL: ""
    });
    expect(settings.reviewChatId).toBe(-1001234);
    expect(settings.xpMessageReward).toBe(3);
    expect(settings.webappEnabled).toBe(false);
    expect(settings.adminApiToken).toBe("test-secret");
    expect(settings.logLevel).toBe("info");
  });

  it("names every offending variable", () => {
    let error: unknown;
    try {
      loadSettings({ OWNER_ID: "owner", WEBAPP_ENABLED: "maybe" });
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(ConfigurationError);
    const message = error instanceof Error ? error.message : "";
    for (const name of ["TELEGRAM_BOT_TOKEN", "BOT_SECRET_KEY", "OWNER_ID", "WEBAPP_ENABLED"]) {
      expect(message).toContain(name);
    }
  });
});
