import { buildServer } from "@guildhall/api";
import { Cipher, GuildStore } from "@guildhall/store";
import { BOT_COMMANDS, createBot } from "./bot.js";
import { loadEnvLocal, loadSettings } from "./config.js";
import { createLogger } from "./logger.js";

loadEnvLocal();

const bootLogger = createLogger();

async function main() {
  const settings = loadSettings();
  const logger = createLogger(settings.logLevel);

  const store = new GuildStore({
    path: settings.storagePath,
    cipher: new Cipher(settings.secretKey),
    logger: logger.child({ component: "store" })
  });
  await store.load();
  await store.addAdmin(settings.ownerId);

  const bot = createBot({ settings, store, logger });

  const server = settings.webappEnabled
    ? buildServer({
        store,
        xpLeaderboardSize: settings.xpLeaderboardSize,
        cupsLeaderboardSize: settings.cupsLeaderboardSize,
        apiToken: settings.adminApiToken,
        logger: logger.child({ component: "api" })
      })
    : null;
  if (server) {
    await server.listen({ host: settings.webappHost, port: settings.webappPort });
  }

  let stopping = false;
  async function shutdown(signal: NodeJS.Signals) {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, "shutting down");
    await bot.stop();
    if (server) await server.close();
    await store.save();
  }
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err }, "shutdown failed");
        process.exitCode = 1;
      });
    });
  }

  // Long polling: make sure no webhook is set and the command list is current.
  await bot.api.deleteWebhook({ drop_pending_updates: true });
  await bot.api.setMyCommands(BOT_COMMANDS);
  await bot.start({
    onStart: (me) => logger.info({ username: me.username }, "bot started (long polling)")
  });
}

try {
  await main();
} catch (err) {
  bootLogger.fatal({ err }, "startup failed");
  process.exit(1);
}
