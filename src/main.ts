import "dotenv/config";
import { Bot, GrammyError, webhookCallback } from "grammy";
import express from "express";
import { createBot } from "./bot";
import { AppConfig, loadConfig } from "./config";
import { Db, openDatabase } from "./db";
import { ConversationEngine } from "./engine";
import { StartupConfigError } from "./errors";
import { SqliteLedger } from "./ledger";
import { logger } from "./logger";
import { SessionStore } from "./session";

// safe webhook setter: check current webhook first and respect retry-after
async function ensureWebhookSet(bot: Bot, fullUrl: string, secretToken: string) {
  const info = await bot.api.getWebhookInfo();
  if (info.url === fullUrl) {
    logger.info("Webhook already set and matches", { url: fullUrl });
    return;
  }

  logger.info("Current webhook differs, setting it", { url: fullUrl });
  try {
    await bot.api.setWebhook(fullUrl, { secret_token: secretToken });
  } catch (err) {
    const retryAfter =
      err instanceof GrammyError ? err.parameters.retry_after : undefined;
    if (!retryAfter) throw err;

    logger.warn("setWebhook rate-limited, retrying once", { retryAfter });
    await new Promise((resolve) => setTimeout(resolve, retryAfter * 1000));
    await bot.api.setWebhook(fullUrl, { secret_token: secretToken });
  }
  logger.info("Webhook set successfully");
}

async function startWebhook(bot: Bot, config: AppConfig, db: Db) {
  const webhookPath = `/webhook/${config.webhookSecret}`;
  const fullUrl = `${config.webhookUrl}${webhookPath}`;

  const app = express();
  app.use(express.json());
  app.post(
    webhookPath,
    webhookCallback(bot, "express", { secretToken: config.webhookSecret }),
  );
  // a simple healthcheck
  app.get("/", (_req, res) => {
    res.send("OK");
  });

  await bot.init();
  const server = app.listen(config.port, () => {
    logger.info("Server listening", { port: config.port, webhook: fullUrl });
  });
  await ensureWebhookSet(bot, fullUrl, config.webhookSecret);

  const shutdown = () => {
    logger.info("Shutting down gracefully...");
    server.close(() => {
      db.close();
      logger.info("HTTP server closed.");
      process.exit(0);
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

async function startPolling(bot: Bot, db: Db) {
  const shutdown = () => {
    logger.info("Shutting down gracefully...");
    bot
      .stop()
      .then(() => db.close())
      .catch((err: unknown) => logger.error("failed to stop bot", { err }));
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await bot.start({
    onStart: (me) => logger.info("Bot started (long polling)", { username: me.username }),
  });
}

async function main() {
  const config = loadConfig();
  const db = openDatabase(config.dbPath);
  const engine = new ConversationEngine({
    ledger: new SqliteLedger(db),
    sessions: new SessionStore(),
    timeZone: config.timeZone,
    topLimit: config.topLimit,
  });
  const bot = createBot(config.botToken, engine);

  if (config.webhookUrl) {
    await startWebhook(bot, config, db);
  } else {
    await startPolling(bot, db);
  }
}

main().catch((err: unknown) => {
  if (err instanceof StartupConfigError) {
    logger.error(err.message);
  } else {
    logger.error("fatal error starting bot", { err });
  }
  process.exit(1);
});
