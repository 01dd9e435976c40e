import "dotenv/config";
import { loadConfig } from "./config";
import { createServices } from "./container";
import { ALLOWED_UPDATES, createBot, startPolling } from "./bot";
import { buildServer } from "./server";
import { logger } from "./utils/logger";

async function main() {
  const config = loadConfig();
  if (!config.botToken) throw new Error("BOT_TOKEN is not defined");

  const services = createServices(config);
  const bot = createBot(config.botToken, services);
  const webhookPath = `/tg/${config.botToken}`;

  const app = await buildServer({
    mode: config.botMode,
    knownChatCount: () => services.configs.listKnownChatIds().length,
    webhook:
      config.botMode === "webhook"
        ? { path: webhookPath, handleUpdate: (update) => bot.handleUpdate(update) }
        : undefined,
  });

  await app.listen({ port: config.port, host: config.host });

  const shutdown = () => {
    app.close().then(
      () => services.close(),
      (e: unknown) => app.log.error({ err: e }, "HTTP server did not close cleanly")
    );
  };

  if (config.botMode === "webhook") {
    if (!config.publicUrl) throw new Error("BOT_MODE=webhook but PUBLIC_URL is missing");
    const url = `${config.publicUrl.replace(/\/+$/, "")}${webhookPath}`;
    await bot.telegram.setWebhook(url, { allowed_updates: [...ALLOWED_UPDATES] });
    app.log.info("Webhook registered");
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  } else {
    await bot.telegram.deleteWebhook({ drop_pending_updates: false });
    startPolling(bot, shutdown);
  }
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logger.fatal({ err }, "Failed to start");
    process.exit(1);
  });
}
