import type { Server } from "node:http";
import { setTimeout as delay } from "node:timers/promises";
import { createApp } from "./app";
import { loadEnv } from "./config/env";
import { STALE_WORKSPACE_MAX_AGE_MS } from "./shared/constants";
import { errorMessage } from "./shared/errors";
import { sweepStaleWorkspaces } from "./tracks/temp-workspace";

const SHUTDOWN_GRACE_MS = 5_000;

async function bootstrap(): Promise<void> {
  const env = loadEnv();
  const { app, telegramClient, poller, logger } = createApp(env);

  await sweepStaleWorkspaces(env.tempDir, STALE_WORKSPACE_MAX_AGE_MS, logger);

  try {
    const me = await telegramClient.getMe();
    logger.info("Telegram bot identity resolved", { username: me.username });
  } catch (error) {
    logger.warn("Telegram getMe failed", { error: errorMessage(error) });
  }

  const server: Server = app.listen(env.port, () => {
    logger.info("Server started", { port: env.port, path: env.telegramWebhookPath });
    logger.info("DEBUG_MODE", { enabled: env.debugMode });
    logger.info("Track sources", {
      allowedDomains: env.allowedDomains,
      searchEnabled: env.searchEnabled,
      requiredChannel: env.requiredChannel ?? null,
    });
    logger.info("TELEGRAM_LOGS", {
      enabled: env.telegramLogsEnabled,
      chatConfigured: Boolean(env.telegramLogsChatId),
      level: env.telegramLogsLevel,
    });
  });

  if (env.telegramWebhookUrl) {
    const webhookUrl = `${env.telegramWebhookUrl}${env.telegramWebhookPath}`;
    try {
      await telegramClient.setWebhook(webhookUrl, env.telegramSecretToken);
      logger.info("Telegram webhook registered", { webhookUrl });
    } catch (error) {
      logger.error("Failed to register Telegram webhook", {
        webhookUrl,
        error: errorMessage(error),
      });
    }
  } else {
    logger.warn("TELEGRAM_WEBHOOK_URL is not set, using long polling");
    await telegramClient.deleteWebhook();
    void poller.start().catch((error) => {
      logger.error("Poller crashed", { error: errorMessage(error) });
      process.exitCode = 1;
    });
  }

  const shutdown = async (signal: string): Promise<void> => {
    logger.info("Shutdown requested", { signal });
    await Promise.race([poller.stop(), delay(SHUTDOWN_GRACE_MS)]);
    server.close((error) => {
      if (error) {
        logger.error("HTTP server close failed", { error: error.message });
      }
      process.exit(error ? 1 : 0);
    });
  };

  process.once("SIGINT", () => {
    void shutdown("SIGINT");
  });
  process.once("SIGTERM", () => {
    void shutdown("SIGTERM");
  });
}

bootstrap().catch((error: unknown) => {
  process.stderr.write(`Fatal error during startup: ${errorMessage(error)}\n`);
  process.exit(1);
});
