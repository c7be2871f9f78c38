import express from "express";
import type { Express, Request, Response } from "express";
import YTDlpWrap from "yt-dlp-wrap";
import type { EnvConfig } from "./config/env";
import { createLogger } from "./config/logger";
import type { Logger } from "./config/logger";
import { CommandRouter } from "./router/command.router";
import { buildUpdateDispatcher } from "./router/dispatch/update.dispatcher";
import type { UpdateDispatcher } from "./router/dispatch/update.dispatcher";
import { UserCooldown } from "./shared/utils/cooldown";
import { UpdateDeduplicator } from "./shared/utils/telegram-idempotency";
import { TelegramClient } from "./telegram/telegram.client";
import { UpdatePoller } from "./telegram/update-poller";
import { buildWebhookController } from "./telegram/webhook.controller";
import { AudioDownloader } from "./tracks/audio-downloader";
import type { YtDlpRunner } from "./tracks/audio-downloader";
import { AudioSender } from "./tracks/audio-sender";
import { SubscriptionService } from "./tracks/subscription.service";
import { TrackRequestService } from "./tracks/track-request.service";

export interface AppContext {
  app: Express;
  telegramClient: TelegramClient;
  dispatcher: UpdateDispatcher;
  poller: UpdatePoller;
  logger: Logger;
}

export interface AppOverrides {
  logger?: Logger;
  telegramClient?: TelegramClient;
  ytDlp?: YtDlpRunner;
}

export function createApp(env: EnvConfig, overrides: AppOverrides = {}): AppContext {
  const logger =
    overrides.logger ??
    createLogger({
      minLevel: env.debugMode ? "debug" : "info",
      telegram: {
        enabled: env.telegramLogsEnabled,
        token: env.telegramBotToken,
        chatId: env.telegramLogsChatId,
        minLevel: env.telegramLogsLevel,
        ratePerMinute: env.telegramLogsRatePerMin,
        batchMs: env.telegramLogsBatchMs,
        apiRoot: env.telegramApiRoot,
      },
    });
  const app = express();

  app.use(express.json({ limit: "2mb" }));

  const telegramClient = overrides.telegramClient ?? new TelegramClient(env.telegramBotToken, logger, {}, env.telegramApiRoot);
  const ytDlp = overrides.ytDlp ?? new YTDlpWrap(env.ytDlpPath);
  const audioDownloader = new AudioDownloader(
    ytDlp,
    {
      timeoutMs: Math.floor(env.downloadTimeoutSec * 1000),
      maxConcurrency: env.maxConcurrency,
      ffmpegLocation: env.ffmpegLocation,
    },
    logger,
  );
  const audioSender = new AudioSender(telegramClient, env.maxFileMb, logger);
  const subscriptionService = new SubscriptionService(telegramClient, logger, env.requiredChannel);
  const cooldown = new UserCooldown(Math.floor(env.userCooldownSec * 1000));
  const trackRequestService = new TrackRequestService(
    telegramClient,
    audioDownloader,
    audioSender,
    subscriptionService,
    cooldown,
    {
      allowedDomains: env.allowedDomains,
      searchEnabled: env.searchEnabled,
      tempDir: env.tempDir,
      maxFileMb: env.maxFileMb,
    },
    logger,
  );
  const commandRouter = new CommandRouter(
    telegramClient,
    trackRequestService,
    subscriptionService,
    {
      allowedDomains: env.allowedDomains,
      searchEnabled: env.searchEnabled,
    },
    logger,
  );

  const dispatcher = buildUpdateDispatcher({
    router: commandRouter,
    deduplicator: new UpdateDeduplicator(),
    logger,
    concurrency: env.updateConcurrency,
    botUsername: () => telegramClient.username,
  });
  const poller = new UpdatePoller(telegramClient, dispatcher, { timeoutSec: env.pollingTimeoutSec }, logger);
  const webhookController = buildWebhookController({
    dispatcher,
    logger,
    secretToken: env.telegramSecretToken,
  });

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true, pending: dispatcher.pendingCount });
  });

  app.use(env.telegramWebhookPath, webhookController);

  return { app, telegramClient, dispatcher, poller, logger };
}
