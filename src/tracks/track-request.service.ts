import type { Logger } from "../config/logger";
import { logContext } from "../config/logger";
import { SOURCE_LABEL } from "../shared/constants";
import {
  ConfigurationError,
  DownloadFailureError,
  DownloadTimeoutError,
  errorMessage,
  InvalidUrlError,
  SendFailureError,
} from "../shared/errors";
import type { TelegramChatAction, TelegramUser } from "../shared/types/telegram.types";
import type { DownloadResult, DownloadTarget, IncomingRequest } from "../shared/types/track.types";
import type { UserCooldown } from "../shared/utils/cooldown";
import {
  audioCaption,
  channelMisconfiguredMessage,
  cooldownMessage,
  downloadFailedMessage,
  downloadingMessage,
  downloadTimeoutMessage,
  fileTooLargeMessage,
  genericErrorMessage,
  linkRequiredMessage,
  rejectedUrlMessage,
  sendFailedMessage,
  subscribeFirstMessage,
} from "../telegram/ui/messages";
import type { SendTrackInput } from "./audio-sender";
import type { SubscriptionService } from "./subscription.service";
import { withTempWorkspace } from "./temp-workspace";
import { extractFirstUrl, isAllowedHost, validateTrackUrl } from "./url-validator";

export interface ChatMessenger {
  sendMessage(
    chatId: number,
    text: string,
    options?: { replyToMessageId?: number; source?: string },
  ): Promise<void>;
  sendChatAction(chatId: number, action: TelegramChatAction): Promise<void>;
  getMe(): Promise<TelegramUser>;
}

export interface TrackDownloader {
  download(target: DownloadTarget, workspaceDir: string): Promise<DownloadResult>;
}

export interface TrackSender {
  send(input: SendTrackInput): Promise<void>;
}

export interface TrackRequestSettings {
  allowedDomains: readonly string[];
  searchEnabled: boolean;
  tempDir: string;
  maxFileMb: number;
}

export class TrackRequestService {
  constructor(
    private readonly messenger: ChatMessenger,
    private readonly downloader: TrackDownloader,
    private readonly sender: TrackSender,
    private readonly subscriptions: SubscriptionService,
    private readonly cooldown: UserCooldown,
    private readonly settings: TrackRequestSettings,
    private readonly logger: Logger,
  ) {}

  async handle(request: IncomingRequest): Promise<void> {
    const startedAt = Date.now();
    try {
      const target = this.resolveTarget(request.text);

      const decision = this.cooldown.checkAndConsume(request.userId);
      if (!decision.allowed) {
        await this.reply(request, cooldownMessage(decision.retryAfterSeconds), "track.cooldown");
        return;
      }

      const subscription = await this.subscriptions.check(request.userId);
      if (subscription.required && !subscription.subscribed) {
        await this.reply(request, subscribeFirstMessage(subscription.channel), "track.subscription");
        return;
      }

      await this.reply(request, downloadingMessage(describeTarget(target)), "track.progress");
      await this.showUploadAction(request.chatId);

      const caption = audioCaption(sourceLabel(target), await this.botUsername());
      await withTempWorkspace(
        this.settings.tempDir,
        async (workspaceDir) => {
          const result = await this.downloader.download(target, workspaceDir);
          await this.sender.send({
            chatId: request.chatId,
            replyToMessageId: request.messageId,
            result,
            caption,
          });
        },
        this.logger,
      );

      logContext(this.logger, "info", "track.request.done", {
        update_id: request.updateId,
        telegram_user_id: request.userId,
        source_host: target.kind === "url" ? target.host : undefined,
        latency_ms: Date.now() - startedAt,
        ok: true,
      });
    } catch (error) {
      await this.reportFailure(request, error, Date.now() - startedAt);
    }
  }

  resolveTarget(text: string): DownloadTarget {
    const url = extractFirstUrl(text);
    if (url) {
      const validation = validateTrackUrl(url, this.settings.allowedDomains);
      if (!validation.ok) {
        throw new InvalidUrlError(`Rejected URL (${validation.reason})`, validation.input, validation.reason);
      }
      return { kind: "url", url: validation.url, host: validation.host };
    }

    const query = text.trim();
    if (!this.settings.searchEnabled || query.length === 0) {
      throw new InvalidUrlError("No URL in message", query, "missing");
    }
    return { kind: "search", query };
  }

  private async reportFailure(request: IncomingRequest, error: unknown, latencyMs: number): Promise<void> {
    const context = {
      update_id: request.updateId,
      telegram_user_id: request.userId,
      latency_ms: latencyMs,
      ok: false,
      error_code: error instanceof Error && "code" in error ? String(error.code) : "UNKNOWN",
    };
    const level = error instanceof InvalidUrlError ? "info" : error instanceof DownloadFailureError ? "warn" : "error";
    logContext(this.logger, level, "track.request.failed", context, { error: errorMessage(error) });

    try {
      await this.reply(request, this.describeFailure(error), "track.failure");
    } catch (replyError) {
      this.logger.error("track.failure_reply_failed", {
        chat_id: request.chatId,
        error: errorMessage(replyError),
      });
    }
  }

  describeFailure(error: unknown): string {
    if (error instanceof InvalidUrlError) {
      return error.reason === "missing"
        ? linkRequiredMessage(this.settings.allowedDomains)
        : rejectedUrlMessage(error.reason, this.settings.allowedDomains);
    }
    if (error instanceof DownloadTimeoutError) {
      return downloadTimeoutMessage();
    }
    if (error instanceof DownloadFailureError) {
      return downloadFailedMessage();
    }
    if (error instanceof SendFailureError) {
      return error.reason === "file_too_large"
        ? fileTooLargeMessage(this.settings.maxFileMb)
        : sendFailedMessage();
    }
    if (error instanceof ConfigurationError) {
      return this.subscriptions.channel
        ? channelMisconfiguredMessage(this.subscriptions.channel)
        : genericErrorMessage();
    }
    return genericErrorMessage();
  }

  private async reply(request: IncomingRequest, text: string, source: string): Promise<void> {
    await this.messenger.sendMessage(request.chatId, text, {
      replyToMessageId: request.messageId,
      source,
    });
  }

  private async showUploadAction(chatId: number): Promise<void> {
    try {
      await this.messenger.sendChatAction(chatId, "upload_document");
    } catch (error) {
      this.logger.debug("telegram.chat_action_failed", { chat_id: chatId, error: errorMessage(error) });
    }
  }

  private async botUsername(): Promise<string | undefined> {
    try {
      const me = await this.messenger.getMe();
      return me.username;
    } catch (error) {
      this.logger.warn("telegram.get_me_failed", { error: errorMessage(error) });
      return undefined;
    }
  }
}

function describeTarget(target: DownloadTarget): string {
  return target.kind === "url" ? target.url : target.query;
}

function sourceLabel(target: DownloadTarget): string {
  if (target.kind === "search" || isAllowedHost(target.host, ["soundcloud.com"])) {
    return SOURCE_LABEL;
  }
  return target.host;
}
