import type { Logger } from "../config/logger";
import { COMMAND_CHECK, COMMAND_HELP, COMMAND_START } from "../shared/constants";
import { ConfigurationError, errorMessage } from "../shared/errors";
import type { NormalizedUpdate } from "../shared/types/telegram.types";
import {
  channelMisconfiguredMessage,
  noSubscriptionRequiredMessage,
  subscriptionStatusMessage,
  unknownCommandMessage,
  unsupportedInputMessage,
  welcomeMessage,
} from "../telegram/ui/messages";
import type { SubscriptionService } from "../tracks/subscription.service";
import type { ChatMessenger, TrackRequestService } from "../tracks/track-request.service";

type CommandUpdate = Extract<NormalizedUpdate, { kind: "command" }>;

export interface CommandRouterSettings {
  allowedDomains: readonly string[];
  searchEnabled: boolean;
}

export class CommandRouter {
  constructor(
    private readonly messenger: ChatMessenger,
    private readonly trackRequests: TrackRequestService,
    private readonly subscriptions: SubscriptionService,
    private readonly settings: CommandRouterSettings,
    private readonly logger: Logger,
  ) {}

  async route(update: NormalizedUpdate): Promise<void> {
    if (update.kind === "command") {
      await this.routeCommand(update);
      return;
    }

    if (update.kind === "text") {
      await this.trackRequests.handle({
        updateId: update.updateId,
        messageId: update.messageId,
        chatId: update.chatId,
        userId: update.userId,
        username: update.username,
        text: update.text,
      });
      return;
    }

    await this.messenger.sendMessage(update.chatId, unsupportedInputMessage(), {
      replyToMessageId: update.messageId,
      source: "router.unsupported",
    });
  }

  private async routeCommand(update: CommandUpdate): Promise<void> {
    this.logger.debug("router.command", { command: update.command, telegram_user_id: update.userId });

    if (update.command === COMMAND_START || update.command === COMMAND_HELP) {
      await this.messenger.sendMessage(
        update.chatId,
        welcomeMessage({
          allowedDomains: this.settings.allowedDomains,
          searchEnabled: this.settings.searchEnabled,
          requiredChannel: this.subscriptions.channel,
        }),
        { source: "router.welcome" },
      );
      return;
    }

    if (update.command === COMMAND_CHECK) {
      await this.messenger.sendMessage(update.chatId, await this.describeSubscription(update.userId), {
        replyToMessageId: update.messageId,
        source: "router.check",
      });
      return;
    }

    await this.messenger.sendMessage(update.chatId, unknownCommandMessage(), {
      replyToMessageId: update.messageId,
      source: "router.unknown_command",
    });
  }

  private async describeSubscription(userId: number): Promise<string> {
    try {
      const status = await this.subscriptions.check(userId);
      if (!status.required) {
        return noSubscriptionRequiredMessage();
      }
      return subscriptionStatusMessage(status.channel, status.subscribed);
    } catch (error) {
      if (error instanceof ConfigurationError && this.subscriptions.channel) {
        return channelMisconfiguredMessage(this.subscriptions.channel);
      }
      this.logger.error("router.check_failed", { telegram_user_id: userId, error: errorMessage(error) });
      throw error;
    }
  }
}
