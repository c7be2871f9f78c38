import type { Logger } from "../config/logger";
import { ConfigurationError, errorMessage } from "../shared/errors";
import type { TelegramChatMember } from "../shared/types/telegram.types";

export interface ChatMemberLookup {
  getChatMember(chatId: string | number, userId: number): Promise<TelegramChatMember>;
}

export type SubscriptionStatus =
  | { required: false }
  | { required: true; channel: string; subscribed: boolean };

const NOT_SUBSCRIBED_STATUSES = new Set(["left", "kicked"]);

export class SubscriptionService {
  constructor(
    private readonly telegram: ChatMemberLookup,
    private readonly logger: Logger,
    private readonly requiredChannel?: string,
  ) {}

  get channel(): string | undefined {
    return this.requiredChannel;
  }

  /**
   * Throws ConfigurationError when the bot cannot read the channel's members,
   * which usually means it is not an administrator there.
   */
  async check(userId: number): Promise<SubscriptionStatus> {
    if (!this.requiredChannel) {
      return { required: false };
    }

    let member: TelegramChatMember;
    try {
      member = await this.telegram.getChatMember(this.requiredChannel, userId);
    } catch (error) {
      this.logger.warn("subscription.lookup_failed", {
        channel: this.requiredChannel,
        telegram_user_id: userId,
        error: errorMessage(error),
      });
      throw new ConfigurationError(
        `Cannot read members of ${this.requiredChannel}: ${errorMessage(error)}`,
      );
    }

    return {
      required: true,
      channel: this.requiredChannel,
      subscribed: !NOT_SUBSCRIBED_STATUSES.has(member.status),
    };
  }
}
