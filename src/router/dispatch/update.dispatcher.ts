import pLimit from "p-limit";
import type { Logger } from "../../config/logger";
import { logContext } from "../../config/logger";
import { errorMessage } from "../../shared/errors";
import type { NormalizedUpdate, TelegramUpdate } from "../../shared/types/telegram.types";
import type { UpdateDeduplicator } from "../../shared/utils/telegram-idempotency";
import { normalizeUpdate } from "../../telegram/update-normalizer";

export interface UpdateRouter {
  route(update: NormalizedUpdate): Promise<void>;
}

export interface UpdateDispatcher {
  /**
   * Queues the update and resolves once it has been handled. Never rejects:
   * handler failures are logged here.
   */
  submit(update: TelegramUpdate): Promise<void>;
  readonly pendingCount: number;
}

interface UpdateDispatcherDeps {
  router: UpdateRouter;
  deduplicator: UpdateDeduplicator;
  logger: Logger;
  concurrency: number;
  botUsername?: () => string | undefined;
}

export function buildUpdateDispatcher(deps: UpdateDispatcherDeps): UpdateDispatcher {
  return new QueuedUpdateDispatcher(deps);
}

class QueuedUpdateDispatcher implements UpdateDispatcher {
  private readonly queue: ReturnType<typeof pLimit>;

  constructor(private readonly deps: UpdateDispatcherDeps) {
    this.queue = pLimit(deps.concurrency);
  }

  get pendingCount(): number {
    return this.queue.pendingCount + this.queue.activeCount;
  }

  async submit(update: TelegramUpdate): Promise<void> {
    let normalized: NormalizedUpdate | null;
    try {
      normalized = this.accept(update);
    } catch (error) {
      this.deps.logger.warn("dispatch.rejected_update", {
        updateId: update.update_id,
        error: errorMessage(error),
      });
      return;
    }
    if (!normalized) {
      return;
    }

    const accepted = normalized;
    await this.queue(() => this.dispatch(accepted));
  }

  private accept(update: TelegramUpdate): NormalizedUpdate | null {
    const normalized = normalizeUpdate(update, this.deps.botUsername?.());
    if (!normalized) {
      this.deps.logger.debug("Unsupported Telegram update", { updateId: update.update_id });
      return null;
    }

    if (!this.deps.deduplicator.shouldProcess(normalized.updateId)) {
      this.deps.logger.debug("Duplicate update ignored by idempotency guard", {
        updateId: normalized.updateId,
        telegramUserId: normalized.userId,
      });
      return null;
    }
    return normalized;
  }

  private async dispatch(normalized: NormalizedUpdate): Promise<void> {
    const startedAt = Date.now();
    logContext(
      this.deps.logger,
      "info",
      "dispatch.start",
      {
        update_id: normalized.updateId,
        telegram_user_id: normalized.userId,
        chat_id: normalized.chatId,
      },
      { kind: normalized.kind },
    );

    try {
      await this.deps.router.route(normalized);
      logContext(
        this.deps.logger,
        "info",
        "dispatch.done",
        {
          update_id: normalized.updateId,
          telegram_user_id: normalized.userId,
          latency_ms: Date.now() - startedAt,
          ok: true,
        },
        { kind: normalized.kind },
      );
    } catch (error) {
      logContext(
        this.deps.logger,
        "error",
        "dispatch.failed",
        {
          update_id: normalized.updateId,
          telegram_user_id: normalized.userId,
          latency_ms: Date.now() - startedAt,
          ok: false,
        },
        { kind: normalized.kind, error: errorMessage(error) },
      );
    }
  }
}
