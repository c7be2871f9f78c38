import { setTimeout as delay } from "node:timers/promises";
import type { Logger } from "../config/logger";
import type { UpdateDispatcher } from "../router/dispatch/update.dispatcher";
import { POLLING_ERROR_BACKOFF_MS } from "../shared/constants";
import { errorMessage } from "../shared/errors";
import type { TelegramUpdate } from "../shared/types/telegram.types";

export interface UpdateSource {
  getUpdates(offset: number | undefined, timeoutSec: number): Promise<TelegramUpdate[]>;
}

export interface UpdatePollerOptions {
  timeoutSec: number;
  errorBackoffMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Long-polls getUpdates and hands each batch to the dispatcher in order,
 * waiting for the batch to finish before acknowledging it with the next offset.
 */
export class UpdatePoller {
  private running = false;
  private offset: number | undefined;
  private loop: Promise<void> | null = null;

  constructor(
    private readonly source: UpdateSource,
    private readonly dispatcher: UpdateDispatcher,
    private readonly options: UpdatePollerOptions,
    private readonly logger: Logger,
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  get nextOffset(): number | undefined {
    return this.offset;
  }

  start(): Promise<void> {
    if (this.loop) {
      return this.loop;
    }
    this.running = true;
    this.logger.info("poller.started", { timeoutSec: this.options.timeoutSec });
    this.loop = this.run().finally(() => {
      this.loop = null;
      this.logger.info("poller.stopped");
    });
    return this.loop;
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.loop) {
      await this.loop;
    }
  }

  async pollOnce(): Promise<number> {
    const updates = await this.source.getUpdates(this.offset, this.options.timeoutSec);
    if (updates.length === 0) {
      return 0;
    }

    const ordered = [...updates].sort((left, right) => left.update_id - right.update_id);
    await Promise.all(ordered.map((update) => this.dispatcher.submit(update)));

    const last = ordered[ordered.length - 1];
    this.offset = last.update_id + 1;
    return ordered.length;
  }

  private async run(): Promise<void> {
    const sleep = this.options.sleep ?? defaultSleep;
    while (this.running) {
      try {
        await this.pollOnce();
      } catch (error) {
        if (!this.running) {
          return;
        }
        this.logger.warn("poller.get_updates_failed", { error: errorMessage(error) });
        await sleep(this.options.errorBackoffMs ?? POLLING_ERROR_BACKOFF_MS);
      }
    }
  }
}

async function defaultSleep(ms: number): Promise<void> {
  await delay(ms);
}
