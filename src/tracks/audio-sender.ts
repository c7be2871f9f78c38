import type { Logger } from "../config/logger";
import { BYTES_PER_MB } from "../shared/constants";
import { errorMessage, SendFailureError, TelegramApiError, toError } from "../shared/errors";
import type { DownloadResult } from "../shared/types/track.types";
import type { TelegramMessage } from "../shared/types/telegram.types";
import type { SendAudioInput } from "../telegram/telegram.client";

export interface AudioUploader {
  sendAudio(input: SendAudioInput): Promise<TelegramMessage>;
}

export interface SendTrackInput {
  chatId: number;
  replyToMessageId?: number;
  result: DownloadResult;
  caption?: string;
}

export class AudioSender {
  constructor(
    private readonly uploader: AudioUploader,
    private readonly maxFileMb: number,
    private readonly logger: Logger,
  ) {}

  async send(input: SendTrackInput): Promise<void> {
    const { result } = input;
    const sizeMb = result.sizeBytes / BYTES_PER_MB;
    if (sizeMb > this.maxFileMb) {
      throw new SendFailureError(
        `File is ${sizeMb.toFixed(1)} MB, limit is ${this.maxFileMb} MB`,
        "file_too_large",
      );
    }

    try {
      await this.uploader.sendAudio({
        chatId: input.chatId,
        filePath: result.filePath,
        title: result.title,
        performer: result.performer || undefined,
        durationSec: result.durationSec,
        caption: input.caption,
        replyToMessageId: input.replyToMessageId,
      });
    } catch (error) {
      if (error instanceof TelegramApiError && error.errorCode === 413) {
        throw new SendFailureError("Telegram rejected the file as too large", "file_too_large", error);
      }
      throw new SendFailureError(
        `Audio upload failed: ${errorMessage(error)}`,
        error instanceof TelegramApiError ? "telegram_error" : "network_error",
        toError(error),
      );
    }

    this.logger.info("track.send.done", {
      chat_id: input.chatId,
      title: result.title,
      sizeBytes: result.sizeBytes,
    });
  }
}
