export class BotError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = "BotError";
  }
}

export class ConfigurationError extends BotError {
  constructor(message: string) {
    super(message, "CONFIGURATION_ERROR");
    this.name = "ConfigurationError";
  }
}

export type InvalidUrlReason = "malformed" | "protocol" | "domain" | "missing";

export class InvalidUrlError extends BotError {
  constructor(
    message: string,
    public readonly input: string,
    public readonly reason: InvalidUrlReason,
  ) {
    super(message, "INVALID_URL");
    this.name = "InvalidUrlError";
  }
}

export class DownloadFailureError extends BotError {
  constructor(message: string, cause?: Error, code = "DOWNLOAD_FAILURE") {
    super(message, code, cause);
    this.name = "DownloadFailureError";
  }
}

export class DownloadTimeoutError extends DownloadFailureError {
  constructor(public readonly timeoutMs: number) {
    super(`Download timed out after ${timeoutMs} ms`, undefined, "DOWNLOAD_TIMEOUT");
    this.name = "DownloadTimeoutError";
  }
}

export type SendFailureReason = "file_too_large" | "telegram_error" | "network_error";

export class SendFailureError extends BotError {
  constructor(
    message: string,
    public readonly reason: SendFailureReason,
    cause?: Error,
  ) {
    super(message, "SEND_FAILURE", cause);
    this.name = "SendFailureError";
  }
}

export class TelegramApiError extends BotError {
  constructor(
    public readonly method: string,
    public readonly errorCode: number,
    public readonly description: string,
    public readonly retryAfterSec?: number,
  ) {
    super(`Telegram API error (${method}): HTTP ${errorCode} ${description}`, "TELEGRAM_API_ERROR");
    this.name = "TelegramApiError";
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
