import { createReadStream } from "node:fs";
import path from "node:path";
import FormData from "form-data";
import fetch from "node-fetch";
import type { Logger } from "../config/logger";
import { TELEGRAM_REQUEST_TIMEOUT_MS } from "../shared/constants";
import { TelegramApiError } from "../shared/errors";
import type {
  TelegramApiResponse,
  TelegramChatAction,
  TelegramChatMember,
  TelegramMessage,
  TelegramUpdate,
  TelegramUser,
} from "../shared/types/telegram.types";
import { withSendRetries } from "./send-retry";
import type { SendRetryOptions } from "./send-retry";

interface SetWebhookPayload {
  url: string;
  secret_token?: string;
  allowed_updates?: string[];
  drop_pending_updates?: boolean;
}

interface SendMessagePayload {
  chat_id: number;
  text: string;
  disable_web_page_preview?: boolean;
  reply_to_message_id?: number;
  allow_sending_without_reply?: boolean;
}

interface GetUpdatesPayload {
  offset?: number;
  timeout: number;
  allowed_updates: string[];
}

export interface SendAudioInput {
  chatId: number;
  filePath: string;
  title?: string;
  performer?: string;
  durationSec?: number;
  caption?: string;
  replyToMessageId?: number;
}

interface RequestBody {
  body: string | FormData;
  headers: Record<string, string>;
}

export interface TelegramClientOptions extends Omit<SendRetryOptions, "label" | "logger"> {
  /** Per-request limit; getUpdates adds its long-poll timeout on top. */
  requestTimeoutMs?: number;
}

const DEFAULT_API_ROOT = "https://api.telegram.org";
const ALLOWED_UPDATES = ["message"];

export class TelegramClient {
  private readonly apiBase: string;
  private readonly retryOptions: Omit<SendRetryOptions, "label" | "logger">;
  private readonly requestTimeoutMs: number;
  private cachedMe: TelegramUser | null = null;

  constructor(
    private readonly token: string,
    private readonly logger: Logger,
    options: TelegramClientOptions = {},
    apiRoot: string = DEFAULT_API_ROOT,
  ) {
    const { requestTimeoutMs, ...retryOptions } = options;
    this.retryOptions = retryOptions;
    this.requestTimeoutMs = requestTimeoutMs ?? TELEGRAM_REQUEST_TIMEOUT_MS;
    this.apiBase = `${apiRoot.replace(/\/+$/, "")}/bot${this.token}`;
  }

  get username(): string | undefined {
    return this.cachedMe?.username;
  }

  async getMe(): Promise<TelegramUser> {
    if (this.cachedMe) {
      return this.cachedMe;
    }
    const me = await this.request<TelegramUser>("getMe", {});
    this.cachedMe = me;
    return me;
  }

  async setWebhook(url: string, secretToken?: string): Promise<void> {
    const payload: SetWebhookPayload = { url, allowed_updates: ALLOWED_UPDATES };
    if (secretToken) {
      payload.secret_token = secretToken;
    }

    await this.request<boolean>("setWebhook", payload);
  }

  async deleteWebhook(dropPendingUpdates = false): Promise<void> {
    await this.request<boolean>("deleteWebhook", { drop_pending_updates: dropPendingUpdates });
  }

  async getUpdates(offset: number | undefined, timeoutSec: number): Promise<TelegramUpdate[]> {
    const payload: GetUpdatesPayload = { timeout: timeoutSec, allowed_updates: ALLOWED_UPDATES };
    if (offset !== undefined) {
      payload.offset = offset;
    }
    return this.request<TelegramUpdate[]>("getUpdates", payload, this.requestTimeoutMs + timeoutSec * 1_000);
  }

  async sendMessage(
    chatId: number,
    text: string,
    options?: { replyToMessageId?: number; source?: string },
  ): Promise<void> {
    const payload: SendMessagePayload = {
      chat_id: chatId,
      text: clampTelegramText(text),
      disable_web_page_preview: true,
    };
    if (options?.replyToMessageId !== undefined) {
      payload.reply_to_message_id = options.replyToMessageId;
      payload.allow_sending_without_reply = true;
    }

    this.logger.debug("telegram.send_message", {
      source: options?.source ?? "telegram_send_message",
      chatId,
      textPreview: payload.text.slice(0, 140),
    });
    await withSendRetries(() => this.request<TelegramMessage>("sendMessage", payload), {
      ...this.retryOptions,
      logger: this.logger,
      label: "sendMessage",
    });
  }

  async sendChatAction(chatId: number, action: TelegramChatAction): Promise<void> {
    await this.request<boolean>("sendChatAction", { chat_id: chatId, action });
  }

  async sendAudio(input: SendAudioInput): Promise<TelegramMessage> {
    // Each attempt needs a fresh form: the file stream cannot be replayed.
    return withSendRetries(
      () => this.call<TelegramMessage>("sendAudio", () => buildSendAudioForm(input)),
      {
        ...this.retryOptions,
        logger: this.logger,
        label: "sendAudio",
      },
    );
  }

  async getChatMember(chatId: string | number, userId: number): Promise<TelegramChatMember> {
    return this.request<TelegramChatMember>("getChatMember", { chat_id: chatId, user_id: userId });
  }

  private async request<TResponse>(method: string, payload: unknown, timeoutMs?: number): Promise<TResponse> {
    return this.call<TResponse>(
      method,
      () => ({
        body: JSON.stringify(payload),
        headers: { "content-type": "application/json" },
      }),
      timeoutMs,
    );
  }

  private async call<TResponse>(
    method: string,
    buildBody: () => RequestBody,
    timeoutMs: number = this.requestTimeoutMs,
  ): Promise<TResponse> {
    const { body, headers } = buildBody();
    // node-fetch rejects with a FetchError of type "request-timeout" once this elapses.
    const response = await fetch(`${this.apiBase}/${method}`, {
      method: "POST",
      headers,
      body,
      timeout: timeoutMs,
    });

    let parsed: TelegramApiResponse<TResponse>;
    try {
      parsed = (await response.json()) as TelegramApiResponse<TResponse>;
    } catch {
      throw new TelegramApiError(method, response.status, "non-JSON response");
    }

    if (!parsed.ok) {
      this.logger.error("Telegram API returned failure", {
        method,
        code: parsed.error_code,
        description: parsed.description,
      });
      throw new TelegramApiError(
        method,
        parsed.error_code,
        parsed.description,
        parsed.parameters?.retry_after,
      );
    }

    return parsed.result;
  }
}

function buildSendAudioForm(input: SendAudioInput): RequestBody {
  const form = new FormData();
  form.append("chat_id", String(input.chatId));
  form.append("audio", createReadStream(input.filePath), {
    filename: path.basename(input.filePath),
    contentType: "audio/mpeg",
  });
  if (input.title) {
    form.append("title", input.title);
  }
  if (input.performer) {
    form.append("performer", input.performer);
  }
  if (input.durationSec !== undefined) {
    form.append("duration", String(input.durationSec));
  }
  if (input.caption) {
    form.append("caption", clampCaption(input.caption));
  }
  if (input.replyToMessageId !== undefined) {
    form.append("reply_to_message_id", String(input.replyToMessageId));
    form.append("allow_sending_without_reply", "true");
  }
  return { body: form, headers: form.getHeaders() };
}

export function clampTelegramText(text: string): string {
  const MAX_TEXT_LENGTH = 3900;
  if (text.length <= MAX_TEXT_LENGTH) {
    return text;
  }
  return `${text.slice(0, MAX_TEXT_LENGTH - 3)}...`;
}

function clampCaption(text: string): string {
  const MAX_CAPTION_LENGTH = 1024;
  if (text.length <= MAX_CAPTION_LENGTH) {
    return text;
  }
  return `${text.slice(0, MAX_CAPTION_LENGTH - 3)}...`;
}
