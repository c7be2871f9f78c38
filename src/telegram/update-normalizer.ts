import type { NormalizedUpdate, TelegramUpdate } from "../shared/types/telegram.types";

const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@([A-Za-z0-9_]+))?(?:\s+([\s\S]*))?$/;

export function normalizeUpdate(update: TelegramUpdate, botUsername?: string): NormalizedUpdate | null {
  const message = update.message;
  if (!message || typeof message.message_id !== "number") {
    return null;
  }
  // Webhook bodies are only checked for update_id before they get here.
  const chat: unknown = message.chat;
  const from: unknown = message.from;
  if (!hasNumericId(chat) || !hasNumericId(from)) {
    return null;
  }

  const base = {
    updateId: update.update_id,
    messageId: message.message_id,
    chatId: chat.id,
    userId: from.id,
    username: typeof message.from?.username === "string" ? message.from.username : undefined,
  };

  if (typeof message.text !== "string") {
    return { kind: "unsupported_message", ...base };
  }

  const text = message.text.trim();
  const command = parseCommand(text);
  if (command) {
    const addressedElsewhere =
      command.mention !== undefined &&
      botUsername !== undefined &&
      command.mention.toLowerCase() !== botUsername.toLowerCase();
    if (addressedElsewhere) {
      return null;
    }
    return {
      kind: "command",
      ...base,
      command: command.name,
      args: command.args,
      text,
    };
  }

  return { kind: "text", ...base, text };
}

function hasNumericId(value: unknown): value is { id: number } {
  return typeof value === "object" && value !== null && "id" in value && typeof value.id === "number";
}

export function parseCommand(
  text: string,
): { name: string; mention?: string; args: string } | null {
  const match = COMMAND_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  return {
    name: match[1].toLowerCase(),
    mention: match[2],
    args: (match[3] ?? "").trim(),
  };
}
