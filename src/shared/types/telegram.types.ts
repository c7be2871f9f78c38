export interface TelegramUser {
  id: number;
  is_bot?: boolean;
  first_name?: string;
  username?: string;
}

export interface TelegramChat {
  id: number;
  type?: "private" | "group" | "supergroup" | "channel";
}

export interface TelegramAudio {
  file_id: string;
  duration: number;
  title?: string;
  performer?: string;
  file_size?: number;
}

export interface TelegramMessage {
  message_id: number;
  chat: TelegramChat;
  from?: TelegramUser;
  text?: string;
  audio?: TelegramAudio;
}

export interface TelegramUpdate {
  update_id: number;
  message?: TelegramMessage;
  edited_message?: TelegramMessage;
}

export type TelegramChatMemberStatus =
  | "creator"
  | "administrator"
  | "member"
  | "restricted"
  | "left"
  | "kicked";

export interface TelegramChatMember {
  status: TelegramChatMemberStatus;
  user: TelegramUser;
}

export type TelegramChatAction = "typing" | "upload_document" | "upload_voice";

interface TelegramResponseParameters {
  retry_after?: number;
  migrate_to_chat_id?: number;
}

interface TelegramApiSuccess<T> {
  ok: true;
  result: T;
}

interface TelegramApiFailure {
  ok: false;
  error_code: number;
  description: string;
  parameters?: TelegramResponseParameters;
}

export type TelegramApiResponse<T> = TelegramApiSuccess<T> | TelegramApiFailure;

interface NormalizedMessageBase {
  updateId: number;
  messageId: number;
  chatId: number;
  userId: number;
  username?: string;
}

export type NormalizedUpdate =
  | (NormalizedMessageBase & {
      kind: "command";
      command: string;
      args: string;
      text: string;
    })
  | (NormalizedMessageBase & {
      kind: "text";
      text: string;
    })
  | (NormalizedMessageBase & {
      kind: "unsupported_message";
    });
