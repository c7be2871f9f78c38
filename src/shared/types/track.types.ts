export interface IncomingRequest {
  updateId: number;
  messageId: number;
  chatId: number;
  userId: number;
  username?: string;
  text: string;
}

export type DownloadTarget =
  | { kind: "url"; url: string; host: string }
  | { kind: "search"; query: string };

export interface DownloadResult {
  filePath: string;
  title: string;
  performer: string;
  durationSec?: number;
  sizeBytes: number;
  sourceUrl?: string;
}

export interface TrackInfo {
  title?: string;
  artist?: string;
  uploader?: string;
  creator?: string;
  duration?: number;
  webpage_url?: string;
}
