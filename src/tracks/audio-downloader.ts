import type { SpawnOptionsWithoutStdio } from "node:child_process";
import { readdir, stat } from "node:fs/promises";
import path from "node:path";
import pLimit from "p-limit";
import type { Logger } from "../config/logger";
import {
  DownloadFailureError,
  DownloadTimeoutError,
  errorMessage,
  toError,
} from "../shared/errors";
import type { DownloadResult, DownloadTarget, TrackInfo } from "../shared/types/track.types";

/**
 * The slice of yt-dlp-wrap the downloader relies on. `YTDlpWrap` instances
 * satisfy it; tests pass a fake.
 */
export interface YtDlpRunner {
  execPromise(
    args: string[],
    options?: SpawnOptionsWithoutStdio,
    abortSignal?: AbortSignal | null,
  ): Promise<string>;
}

export interface AudioDownloaderOptions {
  timeoutMs: number;
  maxConcurrency: number;
  ffmpegLocation?: string;
  /** How long a timed-out run may take to exit after the abort. */
  abortGraceMs?: number;
}

export const SEARCH_PREFIX = "scsearch1:";
const MAX_ERROR_PREVIEW = 300;
const DEFAULT_ABORT_GRACE_MS = 5_000;
const TIMED_OUT = Symbol("timed-out");

export class AudioDownloader {
  private readonly limit: ReturnType<typeof pLimit>;

  constructor(
    private readonly runner: YtDlpRunner,
    private readonly options: AudioDownloaderOptions,
    private readonly logger: Logger,
  ) {
    this.limit = pLimit(options.maxConcurrency);
  }

  get pendingCount(): number {
    return this.limit.pendingCount;
  }

  async download(target: DownloadTarget, workspaceDir: string): Promise<DownloadResult> {
    return this.limit(() => this.extract(target, workspaceDir));
  }

  buildArgs(target: DownloadTarget, workspaceDir: string): string[] {
    const args = [
      "--format",
      "bestaudio/best",
      "--extract-audio",
      "--audio-format",
      "mp3",
      "--audio-quality",
      "0",
      "--no-playlist",
      "--restrict-filenames",
      "--force-ipv4",
      "--output",
      path.join(workspaceDir, "%(title)s.%(ext)s"),
      "--dump-json",
      "--no-simulate",
      "--no-progress",
      "--no-warnings",
      "--quiet",
    ];
    if (this.options.ffmpegLocation) {
      args.push("--ffmpeg-location", this.options.ffmpegLocation);
    }
    args.push("--", describeSource(target));
    return args;
  }

  private async extract(target: DownloadTarget, workspaceDir: string): Promise<DownloadResult> {
    const startedAt = Date.now();
    const source = describeSource(target);
    this.logger.info("track.download.start", { source, workspaceDir });

    const stdout = await this.runWithTimeout(this.buildArgs(target, workspaceDir));
    const audioPath = await findFirstMp3(workspaceDir);
    if (!audioPath) {
      throw new DownloadFailureError(`yt-dlp produced no mp3 for ${source}`);
    }

    const info = parseTrackInfo(stdout);
    const fileStat = await stat(audioPath);
    const fallbackTitle = target.kind === "search" ? target.query : path.parse(audioPath).name;
    const result: DownloadResult = {
      filePath: audioPath,
      title: pickTitle(info, fallbackTitle),
      performer: pickPerformer(info),
      durationSec: typeof info?.duration === "number" ? Math.round(info.duration) : undefined,
      sizeBytes: fileStat.size,
      sourceUrl: info?.webpage_url ?? (target.kind === "url" ? target.url : undefined),
    };

    this.logger.info("track.download.done", {
      source,
      title: result.title,
      sizeBytes: result.sizeBytes,
      latency_ms: Date.now() - startedAt,
    });
    return result;
  }

  private async runWithTimeout(args: string[]): Promise<string> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(() => resolve(TIMED_OUT), this.options.timeoutMs);
    });
    const execution = this.runner.execPromise(args, {}, controller.signal);

    let outcome: string | typeof TIMED_OUT;
    try {
      outcome = await Promise.race([execution, timeout]);
    } catch (error) {
      throw new DownloadFailureError(
        `yt-dlp failed: ${truncate(errorMessage(error), MAX_ERROR_PREVIEW)}`,
        toError(error),
      );
    } finally {
      clearTimeout(timer);
    }

    if (outcome === TIMED_OUT) {
      controller.abort();
      await this.waitForExit(execution);
      throw new DownloadTimeoutError(this.options.timeoutMs);
    }
    return outcome;
  }

  // The workspace is removed right after a timeout, so give yt-dlp and ffmpeg time to stop writing.
  private async waitForExit(execution: Promise<string>): Promise<void> {
    const graceMs = this.options.abortGraceMs ?? DEFAULT_ABORT_GRACE_MS;
    let timer: NodeJS.Timeout | undefined;
    const exited = execution.then(
      () => true,
      (error: unknown) => {
        this.logger.debug("track.download.aborted", { error: errorMessage(error) });
        return true;
      },
    );
    const gaveUp = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), graceMs);
    });

    const settled = await Promise.race([exited, gaveUp]);
    clearTimeout(timer);
    if (!settled) {
      this.logger.warn("track.download.abort_unconfirmed", { graceMs });
    }
  }
}

export function describeSource(target: DownloadTarget): string {
  return target.kind === "url" ? target.url : `${SEARCH_PREFIX}${target.query}`;
}

export async function findFirstMp3(dir: string): Promise<string | null> {
  const entries = await readdir(dir);
  const mp3 = entries.filter((name) => name.toLowerCase().endsWith(".mp3")).sort()[0];
  return mp3 ? path.join(dir, mp3) : null;
}

/**
 * yt-dlp prints one JSON object per line with `--dump-json`; search results
 * may come wrapped in `entries`.
 */
export function parseTrackInfo(stdout: string): TrackInfo | null {
  const lines = stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.startsWith("{"));

  for (const line of lines) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      continue;
    }
    const info = toTrackInfo(parsed);
    if (info) {
      return info;
    }
  }
  return null;
}

function toTrackInfo(value: unknown): TrackInfo | null {
  if (!isRecord(value)) {
    return null;
  }
  const entries = value.entries;
  if (Array.isArray(entries)) {
    return entries.length > 0 ? toTrackInfo(entries[0]) : null;
  }
  return {
    title: readString(value, "title"),
    artist: readString(value, "artist"),
    uploader: readString(value, "uploader"),
    creator: readString(value, "creator"),
    duration: typeof value.duration === "number" && Number.isFinite(value.duration) ? value.duration : undefined,
    webpage_url: readString(value, "webpage_url"),
  };
}

export function pickTitle(info: TrackInfo | null, fallback = "Track"): string {
  return info?.title || fallback || "Track";
}

export function pickPerformer(info: TrackInfo | null): string {
  return info?.artist || info?.uploader || info?.creator || "";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
}

function truncate(text: string, maxChars: number): string {
  return text.length <= maxChars ? text : `${text.slice(0, maxChars - 3)}...`;
}
