import os from "node:os";
import dotenv from "dotenv";
import { ConfigurationError } from "../shared/errors";
import { normalizeAllowedDomains } from "../tracks/url-validator";
import type { LogLevel } from "./logger";

dotenv.config();

export interface EnvConfig {
  nodeEnv: string;
  debugMode: boolean;
  telegramLogsEnabled: boolean;
  telegramLogsChatId?: string;
  telegramLogsLevel: LogLevel;
  telegramLogsRatePerMin: number;
  telegramLogsBatchMs: number;
  port: number;
  telegramBotToken: string;
  telegramApiRoot: string;
  telegramWebhookPath: string;
  telegramWebhookUrl?: string;
  telegramSecretToken?: string;
  pollingTimeoutSec: number;
  allowedDomains: string[];
  requiredChannel?: string;
  searchEnabled: boolean;
  maxConcurrency: number;
  updateConcurrency: number;
  userCooldownSec: number;
  downloadTimeoutSec: number;
  maxFileMb: number;
  ytDlpPath: string;
  ffmpegLocation?: string;
  tempDir: string;
}

type Environment = Record<string, string | undefined>;

const TELEGRAM_UPLOAD_LIMIT_MB = 50;

function getRequiredString(source: Environment, names: string[]): string {
  for (const name of names) {
    const trimmed = source[name]?.trim();
    if (trimmed) {
      return trimmed;
    }
  }
  throw new ConfigurationError(`Missing required environment variable: ${names[0]}`);
}

function getOptionalTrimmed(source: Environment, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: Environment = process.env): EnvConfig {
  const nodeEnv = source.NODE_ENV ?? "development";
  const portRaw = source.PORT ?? "3000";
  const pollingTimeoutRaw = source.POLLING_TIMEOUT_SEC ?? "30";
  const maxConcurrencyRaw = source.MAX_CONCURRENCY ?? "2";
  const updateConcurrencyRaw = source.UPDATE_CONCURRENCY ?? "1";
  const cooldownRaw = source.USER_COOLDOWN_SEC ?? "20";
  const downloadTimeoutRaw = source.DOWNLOAD_TIMEOUT_SEC ?? "180";
  const maxFileMbRaw = source.MAX_FILE_MB ?? "45";
  const allowedDomainsRaw = source.ALLOWED_DOMAINS ?? "soundcloud.com";
  const debugModeRaw = source.DEBUG_MODE ?? "false";
  const searchEnabledRaw = source.SEARCH_ENABLED ?? "true";
  const telegramLogsEnabledRaw =
    source.TELEGRAM_LOGS_ENABLED ?? (nodeEnv === "production" ? "true" : "false");
  const telegramLogsLevelRaw = (source.TELEGRAM_LOG_LEVEL ?? "warn").trim().toLowerCase();
  const telegramLogsRatePerMinRaw = source.TELEGRAM_LOG_RATE_PER_MIN ?? "20";
  const telegramLogsBatchMsRaw = source.TELEGRAM_LOG_BATCH_MS ?? "2500";

  const port = Number(portRaw);
  const pollingTimeoutSec = Number(pollingTimeoutRaw);
  const maxConcurrency = Number(maxConcurrencyRaw);
  const updateConcurrency = Number(updateConcurrencyRaw);
  const userCooldownSec = Number(cooldownRaw);
  const downloadTimeoutSec = Number(downloadTimeoutRaw);
  const maxFileMb = Number(maxFileMbRaw);
  const telegramLogsRatePerMin = Number(telegramLogsRatePerMinRaw);
  const telegramLogsBatchMs = Number(telegramLogsBatchMsRaw);
  const allowedDomains = normalizeAllowedDomains(allowedDomainsRaw.split(","));
  const requiredChannel = getOptionalTrimmed(source, "REQUIRED_CHANNEL");

  if (!Number.isInteger(port) || port <= 0) {
    throw new ConfigurationError(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isInteger(pollingTimeoutSec) || pollingTimeoutSec < 0 || pollingTimeoutSec > 50) {
    throw new ConfigurationError(`Invalid POLLING_TIMEOUT_SEC value: ${pollingTimeoutRaw}`);
  }
  if (!Number.isInteger(maxConcurrency) || maxConcurrency <= 0) {
    throw new ConfigurationError(`Invalid MAX_CONCURRENCY value: ${maxConcurrencyRaw}`);
  }
  if (!Number.isInteger(updateConcurrency) || updateConcurrency <= 0) {
    throw new ConfigurationError(`Invalid UPDATE_CONCURRENCY value: ${updateConcurrencyRaw}`);
  }
  if (!Number.isFinite(userCooldownSec) || userCooldownSec < 0) {
    throw new ConfigurationError(`Invalid USER_COOLDOWN_SEC value: ${cooldownRaw}`);
  }
  if (!Number.isFinite(downloadTimeoutSec) || downloadTimeoutSec <= 0) {
    throw new ConfigurationError(`Invalid DOWNLOAD_TIMEOUT_SEC value: ${downloadTimeoutRaw}`);
  }
  if (!Number.isFinite(maxFileMb) || maxFileMb <= 0 || maxFileMb > TELEGRAM_UPLOAD_LIMIT_MB) {
    throw new ConfigurationError(
      `Invalid MAX_FILE_MB value: ${maxFileMbRaw}. Expected number between 0 and ${TELEGRAM_UPLOAD_LIMIT_MB}.`,
    );
  }
  if (allowedDomains.length === 0) {
    throw new ConfigurationError("ALLOWED_DOMAINS must list at least one domain");
  }
  if (requiredChannel && !isValidRequiredChannel(requiredChannel)) {
    throw new ConfigurationError(
      `Invalid REQUIRED_CHANNEL value: ${requiredChannel}. Expected '@username' or numeric '-100...'.`,
    );
  }
  if (!Number.isFinite(telegramLogsRatePerMin) || telegramLogsRatePerMin < 1) {
    throw new ConfigurationError(`Invalid TELEGRAM_LOG_RATE_PER_MIN value: ${telegramLogsRatePerMinRaw}`);
  }
  if (!Number.isFinite(telegramLogsBatchMs) || telegramLogsBatchMs < 250) {
    throw new ConfigurationError(`Invalid TELEGRAM_LOG_BATCH_MS value: ${telegramLogsBatchMsRaw}`);
  }

  return {
    nodeEnv,
    debugMode: parseBoolean(debugModeRaw),
    telegramLogsEnabled: parseBoolean(telegramLogsEnabledRaw),
    telegramLogsChatId: getOptionalTrimmed(source, "TELEGRAM_LOG_CHAT_ID"),
    telegramLogsLevel: parseLogLevel(telegramLogsLevelRaw),
    telegramLogsRatePerMin,
    telegramLogsBatchMs,
    port,
    telegramBotToken: getRequiredString(source, ["TELEGRAM_BOT_TOKEN", "BOT_TOKEN"]),
    telegramApiRoot: getOptionalTrimmed(source, "TELEGRAM_API_ROOT") ?? "https://api.telegram.org",
    telegramWebhookPath: source.TELEGRAM_WEBHOOK_PATH ?? "/telegram/webhook",
    telegramWebhookUrl: getOptionalTrimmed(source, "TELEGRAM_WEBHOOK_URL"),
    telegramSecretToken: getOptionalTrimmed(source, "TELEGRAM_SECRET_TOKEN"),
    pollingTimeoutSec,
    allowedDomains,
    requiredChannel,
    searchEnabled: parseBoolean(searchEnabledRaw),
    maxConcurrency,
    updateConcurrency,
    userCooldownSec,
    downloadTimeoutSec,
    maxFileMb,
    ytDlpPath: getOptionalTrimmed(source, "YTDLP_PATH") ?? "yt-dlp",
    ffmpegLocation: getOptionalTrimmed(source, "FFMPEG_LOCATION"),
    tempDir: getOptionalTrimmed(source, "TEMP_DIR") ?? os.tmpdir(),
  };
}

export function isValidRequiredChannel(value: string): boolean {
  return /^@[A-Za-z0-9_]{4,}$/.test(value) || /^-100\d+$/.test(value);
}

function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  throw new ConfigurationError(`Invalid boolean value: ${value}`);
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new ConfigurationError(`Invalid TELEGRAM_LOG_LEVEL value: ${value}`);
}
