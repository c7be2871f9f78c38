import { setTimeout as delay } from "node:timers/promises";
import { FetchError } from "node-fetch";
import type { Logger } from "../config/logger";
import { errorMessage, TelegramApiError } from "../shared/errors";

export interface SendRetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  label?: string;
}

const DEFAULT_MAX_ATTEMPTS = 4;
const DEFAULT_INITIAL_DELAY_MS = 1_000;
const DEFAULT_MAX_DELAY_MS = 8_000;
const RETRY_AFTER_PADDING_MS = 500;

type RetryDecision = { retry: false } | { retry: true; waitMs: number; reason: string };

export async function withSendRetries<T>(
  operation: () => Promise<T>,
  options: SendRetryOptions = {},
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  const sleep = options.sleep ?? defaultSleep;
  let backoffMs = options.initialDelayMs ?? DEFAULT_INITIAL_DELAY_MS;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      const decision = classifyFailure(error, backoffMs);
      if (!decision.retry || attempt >= maxAttempts) {
        throw error;
      }
      options.logger?.warn("telegram.send.retry", {
        label: options.label,
        attempt,
        reason: decision.reason,
        waitMs: decision.waitMs,
        error: errorMessage(error),
      });
      await sleep(decision.waitMs);
      if (decision.reason !== "rate_limited") {
        backoffMs = Math.min(backoffMs * 2, maxDelayMs);
      }
    }
  }
}

export function classifyFailure(error: unknown, backoffMs: number): RetryDecision {
  if (error instanceof TelegramApiError) {
    if (error.errorCode === 429) {
      const retryAfterSec = error.retryAfterSec ?? 1;
      return {
        retry: true,
        waitMs: retryAfterSec * 1_000 + RETRY_AFTER_PADDING_MS,
        reason: "rate_limited",
      };
    }
    if (error.errorCode >= 500) {
      return { retry: true, waitMs: backoffMs, reason: "server_error" };
    }
    return { retry: false };
  }
  if (isTransientNetworkError(error)) {
    return { retry: true, waitMs: backoffMs, reason: "network" };
  }
  return { retry: false };
}

export function isTransientNetworkError(error: unknown): boolean {
  if (error instanceof FetchError) {
    return true;
  }
  if (!(error instanceof Error)) {
    return false;
  }
  if (error.name === "AbortError") {
    return true;
  }
  const code = "code" in error ? error.code : undefined;
  return (
    code === "ETIMEDOUT" ||
    code === "ECONNRESET" ||
    code === "ECONNREFUSED" ||
    code === "EAI_AGAIN" ||
    code === "EPIPE"
  );
}

async function defaultSleep(ms: number): Promise<void> {
  await delay(ms);
}
