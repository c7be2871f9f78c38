import fetch from "node-fetch";

export type LogLevel = "debug" | "info" | "warn" | "error";

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export interface LogRecord {
  timestamp: string;
  level: LogLevel;
  message: string;
  meta?: Record<string, unknown>;
}

/** Receives every record that passed the logger's level gate. */
export interface LogSink {
  enqueue(record: LogRecord): void;
}

export interface TelegramLogSinkOptions {
  token: string;
  chatId: string;
  minLevel: LogLevel;
  ratePerMinute: number;
  batchMs: number;
  apiRoot?: string;
  now?: () => number;
}

export interface CreateLoggerOptions {
  minLevel?: LogLevel;
  write?: (line: string) => void;
  now?: () => number;
  sink?: LogSink;
  telegram?: Omit<TelegramLogSinkOptions, "chatId" | "now"> & { enabled: boolean; chatId?: string };
}

export interface LoggerContext {
  update_id?: number;
  telegram_user_id?: number;
  chat_id?: number;
  source_host?: string;
  latency_ms?: number;
  ok?: boolean;
  error_code?: string;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const minLevel = options.minLevel ?? "info";
  const now = options.now ?? Date.now;
  const write = options.write ?? ((line: string) => process.stdout.write(line));
  const sink = options.sink ?? buildTelegramLogSink(options.telegram, now);

  const emitter = (level: LogLevel) => (message: string, meta?: Record<string, unknown>) => {
    if (!isAtLeast(level, minLevel)) {
      return;
    }
    const record: LogRecord = { timestamp: new Date(now()).toISOString(), level, message };
    if (meta) {
      record.meta = meta;
    }
    write(`${JSON.stringify(record)}\n`);
    sink?.enqueue(record);
  };

  return {
    debug: emitter("debug"),
    info: emitter("info"),
    warn: emitter("warn"),
    error: emitter("error"),
  };
}

export function logContext(
  logger: Logger,
  level: LogLevel,
  message: string,
  context: LoggerContext,
  fields?: Record<string, unknown>,
): void {
  logger[level](message, { ...context, ...(fields ?? {}) });
}

const DEFAULT_API_ROOT = "https://api.telegram.org";
const MAX_BATCH_ENTRIES = 5;
const MAX_MESSAGE_CHARS = 3_800;
const MAX_META_STRING = 500;
const RATE_WINDOW_MS = 60_000;
const SECRET_KEY = /token|secret|api_?key|authorization|password/i;

/**
 * Forwards warn-and-above records to a Telegram chat in batches of at most
 * five, sending no more than `ratePerMinute` batches per minute.
 */
export class TelegramLogSink implements LogSink {
  private readonly pending: LogRecord[] = [];
  private readonly endpoint: string;
  private readonly now: () => number;
  private timer: NodeJS.Timeout | null = null;
  private windowStartedAt: number;
  private batchesInWindow = 0;

  constructor(private readonly options: TelegramLogSinkOptions) {
    const apiRoot = (options.apiRoot ?? DEFAULT_API_ROOT).replace(/\/+$/, "");
    this.endpoint = `${apiRoot}/bot${options.token}/sendMessage`;
    this.now = options.now ?? Date.now;
    this.windowStartedAt = this.now();
  }

  get queued(): number {
    return this.pending.length;
  }

  enqueue(record: LogRecord): void {
    if (!isAtLeast(record.level, this.options.minLevel)) {
      return;
    }
    this.pending.push(record);
    this.schedule();
  }

  /** Sends one batch. Resolves false when nothing was sent. */
  async flush(): Promise<boolean> {
    if (this.pending.length === 0) {
      return false;
    }
    if (!this.takeRateSlot()) {
      this.schedule();
      return false;
    }

    const batch = this.pending.splice(0, MAX_BATCH_ENTRIES);
    try {
      await this.deliver(formatLogBatch(batch));
    } catch (error) {
      process.stderr.write(
        `telegram log sink delivery failed: ${error instanceof Error ? error.message : "Unknown error"}\n`,
      );
    }
    if (this.pending.length > 0) {
      this.schedule();
    }
    return true;
  }

  private schedule(): void {
    if (this.timer) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.flush();
    }, this.options.batchMs);
    this.timer.unref();
  }

  private takeRateSlot(): boolean {
    const current = this.now();
    if (current - this.windowStartedAt >= RATE_WINDOW_MS) {
      this.windowStartedAt = current;
      this.batchesInWindow = 0;
    }
    if (this.batchesInWindow >= this.options.ratePerMinute) {
      return false;
    }
    this.batchesInWindow += 1;
    return true;
  }

  private async deliver(text: string): Promise<void> {
    const response = await fetch(this.endpoint, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ chat_id: this.options.chatId, text, disable_web_page_preview: true }),
      timeout: 10_000,
    });
    if (!response.ok) {
      throw new Error(`telegram_log_send_failed_http_${response.status}`);
    }
  }
}

function buildTelegramLogSink(
  config: CreateLoggerOptions["telegram"],
  now: () => number,
): TelegramLogSink | undefined {
  const token = config?.token.trim();
  const chatId = config?.chatId?.trim();
  if (!config?.enabled || !token || !chatId) {
    return undefined;
  }
  return new TelegramLogSink({
    token,
    chatId,
    minLevel: config.minLevel,
    ratePerMinute: Math.max(1, Math.floor(config.ratePerMinute)),
    batchMs: Math.max(250, Math.floor(config.batchMs)),
    apiRoot: config.apiRoot,
    now,
  });
}

function isAtLeast(level: LogLevel, minLevel: LogLevel): boolean {
  return SEVERITY[level] >= SEVERITY[minLevel];
}

export function formatLogBatch(records: LogRecord[]): string {
  const text = records
    .map((record) => {
      const head = `[${record.level.toUpperCase()}] ${record.timestamp} ${record.message}`;
      return record.meta ? `${head}\n${safeJson(redactSecrets(record.meta))}` : head;
    })
    .join("\n\n");
  return text.length <= MAX_MESSAGE_CHARS ? text : `${text.slice(0, MAX_MESSAGE_CHARS - 3)}...`;
}

export function redactSecrets(value: unknown, depth = 0): unknown {
  if (typeof value === "string") {
    return value.length > MAX_META_STRING ? `${value.slice(0, MAX_META_STRING)}...` : value;
  }
  if (Array.isArray(value)) {
    return depth >= 4 ? "[nested]" : value.map((item) => redactSecrets(item, depth + 1));
  }
  if (typeof value === "object" && value !== null) {
    if (depth >= 4) {
      return "[nested]";
    }
    const output: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      output[key] = SECRET_KEY.test(key) ? "[REDACTED]" : redactSecrets(item, depth + 1);
    }
    return output;
  }
  return value;
}

function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return "\"[unserializable]\"";
  }
}
