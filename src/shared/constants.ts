export const COMMAND_START = "start";
export const COMMAND_HELP = "help";
export const COMMAND_CHECK = "check";

export const SOURCE_LABEL = "SoundCloud";

export const BYTES_PER_MB = 1024 * 1024;

export const STALE_WORKSPACE_MAX_AGE_MS = 60 * 60 * 1000;

export const POLLING_ERROR_BACKOFF_MS = 5_000;

export const TELEGRAM_REQUEST_TIMEOUT_MS = 120_000;
