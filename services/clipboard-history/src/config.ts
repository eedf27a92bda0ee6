import path from "node:path";

export const DEFAULT_HISTORY_FILE_NAME = "clipboard-history.bin";

export type ClipboardHistoryConfig = {
  /** Where history is saved on quit and restored on start. */
  historyFile: string;
  pollIntervalMs: number;
  /** Deadline for a single clipboard read or write. */
  clipboardTimeoutMs: number;
  /**
   * Interval between background saves. `0` disables autosave; history is
   * then written only on shutdown.
   */
  autosaveIntervalMs: number;
  /** Extra attempts for the final save after the first one fails. */
  saveRetries: number;
  showNewlines: boolean;
  disableLock: boolean;
  /** Run without the terminal menu. */
  headless: boolean;
  logLevel: string;
};

function envBool(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === "") return defaultValue;
  return value === "1" || value.toLowerCase() === "true";
}

function envInt(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === "") return defaultValue;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

function defaultHistoryDir(): string {
  const entry = process.argv[1];
  return entry ? path.dirname(path.resolve(entry)) : process.cwd();
}

export function loadConfigFromEnv(): ClipboardHistoryConfig {
  const historyFileEnv = process.env.CLIPBOARD_HISTORY_FILE?.trim() ?? "";
  const historyFile =
    historyFileEnv.length > 0
      ? path.resolve(historyFileEnv)
      : path.join(defaultHistoryDir(), DEFAULT_HISTORY_FILE_NAME);

  const pollIntervalMs = envInt(process.env.CLIPBOARD_HISTORY_POLL_INTERVAL_MS, 1000);
  if (pollIntervalMs <= 0) {
    throw new Error(
      `CLIPBOARD_HISTORY_POLL_INTERVAL_MS must be a positive integer (got ${pollIntervalMs}).`
    );
  }

  const clipboardTimeoutMs = envInt(process.env.CLIPBOARD_HISTORY_CLIPBOARD_TIMEOUT_MS, 2000);
  if (clipboardTimeoutMs <= 0) {
    throw new Error(
      `CLIPBOARD_HISTORY_CLIPBOARD_TIMEOUT_MS must be a positive integer (got ${clipboardTimeoutMs}).`
    );
  }

  return {
    historyFile,
    pollIntervalMs,
    clipboardTimeoutMs,
    autosaveIntervalMs: Math.max(0, envInt(process.env.CLIPBOARD_HISTORY_AUTOSAVE_INTERVAL_MS, 0)),
    saveRetries: Math.max(0, envInt(process.env.CLIPBOARD_HISTORY_SAVE_RETRIES, 2)),
    showNewlines: envBool(process.env.CLIPBOARD_HISTORY_SHOW_NEWLINES, false),
    disableLock: envBool(process.env.CLIPBOARD_HISTORY_DISABLE_LOCK, false),
    headless: envBool(process.env.CLIPBOARD_HISTORY_HEADLESS, false),
    logLevel: process.env.LOG_LEVEL ?? "info",
  };
}
