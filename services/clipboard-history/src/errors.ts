export type ClipboardHistoryErrorCode =
  | "not_found"
  | "no_text_available"
  | "write_failed"
  | "corrupt_store"
  | "locked";

export interface ClipboardHistoryErrorOptions {
  code: ClipboardHistoryErrorCode;
  message: string;
  cause?: unknown;
}

export class ClipboardHistoryError extends Error {
  readonly code: ClipboardHistoryErrorCode;

  constructor(options: ClipboardHistoryErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ClipboardHistoryError";
    this.code = options.code;
  }
}

/**
 * The slot was never assigned, or history was cleared after it was handed out.
 */
export class SlotNotFoundError extends ClipboardHistoryError {
  readonly slot: number;

  constructor(slot: number) {
    super({ code: "not_found", message: `No history entry for slot ${slot}` });
    this.name = "SlotNotFoundError";
    this.slot = slot;
  }
}

export class NoTextAvailableError extends ClipboardHistoryError {
  constructor(message = "Clipboard holds no text", cause?: unknown) {
    super({ code: "no_text_available", message, cause });
    this.name = "NoTextAvailableError";
  }
}

export class ClipboardWriteError extends ClipboardHistoryError {
  constructor(message = "Failed to write to the clipboard", cause?: unknown) {
    super({ code: "write_failed", message, cause });
    this.name = "ClipboardWriteError";
  }
}

export class CorruptStoreError extends ClipboardHistoryError {
  readonly filePath: string;

  constructor(filePath: string, detail: string, cause?: unknown) {
    super({ code: "corrupt_store", message: `Unreadable history file ${filePath}: ${detail}`, cause });
    this.name = "CorruptStoreError";
    this.filePath = filePath;
  }
}

export class HistoryLockError extends ClipboardHistoryError {
  readonly lockPath: string;
  readonly existingLock?: unknown;

  constructor(message: string, opts: { lockPath: string; existingLock?: unknown }) {
    super({ code: "locked", message });
    this.name = "HistoryLockError";
    this.lockPath = opts.lockPath;
    this.existingLock = opts.existingLock;
  }
}

export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}
