import type { Logger } from "pino";

import type { ClipboardAccess } from "./clipboard.js";
import { ClipboardHistoryError } from "./errors.js";
import type { Entry, HistoryStore, Slot } from "./history-store.js";

export const DEFAULT_POLL_INTERVAL_MS = 1000;

export type PollTickResult =
  | { status: "captured"; slot: Slot; entry: Entry }
  | { status: "duplicate" }
  | { status: "unavailable" }
  | { status: "busy" };

export type PollLoopOptions = {
  intervalMs?: number;
  /** Invoked for every newly captured entry. Errors are logged, not rethrown. */
  onCaptured?: (slot: Slot, entry: Entry) => void;
};

/**
 * Reads the clipboard on a fixed interval and offers whatever text it finds
 * to the store. A tick that overlaps the previous one is skipped.
 */
export class PollLoop {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<PollTickResult> | null = null;
  private readonly intervalMs: number;
  private readonly onCaptured?: PollLoopOptions["onCaptured"];

  constructor(
    private readonly clipboard: ClipboardAccess,
    private readonly store: HistoryStore,
    private readonly logger: Logger,
    options: PollLoopOptions = {}
  ) {
    const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new Error(`Poll interval must be a positive number of milliseconds (got ${intervalMs}).`);
    }
    this.intervalMs = intervalMs;
    this.onCaptured = options.onCaptured;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) await this.inFlight;
  }

  tick(): Promise<PollTickResult> {
    if (this.inFlight) return Promise.resolve({ status: "busy" });

    const run = this.runTick().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  private async runTick(): Promise<PollTickResult> {
    let text: string;
    try {
      text = await this.clipboard.read();
    } catch (err) {
      if (err instanceof ClipboardHistoryError) {
        this.logger.debug({ code: err.code }, "clipboard_read_skipped");
      } else {
        this.logger.warn({ err }, "clipboard_read_failed");
      }
      return { status: "unavailable" };
    }

    const slot = this.store.offer(text);
    if (slot === null) return { status: "duplicate" };

    const entry = this.store.get(slot);
    this.logger.debug({ slot, length: text.length }, "clipboard_entry_captured");
    if (this.onCaptured) {
      try {
        this.onCaptured(slot, entry);
      } catch (err) {
        this.logger.error({ err, slot }, "capture_listener_failed");
      }
    }
    return { status: "captured", slot, entry };
  }
}
