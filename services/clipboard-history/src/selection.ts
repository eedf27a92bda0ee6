import type { Logger } from "pino";

import type { ClipboardAccess } from "./clipboard.js";
import { ClipboardHistoryError, ClipboardWriteError, toErrorMessage } from "./errors.js";
import type { Entry, HistoryStore, Slot } from "./history-store.js";

export type SelectResult =
  | { slot: Slot; entry: Entry; written: true }
  | { slot: Slot; entry: Entry; written: false; error: ClipboardHistoryError };

/**
 * Turns a slot the user picked back into its entry and restores it to the
 * clipboard.
 */
export class SelectionResolver {
  constructor(
    private readonly store: HistoryStore,
    private readonly clipboard: ClipboardAccess,
    private readonly logger: Logger
  ) {}

  /** Throws `SlotNotFoundError` for slots invalidated by a clear. */
  resolve(slot: Slot, generation?: number): Entry {
    return this.store.get(slot, generation);
  }

  async select(slot: Slot, generation?: number): Promise<SelectResult> {
    const entry = this.resolve(slot, generation);

    try {
      await this.clipboard.write(entry.text);
    } catch (err) {
      const error =
        err instanceof ClipboardHistoryError ? err : new ClipboardWriteError(toErrorMessage(err), err);
      this.logger.warn({ slot, code: error.code, reason: error.message }, "clipboard_restore_failed");
      return { slot, entry, written: false, error };
    }

    this.logger.debug({ slot }, "clipboard_restored");
    return { slot, entry, written: true };
  }
}
