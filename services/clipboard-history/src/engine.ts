import type { Logger } from "pino";

import { ClipboardAccess, type ClipboardPort } from "./clipboard.js";
import type { ClipboardHistoryConfig } from "./config.js";
import { CorruptStoreError, toErrorMessage } from "./errors.js";
import { loadHistory, quarantineHistoryFile, saveHistory } from "./history-file.js";
import { acquireHistoryLock, type HistoryLockHandle } from "./history-lock.js";
import { HistoryStore, type Entry, type Slot } from "./history-store.js";
import { renderLabel } from "./label.js";
import { PollLoop, type PollTickResult } from "./poll-loop.js";
import { SelectionResolver, type SelectResult } from "./selection.js";

export type { ClipboardPort } from "./clipboard.js";
export { SystemClipboard } from "./clipboard.js";
export type { Entry, Slot } from "./history-store.js";
export type { SelectResult } from "./selection.js";
export { renderLabel } from "./label.js";
export * from "./errors.js";

export type ClipboardHistoryEngineConfig = Omit<ClipboardHistoryConfig, "headless" | "logLevel">;

/**
 * Presentation callbacks. Both are invoked synchronously: `onEntryAdded`
 * from replay and polling, `onCleared` from inside `clear()`, so a listener
 * has dropped its old slots before the next slot is handed out.
 */
export type HistoryListener = {
  onEntryAdded?: (slot: Slot, label: string, generation: number) => void;
  onCleared?: (generation: number) => void;
};

export type HistoryListItem = {
  slot: Slot;
  label: string;
  entry: Entry;
};

export type StartResult = {
  restored: number;
  /** Why saved history was not restored, if it existed but could not be read. */
  loadError: Error | null;
  /**
   * False when the history file could not be read and is still in place.
   * Saving would replace history that was never loaded, so neither autosave
   * nor the save on stop will write it.
   */
  savesEnabled: boolean;
};

export interface ClipboardHistory {
  readonly showNewlines: boolean;
  readonly generation: number;
  start(): Promise<StartResult>;
  stop(): Promise<void>;
  subscribe(listener: HistoryListener): () => void;
  clear(): void;
  select(slot: Slot, generation?: number): Promise<SelectResult>;
  resolve(slot: Slot, generation?: number): Entry;
  setShowNewlines(value: boolean): void;
  list(): HistoryListItem[];
  save(): Promise<void>;
  pollOnce(): Promise<PollTickResult>;
}

export function createClipboardHistory(opts: {
  config: ClipboardHistoryEngineConfig;
  logger: Logger;
  clipboard: ClipboardPort;
}): ClipboardHistory {
  const { config, logger } = opts;

  const store = new HistoryStore({ showNewlines: config.showNewlines });
  const access = new ClipboardAccess(opts.clipboard, { timeoutMs: config.clipboardTimeoutMs });
  const listeners = new Set<HistoryListener>();

  const notify = (event: string, slot: Slot | null, fn: (listener: HistoryListener) => void) => {
    for (const listener of [...listeners]) {
      try {
        fn(listener);
      } catch (err) {
        logger.error({ err, slot, event }, "history_listener_failed");
      }
    }
  };

  const announce = (slot: Slot, entry: Entry) => {
    const label = renderLabel(entry, store.showNewlines);
    const generation = store.generation;
    notify("entry_added", slot, (listener) => listener.onEntryAdded?.(slot, label, generation));
  };

  const poll = new PollLoop(access, store, logger, {
    intervalMs: config.pollIntervalMs,
    onCaptured: announce,
  });
  const selection = new SelectionResolver(store, access, logger);

  let state: "idle" | "starting" | "running" | "stopped" = "idle";
  let lock: HistoryLockHandle | null = null;
  let autosaveTimer: NodeJS.Timeout | null = null;
  let saveQueue: Promise<void> = Promise.resolve();
  let unreadHistory: Error | null = null;

  const save = (): Promise<void> => {
    if (unreadHistory) {
      return Promise.reject(
        new Error(`Not saving over ${config.historyFile}: it could not be read at startup.`, {
          cause: unreadHistory,
        })
      );
    }
    const run = saveQueue.then(async () => {
      const texts = store.texts();
      await saveHistory(texts, config.historyFile);
      logger.debug({ entries: texts.length }, "history_saved");
    });
    saveQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  };

  const saveWithRetries = async (): Promise<void> => {
    const attempts = config.saveRetries + 1;
    let lastError: unknown = null;
    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      try {
        await save();
        logger.info({ entries: store.size, attempt }, "history_saved_on_shutdown");
        return;
      } catch (err) {
        lastError = err;
        logger.error({ err, attempt, attempts }, "history_save_failed");
      }
    }
    throw lastError;
  };

  const restore = async (): Promise<StartResult> => {
    let texts: string[];
    try {
      texts = await loadHistory(config.historyFile);
    } catch (err) {
      const loadError = err instanceof Error ? err : new Error(toErrorMessage(err));
      logger.error({ err, historyFile: config.historyFile }, "history_load_failed");
      if (err instanceof CorruptStoreError) {
        try {
          const movedTo = await quarantineHistoryFile(config.historyFile);
          logger.warn({ movedTo }, "history_file_quarantined");
          return { restored: 0, loadError, savesEnabled: true };
        } catch (renameErr) {
          logger.error({ err: renameErr }, "history_file_quarantine_failed");
        }
      }
      unreadHistory = loadError;
      logger.warn({ historyFile: config.historyFile }, "history_saves_disabled");
      return { restored: 0, loadError, savesEnabled: false };
    }

    for (const text of texts) {
      const slot = store.offer(text);
      if (slot !== null) announce(slot, store.get(slot));
    }
    logger.info({ restored: store.size, saved: texts.length }, "history_restored");
    return { restored: store.size, loadError: null, savesEnabled: true };
  };

  const releaseLock = async () => {
    if (!lock) return;
    const held = lock;
    lock = null;
    try {
      await held.release();
    } catch (err) {
      logger.warn({ err, lockPath: held.lockPath }, "history_lock_release_failed");
    }
  };

  return {
    get showNewlines() {
      return store.showNewlines;
    },

    get generation() {
      return store.generation;
    },

    async start() {
      if (state !== "idle") {
        throw new Error(`Clipboard history cannot start from state "${state}".`);
      }
      state = "starting";

      try {
        if (!config.disableLock) {
          lock = await acquireHistoryLock(config.historyFile);
        }
        const result = await restore();

        poll.start();
        if (config.autosaveIntervalMs > 0 && result.savesEnabled) {
          autosaveTimer = setInterval(() => {
            save().catch((err: unknown) => logger.error({ err }, "history_autosave_failed"));
          }, config.autosaveIntervalMs);
          autosaveTimer.unref();
        }

        state = "running";
        logger.info(
          {
            historyFile: config.historyFile,
            pollIntervalMs: config.pollIntervalMs,
            restored: result.restored,
          },
          "clipboard_history_started"
        );
        return result;
      } catch (err) {
        await releaseLock();
        state = "idle";
        throw err;
      }
    },

    async stop() {
      if (state !== "running") return;
      state = "stopped";

      if (autosaveTimer) {
        clearInterval(autosaveTimer);
        autosaveTimer = null;
      }
      await poll.stop();

      try {
        if (unreadHistory) {
          logger.warn({ historyFile: config.historyFile, entries: store.size }, "history_save_skipped");
        } else {
          await saveWithRetries();
        }
      } finally {
        await releaseLock();
      }
    },

    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    clear() {
      store.clear();
      const generation = store.generation;
      logger.info({ generation }, "history_cleared");
      notify("cleared", null, (listener) => listener.onCleared?.(generation));
    },

    select(slot, generation) {
      return selection.select(slot, generation);
    },

    resolve(slot, generation) {
      return selection.resolve(slot, generation);
    },

    setShowNewlines(value) {
      store.setShowNewlines(value);
      logger.info({ showNewlines: value }, "show_newlines_changed");
    },

    list() {
      return Array.from(store.all(), ([slot, entry]) => ({
        slot,
        entry,
        label: renderLabel(entry, store.showNewlines),
      }));
    },

    save,

    pollOnce() {
      return poll.tick();
    },
  };
}
