import clipboardy from "clipboardy";

import { ClipboardWriteError, NoTextAvailableError } from "./errors.js";

/**
 * Platform clipboard primitive. `read` rejects with `NoTextAvailableError`
 * when the clipboard is busy or holds no text; `write` rejects with
 * `ClipboardWriteError`.
 */
export interface ClipboardPort {
  read(): Promise<string>;
  write(text: string): Promise<void>;
}

/**
 * `ClipboardPort` on clipboardy.
 *
 * clipboardy returns `""` both for an empty text copy and for content that is
 * not text (an image, a file list), with no way to tell them apart. Reads of
 * `""` are therefore reported as `NoTextAvailableError`, so a genuinely empty
 * copy is never captured from the system clipboard. The store and the history
 * file still accept `""` from other ports.
 */
export class SystemClipboard implements ClipboardPort {
  async read(): Promise<string> {
    let text: string;
    try {
      text = await clipboardy.read();
    } catch (err) {
      throw new NoTextAvailableError("Clipboard could not be read", err);
    }
    if (text.length === 0) throw new NoTextAvailableError();
    return text;
  }

  async write(text: string): Promise<void> {
    try {
      await clipboardy.write(text);
    } catch (err) {
      throw new ClipboardWriteError(undefined, err);
    }
  }
}

export type ClipboardAccessOptions = {
  /** Per-operation deadline. `0` waits indefinitely. */
  timeoutMs?: number;
};

const noop = () => undefined;

/**
 * Exclusive, scoped use of a clipboard: each `read`/`write` holds the
 * clipboard for exactly one operation and releases it whether or not the
 * operation succeeds. Callers queue behind each other.
 *
 * A caller whose operation misses the deadline gets a rejection right away,
 * but the clipboard stays held until the port call itself settles. Until
 * then every new operation is rejected without touching the port.
 */
export class ClipboardAccess {
  private queue: Promise<void> = Promise.resolve();
  private stalled = false;
  private readonly timeoutMs: number;

  constructor(
    private readonly port: ClipboardPort,
    options: ClipboardAccessOptions = {}
  ) {
    this.timeoutMs = Math.max(0, options.timeoutMs ?? 0);
  }

  read(): Promise<string> {
    return this.acquire("read", () => this.port.read(), (message) => new NoTextAvailableError(message));
  }

  write(text: string): Promise<void> {
    return this.acquire("write", () => this.port.write(text), (message) => new ClipboardWriteError(message));
  }

  private acquire<T>(
    kind: "read" | "write",
    operation: () => Promise<T>,
    fail: (message: string) => Error
  ): Promise<T> {
    if (this.stalled) {
      return Promise.reject(
        fail(`Clipboard ${kind} skipped: an earlier operation timed out and still holds the clipboard`)
      );
    }

    let expired = false;
    const run = this.queue.then(() => {
      if (expired) throw fail(`Clipboard ${kind} timed out after ${this.timeoutMs}ms waiting for the clipboard`);
      return operation();
    });
    this.queue = run.then(noop, noop);

    if (this.timeoutMs <= 0) return run;

    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        expired = true;
        this.markStalled();
        reject(fail(`Clipboard ${kind} timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);
      run.then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (err: unknown) => {
          clearTimeout(timer);
          reject(err);
        }
      );
    });
  }

  private markStalled(): void {
    if (this.stalled) return;
    this.stalled = true;
    // No operation joins the queue while stalled, so its current tail is the
    // last one that can still be holding the clipboard.
    const tail = this.queue;
    void tail.then(() => {
      if (this.queue === tail) this.stalled = false;
    });
  }
}
