import type { ClipboardHistory } from "./engine.js";
import { SlotNotFoundError } from "./errors.js";
import type { Slot } from "./history-store.js";

export type HistoryController = Pick<
  ClipboardHistory,
  "showNewlines" | "subscribe" | "select" | "clear" | "setShowNewlines"
>;

export type MenuOption = {
  slot: Slot;
  label: string;
  generation: number;
};

export type MenuCommandResult = "continue" | "quit";

const HELP = [
  "Commands:",
  "  <number>    restore that entry to the clipboard",
  "  c, clear    forget all entries",
  "  n, newlines toggle separate lines for entries captured from now on",
  "  l, list     show the history",
  "  h, help     show this help",
  "  q, quit     save history and exit",
].join("\n");

/**
 * Terminal counterpart of a tray popup menu. Options are kept newest first,
 * labelled once when the entry arrives, and the active option (last captured
 * or last restored) is marked.
 */
export class HistoryMenu {
  private options: MenuOption[] = [];
  private activeSlot: Slot | null = null;
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly history: HistoryController,
    private readonly write: (text: string) => void
  ) {}

  attach(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.history.subscribe({
      onEntryAdded: (slot, label, generation) => {
        this.options.unshift({ slot, label, generation });
        this.activeSlot = slot;
      },
      onCleared: () => {
        this.options = [];
        this.activeSlot = null;
      },
    });
  }

  detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  getOptions(): readonly MenuOption[] {
    return this.options;
  }

  getActiveSlot(): Slot | null {
    return this.activeSlot;
  }

  render(): string {
    const lines = ["Clipboard history (newest first):"];
    if (this.options.length === 0) {
      lines.push("  (empty)");
    }
    this.options.forEach((option, index) => {
      const marker = option.slot === this.activeSlot ? "*" : " ";
      lines.push(`  ${index + 1}) ${marker} ${option.label}`);
    });
    lines.push(`Separate lines: ${this.history.showNewlines ? "on" : "off"}. Type h for help.`);
    return `${lines.join("\n")}\n`;
  }

  async handle(line: string): Promise<MenuCommandResult> {
    const command = line.trim().toLowerCase();
    if (command.length === 0) return "continue";

    if (/^\d+$/.test(command)) {
      await this.restore(Number.parseInt(command, 10));
      return "continue";
    }

    switch (command) {
      case "c":
      case "clear":
        this.history.clear();
        this.write("History cleared.\n");
        return "continue";
      case "n":
      case "newlines": {
        const next = !this.history.showNewlines;
        this.history.setShowNewlines(next);
        this.write(`Separate lines ${next ? "shown" : "hidden"} for new entries.\n`);
        return "continue";
      }
      case "l":
      case "list":
        this.write(this.render());
        return "continue";
      case "h":
      case "help":
        this.write(`${HELP}\n`);
        return "continue";
      case "q":
      case "quit":
        return "quit";
      default:
        this.write(`Unknown command "${command}". Type h for help.\n`);
        return "continue";
    }
  }

  /** Reads commands until quit or end of input. */
  async run(lines: AsyncIterable<string>): Promise<"quit" | "eof"> {
    this.write(this.render());
    for await (const line of lines) {
      if ((await this.handle(line)) === "quit") return "quit";
    }
    return "eof";
  }

  private async restore(position: number): Promise<void> {
    const option = this.options[position - 1];
    if (!option) {
      this.write(`No entry ${position}.\n`);
      return;
    }

    try {
      const result = await this.history.select(option.slot, option.generation);
      if (result.written) {
        this.activeSlot = option.slot;
        this.write(`Restored ${position}) ${option.label}\n`);
      } else {
        this.write(`Could not write to the clipboard: ${result.error.message}\n`);
      }
    } catch (err) {
      if (!(err instanceof SlotNotFoundError)) throw err;
      this.options = this.options.filter((candidate) => candidate !== option);
      this.write(`Entry ${position} is no longer available.\n`);
    }
  }
}
