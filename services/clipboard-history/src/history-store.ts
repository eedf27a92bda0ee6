import { SlotNotFoundError } from "./errors.js";

export type Slot = number;

export type Entry = Readonly<{
  text: string;
}>;

export type SlotEntry = readonly [slot: Slot, entry: Entry];

export type HistoryStoreOptions = {
  showNewlines?: boolean;
};

/**
 * Ordered, deduplicated record of copied text.
 *
 * An entry's slot is its position at the time it was appended. Entries are
 * only ever removed all at once by `clear()`, which restarts slots at 0 and
 * bumps `generation` so callers holding an old slot can tell it is stale.
 */
export class HistoryStore {
  private entries: Entry[] = [];
  private readonly known = new Set<string>();
  private currentGeneration = 0;
  private newlinesVisible: boolean;

  constructor(options: HistoryStoreOptions = {}) {
    this.newlinesVisible = options.showNewlines ?? false;
  }

  get size(): number {
    return this.entries.length;
  }

  /** Slot the next accepted offer will receive. */
  get nextSlot(): Slot {
    return this.entries.length;
  }

  get generation(): number {
    return this.currentGeneration;
  }

  get showNewlines(): boolean {
    return this.newlinesVisible;
  }

  has(text: string): boolean {
    return this.known.has(text);
  }

  offer(text: string): Slot | null {
    if (this.known.has(text)) return null;

    const slot = this.entries.length;
    this.entries.push(Object.freeze({ text }));
    this.known.add(text);
    return slot;
  }

  clear(): void {
    // Replace rather than truncate so iterators started before the clear
    // keep walking the old entries.
    this.entries = [];
    this.known.clear();
    this.currentGeneration += 1;
  }

  get(slot: Slot, generation?: number): Entry {
    if (generation !== undefined && generation !== this.currentGeneration) {
      throw new SlotNotFoundError(slot);
    }
    const entry = Number.isInteger(slot) && slot >= 0 ? this.entries[slot] : undefined;
    if (!entry) throw new SlotNotFoundError(slot);
    return entry;
  }

  setShowNewlines(value: boolean): void {
    this.newlinesVisible = value;
  }

  all(): Iterable<SlotEntry> {
    const store = this;
    return {
      *[Symbol.iterator]() {
        const entries = store.entries;
        const end = entries.length;
        for (let slot = 0; slot < end; slot += 1) {
          const entry = entries[slot];
          if (entry) yield [slot, entry] as const;
        }
      },
    };
  }

  texts(): string[] {
    return this.entries.map((entry) => entry.text);
  }
}
