import type { Entry } from "./history-store.js";

export const LABEL_MAX_CHARS = 20;
export const LABEL_TRUNCATED_CHARS = 17;
export const LABEL_ELLIPSIS = "...";

/**
 * Short display string for a history entry.
 *
 * With newlines hidden every `\n` becomes a single space. Labels longer than
 * `LABEL_MAX_CHARS` code points keep their first `LABEL_TRUNCATED_CHARS`
 * code points followed by `LABEL_ELLIPSIS`.
 */
export function renderLabel(entry: Entry, showNewlines: boolean): string {
  const label = showNewlines ? entry.text : entry.text.replaceAll("\n", " ");
  const chars = Array.from(label);
  if (chars.length <= LABEL_MAX_CHARS) return label;
  return `${chars.slice(0, LABEL_TRUNCATED_CHARS).join("")}${LABEL_ELLIPSIS}`;
}
