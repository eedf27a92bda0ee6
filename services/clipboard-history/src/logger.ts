import pino, { type DestinationStream, type LoggerOptions } from "pino";

// Copied text can hold passwords and tokens. Log slots and lengths, never
// the text itself; these paths catch it if an entry slips into a log call.
const REDACT_PATHS = [
  "text",
  "texts",
  "label",
  "entry.text",
  "entry.label",
  "entries[*].text",
] as const;

export function createLogger(level: string, destination?: DestinationStream) {
  const options: LoggerOptions = {
    level,
    base: {
      service: "clipboard-history",
    },
    redact: {
      paths: [...REDACT_PATHS],
      remove: true,
    },
  };

  return destination ? pino(options, destination) : pino(options);
}
