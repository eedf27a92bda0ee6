import { promises as fs } from "node:fs";
import path from "node:path";

import { CorruptStoreError } from "./errors.js";

/**
 * History file layout:
 *
 *   header  "CLPH" | version (u8) | 3 reserved zero bytes
 *   record  byte length (u32 BE) | UTF-8 text
 *
 * Records follow the header back to back, oldest entry first, until EOF.
 * A lone UTF-16 surrogate has no UTF-8 form and is stored as U+FFFD, so two
 * texts differing only there load back as one entry.
 */
export const HISTORY_FILE_MAGIC = Buffer.from("CLPH", "ascii");
export const HISTORY_FILE_VERSION = 1;
export const HISTORY_FILE_HEADER_BYTES = 8;
const RECORD_LENGTH_BYTES = 4;

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

export function encodeHistoryFileHeader(version: number = HISTORY_FILE_VERSION): Buffer {
  const header = Buffer.alloc(HISTORY_FILE_HEADER_BYTES);
  HISTORY_FILE_MAGIC.copy(header, 0);
  header.writeUInt8(version, HISTORY_FILE_MAGIC.length);
  return header;
}

export function encodeHistoryRecord(text: string): Buffer {
  const body = Buffer.from(text, "utf8");
  const prefix = Buffer.alloc(RECORD_LENGTH_BYTES);
  prefix.writeUInt32BE(body.byteLength, 0);
  return Buffer.concat([prefix, body]);
}

export function encodeHistoryFile(texts: Iterable<string>): Buffer {
  const parts = [encodeHistoryFileHeader()];
  for (const text of texts) {
    parts.push(encodeHistoryRecord(text));
  }
  return Buffer.concat(parts);
}

export function decodeHistoryFile(data: Buffer, source = "<buffer>"): string[] {
  if (data.byteLength < HISTORY_FILE_HEADER_BYTES) {
    throw new CorruptStoreError(source, `file is ${data.byteLength} bytes, shorter than its header`);
  }
  if (!data.subarray(0, HISTORY_FILE_MAGIC.length).equals(HISTORY_FILE_MAGIC)) {
    throw new CorruptStoreError(source, "missing history file magic");
  }
  const version = data.readUInt8(HISTORY_FILE_MAGIC.length);
  if (version !== HISTORY_FILE_VERSION) {
    throw new CorruptStoreError(source, `unsupported format version ${version}`);
  }

  const texts: string[] = [];
  let offset = HISTORY_FILE_HEADER_BYTES;
  while (offset < data.byteLength) {
    if (offset + RECORD_LENGTH_BYTES > data.byteLength) {
      throw new CorruptStoreError(source, `truncated record length at byte ${offset}`);
    }
    const length = data.readUInt32BE(offset);
    const start = offset + RECORD_LENGTH_BYTES;
    const end = start + length;
    if (end > data.byteLength) {
      throw new CorruptStoreError(source, `record at byte ${offset} runs past end of file`);
    }
    try {
      texts.push(utf8.decode(data.subarray(start, end)));
    } catch (err) {
      throw new CorruptStoreError(source, `record at byte ${offset} is not valid UTF-8`, err);
    }
    offset = end;
  }
  return texts;
}

export async function atomicWriteFile(filePath: string, contents: Buffer): Promise<void> {
  const dir = path.dirname(filePath);
  const base = path.basename(filePath);
  const tmpPath = path.join(dir, `.${base}.${process.pid}.${Date.now()}.tmp`);

  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(tmpPath, contents, { mode: 0o600 });
  try {
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;
    if (code === "EEXIST" || code === "EPERM") {
      await fs.rm(filePath, { force: true });
      await fs.rename(tmpPath, filePath);
      return;
    }
    await fs.rm(tmpPath, { force: true });
    throw err;
  }
}

export async function saveHistory(texts: Iterable<string>, filePath: string): Promise<void> {
  await atomicWriteFile(filePath, encodeHistoryFile(texts));
}

/**
 * Reads the saved history. A missing file is a first run and yields `[]`.
 */
export async function loadHistory(filePath: string): Promise<string[]> {
  let data: Buffer;
  try {
    data = await fs.readFile(filePath);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return [];
    throw err;
  }
  return decodeHistoryFile(data, filePath);
}

/**
 * Moves an unreadable history file out of the way so the next save cannot
 * overwrite it. Returns the new path.
 */
export async function quarantineHistoryFile(filePath: string, nowMs: number = Date.now()): Promise<string> {
  const target = `${filePath}.corrupt-${nowMs}`;
  await fs.rename(filePath, target);
  return target;
}
