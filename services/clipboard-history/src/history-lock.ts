import { promises as fs } from "node:fs";
import type { FileHandle } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { HistoryLockError } from "./errors.js";

export type HistoryLockMetadata = {
  pid: number;
  startedAtMs: number;
  host?: string;
};

export type HistoryLockHandle = {
  lockPath: string;
  release: () => Promise<void>;
};

export function lockPathForHistoryFile(historyFile: string): string {
  return `${historyFile}.lock`;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isPidRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM means the process exists but belongs to someone else.
    return (err as NodeJS.ErrnoException).code !== "ESRCH";
  }
}

function readField(lock: unknown, field: keyof HistoryLockMetadata): unknown {
  if (!lock || typeof lock !== "object") return undefined;
  return Object.getOwnPropertyDescriptor(lock, field)?.value;
}

async function readExistingLock(lockPath: string): Promise<unknown> {
  try {
    return JSON.parse(await fs.readFile(lockPath, "utf8"));
  } catch {
    return null;
  }
}

async function unlinkIfPresent(lockPath: string): Promise<void> {
  await fs.unlink(lockPath).catch((err: unknown) => {
    if ((err as NodeJS.ErrnoException).code !== "ENOENT") throw err;
  });
}

async function createLockFile(lockPath: string, metadata: HistoryLockMetadata): Promise<HistoryLockHandle> {
  const fd: FileHandle = await fs.open(lockPath, "wx", 0o600);
  try {
    await fd.writeFile(`${JSON.stringify(metadata)}\n`, "utf8");
  } catch (err) {
    // A lock file without metadata would block every later start.
    await fd.close().catch(() => undefined);
    await unlinkIfPresent(lockPath);
    throw err;
  }

  let released = false;
  return {
    lockPath,
    async release() {
      if (released) return;
      released = true;
      try {
        await fd.close();
      } finally {
        await unlinkIfPresent(lockPath);
      }
    },
  };
}

/**
 * Claims the history file for this process so two instances never save over
 * each other. A lock left behind by a crashed process on this host is
 * reclaimed.
 */
export async function acquireHistoryLock(historyFile: string): Promise<HistoryLockHandle> {
  const lockPath = lockPathForHistoryFile(historyFile);
  await fs.mkdir(path.dirname(lockPath), { recursive: true });

  const metadata: HistoryLockMetadata = {
    pid: process.pid,
    startedAtMs: Date.now(),
    host: os.hostname(),
  };

  try {
    return await createLockFile(lockPath, metadata);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== "EEXIST") throw err;
  }

  const existingLock = await readExistingLock(lockPath);
  const rawHost = readField(existingLock, "host");
  const existingHost = typeof rawHost === "string" && rawHost.trim().length > 0 ? rawHost.trim() : undefined;
  const existingPid = readField(existingLock, "pid");
  const sameHost = existingHost === undefined || existingHost === os.hostname();

  if (isFiniteNumber(existingPid) && sameHost && !isPidRunning(existingPid)) {
    await unlinkIfPresent(lockPath);
    try {
      return await createLockFile(lockPath, metadata);
    } catch (err) {
      // Lost the race to another process reclaiming the same stale lock.
      if ((err as NodeJS.ErrnoException).code !== "EEXIST") throw err;
    }
  }

  const startedAtMs = readField(existingLock, "startedAtMs");
  const details = [
    isFiniteNumber(existingPid) ? `pid=${existingPid}` : undefined,
    existingHost ? `host=${existingHost}` : undefined,
    isFiniteNumber(startedAtMs) ? `startedAt=${new Date(startedAtMs).toISOString()}` : undefined,
  ]
    .filter(Boolean)
    .join(" ");

  throw new HistoryLockError(
    [
      `History file ${historyFile} is in use.`,
      details
        ? `Another clipboard-history process holds ${lockPath} (${details}).`
        : `Lock file ${lockPath} already exists.`,
      `Stop the other process, point CLIPBOARD_HISTORY_FILE elsewhere, or delete the lock file if no other process is running.`,
    ].join(" "),
    { lockPath, existingLock }
  );
}
