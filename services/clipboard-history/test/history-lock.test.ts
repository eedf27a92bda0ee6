import assert from "node:assert/strict";
import { readFile, readdir, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import test from "node:test";

import { HistoryLockError } from "../src/errors.js";
import { acquireHistoryLock, lockPathForHistoryFile } from "../src/history-lock.js";
import { makeTempDir } from "./test-helpers.js";

test("lock file sits beside the history file", () => {
  assert.equal(lockPathForHistoryFile("/tmp/history.bin"), "/tmp/history.bin.lock");
});

test("acquire writes metadata and release removes the lock", async (t) => {
  const dir = await makeTempDir(t);
  const historyFile = path.join(dir, "history.bin");

  const lock = await acquireHistoryLock(historyFile);
  assert.equal(lock.lockPath, `${historyFile}.lock`);

  const metadata: unknown = JSON.parse(await readFile(lock.lockPath, "utf8"));
  assert.ok(metadata && typeof metadata === "object");
  assert.equal("pid" in metadata ? metadata.pid : undefined, process.pid);
  assert.equal("host" in metadata ? metadata.host : undefined, os.hostname());

  await lock.release();
  assert.deepEqual(await readdir(dir), []);
});

test("a second acquire fails while the lock is held", async (t) => {
  const dir = await makeTempDir(t);
  const historyFile = path.join(dir, "history.bin");
  const lock = await acquireHistoryLock(historyFile);
  t.after(() => lock.release());

  await assert.rejects(acquireHistoryLock(historyFile), (err: unknown) => {
    assert.ok(err instanceof HistoryLockError);
    assert.equal(err.code, "locked");
    assert.equal(err.lockPath, `${historyFile}.lock`);
    assert.match(err.message, new RegExp(`pid=${process.pid}`));
    assert.match(err.message, /CLIPBOARD_HISTORY_FILE/);
    return true;
  });
});

test("the lock can be taken again after release", async (t) => {
  const dir = await makeTempDir(t);
  const historyFile = path.join(dir, "history.bin");

  const first = await acquireHistoryLock(historyFile);
  await first.release();
  const second = await acquireHistoryLock(historyFile);
  await second.release();
});

test("release is idempotent", async (t) => {
  const dir = await makeTempDir(t);
  const lock = await acquireHistoryLock(path.join(dir, "history.bin"));

  await lock.release();
  await lock.release();
});

test("a lock left by a dead process on this host is reclaimed", async (t) => {
  const dir = await makeTempDir(t);
  const historyFile = path.join(dir, "history.bin");
  await writeFile(
    lockPathForHistoryFile(historyFile),
    JSON.stringify({ pid: 999_999_999, startedAtMs: 0, host: os.hostname() })
  );

  const lock = await acquireHistoryLock(historyFile);
  const metadata: unknown = JSON.parse(await readFile(lock.lockPath, "utf8"));
  assert.ok(metadata && typeof metadata === "object" && "pid" in metadata);
  assert.equal(metadata.pid, process.pid);
  await lock.release();
});

test("a lock held from another host is never reclaimed", async (t) => {
  const dir = await makeTempDir(t);
  const historyFile = path.join(dir, "history.bin");
  await writeFile(
    lockPathForHistoryFile(historyFile),
    JSON.stringify({ pid: 999_999_999, startedAtMs: 0, host: "some-other-host" })
  );

  await assert.rejects(acquireHistoryLock(historyFile), (err: unknown) => {
    assert.ok(err instanceof HistoryLockError);
    assert.match(err.message, /host=some-other-host/);
    return true;
  });
});

test("an unreadable lock file blocks startup", async (t) => {
  const dir = await makeTempDir(t);
  const historyFile = path.join(dir, "history.bin");
  await writeFile(lockPathForHistoryFile(historyFile), "not json");

  await assert.rejects(acquireHistoryLock(historyFile), (err: unknown) => {
    assert.ok(err instanceof HistoryLockError);
    assert.match(err.message, /already exists/);
    return true;
  });
});
