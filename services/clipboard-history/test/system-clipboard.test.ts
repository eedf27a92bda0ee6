import assert from "node:assert/strict";
import test from "node:test";

import clipboardy from "clipboardy";

import { SystemClipboard } from "../src/clipboard.js";
import { ClipboardWriteError, NoTextAvailableError } from "../src/errors.js";

test("text on the clipboard is returned as is", async (t) => {
  t.mock.method(clipboardy, "read", async () => "copied\ntext");
  assert.equal(await new SystemClipboard().read(), "copied\ntext");
});

test("an empty read counts as no text, since clipboardy reports non-text content that way", async (t) => {
  t.mock.method(clipboardy, "read", async () => "");
  await assert.rejects(new SystemClipboard().read(), NoTextAvailableError);
});

test("a failed read becomes NoTextAvailableError with the cause attached", async (t) => {
  const cause = new Error("xclip exited with code 1");
  t.mock.method(clipboardy, "read", async () => {
    throw cause;
  });

  await assert.rejects(new SystemClipboard().read(), (err: unknown) => {
    assert.ok(err instanceof NoTextAvailableError);
    assert.equal(err.cause, cause);
    return true;
  });
});

test("a failed write becomes ClipboardWriteError", async (t) => {
  t.mock.method(clipboardy, "write", async () => {
    throw new Error("no display");
  });
  await assert.rejects(new SystemClipboard().write("x"), ClipboardWriteError);
});

test("writes pass the text through", async (t) => {
  const write = t.mock.method(clipboardy, "write", async () => undefined);
  await new SystemClipboard().write("restored");
  assert.deepEqual(
    write.mock.calls.map((call) => call.arguments),
    [["restored"]]
  );
});
