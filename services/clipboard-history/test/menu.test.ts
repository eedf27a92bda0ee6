import assert from "node:assert/strict";
import path from "node:path";
import test, { type TestContext } from "node:test";

import { createClipboardHistory } from "../src/engine.js";
import { ClipboardWriteError } from "../src/errors.js";
import { HistoryMenu } from "../src/menu.js";
import { engineConfig, makeTempDir, MemoryClipboard, silentLogger } from "./test-helpers.js";

// The menu only needs the in-memory side of the engine; nothing here calls
// start(), so no lock, file or timer is involved.
async function setup(t: TestContext) {
  const dir = await makeTempDir(t);
  const clipboard = new MemoryClipboard();
  const history = createClipboardHistory({
    config: engineConfig(path.join(dir, "history.bin")),
    logger: silentLogger(),
    clipboard,
  });
  const out: string[] = [];
  const menu = new HistoryMenu(history, (text) => out.push(text));
  menu.attach();

  const copy = async (text: string) => {
    clipboard.content = text;
    await history.pollOnce();
  };
  const take = () => out.splice(0).join("");
  return { clipboard, history, menu, copy, take };
}

async function* linesOf(...lines: string[]): AsyncIterable<string> {
  for (const line of lines) yield line;
}

test("an empty menu says so", async (t) => {
  const { menu } = await setup(t);
  assert.equal(
    menu.render(),
    "Clipboard history (newest first):\n  (empty)\nSeparate lines: off. Type h for help.\n"
  );
});

test("new entries appear at the top and become active", async (t) => {
  const { menu, copy } = await setup(t);
  await copy("alpha");
  await copy("beta");

  assert.deepEqual(
    menu.getOptions().map((option) => [option.slot, option.label]),
    [
      [1, "beta"],
      [0, "alpha"],
    ]
  );
  assert.equal(menu.getActiveSlot(), 1);
  assert.equal(
    menu.render(),
    "Clipboard history (newest first):\n  1) * beta\n  2)   alpha\nSeparate lines: off. Type h for help.\n"
  );
});

test("choosing a number restores that entry and marks it active", async (t) => {
  const { clipboard, menu, copy, take } = await setup(t);
  await copy("alpha");
  await copy("beta");

  assert.equal(await menu.handle("2"), "continue");
  assert.equal(take(), "Restored 2) alpha\n");
  assert.deepEqual(clipboard.writes, ["alpha"]);
  assert.equal(menu.getActiveSlot(), 0);

  await menu.handle("7");
  assert.equal(take(), "No entry 7.\n");
});

test("clear empties the menu", async (t) => {
  const { menu, copy, take } = await setup(t);
  await copy("alpha");

  await menu.handle("clear");
  assert.equal(take(), "History cleared.\n");
  assert.deepEqual(menu.getOptions(), []);
  assert.equal(menu.getActiveSlot(), null);

  await copy("alpha");
  assert.deepEqual(
    menu.getOptions().map((option) => [option.slot, option.label, option.generation]),
    [[0, "alpha", 1]]
  );
});

test("an option left over from before a clear is dropped when chosen", async (t) => {
  const { clipboard, history, menu, copy, take } = await setup(t);
  await copy("alpha");
  await copy("beta");

  // Simulate a menu that missed the clear notification.
  menu.detach();
  history.clear();
  await copy("gamma");

  await menu.handle("1");
  assert.equal(take(), "Entry 1 is no longer available.\n");
  assert.deepEqual(
    menu.getOptions().map((option) => option.label),
    ["alpha"]
  );
  assert.deepEqual(clipboard.writes, []);
});

test("a clipboard write failure is reported and the option kept", async (t) => {
  const { clipboard, menu, copy, take } = await setup(t);
  await copy("alpha");
  clipboard.writeFailure = new ClipboardWriteError("no display");

  await menu.handle("1");
  assert.equal(take(), "Could not write to the clipboard: no display\n");
  assert.equal(menu.getOptions().length, 1);
});

test("toggling newlines affects only entries captured afterwards", async (t) => {
  const { history, menu, copy, take } = await setup(t);
  await copy("x\ny");

  await menu.handle("n");
  assert.equal(take(), "Separate lines shown for new entries.\n");
  assert.equal(history.showNewlines, true);
  await copy("p\nq");

  assert.deepEqual(
    menu.getOptions().map((option) => option.label),
    ["p\nq", "x y"]
  );

  await menu.handle("NEWLINES");
  assert.equal(take(), "Separate lines hidden for new entries.\n");
  assert.equal(history.showNewlines, false);
});

test("other commands", async (t) => {
  const { menu, copy, take } = await setup(t);
  await copy("alpha");

  assert.equal(await menu.handle("  Foo "), "continue");
  assert.equal(take(), 'Unknown command "foo". Type h for help.\n');

  assert.equal(await menu.handle(""), "continue");
  assert.equal(take(), "");

  await menu.handle("h");
  assert.match(take(), /^Commands:\n/);

  await menu.handle("l");
  assert.equal(take(), menu.render());

  assert.equal(await menu.handle("q"), "quit");
  assert.equal(await menu.handle("quit"), "quit");
});

test("run shows the menu and stops at quit", async (t) => {
  const { clipboard, menu, copy, take } = await setup(t);
  await copy("alpha");
  const initial = menu.render();

  assert.equal(await menu.run(linesOf("1", "q", "1")), "quit");
  assert.equal(take(), `${initial}Restored 1) alpha\n`);
  assert.deepEqual(clipboard.writes, ["alpha"]);
});

test("run reports end of input", async (t) => {
  const { menu, take } = await setup(t);
  assert.equal(await menu.run(linesOf()), "eof");
  assert.equal(
    take(),
    "Clipboard history (newest first):\n  (empty)\nSeparate lines: off. Type h for help.\n"
  );
});

test("a detached menu no longer follows the history", async (t) => {
  const { menu, copy } = await setup(t);
  menu.detach();
  await copy("alpha");
  assert.deepEqual(menu.getOptions(), []);
});
