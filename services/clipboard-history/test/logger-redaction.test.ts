import assert from "node:assert/strict";
import test from "node:test";

import { capturingLogger } from "./test-helpers.js";

test("createLogger never writes clipboard text", () => {
  const { logger, lines, raw } = capturingLogger("info");
  const secret = "clipboard-text-should-not-appear";

  logger.info(
    {
      slot: 3,
      text: secret,
      label: secret,
      texts: [secret],
      entry: { text: secret, label: secret },
      entries: [{ text: secret }, { text: secret }],
    },
    "redaction_test"
  );

  assert.ok(!raw().includes(secret));

  const [line] = lines();
  assert.ok(line);
  assert.equal(line.msg, "redaction_test");
  assert.equal(line.service, "clipboard-history");
  assert.equal(line.slot, 3);
  assert.equal("text" in line, false);
  assert.equal("label" in line, false);
  assert.equal("texts" in line, false);
  assert.deepEqual(line.entry, {});
  assert.deepEqual(line.entries, [{}, {}]);
});

test("lines below the configured level are dropped", () => {
  const { logger, lines } = capturingLogger("info");
  logger.debug({ slot: 1 }, "too_quiet");
  logger.info({ slot: 2 }, "loud_enough");

  assert.deepEqual(
    lines().map((line) => line.msg),
    ["loud_enough"]
  );
});
