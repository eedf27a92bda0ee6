#!/usr/bin/env node
import "dotenv/config";

import { writeSync } from "node:fs";
import readline from "node:readline";

import pino from "pino";

import { SystemClipboard } from "./clipboard.js";
import { loadConfigFromEnv } from "./config.js";
import { createClipboardHistory, type StartResult } from "./engine.js";
import { createLogger } from "./logger.js";
import { HistoryMenu } from "./menu.js";

const config = loadConfigFromEnv();
// stdout belongs to the menu.
const logger = createLogger(config.logLevel, pino.destination(2));

const history = createClipboardHistory({ config, logger, clipboard: new SystemClipboard() });

const interactive = !config.headless && process.stdin.isTTY === true;
const menu = interactive ? new HistoryMenu(history, (text) => process.stdout.write(text)) : null;
// Subscribe before start so restored entries show up in the menu.
menu?.attach();

let startResult: StartResult;
try {
  startResult = await history.start();
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  // Ensure the startup error is visible even if LOG_LEVEL=silent.
  writeSync(2, `clipboard-history failed to start: ${message}\n`);
  logger.error({ err }, "startup_failed");
  process.exit(1);
}

let rl: readline.Interface | null = null;
let shuttingDown: Promise<void> | null = null;

const shutdown = (reason: string): Promise<void> => {
  if (!shuttingDown) {
    shuttingDown = (async () => {
      logger.info({ reason }, "shutting_down");
      try {
        await history.stop();
      } catch (err) {
        logger.error({ err }, "shutdown_failed");
        process.exitCode = 1;
      } finally {
        rl?.close();
        menu?.detach();
      }
    })();
  }
  return shuttingDown;
};

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));

if (menu) {
  if (startResult.loadError) {
    const note = startResult.savesEnabled
      ? "starting with an empty history"
      : "starting with an empty history that will not be saved";
    process.stdout.write(`Saved history could not be read (${startResult.loadError.message}); ${note}.\n`);
  }
  rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  rl.on("SIGINT", () => void shutdown("SIGINT"));
  const outcome = await menu.run(rl);
  await shutdown(outcome === "quit" ? "quit" : "stdin_closed");
}
