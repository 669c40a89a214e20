#!/usr/bin/env node
import path from "node:path";

import { CommanderError } from "commander";

import { createServerCommand } from "./command.js";
import { startSyncServer } from "./server.js";

const command = createServerCommand(async (opts) => {
  const handle = await startSyncServer({ ...opts, dbDir: path.resolve(opts.dbDir) });
  const base = `${handle.host}:${handle.port}`;
  console.log(`patchdrop sync server on http://${base} (drops in ${handle.dbDir})`);
  console.log(`  bundles   http://${base}/drops/<drop>/bundles`);
  console.log(`  peers     ws://${base}/sync?drop=<drop>`);

  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`${signal}: closing`);
    handle.close().catch((err: unknown) => {
      console.error("patchdrop sync server did not close cleanly", err);
      process.exitCode = 1;
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
});

command.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof CommanderError) {
    process.exitCode = err.exitCode;
    return;
  }
  console.error(err);
  process.exitCode = 1;
});
