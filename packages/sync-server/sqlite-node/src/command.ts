import { Command, InvalidArgumentError } from "commander";

import type { SyncServerOptions } from "./server.js";

function integer(name: string, min: number): (val: string) => number {
  return (val) => {
    const n = Number(val);
    if (!Number.isSafeInteger(n) || n < min) throw new InvalidArgumentError(`invalid ${name}: ${val}`);
    return n;
  };
}

function fromEnv(env: NodeJS.ProcessEnv, key: string, min: number, fallback: number): number {
  const val = env[key];
  return val === undefined ? fallback : integer(key, min)(val);
}

/**
 * Command line of the SQLite sync server. Every flag falls back to an
 * environment variable (HOST, PORT, PATCHDROP_DB_DIR, PATCHDROP_IDLE_CLOSE_MS,
 * PATCHDROP_MAX_BUNDLE_BYTES) before the built-in default.
 */
export function createServerCommand(
  serve: (opts: Required<SyncServerOptions>) => Promise<void>,
  env: NodeJS.ProcessEnv = process.env
): Command {
  return new Command()
    .name("patchdrop-sync-server")
    .description("Serve drops over HTTP and WebSocket, one SQLite file per drop")
    .option("--host <host>", "interface to listen on", env.HOST ?? "0.0.0.0")
    .option("--port <port>", "TCP port, 0 for any free one", integer("port", 0), fromEnv(env, "PORT", 0, 8787))
    .option("--db-dir <dir>", "directory holding the drop databases", env.PATCHDROP_DB_DIR ?? "data")
    .option(
      "--idle-close-ms <ms>",
      "close a drop database this long after its last request",
      integer("idle close delay", 0),
      fromEnv(env, "PATCHDROP_IDLE_CLOSE_MS", 0, 30_000)
    )
    .option(
      "--max-bundle-bytes <n>",
      "largest accepted bundle or frame",
      integer("bundle size limit", 1),
      fromEnv(env, "PATCHDROP_MAX_BUNDLE_BYTES", 1, 32 * 1024 * 1024)
    )
    .exitOverride()
    .action(async (opts: Required<SyncServerOptions>) => {
      await serve(opts);
    });
}
