import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import { DropLog } from "@patchdrop/log";
import type { SqliteRepository } from "@patchdrop/sqlite-node";
import { openSqliteRepository } from "@patchdrop/sqlite-node";
import type { DropHandle, DropProvider } from "@patchdrop/sync-server-core";
import { startDropSyncServer } from "@patchdrop/sync-server-core";

export type SqliteDropStoreOptions = {
  dbDir: string;
  idleCloseMs?: number;
};

export type SqliteDropStore = DropProvider & {
  /** Closes every open database, including ones still in use. */
  close: () => void;
};

export type SyncServerOptions = {
  host?: string;
  port?: number;
  dbDir?: string;
  idleCloseMs?: number;
  maxBundleBytes?: number;
};

export type SyncServerHandle = {
  host: string;
  port: number;
  dbDir: string;
  idleCloseMs: number;
  close: () => Promise<void>;
};

type DropContext = {
  drop: string;
  dbPath: string;
  repo: SqliteRepository;
  log: DropLog;
  connections: number;
  closeTimer?: NodeJS.Timeout;
};

async function fileExists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return false;
    throw err;
  }
}

export function dropDbPath(dbDir: string, drop: string): string {
  const hash = crypto.createHash("sha256").update(drop, "utf8").digest("hex");
  return path.join(dbDir, `drop-${hash}.sqlite3`);
}

export function createSqliteDropStore(opts: SqliteDropStoreOptions): SqliteDropStore {
  const dbDir = path.resolve(opts.dbDir);
  const idleCloseMs = Number(opts.idleCloseMs ?? 30_000);
  if (!Number.isFinite(idleCloseMs) || idleCloseMs < 0) throw new Error(`invalid idleCloseMs: ${opts.idleCloseMs}`);

  const drops = new Map<string, DropContext>();
  const opening = new Map<string, Promise<DropContext>>();

  const closeContext = (ctx: DropContext): void => {
    if (ctx.closeTimer) clearTimeout(ctx.closeTimer);
    ctx.closeTimer = undefined;
    drops.delete(ctx.drop);
    ctx.repo.close();
  };

  const scheduleClose = (ctx: DropContext): void => {
    if (ctx.closeTimer) return;
    ctx.closeTimer = setTimeout(() => {
      ctx.closeTimer = undefined;
      if (ctx.connections > 0) return;
      closeContext(ctx);
    }, idleCloseMs);
  };

  const openDropContext = async (drop: string): Promise<DropContext> => {
    await fs.mkdir(dbDir, { recursive: true });

    const dbPath = dropDbPath(dbDir, drop);
    const repo = openSqliteRepository(dbPath);
    repo.db.exec("CREATE TABLE IF NOT EXISTS meta (key TEXT PRIMARY KEY, value TEXT NOT NULL) WITHOUT ROWID");
    const stored = repo.db.prepare<[string], { value: string }>("SELECT value FROM meta WHERE key = ?").get("drop");
    if (!stored) {
      repo.db.prepare("INSERT INTO meta (key, value) VALUES ('drop', ?)").run(drop);
    } else if (stored.value !== drop) {
      repo.close();
      throw new Error(`drop mismatch for ${dbPath}: expected ${drop}, got ${stored.value}`);
    }

    const ctx: DropContext = { drop, dbPath, repo, log: new DropLog({ repo, name: drop }), connections: 0 };
    drops.set(drop, ctx);
    return ctx;
  };

  const contextFor = (drop: string): Promise<DropContext> => {
    const existing = drops.get(drop);
    if (existing) return Promise.resolve(existing);
    const pending = opening.get(drop);
    if (pending) return pending;
    const next = openDropContext(drop).finally(() => opening.delete(drop));
    opening.set(drop, next);
    return next;
  };

  return {
    async open(drop, { create }): Promise<DropHandle | undefined> {
      const known = drops.has(drop) || opening.has(drop);
      if (!create && !known && !(await fileExists(dropDbPath(dbDir, drop)))) return undefined;
      const ctx = await contextFor(drop);
      ctx.connections += 1;
      if (ctx.closeTimer) {
        clearTimeout(ctx.closeTimer);
        ctx.closeTimer = undefined;
      }

      let released = false;
      return {
        log: ctx.log,
        release: () => {
          if (released) return;
          released = true;
          ctx.connections -= 1;
          if (ctx.connections <= 0) scheduleClose(ctx);
        },
      };
    },
    close: () => {
      for (const ctx of [...drops.values()]) closeContext(ctx);
    },
  };
}

export async function startSyncServer(opts: SyncServerOptions = {}): Promise<SyncServerHandle> {
  const host = opts.host ?? "0.0.0.0";
  const port = Number(opts.port ?? 8787);
  const dbDir = path.resolve(opts.dbDir ?? path.join(process.cwd(), "data"));
  const idleCloseMs = Number(opts.idleCloseMs ?? 30_000);

  if (!Number.isFinite(port) || port < 0) throw new Error(`invalid port: ${opts.port}`);
  if (!Number.isFinite(idleCloseMs) || idleCloseMs < 0) throw new Error(`invalid idleCloseMs: ${opts.idleCloseMs}`);

  const drops = createSqliteDropStore({ dbDir, idleCloseMs });

  const server = await startDropSyncServer({
    host,
    port,
    maxBundleBytes: opts.maxBundleBytes,
    drops,
    onPeerError: (err, ctx) => {
      console.error("patchdrop peer message handler failed", {
        drop: ctx.drop,
        type: ctx.messageType,
        err,
      });
    },
  });

  return {
    host: server.host,
    port: server.port,
    dbDir,
    idleCloseMs,
    close: async () => {
      await server.close();
      drops.close();
    },
  };
}
