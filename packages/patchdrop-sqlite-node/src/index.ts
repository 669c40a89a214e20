import Database from "better-sqlite3";

import type { ContentHash } from "@patchdrop/auth";
import { contentHash } from "@patchdrop/auth";
import type { RefUpdate, Repository } from "@patchdrop/log";

export type SqliteRepository = Repository & {
  readonly db: Database.Database;
  close(): void;
};

const SCHEMA = `
CREATE TABLE IF NOT EXISTS objects (
  hash TEXT PRIMARY KEY,
  data BLOB NOT NULL
) WITHOUT ROWID;
CREATE TABLE IF NOT EXISTS refs (
  name TEXT PRIMARY KEY,
  target TEXT NOT NULL
) WITHOUT ROWID;
`;

/**
 * Object and ref store on a better-sqlite3 connection. Ref updates run in an
 * IMMEDIATE transaction, so the compare-and-swap holds across processes
 * sharing the file.
 */
export function createSqliteRepository(db: Database.Database): SqliteRepository {
  db.exec(SCHEMA);

  const insertObject = db.prepare<[string, Buffer]>("INSERT OR IGNORE INTO objects (hash, data) VALUES (?, ?)");
  const selectObject = db.prepare<[string], { data: Buffer }>("SELECT data FROM objects WHERE hash = ?");
  const deleteObject = db.prepare<[string]>("DELETE FROM objects WHERE hash = ?");
  const objectExists = db.prepare<[string], { found: number }>("SELECT 1 AS found FROM objects WHERE hash = ?");
  const selectRef = db.prepare<[string], { target: string }>("SELECT target FROM refs WHERE name = ?");
  const selectRefs = db.prepare<[string, string], { name: string; target: string }>(
    "SELECT name, target FROM refs WHERE substr(name, 1, length(?)) = ? ORDER BY name"
  );
  const upsertRef = db.prepare<[string, string]>(
    "INSERT INTO refs (name, target) VALUES (?, ?) ON CONFLICT(name) DO UPDATE SET target = excluded.target"
  );
  const deleteRef = db.prepare<[string]>("DELETE FROM refs WHERE name = ?");

  const applyUpdates = db.transaction((updates: readonly RefUpdate[]): boolean => {
    for (const u of updates) {
      if ((selectRef.get(u.name)?.target ?? null) !== u.expected) return false;
    }
    for (const u of updates) {
      if (u.next === null) deleteRef.run(u.name);
      else upsertRef.run(u.name, u.next);
    }
    return true;
  });

  return {
    db,
    objects: {
      async put(bytes) {
        const hash = contentHash(bytes);
        insertObject.run(hash, Buffer.from(bytes));
        return hash;
      },
      async get(hash) {
        const row = selectObject.get(hash);
        return row ? new Uint8Array(row.data) : undefined;
      },
      async has(hash) {
        return objectExists.get(hash) !== undefined;
      },
      async delete(hash) {
        deleteObject.run(hash);
      },
    },
    refs: {
      async read(name) {
        return selectRef.get(name)?.target;
      },
      async list(prefix) {
        return new Map(selectRefs.all(prefix, prefix).map((r): [string, ContentHash] => [r.name, r.target]));
      },
      async update(updates) {
        return applyUpdates.immediate(updates);
      },
    },
    close: () => db.close(),
  };
}

/** Opens (creating if needed) a repository file in WAL mode. */
export function openSqliteRepository(file: string): SqliteRepository {
  const db = new Database(file);
  db.pragma("journal_mode = WAL");
  return createSqliteRepository(db);
}
