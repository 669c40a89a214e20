import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import Database from "better-sqlite3";
import { expect, test } from "vitest";

import { createEd25519Signer, createIdentity, createSoloDrop, identityHash, signIdentity } from "@patchdrop/auth";
import { DropLog } from "@patchdrop/log";

import { createSqliteRepository, openSqliteRepository } from "../src/index.js";

const bytes = (text: string) => new TextEncoder().encode(text);

test("sqlite repository: objects are content addressed", async () => {
  const repo = createSqliteRepository(new Database(":memory:"));
  try {
    const hash = await repo.objects.put(bytes("hello"));
    expect(await repo.objects.put(bytes("hello"))).toBe(hash);
    expect(await repo.objects.get(hash)).toEqual(bytes("hello"));
    expect(await repo.objects.has(hash)).toBe(true);
    expect(await repo.objects.has("00".repeat(32))).toBe(false);
    expect(await repo.objects.get("00".repeat(32))).toBeUndefined();
    expect(repo.db.prepare("SELECT count(*) AS n FROM objects").get()).toEqual({ n: 1 });

    await repo.objects.delete(hash);
    expect(await repo.objects.has(hash)).toBe(false);
    expect(repo.db.prepare("SELECT count(*) AS n FROM objects").get()).toEqual({ n: 0 });
  } finally {
    repo.close();
  }
});

test("sqlite repository: ref updates apply all or nothing", async () => {
  const repo = createSqliteRepository(new Database(":memory:"));
  const [h1, h2] = ["aa".repeat(32), "bb".repeat(32)];
  try {
    expect(await repo.refs.update([{ name: "refs/a", expected: null, next: h1 }])).toBe(true);
    expect(await repo.refs.update([{ name: "refs/a", expected: null, next: h2 }])).toBe(false);

    const stale = await repo.refs.update([
      { name: "refs/b", expected: null, next: h1 },
      { name: "refs/a", expected: h2, next: h2 },
    ]);
    expect(stale).toBe(false);
    expect(await repo.refs.read("refs/b")).toBeUndefined();

    expect(
      await repo.refs.update([
        { name: "refs/b", expected: null, next: h1 },
        { name: "refs/a", expected: h1, next: h2 },
      ])
    ).toBe(true);
    expect(await repo.refs.read("refs/a")).toBe(h2);

    expect(await repo.refs.update([{ name: "refs/a", expected: h2, next: null }])).toBe(true);
    expect(await repo.refs.read("refs/a")).toBeUndefined();
  } finally {
    repo.close();
  }
});

test("sqlite repository: lists refs under a prefix", async () => {
  const repo = createSqliteRepository(new Database(":memory:"));
  const h = "cc".repeat(32);
  try {
    await repo.refs.update([
      { name: "refs/drops/x/bundles/2", expected: null, next: h },
      { name: "refs/drops/x/bundles/1", expected: null, next: h },
      { name: "refs/drops/x/log", expected: null, next: h },
      { name: "refs/drops/xy/bundles/1", expected: null, next: h },
    ]);
    expect([...(await repo.refs.list("refs/drops/x/bundles/")).keys()]).toEqual([
      "refs/drops/x/bundles/1",
      "refs/drops/x/bundles/2",
    ]);
  } finally {
    repo.close();
  }
});

test("sqlite repository: a drop log survives reopening the file", async () => {
  const dir = mkdtempSync(join(tmpdir(), "patchdrop-sqlite-"));
  const file = join(dir, "repo.sqlite3");
  try {
    const signer = await createEd25519Signer();
    const identity = createIdentity({ keys: [signer.key] });
    const author = { identity: { signed: identity, signatures: await signIdentity(identity, [signer]) }, signers: [signer] };
    const drop = createSoloDrop({ description: "persisted", owner: identityHash(identity), branches: ["main"] });

    let root: string;
    {
      const repo = openSqliteRepository(file);
      const log = await DropLog.init({ repo, name: "persisted", drop, authors: [author] });
      root = await log.comment(author, "still here");
      repo.close();
    }
    {
      const repo = openSqliteRepository(file);
      const log = new DropLog({ repo, name: "persisted" });
      expect(await log.size()).toBe(2);
      expect((await log.get(root))?.message).toEqual({ type: "basic", message: "still here" });
      expect((await log.policy()).drop.description).toBe("persisted");
      repo.close();
    }
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});
