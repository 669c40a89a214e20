import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, expect, test } from "vitest";

import { AuthorizationError, IntegrityError, isContentHash } from "@patchdrop/auth";
import type { Repository } from "@patchdrop/log";
import { DROP_TOPIC, DropLog, createMemoryRepository } from "@patchdrop/log";
import { createLogBundleSource } from "@patchdrop/sync";

import type { CliConfig } from "../src/config.js";
import { configFromEnv } from "../src/config.js";
import { createProgram } from "../src/program.js";

let dir: string;
let config: CliConfig;
let now: number;
const nowSec = () => ++now;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "patchdrop-cli-"));
  config = { repoPath: path.join(dir, "unused.sqlite3"), secretKeyFile: path.join(dir, "keys", "secret.key"), defaultBranch: "main" };
  now = 1_800_000_000;
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

function cli(repo: Repository, opts: { config?: CliConfig; fetch?: typeof globalThis.fetch } = {}) {
  return async (...args: string[]): Promise<string[]> => {
    const lines: string[] = [];
    const program = createProgram({
      config: opts.config ?? config,
      out: (line) => lines.push(line),
      openRepository: () => repo,
      fetch: opts.fetch,
      nowSec,
    });
    await program.parseAsync(args, { from: "user" });
    return lines;
  };
}

async function single(lines: Promise<string[]>): Promise<string> {
  const [line, ...rest] = await lines;
  expect(rest).toEqual([]);
  if (line === undefined) throw new Error("command printed nothing");
  return line;
}

async function setupDrop(run: ReturnType<typeof cli>) {
  const init = await run("id", "init", "alice");
  expect(init[0]).toBe(`created secret key ${config.secretKeyFile}`);
  const aliceId = init[1] ?? "";
  const policy = await single(run("drop", "init", "demo", "--identity", "alice", "--description", "demo drop"));
  const root = await single(run("topic", "comment", "demo", "Please review", "--identity", "alice"));
  const reply = await single(run("topic", "comment", "demo", "Looks good", "--identity", "alice", "--reply-to", root));
  return { aliceId, policy, root, reply };
}

test("config: environment overrides and defaults", () => {
  expect(configFromEnv({}, "/work")).toEqual({
    repoPath: "/work/.patchdrop/repo.sqlite3",
    secretKeyFile: "/work/.patchdrop/secret.key",
    defaultBranch: "main",
  });
  expect(
    configFromEnv({ PATCHDROP_REPO: "db/r.sqlite3", PATCHDROP_SECRET_KEY_FILE: "/keys/k", PATCHDROP_DEFAULT_BRANCH: "trunk" }, "/work")
  ).toEqual({ repoPath: "/work/db/r.sqlite3", secretKeyFile: "/keys/k", defaultBranch: "trunk" });
  expect(() => configFromEnv({ PATCHDROP_DEFAULT_BRANCH: "bad branch" }, "/work")).toThrow(
    "invalid PATCHDROP_DEFAULT_BRANCH: bad branch"
  );
});

test("cli: identity, drop, comment and thread display", async () => {
  const run = cli(createMemoryRepository());
  const { aliceId, policy, root, reply } = await setupDrop(run);

  expect(isContentHash(aliceId)).toBe(true);
  expect(isContentHash(policy)).toBe(true);
  expect((await fs.stat(config.secretKeyFile)).mode & 0o777).toBe(0o600);

  const show = await run("id", "show", "alice");
  expect(show.slice(0, 4)).toEqual([`id ${aliceId}`, `version ${aliceId}`, "versions 1", "threshold 1"]);
  expect(show[4]?.startsWith("key ed25519:")).toBe(true);
  expect(await run("id", "ls")).toEqual(["alice"]);

  expect(await run("topic", "ls", "demo")).toEqual([`${DROP_TOPIC} demo drop`, `${root} Please review`]);
  expect(await run("topic", "show", "demo", root)).toEqual([`${root} Please review`, `  ${reply} Looks good`]);
  expect(await run("drop", "status", "demo")).toEqual(["records 3", "topics 2", `policy ${policy}`]);

  await expect(run("id", "init", "alice")).rejects.toThrow("identity alice already exists");
});

test("cli: code comments need a file for their line range", async () => {
  const run = cli(createMemoryRepository());
  const { root } = await setupDrop(run);

  await expect(run("topic", "comment", "demo", "off by one", "--identity", "alice", "--start", "3")).rejects.toThrow(
    "--start and --end need --file"
  );
  const note = await single(
    run("topic", "comment", "demo", "off by one", "--identity", "alice", "--reply-to", root, "--file", "src/a.ts", "--start", "3", "--end", "4")
  );
  const thread = await run("topic", "show", "demo", root);
  expect(thread[thread.length - 1]).toBe(`  ${note} off by one`);
});

test("cli: merge points are authorized per branch", async () => {
  const repo = createMemoryRepository();
  const run = cli(repo);
  await setupDrop(run);

  const file = path.join(dir, "tip.txt");
  await fs.writeFile(file, "tree contents");
  const tip = await single(run("object", file));
  expect(await repo.objects.has(tip)).toBe(true);

  const merge = await single(run("merge-point", "demo", tip, "--identity", "alice", "--message", "release"));
  const latest = await new DropLog({ repo, name: "demo" }).latestMergePoint("main");
  expect(latest?.id).toBe(merge);
  expect(latest?.header.patch?.tips).toEqual([{ name: "refs/heads/main", oid: tip }]);

  await expect(run("merge-point", "demo", tip, "--identity", "alice", "--branch", "other")).rejects.toBeInstanceOf(
    AuthorizationError
  );
});

test("cli: bundles pack, verify and unpack into another repository", async () => {
  const run = cli(createMemoryRepository());
  const { root, reply } = await setupDrop(run);

  const outDir = path.join(dir, "bundles");
  const file = await single(run("bundle", "pack", "demo", "--out", outDir));
  const hash = path.basename(file, ".bundle");
  expect(path.dirname(file)).toBe(outDir);
  expect(await run("bundle", "verify", file)).toEqual([`${hash} 3 records 1 identities`]);

  const other = cli(createMemoryRepository());
  expect(await other("bundle", "unpack", "copy", file)).toEqual(["3 new records, 2 new topics"]);
  expect(await other("bundle", "unpack", "copy", file)).toEqual(["0 new records, 0 new topics"]);
  expect(await other("topic", "show", "copy", root)).toEqual([`${root} Please review`, `  ${reply} Looks good`]);

  const bytes = await fs.readFile(file);
  bytes[bytes.length - 1] = (bytes[bytes.length - 1] ?? 0) ^ 0xff;
  await fs.writeFile(file, bytes);
  await expect(run("bundle", "verify", file)).rejects.toBeInstanceOf(IntegrityError);
});

test("cli: rotation moves signing to the new key", async () => {
  const repo = createMemoryRepository();
  const run = cli(repo);
  const { aliceId, root, reply } = await setupDrop(run);

  const nextKey = path.join(dir, "keys", "next.key");
  const next = await single(run("id", "rotate", "alice", "--new-key-file", nextKey));
  const show = await run("id", "show", "alice");
  expect(show.slice(0, 3)).toEqual([`id ${aliceId}`, `version ${next}`, "versions 2"]);

  await expect(run("topic", "comment", "demo", "stale key", "--identity", "alice")).rejects.toThrow(
    "the configured key is not a current key of identity alice"
  );

  const rotated = cli(repo, { config: { ...config, secretKeyFile: nextKey } });
  const later = await single(rotated("topic", "comment", "demo", "new key", "--identity", "alice", "--reply-to", root));
  expect(await rotated("topic", "show", "demo", root)).toEqual([
    `${root} Please review`,
    `  ${reply} Looks good`,
    `  ${later} new key`,
  ]);
});

function serveLog(remote: DropLog): typeof globalThis.fetch {
  const source = createLogBundleSource(remote);
  const json = (body: unknown) => new Response(JSON.stringify(body), { status: 200, headers: { "content-type": "application/json" } });
  return async (input, init) => {
    const url = new URL(typeof input === "string" ? input : input instanceof URL ? input.href : input.url);
    const [, , , , hash] = url.pathname.split("/");
    if (init?.method === "POST") {
      const body = init.body;
      if (!(body instanceof Uint8Array)) throw new Error("expected a bundle body");
      return json(await source.submitBundle(body));
    }
    if (hash === undefined) return json({ bundles: await source.advertise() });
    return new Response(await source.fetch(hash), { status: 200 });
  };
}

test("cli: sync pushes to and pulls from a server", async () => {
  const remote = new DropLog({ repo: createMemoryRepository(), name: "demo", nowSec });
  const fetch = serveLog(remote);
  const run = cli(createMemoryRepository(), { fetch });
  const { root } = await setupDrop(run);

  const pushed = await run("sync", "demo", "http://sync.test", "--push");
  expect(pushed[0]).toBe("fetched 0 of 0 bundles, 0 new records");
  expect(pushed[1]).toMatch(/^pushed [0-9a-f]{64}, 3 new records$/);
  expect(await remote.size()).toBe(3);

  const fresh = cli(createMemoryRepository(), { fetch });
  expect(await fresh("sync", "demo", "http://sync.test")).toEqual(["fetched 1 of 1 bundles, 3 new records"]);
  expect((await fresh("topic", "ls", "demo"))[1]).toBe(`${root} Please review`);

  expect(await run("sync", "demo", "http://sync.test", "--push")).toEqual([
    "fetched 0 of 1 bundles, 0 new records",
    `remote has ${pushed[1]?.slice("pushed ".length, "pushed ".length + 64)}`,
  ]);
});

test("cli: threshold rotations collect co-signatures", async () => {
  const repo = createMemoryRepository();
  const run = cli(repo);
  await run("id", "init", "alice");
  const second = path.join(dir, "keys", "second.key");
  const third = path.join(dir, "keys", "third.key");

  expect(await single(run("id", "edit", "alice", "--key-file", config.secretKeyFile, second, "--threshold", "2"))).toMatch(
    /^rotated [0-9a-f]{64}$/
  );
  const proposed = await single(
    run("id", "edit", "alice", "--key-file", config.secretKeyFile, second, third, "--threshold", "2")
  );
  expect(proposed).toMatch(/^proposed [0-9a-f]{64}, 1 of 2 signatures$/);
  const next = proposed.slice("proposed ".length, "proposed ".length + 64);
  expect((await run("id", "show", "alice"))[2]).toBe("versions 2");

  const cosigner = cli(repo, { config: { ...config, secretKeyFile: second } });
  expect(await single(cosigner("id", "sign", "alice"))).toBe(`rotated ${next}`);
  expect((await run("id", "show", "alice")).slice(1, 4)).toEqual([`version ${next}`, "versions 3", "threshold 2"]);
  await expect(run("id", "sign", "alice")).rejects.toThrow("identity alice has no proposed update");
});

test("cli: drop edits change who may write", async () => {
  const repo = createMemoryRepository();
  const run = cli(repo);
  const { root } = await setupDrop(run);
  const bobKey = path.join(dir, "keys", "bob.key");
  const bob = cli(repo, { config: { ...config, secretKeyFile: bobKey } });
  await bob("id", "init", "bob");

  await expect(bob("topic", "comment", "demo", "let me in", "--identity", "bob")).rejects.toBeInstanceOf(AuthorizationError);

  const policy = await single(run("drop", "edit", "demo", "--identity", "alice", "--member", "alice", "bob"));
  expect(await run("drop", "status", "demo")).toEqual(["records 4", "topics 2", `policy ${policy}`]);
  const thanks = await single(bob("topic", "comment", "demo", "thanks", "--identity", "bob", "--reply-to", root));
  expect((await run("topic", "show", "demo", root))[2]).toBe(`  ${thanks} thanks`);

  await expect(run("drop", "edit", "demo", "--identity", "alice", "--threshold", "2")).rejects.toBeInstanceOf(AuthorizationError);
  await single(run("drop", "edit", "demo", "--identity", "alice", "bob", "--key-file", bobKey, "--threshold", "2"));
  await expect(run("topic", "comment", "demo", "alone", "--identity", "alice")).rejects.toBeInstanceOf(AuthorizationError);

  await single(run("drop", "edit", "demo", "--identity", "alice", "bob", "--key-file", bobKey, "--member", "alice"));
  await expect(bob("topic", "comment", "demo", "still here?", "--identity", "bob")).rejects.toBeInstanceOf(AuthorizationError);
  await single(run("topic", "comment", "demo", "just me again", "--identity", "alice"));
  const policyRecord = (await new DropLog({ repo, name: "demo" }).policy()).drop;
  expect(policyRecord.roles.drop.threshold).toBe(1);
  expect(policyRecord.roles.branches.get("refs/heads/main")?.threshold).toBe(1);
});

test("cli: snapshots, mirrors and patch tips", async () => {
  const repo = createMemoryRepository();
  const run = cli(repo);
  const { root } = await setupDrop(run);
  const file = path.join(dir, "tip.txt");
  await fs.writeFile(file, "patch contents");
  const tip = await single(run("object", file));

  const patch = await single(
    run("topic", "comment", "demo", "try this", "--identity", "alice", "--reply-to", root, "--tip", `feature=${tip}`)
  );
  const record = (await new DropLog({ repo, name: "demo" }).show(root)).find((r) => r.id === patch);
  expect(record?.header.patch?.tips).toEqual([{ name: "refs/heads/feature", oid: tip }]);
  await expect(run("topic", "comment", "demo", "no tip", "--identity", "alice", "--tip", "feature")).rejects.toThrow(
    "expected <branch>=<object hash>, got feature"
  );

  const snapshot = await single(run("drop", "snapshot", "demo", "--identity", "alice", "--message", "weekly", "--tip", `main=${tip}`));
  expect(await run("drop", "snapshots", "demo")).toEqual([`${snapshot} weekly`]);

  expect(await run("drop", "mirrors", "demo")).toEqual([]);
  await single(
    run("drop", "declare-mirrors", "demo", "https://a.example/demo", "packed=https://b.example/demo", "--identity", "alice")
  );
  expect(await run("drop", "mirrors", "demo")).toEqual(["bundled https://a.example/demo", "packed https://b.example/demo"]);
  await expect(run("drop", "declare-mirrors", "demo", "ftp=x", "--identity", "alice")).rejects.toThrow(
    "mirror kind must be bundled, packed or sparse, got ftp"
  );
});

test("cli: pruning forgets unpacked bundles", async () => {
  const run = cli(createMemoryRepository());
  await setupDrop(run);
  const file = await single(run("bundle", "pack", "demo", "--out", path.join(dir, "bundles")));
  const hash = path.basename(file, ".bundle");

  const other = cli(createMemoryRepository());
  await other("bundle", "unpack", "copy", file);
  expect(await other("bundle", "prune", "copy", "--dry-run")).toEqual([hash]);
  expect(await other("bundle", "prune", "copy")).toEqual([hash]);
  expect(await other("bundle", "prune", "copy")).toEqual([]);
  expect((await other("drop", "status", "copy"))[0]).toBe("records 3");
});
