import fs from "node:fs/promises";
import path from "node:path";

import { Command, InvalidArgumentError } from "commander";

import type { BranchRole, Identity, IdentityId, Role, Signed } from "@patchdrop/auth";
import {
  IntegrityError,
  branchRef,
  createDrop,
  createEd25519Signer,
  createIdentity,
  createSoloDrop,
  formatKey,
  identityHash,
  identitySigningInput,
  isContentHash,
  proposeRotation,
  rotateIdentity,
  signIdentity,
  validSigners,
} from "@patchdrop/auth";
import { pack, readBundleFile, unpack, verifyBundle, writeBundleFile } from "@patchdrop/bundle";
import type { Mirror, Repository, Tip } from "@patchdrop/log";
import { DropLog, SNAPSHOTS_TOPIC, isMirrorKind, subject } from "@patchdrop/log";
import { openSqliteRepository } from "@patchdrop/sqlite-node";
import { createHttpBundleSource, push, sync } from "@patchdrop/sync";

import type { CliConfig } from "./config.js";
import {
  ensureSecretKey,
  listIdentityNames,
  loadAuthor,
  loadIdentityVersions,
  loadProposal,
  saveIdentityVersions,
  saveProposal,
  signerFromFile,
} from "./keyring.js";

export type OpenedRepository = Repository & { close?: () => void };

export type ProgramDeps = {
  config: CliConfig;
  /** Receives one line of command output at a time. */
  out?: (line: string) => void;
  openRepository?: (config: CliConfig) => OpenedRepository | Promise<OpenedRepository>;
  fetch?: typeof globalThis.fetch;
  nowSec?: () => number;
  debug?: boolean;
};

async function openDefaultRepository(config: CliConfig): Promise<OpenedRepository> {
  await fs.mkdir(path.dirname(config.repoPath), { recursive: true });
  return openSqliteRepository(config.repoPath);
}

function parseLine(val: string): number {
  const n = Number(val);
  if (!Number.isSafeInteger(n) || n < 1) throw new InvalidArgumentError(`expected a positive line number, got ${val}`);
  return n;
}

function parseHash(val: string): string {
  if (!isContentHash(val)) throw new InvalidArgumentError(`expected a 64 character hex hash, got ${val}`);
  return val;
}

function parseCount(val: string): number {
  const n = Number(val);
  if (!Number.isSafeInteger(n) || n < 1) throw new InvalidArgumentError(`expected a positive count, got ${val}`);
  return n;
}

function parseExpires(val: string): number {
  const n = Number(val);
  if (!Number.isSafeInteger(n) || n < 0) throw new InvalidArgumentError(`invalid --expires value: ${val}`);
  return n;
}

/** `--tip <branch>=<oid>`, repeatable. */
function collectTip(val: string, previous: Tip[]): Tip[] {
  const at = val.lastIndexOf("=");
  const name = val.slice(0, at);
  const oid = val.slice(at + 1);
  if (at <= 0 || !isContentHash(oid)) throw new InvalidArgumentError(`expected <branch>=<object hash>, got ${val}`);
  return [...previous, { name: branchRef(name), oid }];
}

/** `<kind>=<url>` or a bare URL, which is a bundled mirror. */
function parseMirror(val: string): Mirror {
  const prefixed = /^([a-z]+)=(.*)$/.exec(val);
  const kind = prefixed?.[1] ?? "bundled";
  const url = prefixed?.[2] ?? val;
  if (!isMirrorKind(kind)) throw new InvalidArgumentError(`mirror kind must be bundled, packed or sparse, got ${kind}`);
  if (!URL.canParse(url)) throw new InvalidArgumentError(`not a URL: ${url}`);
  return { url, kind, custom: new Map() };
}

/**
 * Builds the `patchdrop` command tree. Parse errors throw CommanderError
 * rather than exiting, so callers decide how to report them.
 */
export function createProgram(deps: ProgramDeps): Command {
  const { config } = deps;
  const out = deps.out ?? ((line: string) => console.log(line));
  const openRepository = deps.openRepository ?? openDefaultRepository;

  const withRepo = async <T>(fn: (repo: Repository) => Promise<T>): Promise<T> => {
    const repo = await openRepository(config);
    try {
      return await fn(repo);
    } finally {
      repo.close?.();
    }
  };

  const openLog = (repo: Repository, name: string) =>
    new DropLog({ repo, name, nowSec: deps.nowSec, debug: deps.debug });

  const signers = (keyFiles: readonly string[] = []) => Promise.all([config.secretKeyFile, ...keyFiles].map(signerFromFile));

  const author = async (repo: Repository, name: string) => loadAuthor(repo, name, await signers());

  /** Identities co-signing one record, each with whichever of the keys it holds. */
  const authors = async (repo: Repository, names: readonly string[], keyFiles?: readonly string[]) => {
    const available = await signers(keyFiles);
    const list = [];
    for (const name of names) list.push(await loadAuthor(repo, name, available));
    return list;
  };

  const memberId = async (repo: Repository, member: string): Promise<IdentityId> => {
    if (isContentHash(member)) return member;
    const [root] = await loadIdentityVersions(repo, member);
    if (!root) throw new IntegrityError(`identity ${member} has no versions`);
    return identityHash(root.signed);
  };

  /** Rotates once the current version's threshold is met; otherwise stores the proposal. */
  const settleProposal = async (
    repo: Repository,
    name: string,
    versions: readonly Signed<Identity>[],
    proposal: Signed<Identity>
  ): Promise<string> => {
    const current = versions[versions.length - 1];
    if (!current) throw new IntegrityError(`identity ${name} has no versions`);
    const hash = identityHash(proposal.signed);
    const valid = await validSigners(current.signed.keys, identitySigningInput(proposal.signed), proposal.signatures);
    if (valid.size < current.signed.threshold) {
      await saveProposal(repo, name, proposal);
      return `proposed ${hash}, ${valid.size} of ${current.signed.threshold} signatures`;
    }
    const rotated = await rotateIdentity(current, proposal.signed, proposal.signatures);
    await saveIdentityVersions(repo, name, [...versions, rotated], { create: false });
    await saveProposal(repo, name, null);
    return `rotated ${hash}`;
  };

  const program = new Command()
    .name("patchdrop")
    .description("Signed patch discussions that travel as bundles")
    .exitOverride();

  const id = program.command("id").description("manage local identities");

  id.command("init")
    .description("create an identity signed by the configured secret key")
    .argument("<name>", "local name for the identity")
    .option("--expires <unix-sec>", "expiry of this version", parseExpires)
    .action(async (name: string, opts: { expires?: number }) => {
      const { secretKey, created } = await ensureSecretKey(config.secretKeyFile);
      if (created) out(`created secret key ${config.secretKeyFile}`);
      const signer = await createEd25519Signer(secretKey);
      const identity = createIdentity({ keys: [signer.key], expires: opts.expires ?? null });
      const signed: Signed<Identity> = { signed: identity, signatures: await signIdentity(identity, [signer]) };
      await withRepo((repo) => saveIdentityVersions(repo, name, [signed], { create: true }));
      out(identityHash(identity));
    });

  id.command("rotate")
    .description("replace the keys of an identity, signing with the configured key")
    .argument("<name>")
    .requiredOption("--new-key-file <file>", "secret key of the next version; created when missing")
    .action(async (name: string, opts: { newKeyFile: string }) => {
      const nextHash = await withRepo(async (repo) => {
        const versions = await loadIdentityVersions(repo, name);
        const current = await author(repo, name);
        await ensureSecretKey(opts.newKeyFile);
        const nextSigner = await signerFromFile(opts.newKeyFile);
        const next = proposeRotation(current.identity, { keys: [nextSigner.key], threshold: 1 });
        const rotated = await rotateIdentity(current.identity, next, await signIdentity(next, current.signers));
        await saveIdentityVersions(repo, name, [...versions, rotated], { create: false });
        return identityHash(next);
      });
      out(nextHash);
    });

  id.command("edit")
    .description("propose the next version of an identity, signed with the configured key")
    .argument("<name>")
    .requiredOption("--key-file <files...>", "secret keys of the next version; created when missing")
    .option("--threshold <n>", "signatures the next version needs", parseCount, 1)
    .option("--expires <unix-sec>", "expiry of the next version", parseExpires)
    .action(async (name: string, opts: { keyFile: string[]; threshold: number; expires?: number }) => {
      const line = await withRepo(async (repo) => {
        const versions = await loadIdentityVersions(repo, name);
        const current = await author(repo, name);
        const keys = [];
        for (const file of opts.keyFile) {
          await ensureSecretKey(file);
          keys.push((await signerFromFile(file)).key);
        }
        const next = proposeRotation(current.identity, { keys, threshold: opts.threshold, expires: opts.expires });
        return settleProposal(repo, name, versions, { signed: next, signatures: await signIdentity(next, current.signers) });
      });
      out(line);
    });

  id.command("sign")
    .description("add the configured key's signature to the proposed next version")
    .argument("<name>")
    .action(async (name: string) => {
      const line = await withRepo(async (repo) => {
        const proposal = await loadProposal(repo, name);
        if (!proposal) throw new Error(`identity ${name} has no proposed update`);
        const versions = await loadIdentityVersions(repo, name);
        const current = versions[versions.length - 1];
        if (!current || proposal.signed.prev !== identityHash(current.signed)) {
          throw new IntegrityError(`the proposed update of ${name} no longer extends its current version`);
        }
        const signer = await author(repo, name);
        const signatures = new Map(proposal.signatures);
        for (const [key, sig] of await signIdentity(proposal.signed, signer.signers)) signatures.set(key, sig);
        return settleProposal(repo, name, versions, { signed: proposal.signed, signatures });
      });
      out(line);
    });

  id.command("show")
    .argument("<name>")
    .action(async (name: string) => {
      const versions = await withRepo((repo) => loadIdentityVersions(repo, name));
      const root = versions[0];
      const latest = versions[versions.length - 1];
      if (!root || !latest) throw new Error(`identity ${name} has no versions`);
      out(`id ${identityHash(root.signed)}`);
      out(`version ${identityHash(latest.signed)}`);
      out(`versions ${versions.length}`);
      out(`threshold ${latest.signed.threshold}`);
      for (const key of latest.signed.keys) out(`key ${formatKey(key)}`);
      if (latest.signed.expires !== null) out(`expires ${latest.signed.expires}`);
    });

  id.command("ls").action(async () => {
    for (const name of await withRepo((repo) => listIdentityNames(repo))) out(name);
  });

  const drop = program.command("drop").description("create and inspect drops");

  drop
    .command("init")
    .argument("<drop>", "drop name")
    .requiredOption("--identity <name>", "owner identity")
    .requiredOption("--description <text>", "short description of the drop")
    .option("--branch <names...>", `branches the owner may record merge points for (default: ${config.defaultBranch})`)
    .action(async (name: string, opts: { identity: string; description: string; branch?: string[] }) => {
      const policy = await withRepo(async (repo) => {
        const owner = await author(repo, opts.identity);
        const log = await DropLog.init({
          repo,
          name,
          nowSec: deps.nowSec,
          debug: deps.debug,
          drop: createSoloDrop({
            description: opts.description,
            owner: owner.id,
            branches: opts.branch ?? [config.defaultBranch],
          }),
          authors: [owner],
        });
        return (await log.policy()).id;
      });
      out(policy);
    });

  drop
    .command("status")
    .argument("<drop>")
    .action(async (name: string) => {
      await withRepo(async (repo) => {
        const state = await openLog(repo, name).state();
        out(`records ${state.size}`);
        out(`topics ${state.topics.length}`);
        out(`policy ${state.currentPolicy()?.id ?? "none"}`);
      });
    });

  drop
    .command("edit")
    .description("replace the policy; with --member or --threshold every role follows the new drop role")
    .argument("<drop>")
    .requiredOption("--identity <names...>", "identities signing the update")
    .option("--key-file <files...>", "secret keys of co-signing identities")
    .option("--description <text>", "new description")
    .option("--member <ids...>", "identity names or ids forming the drop role")
    .option("--threshold <n>", "signatures the drop role needs", parseCount)
    .option("--branch <names...>", "branches the policy lists merge point roles for")
    .action(
      async (
        name: string,
        opts: { identity: string[]; keyFile?: string[]; description?: string; member?: string[]; threshold?: number; branch?: string[] }
      ) => {
        const policy = await withRepo(async (repo) => {
          const log = openLog(repo, name);
          const current = (await log.policy()).drop;
          let follow: Role | undefined;
          if (opts.member !== undefined || opts.threshold !== undefined) {
            const ids: IdentityId[] = [];
            for (const member of opts.member ?? []) ids.push(await memberId(repo, member));
            const members = opts.member ? ids : current.roles.drop.ids;
            follow = { ids: members, threshold: opts.threshold ?? Math.min(current.roles.drop.threshold, members.length) };
          }
          const refs = opts.branch ? opts.branch.map(branchRef) : [...current.roles.branches.keys()];
          const branches = new Map(
            refs.map((ref): [string, BranchRole] => {
              const existing = current.roles.branches.get(ref);
              const role = follow ?? existing ?? current.roles.drop;
              return [ref, { ids: role.ids, threshold: role.threshold, description: existing?.description ?? null }];
            })
          );
          const next = createDrop({
            description: opts.description ?? current.description,
            drop: follow ?? current.roles.drop,
            snapshot: follow ?? current.roles.snapshot,
            mirrors: follow ?? current.roles.mirrors,
            branches,
            custom: current.custom,
          });
          return log.updatePolicy(next, await authors(repo, opts.identity, opts.keyFile));
        });
        out(policy);
      }
    );

  drop
    .command("snapshot")
    .description("record a snapshot checkpoint")
    .argument("<drop>")
    .requiredOption("--identity <names...>", "identities signing the snapshot")
    .option("--key-file <files...>", "secret keys of co-signing identities")
    .option("--message <text>")
    .option("--tip <branch=oid>", "object the snapshot covers (repeatable)", collectTip, [])
    .action(async (name: string, opts: { identity: string[]; keyFile?: string[]; message?: string; tip: Tip[] }) => {
      const recordId = await withRepo(async (repo) =>
        openLog(repo, name).snapshot(await authors(repo, opts.identity, opts.keyFile), { message: opts.message, tips: opts.tip })
      );
      out(recordId);
    });

  drop
    .command("snapshots")
    .argument("<drop>")
    .action(async (name: string) => {
      const records = await withRepo((repo) => openLog(repo, name).show(SNAPSHOTS_TOPIC));
      for (const record of records) {
        const message = record.message.type === "checkpoint" ? record.message.message : null;
        out(message === null ? record.id : `${record.id} ${subject(record.message)}`);
      }
    });

  drop
    .command("declare-mirrors")
    .description("announce where the drop's bundles can be fetched")
    .argument("<drop>")
    .argument("<mirrors...>", "<kind>=<url> or a URL of a bundled mirror")
    .requiredOption("--identity <names...>", "identities signing the declaration")
    .option("--key-file <files...>", "secret keys of co-signing identities")
    .option("--expires <unix-sec>", "when the declaration stops applying", parseExpires)
    .action(async (name: string, mirrors: string[], opts: { identity: string[]; keyFile?: string[]; expires?: number }) => {
      const parsed = mirrors.map(parseMirror);
      const recordId = await withRepo(async (repo) =>
        openLog(repo, name).declareMirrors(parsed, await authors(repo, opts.identity, opts.keyFile), { expires: opts.expires })
      );
      out(recordId);
    });

  drop
    .command("mirrors")
    .argument("<drop>")
    .action(async (name: string) => {
      for (const mirror of await withRepo((repo) => openLog(repo, name).mirrors())) out(`${mirror.kind} ${mirror.url}`);
    });

  const topic = program.command("topic").description("read and write discussion threads");

  topic
    .command("ls")
    .argument("<drop>")
    .action(async (name: string) => {
      await withRepo(async (repo) => {
        for await (const t of openLog(repo, name).listTopics()) out(`${t.topic} ${t.subject}`);
      });
    });

  topic
    .command("show")
    .argument("<drop>")
    .argument("<topic>", "topic id", parseHash)
    .action(async (name: string, topicId: string) => {
      const records = await withRepo((repo) => openLog(repo, name).show(topicId));
      if (records.length === 0) throw new Error(`topic ${topicId} is not in drop ${name}`);
      const depth = new Map<string, number>();
      for (const record of records) {
        const parent = record.header.inReplyTo;
        const d = parent === null ? 0 : (depth.get(parent) ?? -1) + 1;
        depth.set(record.id, d);
        out(`${"  ".repeat(d)}${record.id} ${subject(record.message)}`);
      }
    });

  topic
    .command("comment")
    .argument("<drop>")
    .argument("<message>")
    .requiredOption("--identity <name>", "author identity")
    .option("--reply-to <record>", "record this comment answers", parseHash)
    .option("--file <path>", "file the comment is about")
    .option("--start <line>", "first line of the range", parseLine)
    .option("--end <line>", "last line of the range", parseLine)
    .option("--tip <branch=oid>", "patch tip the comment proposes (repeatable)", collectTip, [])
    .action(
      async (
        name: string,
        message: string,
        opts: { identity: string; replyTo?: string; file?: string; start?: number; end?: number; tip: Tip[] }
      ) => {
        if ((opts.start !== undefined || opts.end !== undefined) && opts.file === undefined) {
          throw new InvalidArgumentError("--start and --end need --file");
        }
        const recordId = await withRepo(async (repo) =>
          openLog(repo, name).comment(await author(repo, opts.identity), message, {
            inReplyTo: opts.replyTo,
            tips: opts.tip,
            location: opts.file === undefined ? undefined : { file: opts.file, start: opts.start, end: opts.end },
          })
        );
        out(recordId);
      }
    );

  program
    .command("merge-point")
    .description("record the current tip of a branch")
    .argument("<drop>")
    .argument("<tip>", "object hash of the branch tip", parseHash)
    .requiredOption("--identity <name>", "signing identity")
    .option("--branch <name>", "branch name", config.defaultBranch)
    .option("--message <text>")
    .action(async (name: string, tip: string, opts: { identity: string; branch: string; message?: string }) => {
      const recordId = await withRepo(async (repo) =>
        openLog(repo, name).mergePoint(opts.branch, tip, [await author(repo, opts.identity)], { message: opts.message })
      );
      out(recordId);
    });

  program
    .command("object")
    .description("store a file in the object store and print its hash")
    .argument("<file>")
    .action(async (file: string) => {
      const bytes = new Uint8Array(await fs.readFile(file));
      out(await withRepo((repo) => repo.objects.put(bytes)));
    });

  const bundle = program.command("bundle").description("pack, verify and unpack bundle files");

  bundle
    .command("pack")
    .argument("<drop>")
    .option("--topic <id>", "only this topic and what it depends on", parseHash)
    .requiredOption("--out <dir>", "directory for the bundle file")
    .action(async (name: string, opts: { topic?: string; out: string }) => {
      const file = await withRepo(async (repo) => {
        const { bytes } = await pack(openLog(repo, name), opts.topic ? { topic: opts.topic } : { all: true });
        return writeBundleFile(opts.out, bytes);
      });
      out(file);
    });

  bundle
    .command("verify")
    .argument("<file>")
    .action(async (file: string) => {
      const { hash, bytes } = await readBundleFile(file);
      const result = await verifyBundle(bytes, { expectedHash: hash });
      if (!result.ok) throw result.error;
      out(`${hash} ${result.bundle.records.length} records ${result.bundle.identities.length} identities`);
    });

  bundle
    .command("unpack")
    .argument("<drop>")
    .argument("<file>")
    .action(async (name: string, file: string) => {
      const { hash, bytes } = await readBundleFile(file);
      const result = await withRepo((repo) => unpack(openLog(repo, name), bytes, { expectedHash: hash }));
      out(`${result.newRecords.length} new records, ${result.newTopics.length} new topics`);
    });

  bundle
    .command("prune")
    .description("forget received bundles; the published bundle still covers their records")
    .argument("<drop>")
    .option("--dry-run", "only list what would be pruned")
    .action(async (name: string, opts: { dryRun?: boolean }) => {
      const pruned = await withRepo((repo) => openLog(repo, name).pruneBundles({ dryRun: opts.dryRun }));
      for (const hash of pruned) out(hash);
    });

  program
    .command("sync")
    .description("fetch unseen bundles from a sync server, optionally pushing local records")
    .argument("<drop>")
    .argument("<url>", "sync server base URL")
    .option("--remote-drop <name>", "drop name on the server (default: the local name)")
    .option("--push", "publish and submit the local log afterwards")
    .action(async (name: string, url: string, opts: { remoteDrop?: string; push?: boolean }) => {
      const remote = createHttpBundleSource(url, opts.remoteDrop ?? name, { fetch: deps.fetch });
      await withRepo(async (repo) => {
        const log = openLog(repo, name);
        const report = await sync(log, remote, { debug: deps.debug });
        out(`fetched ${report.fetched.length} of ${report.advertised} bundles, ${report.newRecords.length} new records`);
        for (const r of report.rejected) out(`rejected ${r.hash}: ${r.error.message}`);
        if (!opts.push) return;
        const pushed = await push(log, remote, { debug: deps.debug });
        out(pushed.submitted ? `pushed ${pushed.hash}, ${pushed.newRecords.length} new records` : `remote has ${pushed.hash}`);
      });
    });

  return program;
}
