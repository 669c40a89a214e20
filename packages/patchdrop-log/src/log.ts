import type { CanonicalValue, ContentHash, Drop, Identity, Signed } from "@patchdrop/auth";
import {
  ConflictError,
  IntegrityError,
  assertArray,
  assertContentHash,
  assertMap,
  branchRef,
  decodeCanonical,
  decodeSignedIdentity,
  encodeCanonical,
  encodeSignedIdentity,
  get,
  identityHash,
  isContentHash,
  nowUnixSec,
  optional,
  toInteger,
} from "@patchdrop/auth";

import type { Message, Mirror, PatchRecord, RecordAuthor, RecordId, Tip, TopicId } from "./record.js";
import { decodeRecord, encodeRecord, makePatchRef, signRecord, subject } from "./record.js";
import { LogState } from "./state.js";
import type { RefUpdate, Repository } from "./store.js";
import { DROP_TOPIC, MIRRORS_TOPIC, SNAPSHOTS_TOPIC, mergeTopic } from "./topics.js";
import { missingIdentities, validateRecord } from "./validate.js";

const LOG_ENTRY_TAG = "patchdrop/log-entry/v1";

export type DropLogOptions = {
  repo: Repository;
  /** Drop name inside the repository's ref namespace. */
  name: string;
  /** Compare-and-swap attempts before an append surfaces ConflictError. */
  maxRetries?: number;
  nowSec?: () => number;
  /** How far a locally appended record's timestamp may be from `nowSec()`. */
  maxClockSkewSec?: number;
  debug?: boolean;
  log?: (line: string) => void;
};

export type AppendResult = {
  id: RecordId;
  /** False when the record was already in the log. */
  appended: boolean;
};

export type ApplyResult = {
  newRecords: RecordId[];
  newTopics: TopicId[];
};

export type TopicSummary = {
  topic: TopicId;
  root: RecordId;
  subject: string;
};

export type KnownBundle = {
  hash: ContentHash;
  bytes: Uint8Array;
};

type LogEntry = {
  prev: ContentHash | null;
  seq: number;
  record: ContentHash;
  identities: ContentHash[];
};

function encodeEntry(entry: LogEntry): Uint8Array {
  return encodeCanonical(
    new Map<string, CanonicalValue>([
      ["v", 1],
      ["t", LOG_ENTRY_TAG],
      ["prev", entry.prev],
      ["seq", entry.seq],
      ["record", entry.record],
      ["identities", entry.identities],
    ])
  );
}

function decodeEntry(bytes: Uint8Array): LogEntry {
  const map = assertMap(decodeCanonical(bytes, "log entry"), "log entry");
  if (get(map, "t", "log entry") !== LOG_ENTRY_TAG) throw new IntegrityError(`log entry must be tagged ${LOG_ENTRY_TAG}`);
  return {
    prev: optional(map.get("prev"), (v) => assertContentHash(v, "log entry.prev")),
    seq: toInteger(get(map, "seq", "log entry"), "log entry.seq"),
    record: assertContentHash(get(map, "record", "log entry"), "log entry.record"),
    identities: assertArray(get(map, "identities", "log entry"), "log entry.identities").map((h, i) =>
      assertContentHash(h, `log entry.identities[${i}]`)
    ),
  };
}

function identityMapOf(identities: Iterable<Signed<Identity>> = []): Map<ContentHash, Signed<Identity>> {
  const out = new Map<ContentHash, Signed<Identity>>();
  for (const signed of identities) out.set(identityHash(signed.signed), signed);
  return out;
}

function authorIdentities(authors: readonly RecordAuthor[]): Signed<Identity>[] {
  return authors.flatMap((a) => [a.identity, ...(a.history ?? [])]);
}

/**
 * Append-only log of one drop. The log head ref points at the newest entry;
 * each entry links to its predecessor, the record object and any identity
 * versions first needed by that record. Every mutation is a single
 * compare-and-swap of the head ref.
 */
export class DropLog {
  readonly name: string;
  readonly repo: Repository;
  readonly logRef: string;
  readonly bundlesPrefix: string;
  /** Bundle of the whole log this replica last published. */
  readonly publishedRef: string;
  private readonly publishedHeadRef: string;

  private readonly maxRetries: number;
  private readonly nowSec: () => number;
  private readonly maxClockSkewSec: number;
  private readonly debug: boolean;
  private readonly log: (line: string) => void;
  private cache: { head: ContentHash | null; state: LogState } | undefined;

  constructor(opts: DropLogOptions) {
    if (!/^[A-Za-z0-9._-]+$/.test(opts.name)) throw new Error(`invalid drop name: ${opts.name}`);
    this.name = opts.name;
    this.repo = opts.repo;
    this.logRef = `refs/drops/${opts.name}/log`;
    this.bundlesPrefix = `refs/drops/${opts.name}/bundles/`;
    this.publishedRef = `refs/drops/${opts.name}/published`;
    this.publishedHeadRef = `refs/drops/${opts.name}/published-head`;
    this.maxRetries = opts.maxRetries ?? 8;
    this.nowSec = opts.nowSec ?? nowUnixSec;
    this.maxClockSkewSec = opts.maxClockSkewSec ?? 600;
    this.debug = Boolean(opts.debug);
    this.log = opts.log ?? ((line) => console.debug(line));
    if (!Number.isInteger(this.maxRetries) || this.maxRetries < 1) throw new Error(`invalid maxRetries: ${opts.maxRetries}`);
    if (!(this.maxClockSkewSec >= 0)) throw new Error(`invalid maxClockSkewSec: ${opts.maxClockSkewSec}`);
  }

  /** Creates the log with its genesis drop-metadata record. */
  static async init(opts: DropLogOptions & { drop: Drop; authors: readonly RecordAuthor[] }): Promise<DropLog> {
    const log = new DropLog(opts);
    if ((await log.head()) !== null) throw new IntegrityError(`drop ${opts.name} already exists`);
    const author = opts.authors[0];
    if (!author) throw new Error("init needs at least one author");
    const record = await signRecord(
      {
        header: {
          author: identityHash(author.identity.signed),
          timestamp: log.nowSec(),
          patch: null,
          inReplyTo: null,
          policy: null,
          topic: DROP_TOPIC,
        },
        message: { type: "drop-metadata", drop: opts.drop },
      },
      opts.authors
    );
    await log.append(record, { identities: authorIdentities(opts.authors) });
    return log;
  }

  private trace(line: string): void {
    if (this.debug) this.log(`[drop:${this.name}] ${line}`);
  }

  async head(): Promise<ContentHash | null> {
    return (await this.repo.refs.read(this.logRef)) ?? null;
  }

  /** Snapshot of the log at its current head. Treat as read-only. */
  async state(): Promise<LogState> {
    return this.stateAt(await this.head());
  }

  private async stateAt(head: ContentHash | null): Promise<LogState> {
    if (this.cache && this.cache.head === head) return this.cache.state;

    const entries: LogEntry[] = [];
    for (let cursor = head; cursor !== null; ) {
      const bytes = await this.repo.objects.get(cursor);
      if (!bytes) throw new IntegrityError(`log entry ${cursor} is missing from the object store`);
      const entry = decodeEntry(bytes);
      entries.push(entry);
      cursor = entry.prev;
    }
    entries.reverse();

    const state = new LogState();
    for (const entry of entries) {
      for (const hash of entry.identities) state.addIdentity(decodeSignedIdentity(await this.loadObject(hash, "identity")));
      state.apply(decodeRecord(await this.loadObject(entry.record, "record")));
    }
    this.cache = { head, state };
    this.trace(`loaded ${state.size} records at ${head ?? "empty"}`);
    return state;
  }

  private async loadObject(hash: ContentHash, what: string): Promise<Uint8Array> {
    const bytes = await this.repo.objects.get(hash);
    if (!bytes) throw new IntegrityError(`${what} object ${hash} is missing from the object store`);
    return bytes;
  }

  /** Writes record, identity and entry objects and folds them into `state`. */
  private async writeEntry(
    state: LogState,
    prev: ContentHash | null,
    record: PatchRecord,
    supplied: ReadonlyMap<ContentHash, Signed<Identity>>
  ): Promise<ContentHash> {
    const identities: ContentHash[] = [];
    for (const [hash, signed] of missingIdentities(state, record, supplied)) {
      identities.push(await this.repo.objects.put(encodeSignedIdentity(signed)));
      state.addIdentity(signed, hash);
    }
    const entry: LogEntry = {
      prev,
      seq: state.size,
      record: await this.repo.objects.put(encodeRecord(record)),
      identities,
    };
    state.apply(record);
    return this.repo.objects.put(encodeEntry(entry));
  }

  private hasObject = (oid: ContentHash): Promise<boolean> => this.repo.objects.has(oid);

  /**
   * Validates `record` against the current log and appends it. Re-appending a
   * record that is already present is a no-op. Lost races are retried against
   * the new head; after `maxRetries` attempts a ConflictError surfaces.
   */
  async append(record: PatchRecord, opts: { identities?: Iterable<Signed<Identity>> } = {}): Promise<AppendResult> {
    const supplied = identityMapOf(opts.identities);
    for (let attempt = 1; attempt <= this.maxRetries; attempt += 1) {
      const head = await this.head();
      const state = await this.stateAt(head);
      if (state.records.has(record.id)) return { id: record.id, appended: false };

      await validateRecord(state, record, {
        strict: true,
        hasObject: this.hasObject,
        identities: supplied,
        nowSec: this.nowSec,
        maxClockSkewSec: this.maxClockSkewSec,
        log: this.log,
      });
      const next = state.clone();
      const entryHash = await this.writeEntry(next, head, record, supplied);
      if (await this.repo.refs.update([{ name: this.logRef, expected: head, next: entryHash }])) {
        this.cache = { head: entryHash, state: next };
        this.trace(`appended ${record.id}`);
        return { id: record.id, appended: true };
      }
      this.trace(`append ${record.id}: lost race on ${this.logRef} (attempt ${attempt}/${this.maxRetries})`);
    }
    throw new ConflictError(`append to ${this.logRef} lost ${this.maxRetries} compare-and-swap races`, {
      attempts: this.maxRetries,
      ref: this.logRef,
    });
  }

  /**
   * Applies records learned from elsewhere, in order, as one atomic update.
   * Records already present are skipped. Each record only needs the policy it
   * references to precede it. Any failure leaves the log untouched.
   */
  async applyRecords(
    records: readonly PatchRecord[],
    opts: { identities?: Iterable<Signed<Identity>>; knownBundle?: KnownBundle } = {}
  ): Promise<ApplyResult> {
    const supplied = identityMapOf(opts.identities);
    for (let attempt = 1; attempt <= this.maxRetries; attempt += 1) {
      const head = await this.head();
      const state = await this.stateAt(head);
      const knownTopics = new Set(state.topics);
      const next = state.clone();
      const newRecords: RecordId[] = [];
      let cursor = head;

      for (const record of records) {
        if (next.records.has(record.id)) continue;
        await validateRecord(next, record, { strict: false, hasObject: this.hasObject, identities: supplied, log: this.log });
        cursor = await this.writeEntry(next, cursor, record, supplied);
        newRecords.push(record.id);
      }

      const updates: RefUpdate[] = cursor === head ? [] : [{ name: this.logRef, expected: head, next: cursor }];
      if (opts.knownBundle) {
        const ref = `${this.bundlesPrefix}${opts.knownBundle.hash}`;
        if ((await this.repo.refs.read(ref)) === undefined) {
          const stored = await this.repo.objects.put(opts.knownBundle.bytes);
          if (stored !== opts.knownBundle.hash) throw new IntegrityError(`bundle bytes hash to ${stored}, not ${opts.knownBundle.hash}`);
          updates.push({ name: ref, expected: null, next: stored });
        }
      }

      const newTopics: TopicId[] = [];
      for (const id of newRecords) {
        const record = next.records.get(id);
        const topic = record ? next.topicFor(record) : undefined;
        if (topic !== undefined && !knownTopics.has(topic) && !newTopics.includes(topic)) newTopics.push(topic);
      }
      if (updates.length === 0) return { newRecords, newTopics };
      if (await this.repo.refs.update(updates)) {
        if (cursor !== head) this.cache = { head: cursor, state: next };
        this.trace(`applied ${newRecords.length} records`);
        return { newRecords, newTopics };
      }
      this.trace(`apply: lost race on ${this.logRef} (attempt ${attempt}/${this.maxRetries})`);
    }
    throw new ConflictError(`apply to ${this.logRef} lost ${this.maxRetries} compare-and-swap races`, {
      attempts: this.maxRetries,
      ref: this.logRef,
    });
  }

  async has(id: RecordId): Promise<boolean> {
    return (await this.state()).records.has(id);
  }

  async get(id: RecordId): Promise<PatchRecord | undefined> {
    return (await this.state()).records.get(id);
  }

  async size(): Promise<number> {
    return (await this.state()).size;
  }

  /** Topics in order of first appearance. Each iteration reads the log afresh. */
  listTopics(): AsyncIterable<TopicSummary> {
    const load = () => this.state();
    return {
      async *[Symbol.asyncIterator]() {
        const state = await load();
        for (const topic of state.topics) {
          const root = state.topicRecords(topic)[0];
          if (root) yield { topic, root: root.id, subject: subject(root.message) };
        }
      },
    };
  }

  async show(topic: TopicId): Promise<PatchRecord[]> {
    return (await this.state()).thread(topic);
  }

  async topicOf(id: RecordId): Promise<TopicId | undefined> {
    const state = await this.state();
    const record = state.records.get(id);
    return record ? state.topicFor(record) : undefined;
  }

  async policy(): Promise<{ id: RecordId; drop: Drop }> {
    const current = (await this.state()).currentPolicy();
    if (!current) throw new IntegrityError(`drop ${this.name} has no policy; it has not been initialised`);
    return current;
  }

  /** The policy a record was authorized under. */
  async policyAt(id: RecordId): Promise<Drop> {
    const state = await this.state();
    const record = state.records.get(id);
    if (!record) throw new IntegrityError(`record ${id} is not in the log`);
    const policyId = record.message.type === "drop-metadata" && record.header.policy === null ? record.id : record.header.policy;
    const drop = policyId === null ? undefined : state.policies.get(policyId);
    if (!drop) throw new IntegrityError(`policy of record ${id} is not in the log`);
    return drop;
  }

  /** Builds, signs and appends a record against the current policy. */
  async create(opts: {
    authors: readonly RecordAuthor[];
    message: Message;
    inReplyTo?: RecordId | null;
    tips?: readonly Tip[];
    topic?: TopicId | null;
  }): Promise<AppendResult> {
    const author = opts.authors[0];
    if (!author) throw new Error("a record needs at least one author");
    const policy = await this.policy();
    const record = await signRecord(
      {
        header: {
          author: identityHash(author.identity.signed),
          timestamp: this.nowSec(),
          patch: opts.tips && opts.tips.length > 0 ? makePatchRef(opts.tips) : null,
          inReplyTo: opts.inReplyTo ?? null,
          policy: policy.id,
          topic: opts.topic ?? null,
        },
        message: opts.message,
      },
      opts.authors
    );
    return this.append(record, { identities: authorIdentities(opts.authors) });
  }

  async comment(
    author: RecordAuthor,
    message: string,
    opts: { inReplyTo?: RecordId; tips?: readonly Tip[]; location?: { file: string; start?: number; end?: number } } = {}
  ): Promise<RecordId> {
    const body: Message = opts.location
      ? {
          type: "code-comment",
          location: { file: opts.location.file, start: opts.location.start ?? null, end: opts.location.end ?? null },
          message,
        }
      : { type: "basic", message };
    const result = await this.create({ authors: [author], message: body, inReplyTo: opts.inReplyTo, tips: opts.tips });
    return result.id;
  }

  /** Replaces the policy. Needs the current and the new `drop` role. */
  async updatePolicy(drop: Drop, authors: readonly RecordAuthor[]): Promise<RecordId> {
    const current = await this.policy();
    const result = await this.create({
      authors,
      message: { type: "drop-metadata", drop },
      inReplyTo: current.id,
      topic: DROP_TOPIC,
    });
    return result.id;
  }

  /**
   * Records `tip` as the current state of `branch`, threading onto the
   * branch's merge topic after the previous merge point.
   */
  async mergePoint(
    branch: string,
    tip: ContentHash,
    authors: readonly RecordAuthor[],
    opts: { message?: string } = {}
  ): Promise<RecordId> {
    if (!isContentHash(tip)) throw new IntegrityError(`tip must be a content hash: ${tip}`);
    const previous = (await this.state()).latestMergePoint(branch);
    const result = await this.create({
      authors,
      message: { type: "checkpoint", kind: "merge", message: opts.message ?? null },
      inReplyTo: previous?.id ?? null,
      tips: [{ name: branchRef(branch), oid: tip }],
      topic: mergeTopic(branch),
    });
    return result.id;
  }

  async latestMergePoint(branch: string): Promise<PatchRecord | undefined> {
    return (await this.state()).latestMergePoint(branch);
  }

  async snapshot(authors: readonly RecordAuthor[], opts: { message?: string; tips?: readonly Tip[] } = {}): Promise<RecordId> {
    const previous = (await this.state()).latestInTopic(SNAPSHOTS_TOPIC);
    const result = await this.create({
      authors,
      message: { type: "checkpoint", kind: "snapshot", message: opts.message ?? null },
      inReplyTo: previous?.id ?? null,
      tips: opts.tips,
      topic: SNAPSHOTS_TOPIC,
    });
    return result.id;
  }

  async declareMirrors(
    mirrors: readonly Mirror[],
    authors: readonly RecordAuthor[],
    opts: { expires?: number } = {}
  ): Promise<RecordId> {
    const previous = (await this.state()).latestInTopic(MIRRORS_TOPIC);
    const result = await this.create({
      authors,
      message: { type: "mirrors", mirrors: [...mirrors], expires: opts.expires ?? null },
      inReplyTo: previous?.id ?? null,
      topic: MIRRORS_TOPIC,
    });
    return result.id;
  }

  /** Mirrors from the latest unexpired declaration. */
  async mirrors(): Promise<Mirror[]> {
    const latest = (await this.state()).latestInTopic(MIRRORS_TOPIC);
    if (!latest || latest.message.type !== "mirrors") return [];
    const { expires } = latest.message;
    if (expires !== null && expires < this.nowSec()) return [];
    return latest.message.mirrors;
  }

  /** Hashes of bundles this log has applied or published. */
  async knownBundles(): Promise<ContentHash[]> {
    const refs = await this.repo.refs.list(this.bundlesPrefix);
    const hashes = new Set([...refs.keys()].map((name) => name.slice(this.bundlesPrefix.length)).filter(isContentHash));
    const published = await this.repo.refs.read(this.publishedRef);
    if (published !== undefined) hashes.add(published);
    return [...hashes].sort();
  }

  async bundleBytes(hash: ContentHash): Promise<Uint8Array | undefined> {
    const known =
      (await this.repo.refs.read(`${this.bundlesPrefix}${hash}`)) !== undefined ||
      (await this.repo.refs.read(this.publishedRef)) === hash;
    return known ? this.repo.objects.get(hash) : undefined;
  }

  /** The bundle last published of this log, and the head it was packed at. */
  async publishedBundle(): Promise<{ hash: ContentHash; head: ContentHash } | undefined> {
    const hash = await this.repo.refs.read(this.publishedRef);
    const head = await this.repo.refs.read(this.publishedHeadRef);
    return hash !== undefined && head !== undefined ? { hash, head } : undefined;
  }

  /**
   * Replaces the published bundle with `bundle`, a pack of the log at `head`.
   * The previous one is deleted unless it was also received. Resolves false
   * when a concurrent publish moved the refs first.
   */
  async setPublishedBundle(bundle: KnownBundle, head: ContentHash): Promise<boolean> {
    const stored = await this.repo.objects.put(bundle.bytes);
    if (stored !== bundle.hash) throw new IntegrityError(`bundle bytes hash to ${stored}, not ${bundle.hash}`);
    const previous = (await this.repo.refs.read(this.publishedRef)) ?? null;
    const previousHead = (await this.repo.refs.read(this.publishedHeadRef)) ?? null;
    const swapped = await this.repo.refs.update([
      { name: this.publishedRef, expected: previous, next: stored },
      { name: this.publishedHeadRef, expected: previousHead, next: head },
    ]);
    if (swapped && previous !== null && previous !== stored) await this.dropBundleObject(previous);
    if (swapped) this.trace(`published ${stored} at ${head}`);
    return swapped;
  }

  /**
   * Forgets every received bundle other than the published one. Their records
   * stay in the log; a later sync may fetch a forgotten bundle again.
   */
  async pruneBundles(opts: { dryRun?: boolean } = {}): Promise<ContentHash[]> {
    const published = await this.repo.refs.read(this.publishedRef);
    const refs = await this.repo.refs.list(this.bundlesPrefix);
    const pruned: ContentHash[] = [];
    for (const [name, target] of refs) {
      const hash = name.slice(this.bundlesPrefix.length);
      if (!isContentHash(hash)) continue;
      pruned.push(hash);
      if (opts.dryRun) continue;
      if (!(await this.repo.refs.update([{ name, expected: target, next: null }]))) {
        throw new ConflictError(`bundle ref ${name} changed while pruning`, { attempts: 1, ref: name });
      }
      if (hash !== published) await this.repo.objects.delete(hash);
    }
    this.trace(`pruned ${pruned.length} bundles`);
    return pruned.sort();
  }

  private async dropBundleObject(hash: ContentHash): Promise<void> {
    if ((await this.repo.refs.read(`${this.bundlesPrefix}${hash}`)) !== undefined) return;
    await this.repo.objects.delete(hash);
  }
}
