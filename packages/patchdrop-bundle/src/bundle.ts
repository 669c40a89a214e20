import type { CanonicalValue, ContentHash, Identity, Signed } from "@patchdrop/auth";
import {
  AuthorizationError,
  IntegrityError,
  assertArray,
  assertBytes,
  assertMap,
  contentHash,
  decodeCanonical,
  decodeSignedIdentity,
  encodeCanonical,
  encodeSignedIdentity,
  get,
  identityHash,
  toInteger,
} from "@patchdrop/auth";
import type { ApplyResult, DropLog, PackTransport, PatchRecord, TopicId } from "@patchdrop/log";
import { LogState, decodeRecord, encodeRecord, packTransportOf, readPack, validateRecord } from "@patchdrop/log";

export const BUNDLE_TAG = "patchdrop/bundle/v1";
export const BUNDLE_VERSION = 1;

export type Bundle = {
  /** Content hash of the encoded bundle. */
  hash: ContentHash;
  /** Records in canonical dependency order. */
  records: PatchRecord[];
  /** Every identity version the records' signers need, back to each root. */
  identities: Signed<Identity>[];
  /** Objects the records' patch tips point at. */
  pack: Uint8Array;
};

export type BundleSelection = { topic: TopicId } | { all: true };

export type VerifyResult =
  | { ok: true; bundle: Bundle }
  | { ok: false; error: IntegrityError | AuthorizationError };

export type VerifyOptions = {
  /** Hash the bytes are expected to have, e.g. from a file name or URL. */
  expectedHash?: ContentHash;
  packs?: PackTransport;
  log?: (line: string) => void;
};

export type UnpackResult = ApplyResult & { hash: ContentHash };

function compareRecords(a: PatchRecord, b: PatchRecord): number {
  if (a.header.timestamp !== b.header.timestamp) return a.header.timestamp - b.header.timestamp;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function dependencies(record: PatchRecord): string[] {
  const deps: string[] = [];
  if (record.header.inReplyTo !== null) deps.push(record.header.inReplyTo);
  if (record.header.policy !== null && record.header.policy !== record.header.inReplyTo) deps.push(record.header.policy);
  return deps;
}

/**
 * Topological order over `in_reply_to` and policy references. Among records
 * whose dependencies are satisfied the earliest (timestamp, id) goes first,
 * so the order depends on content alone.
 */
export function canonicalOrder(records: readonly PatchRecord[]): PatchRecord[] {
  const byId = new Map(records.map((r) => [r.id, r] as const));
  const pending = new Map<string, number>();
  const dependents = new Map<string, PatchRecord[]>();
  for (const r of byId.values()) {
    const deps = dependencies(r).filter((d) => byId.has(d));
    pending.set(r.id, deps.length);
    for (const d of deps) {
      const list = dependents.get(d);
      if (list) list.push(r);
      else dependents.set(d, [r]);
    }
  }

  const ready = [...byId.values()].filter((r) => pending.get(r.id) === 0);
  const out: PatchRecord[] = [];
  while (ready.length > 0) {
    ready.sort(compareRecords);
    const next = ready.shift();
    if (!next) break;
    out.push(next);
    for (const d of dependents.get(next.id) ?? []) {
      const left = (pending.get(d.id) ?? 0) - 1;
      pending.set(d.id, left);
      if (left === 0) ready.push(d);
    }
  }
  if (out.length !== byId.size) throw new IntegrityError("bundle records form a dependency cycle");
  return out;
}

export function encodeBundle(parts: Omit<Bundle, "hash">): Uint8Array {
  const identities = parts.identities
    .map((signed) => ({ hash: identityHash(signed.signed), bytes: encodeSignedIdentity(signed) }))
    .sort((a, b) => (a.hash < b.hash ? -1 : a.hash > b.hash ? 1 : 0));
  return encodeCanonical(
    new Map<string, CanonicalValue>([
      ["v", BUNDLE_VERSION],
      ["t", BUNDLE_TAG],
      ["records", parts.records.map(encodeRecord)],
      ["identities", identities.map((i) => i.bytes)],
      ["pack", parts.pack],
    ])
  );
}

export function decodeBundle(bytes: Uint8Array): Bundle {
  const map = assertMap(decodeCanonical(bytes, "bundle"), "bundle");
  if (get(map, "t", "bundle") !== BUNDLE_TAG) throw new IntegrityError(`bundle must be tagged ${BUNDLE_TAG}`);
  const version = toInteger(get(map, "v", "bundle"), "bundle.v");
  if (version !== BUNDLE_VERSION) throw new IntegrityError(`bundle version ${version} is not supported`);
  return {
    hash: contentHash(bytes),
    records: assertArray(get(map, "records", "bundle"), "bundle.records").map((r, i) =>
      decodeRecord(assertBytes(r, `bundle.records[${i}]`))
    ),
    identities: assertArray(get(map, "identities", "bundle"), "bundle.identities").map((r, i) =>
      decodeSignedIdentity(assertBytes(r, `bundle.identities[${i}]`))
    ),
    pack: assertBytes(get(map, "pack", "bundle"), "bundle.pack"),
  };
}

function selectRecords(state: LogState, selection: BundleSelection): PatchRecord[] {
  if ("all" in selection) return state.order.flatMap((id) => state.records.get(id) ?? []);
  const records = state.topicRecords(selection.topic);
  if (records.length === 0) throw new IntegrityError(`topic ${selection.topic} is not in the log`);
  return records;
}

/** Selected records plus everything they depend on: parents and the policy chain to genesis. */
function closure(state: LogState, selected: readonly PatchRecord[]): PatchRecord[] {
  const include = new Map<string, PatchRecord>();
  const queue = [...selected];
  for (let r = queue.pop(); r; r = queue.pop()) {
    if (include.has(r.id)) continue;
    include.set(r.id, r);
    for (const dep of dependencies(r)) {
      const parent = state.records.get(dep);
      if (!parent) throw new IntegrityError(`record ${r.id} depends on ${dep}, which is not in the log`);
      queue.push(parent);
    }
  }
  return [...include.values()];
}

function identityChains(state: LogState, records: readonly PatchRecord[]): Signed<Identity>[] {
  const out = new Map<ContentHash, Signed<Identity>>();
  for (const r of records) {
    for (const start of new Set([r.header.author, ...r.signatures.map((s) => s.signer)])) {
      for (let hash: ContentHash | null = start; hash !== null && !out.has(hash); ) {
        const version = state.identities.get(hash);
        if (!version) throw new IntegrityError(`identity version ${hash} used by ${r.id} is not in the log`);
        out.set(hash, version);
        hash = version.signed.prev;
      }
    }
  }
  return [...out.values()];
}

/**
 * Packs a topic (or the whole log) with the records, identity chains and tip
 * objects needed to verify it in isolation.
 */
export async function pack(log: DropLog, selection: BundleSelection = { all: true }): Promise<{ bundle: Bundle; bytes: Uint8Array }> {
  const state = await log.state();
  const records = canonicalOrder(closure(state, selectRecords(state, selection)));
  const oids = records.flatMap((r) => r.header.patch?.tips.map((t) => t.oid) ?? []);
  const parts = {
    records,
    identities: identityChains(state, records),
    pack: await packTransportOf(log.repo).pack(oids),
  };
  const bytes = encodeBundle(parts);
  return { bundle: { hash: contentHash(bytes), ...parts }, bytes };
}

/**
 * Verifies a bundle from its bytes alone: hash, encoding, canonical order,
 * every record's content hash and references, identity chains, and
 * authorization of each record under the policy it was written against.
 */
export async function verifyBundle(bytes: Uint8Array, opts: VerifyOptions = {}): Promise<VerifyResult> {
  try {
    return { ok: true, bundle: await assertBundle(bytes, opts) };
  } catch (err) {
    if (err instanceof IntegrityError || err instanceof AuthorizationError) return { ok: false, error: err };
    throw err;
  }
}

export async function assertBundle(bytes: Uint8Array, opts: VerifyOptions = {}): Promise<Bundle> {
  const hash = contentHash(bytes);
  if (opts.expectedHash !== undefined && opts.expectedHash !== hash) {
    throw new IntegrityError(`bundle hashes to ${hash}, expected ${opts.expectedHash}`);
  }
  const bundle = decodeBundle(bytes);
  const ordered = canonicalOrder(bundle.records);
  if (ordered.some((r, i) => r.id !== bundle.records[i]?.id)) {
    throw new IntegrityError("bundle records are not in canonical order");
  }

  const packed = opts.packs ? opts.packs.contents(bundle.pack) : new Set(readPack(bundle.pack).keys());
  const identities = new Map(bundle.identities.map((s) => [identityHash(s.signed), s] as const));
  const state = new LogState();
  for (const record of bundle.records) {
    if (state.records.has(record.id)) throw new IntegrityError(`bundle repeats record ${record.id}`);
    await validateRecord(state, record, { strict: false, hasObject: (oid) => packed.has(oid), identities, log: opts.log });
    state.apply(record);
  }
  return bundle;
}

/**
 * Verifies and applies a bundle as one atomic log update. Applying the same
 * bundle again changes nothing.
 */
export async function unpack(log: DropLog, bytes: Uint8Array, opts: Omit<VerifyOptions, "packs"> = {}): Promise<UnpackResult> {
  const packs = packTransportOf(log.repo);
  const bundle = await assertBundle(bytes, { ...opts, packs });
  await packs.unpack(bundle.pack);
  const result = await log.applyRecords(bundle.records, {
    identities: bundle.identities,
    knownBundle: { hash: bundle.hash, bytes },
  });
  return { hash: bundle.hash, ...result };
}

/**
 * Packs the whole log and makes it the bundle the log serves. While the head
 * has not moved the published bundle is returned without writing anything.
 */
export async function publishBundle(log: DropLog): Promise<{ hash: ContentHash; bytes: Uint8Array }> {
  const head = await log.head();
  if (head === null) throw new IntegrityError(`drop ${log.name} has no records to publish`);
  const published = await log.publishedBundle();
  if (published?.head === head) {
    const bytes = await log.bundleBytes(published.hash);
    if (bytes) return { hash: published.hash, bytes };
  }
  const { bundle, bytes } = await pack(log);
  await log.setPublishedBundle({ hash: bundle.hash, bytes }, head);
  return { hash: bundle.hash, bytes };
}
