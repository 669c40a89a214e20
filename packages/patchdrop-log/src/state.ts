import type { ContentHash, Drop, Identity, Signed } from "@patchdrop/auth";
import { identityHash } from "@patchdrop/auth";

import type { PatchRecord, RecordId, TopicId } from "./record.js";
import { mergeTopic } from "./topics.js";

function compareRecords(a: PatchRecord, b: PatchRecord): number {
  if (a.header.timestamp !== b.header.timestamp) return a.header.timestamp - b.header.timestamp;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/** Orders records by timestamp, then id. */
export function byTimestampThenId(records: Iterable<PatchRecord>): PatchRecord[] {
  return [...records].sort(compareRecords);
}

function latest(records: Iterable<PatchRecord>): PatchRecord | undefined {
  let best: PatchRecord | undefined;
  for (const r of records) if (!best || compareRecords(r, best) > 0) best = r;
  return best;
}

/**
 * Fold over a log prefix: every record and identity version seen so far, the
 * derived topic index and the policy history. Built once per log head and
 * extended through `clone()` + `apply()`.
 */
export class LogState {
  private readonly recordMap = new Map<RecordId, PatchRecord>();
  private readonly orderList: RecordId[] = [];
  private readonly topicOf = new Map<RecordId, TopicId>();
  private readonly topicMembers = new Map<TopicId, RecordId[]>();
  private readonly identityMap = new Map<ContentHash, Signed<Identity>>();
  private readonly rotatedVersions = new Set<ContentHash>();
  private readonly policyMap = new Map<RecordId, Drop>();
  /** Policy id to the earliest timestamp of an update that replaced it. */
  private readonly supersededPolicies = new Map<RecordId, number>();

  get size(): number {
    return this.orderList.length;
  }

  get records(): ReadonlyMap<RecordId, PatchRecord> {
    return this.recordMap;
  }

  /** Record ids in log order. */
  get order(): readonly RecordId[] {
    return this.orderList;
  }

  /** Topics in order of first appearance. */
  get topics(): TopicId[] {
    return [...this.topicMembers.keys()];
  }

  get identities(): ReadonlyMap<ContentHash, Signed<Identity>> {
    return this.identityMap;
  }

  get policies(): ReadonlyMap<RecordId, Drop> {
    return this.policyMap;
  }

  clone(): LogState {
    const next = new LogState();
    for (const [hash, signed] of this.identityMap) next.addIdentity(signed, hash);
    for (const id of this.orderList) {
      const record = this.recordMap.get(id);
      if (record) next.apply(record);
    }
    return next;
  }

  resolveIdentity = (hash: ContentHash): Signed<Identity> | undefined => this.identityMap.get(hash);

  addIdentity(signed: Signed<Identity>, hash: ContentHash = identityHash(signed.signed)): ContentHash {
    if (this.identityMap.has(hash)) return hash;
    this.identityMap.set(hash, signed);
    if (signed.signed.prev !== null) this.rotatedVersions.add(signed.signed.prev);
    return hash;
  }

  /** True when some known identity version names `hash` as its predecessor. */
  isRotated(hash: ContentHash): boolean {
    return this.rotatedVersions.has(hash);
  }

  /** Topic a record belongs to, whether or not it has been applied yet. */
  topicFor(record: PatchRecord): TopicId | undefined {
    const known = this.topicOf.get(record.id);
    if (known) return known;
    if (record.header.topic !== null) return record.header.topic;
    if (record.header.inReplyTo === null) return record.id;
    return this.topicOf.get(record.header.inReplyTo);
  }

  /** Appends a validated record. */
  apply(record: PatchRecord): void {
    if (this.recordMap.has(record.id)) return;
    const topic = this.topicFor(record) ?? record.id;
    this.recordMap.set(record.id, record);
    this.orderList.push(record.id);
    this.topicOf.set(record.id, topic);
    const members = this.topicMembers.get(topic);
    if (members) members.push(record.id);
    else this.topicMembers.set(topic, [record.id]);

    if (record.message.type === "drop-metadata") {
      this.policyMap.set(record.id, record.message.drop);
      const replaced = record.header.policy;
      if (replaced !== null) {
        const at = this.supersededPolicies.get(replaced);
        if (at === undefined || record.header.timestamp < at) this.supersededPolicies.set(replaced, record.header.timestamp);
      }
    }
  }

  topicRecords(topic: TopicId): PatchRecord[] {
    const out: PatchRecord[] = [];
    for (const id of this.topicMembers.get(topic) ?? []) {
      const r = this.recordMap.get(id);
      if (r) out.push(r);
    }
    return out;
  }

  /** Timestamp from which `policy` no longer governs, if it has been replaced. */
  supersededAt(policy: RecordId): number | undefined {
    return this.supersededPolicies.get(policy);
  }

  /**
   * The policy new local records must reference: the latest policy without a
   * successor. Concurrent policy updates learned through sync fork the
   * history; the fork with the latest (timestamp, id) wins.
   */
  currentPolicy(): { id: RecordId; drop: Drop } | undefined {
    const leaves: PatchRecord[] = [];
    for (const id of this.policyMap.keys()) {
      const r = this.recordMap.get(id);
      if (r && !this.supersededPolicies.has(id)) leaves.push(r);
    }
    const head = latest(leaves);
    const drop = head ? this.policyMap.get(head.id) : undefined;
    return head && drop ? { id: head.id, drop } : undefined;
  }

  latestInTopic(topic: TopicId): PatchRecord | undefined {
    return latest(this.topicRecords(topic));
  }

  latestMergePoint(branch: string): PatchRecord | undefined {
    return this.latestInTopic(mergeTopic(branch));
  }

  /**
   * Thread in depth-first pre-order. Roots and siblings are ordered by
   * timestamp, then id.
   */
  thread(topic: TopicId): PatchRecord[] {
    const records = this.topicRecords(topic);
    const inTopic = new Set(records.map((r) => r.id));
    const children = new Map<RecordId, PatchRecord[]>();
    const roots: PatchRecord[] = [];
    for (const r of records) {
      const parent = r.header.inReplyTo;
      if (parent === null || !inTopic.has(parent)) {
        roots.push(r);
        continue;
      }
      const siblings = children.get(parent);
      if (siblings) siblings.push(r);
      else children.set(parent, [r]);
    }

    const out: PatchRecord[] = [];
    const stack = byTimestampThenId(roots).reverse();
    for (let next = stack.pop(); next; next = stack.pop()) {
      out.push(next);
      stack.push(...byTimestampThenId(children.get(next.id) ?? []).reverse());
    }
    return out;
  }
}
