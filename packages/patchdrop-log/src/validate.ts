import type { ContentHash, Drop, Identity, Role, Signed } from "@patchdrop/auth";
import {
  AuthorizationError,
  IntegrityError,
  assertAuthorized,
  branchRoleFor,
  didSign,
  signaturesBySigner,
  verifyIdentity,
} from "@patchdrop/auth";

import type { PatchRecord } from "./record.js";
import { assertRecordId, patchId, recordSigningInput } from "./record.js";
import type { LogState } from "./state.js";
import { wellKnownTopic } from "./topics.js";

export type ValidateOptions = {
  /**
   * Local append rules: the record must reference the current policy and be
   * signed with identity versions that have not been rotated.
   */
  strict: boolean;
  hasObject: (oid: ContentHash) => boolean | Promise<boolean>;
  /** Identity versions shipped alongside the record. */
  identities?: ReadonlyMap<ContentHash, Signed<Identity>>;
  /**
   * Clock of a strict append. Identity expiry is then checked at the later of
   * this time and the record timestamp.
   */
  nowSec?: () => number;
  /** Strict appends only: largest allowed distance between timestamp and `nowSec()`. */
  maxClockSkewSec?: number;
  log?: (line: string) => void;
};

type RoleCheck = { name: string; role: Role };

function rolesFor(record: PatchRecord, policy: Drop | undefined): RoleCheck[] {
  const { message } = record;
  if (message.type === "drop-metadata") {
    const next = { name: "drop", role: message.drop.roles.drop };
    return policy ? [{ name: "drop", role: policy.roles.drop }, next] : [next];
  }
  if (!policy) throw new IntegrityError(`record ${record.id} has no policy in effect`);
  switch (message.type) {
    case "basic":
    case "code-comment":
      return [{ name: "drop", role: policy.roles.drop }];
    case "mirrors":
      return [{ name: "mirrors", role: policy.roles.mirrors }];
    case "checkpoint": {
      if (message.kind === "snapshot") return [{ name: "snapshot", role: policy.roles.snapshot }];
      const tip = record.header.patch?.tips[0];
      if (!tip) throw new IntegrityError("merge point must announce a branch tip");
      const role = branchRoleFor(policy, tip.name);
      if (!role) {
        throw new AuthorizationError(`no role authorizes merge points for ${tip.name}`, { role: `branches:${tip.name}` });
      }
      return [{ name: `branches:${tip.name}`, role }];
    }
    default: {
      const _exhaustive: never = message;
      throw new IntegrityError(`unknown message type: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

function describe(record: PatchRecord): string {
  const { message } = record;
  if (message.type === "checkpoint") return `${message.kind} checkpoint ${record.id}`;
  return `${message.type} record ${record.id}`;
}

/**
 * Checks `record` against the log prefix in `state`: content hash, DAG and
 * topic references, the policy it names, tip objects, and that the role the
 * policy assigns to its message type authorizes its signatures. Identity
 * expiry is evaluated at the record's timestamp, or for strict appends with a
 * clock, at the later of that timestamp and the current time.
 */
export async function validateRecord(state: LogState, record: PatchRecord, opts: ValidateOptions): Promise<void> {
  assertRecordId(record);
  const { header } = record;
  const resolve = (hash: ContentHash) => opts.identities?.get(hash) ?? state.resolveIdentity(hash);
  let evaluatedAt = header.timestamp;
  if (opts.strict && opts.nowSec) {
    const now = opts.nowSec();
    if (opts.maxClockSkewSec !== undefined && Math.abs(header.timestamp - now) > opts.maxClockSkewSec) {
      throw new AuthorizationError(
        `record ${record.id} is stamped ${header.timestamp}, more than ${opts.maxClockSkewSec}s from the current time ${now}`
      );
    }
    evaluatedAt = Math.max(evaluatedAt, now);
  }
  const nowSec = () => evaluatedAt;

  let parentTopic: string | undefined;
  if (header.inReplyTo !== null) {
    const parent = state.records.get(header.inReplyTo);
    if (!parent) throw new IntegrityError(`in_reply_to ${header.inReplyTo} of record ${record.id} does not resolve`);
    parentTopic = state.topicFor(parent);
  }

  const expectedTopic = wellKnownTopic(record);
  if (header.topic !== expectedTopic) {
    throw new IntegrityError(`record ${record.id} must ${expectedTopic ? `name topic ${expectedTopic}` : "not name a topic"}`);
  }
  if (expectedTopic !== null && parentTopic !== undefined && parentTopic !== expectedTopic) {
    throw new IntegrityError(`record ${record.id} replies across topics`);
  }

  let policy: Drop | undefined;
  if (header.policy === null) {
    if (record.message.type !== "drop-metadata") throw new IntegrityError(`record ${record.id} must reference a policy`);
    if (header.inReplyTo !== null) throw new IntegrityError(`genesis record ${record.id} cannot reply to another record`);
    if (state.policies.size > 0) throw new AuthorizationError(`drop is already initialised; ${record.id} is a second genesis`);
  } else {
    policy = state.policies.get(header.policy);
    if (!policy) throw new IntegrityError(`policy ${header.policy} of record ${record.id} is not an earlier drop-metadata record`);
    if (record.message.type === "drop-metadata" && header.inReplyTo !== header.policy) {
      throw new IntegrityError(`policy update ${record.id} must reply to the policy it replaces`);
    }
    const replacedAt = state.supersededAt(header.policy);
    if (replacedAt !== undefined && header.timestamp >= replacedAt) {
      throw new AuthorizationError(
        `policy ${header.policy} was replaced at ${replacedAt}; record ${record.id} is stamped ${header.timestamp}`
      );
    }
    if (opts.strict) {
      const current = state.currentPolicy();
      if (current?.id !== header.policy) {
        throw new AuthorizationError(`stale policy reference ${header.policy}; current policy is ${current?.id ?? "none"}`);
      }
    }
  }

  if (header.patch !== null) {
    if (header.patch.id !== patchId(header.patch.tips)) throw new IntegrityError(`patch id of record ${record.id} does not match its tips`);
    for (const tip of header.patch.tips) {
      if (!(await opts.hasObject(tip.oid))) throw new IntegrityError(`tip ${tip.name} -> ${tip.oid} is not in the object store`);
    }
  }

  const input = recordSigningInput(record.id);
  const author = resolve(header.author);
  if (!author) throw new IntegrityError(`author identity version ${header.author} is unknown`);
  const verifiedAuthor = await verifyIdentity(author, { resolve, nowSec, log: opts.log });
  const authorSignatures = signaturesBySigner(record.signatures).get(header.author) ?? new Map();
  if (!(await didSign(verifiedAuthor.identity, input, authorSignatures, opts.log))) {
    throw new AuthorizationError(`record ${record.id} is not signed by its author ${verifiedAuthor.id}`);
  }

  if (opts.strict) {
    const rotated = (hash: ContentHash) =>
      state.isRotated(hash) || [...(opts.identities?.values() ?? [])].some((v) => v.signed.prev === hash);
    for (const s of record.signatures) {
      if (rotated(s.signer)) throw new AuthorizationError(`identity version ${s.signer} has been rotated; sign with its successor`);
    }
  }

  for (const check of rolesFor(record, policy)) {
    await assertAuthorized(check.role, describe(record), input, record.signatures, {
      resolve,
      nowSec,
      log: opts.log,
      roleName: check.name,
    });
  }
}

/** Identity versions the record's signers need that `state` does not hold yet. */
export function missingIdentities(
  state: LogState,
  record: PatchRecord,
  supplied: ReadonlyMap<ContentHash, Signed<Identity>>
): Map<ContentHash, Signed<Identity>> {
  const out = new Map<ContentHash, Signed<Identity>>();
  const signers = new Set([record.header.author, ...record.signatures.map((s) => s.signer)]);
  for (const start of signers) {
    let hash: ContentHash | null = start;
    while (hash !== null && !state.identities.has(hash) && !out.has(hash)) {
      const version = supplied.get(hash);
      if (!version) break;
      out.set(hash, version);
      hash = version.signed.prev;
    }
  }
  return out;
}
