import type { CanonicalMap, CanonicalValue, ContentHash } from "./canonical.js";
import { assertContentHash } from "./canonical.js";
import { AuthorizationError, IntegrityError, isPatchdropError } from "./errors.js";
import { assertArray, assertMap, get, toInteger } from "./internal/fields.js";
import type { IdentityId, IdentityResolver } from "./identity.js";
import { didSign, verifyIdentity } from "./identity.js";
import type { KeyId } from "./keys.js";

export type Role = {
  ids: IdentityId[];
  threshold: number;
};

/** One signature, attributed to the identity version that produced it. */
export type RoleSignature = {
  signer: ContentHash;
  key: KeyId;
  signature: Uint8Array;
};

export type AuthorizeOptions = {
  /** Looks up identity versions by version hash. */
  resolve: IdentityResolver;
  /** Evaluation time for identity expiry. */
  nowSec?: () => number;
  log?: (line: string) => void;
};

export type Authorization = {
  ok: boolean;
  action: string;
  required: number;
  got: number;
  /** Identities that counted toward the threshold. */
  contributors: IdentityId[];
  rejected: { signer: ContentHash; reason: string }[];
};

export function assertRoleShape(role: Role, name: string): void {
  if (new Set(role.ids).size !== role.ids.length) throw new IntegrityError(`role ${name} lists an identity more than once`);
  if (!Number.isSafeInteger(role.threshold) || role.threshold < 1 || role.threshold > role.ids.length) {
    throw new IntegrityError(`role ${name} threshold must be between 1 and ${role.ids.length}`);
  }
}

export function roleToCanonical(role: Role): CanonicalMap {
  return new Map<string, CanonicalValue>([
    ["ids", role.ids],
    ["threshold", role.threshold],
  ]);
}

export function roleFromCanonical(val: unknown, field: string): Role {
  const map = assertMap(val, field);
  const role: Role = {
    ids: assertArray(get(map, "ids", field), `${field}.ids`).map((id, i) => assertContentHash(id, `${field}.ids[${i}]`)),
    threshold: toInteger(get(map, "threshold", field), `${field}.threshold`),
  };
  assertRoleShape(role, field);
  return role;
}

/** Groups signatures by the identity version that made them. */
export function signaturesBySigner(signatures: readonly RoleSignature[]): Map<ContentHash, Map<KeyId, Uint8Array>> {
  const out = new Map<ContentHash, Map<KeyId, Uint8Array>>();
  for (const s of signatures) {
    let group = out.get(s.signer);
    if (!group) {
      group = new Map();
      out.set(s.signer, group);
    }
    group.set(s.key, s.signature);
  }
  return out;
}

/**
 * Counts distinct member identities whose chain verifies, who are not expired
 * at evaluation time, and whose current keys signed `message` to their own
 * threshold. Several keys or versions of one identity count once.
 */
export async function authorizes(
  role: Role,
  action: string,
  message: Uint8Array,
  signatures: readonly RoleSignature[],
  opts: AuthorizeOptions
): Promise<Authorization> {
  const members = new Set(role.ids);
  const contributors = new Set<IdentityId>();
  const rejected: Authorization["rejected"] = [];

  for (const [signer, group] of signaturesBySigner(signatures)) {
    const signed = await opts.resolve(signer);
    if (!signed) {
      rejected.push({ signer, reason: "unknown identity version" });
      continue;
    }
    try {
      const verified = await verifyIdentity(signed, opts);
      if (!members.has(verified.id)) {
        rejected.push({ signer, reason: `identity ${verified.id} is not a member` });
        continue;
      }
      if (!(await didSign(verified.identity, message, group, opts.log))) {
        rejected.push({ signer, reason: "identity threshold not met" });
        continue;
      }
      contributors.add(verified.id);
    } catch (err) {
      if (!isPatchdropError(err)) throw err;
      rejected.push({ signer, reason: err.message });
    }
  }

  return {
    ok: contributors.size >= role.threshold,
    action,
    required: role.threshold,
    got: contributors.size,
    contributors: [...contributors],
    rejected,
  };
}

export async function assertAuthorized(
  role: Role,
  action: string,
  message: Uint8Array,
  signatures: readonly RoleSignature[],
  opts: AuthorizeOptions & { roleName: string }
): Promise<Authorization> {
  const result = await authorizes(role, action, message, signatures, opts);
  if (!result.ok) {
    const detail = result.rejected.map((r) => `${r.signer}: ${r.reason}`).join("; ");
    throw new AuthorizationError(
      `${action}: role ${opts.roleName} requires ${result.required} signing identities, got ${result.got}${
        detail ? ` (${detail})` : ""
      }`,
      { role: opts.roleName, required: result.required, got: result.got }
    );
  }
  return result;
}
