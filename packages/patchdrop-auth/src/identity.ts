import { utf8ToBytes } from "@noble/hashes/utils";

import type { CanonicalMap, CanonicalValue, ContentHash } from "./canonical.js";
import { assertContentHash, decodeCanonical, encodeCanonical, hashCanonical, toCanonicalValue } from "./canonical.js";
import { AuthorizationError, IntegrityError } from "./errors.js";
import { concatBytes } from "./internal/bytes.js";
import { assertArray, assertBytes, assertMap, assertString, get, mapGet, optional, toInteger } from "./internal/fields.js";
import type { KeyId, Signer, VerificationKey } from "./keys.js";
import { keyFromCanonical, keyId, keyToCanonical, verifySignature } from "./keys.js";

export const IDENTITY_FMT_VERSION = 1;

const IDENTITY_SIG_V1_DOMAIN = utf8ToBytes("patchdrop/identity/v1");

/** Version hash of the root identity. Stable across rotations. */
export type IdentityId = ContentHash;

export type Identity = {
  fmtVersion: number;
  /** Version hash of the identity this one rotates; null for the root. */
  prev: ContentHash | null;
  keys: VerificationKey[];
  threshold: number;
  mirrors: string[];
  /** Unix seconds. */
  expires: number | null;
  custom: CanonicalMap;
};

export type Signatures = ReadonlyMap<KeyId, Uint8Array>;

export type Signed<T> = {
  signed: T;
  signatures: Signatures;
};

export type IdentityResolver = (
  versionHash: ContentHash
) => Signed<Identity> | undefined | Promise<Signed<Identity> | undefined>;

export type VerifiedIdentity = {
  id: IdentityId;
  /** Hash of the version that was verified. */
  hash: ContentHash;
  identity: Identity;
  /** Version hashes from the verified version back to the root. */
  chain: ContentHash[];
};

export type IdentityVerifyOptions = {
  resolve: IdentityResolver;
  /** Point in time the current version must not be expired at. */
  nowSec?: () => number;
  log?: (line: string) => void;
};

export function nowUnixSec(): number {
  return Math.floor(Date.now() / 1000);
}

export function createIdentity(opts: {
  keys: VerificationKey[];
  threshold?: number;
  mirrors?: string[];
  expires?: number | null;
  custom?: CanonicalMap;
}): Identity {
  const identity: Identity = {
    fmtVersion: IDENTITY_FMT_VERSION,
    prev: null,
    keys: opts.keys,
    threshold: opts.threshold ?? 1,
    mirrors: opts.mirrors ?? [],
    expires: opts.expires ?? null,
    custom: opts.custom ?? new Map(),
  };
  assertIdentityShape(identity);
  return identity;
}

/** Builds the unsigned successor of `old`. */
export function proposeRotation(
  old: Signed<Identity>,
  opts: { keys: VerificationKey[]; threshold: number; mirrors?: string[]; expires?: number | null; custom?: CanonicalMap }
): Identity {
  const next: Identity = {
    fmtVersion: IDENTITY_FMT_VERSION,
    prev: identityHash(old.signed),
    keys: opts.keys,
    threshold: opts.threshold,
    mirrors: opts.mirrors ?? old.signed.mirrors,
    expires: opts.expires === undefined ? old.signed.expires : opts.expires,
    custom: opts.custom ?? old.signed.custom,
  };
  assertIdentityShape(next);
  return next;
}

function assertIdentityShape(identity: Identity): void {
  if (identity.fmtVersion > IDENTITY_FMT_VERSION) {
    throw new IntegrityError(`identity format version ${identity.fmtVersion} is not supported`);
  }
  if (identity.keys.length === 0) throw new IntegrityError("identity must list at least one key");
  const ids = new Set(identity.keys.map(keyId));
  if (ids.size !== identity.keys.length) throw new IntegrityError("identity lists a key more than once");
  if (!Number.isSafeInteger(identity.threshold) || identity.threshold < 1 || identity.threshold > identity.keys.length) {
    throw new IntegrityError(`identity threshold must be between 1 and ${identity.keys.length}`);
  }
}

export function identityToCanonical(identity: Identity): CanonicalMap {
  return new Map<string, CanonicalValue>([
    ["v", identity.fmtVersion],
    ["prev", identity.prev],
    ["keys", identity.keys.map(keyToCanonical)],
    ["threshold", identity.threshold],
    ["mirrors", identity.mirrors],
    ["expires", identity.expires],
    ["custom", identity.custom],
  ]);
}

export function identityFromCanonical(val: unknown, field = "identity"): Identity {
  const map = assertMap(val, field);
  const custom = toCanonicalValue(mapGet(map, "custom") ?? new Map(), `${field}.custom`);
  if (!(custom instanceof Map)) throw new IntegrityError(`${field}.custom must be a map`);
  const identity: Identity = {
    fmtVersion: toInteger(get(map, "v", field), `${field}.v`),
    prev: optional(mapGet(map, "prev"), (v) => assertContentHash(v, `${field}.prev`)),
    keys: assertArray(get(map, "keys", field), `${field}.keys`).map((k, i) => keyFromCanonical(k, `${field}.keys[${i}]`)),
    threshold: toInteger(get(map, "threshold", field), `${field}.threshold`),
    mirrors: assertArray(mapGet(map, "mirrors") ?? [], `${field}.mirrors`).map((m, i) =>
      assertString(m, `${field}.mirrors[${i}]`)
    ),
    expires: optional(mapGet(map, "expires"), (v) => toInteger(v, `${field}.expires`)),
    custom,
  };
  assertIdentityShape(identity);
  return identity;
}

export function identityHash(identity: Identity): ContentHash {
  return hashCanonical(identityToCanonical(identity));
}

export function identitySigningInput(identity: Identity): Uint8Array {
  return concatBytes(IDENTITY_SIG_V1_DOMAIN, new Uint8Array([0]), encodeCanonical(identityToCanonical(identity)));
}

export async function signIdentity(identity: Identity, signers: readonly Signer[]): Promise<Map<KeyId, Uint8Array>> {
  const msg = identitySigningInput(identity);
  const out = new Map<KeyId, Uint8Array>();
  for (const signer of signers) out.set(keyId(signer.key), await signer.sign(msg));
  return out;
}

export function encodeSignedIdentity(signed: Signed<Identity>): Uint8Array {
  return encodeCanonical(
    new Map<string, CanonicalValue>([
      ["identity", identityToCanonical(signed.signed)],
      ["signatures", new Map<string, CanonicalValue>(signed.signatures)],
    ])
  );
}

export function decodeSignedIdentity(bytes: Uint8Array): Signed<Identity> {
  const map = assertMap(decodeCanonical(bytes, "signed identity"), "signed identity");
  const signed = identityFromCanonical(get(map, "identity", "signed identity"));
  const signatures = new Map<KeyId, Uint8Array>();
  for (const [k, v] of assertMap(get(map, "signatures", "signed identity"), "signed identity.signatures")) {
    signatures.set(assertContentHash(k, "signature key id"), assertBytes(v, "signature"));
  }
  return { signed, signatures };
}

/**
 * Distinct keys among `keys` holding a valid signature over `message`.
 * Signatures by unknown keys and invalid signatures are skipped.
 */
export async function validSigners(
  keys: readonly VerificationKey[],
  message: Uint8Array,
  signatures: Signatures,
  log?: (line: string) => void
): Promise<Set<KeyId>> {
  const valid = new Set<KeyId>();
  for (const key of keys) {
    const id = keyId(key);
    const sig = signatures.get(id);
    if (!sig) continue;
    if (await verifySignature(key, message, sig)) valid.add(id);
    else log?.(`skipping invalid signature by key ${id}`);
  }
  return valid;
}

/**
 * Walks the rotation chain from `signed` back to the root. Every version needs
 * `threshold` valid signatures from the keys of the version it replaces; the
 * root signs itself. Only the verified version is checked for expiry.
 */
export async function verifyIdentity(signed: Signed<Identity>, opts: IdentityVerifyOptions): Promise<VerifiedIdentity> {
  const hash = identityHash(signed.signed);
  const nowSec = opts.nowSec ?? nowUnixSec;
  const expires = signed.signed.expires;
  if (expires !== null && expires < nowSec()) {
    throw new AuthorizationError(`identity ${hash} expired at ${expires}`);
  }

  const chain = [hash];
  let current = signed;
  let currentHash = hash;
  for (;;) {
    assertIdentityShape(current.signed);
    const prevHash = current.signed.prev;
    const authority = prevHash === null ? current : await opts.resolve(prevHash);
    if (!authority) throw new IntegrityError(`identity ${currentHash}: previous version ${prevHash} is unknown`);
    if (prevHash !== null && identityHash(authority.signed) !== prevHash) {
      throw new IntegrityError(`identity ${currentHash}: previous version does not match ${prevHash}`);
    }

    const valid = await validSigners(authority.signed.keys, identitySigningInput(current.signed), current.signatures, opts.log);
    if (valid.size < authority.signed.threshold) {
      throw new AuthorizationError(
        `identity ${currentHash}: ${valid.size} of ${authority.signed.threshold} required signatures from ${
          prevHash === null ? "its own" : "previous"
        } keys`,
        { required: authority.signed.threshold, got: valid.size }
      );
    }

    if (prevHash === null) break;
    if (chain.includes(prevHash)) throw new IntegrityError(`identity ${hash}: rotation chain loops at ${prevHash}`);
    chain.push(prevHash);
    current = authority;
    currentHash = prevHash;
  }

  return { id: currentHash, hash, identity: signed.signed, chain };
}

export async function isIdentityValid(signed: Signed<Identity>, opts: IdentityVerifyOptions): Promise<boolean> {
  try {
    await verifyIdentity(signed, opts);
    return true;
  } catch (err) {
    if (err instanceof AuthorizationError || err instanceof IntegrityError) return false;
    throw err;
  }
}

/**
 * Completes a rotation of `old` to `next`. Fails unless `signatures` carry
 * `old.threshold` valid signatures from keys of `old`.
 */
export async function rotateIdentity(
  old: Signed<Identity>,
  next: Identity,
  signatures: Signatures,
  opts: { log?: (line: string) => void } = {}
): Promise<Signed<Identity>> {
  const oldHash = identityHash(old.signed);
  if (next.prev !== oldHash) throw new IntegrityError(`rotation must reference ${oldHash} as prev`);
  assertIdentityShape(next);
  const valid = await validSigners(old.signed.keys, identitySigningInput(next), signatures, opts.log);
  if (valid.size < old.signed.threshold) {
    throw new AuthorizationError(
      `rotation of ${oldHash} needs ${old.signed.threshold} signatures from its keys, got ${valid.size}`,
      { required: old.signed.threshold, got: valid.size }
    );
  }
  return { signed: next, signatures };
}

/** True when the identity's current keys signed `message` to its own threshold. */
export async function didSign(
  identity: Identity,
  message: Uint8Array,
  signatures: Signatures,
  log?: (line: string) => void
): Promise<boolean> {
  const valid = await validSigners(identity.keys, message, signatures, log);
  return valid.size >= identity.threshold;
}
