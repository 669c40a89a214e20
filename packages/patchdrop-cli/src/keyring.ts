import fs from "node:fs/promises";
import path from "node:path";

import { bytesToHex, hexToBytes } from "@noble/hashes/utils";

import type { CanonicalValue, ContentHash, Identity, IdentityId, Signed, Signer } from "@patchdrop/auth";
import {
  AuthorizationError,
  ConflictError,
  IntegrityError,
  assertArray,
  assertBytes,
  assertMap,
  createEd25519Signer,
  decodeCanonical,
  decodeSignedIdentity,
  encodeCanonical,
  encodeSignedIdentity,
  get,
  identityHash,
  keyId,
  randomEd25519SecretKey,
} from "@patchdrop/auth";
import type { RecordAuthor, Repository } from "@patchdrop/log";

export const IDENTITY_REF_PREFIX = "refs/ids/";
export const PROPOSAL_REF_PREFIX = "refs/id-proposals/";

const KEYRING_TAG = "patchdrop/keyring/v1";
const IDENTITY_NAME = /^[A-Za-z0-9._-]+$/;

export type LocalAuthor = RecordAuthor & { id: IdentityId; name: string };

function isErrnoException(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

function checkedName(name: string): string {
  if (!IDENTITY_NAME.test(name)) throw new Error(`invalid identity name: ${name}`);
  return name;
}

export function identityRef(name: string): string {
  return `${IDENTITY_REF_PREFIX}${checkedName(name)}`;
}

export async function readSecretKey(file: string): Promise<Uint8Array> {
  const text = (await fs.readFile(file, "utf8")).trim();
  let key: Uint8Array;
  try {
    key = hexToBytes(text);
  } catch (err) {
    throw new IntegrityError(`${file} does not hold a hex secret key`, { cause: err });
  }
  if (key.length !== 32) throw new IntegrityError(`${file} must hold a 32 byte ed25519 secret key`);
  return key;
}

/** Reads the key in `file`, creating it (mode 0600) when missing. */
export async function ensureSecretKey(file: string): Promise<{ secretKey: Uint8Array; created: boolean }> {
  try {
    return { secretKey: await readSecretKey(file), created: false };
  } catch (err) {
    if (!isErrnoException(err, "ENOENT")) throw err;
  }
  const secretKey = randomEd25519SecretKey();
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, `${bytesToHex(secretKey)}\n`, { flag: "wx", mode: 0o600 });
  return { secretKey, created: true };
}

export async function signerFromFile(file: string): Promise<Signer> {
  return createEd25519Signer(await readSecretKey(file));
}

function encodeKeyring(versions: readonly Signed<Identity>[]): Uint8Array {
  return encodeCanonical(
    new Map<string, CanonicalValue>([
      ["t", KEYRING_TAG],
      ["versions", versions.map(encodeSignedIdentity)],
    ])
  );
}

function decodeKeyring(bytes: Uint8Array): Signed<Identity>[] {
  const map = assertMap(decodeCanonical(bytes, "keyring"), "keyring");
  if (get(map, "t", "keyring") !== KEYRING_TAG) throw new IntegrityError(`keyring must be tagged ${KEYRING_TAG}`);
  const versions = assertArray(get(map, "versions", "keyring"), "keyring.versions").map((v, i) =>
    decodeSignedIdentity(assertBytes(v, `keyring.versions[${i}]`))
  );
  if (versions.length === 0) throw new IntegrityError("keyring.versions must not be empty");
  return versions;
}

/** Versions of a stored identity, root first. */
export async function loadIdentityVersions(repo: Repository, name: string): Promise<Signed<Identity>[]> {
  const ref = identityRef(name);
  const hash = await repo.refs.read(ref);
  if (hash === undefined) throw new Error(`no identity named ${name}`);
  const bytes = await repo.objects.get(hash);
  if (!bytes) throw new IntegrityError(`${ref} points at missing object ${hash}`);
  return decodeKeyring(bytes);
}

/**
 * Stores the full version list of `name`. `create` fails when the name is
 * taken; otherwise the ref must still point where it did when loaded.
 */
export async function saveIdentityVersions(
  repo: Repository,
  name: string,
  versions: readonly Signed<Identity>[],
  opts: { create: boolean }
): Promise<ContentHash> {
  const ref = identityRef(name);
  const expected = (await repo.refs.read(ref)) ?? null;
  if (opts.create && expected !== null) throw new ConflictError(`identity ${name} already exists`, { attempts: 1, ref });
  if (!opts.create && expected === null) throw new Error(`no identity named ${name}`);
  const next = await repo.objects.put(encodeKeyring(versions));
  if (!(await repo.refs.update([{ name: ref, expected, next }]))) {
    throw new ConflictError(`identity ${name} changed while it was being saved`, { attempts: 1, ref });
  }
  return next;
}

export async function listIdentityNames(repo: Repository): Promise<string[]> {
  const refs = await repo.refs.list(IDENTITY_REF_PREFIX);
  return [...refs.keys()].map((ref) => ref.slice(IDENTITY_REF_PREFIX.length)).sort();
}

/**
 * The stored identity `name` as a record author. Of `signers`, those holding
 * a current key of the identity sign for it.
 */
export async function loadAuthor(repo: Repository, name: string, signers: readonly Signer[]): Promise<LocalAuthor> {
  const versions = await loadIdentityVersions(repo, name);
  const root = versions[0];
  const identity = versions[versions.length - 1];
  if (!root || !identity) throw new IntegrityError(`identity ${name} has no versions`);
  const current = new Set(identity.signed.keys.map(keyId));
  const own = signers.filter((s) => current.has(keyId(s.key)));
  if (own.length === 0) {
    throw new AuthorizationError(`the configured key is not a current key of identity ${name}`, {
      required: identity.signed.threshold,
      got: 0,
    });
  }
  return {
    name,
    id: identityHash(root.signed),
    identity,
    history: versions.slice(0, -1),
    signers: own,
  };
}

function proposalRef(name: string): string {
  return `${PROPOSAL_REF_PREFIX}${checkedName(name)}`;
}

/** A proposed next version of `name` still collecting signatures. */
export async function loadProposal(repo: Repository, name: string): Promise<Signed<Identity> | undefined> {
  const ref = proposalRef(name);
  const hash = await repo.refs.read(ref);
  if (hash === undefined) return undefined;
  const bytes = await repo.objects.get(hash);
  if (!bytes) throw new IntegrityError(`${ref} points at missing object ${hash}`);
  return decodeSignedIdentity(bytes);
}

/** Stores, replaces or (with null) withdraws the proposal for `name`. */
export async function saveProposal(repo: Repository, name: string, proposal: Signed<Identity> | null): Promise<void> {
  const ref = proposalRef(name);
  const expected = (await repo.refs.read(ref)) ?? null;
  const next = proposal === null ? null : await repo.objects.put(encodeSignedIdentity(proposal));
  if (expected === null && next === null) return;
  if (!(await repo.refs.update([{ name: ref, expected, next }]))) {
    throw new ConflictError(`proposal for identity ${name} changed while it was being saved`, { attempts: 1, ref });
  }
}
