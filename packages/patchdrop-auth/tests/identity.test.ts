import { expect, test } from "vitest";

import { AuthorizationError, IntegrityError } from "../src/errors.js";
import type { Identity, Signed } from "../src/identity.js";
import {
  createIdentity,
  decodeSignedIdentity,
  encodeSignedIdentity,
  identityHash,
  isIdentityValid,
  proposeRotation,
  rotateIdentity,
  signIdentity,
  verifyIdentity,
} from "../src/identity.js";
import type { Signer } from "../src/keys.js";
import { createEd25519Signer, createWebCryptoSigner, keyId } from "../src/keys.js";

async function selfSigned(signers: Signer[], threshold: number, opts: { expires?: number } = {}): Promise<Signed<Identity>> {
  const identity = createIdentity({ keys: signers.map((s) => s.key), threshold, expires: opts.expires });
  return { signed: identity, signatures: await signIdentity(identity, signers) };
}

function resolverOf(...versions: Signed<Identity>[]) {
  const byHash = new Map(versions.map((v) => [identityHash(v.signed), v] as const));
  return (hash: string) => byHash.get(hash);
}

test("identity: root verifies when self-signed to threshold", async () => {
  const [k1, k2, k3] = await Promise.all([createEd25519Signer(), createEd25519Signer(), createEd25519Signer()]);
  const root = await selfSigned([k1, k2, k3], 2);

  const verified = await verifyIdentity(root, { resolve: resolverOf(root) });
  expect(verified.id).toBe(identityHash(root.signed));
  expect(verified.hash).toBe(verified.id);
  expect(verified.chain).toEqual([verified.id]);
});

test("identity: root below its own threshold is rejected", async () => {
  const [k1, k2] = await Promise.all([createEd25519Signer(), createEd25519Signer()]);
  const identity = createIdentity({ keys: [k1.key, k2.key], threshold: 2 });
  const root = { signed: identity, signatures: await signIdentity(identity, [k1]) };

  await expect(verifyIdentity(root, { resolve: resolverOf(root) })).rejects.toThrow(AuthorizationError);
  expect(await isIdentityValid(root, { resolve: resolverOf(root) })).toBe(false);
});

test("identity: rotation signed by one of [K1,K2,K3] with threshold 2 fails, two succeed", async () => {
  const [k1, k2, k3, k4] = await Promise.all([
    createEd25519Signer(),
    createEd25519Signer(),
    createEd25519Signer(),
    createEd25519Signer(),
  ]);
  const root = await selfSigned([k1, k2, k3], 2);
  const next = proposeRotation(root, { keys: [k4.key], threshold: 1 });

  const err = await rotateIdentity(root, next, await signIdentity(next, [k1])).catch((e: unknown) => e);
  expect(err).toBeInstanceOf(AuthorizationError);
  expect(err).toMatchObject({ required: 2, got: 1 });

  const rotated = await rotateIdentity(root, next, await signIdentity(next, [k1, k2]));
  expect(rotated.signed.prev).toBe(identityHash(root.signed));

  const verified = await verifyIdentity(rotated, { resolve: resolverOf(root, rotated) });
  expect(verified.id).toBe(identityHash(root.signed));
  expect(verified.hash).toBe(identityHash(rotated.signed));
  expect(verified.chain).toEqual([identityHash(rotated.signed), identityHash(root.signed)]);
});

test("identity: new keys alone cannot authorize their own rotation", async () => {
  const [k1, k2] = await Promise.all([createEd25519Signer(), createEd25519Signer()]);
  const root = await selfSigned([k1], 1);
  const next = proposeRotation(root, { keys: [k2.key], threshold: 1 });
  const forged: Signed<Identity> = { signed: next, signatures: await signIdentity(next, [k2]) };

  await expect(verifyIdentity(forged, { resolve: resolverOf(root, forged) })).rejects.toThrow(/previous keys/);
});

test("identity: unknown previous version is an integrity error", async () => {
  const [k1] = await Promise.all([createEd25519Signer()]);
  const root = await selfSigned([k1], 1);
  const next = proposeRotation(root, { keys: [k1.key], threshold: 1 });
  const rotated = await rotateIdentity(root, next, await signIdentity(next, [k1]));

  await expect(verifyIdentity(rotated, { resolve: resolverOf(rotated) })).rejects.toThrow(IntegrityError);
});

test("identity: expiry is enforced against nowSec", async () => {
  const k1 = await createEd25519Signer();
  const root = await selfSigned([k1], 1, { expires: 1_700_000_000 });

  await expect(verifyIdentity(root, { resolve: resolverOf(root), nowSec: () => 1_700_000_001 })).rejects.toThrow(/expired/);
  const ok = await verifyIdentity(root, { resolve: resolverOf(root), nowSec: () => 1_700_000_000 });
  expect(ok.id).toBe(identityHash(root.signed));
});

test("identity: invalid signatures are skipped, not counted", async () => {
  const [k1, k2] = await Promise.all([createEd25519Signer(), createEd25519Signer()]);
  const identity = createIdentity({ keys: [k1.key, k2.key], threshold: 2 });
  const signatures = await signIdentity(identity, [k1]);
  const logged: string[] = [];
  const bogus = new Map(signatures);
  bogus.set(keyId(k2.key), await k2.sign(new Uint8Array([1, 2, 3])));

  const root = { signed: identity, signatures: bogus };
  const err = await verifyIdentity(root, { resolve: resolverOf(root), log: (line) => logged.push(line) }).catch((e: unknown) => e);
  expect(err).toMatchObject({ required: 2, got: 1 });
  expect(logged).toEqual([`skipping invalid signature by key ${keyId(k2.key)}`]);
});

test("identity: mixed ed25519 and P-256 keys", async () => {
  const ed = await createEd25519Signer();
  const p256 = await createWebCryptoSigner("ecdsa-p256");
  const root = await selfSigned([ed, p256], 2);

  const verified = await verifyIdentity(root, { resolve: resolverOf(root) });
  expect(verified.identity.keys.map((k) => k.alg)).toEqual(["ed25519", "ecdsa-p256"]);
});

test("identity: signed encoding round-trips and keeps the version hash", async () => {
  const [k1, k2] = await Promise.all([createEd25519Signer(), createEd25519Signer()]);
  const root = await selfSigned([k1, k2], 1);

  const decoded = decodeSignedIdentity(encodeSignedIdentity(root));
  expect(identityHash(decoded.signed)).toBe(identityHash(root.signed));
  expect([...decoded.signatures.keys()].sort()).toEqual([keyId(k1.key), keyId(k2.key)].sort());
});

test("identity: threshold larger than the key set is rejected", async () => {
  const k1 = await createEd25519Signer();
  expect(() => createIdentity({ keys: [k1.key], threshold: 2 })).toThrow(/threshold must be between 1 and 1/);
  expect(() => createIdentity({ keys: [k1.key, k1.key] })).toThrow(/more than once/);
});
