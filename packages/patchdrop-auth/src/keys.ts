import { webcrypto } from "node:crypto";

import { hashes as ed25519Hashes, getPublicKey, sign as signEd25519, utils as ed25519Utils, verify as verifyEd25519 } from "@noble/ed25519";
import { sha512 } from "@noble/hashes/sha512";

import { base64urlDecode, base64urlEncode } from "./base64url.js";
import type { CanonicalMap, CanonicalValue, ContentHash } from "./canonical.js";
import { hashCanonical } from "./canonical.js";
import { IntegrityError } from "./errors.js";
import { toBytes } from "./internal/bytes.js";
import { assertBytes, assertMap, assertString, get } from "./internal/fields.js";

export const KEY_ALGORITHMS = ["ed25519", "ecdsa-p256", "rsa-pkcs1-sha256"] as const;
export type KeyAlgorithm = (typeof KEY_ALGORITHMS)[number];

/**
 * Public half of a signing key. `publicKey` is 32 raw bytes for ed25519, an
 * uncompressed point for P-256 and SPKI DER for RSA.
 */
export type VerificationKey = {
  alg: KeyAlgorithm;
  publicKey: Uint8Array;
};

/** Content hash of a key's canonical form. */
export type KeyId = ContentHash;

/**
 * The external signer collaborator. Private key material stays behind this
 * interface.
 */
export interface Signer {
  readonly key: VerificationKey;
  sign(message: Uint8Array): Promise<Uint8Array>;
}

let ed25519Ready = false;

function ensureEd25519(): void {
  if (ed25519Ready) return;
  ed25519Hashes.sha512 = sha512;
  ed25519Ready = true;
}

export function isKeyAlgorithm(val: unknown): val is KeyAlgorithm {
  return typeof val === "string" && KEY_ALGORITHMS.some((alg) => alg === val);
}

export function keyToCanonical(key: VerificationKey): CanonicalMap {
  return new Map<string, CanonicalValue>([
    ["alg", key.alg],
    ["key", key.publicKey],
  ]);
}

export function keyFromCanonical(val: unknown, field = "key"): VerificationKey {
  const map = assertMap(val, field);
  const alg = assertString(get(map, "alg", field), `${field}.alg`);
  if (!isKeyAlgorithm(alg)) throw new IntegrityError(`${field}.alg is not supported: ${alg}`);
  const publicKey = assertBytes(get(map, "key", field), `${field}.key`);
  if (alg === "ed25519" && publicKey.length !== 32) throw new IntegrityError(`${field}.key must be 32 bytes`);
  if (alg === "ecdsa-p256" && publicKey.length !== 65) throw new IntegrityError(`${field}.key must be 65 bytes`);
  return { alg, publicKey };
}

export function keyId(key: VerificationKey): KeyId {
  return hashCanonical(keyToCanonical(key));
}

export function formatKey(key: VerificationKey): string {
  return `${key.alg}:${base64urlEncode(key.publicKey)}`;
}

export function parseKey(text: string): VerificationKey {
  const idx = text.indexOf(":");
  if (idx < 0) throw new IntegrityError(`key must look like <alg>:<base64url>: ${text}`);
  return keyFromCanonical(
    new Map<string, CanonicalValue>([
      ["alg", text.slice(0, idx)],
      ["key", base64urlDecode(text.slice(idx + 1))],
    ])
  );
}

export function randomEd25519SecretKey(): Uint8Array {
  ensureEd25519();
  return ed25519Utils.randomSecretKey();
}

export async function createEd25519Signer(secretKey: Uint8Array = randomEd25519SecretKey()): Promise<Signer> {
  ensureEd25519();
  if (secretKey.length !== 32) throw new Error("ed25519 secret key must be 32 bytes");
  const publicKey = await getPublicKey(secretKey);
  return {
    key: { alg: "ed25519", publicKey },
    sign: async (message) => signEd25519(message, secretKey),
  };
}

const ECDSA_P256 = { name: "ECDSA", namedCurve: "P-256" } as const;
const ECDSA_SHA256 = { name: "ECDSA", hash: "SHA-256" } as const;
const RSA_PKCS1 = { name: "RSASSA-PKCS1-v1_5", hash: "SHA-256" } as const;

/** Generates a non-extractable WebCrypto key pair and wraps it as a Signer. */
export async function createWebCryptoSigner(alg: Exclude<KeyAlgorithm, "ed25519">): Promise<Signer> {
  const { subtle } = webcrypto;
  if (alg === "ecdsa-p256") {
    const pair = await subtle.generateKey(ECDSA_P256, false, ["sign", "verify"]);
    const publicKey = toBytes(await subtle.exportKey("raw", pair.publicKey));
    return {
      key: { alg, publicKey },
      sign: async (message) => toBytes(await subtle.sign(ECDSA_SHA256, pair.privateKey, message)),
    };
  }

  const pair = await subtle.generateKey(
    { ...RSA_PKCS1, modulusLength: 2048, publicExponent: new Uint8Array([1, 0, 1]) },
    false,
    ["sign", "verify"]
  );
  const publicKey = toBytes(await subtle.exportKey("spki", pair.publicKey));
  return {
    key: { alg, publicKey },
    sign: async (message) => toBytes(await subtle.sign(RSA_PKCS1.name, pair.privateKey, message)),
  };
}

/** Returns false for a malformed key or signature instead of throwing. */
export async function verifySignature(key: VerificationKey, message: Uint8Array, signature: Uint8Array): Promise<boolean> {
  switch (key.alg) {
    case "ed25519": {
      ensureEd25519();
      try {
        return verifyEd25519(signature, message, key.publicKey);
      } catch {
        return false;
      }
    }
    case "ecdsa-p256":
    case "rsa-pkcs1-sha256": {
      const { subtle } = webcrypto;
      try {
        const cryptoKey =
          key.alg === "ecdsa-p256"
            ? await subtle.importKey("raw", key.publicKey, ECDSA_P256, false, ["verify"])
            : await subtle.importKey("spki", key.publicKey, RSA_PKCS1, false, ["verify"]);
        const params = key.alg === "ecdsa-p256" ? ECDSA_SHA256 : RSA_PKCS1;
        return await subtle.verify(params, cryptoKey, signature, message);
      } catch {
        return false;
      }
    }
    default: {
      const _exhaustive: never = key.alg;
      throw new IntegrityError(`unknown key algorithm: ${String(_exhaustive)}`);
    }
  }
}
