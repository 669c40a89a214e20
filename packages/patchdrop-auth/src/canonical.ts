import { decode as cborDecode, encode as cborEncode, rfc8949EncodeOptions } from "cborg";
import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex } from "@noble/hashes/utils";

import { IntegrityError } from "./errors.js";
import { bytesEqual } from "./internal/bytes.js";

export type CanonicalValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | readonly CanonicalValue[]
  | ReadonlyMap<string, CanonicalValue>;

export type CanonicalMap = ReadonlyMap<string, CanonicalValue>;

/** Lowercase hex sha256. */
export type ContentHash = string;

const CONTENT_HASH_RE = /^[0-9a-f]{64}$/;

export function isContentHash(val: unknown): val is ContentHash {
  return typeof val === "string" && CONTENT_HASH_RE.test(val);
}

export function assertContentHash(val: unknown, field: string): ContentHash {
  if (!isContentHash(val)) throw new IntegrityError(`${field} must be a content hash`);
  return val;
}

/**
 * Returns the value with every string NFC-normalised. Non-integer numbers and
 * map keys that collide after normalisation are rejected.
 */
export function canonicalize(value: CanonicalValue, path = "$"): CanonicalValue {
  if (value === null || typeof value === "boolean" || typeof value === "bigint") return value;
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) throw new IntegrityError(`${path}: floating point numbers have no canonical form`);
    return value;
  }
  if (typeof value === "string") return value.normalize("NFC");
  if (value instanceof Uint8Array) return value;
  if (isCanonicalArray(value)) return value.map((v, i) => canonicalize(v, `${path}[${i}]`));

  const out = new Map<string, CanonicalValue>();
  for (const [k, v] of value) {
    const key = k.normalize("NFC");
    if (out.has(key)) throw new IntegrityError(`${path}: duplicate key ${JSON.stringify(key)}`);
    out.set(key, canonicalize(v, `${path}.${key}`));
  }
  return out;
}

function isCanonicalArray(value: readonly CanonicalValue[] | CanonicalMap): value is readonly CanonicalValue[] {
  return Array.isArray(value);
}

export function encodeCanonical(value: CanonicalValue): Uint8Array {
  return cborEncode(canonicalize(value), rfc8949EncodeOptions);
}

/** Narrows decoded CBOR into a CanonicalValue. */
export function toCanonicalValue(val: unknown, path = "$"): CanonicalValue {
  if (val === null || typeof val === "boolean" || typeof val === "bigint" || typeof val === "string") return val;
  if (typeof val === "number") {
    if (!Number.isSafeInteger(val)) throw new IntegrityError(`${path}: floating point numbers have no canonical form`);
    return val;
  }
  if (val instanceof Uint8Array) return val;
  if (Array.isArray(val)) return val.map((v: unknown, i) => toCanonicalValue(v, `${path}[${i}]`));
  if (val instanceof Map) {
    const out = new Map<string, CanonicalValue>();
    for (const [k, v] of val) {
      if (typeof k !== "string") throw new IntegrityError(`${path}: map keys must be strings`);
      out.set(k, toCanonicalValue(v, `${path}.${k}`));
    }
    return out;
  }
  throw new IntegrityError(`${path}: unsupported value`);
}

/** Decodes canonical CBOR, rejecting any input that does not re-encode to the same bytes. */
export function decodeCanonical(bytes: Uint8Array, what = "value"): CanonicalValue {
  let decoded: unknown;
  try {
    decoded = cborDecode(bytes, { useMaps: true });
  } catch (err) {
    throw new IntegrityError(`${what}: invalid CBOR`, { cause: err });
  }
  const value = toCanonicalValue(decoded, what);
  if (!bytesEqual(encodeCanonical(value), bytes)) throw new IntegrityError(`${what}: non-canonical encoding`);
  return value;
}

export function contentHash(bytes: Uint8Array): ContentHash {
  return bytesToHex(sha256(bytes));
}

export function hashCanonical(value: CanonicalValue): ContentHash {
  return contentHash(encodeCanonical(value));
}
