import { IntegrityError } from "../errors.js";

export function mapGet(map: ReadonlyMap<unknown, unknown>, key: string): unknown {
  return map.has(key) ? map.get(key) : undefined;
}

export function assertMap(val: unknown, field: string): ReadonlyMap<unknown, unknown> {
  if (!(val instanceof Map)) throw new IntegrityError(`${field} must be a map`);
  return val;
}

export function assertArray(val: unknown, field: string): readonly unknown[] {
  if (!Array.isArray(val)) throw new IntegrityError(`${field} must be an array`);
  return val;
}

export function assertString(val: unknown, field: string): string {
  if (typeof val !== "string") throw new IntegrityError(`${field} must be a string`);
  return val;
}

export function assertBytes(val: unknown, field: string): Uint8Array {
  if (!(val instanceof Uint8Array)) throw new IntegrityError(`${field} must be bytes`);
  return val;
}

export function toInteger(val: unknown, field: string): number {
  if (typeof val === "bigint") {
    if (val > BigInt(Number.MAX_SAFE_INTEGER) || val < BigInt(Number.MIN_SAFE_INTEGER)) {
      throw new IntegrityError(`${field} too large`);
    }
    return Number(val);
  }
  if (typeof val !== "number" || !Number.isSafeInteger(val)) throw new IntegrityError(`${field} must be an integer`);
  return val;
}

export function optional<T>(val: unknown, parse: (v: unknown) => T): T | null {
  return val === undefined || val === null ? null : parse(val);
}

export function get(map: ReadonlyMap<unknown, unknown>, key: string, field: string): unknown {
  const val = mapGet(map, key);
  if (val === undefined) throw new IntegrityError(`${field}.${key} is missing`);
  return val;
}
