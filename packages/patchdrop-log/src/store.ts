import type { CanonicalValue, ContentHash } from "@patchdrop/auth";
import {
  IntegrityError,
  assertArray,
  assertBytes,
  assertMap,
  contentHash,
  decodeCanonical,
  encodeCanonical,
  get,
} from "@patchdrop/auth";

/** Content-addressed storage keyed by `contentHash(bytes)`. */
export interface ObjectStore {
  put(bytes: Uint8Array): Promise<ContentHash>;
  get(hash: ContentHash): Promise<Uint8Array | undefined>;
  has(hash: ContentHash): Promise<boolean>;
  /** Drops an object. Callers make sure no ref still needs it. */
  delete(hash: ContentHash): Promise<void>;
}

/** `expected: null` means the ref must not exist; `next: null` deletes it. */
export type RefUpdate = {
  name: string;
  expected: ContentHash | null;
  next: ContentHash | null;
};

export interface RefStore {
  read(name: string): Promise<ContentHash | undefined>;
  list(prefix: string): Promise<Map<string, ContentHash>>;
  /** Applies every update or none. Resolves false when any `expected` value is stale. */
  update(updates: readonly RefUpdate[]): Promise<boolean>;
}

/** Packfile-style transport for the objects patch tips point at. */
export interface PackTransport {
  pack(hashes: readonly ContentHash[]): Promise<Uint8Array>;
  /** Stores every object of the pack, returning their hashes. */
  unpack(pack: Uint8Array): Promise<ContentHash[]>;
  /** Hashes carried by a pack, without storing anything. */
  contents(pack: Uint8Array): Set<ContentHash>;
}

export type Repository = {
  objects: ObjectStore;
  refs: RefStore;
  packs?: PackTransport;
};

const PACK_TAG = "patchdrop/pack/v1";

export function readPack(pack: Uint8Array): Map<ContentHash, Uint8Array> {
  const map = assertMap(decodeCanonical(pack, "pack"), "pack");
  if (get(map, "t", "pack") !== PACK_TAG) throw new IntegrityError(`pack must be tagged ${PACK_TAG}`);
  const out = new Map<ContentHash, Uint8Array>();
  for (const [i, obj] of assertArray(get(map, "objects", "pack"), "pack.objects").entries()) {
    const bytes = assertBytes(obj, `pack.objects[${i}]`);
    out.set(contentHash(bytes), bytes);
  }
  return out;
}

export function writePack(objects: Iterable<Uint8Array>): Uint8Array {
  const sorted = [...objects].map((bytes) => ({ hash: contentHash(bytes), bytes }));
  sorted.sort((a, b) => (a.hash < b.hash ? -1 : a.hash > b.hash ? 1 : 0));
  return encodeCanonical(
    new Map<string, CanonicalValue>([
      ["v", 1],
      ["t", PACK_TAG],
      ["objects", sorted.map((o) => o.bytes)],
    ])
  );
}

/** Default transport: a pack is the canonical list of the requested objects. */
export function createObjectPackTransport(objects: ObjectStore): PackTransport {
  return {
    async pack(hashes) {
      const out: Uint8Array[] = [];
      for (const hash of new Set(hashes)) {
        const bytes = await objects.get(hash);
        if (!bytes) throw new IntegrityError(`object ${hash} is not in the store`);
        out.push(bytes);
      }
      return writePack(out);
    },
    async unpack(pack) {
      const stored: ContentHash[] = [];
      for (const bytes of readPack(pack).values()) stored.push(await objects.put(bytes));
      return stored;
    },
    contents(pack) {
      return new Set(readPack(pack).keys());
    },
  };
}

export function packTransportOf(repo: Repository): PackTransport {
  return repo.packs ?? createObjectPackTransport(repo.objects);
}
