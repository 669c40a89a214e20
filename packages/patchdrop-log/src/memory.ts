import type { ContentHash } from "@patchdrop/auth";
import { contentHash } from "@patchdrop/auth";

import type { RefUpdate, Repository } from "./store.js";

export type MemoryRepository = Repository & {
  /** Number of stored objects, for tests and diagnostics. */
  objectCount(): number;
};

export function createMemoryRepository(): MemoryRepository {
  const objects = new Map<ContentHash, Uint8Array>();
  const refs = new Map<string, ContentHash>();

  return {
    objects: {
      async put(bytes) {
        const hash = contentHash(bytes);
        if (!objects.has(hash)) objects.set(hash, bytes.slice());
        return hash;
      },
      async get(hash) {
        return objects.get(hash);
      },
      async has(hash) {
        return objects.has(hash);
      },
      async delete(hash) {
        objects.delete(hash);
      },
    },
    refs: {
      async read(name) {
        return refs.get(name);
      },
      async list(prefix) {
        const out = new Map<string, ContentHash>();
        for (const [name, target] of refs) if (name.startsWith(prefix)) out.set(name, target);
        return out;
      },
      async update(updates: readonly RefUpdate[]) {
        for (const u of updates) {
          if ((refs.get(u.name) ?? null) !== u.expected) return false;
        }
        for (const u of updates) {
          if (u.next === null) refs.delete(u.name);
          else refs.set(u.name, u.next);
        }
        return true;
      },
    },
    objectCount: () => objects.size,
  };
}
