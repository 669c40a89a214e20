import type { Drop, IdentityId } from "@patchdrop/auth";
import { createEd25519Signer, createIdentity, createSoloDrop, identityHash, signIdentity } from "@patchdrop/auth";

import { DropLog } from "../src/log.js";
import type { MemoryRepository } from "../src/memory.js";
import { createMemoryRepository } from "../src/memory.js";
import type { RecordAuthor } from "../src/record.js";

export type TestAuthor = RecordAuthor & { id: IdentityId };

export async function makeAuthor(opts: { expires?: number } = {}): Promise<TestAuthor> {
  const signer = await createEd25519Signer();
  const identity = createIdentity({ keys: [signer.key], expires: opts.expires });
  const signed = { signed: identity, signatures: await signIdentity(identity, [signer]) };
  return { id: identityHash(identity), identity: signed, signers: [signer] };
}

/** Strictly increasing clock so sibling order is deterministic. */
export function clock(start = 1_700_000_000): () => number {
  let t = start;
  return () => {
    t += 1;
    return t;
  };
}

export async function makeLog(opts: {
  authors: TestAuthor[];
  drop?: Drop;
  repo?: MemoryRepository;
  name?: string;
  nowSec?: () => number;
  maxRetries?: number;
}): Promise<{ log: DropLog; repo: MemoryRepository }> {
  const repo = opts.repo ?? createMemoryRepository();
  const owner = opts.authors[0];
  if (!owner) throw new Error("makeLog needs an author");
  const drop = opts.drop ?? createSoloDrop({ description: "test drop", owner: owner.id, branches: ["main"] });
  const log = await DropLog.init({
    repo,
    name: opts.name ?? "test",
    drop,
    authors: opts.authors,
    nowSec: opts.nowSec ?? clock(),
    maxRetries: opts.maxRetries,
  });
  return { log, repo };
}
