import type { Drop, IdentityId } from "@patchdrop/auth";
import { createEd25519Signer, createIdentity, createSoloDrop, identityHash, signIdentity } from "@patchdrop/auth";
import type { RecordAuthor } from "@patchdrop/log";
import { DropLog, createMemoryRepository } from "@patchdrop/log";

export type TestAuthor = RecordAuthor & { id: IdentityId };

export async function makeAuthor(): Promise<TestAuthor> {
  const signer = await createEd25519Signer();
  const identity = createIdentity({ keys: [signer.key] });
  return { id: identityHash(identity), identity: { signed: identity, signatures: await signIdentity(identity, [signer]) }, signers: [signer] };
}

export function clock(start = 1_700_000_000): () => number {
  let t = start;
  return () => {
    t += 1;
    return t;
  };
}

export async function makeLog(authors: TestAuthor[], drop?: Drop): Promise<DropLog> {
  const owner = authors[0];
  if (!owner) throw new Error("makeLog needs an author");
  return DropLog.init({
    repo: createMemoryRepository(),
    name: "test",
    drop: drop ?? createSoloDrop({ description: "sync drop", owner: owner.id, branches: ["main"] }),
    authors,
    nowSec: clock(),
  });
}

export function emptyLog(): DropLog {
  return new DropLog({ repo: createMemoryRepository(), name: "test", nowSec: clock(1_900_000_000) });
}
