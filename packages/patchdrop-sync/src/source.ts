import type { ContentHash } from "@patchdrop/auth";
import { TransportError } from "@patchdrop/auth";
import type { UnpackResult } from "@patchdrop/bundle";
import { publishBundle, unpack } from "@patchdrop/bundle";
import type { DropLog } from "@patchdrop/log";

/** Somewhere the bundles of one drop can be listed and fetched by hash. */
export interface BundleSource {
  readonly name: string;
  /** Hashes of every bundle the source can serve. */
  advertise(): Promise<ContentHash[]>;
  /** Bundle bytes. Sources that do not hold `hash` throw a non-retriable TransportError. */
  fetch(hash: ContentHash): Promise<Uint8Array>;
}

/** Accepts bundles, verifying and applying them like a local unpack. */
export interface BundleSink {
  submitBundle(bytes: Uint8Array): Promise<UnpackResult>;
}

export type RemoteDrop = BundleSource & BundleSink;

/**
 * Serves a local log. With `publish` (the default) an advertisement first
 * republishes the whole log if its head moved, so the current state is always
 * among the offered bundles and only the latest self-published one is kept.
 */
export function createLogBundleSource(log: DropLog, opts: { name?: string; publish?: boolean } = {}): RemoteDrop {
  const publish = opts.publish ?? true;
  return {
    name: opts.name ?? `log:${log.name}`,
    async advertise() {
      if (publish && (await log.head()) !== null) await publishBundle(log);
      return log.knownBundles();
    },
    async fetch(hash) {
      const bytes = await log.bundleBytes(hash);
      if (!bytes) throw new TransportError(`bundle ${hash} is not known to drop ${log.name}`, { retriable: false, status: 404 });
      return bytes;
    },
    submitBundle: (bytes) => unpack(log, bytes),
  };
}
