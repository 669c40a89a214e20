import fs from "node:fs/promises";
import path from "node:path";

import type { ContentHash } from "@patchdrop/auth";
import { IntegrityError, contentHash, isContentHash } from "@patchdrop/auth";

export const BUNDLE_FILE_EXT = ".bundle";

export function bundleFileName(hash: ContentHash): string {
  return `${hash}${BUNDLE_FILE_EXT}`;
}

/** Writes `<hash>.bundle` into `dir`. Existing files with that name are left alone. */
export async function writeBundleFile(dir: string, bytes: Uint8Array): Promise<string> {
  await fs.mkdir(dir, { recursive: true });
  const file = path.join(dir, bundleFileName(contentHash(bytes)));
  try {
    await fs.writeFile(file, bytes, { flag: "wx" });
  } catch (err) {
    if (!(err instanceof Error && "code" in err && err.code === "EEXIST")) throw err;
  }
  return file;
}

/**
 * Reads a bundle file. When the file is named after a hash the contents must
 * hash to it.
 */
export async function readBundleFile(file: string): Promise<{ hash: ContentHash; bytes: Uint8Array }> {
  const bytes = new Uint8Array(await fs.readFile(file));
  const hash = contentHash(bytes);
  const base = path.basename(file, BUNDLE_FILE_EXT);
  if (path.extname(file) === BUNDLE_FILE_EXT && isContentHash(base) && base !== hash) {
    throw new IntegrityError(`${file} hashes to ${hash}`);
  }
  return { hash, bytes };
}
