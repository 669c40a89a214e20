import type { ContentHash } from "@patchdrop/auth";
import { AuthorizationError, IntegrityError, TransportError, isContentHash } from "@patchdrop/auth";
import { publishBundle, unpack } from "@patchdrop/bundle";
import type { DropLog, RecordId, TopicId } from "@patchdrop/log";

import type { BundleSource, RemoteDrop } from "./source.js";

export type SyncOptions = {
  /** Attempts per remote call before a retriable TransportError surfaces. */
  retries?: number;
  /** Delay before the first retry; doubles on each further attempt. */
  backoffMs?: number;
  sleep?: (ms: number) => Promise<void>;
  debug?: boolean;
  log?: (line: string) => void;
};

export type RejectedBundle = {
  hash: ContentHash;
  error: IntegrityError | AuthorizationError;
};

export type SyncReport = {
  source: string;
  advertised: number;
  fetched: ContentHash[];
  newRecords: RecordId[];
  newTopics: TopicId[];
  rejected: RejectedBundle[];
};

export type PushReport = {
  hash: ContentHash;
  /** False when the remote already advertised the bundle. */
  submitted: boolean;
  newRecords: RecordId[];
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function retrier(opts: SyncOptions) {
  const retries = opts.retries ?? 4;
  const backoffMs = opts.backoffMs ?? 250;
  const sleep = opts.sleep ?? defaultSleep;
  const trace = tracer(opts);
  if (!Number.isInteger(retries) || retries < 1) throw new Error(`invalid retries: ${opts.retries}`);
  if (!Number.isFinite(backoffMs) || backoffMs < 0) throw new Error(`invalid backoffMs: ${opts.backoffMs}`);

  return async <T>(what: string, fn: () => Promise<T>): Promise<T> => {
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await fn();
      } catch (err) {
        if (!(err instanceof TransportError) || !err.retriable || attempt >= retries) throw err;
        const delay = backoffMs * 2 ** (attempt - 1);
        trace(`${what} failed (attempt ${attempt}/${retries}): ${err.message}; retrying in ${delay}ms`);
        await sleep(delay);
      }
    }
  };
}

function tracer(opts: SyncOptions): (line: string) => void {
  const debug = Boolean(opts.debug);
  const log = opts.log ?? ((line) => console.debug(line));
  return (line) => {
    if (debug) log(`[sync] ${line}`);
  };
}

/**
 * Pulls every bundle `source` advertises that the log does not already know
 * and unpacks it. Bundles that fail verification are reported and skipped;
 * the records of the others are merged by set union.
 */
export async function sync(log: DropLog, source: BundleSource, opts: SyncOptions = {}): Promise<SyncReport> {
  const retrying = retrier(opts);
  const trace = tracer(opts);

  const advertised = await retrying(`advertise ${source.name}`, () => source.advertise());
  const known = new Set(await log.knownBundles());
  const report: SyncReport = {
    source: source.name,
    advertised: advertised.length,
    fetched: [],
    newRecords: [],
    newTopics: [],
    rejected: [],
  };

  for (const hash of [...new Set(advertised)].sort()) {
    if (known.has(hash)) continue;
    if (!isContentHash(hash)) {
      report.rejected.push({ hash, error: new IntegrityError(`advertised bundle hash is malformed: ${hash}`) });
      continue;
    }

    const bytes = await retrying(`fetch ${hash}`, () => source.fetch(hash));
    report.fetched.push(hash);
    try {
      const result = await unpack(log, bytes, { expectedHash: hash, log: opts.log });
      report.newRecords.push(...result.newRecords);
      for (const topic of result.newTopics) if (!report.newTopics.includes(topic)) report.newTopics.push(topic);
      trace(`${hash}: ${result.newRecords.length} new records`);
    } catch (err) {
      if (!(err instanceof IntegrityError || err instanceof AuthorizationError)) throw err;
      trace(`${hash}: rejected: ${err.message}`);
      report.rejected.push({ hash, error: err });
    }
  }
  return report;
}

/** Publishes the whole log as one bundle and submits it unless the remote already has it. */
export async function push(log: DropLog, remote: RemoteDrop, opts: SyncOptions = {}): Promise<PushReport> {
  if ((await log.head()) === null) throw new IntegrityError(`drop ${log.name} has no records to push`);
  const retrying = retrier(opts);
  const { hash, bytes } = await publishBundle(log);
  const advertised = await retrying(`advertise ${remote.name}`, () => remote.advertise());
  if (advertised.includes(hash)) return { hash, submitted: false, newRecords: [] };

  const result = await retrying(`submit ${hash}`, () => remote.submitBundle(bytes));
  return { hash, submitted: true, newRecords: result.newRecords };
}
