import type { CanonicalValue, Identity, Signed } from "@patchdrop/auth";
import {
  IntegrityError,
  assertArray,
  assertBytes,
  assertMap,
  decodeCanonical,
  decodeSignedIdentity,
  encodeCanonical,
  encodeSignedIdentity,
  get,
} from "@patchdrop/auth";
import type { PatchRecord, RecordAuthor } from "@patchdrop/log";
import { decodeRecord, encodeRecord } from "@patchdrop/log";

const SUBMISSION_TAG = "patchdrop/record-submission/v1";

/** A single record plus the identity versions a receiver may not have yet. */
export type RecordSubmission = {
  record: PatchRecord;
  identities: Signed<Identity>[];
};

export function submissionFor(record: PatchRecord, authors: readonly RecordAuthor[]): RecordSubmission {
  return { record, identities: authors.flatMap((a) => [a.identity, ...(a.history ?? [])]) };
}

export function encodeRecordSubmission(submission: RecordSubmission): Uint8Array {
  return encodeCanonical(
    new Map<string, CanonicalValue>([
      ["t", SUBMISSION_TAG],
      ["record", encodeRecord(submission.record)],
      ["identities", submission.identities.map(encodeSignedIdentity)],
    ])
  );
}

export function decodeRecordSubmission(bytes: Uint8Array): RecordSubmission {
  const map = assertMap(decodeCanonical(bytes, "record submission"), "record submission");
  if (get(map, "t", "record submission") !== SUBMISSION_TAG) {
    throw new IntegrityError(`record submission must be tagged ${SUBMISSION_TAG}`);
  }
  return {
    record: decodeRecord(assertBytes(get(map, "record", "record submission"), "record submission.record")),
    identities: assertArray(get(map, "identities", "record submission"), "record submission.identities").map((b, i) =>
      decodeSignedIdentity(assertBytes(b, `record submission.identities[${i}]`))
    ),
  };
}
