import { hexToBytes, utf8ToBytes } from "@noble/hashes/utils";

import type {
  CanonicalMap,
  CanonicalValue,
  ContentHash,
  Drop,
  Identity,
  RoleSignature,
  Signed,
  Signer,
} from "@patchdrop/auth";
import {
  IntegrityError,
  assertArray,
  assertBytes,
  assertContentHash,
  assertMap,
  assertString,
  branchRef,
  concatBytes,
  decodeCanonical,
  dropFromCanonical,
  dropToCanonical,
  encodeCanonical,
  get,
  hashCanonical,
  identityHash,
  keyId,
  mapGet,
  optional,
  toCanonicalValue,
  toInteger,
} from "@patchdrop/auth";

const RECORD_SIG_V1_DOMAIN = utf8ToBytes("patchdrop/record/v1");

export const SUBJECT_MAX_LEN = 72;

export type RecordId = ContentHash;
/** Id of a thread: the id of its root record, or a well-known topic id. */
export type TopicId = ContentHash;

export type Tip = {
  /** Full ref name in the object store, e.g. `refs/heads/main`. */
  name: string;
  oid: ContentHash;
};

export type PatchRef = {
  id: ContentHash;
  tips: Tip[];
};

export type CodeLocation = {
  file: string;
  start: number | null;
  end: number | null;
};

export type MirrorKind = "bundled" | "packed" | "sparse";

export type Mirror = {
  url: string;
  kind: MirrorKind;
  custom: CanonicalMap;
};

export type Message =
  | { type: "basic"; message: string }
  | { type: "code-comment"; location: CodeLocation; message: string }
  | { type: "checkpoint"; kind: "merge" | "snapshot"; message: string | null }
  | { type: "drop-metadata"; drop: Drop }
  | { type: "mirrors"; mirrors: Mirror[]; expires: number | null };

export type MessageType = Message["type"];

export type RecordHeader = {
  /** Version hash of the identity the author signed with. */
  author: ContentHash;
  /** Unix seconds. */
  timestamp: number;
  patch: PatchRef | null;
  inReplyTo: RecordId | null;
  /** The drop-metadata record in effect; null only for the genesis record. */
  policy: RecordId | null;
  /** Set only for well-known topics. */
  topic: TopicId | null;
};

export type UnsignedRecord = {
  header: RecordHeader;
  message: Message;
};

export type PatchRecord = UnsignedRecord & {
  id: RecordId;
  signatures: RoleSignature[];
};

/** An identity able to sign records, plus the earlier versions of its rotation chain. */
export type RecordAuthor = {
  identity: Signed<Identity>;
  history?: readonly Signed<Identity>[];
  signers: readonly Signer[];
};

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function sortTips(tips: readonly Tip[]): Tip[] {
  return [...tips].sort((a, b) => compareStrings(a.name, b.name) || compareStrings(a.oid, b.oid));
}

export function patchId(tips: readonly Tip[]): ContentHash {
  return hashCanonical(sortTips(tips).map((t) => [t.name, t.oid]));
}

export function makePatchRef(tips: readonly Tip[]): PatchRef {
  const sorted = sortTips(tips);
  return { id: patchId(sorted), tips: sorted };
}

function tipFromCanonical(val: unknown, field: string): Tip {
  const map = assertMap(val, field);
  return {
    name: assertString(get(map, "name", field), `${field}.name`),
    oid: assertContentHash(get(map, "oid", field), `${field}.oid`),
  };
}

export function messageToCanonical(message: Message): CanonicalMap {
  switch (message.type) {
    case "basic":
      return new Map<string, CanonicalValue>([
        ["type", message.type],
        ["message", message.message],
      ]);
    case "code-comment":
      return new Map<string, CanonicalValue>([
        ["type", message.type],
        [
          "location",
          new Map<string, CanonicalValue>([
            ["file", message.location.file],
            ["start", message.location.start],
            ["end", message.location.end],
          ]),
        ],
        ["message", message.message],
      ]);
    case "checkpoint":
      return new Map<string, CanonicalValue>([
        ["type", message.type],
        ["kind", message.kind],
        ["message", message.message],
      ]);
    case "drop-metadata":
      return new Map<string, CanonicalValue>([
        ["type", message.type],
        ["drop", dropToCanonical(message.drop)],
      ]);
    case "mirrors":
      return new Map<string, CanonicalValue>([
        ["type", message.type],
        [
          "mirrors",
          message.mirrors.map(
            (m) =>
              new Map<string, CanonicalValue>([
                ["url", m.url],
                ["kind", m.kind],
                ["custom", m.custom],
              ])
          ),
        ],
        ["expires", message.expires],
      ]);
    default: {
      const _exhaustive: never = message;
      throw new IntegrityError(`unknown message type: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

function isCheckpointKind(val: string): val is "merge" | "snapshot" {
  return val === "merge" || val === "snapshot";
}

export function isMirrorKind(val: string): val is MirrorKind {
  return val === "bundled" || val === "packed" || val === "sparse";
}

export function messageFromCanonical(val: unknown, field = "message"): Message {
  const map = assertMap(val, field);
  const type = assertString(get(map, "type", field), `${field}.type`);
  const text = (key: string) => assertString(get(map, key, field), `${field}.${key}`);
  switch (type) {
    case "basic":
      return { type: "basic", message: text("message") };
    case "code-comment": {
      const loc = assertMap(get(map, "location", field), `${field}.location`);
      const location: CodeLocation = {
        file: assertString(get(loc, "file", `${field}.location`), `${field}.location.file`),
        start: optional(mapGet(loc, "start"), (v) => toInteger(v, `${field}.location.start`)),
        end: optional(mapGet(loc, "end"), (v) => toInteger(v, `${field}.location.end`)),
      };
      if (location.start !== null && location.end !== null && location.end < location.start) {
        throw new IntegrityError(`${field}.location: end precedes start`);
      }
      return { type: "code-comment", location, message: text("message") };
    }
    case "checkpoint": {
      const kind = text("kind");
      if (!isCheckpointKind(kind)) throw new IntegrityError(`${field}.kind must be merge or snapshot`);
      return { type: "checkpoint", kind, message: optional(mapGet(map, "message"), (v) => assertString(v, `${field}.message`)) };
    }
    case "drop-metadata":
      return { type: "drop-metadata", drop: dropFromCanonical(get(map, "drop", field), `${field}.drop`) };
    case "mirrors": {
      const mirrors = assertArray(get(map, "mirrors", field), `${field}.mirrors`).map((raw, i): Mirror => {
        const path = `${field}.mirrors[${i}]`;
        const m = assertMap(raw, path);
        const kind = assertString(get(m, "kind", path), `${path}.kind`);
        if (!isMirrorKind(kind)) throw new IntegrityError(`${path}.kind must be bundled, packed or sparse`);
        const custom = toCanonicalValue(mapGet(m, "custom") ?? new Map(), `${path}.custom`);
        if (!(custom instanceof Map)) throw new IntegrityError(`${path}.custom must be a map`);
        return { url: assertString(get(m, "url", path), `${path}.url`), kind, custom };
      });
      return { type: "mirrors", mirrors, expires: optional(mapGet(map, "expires"), (v) => toInteger(v, `${field}.expires`)) };
    }
    default:
      throw new IntegrityError(`${field}.type is unknown: ${type}`);
  }
}

export function headerToCanonical(header: RecordHeader): CanonicalMap {
  const patch =
    header.patch === null
      ? null
      : new Map<string, CanonicalValue>([
          ["id", header.patch.id],
          [
            "tips",
            header.patch.tips.map(
              (t) =>
                new Map<string, CanonicalValue>([
                  ["name", t.name],
                  ["oid", t.oid],
                ])
            ),
          ],
        ]);
  return new Map<string, CanonicalValue>([
    ["author", header.author],
    ["timestamp", header.timestamp],
    ["patch", patch],
    ["in_reply_to", header.inReplyTo],
    ["policy", header.policy],
    ["topic", header.topic],
  ]);
}

export function headerFromCanonical(val: unknown, field = "header"): RecordHeader {
  const map = assertMap(val, field);
  const hashOrNull = (key: string) => optional(mapGet(map, key), (v) => assertContentHash(v, `${field}.${key}`));
  const timestamp = toInteger(get(map, "timestamp", field), `${field}.timestamp`);
  if (timestamp < 0) throw new IntegrityError(`${field}.timestamp must not be negative`);
  return {
    author: assertContentHash(get(map, "author", field), `${field}.author`),
    timestamp,
    patch: optional(mapGet(map, "patch"), (raw) => {
      const p = assertMap(raw, `${field}.patch`);
      return {
        id: assertContentHash(get(p, "id", `${field}.patch`), `${field}.patch.id`),
        tips: assertArray(get(p, "tips", `${field}.patch`), `${field}.patch.tips`).map((t, i) =>
          tipFromCanonical(t, `${field}.patch.tips[${i}]`)
        ),
      };
    }),
    inReplyTo: hashOrNull("in_reply_to"),
    policy: hashOrNull("policy"),
    topic: hashOrNull("topic"),
  };
}

function unsignedToCanonical(record: UnsignedRecord): CanonicalMap {
  return new Map<string, CanonicalValue>([
    ["header", headerToCanonical(record.header)],
    ["message", messageToCanonical(record.message)],
  ]);
}

/** Content hash of header and message. Signatures are not part of the id. */
export function recordId(record: UnsignedRecord): RecordId {
  return hashCanonical(unsignedToCanonical(record));
}

export function recordSigningInput(id: RecordId): Uint8Array {
  return concatBytes(RECORD_SIG_V1_DOMAIN, new Uint8Array([0]), hexToBytes(id));
}

export function sortSignatures(signatures: readonly RoleSignature[]): RoleSignature[] {
  return [...signatures].sort((a, b) => compareStrings(a.signer, b.signer) || compareStrings(a.key, b.key));
}

export async function signRecord(record: UnsignedRecord, authors: readonly RecordAuthor[]): Promise<PatchRecord> {
  const id = recordId(record);
  const input = recordSigningInput(id);
  const signatures: RoleSignature[] = [];
  for (const author of authors) {
    const signer = identityHash(author.identity.signed);
    for (const s of author.signers) {
      signatures.push({ signer, key: keyId(s.key), signature: await s.sign(input) });
    }
  }
  return { ...record, id, signatures: sortSignatures(signatures) };
}

/** Throws IntegrityError unless `record.id` matches its content. */
export function assertRecordId(record: PatchRecord): void {
  const expected = recordId(record);
  if (expected !== record.id) throw new IntegrityError(`record id ${record.id} does not match content hash ${expected}`);
}

export function encodeRecord(record: PatchRecord): Uint8Array {
  return encodeCanonical(
    new Map<string, CanonicalValue>([
      ["id", record.id],
      ...unsignedToCanonical(record),
      [
        "signatures",
        sortSignatures(record.signatures).map(
          (s) =>
            new Map<string, CanonicalValue>([
              ["signer", s.signer],
              ["key", s.key],
              ["sig", s.signature],
            ])
        ),
      ],
    ])
  );
}

export function decodeRecord(bytes: Uint8Array): PatchRecord {
  const map = assertMap(decodeCanonical(bytes, "record"), "record");
  const record: PatchRecord = {
    id: assertContentHash(get(map, "id", "record"), "record.id"),
    header: headerFromCanonical(get(map, "header", "record")),
    message: messageFromCanonical(get(map, "message", "record")),
    signatures: assertArray(get(map, "signatures", "record"), "record.signatures").map((raw, i) => {
      const path = `record.signatures[${i}]`;
      const s = assertMap(raw, path);
      return {
        signer: assertContentHash(get(s, "signer", path), `${path}.signer`),
        key: assertContentHash(get(s, "key", path), `${path}.key`),
        signature: assertBytes(get(s, "sig", path), `${path}.sig`),
      };
    }),
  };
  assertRecordId(record);
  return record;
}

function firstLine(text: string): string {
  const line = text.split("\n", 1)[0]?.trim() ?? "";
  const chars = [...line];
  return chars.length > SUBJECT_MAX_LEN ? chars.slice(0, SUBJECT_MAX_LEN).join("") : line;
}

export function subject(message: Message): string {
  switch (message.type) {
    case "basic":
    case "code-comment":
      return firstLine(message.message);
    case "checkpoint":
      return message.message === null ? `${message.kind} checkpoint` : firstLine(message.message);
    case "drop-metadata":
      return firstLine(message.drop.description);
    case "mirrors":
      return "mirrors";
    default: {
      const _exhaustive: never = message;
      return String(_exhaustive);
    }
  }
}

/** Tip announced by a merge point. */
export function mergePointTip(record: PatchRecord): Tip | undefined {
  if (record.message.type !== "checkpoint" || record.message.kind !== "merge") return undefined;
  const tips = record.header.patch?.tips ?? [];
  return tips.length === 1 ? tips[0] : undefined;
}

export function normalizeTip(tip: Tip): Tip {
  return { name: branchRef(tip.name), oid: tip.oid };
}
