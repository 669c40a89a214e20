import type { ContentHash } from "@patchdrop/auth";
import { IntegrityError, TransportError, assertContentHash, contentHash, errorMessage } from "@patchdrop/auth";
import type { UnpackResult } from "@patchdrop/bundle";
import type { AppendResult, TopicSummary } from "@patchdrop/log";

import { errorFromResponse } from "./errors.js";
import type { RemoteDrop } from "./source.js";
import type { RecordSubmission } from "./submission.js";
import { encodeRecordSubmission } from "./submission.js";

export const BUNDLE_CONTENT_TYPE = "application/vnd.patchdrop.bundle";
export const RECORD_CONTENT_TYPE = "application/vnd.patchdrop.record";

export type DropStatus = {
  drop: string;
  head: ContentHash | null;
  records: number;
  topics: number;
  bundles: number;
  policy: ContentHash | null;
};

export type HttpBundleSourceOptions = {
  fetch?: typeof globalThis.fetch;
  headers?: Record<string, string>;
};

export type HttpBundleSource = RemoteDrop & {
  readonly baseUrl: string;
  readonly drop: string;
  submitRecord(submission: RecordSubmission): Promise<AppendResult>;
  status(): Promise<DropStatus>;
  topics(): Promise<TopicSummary[]>;
};

type RequestOptions = {
  method?: string;
  headers?: Record<string, string>;
  body?: Uint8Array;
};

function isObject(val: unknown): val is Record<string, unknown> {
  return typeof val === "object" && val !== null && !Array.isArray(val);
}

function field(body: unknown, key: string, what: string): unknown {
  if (!isObject(body) || !(key in body)) throw new IntegrityError(`${what} response is missing ${key}`);
  return body[key];
}

function stringField(body: unknown, key: string, what: string): string {
  const val = field(body, key, what);
  if (typeof val !== "string") throw new IntegrityError(`${what}.${key} must be a string`);
  return val;
}

function countField(body: unknown, key: string, what: string): number {
  const val = field(body, key, what);
  if (typeof val !== "number" || !Number.isSafeInteger(val) || val < 0) throw new IntegrityError(`${what}.${key} must be a count`);
  return val;
}

function hashList(body: unknown, key: string, what: string): ContentHash[] {
  const val = field(body, key, what);
  if (!Array.isArray(val)) throw new IntegrityError(`${what}.${key} must be an array`);
  return val.map((h, i) => assertContentHash(h, `${what}.${key}[${i}]`));
}

function nullableHash(body: unknown, key: string, what: string): ContentHash | null {
  const val = field(body, key, what);
  return val === null ? null : assertContentHash(val, `${what}.${key}`);
}

/**
 * Client for a drop on a patchdrop sync server. Failures surface as the
 * server classified them; unreachable servers and 5xx responses are retriable
 * TransportErrors.
 */
export function createHttpBundleSource(baseUrl: string, drop: string, opts: HttpBundleSourceOptions = {}): HttpBundleSource {
  const doFetch = opts.fetch ?? globalThis.fetch;
  const root = `${baseUrl.replace(/\/+$/, "")}/drops/${encodeURIComponent(drop)}`;

  const request = async (path: string, init: RequestOptions = {}): Promise<Response> => {
    const url = `${root}${path}`;
    let res: Response;
    try {
      res = await doFetch(url, { method: init.method, headers: { ...opts.headers, ...init.headers }, body: init.body });
    } catch (err) {
      throw new TransportError(`${init.method ?? "GET"} ${url} failed: ${errorMessage(err)}`, { retriable: true, url, cause: err });
    }
    if (!res.ok) throw errorFromResponse(res.status, await readBody(res, url), url);
    return res;
  };

  const readBody = async (res: Response, url: string): Promise<unknown> => {
    const text = await readText(res, url);
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      return text;
    }
  };

  const readText = async (res: Response, url: string): Promise<string> => {
    try {
      return await res.text();
    } catch (err) {
      throw new TransportError(`reading ${url} failed: ${errorMessage(err)}`, { retriable: true, url, cause: err });
    }
  };

  const getJson = async (path: string, init?: RequestOptions): Promise<unknown> => {
    const res = await request(path, init);
    const text = await readText(res, res.url);
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (err) {
      throw new TransportError(`${root}${path} returned invalid JSON`, { retriable: false, cause: err });
    }
  };

  return {
    name: root,
    baseUrl,
    drop,

    async advertise() {
      return hashList(await getJson("/bundles"), "bundles", "advertise");
    },

    async fetch(hash) {
      const res = await request(`/bundles/${hash}`);
      let bytes: Uint8Array;
      try {
        bytes = new Uint8Array(await res.arrayBuffer());
      } catch (err) {
        throw new TransportError(`reading bundle ${hash} failed: ${errorMessage(err)}`, { retriable: true, cause: err });
      }
      if (contentHash(bytes) !== hash) throw new TransportError(`bundle ${hash} arrived truncated or altered`, { retriable: true });
      return bytes;
    },

    async submitBundle(bytes): Promise<UnpackResult> {
      const body = await getJson("/bundles", {
        method: "POST",
        headers: { "content-type": BUNDLE_CONTENT_TYPE },
        body: bytes,
      });
      return {
        hash: assertContentHash(field(body, "hash", "submit"), "submit.hash"),
        newRecords: hashList(body, "newRecords", "submit"),
        newTopics: hashList(body, "newTopics", "submit"),
      };
    },

    async submitRecord(submission) {
      const body = await getJson("/records", {
        method: "POST",
        headers: { "content-type": RECORD_CONTENT_TYPE },
        body: encodeRecordSubmission(submission),
      });
      const appended = field(body, "appended", "record");
      if (typeof appended !== "boolean") throw new IntegrityError("record.appended must be a boolean");
      return { id: assertContentHash(field(body, "id", "record"), "record.id"), appended };
    },

    async status() {
      const body = await getJson("/status");
      return {
        drop: stringField(body, "drop", "status"),
        head: nullableHash(body, "head", "status"),
        records: countField(body, "records", "status"),
        topics: countField(body, "topics", "status"),
        bundles: countField(body, "bundles", "status"),
        policy: nullableHash(body, "policy", "status"),
      };
    },

    async topics() {
      const list = field(await getJson("/topics"), "topics", "topics");
      if (!Array.isArray(list)) throw new IntegrityError("topics.topics must be an array");
      return list.map((t, i) => ({
        topic: assertContentHash(field(t, "topic", `topics[${i}]`), `topics[${i}].topic`),
        root: assertContentHash(field(t, "root", `topics[${i}]`), `topics[${i}].root`),
        subject: stringField(t, "subject", `topics[${i}]`),
      }));
    },
  };
}
