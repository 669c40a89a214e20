import { randomUUID } from "node:crypto";

import type { CanonicalValue, ContentHash } from "@patchdrop/auth";
import {
  IntegrityError,
  TransportError,
  assertArray,
  assertBytes,
  assertContentHash,
  assertMap,
  assertString,
  contentHash,
  decodeCanonical,
  encodeCanonical,
  errorMessage,
  get,
  isPatchdropError,
  mapGet,
  toInteger,
} from "@patchdrop/auth";
import type { UnpackResult } from "@patchdrop/bundle";

import type { WireError, WireErrorCode } from "./errors.js";
import { fromWireError, toWireError } from "./errors.js";
import type { BundleSink, BundleSource, RemoteDrop } from "./source.js";
import type { DuplexTransport, Unsubscribe, WireCodec } from "./transport.js";

export const PEER_PROTOCOL_VERSION = 1;

export type PeerPayload =
  | { case: "advertise"; value: Record<string, never> }
  | { case: "advertised"; value: { hashes: ContentHash[] } }
  | { case: "fetch"; value: { hash: ContentHash } }
  | { case: "bundle"; value: { hash: ContentHash; bytes: Uint8Array } }
  | { case: "submit"; value: { bytes: Uint8Array } }
  | { case: "submitted"; value: UnpackResult }
  | { case: "error"; value: WireError };

export type PeerMessage = {
  v: typeof PEER_PROTOCOL_VERSION;
  drop: string;
  /** Correlates a response with its request. */
  id: string;
  payload: PeerPayload;
};

type RequestPayload = Extract<PeerPayload, { case: "advertise" | "fetch" | "submit" }>;

function isRequest(payload: PeerPayload): payload is RequestPayload {
  return payload.case === "advertise" || payload.case === "fetch" || payload.case === "submit";
}

function payloadToCanonical(payload: PeerPayload): CanonicalValue {
  switch (payload.case) {
    case "advertise":
      return new Map<string, CanonicalValue>();
    case "advertised":
      return new Map<string, CanonicalValue>([["hashes", payload.value.hashes]]);
    case "fetch":
      return new Map<string, CanonicalValue>([["hash", payload.value.hash]]);
    case "bundle":
      return new Map<string, CanonicalValue>([
        ["hash", payload.value.hash],
        ["bytes", payload.value.bytes],
      ]);
    case "submit":
      return new Map<string, CanonicalValue>([["bytes", payload.value.bytes]]);
    case "submitted":
      return new Map<string, CanonicalValue>([
        ["hash", payload.value.hash],
        ["new_records", payload.value.newRecords],
        ["new_topics", payload.value.newTopics],
      ]);
    case "error": {
      const { code, message, retriable, role, required, got } = payload.value;
      const out = new Map<string, CanonicalValue>([
        ["code", code],
        ["message", message],
      ]);
      if (retriable !== undefined) out.set("retriable", retriable);
      if (role !== undefined) out.set("role", role);
      if (required !== undefined) out.set("required", required);
      if (got !== undefined) out.set("got", got);
      return out;
    }
  }
}

const hashes = (val: unknown, field: string): ContentHash[] =>
  assertArray(val, field).map((h, i) => assertContentHash(h, `${field}[${i}]`));

const WIRE_ERROR_CODES: readonly WireErrorCode[] = ["integrity", "authorization", "conflict", "transport", "internal"];

function wireErrorCode(val: unknown): WireErrorCode {
  const code = WIRE_ERROR_CODES.find((c) => c === val);
  if (!code) throw new IntegrityError(`peer message error.code is unknown: ${String(val)}`);
  return code;
}

function optionalNumber(map: ReadonlyMap<unknown, unknown>, key: string): number | undefined {
  const val = mapGet(map, key);
  return val === undefined ? undefined : toInteger(val, `peer message error.${key}`);
}

function payloadFromCanonical(kind: string, value: ReadonlyMap<unknown, unknown>): PeerPayload {
  const where = `peer message ${kind}`;
  switch (kind) {
    case "advertise":
      return { case: "advertise", value: {} };
    case "advertised":
      return { case: "advertised", value: { hashes: hashes(get(value, "hashes", where), `${where}.hashes`) } };
    case "fetch":
      return { case: "fetch", value: { hash: assertContentHash(get(value, "hash", where), `${where}.hash`) } };
    case "bundle":
      return {
        case: "bundle",
        value: {
          hash: assertContentHash(get(value, "hash", where), `${where}.hash`),
          bytes: assertBytes(get(value, "bytes", where), `${where}.bytes`),
        },
      };
    case "submit":
      return { case: "submit", value: { bytes: assertBytes(get(value, "bytes", where), `${where}.bytes`) } };
    case "submitted":
      return {
        case: "submitted",
        value: {
          hash: assertContentHash(get(value, "hash", where), `${where}.hash`),
          newRecords: hashes(get(value, "new_records", where), `${where}.new_records`),
          newTopics: hashes(get(value, "new_topics", where), `${where}.new_topics`),
        },
      };
    case "error": {
      const retriable = mapGet(value, "retriable");
      const role = mapGet(value, "role");
      return {
        case: "error",
        value: {
          code: wireErrorCode(get(value, "code", where)),
          message: assertString(get(value, "message", where), `${where}.message`),
          retriable: typeof retriable === "boolean" ? retriable : undefined,
          role: role === undefined ? undefined : assertString(role, `${where}.role`),
          required: optionalNumber(value, "required"),
          got: optionalNumber(value, "got"),
        },
      };
    }
    default:
      throw new IntegrityError(`peer message type is unknown: ${kind}`);
  }
}

/** Canonical CBOR framing of peer messages. */
export const peerMessageCodec: WireCodec<PeerMessage, Uint8Array> = {
  encode: (message) =>
    encodeCanonical(
      new Map<string, CanonicalValue>([
        ["v", message.v],
        ["drop", message.drop],
        ["id", message.id],
        ["case", message.payload.case],
        ["value", payloadToCanonical(message.payload)],
      ])
    ),
  decode: (wire) => {
    const map = assertMap(decodeCanonical(wire, "peer message"), "peer message");
    const v = toInteger(get(map, "v", "peer message"), "peer message.v");
    if (v !== PEER_PROTOCOL_VERSION) throw new IntegrityError(`peer protocol version ${v} is not supported`);
    return {
      v: PEER_PROTOCOL_VERSION,
      drop: assertString(get(map, "drop", "peer message"), "peer message.drop"),
      id: assertString(get(map, "id", "peer message"), "peer message.id"),
      payload: payloadFromCanonical(
        assertString(get(map, "case", "peer message"), "peer message.case"),
        assertMap(get(map, "value", "peer message"), "peer message.value")
      ),
    };
  },
};

export type PeerErrorContext = {
  drop: string;
  /** Absent when the failure is not tied to one message. */
  messageType?: PeerPayload["case"];
};

export type ServeBundleSourceOptions = {
  drop: string;
  source: BundleSource & Partial<BundleSink>;
  /** Called for requests that failed and for responses that could not be sent. */
  onError?: (err: unknown, ctx: PeerErrorContext) => void;
};

async function answer(source: BundleSource & Partial<BundleSink>, request: RequestPayload): Promise<PeerPayload> {
  switch (request.case) {
    case "advertise":
      return { case: "advertised", value: { hashes: await source.advertise() } };
    case "fetch":
      return { case: "bundle", value: { hash: request.value.hash, bytes: await source.fetch(request.value.hash) } };
    case "submit":
      if (!source.submitBundle) throw new TransportError("this peer does not accept bundles", { retriable: false });
      return { case: "submitted", value: await source.submitBundle(request.value.bytes) };
  }
}

/**
 * Answers advertise, fetch and submit requests for one drop arriving on
 * `transport`. Failures are sent back as error responses.
 */
export function serveBundleSource(transport: DuplexTransport<PeerMessage>, opts: ServeBundleSourceOptions): Unsubscribe {
  const report = (err: unknown, ctx: PeerErrorContext) => {
    if (opts.onError) opts.onError(err, ctx);
    else console.error("patchdrop peer request failed", { ...ctx, err });
  };

  const handle = async (msg: PeerMessage): Promise<void> => {
    if (msg.drop !== opts.drop || !isRequest(msg.payload)) return;
    const ctx: PeerErrorContext = { drop: msg.drop, messageType: msg.payload.case };
    let payload: PeerPayload;
    try {
      payload = await answer(opts.source, msg.payload);
    } catch (err) {
      if (!isPatchdropError(err)) report(err, ctx);
      payload = { case: "error", value: toWireError(err) };
    }
    try {
      await transport.send({ v: PEER_PROTOCOL_VERSION, drop: msg.drop, id: msg.id, payload });
    } catch (err) {
      report(err, ctx);
    }
  };

  return transport.onMessage((msg) => void handle(msg));
}

type Pending<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
};

function deferred<T>(): Pending<T> {
  let resolve!: (value: T) => void;
  let reject!: (err: unknown) => void;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export type PeerBundleSourceOptions = {
  drop: string;
  name?: string;
  timeoutMs?: number;
};

/** The requesting side of the peer protocol. */
export class PeerBundleSource implements RemoteDrop {
  readonly name: string;
  private readonly drop: string;
  private readonly timeoutMs: number;
  private readonly pending = new Map<string, Pending<PeerPayload>>();
  private readonly detach: Unsubscribe;
  private closed = false;

  constructor(
    private readonly transport: DuplexTransport<PeerMessage>,
    opts: PeerBundleSourceOptions
  ) {
    this.drop = opts.drop;
    this.name = opts.name ?? `peer:${opts.drop}`;
    this.timeoutMs = opts.timeoutMs ?? 30_000;
    if (!Number.isFinite(this.timeoutMs) || this.timeoutMs <= 0) throw new Error(`invalid timeoutMs: ${opts.timeoutMs}`);
    this.detach = transport.onMessage((msg) => this.onMessage(msg));
  }

  async advertise(): Promise<ContentHash[]> {
    const res = await this.request({ case: "advertise", value: {} });
    if (res.case !== "advertised") throw unexpected("advertise", res);
    return res.value.hashes;
  }

  async fetch(hash: ContentHash): Promise<Uint8Array> {
    const res = await this.request({ case: "fetch", value: { hash } });
    if (res.case !== "bundle") throw unexpected("fetch", res);
    if (res.value.hash !== hash || contentHash(res.value.bytes) !== hash) {
      throw new IntegrityError(`peer answered fetch ${hash} with different bytes`);
    }
    return res.value.bytes;
  }

  async submitBundle(bytes: Uint8Array): Promise<UnpackResult> {
    const res = await this.request({ case: "submit", value: { bytes } });
    if (res.case !== "submitted") throw unexpected("submit", res);
    return res.value;
  }

  /** Stops listening; requests still in flight fail with a TransportError. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.detach();
    for (const p of this.pending.values()) p.reject(new TransportError(`${this.name}: connection closed`));
    this.pending.clear();
  }

  private onMessage(msg: PeerMessage): void {
    if (msg.drop !== this.drop || isRequest(msg.payload)) return;
    this.pending.get(msg.id)?.resolve(msg.payload);
  }

  private async request(payload: RequestPayload): Promise<PeerPayload> {
    if (this.closed) throw new TransportError(`${this.name}: connection closed`, { retriable: false });
    const id = randomUUID();
    const response = deferred<PeerPayload>();
    this.pending.set(id, response);
    const timer = setTimeout(
      () => response.reject(new TransportError(`${this.name}: ${payload.case} timed out after ${this.timeoutMs}ms`)),
      this.timeoutMs
    );

    try {
      const [, res] = await Promise.all([this.send({ v: PEER_PROTOCOL_VERSION, drop: this.drop, id, payload }), response.promise]);
      if (res.case === "error") throw fromWireError(res.value);
      return res;
    } finally {
      clearTimeout(timer);
      this.pending.delete(id);
    }
  }

  private async send(msg: PeerMessage): Promise<void> {
    try {
      await this.transport.send(msg);
    } catch (err) {
      throw new TransportError(`${this.name}: send failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}

function unexpected(request: string, res: PeerPayload): IntegrityError {
  return new IntegrityError(`peer answered ${request} with ${res.case}`);
}
