import http from "node:http";

import type WebSocket from "ws";
import { WebSocketServer } from "ws";

import { IntegrityError, TransportError, isContentHash, isPatchdropError } from "@patchdrop/auth";
import type { DropLog, TopicSummary } from "@patchdrop/log";
import type { PeerErrorContext, RemoteDrop } from "@patchdrop/sync";
import {
  BUNDLE_CONTENT_TYPE,
  createLogBundleSource,
  decodeRecordSubmission,
  httpStatusOf,
  peerMessageCodec,
  serveBundleSource,
  toWireError,
} from "@patchdrop/sync";
import { wrapDuplexTransportWithCodec } from "@patchdrop/sync/transport";

import { createWebSocketTransport } from "./websocket.js";

const DROP_NAME = /^[A-Za-z0-9._-]+$/;

export type DropHandle = {
  log: DropLog;
  release?: () => void | Promise<void>;
};

export type OpenDropOptions = {
  /** False for read-only requests, which must not bring a drop into existence. */
  create: boolean;
};

export interface DropProvider {
  /** Resolves undefined only when the drop does not exist and `create` is false. */
  open(drop: string, opts: OpenDropOptions): Promise<DropHandle | undefined>;
}

export type RequestErrorContext = {
  method: string;
  path: string;
  drop?: string;
};

export type DropSyncServerOptions = {
  host?: string;
  port?: number;
  syncPath?: string;
  healthPath?: string;
  /** Largest accepted bundle, record submission or WebSocket frame. */
  maxBundleBytes?: number;
  drops: DropProvider;
  onPeerError?: (err: unknown, ctx: PeerErrorContext) => void;
  /** Called for failures that are not patchdrop errors; those become 500 responses. */
  onRequestError?: (err: unknown, ctx: RequestErrorContext) => void;
};

export type DropSyncServerHandle = {
  host: string;
  port: number;
  close: () => Promise<void>;
};

type Route =
  | { kind: "status" }
  | { kind: "topics" }
  | { kind: "bundles" }
  | { kind: "bundle"; hash: string }
  | { kind: "records" };

function parseDropPath(pathname: string): { drop: string; rest: string[] } | undefined {
  const parts = pathname.split("/").filter((p) => p.length > 0);
  if (parts[0] !== "drops" || parts.length < 3) return undefined;
  const [, encoded, ...rest] = parts;
  if (encoded === undefined) return undefined;
  let drop: string;
  try {
    drop = decodeURIComponent(encoded);
  } catch {
    return undefined;
  }
  return { drop, rest };
}

function matchRoute(method: string, rest: readonly string[]): Route | undefined {
  const [first, second, ...extra] = rest;
  if (extra.length > 0) return undefined;
  if (method === "GET" && first === "status" && second === undefined) return { kind: "status" };
  if (method === "GET" && first === "topics" && second === undefined) return { kind: "topics" };
  if (first !== "bundles" && first !== "records") return undefined;
  if (first === "records") return method === "POST" && second === undefined ? { kind: "records" } : undefined;
  if (second === undefined) return method === "GET" || method === "POST" ? { kind: "bundles" } : undefined;
  return method === "GET" ? { kind: "bundle", hash: second } : undefined;
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(body));
}

function readBody(req: http.IncomingMessage, limit: number): Promise<Uint8Array> {
  const tooLarge = () => new TransportError(`request body exceeds ${limit} bytes`, { retriable: false, status: 413 });
  const declared = Number(req.headers["content-length"] ?? "0");
  if (declared > limit) {
    req.resume();
    return Promise.reject(tooLarge());
  }

  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let failed = false;
    req.on("data", (chunk: Buffer) => {
      if (failed) return;
      size += chunk.length;
      if (size > limit) {
        failed = true;
        reject(tooLarge());
        return;
      }
      chunks.push(chunk);
    });
    req.once("end", () => {
      if (!failed) resolve(new Uint8Array(Buffer.concat(chunks)));
    });
    req.once("error", reject);
  });
}

/**
 * Serves drops over HTTP (bundle advertise, fetch and submit, record submit,
 * status and topics) and over WebSocket with the peer protocol. Writes to one
 * drop are serialised in this process; different drops never wait on each
 * other.
 */
export async function startDropSyncServer(opts: DropSyncServerOptions): Promise<DropSyncServerHandle> {
  const host = opts.host ?? "0.0.0.0";
  const port = Number(opts.port ?? 8787);
  const syncPath = opts.syncPath ?? "/sync";
  const healthPath = opts.healthPath ?? "/health";
  const maxBundleBytes = Number(opts.maxBundleBytes ?? 32 * 1024 * 1024);

  if (!Number.isFinite(port) || port < 0) throw new Error(`invalid port: ${opts.port}`);
  if (!syncPath.startsWith("/")) throw new Error(`syncPath must start with "/": ${syncPath}`);
  if (!healthPath.startsWith("/")) throw new Error(`healthPath must start with "/": ${healthPath}`);
  if (!Number.isFinite(maxBundleBytes) || maxBundleBytes <= 0) {
    throw new Error(`invalid maxBundleBytes: ${opts.maxBundleBytes}`);
  }

  const onRequestError =
    opts.onRequestError ??
    ((err: unknown, ctx: RequestErrorContext) => console.error("patchdrop request failed", { ...ctx, err }));
  const onPeerError =
    opts.onPeerError ?? ((err: unknown, ctx: PeerErrorContext) => console.error("patchdrop peer request failed", { ...ctx, err }));

  const chains = new Map<string, Promise<void>>();
  const serialised = <T>(drop: string, fn: () => Promise<T>): Promise<T> => {
    const run = (chains.get(drop) ?? Promise.resolve()).then(fn);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    chains.set(drop, tail);
    void tail.then(() => {
      if (chains.get(drop) === tail) chains.delete(drop);
    });
    return run;
  };

  const remoteDrop = (drop: string, log: DropLog): RemoteDrop => {
    const source = createLogBundleSource(log, { name: `drop:${drop}` });
    return {
      name: source.name,
      advertise: () => serialised(drop, () => source.advertise()),
      fetch: (hash) => source.fetch(hash),
      submitBundle: (bytes) => serialised(drop, () => source.submitBundle(bytes)),
    };
  };

  const route = async (req: http.IncomingMessage, res: http.ServerResponse, drop: string, target: Route): Promise<void> => {
    if (target.kind === "bundle" && !isContentHash(target.hash)) throw new IntegrityError(`not a bundle hash: ${target.hash}`);
    const handle = await opts.drops.open(drop, { create: req.method !== "GET" });
    if (!handle) {
      if (target.kind === "bundles") {
        sendJson(res, 200, { bundles: [] });
        return;
      }
      throw new TransportError(`drop ${drop} does not exist`, { retriable: false, status: 404 });
    }
    try {
      const { log } = handle;
      switch (target.kind) {
        case "status": {
          const state = await log.state();
          sendJson(res, 200, {
            drop,
            head: await log.head(),
            records: state.size,
            topics: state.topics.length,
            bundles: (await log.knownBundles()).length,
            policy: state.currentPolicy()?.id ?? null,
          });
          return;
        }
        case "topics": {
          const topics: TopicSummary[] = [];
          for await (const t of log.listTopics()) topics.push(t);
          sendJson(res, 200, { topics });
          return;
        }
        case "bundles": {
          const remote = remoteDrop(drop, log);
          if (req.method === "POST") {
            const bytes = await readBody(req, maxBundleBytes);
            sendJson(res, 200, await remote.submitBundle(bytes));
          } else {
            sendJson(res, 200, { bundles: await remote.advertise() });
          }
          return;
        }
        case "bundle": {
          const bytes = await remoteDrop(drop, log).fetch(target.hash);
          res.writeHead(200, { "content-type": BUNDLE_CONTENT_TYPE, "content-length": String(bytes.length) });
          res.end(bytes);
          return;
        }
        case "records": {
          const submission = decodeRecordSubmission(await readBody(req, maxBundleBytes));
          const result = await serialised(drop, () => log.append(submission.record, { identities: submission.identities }));
          sendJson(res, result.appended ? 201 : 200, result);
          return;
        }
      }
    } finally {
      await handle.release?.();
    }
  };

  const handleRequest = async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const method = req.method ?? "GET";
    if (url.pathname === healthPath) {
      res.writeHead(200, { "content-type": "text/plain" });
      res.end("ok");
      return;
    }

    const parsed = parseDropPath(url.pathname);
    const target = parsed ? matchRoute(method, parsed.rest) : undefined;
    if (!parsed || !target) {
      res.writeHead(404, { "content-type": "text/plain" });
      res.end("not found");
      return;
    }

    try {
      if (!DROP_NAME.test(parsed.drop)) throw new IntegrityError(`invalid drop name: ${parsed.drop}`);
      await route(req, res, parsed.drop, target);
    } catch (err) {
      if (!isPatchdropError(err)) onRequestError(err, { method, path: url.pathname, drop: parsed.drop });
      if (res.headersSent) {
        res.destroy();
        return;
      }
      const status = httpStatusOf(err);
      if (status === 413) res.setHeader("connection", "close");
      sendJson(res, status, { error: toWireError(err) });
    }
  };

  const server = http.createServer((req, res) => void handleRequest(req, res));

  const wss = new WebSocketServer({ noServer: true, maxPayload: maxBundleBytes });

  const onConnection = async (ws: WebSocket, drop: string): Promise<void> => {
    // Listen before opening so a socket that closes meanwhile still releases the handle.
    let gone = false;
    let cleanup: (() => Promise<void>) | undefined;
    const onGone = () => {
      gone = true;
      if (cleanup) void cleanup();
    };
    ws.once("close", onGone);
    ws.once("error", onGone);

    let handle: DropHandle | undefined;
    try {
      handle = await opts.drops.open(drop, { create: true });
      if (!handle) throw new Error(`drop provider did not open ${drop}`);
    } catch (err) {
      onPeerError(err, { drop });
      ws.close(1011, "failed to open drop");
      return;
    }

    const opened = handle;
    const release = async () => {
      try {
        await opened.release?.();
      } catch (err) {
        onPeerError(err, { drop });
      }
    };
    if (gone) {
      await release();
      return;
    }

    const transport = wrapDuplexTransportWithCodec(createWebSocketTransport(ws), peerMessageCodec, {
      onDecodeError: (err) => onPeerError(err, { drop }),
    });
    const detach = serveBundleSource(transport, { drop, source: remoteDrop(drop, opened.log), onError: onPeerError });

    let cleaned = false;
    cleanup = async () => {
      if (cleaned) return;
      cleaned = true;
      detach();
      await release();
    };
  };

  server.on("upgrade", (req, socket, head) => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const drop = url.searchParams.get("drop");
    if (url.pathname !== syncPath || !drop || !DROP_NAME.test(drop)) {
      socket.destroy();
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => void onConnection(ws, drop));
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, resolve);
  });

  const address = server.address();
  const actualPort = typeof address === "object" && address ? address.port : port;

  const close = async (): Promise<void> => {
    for (const ws of wss.clients) ws.close();
    await new Promise<void>((resolve) => wss.close(() => resolve()));
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  };

  return { host, port: actualPort, close };
}
