import http from "node:http";

import { test, expect } from "vitest";
import WebSocket from "ws";

import { createDrop } from "@patchdrop/auth";
import type { PatchRecord } from "@patchdrop/log";
import { DROP_TOPIC, DropLog, createMemoryRepository, signRecord } from "@patchdrop/log";
import { PeerBundleSource, createHttpBundleSource, peerMessageCodec, push, submissionFor, sync } from "@patchdrop/sync";
import { wrapDuplexTransportWithCodec } from "@patchdrop/sync/transport";

import type { DropHandle, DropProvider } from "../src/server.js";
import { startDropSyncServer } from "../src/server.js";
import { connectWebSocket, createWebSocketTransport } from "../src/websocket.js";
import type { TestAuthor } from "./helpers.js";
import { emptyLog, makeAuthor, makeLog } from "./helpers.js";

type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
};

function deferred<T>(): Deferred<T> {
  let resolve!: (value: T) => void;
  let reject!: (err: unknown) => void;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  const timeout = deferred<never>();
  const timer = setTimeout(() => timeout.reject(new Error(`timeout after ${ms}ms: ${label}`)), ms);
  try {
    return await Promise.race([promise, timeout.promise]);
  } finally {
    clearTimeout(timer);
  }
}

async function httpGet(url: string): Promise<{ status: number; body: string }> {
  return new Promise((resolve, reject) => {
    const req = http.get(url, (res) => {
      const chunks: Buffer[] = [];
      res.on("data", (chunk) => chunks.push(Buffer.from(chunk)));
      res.on("end", () => {
        resolve({
          status: res.statusCode ?? 0,
          body: Buffer.concat(chunks).toString("utf8"),
        });
      });
    });
    req.once("error", reject);
  });
}

const SERVER_NOW = 1_800_000_000;

function memoryDrops(onRelease?: (drop: string) => void): DropProvider & { opened: string[] } {
  const repo = createMemoryRepository();
  const opened: string[] = [];
  return {
    opened,
    async open(drop, { create }) {
      opened.push(drop);
      const log = new DropLog({ repo, name: drop, nowSec: () => SERVER_NOW });
      if (!create && (await log.head()) === null) return undefined;
      return { log, release: () => onRelease?.(drop) };
    },
  };
}

async function recordBy(author: TestAuthor, policy: string, message: string, timestamp: number): Promise<PatchRecord> {
  return signRecord(
    {
      header: { author: author.id, timestamp, patch: null, inReplyTo: null, policy, topic: null },
      message: { type: "basic", message },
    },
    [author]
  );
}

test("health endpoint returns ok", async () => {
  const server = await startDropSyncServer({
    host: "127.0.0.1",
    port: 0,
    drops: {
      async open() {
        throw new Error("drops.open should not be called by /health");
      },
    },
  });

  try {
    const base = `http://${server.host}:${server.port}`;

    const health = await httpGet(`${base}/health`);
    expect(health.status).toBe(200);
    expect(health.body).toBe("ok");

    const notFound = await httpGet(`${base}/not-found`);
    expect(notFound.status).toBe(404);
    expect(notFound.body).toBe("not found");
  } finally {
    await server.close();
  }
});

test("http: push, inspect and pull a drop", async () => {
  const drops = memoryDrops();
  const server = await startDropSyncServer({ host: "127.0.0.1", port: 0, drops });
  const base = `http://${server.host}:${server.port}`;

  try {
    const a = await makeAuthor();
    const local = await makeLog([a]);
    const root = await local.comment(a, "hello server");
    const genesis = (await local.policy()).id;
    const remote = createHttpBundleSource(base, "demo");

    const pushed = await push(local, remote);
    expect(pushed.submitted).toBe(true);
    expect(pushed.newRecords).toEqual([genesis, root]);

    const status = await remote.status();
    expect(status).toEqual({ drop: "demo", head: status.head, records: 2, topics: 2, bundles: 1, policy: genesis });
    expect(status.head).not.toBeNull();

    const topics = await remote.topics();
    expect(topics.map((t) => t.topic)).toEqual([DROP_TOPIC, root]);
    expect(topics[1]).toEqual({ topic: root, root, subject: "hello server" });

    const other = emptyLog();
    const pulled = await sync(other, remote);
    expect(pulled.advertised).toBe(1);
    expect(pulled.newRecords).toEqual([genesis, root]);
    expect(await other.has(root)).toBe(true);
  } finally {
    await server.close();
  }
});

test("http: failures map to status codes", async () => {
  const server = await startDropSyncServer({ host: "127.0.0.1", port: 0, drops: memoryDrops(), maxBundleBytes: 4096 });
  const base = `http://${server.host}:${server.port}`;

  try {
    const malformed = await httpGet(`${base}/drops/demo/bundles/not-a-hash`);
    expect(malformed.status).toBe(400);
    expect(JSON.parse(malformed.body)).toEqual({ error: { code: "integrity", message: "not a bundle hash: not-a-hash" } });

    const unknown = await httpGet(`${base}/drops/demo/bundles/${"00".repeat(32)}`);
    expect(unknown.status).toBe(404);

    const badName = await httpGet(`${base}/drops/bad%20name/status`);
    expect(badName.status).toBe(400);

    const remote = createHttpBundleSource(base, "demo");
    await expect(remote.submitBundle(new Uint8Array(5000))).rejects.toMatchObject({ code: "transport", status: 413, retriable: false });
  } finally {
    await server.close();
  }
});

test("http: record submissions are authorized like local appends", async () => {
  const server = await startDropSyncServer({ host: "127.0.0.1", port: 0, drops: memoryDrops() });
  const base = `http://${server.host}:${server.port}`;

  try {
    const [a, outsider] = await Promise.all([makeAuthor(), makeAuthor()]);
    const local = await makeLog([a]);
    const genesis = (await local.policy()).id;
    const remote = createHttpBundleSource(base, "demo");
    await push(local, remote);

    const record = await recordBy(a, genesis, "direct", SERVER_NOW);
    expect(await remote.submitRecord(submissionFor(record, [a]))).toEqual({ id: record.id, appended: true });
    expect(await remote.submitRecord(submissionFor(record, [a]))).toEqual({ id: record.id, appended: false });

    const forged = await recordBy(outsider, genesis, "forged", SERVER_NOW + 1);
    await expect(remote.submitRecord(submissionFor(forged, [outsider]))).rejects.toMatchObject({
      code: "authorization",
      role: "drop",
    });
    expect((await remote.status()).records).toBe(2);
  } finally {
    await server.close();
  }
});

test("http: record submissions judge expiry and timestamps by the server clock", async () => {
  const server = await startDropSyncServer({ host: "127.0.0.1", port: 0, drops: memoryDrops() });
  const base = `http://${server.host}:${server.port}`;

  try {
    const [a, b] = await Promise.all([makeAuthor(), makeAuthor({ expires: SERVER_NOW - 400 })]);
    const local = await makeLog([a], createDrop({ description: "a and b", drop: { ids: [a.id, b.id], threshold: 1 } }));
    const genesis = (await local.policy()).id;
    const remote = createHttpBundleSource(base, "demo");
    await push(local, remote);

    const backdated = await recordBy(b, genesis, "backdated", SERVER_NOW - 500);
    await expect(remote.submitRecord(submissionFor(backdated, [b]))).rejects.toMatchObject({
      code: "authorization",
      message: `identity ${b.id} expired at ${SERVER_NOW - 400}`,
    });

    const ancient = await recordBy(a, genesis, "ancient", SERVER_NOW - 601);
    await expect(remote.submitRecord(submissionFor(ancient, [a]))).rejects.toMatchObject({
      code: "authorization",
      message: `record ${ancient.id} is stamped ${SERVER_NOW - 601}, more than 600s from the current time ${SERVER_NOW}`,
    });
    expect((await remote.status()).records).toBe(1);
  } finally {
    await server.close();
  }
});

test("http: reads of an unknown drop do not create it", async () => {
  const drops = memoryDrops();
  const server = await startDropSyncServer({ host: "127.0.0.1", port: 0, drops });
  const base = `http://${server.host}:${server.port}`;

  try {
    const status = await httpGet(`${base}/drops/missing/status`);
    expect(status.status).toBe(404);
    expect(JSON.parse(status.body)).toEqual({
      error: { code: "transport", message: "drop missing does not exist", retriable: false },
    });
    expect((await httpGet(`${base}/drops/missing/topics`)).status).toBe(404);

    const bundles = await httpGet(`${base}/drops/missing/bundles`);
    expect(bundles.status).toBe(200);
    expect(JSON.parse(bundles.body)).toEqual({ bundles: [] });
    expect(drops.opened).toEqual(["missing", "missing", "missing"]);
  } finally {
    await server.close();
  }
});

test(
  "websocket: a socket closed while its drop opens still releases it",
  async () => {
    const opening = deferred<void>();
    const gate = deferred<void>();
    const released = deferred<string>();
    const repo = createMemoryRepository();
    const drops: DropProvider = {
      async open(drop): Promise<DropHandle> {
        opening.resolve();
        await gate.promise;
        return { log: new DropLog({ repo, name: drop }), release: () => released.resolve(drop) };
      },
    };
    const server = await startDropSyncServer({ host: "127.0.0.1", port: 0, drops });

    try {
      const ws = await connectWebSocket(`ws://${server.host}:${server.port}/sync?drop=slow`);
      await withTimeout(opening.promise, 2_000, "drop open started");
      const closed = deferred<void>();
      ws.once("close", () => closed.resolve());
      ws.close();
      await withTimeout(closed.promise, 2_000, "ws close");
      await new Promise((resolve) => setTimeout(resolve, 50));

      gate.resolve();
      expect(await withTimeout(released.promise, 2_000, "release after early close")).toBe("slow");
    } finally {
      await server.close();
    }
  },
  { timeout: 20_000 }
);

test("websocket: sending on a closed socket is a transport error", async () => {
  const server = await startDropSyncServer({ host: "127.0.0.1", port: 0, drops: memoryDrops() });
  const url = `ws://${server.host}:${server.port}/sync?drop=gone`;
  try {
    const ws = await connectWebSocket(url);
    const transport = createWebSocketTransport(ws);
    const closed = deferred<void>();
    ws.once("close", () => closed.resolve());
    ws.close();
    await withTimeout(closed.promise, 2_000, "ws close");
    await expect(transport.send(new Uint8Array([1]))).rejects.toMatchObject({ code: "transport", retriable: true });
  } finally {
    await server.close();
  }
  await expect(connectWebSocket(url)).rejects.toMatchObject({ code: "transport", url });
});

test(
  "websocket: peer protocol and release on close",
  async () => {
    const released = deferred<string>();
    const drops = memoryDrops((drop) => {
      if (drop === "ws-demo") released.resolve(drop);
    });
    const server = await startDropSyncServer({ host: "127.0.0.1", port: 0, drops });
    const ws = await connectWebSocket(`ws://${server.host}:${server.port}/sync?drop=ws-demo`);

    try {
      expect(drops.opened).toEqual(["ws-demo"]);
      const peer = new PeerBundleSource(wrapDuplexTransportWithCodec(createWebSocketTransport(ws), peerMessageCodec), {
        drop: "ws-demo",
        timeoutMs: 5_000,
      });

      const a = await makeAuthor();
      const local = await makeLog([a]);
      const root = await local.comment(a, "over websocket");
      expect((await push(local, peer)).submitted).toBe(true);

      const other = emptyLog();
      await sync(other, peer);
      expect(await other.has(root)).toBe(true);
      peer.close();

      const closed = deferred<void>();
      ws.once("close", () => closed.resolve());
      ws.close();
      await withTimeout(closed.promise, 2_000, "ws close");
      expect(await withTimeout(released.promise, 2_000, "server release callback")).toBe("ws-demo");
    } finally {
      await server.close();
    }
  },
  { timeout: 20_000 }
);

test(
  "closes with 1011 when drop open fails",
  async () => {
    const errors: unknown[] = [];
    const server = await startDropSyncServer({
      host: "127.0.0.1",
      port: 0,
      drops: {
        async open() {
          throw new Error("boom");
        },
      },
      onPeerError: (err) => void errors.push(err),
    });

    const wsUrl = `ws://${server.host}:${server.port}/sync?drop=fail-open`;

    try {
      const closed = deferred<{ code: number; reason: string }>();
      const ws = new WebSocket(wsUrl);
      ws.once("close", (code, reason) => {
        closed.resolve({ code, reason: reason.toString("utf8") });
      });
      ws.once("error", closed.reject);
      await new Promise<void>((resolve, reject) => {
        ws.once("open", () => resolve());
        ws.once("error", reject);
      });

      const info = await withTimeout(closed.promise, 2_000, "ws close after open failure");
      expect(info.code).toBe(1011);
      expect(info.reason).toBe("failed to open drop");
      expect(errors).toHaveLength(1);
    } finally {
      await server.close();
    }
  },
  { timeout: 20_000 }
);
