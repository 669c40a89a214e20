import { expect, test } from "vitest";

import { AuthorizationError, ConflictError, IntegrityError, TransportError, contentHash } from "@patchdrop/auth";

import { createHttpBundleSource } from "../src/http.js";

type Call = { url: string; method: string; contentType: string | null };

function fakeFetch(respond: (url: string) => Response | Promise<Response>) {
  const calls: Call[] = [];
  const fetch: typeof globalThis.fetch = async (input, init) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    calls.push({ url, method: init?.method ?? "GET", contentType: new Headers(init?.headers).get("content-type") });
    return respond(url);
  };
  return { fetch, calls };
}

const json = (status: number, body: unknown) =>
  new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });

test("http source: advertise and fetch by hash", async () => {
  const bytes = new TextEncoder().encode("bundle bytes");
  const hash = contentHash(bytes);
  const { fetch, calls } = fakeFetch((url) =>
    url.endsWith("/bundles") ? json(200, { bundles: [hash] }) : new Response(bytes, { status: 200 })
  );
  const source = createHttpBundleSource("http://example.test/", "my drop", { fetch });

  expect(await source.advertise()).toEqual([hash]);
  expect(await source.fetch(hash)).toEqual(bytes);
  expect(calls.map((c) => c.url)).toEqual([
    "http://example.test/drops/my%20drop/bundles",
    `http://example.test/drops/my%20drop/bundles/${hash}`,
  ]);
});

test("http source: altered bytes are a retriable transport failure", async () => {
  const hash = contentHash(new TextEncoder().encode("expected"));
  const { fetch } = fakeFetch(() => new Response(new TextEncoder().encode("other"), { status: 200 }));
  const source = createHttpBundleSource("http://example.test", "d", { fetch });
  await expect(source.fetch(hash)).rejects.toMatchObject({ code: "transport", retriable: true });
});

test("http source: error bodies keep the server's classification", async () => {
  const bodies = new Map<string, Response>();
  const { fetch } = fakeFetch((url) => bodies.get(url) ?? json(500, {}));
  const source = createHttpBundleSource("http://example.test", "d", { fetch });
  const url = "http://example.test/drops/d/bundles";

  bodies.set(url, json(403, { error: { code: "authorization", message: "needs 2", role: "drop", required: 2, got: 1 } }));
  const denied = source.submitBundle(new Uint8Array([1]));
  await expect(denied).rejects.toBeInstanceOf(AuthorizationError);
  await expect(denied).rejects.toMatchObject({ message: "needs 2", role: "drop", required: 2, got: 1 });

  bodies.set(url, json(400, { error: { code: "integrity", message: "bundle: invalid CBOR" } }));
  await expect(source.submitBundle(new Uint8Array([1]))).rejects.toThrow(new IntegrityError("bundle: invalid CBOR"));

  bodies.set(url, json(409, { error: { code: "conflict", message: "busy" } }));
  await expect(source.advertise()).rejects.toBeInstanceOf(ConflictError);

  bodies.set(url, new Response("bad gateway", { status: 502 }));
  await expect(source.advertise()).rejects.toMatchObject({ retriable: true, status: 502, message: `${url} responded 502` });

  bodies.set(url, new Response("too big", { status: 413 }));
  await expect(source.advertise()).rejects.toMatchObject({ retriable: false, status: 413 });
});

test("http source: unreachable servers are retriable", async () => {
  const fetch: typeof globalThis.fetch = async () => {
    throw new TypeError("fetch failed");
  };
  const source = createHttpBundleSource("http://example.test", "d", { fetch });
  const err = await source.advertise().catch((e: unknown) => e);
  expect(err).toBeInstanceOf(TransportError);
  expect(err).toMatchObject({ retriable: true, message: "GET http://example.test/drops/d/bundles failed: fetch failed" });
});

test("http source: submissions carry their content type", async () => {
  const hash = "ab".repeat(32);
  const { fetch, calls } = fakeFetch(() => json(200, { hash, newRecords: [hash], newTopics: [] }));
  const source = createHttpBundleSource("http://example.test", "d", { fetch });
  expect(await source.submitBundle(new Uint8Array([1, 2]))).toEqual({ hash, newRecords: [hash], newTopics: [] });
  expect(calls).toEqual([{ url: "http://example.test/drops/d/bundles", method: "POST", contentType: "application/vnd.patchdrop.bundle" }]);
});
