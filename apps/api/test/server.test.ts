import test from "node:test";
import assert from "node:assert/strict";
import { silentLogger } from "@filament/core";
import type { App } from "../src/app";
import { createHttpServer } from "../src/server";

function listen(app: App, maxBodyBytes: number) {
  const server = createHttpServer(app, { maxBodyBytes, logger: silentLogger() });
  return new Promise<{ url: string; close: () => Promise<void> }>((resolve) => {
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      const port = typeof address === "object" && address !== null ? address.port : 0;
      resolve({
        url: `http://127.0.0.1:${port}`,
        close: () => new Promise<void>((done) => server.close(() => done())),
      });
    });
  });
}

test("node adapter forwards method, path, headers and body", async () => {
  const seen: Array<{ method: string; path: string; header: string | null; body: string }> = [];
  const app: App = {
    async handle(req) {
      seen.push({
        method: req.method,
        path: new URL(req.url).pathname,
        header: req.headers.get("x-test"),
        body: await req.text(),
      });
      return Response.json({ ok: true }, { status: 201, headers: { "x-reply": "yes" } });
    },
  };

  const server = await listen(app, 1024);
  try {
    const res = await fetch(`${server.url}/echo?x=1`, { method: "POST", headers: { "x-test": "abc" }, body: "hello" });
    assert.equal(res.status, 201);
    assert.equal(res.headers.get("x-reply"), "yes");
    assert.deepEqual(await res.json(), { ok: true });
    assert.deepEqual(seen, [{ method: "POST", path: "/echo", header: "abc", body: "hello" }]);
  } finally {
    await server.close();
  }
});

test("node adapter answers oversized bodies with a 413", async () => {
  let called = false;
  const app: App = {
    async handle() {
      called = true;
      return new Response(null, { status: 204 });
    },
  };

  const server = await listen(app, 8);
  try {
    const res = await fetch(`${server.url}/api/v1/recognize`, { method: "POST", body: "x".repeat(64) });
    assert.equal(res.status, 413);
    assert.deepEqual(await res.json(), { success: false, error: "Request body exceeds 8 bytes" });
    assert.equal(called, false);
  } finally {
    await server.close();
  }
});

test("node adapter reports handler crashes as a 500", async () => {
  const app: App = {
    async handle() {
      throw new Error("boom");
    },
  };

  const server = await listen(app, 1024);
  try {
    const res = await fetch(`${server.url}/health`);
    assert.equal(res.status, 500);
    assert.deepEqual(await res.json(), { success: false, error: "Internal server error" });
  } finally {
    await server.close();
  }
});
