import { describe, it } from "node:test";
import assert from "node:assert/strict";
import sharp from "sharp";
import {
  RecognitionError,
  createMetrics,
  createRecognizerFromConfig,
  loadServiceConfig,
  silentLogger,
  type FilamentRecognition,
  type FilamentRecognizer,
} from "@filament/core";
import { createApp } from "../src/app";
import type { AppContext } from "../src/context";

const LABEL: FilamentRecognition["data"] = {
  brand: "Polymaker",
  material: "PETG",
  colorName: "Teal Blue",
  colorHex: "#008080",
  weight: "1000",
  diameter: 1.75,
  temperatureInfo: "230-250°C",
};

function fakeRecognizer(recognize: (image: Buffer) => Promise<FilamentRecognition>): FilamentRecognizer {
  return { provider: "fake", model: "fake-v1", recognize };
}

function makeContext(opts?: { env?: Record<string, string>; recognizer?: FilamentRecognizer }): AppContext {
  return {
    config: loadServiceConfig({ VISION_PROVIDER: "mock", ...opts?.env }),
    recognizer:
      opts?.recognizer ??
      fakeRecognizer(async () => ({ data: LABEL, confidence: 1, provider: "fake", model: "fake-v1", durationMs: 3 })),
    metrics: createMetrics({ collectDefaults: false }),
    logger: silentLogger(),
  };
}

async function pngBlob(): Promise<Blob> {
  const bytes = await sharp({ create: { width: 4, height: 4, channels: 3, background: { r: 0, g: 128, b: 128 } } })
    .png()
    .toBuffer();
  return new Blob([bytes], { type: "image/png" });
}

async function upload(filename = "spool.png"): Promise<Request> {
  const form = new FormData();
  form.append("image", await pngBlob(), filename);
  return new Request("http://test.local/api/v1/recognize", { method: "POST", body: form });
}

function get(path: string, headers?: Record<string, string>): Request {
  return new Request(`http://test.local${path}`, { headers });
}

describe("service routes", () => {
  it("GET / describes the service", async () => {
    const res = await createApp(makeContext()).handle(get("/"));
    assert.equal(res.status, 200);
    assert.deepEqual(await res.json(), { service: "Filament Recognition Service", version: "1.0.0", status: "running" });
  });

  it("GET /health reports healthy, with or without a trailing slash", async () => {
    const app = createApp(makeContext());
    for (const path of ["/health", "/health/"]) {
      const res = await app.handle(get(path));
      assert.equal(res.status, 200);
      assert.deepEqual(await res.json(), { status: "healthy" });
    }
  });

  it("GET /metrics exposes the registry in text format", async () => {
    const ctx = makeContext();
    const app = createApp(ctx);
    await app.handle(get("/health"));

    const res = await app.handle(get("/metrics"));
    assert.equal(res.status, 200);
    assert.match(res.headers.get("content-type") ?? "", /^text\/plain/);
    const body = await res.text();
    assert.match(body, /filament_http_requests_total\{route="\/health",method="GET",status="200"\} 1/);
  });

  it("answers unknown routes with a 404 envelope", async () => {
    const ctx = makeContext();
    const res = await createApp(ctx).handle(get("/nope"));
    assert.equal(res.status, 404);
    assert.deepEqual(await res.json(), { error: { code: "not_found", message: "No route for /nope" } });

    const { values } = await ctx.metrics.httpRequestsTotal.get();
    assert.deepEqual(
      values.map((v) => [v.labels.route, v.labels.status, v.value]),
      [["unmatched", "404", 1]],
    );
  });

  it("answers the wrong method with a 405 and an allow header", async () => {
    const res = await createApp(makeContext()).handle(get("/api/v1/recognize"));
    assert.equal(res.status, 405);
    assert.equal(res.headers.get("allow"), "POST");
    const body: unknown = await res.json();
    assert.deepEqual(body, { error: { code: "method_not_allowed", message: "GET is not allowed on /api/v1/recognize" } });
  });
});

describe("CORS", () => {
  it("opens every route to any origin by default", async () => {
    const res = await createApp(makeContext()).handle(get("/health", { origin: "http://ui.test" }));
    assert.equal(res.headers.get("access-control-allow-origin"), "*");
  });

  it("answers preflight requests", async () => {
    const req = new Request("http://test.local/api/v1/recognize", {
      method: "OPTIONS",
      headers: { origin: "http://ui.test", "access-control-request-headers": "content-type" },
    });
    const res = await createApp(makeContext()).handle(req);
    assert.equal(res.status, 204);
    assert.equal(res.headers.get("access-control-allow-origin"), "*");
    assert.equal(res.headers.get("access-control-allow-methods"), "GET, POST, OPTIONS");
    assert.equal(res.headers.get("access-control-allow-headers"), "content-type");
    assert.equal(res.headers.get("access-control-max-age"), "600");
  });

  it("echoes only listed origins", async () => {
    const app = createApp(makeContext({ env: { CORS_ORIGINS: "http://ui.test" } }));

    const allowed = await app.handle(get("/health", { origin: "http://ui.test" }));
    assert.equal(allowed.headers.get("access-control-allow-origin"), "http://ui.test");
    assert.equal(allowed.headers.get("access-control-allow-credentials"), "true");
    assert.equal(allowed.headers.get("vary"), "Origin");

    const other = await app.handle(get("/health", { origin: "http://evil.test" }));
    assert.equal(other.status, 200);
    assert.equal(other.headers.get("access-control-allow-origin"), null);
  });
});

describe("POST /api/v1/recognize", () => {
  it("returns the recognized label and confidence", async () => {
    const seen: number[] = [];
    const ctx = makeContext({
      recognizer: fakeRecognizer(async (image) => {
        seen.push(image.length);
        return { data: LABEL, confidence: 1, provider: "fake", model: "fake-v1", durationMs: 3 };
      }),
    });

    const res = await createApp(ctx).handle(await upload());
    assert.equal(res.status, 200);
    assert.deepEqual(await res.json(), { success: true, data: LABEL, confidence: 1 });
    assert.equal(seen.length, 1);
    assert.ok((seen[0] ?? 0) > 0);
  });

  it("rejects a request without an image with a 400 failure", async () => {
    const form = new FormData();
    form.append("note", "no file here");
    const req = new Request("http://test.local/api/v1/recognize", { method: "POST", body: form });

    const res = await createApp(makeContext()).handle(req);
    assert.equal(res.status, 400);
    assert.deepEqual(await res.json(), { success: false, error: "No image file provided in the 'image' field" });
  });

  it("rejects disallowed file types", async () => {
    const res = await createApp(makeContext()).handle(await upload("spool.webp"));
    assert.equal(res.status, 400);
    assert.deepEqual(await res.json(), {
      success: false,
      error: "Unsupported image type. Allowed types: jpeg, jpg, png",
    });
  });

  it("reports recognition failures in the body with a 200", async () => {
    const ctx = makeContext({
      recognizer: fakeRecognizer(async () => {
        throw new RecognitionError(new Error("model down"));
      }),
    });

    const res = await createApp(ctx).handle(await upload());
    assert.equal(res.status, 200);
    assert.deepEqual(await res.json(), { success: false, error: "Recognition failed: model down" });
  });

  it("turns unexpected errors into a 500", async () => {
    const ctx = makeContext({
      recognizer: fakeRecognizer(async () => {
        throw new TypeError("bug");
      }),
    });

    const res = await createApp(ctx).handle(await upload());
    assert.equal(res.status, 500);
    assert.deepEqual(await res.json(), { success: false, error: "Internal server error" });
    assert.equal(res.headers.get("access-control-allow-origin"), "*");
  });

  it("runs the real recognizer end to end with the mock provider", async () => {
    const base = makeContext();
    const ctx: AppContext = {
      ...base,
      recognizer: createRecognizerFromConfig(base.config, { logger: base.logger, metrics: base.metrics, env: {} }),
    };

    const res = await createApp(ctx).handle(await upload());
    assert.equal(res.status, 200);
    const body: unknown = await res.json();
    assert.ok(typeof body === "object" && body !== null && "confidence" in body);
    assert.equal(body.confidence, 1);
  });
});
