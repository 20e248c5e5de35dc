import http, { type IncomingMessage, type ServerResponse } from "node:http";
import type { Logger } from "@filament/core";
import type { App } from "./app";

export class BodyTooLargeError extends Error {
  constructor(limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = "BodyTooLargeError";
  }
}

// Reads to the end even past the limit; the 413 is sent once the body is done.
function readBody(req: IncomingMessage, maxBytes: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let total = 0;
    req.on("data", (chunk: Buffer) => {
      total += chunk.length;
      if (total <= maxBytes) chunks.push(chunk);
    });
    req.on("end", () => {
      if (total > maxBytes) reject(new BodyTooLargeError(maxBytes));
      else resolve(Buffer.concat(chunks));
    });
    req.on("error", reject);
  });
}

/** Adapt a node:http request to a web Request, buffering at most `maxBodyBytes`. */
export async function toWebRequest(req: IncomingMessage, opts: { maxBodyBytes: number }): Promise<Request> {
  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const v of value) headers.append(key, v);
    } else {
      headers.set(key, value);
    }
  }

  const method = req.method ?? "GET";
  const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
  const hasBody = method !== "GET" && method !== "HEAD";

  return new Request(url, {
    method,
    headers,
    body: hasBody ? await readBody(req, opts.maxBodyBytes) : undefined,
  });
}

export async function writeWebResponse(res: ServerResponse, response: Response): Promise<void> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });
  res.writeHead(response.status, headers);
  res.end(Buffer.from(await response.arrayBuffer()));
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(body));
}

export function createHttpServer(app: App, opts: { maxBodyBytes: number; logger: Logger }): http.Server {
  async function onRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const request = await toWebRequest(req, opts);
    await writeWebResponse(res, await app.handle(request));
  }

  return http.createServer((req, res) => {
    onRequest(req, res).catch((err: unknown) => {
      if (err instanceof BodyTooLargeError) {
        sendJson(res, 413, { success: false, error: err.message });
        return;
      }
      opts.logger.error({ err, url: req.url }, "Request handling failed");
      if (res.headersSent) {
        res.destroy();
        return;
      }
      sendJson(res, 500, { success: false, error: "Internal server error" });
    });
  });
}
