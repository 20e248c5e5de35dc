import { VisionApiError } from "../../errors";
import { asObject } from "../json";
import type { FetchLike } from "../types";

export const DEFAULT_TIMEOUT_MS = 30_000;

function providerMessage(text: string): string | undefined {
  try {
    const body = asObject(JSON.parse(text));
    if (!body) return undefined;
    if (typeof body.message === "string" && body.message) return body.message;
    const nested = asObject(body.error);
    if (nested && typeof nested.message === "string" && nested.message) return nested.message;
    if (typeof body.error === "string" && body.error) return body.error;
  } catch {
    // Not JSON; the raw text is reported instead.
  }
  return undefined;
}

/** Retry-After as delta-seconds or an HTTP date, in ms from `now`. */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | null {
  const s = value?.trim();
  if (!s) return null;
  if (/^\d+$/.test(s)) return Number(s) * 1000;
  const at = Date.parse(s);
  return Number.isNaN(at) ? null : Math.max(0, at - now);
}

export function trimBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/$/, "");
}

/**
 * POST a JSON body and return the parsed reply. Non-2xx statuses become a
 * VisionApiError carrying the provider's own error message when it has one.
 */
export async function postJson(opts: {
  provider: string;
  url: string;
  body: unknown;
  headers?: Record<string, string>;
  timeoutMs?: number;
  fetch?: FetchLike;
}): Promise<unknown> {
  const f: FetchLike = opts.fetch ?? fetch;
  const res = await f(opts.url, {
    method: "POST",
    headers: { "content-type": "application/json", ...(opts.headers ?? {}) },
    body: JSON.stringify(opts.body),
    signal: AbortSignal.timeout(opts.timeoutMs ?? DEFAULT_TIMEOUT_MS),
  });

  if (!res.ok) {
    const text = await res.text().catch(() => "");
    throw new VisionApiError({
      provider: opts.provider,
      status: res.status,
      body: text,
      message: providerMessage(text),
      retryAfterMs: parseRetryAfter(res.headers.get("retry-after")),
    });
  }

  const body: unknown = await res.json();
  return body;
}
