/**
 * Backoff for vision calls.
 *
 * Only failures whose type says the call may succeed later are retried: a
 * throttling or server status from the provider, a request timeout, or a
 * dropped connection. Everything else, including an unreadable 200 reply,
 * fails on the first attempt.
 */

import { VisionApiError } from "../errors";
import type { VisionProviderAdapter, VisionRequest, VisionResponse } from "./types";

export interface RetryOpts {
  /** Retries after the first attempt (default 2) */
  maxRetries?: number;
  /** Backoff before the first retry in ms (default 1000) */
  initialDelayMs?: number;
  /** Upper bound for any single wait, Retry-After included (default 30000) */
  maxDelayMs?: number;
  /** Backoff growth per attempt (default 2) */
  multiplier?: number;
  /** Random spread around the backoff, 0-1 (default 0.25) */
  jitter?: number;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

export interface BackoffPolicy {
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  jitter: number;
}

const RETRY_STATUSES = new Set([408, 429]);

// Socket errors fetch reports as the cause of its "fetch failed" TypeError.
const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

function errorCode(value: unknown): string | undefined {
  if (typeof value !== "object" || value === null || !("code" in value)) return undefined;
  return typeof value.code === "string" ? value.code : undefined;
}

export function isTransientError(err: unknown): boolean {
  if (err instanceof VisionApiError) {
    return RETRY_STATUSES.has(err.status) || err.status >= 500;
  }
  if (!(err instanceof Error)) return false;

  // AbortSignal.timeout() rejects with a DOMException named TimeoutError.
  if (err.name === "TimeoutError") return true;

  if (err instanceof TypeError) {
    const code = errorCode(err.cause);
    return code !== undefined && NETWORK_ERROR_CODES.has(code);
  }
  return false;
}

/** Exponential backoff for the given zero-based attempt, jittered and capped. */
export function backoffDelay(attempt: number, policy: BackoffPolicy): number {
  const base = Math.min(policy.initialDelayMs * policy.multiplier ** attempt, policy.maxDelayMs);
  const spread = base * policy.jitter * (Math.random() * 2 - 1);
  return Math.max(0, Math.round(base + spread));
}

function retryDelay(err: unknown, attempt: number, policy: BackoffPolicy): number {
  const hinted = err instanceof VisionApiError ? err.retryAfterMs : null;
  return Math.min(hinted ?? backoffDelay(attempt, policy), policy.maxDelayMs);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOpts = {}): Promise<T> {
  const maxRetries = opts.maxRetries ?? 2;
  const policy: BackoffPolicy = {
    initialDelayMs: opts.initialDelayMs ?? 1000,
    maxDelayMs: opts.maxDelayMs ?? 30_000,
    multiplier: opts.multiplier ?? 2,
    jitter: opts.jitter ?? 0.25,
  };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= maxRetries || !isTransientError(err)) throw err;
      const delayMs = retryDelay(err, attempt, policy);
      opts.onRetry?.(attempt + 1, err, delayMs);
      await sleep(delayMs);
    }
  }
}

/** Same provider, with transient failures retried. */
export function withRetryProvider(provider: VisionProviderAdapter, opts?: RetryOpts): VisionProviderAdapter {
  return {
    name: provider.name,
    model: provider.model,
    analyze(req: VisionRequest): Promise<VisionResponse> {
      return withRetry(() => provider.analyze(req), opts);
    },
  };
}
