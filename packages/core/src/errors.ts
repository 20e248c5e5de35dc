export function errorMessage(err: unknown): string {
  const raw = err instanceof Error ? err.message : String(err ?? "");
  return raw.trim() || "unknown_error";
}

/** Bytes that could not be decoded as an image. */
export class InvalidImageError extends Error {
  constructor(message: string, opts?: { cause?: unknown }) {
    super(message, opts);
    this.name = "InvalidImageError";
  }
}

/** Non-success status from a vision provider. */
export class VisionApiError extends Error {
  provider: string;
  status: number;
  body: string;
  /** Wait requested by the provider's Retry-After header, if any. */
  retryAfterMs: number | null;

  constructor(opts: { provider: string; status: number; body?: string; message?: string; retryAfterMs?: number | null }) {
    const detail = opts.message || opts.body || "";
    super(`${opts.provider} vision API error ${opts.status}${detail ? `: ${detail}` : ""}`);
    this.name = "VisionApiError";
    this.provider = opts.provider;
    this.status = opts.status;
    this.body = opts.body ?? "";
    this.retryAfterMs = opts.retryAfterMs ?? null;
  }
}

/** Provider replied but the reply carried no usable text. */
export class ContentExtractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ContentExtractionError";
  }
}

export type InterpretationErrorCode = "empty_response" | "no_json_found" | "malformed_json" | "not_an_object";

/** Model output could not be turned into a filament record. */
export class InterpretationError extends Error {
  code: InterpretationErrorCode;

  constructor(code: InterpretationErrorCode, message: string, opts?: { cause?: unknown }) {
    super(message, opts);
    this.name = "InterpretationError";
    this.code = code;
  }
}

/** Anything that went wrong between the prepared image and the normalized record. */
export class RecognitionError extends Error {
  constructor(cause: unknown) {
    super(`Recognition failed: ${errorMessage(cause)}`, { cause });
    this.name = "RecognitionError";
  }
}
