import {
  ApiErrorSchema,
  HealthResponseSchema,
  RecognitionFailureSchema,
  RecognitionResponseSchema,
  ServiceInfoSchema,
  type HealthResponse,
  type RecognitionResponse,
  type ServiceInfo,
} from "@filament/contracts";
import type { z } from "zod";

type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;
type HeaderInput = RequestInit["headers"];

export class FilamentApiError extends Error {
  code: string;
  status: number;
  details?: unknown;

  constructor(opts: { code: string; message: string; status: number; details?: unknown }) {
    super(opts.message);
    this.name = "FilamentApiError";
    this.code = opts.code;
    this.status = opts.status;
    this.details = opts.details;
  }
}

function cleanBaseUrl(baseUrl: string): string {
  const trimmed = baseUrl.trim();
  if (!trimmed) throw new Error("baseUrl is required");
  return trimmed.endsWith("/") ? trimmed.slice(0, -1) : trimmed;
}

function joinPath(baseUrl: string, path: string): string {
  return `${baseUrl}${path.startsWith("/") ? path : `/${path}`}`;
}

function mergeHeaders(base?: HeaderInput, extra?: HeaderInput): Headers {
  const headers = new Headers(base);
  if (extra) {
    const next = new Headers(extra);
    next.forEach((v, k) => headers.set(k, v));
  }
  return headers;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

// The service answers routing errors with an error envelope and rejected
// uploads with a failed recognition body; anything else is surfaced raw.
async function readError(res: Response): Promise<never> {
  const txt = await res.text().catch(() => "");
  const body = parseJson(txt);

  const envelope = ApiErrorSchema.safeParse(body);
  if (envelope.success) {
    throw new FilamentApiError({
      code: envelope.data.error.code,
      message: envelope.data.error.message,
      status: res.status,
      details: envelope.data.error.details,
    });
  }

  const failure = RecognitionFailureSchema.safeParse(body);
  if (failure.success) {
    throw new FilamentApiError({ code: "request_rejected", message: failure.data.error, status: res.status });
  }

  throw new FilamentApiError({ code: "http_error", message: txt || `HTTP ${res.status}`, status: res.status });
}

const IMAGE_MIME: Record<string, string> = {
  png: "image/png",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
};

export function guessImageMime(filename: string): string {
  const ext = filename.split(".").pop()?.toLowerCase() ?? "";
  return IMAGE_MIME[ext] ?? "application/octet-stream";
}

export type FilamentClient = ReturnType<typeof createFilamentClient>;

export function createFilamentClient(opts: { baseUrl: string; fetch?: FetchLike; headers?: HeaderInput }) {
  const baseUrl = cleanBaseUrl(opts.baseUrl);
  const f: FetchLike = opts.fetch ?? fetch;
  const defaultHeaders = new Headers(opts.headers);

  async function request(path: string, init?: RequestInit): Promise<Response> {
    const headers = mergeHeaders(defaultHeaders, init?.headers);
    return f(joinPath(baseUrl, path), { ...init, headers });
  }

  async function getJson<T>(path: string, schema: z.ZodType<T>): Promise<T> {
    const res = await request(path, {
      method: "GET",
      headers: { accept: "application/json" },
    });
    if (!res.ok) return readError(res);
    return schema.parse(await res.json());
  }

  return {
    baseUrl,

    info(): Promise<ServiceInfo> {
      return getJson("/", ServiceInfoSchema);
    },

    health(): Promise<HealthResponse> {
      return getJson("/health", HealthResponseSchema);
    },

    /**
     * Upload a label photo. A label the model could not read still resolves,
     * with `success: false`; rejected uploads and server errors throw.
     */
    async recognize(image: Uint8Array, filename: string): Promise<RecognitionResponse> {
      const form = new FormData();
      form.append("image", new Blob([image], { type: guessImageMime(filename) }), filename);
      const res = await request("/api/v1/recognize", {
        method: "POST",
        headers: { accept: "application/json" },
        body: form,
      });
      if (!res.ok) return readError(res);
      return RecognitionResponseSchema.parse(await res.json());
    },
  };
}
