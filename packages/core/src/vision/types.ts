export interface VisionRequest {
  /** Base64-encoded JPEG, without the data URI prefix */
  imageBase64: string;
  mimeType: "image/jpeg";
  /** Instruction sent alongside the image */
  prompt: string;
  maxTokens: number;
  temperature: number;
}

export interface VisionResponse {
  /** The model's reply, exactly as returned */
  text: string;
  promptTokens: number | null;
  completionTokens: number | null;
  raw?: unknown;
}

export interface VisionProviderAdapter {
  readonly name: string;
  readonly model: string;
  analyze(req: VisionRequest): Promise<VisionResponse>;
}

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

/** Options every HTTP-backed provider accepts. */
export interface HttpProviderOpts {
  model?: string;
  baseUrl?: string;
  /** Abort the request after this many ms (default 30000) */
  timeoutMs?: number;
  fetch?: FetchLike;
}

export function toDataUri(req: VisionRequest): string {
  return `data:${req.mimeType};base64,${req.imageBase64}`;
}
