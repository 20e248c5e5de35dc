import type { RecognitionFailure } from "@filament/contracts";

export function jsonError(
  code: string,
  message: string,
  opts?: { status?: number; details?: unknown }
): Response {
  return Response.json(
    { error: { code, message, details: opts?.details } },
    { status: opts?.status ?? 400 }
  );
}

/** A failed recognition in the shape clients of /api/v1/recognize expect. */
export function recognitionFailure(error: string, status = 200): Response {
  const body: RecognitionFailure = { success: false, error };
  return Response.json(body, { status });
}
