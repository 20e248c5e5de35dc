const ALLOW_METHODS = "GET, POST, OPTIONS";

/**
 * CORS headers for a request from `origin`. A `*` entry in `allowed` opens
 * the API to every origin; otherwise only listed origins are echoed back.
 */
export function corsHeaders(origin: string | null, allowed: readonly string[]): Record<string, string> {
  if (allowed.includes("*")) {
    return { "access-control-allow-origin": "*" };
  }
  if (origin && allowed.includes(origin)) {
    return {
      "access-control-allow-origin": origin,
      "access-control-allow-credentials": "true",
      vary: "Origin",
    };
  }
  return {};
}

export function preflightHeaders(req: Request, allowed: readonly string[]): Record<string, string> {
  const base = corsHeaders(req.headers.get("origin"), allowed);
  if (!base["access-control-allow-origin"]) return base;
  return {
    ...base,
    "access-control-allow-methods": ALLOW_METHODS,
    "access-control-allow-headers": req.headers.get("access-control-request-headers") || "*",
    "access-control-max-age": "600",
  };
}
