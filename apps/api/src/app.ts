import type { AppContext, RouteHandler } from "./context";
import { jsonError, recognitionFailure } from "./lib/api";
import { corsHeaders, preflightHeaders } from "./lib/cors";
import * as health from "./routes/health";
import * as metrics from "./routes/metrics";
import * as recognize from "./routes/recognize";
import * as root from "./routes/root";

const ROUTES: Record<string, Partial<Record<string, RouteHandler>>> = {
  "/": { GET: root.GET },
  "/health": { GET: health.GET },
  "/metrics": { GET: metrics.GET },
  "/api/v1/recognize": { POST: recognize.POST },
};

export interface App {
  handle(req: Request): Promise<Response>;
}

function normalizePath(pathname: string): string {
  const trimmed = pathname.replace(/\/+$/, "");
  return trimmed || "/";
}

export function createApp(ctx: AppContext): App {
  const origins = ctx.config.corsOrigins;

  async function dispatch(req: Request, path: string): Promise<Response> {
    const methods = ROUTES[path];
    if (!methods) {
      return jsonError("not_found", `No route for ${path}`, { status: 404 });
    }

    if (req.method === "OPTIONS") {
      return new Response(null, { status: 204, headers: preflightHeaders(req, origins) });
    }

    const handler = methods[req.method];
    if (!handler) {
      const res = jsonError("method_not_allowed", `${req.method} is not allowed on ${path}`, { status: 405 });
      res.headers.set("allow", Object.keys(methods).join(", "));
      return res;
    }

    try {
      return await handler(req, ctx);
    } catch (err) {
      // Details go to the log only.
      ctx.logger.error({ err, route: path, method: req.method }, "Unhandled exception");
      return recognitionFailure("Internal server error", 500);
    }
  }

  return {
    async handle(req: Request): Promise<Response> {
      const path = normalizePath(new URL(req.url).pathname);
      const res = await dispatch(req, path);

      for (const [key, value] of Object.entries(corsHeaders(req.headers.get("origin"), origins))) {
        if (!res.headers.has(key)) res.headers.set(key, value);
      }

      const route = ROUTES[path] ? path : "unmatched";
      ctx.metrics.httpRequestsTotal.inc({ route, method: req.method, status: String(res.status) });
      return res;
    },
  };
}
