import client from "prom-client";

export type Metrics = {
  register: client.Registry;
  httpRequestsTotal: client.Counter<"route" | "method" | "status">;
  recognitionsTotal: client.Counter<"provider" | "status">;
  recognitionDurationMs: client.Histogram<"provider" | "status">;
  visionRetriesTotal: client.Counter<"provider">;
};

/**
 * Build a registry with the service's metrics. Each call returns an
 * independent registry; the server builds one at startup and passes it down.
 */
export function createMetrics(opts?: { collectDefaults?: boolean }): Metrics {
  const register = new client.Registry();
  if (opts?.collectDefaults ?? true) {
    client.collectDefaultMetrics({ register });
  }

  const httpRequestsTotal = new client.Counter({
    name: "filament_http_requests_total",
    help: "Total HTTP requests",
    labelNames: ["route", "method", "status"] as const,
    registers: [register],
  });

  const recognitionsTotal = new client.Counter({
    name: "filament_recognitions_total",
    help: "Label recognitions attempted",
    labelNames: ["provider", "status"] as const,
    registers: [register],
  });

  const recognitionDurationMs = new client.Histogram({
    name: "filament_recognition_duration_ms",
    help: "Label recognition duration in ms, image preparation included",
    labelNames: ["provider", "status"] as const,
    buckets: [100, 250, 500, 1_000, 2_500, 5_000, 10_000, 20_000, 40_000, 60_000],
    registers: [register],
  });

  const visionRetriesTotal = new client.Counter({
    name: "filament_vision_retries_total",
    help: "Vision API calls retried after a transient failure",
    labelNames: ["provider"] as const,
    registers: [register],
  });

  return { register, httpRequestsTotal, recognitionsTotal, recognitionDurationMs, visionRetriesTotal };
}
