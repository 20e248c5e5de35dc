import type { ServiceConfig } from "@filament/contracts";
import type { FilamentRecognizer, Logger, Metrics } from "@filament/core";

/** Everything a route handler may use, built once at startup. */
export interface AppContext {
  config: ServiceConfig;
  recognizer: FilamentRecognizer;
  metrics: Metrics;
  logger: Logger;
}

export type RouteHandler = (req: Request, ctx: AppContext) => Promise<Response>;
