import type { ServiceConfig, VisionConfig } from "@filament/contracts";
import type { Env } from "../config/defaults";
import { errorMessage } from "../errors";
import { childLogger, type Logger } from "../logger";
import type { Metrics } from "../metrics/metrics";
import { buildFilamentPrompt } from "../vision/prompt";
import { createFallbackVisionProvider, createVisionProvider } from "../vision/provider-factory";
import { withRetryProvider } from "../vision/retry";
import type { FetchLike, VisionProviderAdapter } from "../vision/types";
import { createFilamentRecognizer, type FilamentRecognizer } from "./recognizer";

export interface ServiceDeps {
  logger?: Logger;
  metrics?: Metrics;
  fetch?: FetchLike;
  env?: Env;
}

function retrying(vision: VisionConfig, deps: ServiceDeps, log: Logger): VisionProviderAdapter {
  const provider = createVisionProvider(vision, { fetch: deps.fetch, env: deps.env });
  if (vision.maxRetries === 0) return provider;
  return withRetryProvider(provider, {
    maxRetries: vision.maxRetries,
    onRetry: (attempt, error, delayMs) => {
      deps.metrics?.visionRetriesTotal.inc({ provider: provider.name });
      log.warn({ provider: provider.name, attempt, delayMs }, `Retrying vision call: ${errorMessage(error)}`);
    },
  });
}

/** Primary provider first, then each fallback, every one retried on its own. */
export function createVisionProviderChain(config: ServiceConfig, deps: ServiceDeps = {}): VisionProviderAdapter {
  const log = deps.logger ?? childLogger("vision");
  const providers = [config.vision, ...config.fallbackProviders].map((v) => retrying(v, deps, log));
  return createFallbackVisionProvider(providers);
}

export function createRecognizerFromConfig(config: ServiceConfig, deps: ServiceDeps = {}): FilamentRecognizer {
  return createFilamentRecognizer({
    provider: createVisionProviderChain(config, deps),
    maxTokens: config.vision.maxTokens,
    temperature: config.vision.temperature,
    prompt: buildFilamentPrompt({ language: config.vision.promptLanguage }),
    logger: deps.logger,
    metrics: deps.metrics,
  });
}
