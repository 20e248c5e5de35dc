import type { VisionConfig } from "@filament/contracts";
import { errorMessage } from "../errors";
import type { FetchLike, VisionProviderAdapter, VisionRequest, VisionResponse } from "./types";
import { createDashScopeVisionProvider } from "./providers/dashscope";
import { createOpenAIVisionProvider } from "./providers/openai";
import { createGeminiVisionProvider } from "./providers/gemini";
import { createClaudeVisionProvider } from "./providers/claude";
import { createOllamaVisionProvider } from "./providers/ollama";
import { createMockVisionProvider } from "./providers/mock";

type Env = Record<string, string | undefined>;

/** Conventional env var(s) holding each provider's API key. */
const API_KEY_ENV: Record<VisionConfig["provider"], string[]> = {
  dashscope: ["DASHSCOPE_API_KEY"],
  openai: ["OPENAI_API_KEY"],
  gemini: ["GEMINI_API_KEY", "GOOGLE_API_KEY"],
  claude: ["ANTHROPIC_API_KEY"],
  ollama: [],
  mock: [],
};

export function providerNeedsApiKey(provider: VisionConfig["provider"]): boolean {
  return API_KEY_ENV[provider].length > 0;
}

export function resolveApiKey(config: Pick<VisionConfig, "provider" | "apiKey">, env: Env = process.env): string {
  if (config.apiKey) return config.apiKey;
  for (const name of API_KEY_ENV[config.provider]) {
    const value = env[name]?.trim();
    if (value) return value;
  }
  return "";
}

export function apiKeyEnvNames(provider: VisionConfig["provider"]): string[] {
  return [...API_KEY_ENV[provider]];
}

export function createVisionProvider(
  config: VisionConfig,
  opts?: { fetch?: FetchLike; env?: Env },
): VisionProviderAdapter {
  const common = {
    model: config.model,
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    fetch: opts?.fetch,
  };
  const apiKey = resolveApiKey(config, opts?.env);

  switch (config.provider) {
    case "dashscope":
      return createDashScopeVisionProvider({ ...common, apiKey });
    case "openai":
      return createOpenAIVisionProvider({ ...common, apiKey });
    case "gemini":
      return createGeminiVisionProvider({ ...common, apiKey });
    case "claude":
      return createClaudeVisionProvider({ ...common, apiKey });
    case "ollama":
      return createOllamaVisionProvider(common);
    case "mock":
      return createMockVisionProvider({ model: config.model });
    default: {
      const unknown: never = config.provider;
      throw new Error(`Unknown vision provider: ${String(unknown)}`);
    }
  }
}

/**
 * Wrap multiple providers into a single adapter that tries each in order.
 * Falls through on errors and on blank replies. When every provider fails,
 * the AggregateError lists each one's reason in order.
 */
export function createFallbackVisionProvider(
  providers: VisionProviderAdapter[],
): VisionProviderAdapter {
  const [first] = providers;
  if (!first) throw new Error("No vision providers supplied");
  if (providers.length === 1) return first;

  return {
    name: providers.map((p) => p.name).join("→"),
    model: first.model,
    async analyze(req: VisionRequest): Promise<VisionResponse> {
      const failures: Array<{ provider: string; error: unknown }> = [];
      for (const provider of providers) {
        try {
          const result = await provider.analyze(req);
          if (result.text.trim()) return result;
          failures.push({ provider: provider.name, error: new Error("empty reply") });
        } catch (err) {
          failures.push({ provider: provider.name, error: err });
        }
      }
      const summary = failures.map((f) => `${f.provider}: ${errorMessage(f.error)}`).join("; ");
      throw new AggregateError(
        failures.map((f) => f.error),
        `All vision providers failed (${summary})`,
      );
    },
  };
}
