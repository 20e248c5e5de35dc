import fs from "node:fs";
import path from "node:path";
import {
  ServiceConfigSchema,
  VisionProviderSchema,
  type ServiceConfig,
  type VisionConfig,
  type VisionProvider,
} from "@filament/contracts";
import { apiKeyEnvNames, providerNeedsApiKey, resolveApiKey } from "../vision/provider-factory";

export type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function clean(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

export function parseDotEnv(text: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;
    const m = line.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!m) continue;
    const key = m[1];
    let value = m[2] ?? "";
    if (
      (value.startsWith('"') && value.endsWith('"') && value.length >= 2) ||
      (value.startsWith("'") && value.endsWith("'") && value.length >= 2)
    ) {
      value = value.slice(1, -1);
    }
    out[key] = value;
  }
  return out;
}

function findUp(startDir: string, fileName: string, maxDepth = 8): string | null {
  let dir = startDir;
  for (let i = 0; i < maxDepth; i++) {
    const candidate = path.join(dir, fileName);
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return null;
}

function readDotEnvFile(startDir: string, fileName: string): Record<string, string> {
  const file = findUp(startDir, fileName, 8);
  if (!file) return {};
  return parseDotEnv(fs.readFileSync(file, "utf8"));
}

/**
 * Merge `.env.example`, then `.env`, then the real environment, later
 * sources winning. Both files are looked up from `cwd` towards the root.
 */
export function readEnv(env: Env = process.env, cwd: string = process.cwd()): Env {
  return {
    ...readDotEnvFile(cwd, ".env.example"),
    ...readDotEnvFile(cwd, ".env"),
    ...env,
  };
}

export function getDefaultModel(provider: VisionProvider): string {
  switch (provider) {
    case "dashscope":
      return "qwen-vl-plus";
    case "openai":
      return "gpt-4o";
    case "gemini":
      return "gemini-2.0-flash";
    case "claude":
      return "claude-sonnet-4-20250514";
    case "ollama":
      return "llava";
    case "mock":
      return "mock-label-reader";
  }
}

function csv(value: string | undefined, fallback: string[]): string[] {
  const items = clean(value)
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return items.length ? items : fallback;
}

function num(value: string | undefined): number | undefined {
  const s = clean(value);
  return s ? Number(s) : undefined;
}

function parseProvider(raw: string, source: string): VisionProvider {
  const parsed = VisionProviderSchema.safeParse(raw.toLowerCase());
  if (!parsed.success) {
    throw new ConfigError(
      `${source}: unknown vision provider '${raw}' (expected one of ${VisionProviderSchema.options.join(", ")})`,
    );
  }
  return parsed.data;
}

/** Parse VISION_FALLBACK_PROVIDERS, a list like `openai,gemini:gemini-1.5-pro`. */
function parseFallbacks(raw: string | undefined, shared: Omit<VisionConfig, "provider" | "model">): VisionConfig[] {
  return csv(raw, []).map((entry) => {
    const [name, model] = entry.split(":", 2);
    const provider = parseProvider(name, "VISION_FALLBACK_PROVIDERS");
    return {
      ...shared,
      provider,
      model: clean(model) || getDefaultModel(provider),
    };
  });
}

/** Resolve the service configuration from environment variables. */
export function loadServiceConfig(env: Env = readEnv()): ServiceConfig {
  const provider = parseProvider(clean(env.VISION_PROVIDER) || "dashscope", "VISION_PROVIDER");

  const shared = {
    maxTokens: num(env.MAX_TOKENS) ?? 2000,
    temperature: num(env.TEMPERATURE) ?? 0.1,
    timeoutMs: num(env.VISION_TIMEOUT_MS) ?? 30_000,
    maxRetries: num(env.VISION_MAX_RETRIES) ?? 2,
    promptLanguage: clean(env.PROMPT_LANGUAGE) || "en",
  };

  const parsed = ServiceConfigSchema.safeParse({
    host: clean(env.HOST) || undefined,
    port: num(env.PORT),
    corsOrigins: csv(env.CORS_ORIGINS, ["*"]),
    maxImageSizeMb: num(env.MAX_IMAGE_SIZE_MB),
    allowedImageTypes: csv(env.ALLOWED_IMAGE_TYPES, ["jpeg", "jpg", "png"]).map((t) => t.toLowerCase()),
    logLevel: clean(env.LOG_LEVEL).toLowerCase() || undefined,
    vision: {
      ...shared,
      provider,
      model: clean(env.MODEL_NAME) || getDefaultModel(provider),
      baseUrl: clean(env.VISION_BASE_URL) || undefined,
    },
    fallbackProviders: parseFallbacks(env.VISION_FALLBACK_PROVIDERS, {
      maxTokens: shared.maxTokens,
      temperature: shared.temperature,
      timeoutMs: shared.timeoutMs,
      maxRetries: shared.maxRetries,
      promptLanguage: shared.promptLanguage === "zh" ? "zh" : "en",
    }),
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}

/** Fail fast when a configured provider has no API key to call it with. */
export function validateServiceConfig(config: ServiceConfig, env: Env = readEnv()): void {
  for (const vision of [config.vision, ...config.fallbackProviders]) {
    if (!providerNeedsApiKey(vision.provider)) continue;
    if (resolveApiKey(vision, env)) continue;
    throw new ConfigError(
      `${apiKeyEnvNames(vision.provider).join(" or ")} is required for the ${vision.provider} vision provider. ` +
        "Set it in .env or the environment.",
    );
  }
}

export function maxImageSizeBytes(config: Pick<ServiceConfig, "maxImageSizeMb">): number {
  return Math.floor(config.maxImageSizeMb * 1024 * 1024);
}
