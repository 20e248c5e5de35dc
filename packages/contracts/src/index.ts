import { z } from "zod";

export const ApiErrorSchema = z.object({
  error: z.object({
    code: z.string().min(1),
    message: z.string().min(1),
    details: z.unknown().optional(),
  }),
});
export type ApiError = z.infer<typeof ApiErrorSchema>;

export const HealthResponseSchema = z.object({
  status: z.literal("healthy"),
});
export type HealthResponse = z.infer<typeof HealthResponseSchema>;

export const ServiceInfoSchema = z.object({
  service: z.string().min(1),
  version: z.string().min(1),
  status: z.literal("running"),
});
export type ServiceInfo = z.infer<typeof ServiceInfoSchema>;

// Only two spool diameters exist on the market; anything else is a misread.
export const FILAMENT_DIAMETERS = [1.75, 2.85] as const;

export const FilamentDiameterSchema = z.union([z.literal(1.75), z.literal(2.85)]);
export type FilamentDiameter = z.infer<typeof FilamentDiameterSchema>;

export const RecognizedFilamentDataSchema = z.object({
  brand: z.string().nullable().default(null),
  material: z.string().nullable().default(null),
  colorName: z.string().nullable().default(null),
  /** Expected as #RRGGBB; only the leading "#" is enforced. */
  colorHex: z.string().nullable().default(null),
  /** Gram count as text, e.g. "1000". */
  weight: z.string().nullable().default(null),
  diameter: FilamentDiameterSchema.nullable().default(null),
  /** Printing temperatures when the label shows them. Not scored. */
  temperatureInfo: z.string().nullable().default(null),
});
export type RecognizedFilamentData = z.infer<typeof RecognizedFilamentDataSchema>;

/** Fields that take part in the completeness score. */
export const SCORED_FILAMENT_FIELDS = [
  "brand",
  "material",
  "colorName",
  "colorHex",
  "weight",
  "diameter",
] as const satisfies ReadonlyArray<keyof RecognizedFilamentData>;
export type ScoredFilamentField = (typeof SCORED_FILAMENT_FIELDS)[number];

export const RecognitionSuccessSchema = z.object({
  success: z.literal(true),
  data: RecognizedFilamentDataSchema,
  confidence: z.number().min(0).max(1),
});
export type RecognitionSuccess = z.infer<typeof RecognitionSuccessSchema>;

export const RecognitionFailureSchema = z.object({
  success: z.literal(false),
  error: z.string().min(1),
});
export type RecognitionFailure = z.infer<typeof RecognitionFailureSchema>;

export const RecognitionResponseSchema = z.discriminatedUnion("success", [
  RecognitionSuccessSchema,
  RecognitionFailureSchema,
]);
export type RecognitionResponse = z.infer<typeof RecognitionResponseSchema>;

export const VisionProviderSchema = z.enum(["dashscope", "openai", "gemini", "claude", "ollama", "mock"]);
export type VisionProvider = z.infer<typeof VisionProviderSchema>;

export const PromptLanguageSchema = z.enum(["en", "zh"]);
export type PromptLanguage = z.infer<typeof PromptLanguageSchema>;

export const VisionConfigSchema = z.object({
  provider: VisionProviderSchema,
  model: z.string().min(1),
  baseUrl: z.string().url().optional(),
  apiKey: z.string().min(1).optional(),
  maxTokens: z.number().int().min(50).max(8192).default(2000),
  temperature: z.number().min(0).max(2).default(0.1),
  timeoutMs: z.number().int().min(1000).max(600_000).default(30_000),
  maxRetries: z.number().int().min(0).max(10).default(2),
  promptLanguage: PromptLanguageSchema.default("en"),
});
export type VisionConfig = z.infer<typeof VisionConfigSchema>;

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const ServiceConfigSchema = z.object({
  host: z.string().min(1).default("0.0.0.0"),
  port: z.number().int().min(1).max(65535).default(8000),
  corsOrigins: z.array(z.string().min(1)).min(1).default(["*"]),
  maxImageSizeMb: z.number().positive().max(100).default(10),
  allowedImageTypes: z.array(z.string().min(1)).min(1).default(["jpeg", "jpg", "png"]),
  logLevel: LogLevelSchema.default("info"),
  vision: VisionConfigSchema,
  /** Providers tried in order after the primary one fails. */
  fallbackProviders: z.array(VisionConfigSchema).default([]),
});
export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;
