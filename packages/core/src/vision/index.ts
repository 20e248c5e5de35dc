export * from "./types";
export * from "./content";
export * from "./prompt";
export * from "./provider-factory";
export * from "./retry";
export { createDashScopeVisionProvider } from "./providers/dashscope";
export { createOpenAIVisionProvider } from "./providers/openai";
export { createGeminiVisionProvider } from "./providers/gemini";
export { createClaudeVisionProvider } from "./providers/claude";
export { createOllamaVisionProvider } from "./providers/ollama";
export { createMockVisionProvider } from "./providers/mock";
