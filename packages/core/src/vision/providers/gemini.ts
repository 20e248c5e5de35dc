import { extractContentText } from "../content";
import { dig, numberOrNull } from "../json";
import type { HttpProviderOpts, VisionProviderAdapter, VisionRequest, VisionResponse } from "../types";
import { postJson, trimBaseUrl } from "./http";

export interface GeminiVisionOpts extends HttpProviderOpts {
  apiKey: string;
}

export function createGeminiVisionProvider(opts: GeminiVisionOpts): VisionProviderAdapter {
  const model = opts.model || "gemini-2.0-flash";
  const baseUrl = trimBaseUrl(opts.baseUrl || "https://generativelanguage.googleapis.com");

  return {
    name: "gemini",
    model,
    async analyze(req: VisionRequest): Promise<VisionResponse> {
      const body = await postJson({
        provider: "gemini",
        url: `${baseUrl}/v1beta/models/${model}:generateContent`,
        headers: { "x-goog-api-key": opts.apiKey },
        timeoutMs: opts.timeoutMs,
        fetch: opts.fetch,
        body: {
          contents: [
            {
              parts: [
                {
                  inline_data: {
                    mime_type: req.mimeType,
                    data: req.imageBase64,
                  },
                },
                { text: req.prompt },
              ],
            },
          ],
          generationConfig: {
            maxOutputTokens: req.maxTokens,
            temperature: req.temperature,
          },
        },
      });

      return {
        text: extractContentText(dig(body, ["candidates", 0, "content", "parts"])),
        promptTokens: numberOrNull(dig(body, ["usageMetadata", "promptTokenCount"])),
        completionTokens: numberOrNull(dig(body, ["usageMetadata", "candidatesTokenCount"])),
        raw: body,
      };
    },
  };
}
