import { extractContentText } from "../content";
import { dig, numberOrNull } from "../json";
import type { HttpProviderOpts, VisionProviderAdapter, VisionRequest, VisionResponse } from "../types";
import { postJson, trimBaseUrl } from "./http";

export interface ClaudeVisionOpts extends HttpProviderOpts {
  apiKey: string;
}

export function createClaudeVisionProvider(opts: ClaudeVisionOpts): VisionProviderAdapter {
  const model = opts.model || "claude-sonnet-4-20250514";
  const baseUrl = trimBaseUrl(opts.baseUrl || "https://api.anthropic.com");

  return {
    name: "claude",
    model,
    async analyze(req: VisionRequest): Promise<VisionResponse> {
      const body = await postJson({
        provider: "claude",
        url: `${baseUrl}/v1/messages`,
        headers: {
          "x-api-key": opts.apiKey,
          "anthropic-version": "2023-06-01",
        },
        timeoutMs: opts.timeoutMs,
        fetch: opts.fetch,
        body: {
          model,
          max_tokens: req.maxTokens,
          temperature: req.temperature,
          messages: [
            {
              role: "user",
              content: [
                {
                  type: "image",
                  source: {
                    type: "base64",
                    media_type: req.mimeType,
                    data: req.imageBase64,
                  },
                },
                { type: "text", text: req.prompt },
              ],
            },
          ],
        },
      });

      return {
        text: extractContentText(dig(body, ["content"])),
        promptTokens: numberOrNull(dig(body, ["usage", "input_tokens"])),
        completionTokens: numberOrNull(dig(body, ["usage", "output_tokens"])),
        raw: body,
      };
    },
  };
}
