import { extractContentText } from "../content";
import { dig, numberOrNull } from "../json";
import { toDataUri, type HttpProviderOpts, type VisionProviderAdapter, type VisionRequest, type VisionResponse } from "../types";
import { postJson, trimBaseUrl } from "./http";

export interface OpenAIVisionOpts extends HttpProviderOpts {
  apiKey: string;
}

export function createOpenAIVisionProvider(opts: OpenAIVisionOpts): VisionProviderAdapter {
  const model = opts.model || "gpt-4o";
  const baseUrl = trimBaseUrl(opts.baseUrl || "https://api.openai.com");

  return {
    name: "openai",
    model,
    async analyze(req: VisionRequest): Promise<VisionResponse> {
      const body = await postJson({
        provider: "openai",
        url: `${baseUrl}/v1/chat/completions`,
        headers: { authorization: `Bearer ${opts.apiKey}` },
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
                { type: "image_url", image_url: { url: toDataUri(req), detail: "high" } },
                { type: "text", text: req.prompt },
              ],
            },
          ],
        },
      });

      return {
        text: extractContentText(dig(body, ["choices", 0, "message", "content"])),
        promptTokens: numberOrNull(dig(body, ["usage", "prompt_tokens"])),
        completionTokens: numberOrNull(dig(body, ["usage", "completion_tokens"])),
        raw: body,
      };
    },
  };
}
