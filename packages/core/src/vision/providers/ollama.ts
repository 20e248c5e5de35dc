import { extractContentText } from "../content";
import { dig, numberOrNull } from "../json";
import type { HttpProviderOpts, VisionProviderAdapter, VisionRequest, VisionResponse } from "../types";
import { postJson, trimBaseUrl } from "./http";

export function createOllamaVisionProvider(opts?: HttpProviderOpts): VisionProviderAdapter {
  const model = opts?.model || "llava";
  const baseUrl = trimBaseUrl(opts?.baseUrl || "http://localhost:11434");

  return {
    name: "ollama",
    model,
    async analyze(req: VisionRequest): Promise<VisionResponse> {
      const body = await postJson({
        provider: "ollama",
        url: `${baseUrl}/api/generate`,
        timeoutMs: opts?.timeoutMs,
        fetch: opts?.fetch,
        body: {
          model,
          prompt: req.prompt,
          images: [req.imageBase64],
          stream: false,
          format: "json",
          options: {
            temperature: req.temperature,
            num_predict: req.maxTokens,
          },
        },
      });

      return {
        text: extractContentText(dig(body, ["response"])),
        promptTokens: numberOrNull(dig(body, ["prompt_eval_count"])),
        completionTokens: numberOrNull(dig(body, ["eval_count"])),
        raw: body,
      };
    },
  };
}
