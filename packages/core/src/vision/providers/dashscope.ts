import { extractContentText } from "../content";
import { dig, numberOrNull } from "../json";
import { toDataUri, type HttpProviderOpts, type VisionProviderAdapter, type VisionRequest, type VisionResponse } from "../types";
import { postJson, trimBaseUrl } from "./http";

export interface DashScopeVisionOpts extends HttpProviderOpts {
  apiKey: string;
}

/** Qwen-VL models served through Alibaba Cloud DashScope's multimodal generation API. */
export function createDashScopeVisionProvider(opts: DashScopeVisionOpts): VisionProviderAdapter {
  const model = opts.model || "qwen-vl-plus";
  const baseUrl = trimBaseUrl(opts.baseUrl || "https://dashscope.aliyuncs.com");

  return {
    name: "dashscope",
    model,
    async analyze(req: VisionRequest): Promise<VisionResponse> {
      const body = await postJson({
        provider: "dashscope",
        url: `${baseUrl}/api/v1/services/aigc/multimodal-generation/generation`,
        headers: { authorization: `Bearer ${opts.apiKey}` },
        timeoutMs: opts.timeoutMs,
        fetch: opts.fetch,
        body: {
          model,
          input: {
            messages: [
              {
                role: "user",
                content: [{ image: toDataUri(req) }, { text: req.prompt }],
              },
            ],
          },
          parameters: {
            max_tokens: req.maxTokens,
            temperature: req.temperature,
          },
        },
      });

      return {
        text: extractContentText(dig(body, ["output", "choices", 0, "message", "content"])),
        promptTokens: numberOrNull(dig(body, ["usage", "input_tokens"])),
        completionTokens: numberOrNull(dig(body, ["usage", "output_tokens"])),
        raw: body,
      };
    },
  };
}
