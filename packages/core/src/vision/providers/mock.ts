/**
 * Offline provider for local development and tests. Replies with one of a
 * few canned spool labels, chosen from the image so the same upload always
 * gets the same answer.
 */

import labels from "../fixtures/mock-labels.json";
import type { VisionProviderAdapter, VisionRequest, VisionResponse } from "../types";

export interface MockVisionOpts {
  model?: string;
  /** Always answer with this reply instead of a canned label */
  reply?: string;
}

function pickLabel(imageBase64: string): unknown {
  let sum = 0;
  for (let i = 0; i < imageBase64.length; i += 97) sum += imageBase64.charCodeAt(i);
  return labels[sum % labels.length];
}

export function createMockVisionProvider(opts?: MockVisionOpts): VisionProviderAdapter {
  const model = opts?.model || "mock-label-reader";

  return {
    name: "mock",
    model,
    async analyze(req: VisionRequest): Promise<VisionResponse> {
      const text = opts?.reply ?? "```json\n" + JSON.stringify(pickLabel(req.imageBase64), null, 2) + "\n```";
      return {
        text,
        promptTokens: null,
        completionTokens: null,
      };
    },
  };
}
