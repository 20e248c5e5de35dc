import type { RecognizedFilamentData } from "@filament/contracts";
import { RecognitionError, errorMessage } from "../errors";
import { childLogger, type Logger } from "../logger";
import type { Metrics } from "../metrics/metrics";
import { buildFilamentPrompt } from "../vision/prompt";
import type { VisionProviderAdapter } from "../vision/types";
import { prepareImage } from "./image";
import { interpretModelOutput } from "./interpret";

export interface FilamentRecognition {
  data: RecognizedFilamentData;
  /** Share of the six label fields filled in, 0..1 */
  confidence: number;
  provider: string;
  model: string;
  durationMs: number;
}

export interface FilamentRecognizer {
  readonly provider: string;
  readonly model: string;
  recognize(image: Buffer): Promise<FilamentRecognition>;
}

export interface FilamentRecognizerDeps {
  provider: VisionProviderAdapter;
  maxTokens: number;
  temperature: number;
  /** Defaults to the English label prompt */
  prompt?: string;
  logger?: Logger;
  metrics?: Metrics;
}

/**
 * Image in, normalized label out. Every failure past image decoding surfaces
 * as a RecognitionError whose cause is the original error.
 */
export function createFilamentRecognizer(deps: FilamentRecognizerDeps): FilamentRecognizer {
  const { provider } = deps;
  const prompt = deps.prompt ?? buildFilamentPrompt();
  const log = deps.logger ?? childLogger("recognizer");

  function observe(status: "success" | "failed", startedAt: number): number {
    const durationMs = Date.now() - startedAt;
    deps.metrics?.recognitionsTotal.inc({ provider: provider.name, status });
    deps.metrics?.recognitionDurationMs.observe({ provider: provider.name, status }, durationMs);
    return durationMs;
  }

  return {
    provider: provider.name,
    model: provider.model,
    async recognize(image: Buffer): Promise<FilamentRecognition> {
      const startedAt = Date.now();
      try {
        const prepared = await prepareImage(image);
        log.debug({ width: prepared.width, height: prepared.height, jpegBytes: prepared.jpeg.length }, "Image prepared");

        const reply = await provider.analyze({
          imageBase64: prepared.base64,
          mimeType: "image/jpeg",
          prompt,
          maxTokens: deps.maxTokens,
          temperature: deps.temperature,
        });
        log.debug(
          { provider: provider.name, promptTokens: reply.promptTokens, completionTokens: reply.completionTokens },
          "Model replied",
        );

        const { data, confidence } = interpretModelOutput(reply.text);
        const durationMs = observe("success", startedAt);
        return { data, confidence, provider: provider.name, model: provider.model, durationMs };
      } catch (err) {
        const durationMs = observe("failed", startedAt);
        log.error({ err, provider: provider.name, durationMs }, `Recognition failed: ${errorMessage(err)}`);
        throw new RecognitionError(err);
      }
    },
  };
}
