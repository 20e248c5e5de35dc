import { RecognitionResponseSchema } from "@filament/contracts";
import { RecognitionError } from "@filament/core";
import type { AppContext } from "../context";
import { recognitionFailure } from "../lib/api";
import { UploadError, readImageUpload, type ImageUpload } from "../lib/upload";

export async function POST(req: Request, ctx: AppContext): Promise<Response> {
  const log = ctx.logger.child({ route: "/api/v1/recognize" });

  let upload: ImageUpload;
  try {
    upload = await readImageUpload(req, ctx.config);
  } catch (err) {
    if (err instanceof UploadError) {
      log.warn({ code: err.code }, err.message);
      return recognitionFailure(err.message, 400);
    }
    throw err;
  }

  log.info(
    { filename: upload.filename, bytes: upload.bytes.length, format: upload.info.format, pixelFormat: upload.info.pixelFormat },
    "Processing image",
  );

  try {
    const result = await ctx.recognizer.recognize(upload.bytes);
    log.info(
      { provider: result.provider, confidence: result.confidence, durationMs: result.durationMs },
      `Recognition successful. Confidence: ${result.confidence.toFixed(2)}`,
    );
    return Response.json(
      RecognitionResponseSchema.parse({ success: true, data: result.data, confidence: result.confidence })
    );
  } catch (err) {
    // The recognizer has already logged the cause.
    if (err instanceof RecognitionError) return recognitionFailure(err.message);
    throw err;
  }
}
