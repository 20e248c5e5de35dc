import type { ServiceConfig } from "@filament/contracts";
import { InvalidImageError, inspectImage, maxImageSizeBytes, type ImageInfo } from "@filament/core";

export type UploadErrorCode = "not_multipart" | "missing_file" | "unsupported_type" | "too_large" | "invalid_image";

/** The upload was rejected before recognition started. */
export class UploadError extends Error {
  code: UploadErrorCode;

  constructor(code: UploadErrorCode, message: string, opts?: { cause?: unknown }) {
    super(message, opts);
    this.name = "UploadError";
    this.code = code;
  }
}

export interface ImageUpload {
  filename: string;
  bytes: Buffer;
  info: ImageInfo;
}

type UploadLimits = Pick<ServiceConfig, "allowedImageTypes" | "maxImageSizeMb">;

export function fileExtension(filename: string): string {
  const dot = filename.lastIndexOf(".");
  return dot === -1 ? "" : filename.slice(dot + 1).toLowerCase();
}

function tooLarge(limits: UploadLimits): UploadError {
  return new UploadError("too_large", `Image file too large. Maximum size: ${limits.maxImageSizeMb}MB`);
}

/**
 * Pull the `image` field out of a multipart request and check it: allowed
 * extension, size limit, decodable by sharp.
 */
export async function readImageUpload(req: Request, limits: UploadLimits): Promise<ImageUpload> {
  let form: FormData;
  try {
    form = await req.formData();
  } catch (err) {
    throw new UploadError("not_multipart", "Expected a multipart/form-data body with an 'image' field", { cause: err });
  }

  const file = form.get("image");
  if (file === null || typeof file === "string") {
    throw new UploadError("missing_file", "No image file provided in the 'image' field");
  }

  const ext = fileExtension(file.name);
  if (!limits.allowedImageTypes.includes(ext)) {
    throw new UploadError(
      "unsupported_type",
      `Unsupported image type. Allowed types: ${limits.allowedImageTypes.join(", ")}`,
    );
  }

  const maxBytes = maxImageSizeBytes(limits);
  if (file.size > maxBytes) throw tooLarge(limits);

  const bytes = Buffer.from(await file.arrayBuffer());
  if (bytes.length > maxBytes) throw tooLarge(limits);

  try {
    const info = await inspectImage(bytes);
    return { filename: file.name, bytes, info };
  } catch (err) {
    if (err instanceof InvalidImageError) {
      throw new UploadError("invalid_image", `Invalid image file: ${err.message}`, { cause: err });
    }
    throw err;
  }
}
