import sharp from "sharp";
import { InvalidImageError, errorMessage } from "../errors";

export type PixelFormat = "rgb" | "rgba" | "grayscale" | "grayscale-alpha" | "palette" | "other";

export interface ImageInfo {
  format: string;
  width: number;
  height: number;
  channels: number;
  hasAlpha: boolean;
  pixelFormat: PixelFormat;
}

export interface PreparedImage {
  jpeg: Buffer;
  base64: string;
  /** `data:image/jpeg;base64,...`, ready to embed in a JSON request body. */
  dataUri: string;
  width: number;
  height: number;
}

export const JPEG_QUALITY = 85;

const WHITE = { r: 255, g: 255, b: 255 };

function classify(meta: sharp.Metadata): PixelFormat {
  if (meta.isPalette) return "palette";
  const channels = meta.channels ?? 0;
  const space: string = meta.space ?? "";
  switch (space) {
    case "b-w":
    case "grey16":
      return channels >= 2 ? "grayscale-alpha" : "grayscale";
    case "srgb":
    case "rgb":
    case "rgb16":
    case "scrgb":
      return channels >= 4 ? "rgba" : "rgb";
    default:
      return "other";
  }
}

/**
 * Read the header of an uploaded image. Throws InvalidImageError for bytes
 * sharp cannot identify.
 */
export async function inspectImage(bytes: Buffer): Promise<ImageInfo> {
  if (bytes.length === 0) throw new InvalidImageError("Image is empty");
  let meta: sharp.Metadata;
  try {
    meta = await sharp(bytes).metadata();
  } catch (err) {
    throw new InvalidImageError(errorMessage(err), { cause: err });
  }
  if (!meta.format || !meta.width || !meta.height) {
    throw new InvalidImageError("Image has no readable dimensions");
  }
  return {
    format: meta.format,
    width: meta.width,
    height: meta.height,
    channels: meta.channels ?? 0,
    hasAlpha: meta.hasAlpha ?? false,
    pixelFormat: classify(meta),
  };
}

/**
 * Re-encode any decodable image as an opaque RGB JPEG.
 *
 * Transparent and palette images are composited onto white using their own
 * alpha, everything else is converted to sRGB as is. Dimensions never change.
 */
export async function prepareImage(bytes: Buffer): Promise<PreparedImage> {
  const info = await inspectImage(bytes);

  let pipeline = sharp(bytes);
  if (info.hasAlpha || info.pixelFormat === "palette") {
    pipeline = pipeline.flatten({ background: WHITE });
  }

  let out: { data: Buffer; info: sharp.OutputInfo };
  try {
    out = await pipeline
      .toColourspace("srgb")
      .jpeg({ quality: JPEG_QUALITY, progressive: false })
      .toBuffer({ resolveWithObject: true });
  } catch (err) {
    throw new InvalidImageError(`Failed to encode image: ${errorMessage(err)}`, { cause: err });
  }

  const base64 = out.data.toString("base64");
  return {
    jpeg: out.data,
    base64,
    dataUri: `data:image/jpeg;base64,${base64}`,
    width: out.info.width,
    height: out.info.height,
  };
}
