import sharp from "sharp";
import type { ImageFormat } from "../config/types.js";
import { UnsupportedImageError, asErrorMessage } from "./errors.js";
import type { ImageCodec } from "./image-transcoder.js";

export type DecodedImage = {
  data: Buffer;
  width: number;
  height: number;
  channels: 1 | 2 | 3 | 4;
};

const CONTENT_TYPES: Record<ImageFormat, string> = {
  jpeg: "image/jpeg",
  webp: "image/webp",
};

function asChannels(value: number): DecodedImage["channels"] {
  if (value === 1 || value === 2 || value === 3 || value === 4) return value;
  throw new UnsupportedImageError(`Unsupported channel count: ${value}`);
}

export function createSharpCodec(format: ImageFormat = "jpeg"): ImageCodec<DecodedImage> {
  return {
    contentType: CONTENT_TYPES[format],

    async decode(raw) {
      try {
        let pipeline = sharp(raw, { failOn: "error" }).rotate();
        // JPEG has no alpha channel.
        if (format === "jpeg") pipeline = pipeline.flatten({ background: { r: 0, g: 0, b: 0 } });
        const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
        return { data, width: info.width, height: info.height, channels: asChannels(info.channels) };
      } catch (error) {
        if (error instanceof UnsupportedImageError) throw error;
        throw new UnsupportedImageError(`Cannot decode image: ${asErrorMessage(error)}`, { cause: error });
      }
    },

    async encode(image, quality) {
      const pipeline = sharp(image.data, {
        raw: { width: image.width, height: image.height, channels: image.channels },
      });
      if (format === "webp") {
        return pipeline.webp({ quality, alphaQuality: quality, effort: 4 }).toBuffer();
      }
      return pipeline.jpeg({ quality, mozjpeg: true }).toBuffer();
    },
  };
}
