import { UnsupportedImageError, asErrorMessage } from "./errors.js";

export const QUALITY_STEP = 5;

export type ImageBudget = {
  maxSizeBytes: number;
  minQuality: number;
  initialQuality: number;
};

export type TranscodeResult = {
  bytes: Buffer;
  quality: number;
  attempts: number;
  sizeExceeded: boolean;
  contentType: string;
};

export type TranscodeAttempt = {
  quality: number;
  size: number;
};

/** Decodes once, then encodes the decoded image at any quality. */
export interface ImageCodec<TImage> {
  readonly contentType: string;
  decode(raw: Buffer): Promise<TImage>;
  encode(image: TImage, quality: number): Promise<Buffer>;
}

function clampQuality(value: number): number {
  if (!Number.isFinite(value)) return 100;
  return Math.max(1, Math.min(100, Math.round(value)));
}

/**
 * Stepped descent: encode at the initial quality, then lower it by
 * QUALITY_STEP until the output fits or the floor is reached. At the floor the
 * oversized result is returned with `sizeExceeded` set.
 */
export async function compressImage<TImage>(
  raw: Buffer,
  budget: ImageBudget,
  codec: ImageCodec<TImage>,
  onAttempt?: (attempt: TranscodeAttempt) => void,
): Promise<TranscodeResult> {
  let image: TImage;
  try {
    image = await codec.decode(raw);
  } catch (error) {
    if (error instanceof UnsupportedImageError) throw error;
    throw new UnsupportedImageError(`Cannot decode image: ${asErrorMessage(error)}`, { cause: error });
  }

  const minQuality = clampQuality(budget.minQuality);
  let quality = Math.max(minQuality, clampQuality(budget.initialQuality));
  let attempts = 0;

  for (;;) {
    const bytes = await codec.encode(image, quality);
    attempts += 1;
    onAttempt?.({ quality, size: bytes.length });

    if (bytes.length <= budget.maxSizeBytes) {
      return { bytes, quality, attempts, sizeExceeded: false, contentType: codec.contentType };
    }
    if (quality <= minQuality) {
      return { bytes, quality, attempts, sizeExceeded: true, contentType: codec.contentType };
    }
    quality = Math.max(minQuality, quality - QUALITY_STEP);
  }
}
