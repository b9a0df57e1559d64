import { createHash } from "node:crypto";
import type { Logger } from "../logger.js";
import type { EntityPlatform } from "../outputs/output.js";
import type { EntityRegistry } from "./entity-registry.js";
import { UnsupportedImageError } from "./errors.js";
import { compressImage } from "./image-transcoder.js";
import type { ImageBudget, ImageCodec, TranscodeResult } from "./image-transcoder.js";

export type CoverAsset = {
  bytes: Buffer;
  contentType: string;
  quality: number;
  sizeExceeded: boolean;
  digest: string;
};

export type CoverOutcome = "published" | "unchanged" | "unsupported";

export function coverDigest(raw: Buffer): string {
  return createHash("sha256").update(raw).digest("hex");
}

export class CoverPipeline<TImage> {
  private covers = new Map<string, CoverAsset>();

  constructor(
    private readonly registry: EntityRegistry,
    private readonly platform: EntityPlatform,
    private readonly codec: ImageCodec<TImage>,
    private readonly budget: ImageBudget,
    private readonly logger: Logger,
  ) {}

  getCover(id: string): CoverAsset | undefined {
    return this.covers.get(id);
  }

  async handleCover(id: string, raw: Buffer): Promise<CoverOutcome> {
    const digest = coverDigest(raw);
    if (this.registry.get(id)?.coverDigest === digest) {
      this.logger.debug({ id, digest }, "Cover unchanged, skipping");
      return "unchanged";
    }

    let result: TranscodeResult;
    try {
      result = await compressImage(raw, this.budget, this.codec, (attempt) => {
        this.logger.debug({ id, ...attempt, maxSizeBytes: this.budget.maxSizeBytes }, "Cover encode attempt");
      });
    } catch (error) {
      if (!(error instanceof UnsupportedImageError)) throw error;
      this.logger.warn({ id, size: raw.length, error: error.message }, "Unsupported cover image, keeping previous cover");
      return "unsupported";
    }

    if (result.sizeExceeded) {
      this.logger.warn(
        { id, size: result.bytes.length, maxSizeBytes: this.budget.maxSizeBytes, quality: result.quality },
        "Cover still exceeds size budget at minimum quality",
      );
    } else {
      this.logger.info(
        { id, rawSize: raw.length, size: result.bytes.length, quality: result.quality, attempts: result.attempts },
        "Cover transcoded",
      );
    }

    this.covers.set(id, {
      bytes: result.bytes,
      contentType: result.contentType,
      quality: result.quality,
      sizeExceeded: result.sizeExceeded,
      digest,
    });
    this.registry.upsertCover(id, digest);
    this.platform.setCover(id, result.bytes, result.contentType);
    return "published";
  }
}
