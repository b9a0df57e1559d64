import { readFile, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import {
  DEFAULT_INITIAL_QUALITY,
  DEFAULT_MAX_IMAGE_SIZE,
  DEFAULT_MIN_QUALITY,
  clampQuality,
} from "../config/load-config.js";
import { compressImage } from "../core/image-transcoder.js";
import { createSharpCodec } from "../core/sharp-codec.js";

function parseArgs(argv: string[]): { flags: Record<string, string>; positional: string[] } {
  const flags: Record<string, string> = {};
  const positional: string[] = [];
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }
    const [key, inlineValue] = arg.slice(2).split("=", 2);
    if (inlineValue !== undefined) {
      flags[key] = inlineValue;
      continue;
    }
    const next = argv[i + 1];
    if (next && !next.startsWith("--")) {
      flags[key] = next;
      i += 1;
    } else {
      flags[key] = "true";
    }
  }
  return { flags, positional };
}

function asNumber(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return value !== undefined && Number.isFinite(parsed) ? parsed : fallback;
}

async function main(): Promise<void> {
  const { flags, positional } = parseArgs(process.argv.slice(2));
  const input = positional[0];
  if (!input) {
    throw new Error("Usage: transcode-cover <image> [--max 14500] [--min 60] [--initial 95] [--format jpeg|webp] [--out file]");
  }

  const format = flags.format === "webp" ? "webp" : "jpeg";
  const budget = {
    maxSizeBytes: Math.max(1, Math.round(asNumber(flags.max, DEFAULT_MAX_IMAGE_SIZE))),
    minQuality: clampQuality(flags.min, DEFAULT_MIN_QUALITY),
    initialQuality: clampQuality(flags.initial, DEFAULT_INITIAL_QUALITY),
  };

  const raw = await readFile(resolve(process.cwd(), input));
  console.log(`Input ${input}: ${raw.length} bytes`);
  console.log(`Budget ${budget.maxSizeBytes} bytes, quality ${budget.initialQuality} -> ${budget.minQuality}, ${format}`);

  const result = await compressImage(raw, budget, createSharpCodec(format), (attempt) => {
    const verdict = attempt.size <= budget.maxSizeBytes ? "fits" : "too large";
    console.log(`  quality ${attempt.quality}: ${attempt.size} bytes (${verdict})`);
  });

  console.log(
    `Result: quality ${result.quality}, ${result.bytes.length} bytes, ${result.attempts} attempts` +
      (result.sizeExceeded ? ", SIZE EXCEEDED" : ""),
  );

  if (flags.out) {
    await writeFile(resolve(process.cwd(), flags.out), result.bytes);
    console.log(`Wrote ${flags.out}`);
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
