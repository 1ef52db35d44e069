import { mkdir, unlink } from 'fs/promises';
import { basename, join } from 'path';
import type { EncoderProfile, PipelineLogger, VideoProcessor } from '../../types/index.js';
import { fileSize, videoIdOf } from './layout.js';

export interface NormalizeOptions {
  normalizedDir: string;
  profile: EncoderProfile;
  minNormalizedBytes: number;
}

export function normalizedPathFor(inputPath: string, normalizedDir: string): string {
  return join(normalizedDir, `${videoIdOf(inputPath)}.mp4`);
}

/**
 * Re-encodes every input to the shared profile. A target that already exists
 * above the size floor is reused as is; an undersized one is deleted and
 * encoded again. Inputs that fail to encode, and inputs whose target was
 * already produced by an earlier input, are left out of the result.
 */
export async function normalizeVideos(
  inputs: readonly string[],
  processor: VideoProcessor,
  options: NormalizeOptions,
  logger: PipelineLogger = {}
): Promise<string[]> {
  await mkdir(options.normalizedDir, { recursive: true });
  const normalized: string[] = [];

  for (const [index, inputPath] of inputs.entries()) {
    const label = `[${index + 1}/${inputs.length}]`;
    const target = normalizedPathFor(inputPath, options.normalizedDir);
    if (normalized.includes(target)) {
      logger.warn?.(`${label} Same video id as an earlier file, skipping: ${basename(inputPath)}`);
      continue;
    }

    const existingSize = await fileSize(target);

    if (existingSize !== null && existingSize > options.minNormalizedBytes) {
      logger.debug?.(`${label} Already normalized: ${basename(target)}`);
      normalized.push(target);
      continue;
    }

    if (existingSize !== null) {
      logger.warn?.(`${label} Discarding corrupt output (${existingSize} bytes): ${basename(target)}`);
      await unlink(target);
    }

    logger.progress?.(`${label} Normalizing: ${basename(inputPath)}`);
    const result = await processor.normalize(inputPath, target, options.profile);
    const producedSize = await fileSize(target);

    if (result.exitCode !== 0 || producedSize === null || producedSize <= options.minNormalizedBytes) {
      logger.warn?.(`${label} Encode failed (code ${result.exitCode}), excluding: ${basename(inputPath)}`);
      if (producedSize !== null) {
        await unlink(target);
      }
      continue;
    }

    normalized.push(target);
  }

  return normalized;
}
