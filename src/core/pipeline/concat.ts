import { mkdir, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import type { ToolRun, VideoProcessor } from '../../types/index.js';

export function escapeConcatPath(filePath: string): string {
  return resolve(filePath).replace(/'/g, "'\\''");
}

export function buildConcatList(files: readonly string[]): string {
  return files.map((file) => `file '${escapeConcatPath(file)}'`).join('\n') + '\n';
}

/** Joins the segments in the given order with stream copy. */
export async function concatVideos(
  files: readonly string[],
  listPath: string,
  outputPath: string,
  processor: VideoProcessor
): Promise<ToolRun> {
  await mkdir(dirname(listPath), { recursive: true });
  await writeFile(listPath, buildConcatList(files), 'utf-8');
  await mkdir(dirname(outputPath), { recursive: true });

  return processor.concat(listPath, outputPath);
}
