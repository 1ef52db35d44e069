import { basename } from 'path';
import type { CompilationEntry, MetadataMap, PipelineLogger } from '../../types/index.js';
import { videoIdOf } from './layout.js';

export type DurationProbe = (filePath: string) => Promise<number | null>;

export interface Timeline {
  files: string[];
  entries: CompilationEntry[];
  totalSeconds: number;
}

export function formatTimestamp(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  return `${pad(h)}:${pad(m)}:${pad(s)}`;
}

export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  return `${pad(Math.floor(total / 60))}:${pad(total % 60)}`;
}

export function sortByFileName(files: readonly string[]): string[] {
  return [...files].sort((a, b) => {
    const left = basename(a);
    const right = basename(b);
    return left < right ? -1 : left > right ? 1 : 0;
  });
}

/**
 * Lays the segments end to end. Each entry starts where the previous one
 * ended, so the offsets match a concatenation that does not trim.
 */
export async function buildTimeline(
  files: readonly string[],
  probeDuration: DurationProbe,
  metadata: MetadataMap,
  logger: PipelineLogger = {}
): Promise<Timeline> {
  const ordered = sortByFileName(files);
  const entries: CompilationEntry[] = [];
  let runningTotal = 0;

  for (const [index, filePath] of ordered.entries()) {
    const videoId = videoIdOf(filePath);
    let duration = await probeDuration(filePath);
    if (duration === null) {
      logger.warn?.(`Could not read duration of ${basename(filePath)}, counting it as 0s`);
      duration = 0;
    }

    const info = metadata[videoId];
    entries.push({
      index: index + 1,
      title: info?.title || videoId,
      url: info?.url ?? '',
      uploader: info?.uploader ?? '',
      timestamp: formatTimestamp(runningTotal),
      timestampSeconds: runningTotal,
      duration: formatDuration(duration),
      durationSeconds: duration,
      videoId,
    });

    runningTotal += duration;
  }

  return { files: ordered, entries, totalSeconds: runningTotal };
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}
