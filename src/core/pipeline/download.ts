import { unlink } from 'fs/promises';
import { basename, join } from 'path';
import type { PipelineLogger, VideoFetcher, VideoProcessor } from '../../types/index.js';
import type { MetadataStore } from '../state/index.js';
import { listVideoFiles } from './layout.js';

export interface DownloadOptions {
  downloadDir: string;
  maxDurationSeconds: number;
  probeBeforeDownload: boolean;
}

export interface DownloadSummary {
  attempted: number;
  downloaded: number;
  skippedTooLong: number;
  skippedUnprobeable: number;
  failed: number;
}

export function exceedsCeiling(duration: number | null, maxDurationSeconds: number): boolean {
  return duration !== null && duration > maxDurationSeconds;
}

/**
 * Downloads each URL in order. With probing enabled, URLs the downloader
 * cannot describe and videos longer than the ceiling are skipped before
 * anything is fetched.
 */
export async function downloadVideos(
  urls: readonly string[],
  fetcher: VideoFetcher,
  metadata: MetadataStore,
  options: DownloadOptions,
  logger: PipelineLogger = {}
): Promise<DownloadSummary> {
  const summary: DownloadSummary = {
    attempted: 0,
    downloaded: 0,
    skippedTooLong: 0,
    skippedUnprobeable: 0,
    failed: 0,
  };
  const outputTemplate = join(options.downloadDir, '%(id)s.%(ext)s');

  for (const [index, url] of urls.entries()) {
    const label = `[${index + 1}/${urls.length}]`;

    if (options.probeBeforeDownload) {
      const probe = await fetcher.probe(url);
      if (!probe) {
        summary.skippedUnprobeable++;
        logger.warn?.(`${label} No video found, skipping: ${url}`);
        continue;
      }

      if (exceedsCeiling(probe.duration, options.maxDurationSeconds)) {
        summary.skippedTooLong++;
        logger.progress?.(
          `${label} Too long (${Math.round(probe.duration ?? 0)}s > ${options.maxDurationSeconds}s), skipping: ${probe.title}`
        );
        continue;
      }

      await metadata.record(probe);
      logger.progress?.(`${label} Downloading: ${probe.title}`);
    } else {
      logger.progress?.(`${label} Downloading: ${url}`);
    }

    summary.attempted++;
    const result = await fetcher.download(url, outputTemplate);
    if (result.exitCode !== 0) {
      summary.failed++;
      logger.warn?.(`${label} Download failed (code ${result.exitCode}): ${url} ${result.stderr}`.trim());
      continue;
    }
    summary.downloaded++;
  }

  return summary;
}

/**
 * Second duration gate over what actually landed on disk. Files longer than
 * the ceiling are deleted; files whose duration cannot be read are kept.
 * Returns the remaining files sorted by name.
 */
export async function removeOverlongDownloads(
  downloadDir: string,
  processor: VideoProcessor,
  maxDurationSeconds: number,
  logger: PipelineLogger = {}
): Promise<string[]> {
  const kept: string[] = [];

  for (const filePath of await listVideoFiles(downloadDir)) {
    const duration = await processor.probeDuration(filePath);

    if (duration === null) {
      logger.debug?.(`Duration unknown, keeping: ${basename(filePath)}`);
      kept.push(filePath);
      continue;
    }

    if (exceedsCeiling(duration, maxDurationSeconds)) {
      await unlink(filePath);
      logger.progress?.(`Removed ${basename(filePath)} (${Math.round(duration)}s > ${maxDurationSeconds}s)`);
      continue;
    }

    kept.push(filePath);
  }

  return kept;
}
