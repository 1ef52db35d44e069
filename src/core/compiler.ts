import { rm } from 'fs/promises';
import type {
  CompilationEntry,
  KarakeepBookmark,
  MediaTools,
  PipelineConfig,
  PipelineLogger,
  ReportBookmark,
} from '../types/index.js';
import { KarakeepClient, bookmarksInWindow, bookmarkUrls } from './karakeep/index.js';
import { MatrixClient, chatUrls, collectEvents, walkHistory } from './matrix/index.js';
import { dedupeUrls } from './sources/index.js';
import { MetadataStore, writeSourceSnapshot } from './state/index.js';
import {
  buildTimeline,
  concatVideos,
  downloadVideos,
  listVideoFiles,
  normalizeVideos,
  removeOverlongDownloads,
  resolveLayout,
  type RunLayout,
} from './pipeline/index.js';
import { ReportGenerator } from './output/index.js';

export interface CompilerCallbacks {
  onProgress?: (message: string) => void;
  onDebug?: (message: string) => void;
  onWarning?: (message: string) => void;
  onStepStart?: (step: CompilerStep) => void;
}

export type CompilerStep = 'fetch' | 'download' | 'filter' | 'normalize' | 'compile' | 'report';

export interface CompilationResult {
  runDate: string;
  videoPath: string | null;
  reportPath: string;
  entries: CompilationEntry[];
  totalSeconds: number;
}

interface FetchedSources {
  urls: string[];
  bookmarks: KarakeepBookmark[];
}

export class Compiler {
  private tools: MediaTools;
  private reportGenerator: ReportGenerator;

  constructor(tools: MediaTools) {
    this.tools = tools;
    this.reportGenerator = new ReportGenerator();
  }

  async run(config: PipelineConfig, callbacks: CompilerCallbacks = {}): Promise<CompilationResult> {
    const { onProgress, onWarning, onStepStart } = callbacks;
    const logger: PipelineLogger = {
      progress: callbacks.onProgress,
      debug: callbacks.onDebug,
      warn: callbacks.onWarning,
    };

    const layout = resolveLayout(config, config.window.end);
    const metadata = new MetadataStore(layout.metadataPath);
    await metadata.load();
    onProgress?.(`Run date: ${layout.runDate} (${metadata.size()} known videos)`);

    let files: string[];
    let bookmarks: KarakeepBookmark[] = [];

    if (config.mergeOnly) {
      onProgress?.('Merge-only mode: reusing downloaded files');
      files = await listVideoFiles(layout.downloadDir);
    } else {
      onStepStart?.('fetch');
      const sources = await this.fetchSources(config, layout, logger);
      bookmarks = sources.bookmarks;
      onProgress?.(`${sources.urls.length} unique URLs to download`);

      onStepStart?.('download');
      const summary = await downloadVideos(
        sources.urls,
        this.tools.fetcher,
        metadata,
        {
          downloadDir: layout.downloadDir,
          maxDurationSeconds: config.maxDurationSeconds,
          probeBeforeDownload: config.probeBeforeDownload,
        },
        logger
      );
      onProgress?.(
        `Downloaded ${summary.downloaded}/${summary.attempted} ` +
          `(too long: ${summary.skippedTooLong}, no video: ${summary.skippedUnprobeable}, failed: ${summary.failed})`
      );

      onStepStart?.('filter');
      files = await removeOverlongDownloads(
        layout.downloadDir,
        this.tools.processor,
        config.maxDurationSeconds,
        logger
      );
    }

    onProgress?.(`${files.length} videos to normalize`);

    onStepStart?.('normalize');
    const normalized = await normalizeVideos(
      files,
      this.tools.processor,
      {
        normalizedDir: layout.normalizedDir,
        profile: config.profile,
        minNormalizedBytes: config.minNormalizedBytes,
      },
      logger
    );

    onStepStart?.('compile');
    const timeline = await buildTimeline(
      normalized,
      (filePath) => this.tools.processor.probeDuration(filePath),
      metadata.getAll(),
      logger
    );

    let videoPath: string | null = null;
    if (timeline.files.length === 0) {
      onWarning?.('No videos to compile; writing the report only');
    } else {
      onProgress?.(`Concatenating ${timeline.files.length} videos into ${layout.videoPath}`);
      const result = await concatVideos(
        timeline.files,
        layout.fileListPath,
        layout.videoPath,
        this.tools.processor
      );
      if (result.exitCode === 0) {
        videoPath = layout.videoPath;
      } else {
        await rm(layout.videoPath, { force: true });
        onWarning?.(`Concatenation failed (code ${result.exitCode}): ${result.stderr}`.trim());
      }
    }

    onStepStart?.('report');
    const report = this.reportGenerator.generate(
      {
        startDate: config.window.start.toISOString(),
        endDate: config.window.end.toISOString(),
        entries: timeline.entries,
        totalSeconds: timeline.totalSeconds,
        bookmarks: bookmarks.map(toReportBookmark),
      },
      { title: `Video Compilation - ${layout.runDate}` }
    );
    await this.reportGenerator.writeToFile(report, layout.reportPath);
    onProgress?.(`Report written: ${layout.reportPath}`);

    return {
      runDate: layout.runDate,
      videoPath,
      reportPath: layout.reportPath,
      entries: timeline.entries,
      totalSeconds: timeline.totalSeconds,
    };
  }

  private async fetchSources(
    config: PipelineConfig,
    layout: RunLayout,
    logger: PipelineLogger
  ): Promise<FetchedSources> {
    let bookmarks: KarakeepBookmark[] = [];
    let fromBookmarks: string[] = [];
    let rawBookmarks: unknown = null;

    if (config.karakeep) {
      logger.progress?.('Fetching bookmarks...');
      const response = await new KarakeepClient(config.karakeep).listBookmarks();
      rawBookmarks = response;
      bookmarks = bookmarksInWindow(response, config.window);
      fromBookmarks = bookmarkUrls(bookmarks);
      logger.progress?.(
        `${bookmarks.length}/${response.bookmarks?.length ?? 0} bookmarks in range, ${fromBookmarks.length} URLs`
      );
    }

    let fromChat: string[] = [];
    if (config.matrix) {
      logger.progress?.('Walking chat history...');
      const client = new MatrixClient(config.matrix);
      const events = await collectEvents(walkHistory((from) => client.fetchPage(from), config.window.start));
      fromChat = chatUrls(events, config.window);
      logger.progress?.(`${events.length} chat events read, ${fromChat.length} URLs in range`);
    }

    await writeSourceSnapshot(layout.sourcesPath, {
      createdAt: new Date().toISOString(),
      window: {
        start: config.window.start.toISOString(),
        end: config.window.end.toISOString(),
      },
      bookmarkUrls: fromBookmarks,
      chatUrls: fromChat,
      bookmarks: rawBookmarks,
    });

    return { urls: dedupeUrls(fromBookmarks, fromChat), bookmarks };
  }
}

function toReportBookmark(bookmark: KarakeepBookmark): ReportBookmark {
  return {
    title: bookmark.title || bookmark.content?.title || '',
    url: bookmark.content?.url ?? '',
    createdAt: bookmark.createdAt,
  };
}
