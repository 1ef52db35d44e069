import { createReadStream } from 'fs';
import { readdir, readFile, stat } from 'fs/promises';
import { basename, extname, join } from 'path';
import { google, type Auth, type youtube_v3 } from 'googleapis';
import type { CompilationFiles, PrivacyStatus } from '../../types/index.js';
import { isNotFound } from '../pipeline/index.js';
import { toPlainDescription } from '../output/index.js';

export type InsertVideo = (
  params: youtube_v3.Params$Resource$Videos$Insert
) => Promise<{ data: youtube_v3.Schema$Video }>;

export interface UploadOptions {
  privacyStatus: PrivacyStatus;
  categoryId: string;
}

export interface UploadResult {
  videoId: string;
  url: string;
  title: string;
}

/** Most recently modified compilation video and the report beside it. */
export async function findLatestCompilation(compilationDir: string): Promise<CompilationFiles> {
  let names: string[];
  try {
    names = await readdir(compilationDir);
  } catch (error) {
    if (isNotFound(error)) {
      throw new Error(`Compilation directory not found: ${compilationDir}`);
    }
    throw error;
  }

  let latest: { path: string; mtimeMs: number } | null = null;
  for (const name of names) {
    if (extname(name).toLowerCase() !== '.mp4') continue;
    const path = join(compilationDir, name);
    const stats = await stat(path);
    if (!stats.isFile()) continue;
    if (!latest || stats.mtimeMs > latest.mtimeMs) {
      latest = { path, mtimeMs: stats.mtimeMs };
    }
  }

  if (!latest) {
    throw new Error(`No compilation video found in ${compilationDir}`);
  }

  const stem = basename(latest.path, extname(latest.path));
  return {
    videoPath: latest.path,
    reportPath: join(compilationDir, `${stem}.md`),
    stem,
  };
}

export function buildVideoResource(
  files: CompilationFiles,
  report: string,
  options: UploadOptions
): youtube_v3.Schema$Video {
  return {
    snippet: {
      title: `Video Compilation - ${files.stem}`,
      description: toPlainDescription(report),
      categoryId: options.categoryId,
    },
    status: {
      privacyStatus: options.privacyStatus,
    },
  };
}

export class YouTubeUploader {
  private insert: InsertVideo;

  constructor(insert: InsertVideo) {
    this.insert = insert;
  }

  static fromAuth(auth: Auth.OAuth2Client): YouTubeUploader {
    const youtube = google.youtube({ version: 'v3', auth });
    return new YouTubeUploader((params) => youtube.videos.insert(params));
  }

  async upload(files: CompilationFiles, options: UploadOptions): Promise<UploadResult> {
    let report: string;
    try {
      report = await readFile(files.reportPath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        throw new Error(`Report not found for ${basename(files.videoPath)}: ${files.reportPath}`);
      }
      throw error;
    }

    const requestBody = buildVideoResource(files, report, options);
    const response = await this.insert({
      part: ['snippet', 'status'],
      requestBody,
      media: {
        mimeType: 'video/mp4',
        body: createReadStream(files.videoPath),
      },
    });

    const videoId = response.data.id;
    if (!videoId) {
      throw new Error('YouTube did not return a video id');
    }

    return {
      videoId,
      url: `https://www.youtube.com/watch?v=${videoId}`,
      title: requestBody.snippet?.title ?? files.stem,
    };
  }
}
