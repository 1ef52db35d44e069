import type { Dirent } from 'fs';
import { readdir, stat } from 'fs/promises';
import { join, extname } from 'path';

export interface RunLayout {
  runDate: string;
  downloadDir: string;
  normalizedDir: string;
  metadataPath: string;
  sourcesPath: string;
  fileListPath: string;
  videoPath: string;
  reportPath: string;
}

const NON_VIDEO_EXTENSIONS = new Set(['.json', '.part', '.ytdl', '.txt', '.md', '.temp', '.tmp']);

/** `YYYY_MM_DD` of the instant, in UTC. */
export function formatRunDate(date: Date): string {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${year}_${month}_${day}`;
}

export function resolveLayout(
  dirs: { downloadsDir: string; compilationDir: string },
  endDate: Date
): RunLayout {
  const runDate = formatRunDate(endDate);
  const downloadDir = join(dirs.downloadsDir, runDate);
  const normalizedDir = join(downloadDir, 'normalized');

  return {
    runDate,
    downloadDir,
    normalizedDir,
    metadataPath: join(downloadDir, 'metadata.json'),
    sourcesPath: join(downloadDir, 'sources.json'),
    fileListPath: join(normalizedDir, 'filelist.txt'),
    videoPath: join(dirs.compilationDir, `${runDate}.mp4`),
    reportPath: join(dirs.compilationDir, `${runDate}.md`),
  };
}

export function videoIdOf(filePath: string): string {
  const name = filePath.split(/[\\/]/).pop() ?? filePath;
  const ext = extname(name);
  return ext ? name.slice(0, -ext.length) : name;
}

/**
 * Video files directly inside `dir`, sorted by file name. Snapshots, partial
 * downloads and sub-directories are left out. A missing directory is empty.
 */
export async function listVideoFiles(dir: string, extensions?: readonly string[]): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (isNotFound(error)) return [];
    throw error;
  }

  return entries
    .filter((entry) => entry.isFile() && !entry.name.startsWith('.'))
    .map((entry) => entry.name)
    .filter((name) => {
      const ext = extname(name).toLowerCase();
      if (extensions) return extensions.includes(ext);
      return !NON_VIDEO_EXTENSIONS.has(ext);
    })
    .sort()
    .map((name) => join(dir, name));
}

/** Size of the file in bytes, or null when it does not exist. */
export async function fileSize(filePath: string): Promise<number | null> {
  try {
    const stats = await stat(filePath);
    return stats.isFile() ? stats.size : null;
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }
}

export async function isValidFile(filePath: string, minBytes: number): Promise<boolean> {
  const size = await fileSize(filePath);
  return size !== null && size > minBytes;
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
