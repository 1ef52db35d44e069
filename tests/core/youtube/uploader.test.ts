import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { utimes, writeFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { Readable } from 'stream';
import { finished } from 'stream/promises';
import type { youtube_v3 } from 'googleapis';
import {
  YouTubeUploader,
  buildVideoResource,
  findLatestCompilation,
  type InsertVideo,
} from '../../../src/core/youtube/uploader.js';
import { makeTempDir, removeDir, writeBytes } from '../../helpers/fakes.js';

const options = { privacyStatus: 'private' as const, categoryId: '22' };

async function drain(params: youtube_v3.Params$Resource$Videos$Insert): Promise<void> {
  const body: unknown = params.media?.body;
  if (body instanceof Readable) {
    await finished(body.resume());
  }
}

describe('findLatestCompilation', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('picks the most recently modified video and its report', async () => {
    await writeBytes(join(dir, '2026_10_12.mp4'), 16);
    await writeBytes(join(dir, '2026_10_19.mp4'), 16);
    await writeBytes(join(dir, '2026_10_05.mp4'), 16);
    await utimes(join(dir, '2026_10_12.mp4'), new Date('2026-10-12T00:00:00Z'), new Date('2026-10-12T00:00:00Z'));
    await utimes(join(dir, '2026_10_19.mp4'), new Date('2026-10-19T00:00:00Z'), new Date('2026-10-19T00:00:00Z'));
    await utimes(join(dir, '2026_10_05.mp4'), new Date('2026-10-20T00:00:00Z'), new Date('2026-10-20T00:00:00Z'));

    expect(await findLatestCompilation(dir)).toEqual({
      videoPath: join(dir, '2026_10_05.mp4'),
      reportPath: join(dir, '2026_10_05.md'),
      stem: '2026_10_05',
    });
  });

  it('ignores files that are not videos', async () => {
    await writeFile(join(dir, 'notes.md'), '# notes');
    await mkdir(join(dir, 'old.mp4'));

    await expect(findLatestCompilation(dir)).rejects.toThrow(`No compilation video found in ${dir}`);
  });

  it('reports a missing directory', async () => {
    const missing = join(dir, 'missing');
    await expect(findLatestCompilation(missing)).rejects.toThrow(`Compilation directory not found: ${missing}`);
  });
});

describe('buildVideoResource', () => {
  it('titles the video after the compilation and flattens the report', () => {
    const resource = buildVideoResource(
      { videoPath: 'c/2026_10_19.mp4', reportPath: 'c/2026_10_19.md', stem: '2026_10_19' },
      '# Video Compilation - 2026_10_19\n\n## Chapters\n\n- 00:00:00 First\n',
      { privacyStatus: 'unlisted', categoryId: '22' }
    );

    expect(resource).toEqual({
      snippet: {
        title: 'Video Compilation - 2026_10_19',
        description: 'Video Compilation - 2026_10_19\n\nChapters\n\n00:00:00 First',
        categoryId: '22',
      },
      status: { privacyStatus: 'unlisted' },
    });
  });
});

describe('YouTubeUploader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  function files() {
    return {
      videoPath: join(dir, '2026_10_19.mp4'),
      reportPath: join(dir, '2026_10_19.md'),
      stem: '2026_10_19',
    };
  }

  it('uploads the video with snippet and status', async () => {
    await writeBytes(files().videoPath, 64);
    await writeFile(files().reportPath, '# Video Compilation - 2026_10_19\n');
    const requests: youtube_v3.Params$Resource$Videos$Insert[] = [];
    const insert: InsertVideo = vi.fn(async (params: youtube_v3.Params$Resource$Videos$Insert) => {
      requests.push(params);
      await drain(params);
      return { data: { id: 'abc123' } };
    });

    const result = await new YouTubeUploader(insert).upload(files(), options);

    expect(result).toEqual({
      videoId: 'abc123',
      url: 'https://www.youtube.com/watch?v=abc123',
      title: 'Video Compilation - 2026_10_19',
    });
    expect(requests).toHaveLength(1);
    expect(requests[0].part).toEqual(['snippet', 'status']);
    expect(requests[0].requestBody).toEqual({
      snippet: {
        title: 'Video Compilation - 2026_10_19',
        description: 'Video Compilation - 2026_10_19',
        categoryId: '22',
      },
      status: { privacyStatus: 'private' },
    });
    expect(requests[0].media?.mimeType).toBe('video/mp4');
  });

  it('refuses to upload without a report', async () => {
    await writeBytes(files().videoPath, 64);
    const insert = vi.fn(async () => ({ data: { id: 'abc123' } }));

    await expect(new YouTubeUploader(insert).upload(files(), options)).rejects.toThrow(
      `Report not found for 2026_10_19.mp4: ${files().reportPath}`
    );
    expect(insert).not.toHaveBeenCalled();
  });

  it('fails when no video id comes back', async () => {
    await writeBytes(files().videoPath, 64);
    await writeFile(files().reportPath, '# Report\n');
    const insert = vi.fn(async (params: youtube_v3.Params$Resource$Videos$Insert) => {
      await drain(params);
      return { data: {} };
    });

    await expect(new YouTubeUploader(insert).upload(files(), options)).rejects.toThrow(
      'YouTube did not return a video id'
    );
  });
});
