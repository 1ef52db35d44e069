import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { buildConcatList, concatVideos, escapeConcatPath } from '../../../src/core/pipeline/index.js';
import { FakeProcessor, makeTempDir, removeDir } from '../../helpers/fakes.js';

describe('concat list', () => {
  it('quotes absolute paths and escapes single quotes', () => {
    expect(escapeConcatPath("/videos/it's.mp4")).toBe("/videos/it'\\''s.mp4");
    expect(buildConcatList(['/n/a.mp4', '/n/b.mp4'])).toBe("file '/n/a.mp4'\nfile '/n/b.mp4'\n");
  });
});

describe('concatVideos', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('writes the list in the given order and runs the concatenation', async () => {
    const processor = new FakeProcessor();
    const listPath = join(dir, 'normalized', 'filelist.txt');
    const output = join(dir, 'compilation', '2026_10_19.mp4');

    const result = await concatVideos(['/n/b.mp4', '/n/a.mp4'], listPath, output, processor);

    expect(result.exitCode).toBe(0);
    expect(await readFile(listPath, 'utf-8')).toBe("file '/n/b.mp4'\nfile '/n/a.mp4'\n");
    expect(processor.concatCalls).toEqual([{ list: listPath, output }]);
  });
});
