import { describe, it, expect } from 'vitest';
import {
  buildTimeline,
  formatDuration,
  formatTimestamp,
  sortByFileName,
} from '../../../src/core/pipeline/index.js';

const durations: Record<string, number | null> = {
  '/n/a.mp4': 30,
  '/n/b.mp4': 45,
  '/n/c.mp4': 12,
};

const probeDuration = async (filePath: string) => durations[filePath] ?? null;

describe('formatTimestamp', () => {
  it('formats hours, minutes and seconds', () => {
    expect(formatTimestamp(0)).toBe('00:00:00');
    expect(formatTimestamp(75)).toBe('00:01:15');
    expect(formatTimestamp(3725.9)).toBe('01:02:05');
  });
});

describe('formatDuration', () => {
  it('formats minutes and seconds without wrapping minutes', () => {
    expect(formatDuration(45)).toBe('00:45');
    expect(formatDuration(179.6)).toBe('02:59');
    expect(formatDuration(3725)).toBe('62:05');
  });
});

describe('buildTimeline', () => {
  it('accumulates start offsets without gaps', async () => {
    const timeline = await buildTimeline(['/n/b.mp4', '/n/c.mp4', '/n/a.mp4'], probeDuration, {});

    expect(timeline.entries.map((entry) => entry.timestamp)).toEqual(['00:00:00', '00:00:30', '00:01:15']);
    expect(timeline.entries.map((entry) => entry.timestampSeconds)).toEqual([0, 30, 75]);
    expect(timeline.totalSeconds).toBe(87);
    expect(formatTimestamp(timeline.totalSeconds)).toBe('00:01:27');
  });

  it('orders files by name and returns that order for concatenation', async () => {
    const timeline = await buildTimeline(['/n/c.mp4', '/n/a.mp4', '/n/b.mp4'], probeDuration, {});
    expect(timeline.files).toEqual(['/n/a.mp4', '/n/b.mp4', '/n/c.mp4']);
    expect(timeline.entries.map((entry) => entry.index)).toEqual([1, 2, 3]);
  });

  it('fills entries from metadata and falls back to the file name', async () => {
    const timeline = await buildTimeline(['/n/a.mp4', '/n/b.mp4'], probeDuration, {
      a: { title: 'First clip', url: 'https://video.example.com/a', duration: 30, uploader: 'alice' },
    });

    expect(timeline.entries).toEqual([
      {
        index: 1,
        title: 'First clip',
        url: 'https://video.example.com/a',
        uploader: 'alice',
        timestamp: '00:00:00',
        timestampSeconds: 0,
        duration: '00:30',
        durationSeconds: 30,
        videoId: 'a',
      },
      {
        index: 2,
        title: 'b',
        url: '',
        uploader: '',
        timestamp: '00:00:30',
        timestampSeconds: 30,
        duration: '00:45',
        durationSeconds: 45,
        videoId: 'b',
      },
    ]);
  });

  it('counts an unreadable duration as zero and warns', async () => {
    const warnings: string[] = [];
    const probeWithGap = async (file: string) => (file === '/n/x.mp4' ? null : 10);

    const timeline = await buildTimeline(['/n/a.mp4', '/n/x.mp4', '/n/z.mp4'], probeWithGap, {}, {
      warn: (message) => warnings.push(message),
    });

    expect(timeline.entries.map((entry) => entry.timestamp)).toEqual(['00:00:00', '00:00:10', '00:00:10']);
    expect(timeline.totalSeconds).toBe(20);
    expect(warnings).toEqual(['Could not read duration of x.mp4, counting it as 0s']);
  });
});

describe('sortByFileName', () => {
  it('sorts by base name, not by directory', () => {
    expect(sortByFileName(['/z/a.mp4', '/a/b.mp4'])).toEqual(['/z/a.mp4', '/a/b.mp4']);
  });
});
