import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  MatrixClient,
  chatUrls,
  collectEvents,
  isLastPage,
  walkHistory,
} from '../../../src/core/matrix/index.js';
import type { MatrixEvent, MatrixMessagesPage } from '../../../src/types/index.js';

const windowStart = new Date('2026-10-12T00:00:00Z');
const ts = (iso: string): number => Date.parse(iso);

function event(iso: string, body: unknown): MatrixEvent {
  return { origin_server_ts: ts(iso), type: 'm.room.message', content: { msgtype: 'm.text', body } };
}

function pagesFetcher(pages: Record<string, MatrixMessagesPage>) {
  return vi.fn(async (from?: string) => {
    const page = pages[from ?? 'first'];
    if (!page) throw new Error(`unexpected cursor ${from}`);
    return page;
  });
}

describe('walkHistory', () => {
  it('follows cursors until a page reaches past the window start', async () => {
    const fetchPage = pagesFetcher({
      first: { chunk: [event('2026-10-18T10:00:00Z', 'a')], end: 't2' },
      t2: { chunk: [event('2026-10-15T10:00:00Z', 'b')], end: 't3' },
      t3: { chunk: [event('2026-10-13T10:00:00Z', 'c'), event('2026-10-10T10:00:00Z', 'd')], end: 't4' },
      t4: { chunk: [event('2026-10-01T10:00:00Z', 'e')], end: 't5' },
    });

    const events = await collectEvents(walkHistory(fetchPage, windowStart));

    expect(events.map((e) => e.content?.body)).toEqual(['a', 'b', 'c', 'd']);
    expect(fetchPage.mock.calls.map((call) => call[0])).toEqual([undefined, 't2', 't3']);
  });

  it('stops when the cursor is missing or empty', async () => {
    const fetchPage = pagesFetcher({
      first: { chunk: [event('2026-10-18T10:00:00Z', 'a')], end: 't2' },
      t2: { chunk: [event('2026-10-17T10:00:00Z', 'b')], end: '' },
    });

    const events = await collectEvents(walkHistory(fetchPage, windowStart));

    expect(events).toHaveLength(2);
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });

  it('stops on an empty page', async () => {
    const fetchPage = pagesFetcher({ first: { chunk: [], end: 't2' } });

    const events = await collectEvents(walkHistory(fetchPage, windowStart));

    expect(events).toEqual([]);
    expect(fetchPage).toHaveBeenCalledTimes(1);
  });

  it('is lazy and resumes from a given cursor', async () => {
    const fetchPage = pagesFetcher({
      t2: { chunk: [event('2026-10-15T10:00:00Z', 'b')], end: 't3' },
      t3: { chunk: [event('2026-10-14T10:00:00Z', 'c')], end: 't4' },
    });

    const pages = walkHistory(fetchPage, windowStart, 't2');
    expect(fetchPage).not.toHaveBeenCalled();

    const first = await pages.next();
    expect(first.done).toBe(false);
    expect(fetchPage).toHaveBeenCalledTimes(1);
    expect(fetchPage).toHaveBeenCalledWith('t2');
  });
});

describe('isLastPage', () => {
  it('uses the oldest event in the page', () => {
    const page = {
      chunk: [event('2026-10-12T00:00:00Z', 'x'), event('2026-10-16T00:00:00Z', 'y')],
      end: 'next',
    };
    expect(isLastPage(page, windowStart)).toBe(false);
    expect(isLastPage(page, new Date('2026-10-12T00:00:00.001Z'))).toBe(true);
  });
});

describe('chatUrls', () => {
  it('extracts URLs from in-window text bodies only', () => {
    const events = [
      event('2026-10-18T10:00:00Z', 'watch https://video.example.com/1 now'),
      event('2026-10-05T10:00:00Z', 'old https://video.example.com/old'),
      event('2026-10-17T10:00:00Z', { formatted: 'https://video.example.com/ignored' }),
      event('2026-10-16T10:00:00Z', 'two: https://a.example.com/x https://b.example.com/y'),
    ];

    expect(chatUrls(events, { start: windowStart, end: new Date('2026-10-19T00:00:00Z') })).toEqual([
      'https://video.example.com/1',
      'https://a.example.com/x',
      'https://b.example.com/y',
    ]);
  });
});

describe('MatrixClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const client = new MatrixClient({
    homeserver: 'https://matrix.example.org/',
    roomId: '!room:example.org',
    accessToken: 'test-token',
  });

  it('builds a backwards messages URL with an encoded room id', () => {
    expect(client.buildMessagesUrl()).toBe(
      'https://matrix.example.org/_matrix/client/v3/rooms/!room%3Aexample.org/messages' +
        '?access_token=test-token&dir=b&limit=100'
    );
    expect(client.buildMessagesUrl('t2')).toContain('&limit=100&from=t2');
  });

  it('throws on an error response', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('forbidden', { status: 403 })));
    await expect(client.fetchPage()).rejects.toThrow('Matrix API error (403): forbidden');
  });
});
