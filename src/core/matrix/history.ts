import type { DateWindow, MatrixEvent, MatrixMessagesPage } from '../../types/index.js';
import { extractUrls, filterByWindow } from '../sources/index.js';

export type PageFetcher = (from?: string) => Promise<MatrixMessagesPage>;

/**
 * Walks room history backwards, one page per iteration.
 *
 * Stops after the page whose cursor is missing, which is empty, or whose
 * oldest event predates `windowStart`. Passing `from` resumes a previous walk.
 */
export async function* walkHistory(
  fetchPage: PageFetcher,
  windowStart: Date,
  from?: string
): AsyncGenerator<MatrixMessagesPage> {
  let cursor = from;

  while (true) {
    const page = await fetchPage(cursor);
    yield page;

    if (isLastPage(page, windowStart)) return;
    cursor = page.end;
  }
}

export function isLastPage(page: MatrixMessagesPage, windowStart: Date): boolean {
  const events = page.chunk ?? [];
  if (!page.end || events.length === 0) return true;

  const oldest = Math.min(...events.map((event) => event.origin_server_ts));
  return oldest < windowStart.getTime();
}

export async function collectEvents(pages: AsyncIterable<MatrixMessagesPage>): Promise<MatrixEvent[]> {
  const events: MatrixEvent[] = [];
  for await (const page of pages) {
    events.push(...(page.chunk ?? []));
  }
  return events;
}

export function chatUrls(events: readonly MatrixEvent[], window: DateWindow): string[] {
  return filterByWindow(events, (event) => event.origin_server_ts, window).flatMap((event) => {
    const body = event.content?.body;
    return typeof body === 'string' ? extractUrls(body) : [];
  });
}
