import type {
  DateWindow,
  KarakeepBookmark,
  KarakeepBookmarksResponse,
  KarakeepConfig,
} from '../../types/index.js';
import { extractUrls, filterByWindow } from '../sources/index.js';

export class KarakeepClient {
  private baseUrl: string;
  private listId: string;
  private authHeader: string;

  constructor(config: KarakeepConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.listId = config.listId;
    this.authHeader = `Bearer ${config.apiKey}`;
  }

  private async request<T>(endpoint: string): Promise<T> {
    const response = await fetch(`${this.baseUrl}${endpoint}`, {
      headers: {
        Authorization: this.authHeader,
        Accept: 'application/json',
      },
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Karakeep API error (${response.status}): ${errorText}`);
    }

    return (await response.json()) as T;
  }

  async listBookmarks(): Promise<KarakeepBookmarksResponse> {
    return this.request<KarakeepBookmarksResponse>(
      `/api/v1/lists/${encodeURIComponent(this.listId)}/bookmarks`
    );
  }
}

export function bookmarksInWindow(
  response: KarakeepBookmarksResponse,
  window: DateWindow
): KarakeepBookmark[] {
  return filterByWindow(response.bookmarks ?? [], (bookmark) => bookmark.createdAt, window);
}

export function bookmarkUrls(bookmarks: readonly KarakeepBookmark[]): string[] {
  return bookmarks.flatMap((bookmark) => extractUrls(bookmark.content?.url, bookmark.title));
}
