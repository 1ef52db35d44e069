export interface KarakeepConfig {
  baseUrl: string;
  listId: string;
  apiKey: string;
}

export interface KarakeepBookmark {
  id: string;
  createdAt: string;
  title?: string | null;
  content?: {
    type?: string;
    url?: string;
    title?: string | null;
  };
}

export interface KarakeepBookmarksResponse {
  bookmarks?: KarakeepBookmark[];
}
