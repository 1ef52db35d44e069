export interface VideoMetadata {
  title: string;
  url: string;
  duration: number | null;
  uploader: string;
}

export type MetadataMap = Record<string, VideoMetadata>;

export interface SourceSnapshot {
  createdAt: string;
  window: {
    start: string;
    end: string;
  };
  bookmarkUrls: string[];
  chatUrls: string[];
  bookmarks: unknown;
}
