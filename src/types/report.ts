export interface CompilationEntry {
  index: number;
  title: string;
  url: string;
  uploader: string;
  timestamp: string;
  timestampSeconds: number;
  duration: string;
  durationSeconds: number;
  videoId: string;
}

export interface ReportBookmark {
  title: string;
  url: string;
  createdAt: string;
}

export interface ReportInput {
  startDate: string;
  endDate: string;
  entries: CompilationEntry[];
  totalSeconds: number;
  bookmarks: ReportBookmark[];
}
