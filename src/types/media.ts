export interface Resolution {
  width: number;
  height: number;
}

export interface EncoderProfile {
  resolution: Resolution;
  videoCodec: string;
  audioCodec: string;
  preset: string;
  crf: number;
  frameRate: number;
  audioBitrate: string;
  audioSampleRate: number;
}

/**
 * Metadata reported by the downloader before anything is fetched.
 * `duration` is null when the extractor does not know it.
 */
export interface VideoProbe {
  id: string;
  title: string;
  url: string;
  duration: number | null;
  uploader: string;
}

export interface ToolRun {
  exitCode: number;
  stderr: string;
}

export interface VideoFetcher {
  probe(url: string): Promise<VideoProbe | null>;
  download(url: string, outputTemplate: string): Promise<ToolRun>;
}

export interface VideoProcessor {
  probeDuration(filePath: string): Promise<number | null>;
  normalize(inputPath: string, outputPath: string, profile: EncoderProfile): Promise<ToolRun>;
  concat(listPath: string, outputPath: string): Promise<ToolRun>;
}

export interface MediaTools {
  fetcher: VideoFetcher;
  processor: VideoProcessor;
}
