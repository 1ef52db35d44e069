import type { KarakeepConfig } from './karakeep.js';
import type { MatrixConfig } from './matrix.js';
import type { EncoderProfile } from './media.js';

export interface DateWindow {
  start: Date;
  end: Date;
}

export interface ToolPaths {
  ytDlp: string;
  ffmpeg: string;
  ffprobe: string;
}

export interface PipelineConfig {
  karakeep: KarakeepConfig | null;
  matrix: MatrixConfig | null;
  window: DateWindow;
  mergeOnly: boolean;
  probeBeforeDownload: boolean;
  maxDurationSeconds: number;
  minNormalizedBytes: number;
  profile: EncoderProfile;
  downloadsDir: string;
  compilationDir: string;
  tools: ToolPaths;
  cookiesBrowser: string;
}

export interface PipelineLogger {
  progress?: (message: string) => void;
  debug?: (message: string) => void;
  warn?: (message: string) => void;
}
