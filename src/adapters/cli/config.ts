import type {
  DateWindow,
  EncoderProfile,
  KarakeepConfig,
  MatrixConfig,
  PipelineConfig,
  PrivacyStatus,
  Resolution,
  UploadConfig,
  YouTubeOAuthConfig,
} from '../../types/index.js';

export type Env = Record<string, string | undefined>;

export const MAX_DURATION_SECONDS = 180;
export const MIN_NORMALIZED_BYTES = 1024;
export const DEFAULT_WINDOW_DAYS = 7;
export const YOUTUBE_CATEGORY_PEOPLE_BLOGS = '22';

export const LANDSCAPE: Resolution = { width: 1920, height: 1080 };
export const PORTRAIT: Resolution = { width: 1080, height: 1920 };

const PRIVACY_STATUSES: readonly PrivacyStatus[] = ['private', 'unlisted', 'public'];

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface CompileOptions {
  startDate?: string;
  endDate?: string;
  mergeOnly?: boolean;
  tiktok?: boolean;
  downloads: string;
  output: string;
  probe?: boolean;
}

export interface UploadOptions {
  output: string;
  token: string;
  privacy: string;
}

export function encoderProfile(resolution: Resolution): EncoderProfile {
  return {
    resolution,
    videoCodec: 'libx264',
    audioCodec: 'aac',
    preset: 'fast',
    crf: 23,
    frameRate: 30,
    audioBitrate: '128k',
    audioSampleRate: 44100,
  };
}

export function parseDate(value: string, flag: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ConfigError(`${flag} is not a valid ISO-8601 date: ${value}`);
  }
  return date;
}

export function resolveWindow(
  options: { startDate?: string; endDate?: string },
  now: Date = new Date()
): DateWindow {
  const end = options.endDate ? parseDate(options.endDate, '--end-date') : now;
  const start = options.startDate
    ? parseDate(options.startDate, '--start-date')
    : new Date(end.getTime() - DEFAULT_WINDOW_DAYS * 24 * 60 * 60 * 1000);

  if (start.getTime() > end.getTime()) {
    throw new ConfigError('--start-date must not be after --end-date');
  }
  return { start, end };
}

export function karakeepFromEnv(env: Env): KarakeepConfig | null {
  const { KARAKEEP_BASE_URL, KARAKEEP_LIST_ID, KARAKEEP_API_KEY } = env;
  if (!KARAKEEP_BASE_URL || !KARAKEEP_LIST_ID || !KARAKEEP_API_KEY) return null;
  return { baseUrl: KARAKEEP_BASE_URL, listId: KARAKEEP_LIST_ID, apiKey: KARAKEEP_API_KEY };
}

export function matrixFromEnv(env: Env): MatrixConfig | null {
  const { MATRIX_HOMESERVER, MATRIX_ROOM_ID, MATRIX_ACCESS_TOKEN } = env;
  if (!MATRIX_HOMESERVER || !MATRIX_ROOM_ID || !MATRIX_ACCESS_TOKEN) return null;
  return { homeserver: MATRIX_HOMESERVER, roomId: MATRIX_ROOM_ID, accessToken: MATRIX_ACCESS_TOKEN };
}

export function buildPipelineConfig(options: CompileOptions, env: Env, now: Date = new Date()): PipelineConfig {
  const window = resolveWindow(options, now);
  const karakeep = karakeepFromEnv(env);
  const matrix = matrixFromEnv(env);
  const mergeOnly = options.mergeOnly ?? false;

  if (!mergeOnly && !karakeep && !matrix) {
    throw new ConfigError(
      'No link source configured: set KARAKEEP_BASE_URL, KARAKEEP_LIST_ID and KARAKEEP_API_KEY, ' +
        'or MATRIX_HOMESERVER, MATRIX_ROOM_ID and MATRIX_ACCESS_TOKEN'
    );
  }

  return {
    karakeep,
    matrix,
    window,
    mergeOnly,
    probeBeforeDownload: options.probe !== false,
    maxDurationSeconds: MAX_DURATION_SECONDS,
    minNormalizedBytes: MIN_NORMALIZED_BYTES,
    profile: encoderProfile(options.tiktok ? PORTRAIT : LANDSCAPE),
    downloadsDir: options.downloads,
    compilationDir: options.output,
    tools: {
      ytDlp: env.YT_DLP_PATH || 'yt-dlp',
      ffmpeg: env.FFMPEG_PATH || 'ffmpeg',
      ffprobe: env.FFPROBE_PATH || 'ffprobe',
    },
    cookiesBrowser: env.COOKIES_BROWSER || 'firefox',
  };
}

export function youtubeOAuthFromEnv(env: Env): YouTubeOAuthConfig {
  const { YOUTUBE_CLIENT_ID, YOUTUBE_CLIENT_SECRET, YOUTUBE_PROJECT_ID } = env;
  if (!YOUTUBE_CLIENT_ID || !YOUTUBE_CLIENT_SECRET) {
    throw new ConfigError('YOUTUBE_CLIENT_ID and YOUTUBE_CLIENT_SECRET must be set to upload');
  }
  return {
    clientId: YOUTUBE_CLIENT_ID,
    clientSecret: YOUTUBE_CLIENT_SECRET,
    projectId: YOUTUBE_PROJECT_ID ?? '',
  };
}

export function parsePrivacy(value: string): PrivacyStatus {
  const match = PRIVACY_STATUSES.find((status) => status === value);
  if (!match) {
    throw new ConfigError(`--privacy must be one of ${PRIVACY_STATUSES.join(', ')}: ${value}`);
  }
  return match;
}

export function buildUploadConfig(options: UploadOptions, env: Env): UploadConfig {
  return {
    oauth: youtubeOAuthFromEnv(env),
    compilationDir: options.output,
    tokenPath: options.token,
    privacyStatus: parsePrivacy(options.privacy),
    categoryId: YOUTUBE_CATEGORY_PEOPLE_BLOGS,
  };
}
