import type { EncoderProfile, ToolRun, VideoProcessor } from '../../types/index.js';
import { runCommand, type CommandRunner } from './command.js';

export interface FfmpegOptions {
  ffmpeg?: string;
  ffprobe?: string;
  run?: CommandRunner;
  onCommand?: (commandLine: string) => void;
}

export class Ffmpeg implements VideoProcessor {
  private ffmpeg: string;
  private ffprobe: string;
  private run: CommandRunner;
  private onCommand?: (commandLine: string) => void;

  constructor(options: FfmpegOptions = {}) {
    this.ffmpeg = options.ffmpeg ?? 'ffmpeg';
    this.ffprobe = options.ffprobe ?? 'ffprobe';
    this.run = options.run ?? runCommand;
    this.onCommand = options.onCommand;
  }

  async probeDuration(filePath: string): Promise<number | null> {
    const args = [
      '-v',
      'error',
      '-show_entries',
      'format=duration',
      '-of',
      'default=noprint_wrappers=1:nokey=1',
      filePath,
    ];

    const result = await this.run(this.ffprobe, args);
    if (result.code !== 0) return null;

    return parseDuration(result.stdout);
  }

  async normalize(inputPath: string, outputPath: string, profile: EncoderProfile): Promise<ToolRun> {
    return this.exec(['-i', inputPath, ...encodeArgs(profile), '-y', outputPath]);
  }

  async concat(listPath: string, outputPath: string): Promise<ToolRun> {
    return this.exec([
      '-f',
      'concat',
      '-safe',
      '0',
      '-i',
      listPath,
      '-c',
      'copy',
      '-movflags',
      '+faststart',
      '-y',
      outputPath,
    ]);
  }

  private async exec(args: string[]): Promise<ToolRun> {
    this.onCommand?.(`${this.ffmpeg} ${args.join(' ')}`);
    const result = await this.run(this.ffmpeg, args);
    // ffmpeg writes its whole log to stderr; the tail holds the error.
    return { exitCode: result.code, stderr: result.stderr.slice(-500) };
  }
}

export function encodeArgs(profile: EncoderProfile): string[] {
  const { width, height } = profile.resolution;
  const filter =
    `scale=${width}:${height}:force_original_aspect_ratio=decrease,` +
    `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2,setsar=1`;

  return [
    '-vf',
    filter,
    '-c:v',
    profile.videoCodec,
    '-preset',
    profile.preset,
    '-crf',
    String(profile.crf),
    '-r',
    String(profile.frameRate),
    '-pix_fmt',
    'yuv420p',
    '-c:a',
    profile.audioCodec,
    '-b:a',
    profile.audioBitrate,
    '-ar',
    String(profile.audioSampleRate),
    '-ac',
    '2',
    '-movflags',
    '+faststart',
  ];
}

export function parseDuration(stdout: string): number | null {
  const text = stdout.trim();
  if (!text) return null;
  const value = Number(text);
  return Number.isFinite(value) && value >= 0 ? value : null;
}
