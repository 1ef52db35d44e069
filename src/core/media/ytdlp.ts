import type { ToolRun, VideoFetcher, VideoProbe } from '../../types/index.js';
import { runCommand, type CommandRunner } from './command.js';

export interface YtDlpOptions {
  binary?: string;
  cookiesBrowser?: string;
  run?: CommandRunner;
  onCommand?: (commandLine: string) => void;
}

export class YtDlp implements VideoFetcher {
  private binary: string;
  private cookiesBrowser: string;
  private run: CommandRunner;
  private onCommand?: (commandLine: string) => void;

  constructor(options: YtDlpOptions = {}) {
    this.binary = options.binary ?? 'yt-dlp';
    this.cookiesBrowser = options.cookiesBrowser ?? 'firefox';
    this.run = options.run ?? runCommand;
    this.onCommand = options.onCommand;
  }

  async probe(url: string): Promise<VideoProbe | null> {
    const args = [
      '--dump-json',
      '--no-playlist',
      '--skip-download',
      '--no-warnings',
      '--cookies-from-browser',
      this.cookiesBrowser,
      url,
    ];
    this.onCommand?.(`${this.binary} ${args.join(' ')}`);

    const result = await this.run(this.binary, args);
    if (result.code !== 0) return null;

    return parseProbeOutput(result.stdout, url);
  }

  async download(url: string, outputTemplate: string): Promise<ToolRun> {
    const args = [
      '--cookies-from-browser',
      this.cookiesBrowser,
      '--no-playlist',
      '-o',
      outputTemplate,
      url,
    ];
    this.onCommand?.(`${this.binary} ${args.join(' ')}`);

    const result = await this.run(this.binary, args);
    return { exitCode: result.code, stderr: result.stderr.slice(0, 500) };
  }
}

/**
 * Reads the first JSON document yt-dlp printed. Returns null when the output
 * has no usable video id.
 */
export function parseProbeOutput(stdout: string, fallbackUrl: string): VideoProbe | null {
  const firstLine = stdout.split('\n').find((line) => line.trim().startsWith('{'));
  if (!firstLine) return null;

  let data: unknown;
  try {
    data = JSON.parse(firstLine);
  } catch {
    return null;
  }
  if (!isRecord(data)) return null;

  const id = typeof data.id === 'string' ? data.id : '';
  if (!id) return null;

  const duration = typeof data.duration === 'number' && Number.isFinite(data.duration) ? data.duration : null;

  return {
    id,
    title: stringField(data.title) || id,
    url: stringField(data.webpage_url) || fallbackUrl,
    duration,
    uploader: stringField(data.uploader) || stringField(data.channel),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(value: unknown): string {
  return typeof value === 'string' ? value : '';
}
