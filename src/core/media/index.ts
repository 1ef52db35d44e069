export { runCommand, type CommandResult, type CommandRunner } from './command.js';
export { YtDlp, parseProbeOutput, type YtDlpOptions } from './ytdlp.js';
export { Ffmpeg, encodeArgs, parseDuration, type FfmpegOptions } from './ffmpeg.js';
