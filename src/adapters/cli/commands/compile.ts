import { Command } from 'commander';
import { config as loadEnv } from 'dotenv';
import { Compiler, Ffmpeg, YtDlp } from '../../../core/index.js';
import { formatTimestamp } from '../../../core/pipeline/index.js';
import type { PipelineConfig } from '../../../types/index.js';
import { ConfigError, buildPipelineConfig, type CompileOptions } from '../config.js';
import { reportFailure } from '../output.js';

loadEnv();

interface CompileCommandOptions extends CompileOptions {
  verbose?: boolean;
}

export function createCompileCommand(): Command {
  const command = new Command('compile')
    .description('Download bookmarked videos and build a dated compilation with a report')
    .option('--start-date <date>', 'Start of the bookmark window (ISO-8601, default: 7 days before the end)')
    .option('--end-date <date>', 'End of the bookmark window (ISO-8601, default: now)')
    .option('--merge-only', 'Skip fetching and downloading; compile the files already downloaded')
    .option('--tiktok', 'Portrait 1080x1920 output instead of landscape 1920x1080')
    .option('-d, --downloads <dir>', 'Downloads directory', './downloads')
    .option('-o, --output <dir>', 'Compilation directory', './compilation')
    .option('--no-probe', 'Download without checking metadata and duration first')
    .option('--verbose', 'Print external commands and skipped files')
    .action(async (options: CompileCommandOptions) => {
      let config: PipelineConfig;
      try {
        config = buildPipelineConfig(options, process.env);
      } catch (error) {
        if (error instanceof ConfigError) {
          console.error(`❌ ${error.message}`);
          process.exit(1);
        }
        throw error;
      }

      const onDebug = options.verbose ? (message: string) => console.log(`🔍 ${message}`) : undefined;
      const compiler = new Compiler({
        fetcher: new YtDlp({
          binary: config.tools.ytDlp,
          cookiesBrowser: config.cookiesBrowser,
          onCommand: onDebug,
        }),
        processor: new Ffmpeg({
          ffmpeg: config.tools.ffmpeg,
          ffprobe: config.tools.ffprobe,
          onCommand: onDebug,
        }),
      });

      console.log(
        `📅 ${config.window.start.toISOString()} → ${config.window.end.toISOString()}` +
          ` (${config.profile.resolution.width}x${config.profile.resolution.height})`
      );

      try {
        const result = await compiler.run(config, {
          onProgress: (message) => console.log(`ℹ️  ${message}`),
          onDebug,
          onWarning: (message) => console.warn(`⚠️  ${message}`),
          onStepStart: (step) => console.log(`\n▶️  ${step}`),
        });

        console.log('');
        if (result.videoPath) {
          console.log(`🎬 Compilation: ${result.videoPath}`);
        }
        console.log(`📝 Report: ${result.reportPath}`);
        console.log(`✅ ${result.entries.length} videos, ${formatTimestamp(result.totalSeconds)} total`);
      } catch (error) {
        reportFailure(error, options.verbose);
        process.exit(1);
      }
    });

  return command;
}
