import { Command } from 'commander';
import { config as loadEnv } from 'dotenv';
import {
  FileTokenStore,
  YouTubeAuthorizer,
  YouTubeUploader,
  findLatestCompilation,
} from '../../../core/index.js';
import type { UploadConfig } from '../../../types/index.js';
import { ConfigError, buildUploadConfig, type UploadOptions } from '../config.js';
import { reportFailure } from '../output.js';

loadEnv();

interface UploadCommandOptions extends UploadOptions {
  verbose?: boolean;
}

export function createUploadCommand(): Command {
  const command = new Command('upload')
    .description('Upload the most recent compilation to YouTube')
    .option('-o, --output <dir>', 'Compilation directory', './compilation')
    .option('-t, --token <path>', 'Cached OAuth token file', '.youtube_token.json')
    .option('--privacy <status>', 'private, unlisted or public', 'private')
    .option('--verbose', 'Print stack traces on failure')
    .action(async (options: UploadCommandOptions) => {
      let config: UploadConfig;
      try {
        config = buildUploadConfig(options, process.env);
      } catch (error) {
        if (error instanceof ConfigError) {
          console.error(`❌ ${error.message}`);
          process.exit(1);
        }
        throw error;
      }

      try {
        const files = await findLatestCompilation(config.compilationDir);
        console.log(`🎬 Video: ${files.videoPath}`);
        console.log(`📝 Description: ${files.reportPath}`);

        if (options.verbose && config.oauth.projectId) {
          console.log(`🔍 OAuth project: ${config.oauth.projectId}`);
        }

        const authorizer = new YouTubeAuthorizer(
          config.oauth,
          new FileTokenStore(config.tokenPath, config.oauth)
        );
        const auth = await authorizer.authorize({
          onProgress: (message) => console.log(`ℹ️  ${message}`),
          onAuthUrl: (url) => console.log(`🔑 Open this URL to authorize uploads:\n${url}`),
        });

        console.log(`📤 Uploading (${config.privacyStatus})...`);
        const result = await YouTubeUploader.fromAuth(auth).upload(files, {
          privacyStatus: config.privacyStatus,
          categoryId: config.categoryId,
        });

        console.log(`✅ Uploaded: ${result.url}`);
      } catch (error) {
        reportFailure(error, options.verbose);
        process.exit(1);
      }
    });

  return command;
}
