import { Command } from 'commander';
import { MetadataStore } from '../../../core/index.js';
import {
  fileSize,
  isValidFile,
  listVideoFiles,
  normalizedPathFor,
  resolveLayout,
} from '../../../core/pipeline/index.js';
import { MIN_NORMALIZED_BYTES, parseDate } from '../config.js';
import { reportFailure } from '../output.js';

interface StatusCommandOptions {
  date?: string;
  downloads: string;
  output: string;
}

export interface RunStatus {
  runDate: string;
  downloaded: number;
  normalized: number;
  pendingNormalize: string[];
  metadataEntries: number;
  hasVideo: boolean;
  hasReport: boolean;
}

export async function collectStatus(
  dirs: { downloadsDir: string; compilationDir: string },
  date: Date
): Promise<RunStatus> {
  const layout = resolveLayout(dirs, date);
  const downloads = await listVideoFiles(layout.downloadDir);
  const metadata = await new MetadataStore(layout.metadataPath).load();

  let normalized = 0;
  const pendingNormalize: string[] = [];
  for (const file of downloads) {
    if (await isValidFile(normalizedPathFor(file, layout.normalizedDir), MIN_NORMALIZED_BYTES)) {
      normalized++;
    } else {
      pendingNormalize.push(file);
    }
  }

  return {
    runDate: layout.runDate,
    downloaded: downloads.length,
    normalized,
    pendingNormalize,
    metadataEntries: Object.keys(metadata).length,
    hasVideo: (await fileSize(layout.videoPath)) !== null,
    hasReport: (await fileSize(layout.reportPath)) !== null,
  };
}

export function createStatusCommand(): Command {
  const command = new Command('status')
    .description('Show what exists on disk for a dated run')
    .option('--date <date>', 'End date of the run (ISO-8601, default: now)')
    .option('-d, --downloads <dir>', 'Downloads directory', './downloads')
    .option('-o, --output <dir>', 'Compilation directory', './compilation')
    .action(async (options: StatusCommandOptions) => {
      try {
        const date = options.date ? parseDate(options.date, '--date') : new Date();
        const status = await collectStatus(
          { downloadsDir: options.downloads, compilationDir: options.output },
          date
        );
        const mark = (done: boolean): string => (done ? '✅' : '⬚ ');

        console.log('');
        console.log('┌─────────────────────────────────────────────────────┐');
        console.log(`│ Run: ${status.runDate.padEnd(47)}│`);
        console.log('├─────────────────────────────────────────────────────┤');
        console.log(`│ 📥 Downloaded:  ${String(status.downloaded).padStart(4)}                                │`);
        console.log(`│ 🎞  Normalized:  ${String(status.normalized).padStart(4)}                                │`);
        console.log(`│ 🏷  Metadata:    ${String(status.metadataEntries).padStart(4)}                                │`);
        console.log(`│ ${mark(status.hasVideo)} Video        ${mark(status.hasReport)} Report                         │`);
        console.log('└─────────────────────────────────────────────────────┘');

        if (status.pendingNormalize.length > 0) {
          console.log('\nNot normalized yet:');
          for (const file of status.pendingNormalize) {
            console.log(`  - ${file}`);
          }
        }
      } catch (error) {
        reportFailure(error, false);
        process.exit(1);
      }
    });

  return command;
}
