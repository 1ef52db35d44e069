import { Command } from 'commander';
import { createCompileCommand } from './commands/compile.js';
import { createUploadCommand } from './commands/upload.js';
import { createStatusCommand } from './commands/status.js';

export function createCLI(): Command {
  const program = new Command()
    .name('clip-compiler')
    .description('Compile bookmarked short videos into a dated compilation with a markdown report')
    .version('1.0.0');

  program.addCommand(createCompileCommand(), { isDefault: true });
  program.addCommand(createUploadCommand());
  program.addCommand(createStatusCommand());

  return program;
}
